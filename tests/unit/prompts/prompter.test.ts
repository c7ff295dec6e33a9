import { describe, it, expect, vi, beforeEach } from 'vitest'
import { checkbox, confirm, input, select } from '@inquirer/prompts'
import { InquirerPrompter, parseInteger } from '../../../src/prompts/prompter.js'
import { AbortError } from '../../../src/errors.js'

vi.mock('@inquirer/prompts', () => ({
  select: vi.fn(),
  checkbox: vi.fn(),
  input: vi.fn(),
  confirm: vi.fn(),
}))

function exitPromptError(): Error {
  const error = new Error('User force closed the prompt with SIGINT')
  error.name = 'ExitPromptError'
  return error
}

describe('parseInteger', () => {
  it('debe aceptar enteros en base 10', () => {
    expect(parseInteger('42')).toBe(42)
    expect(parseInteger(' -7 ')).toBe(-7)
  })

  it('debe rechazar todo lo demás', () => {
    expect(parseInteger('')).toBeUndefined()
    expect(parseInteger('4.2')).toBeUndefined()
    expect(parseInteger('12abc')).toBeUndefined()
    expect(parseInteger('99999999999999999999')).toBeUndefined()
  })
})

describe('InquirerPrompter', () => {
  const prompter = new InquirerPrompter()

  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('debe pasar las opciones como choices indexadas', async () => {
    vi.mocked(select).mockResolvedValueOnce(1)

    const index = await prompter.selectOne('Pick one:', ['a', 'b'])

    expect(index).toBe(1)
    expect(select).toHaveBeenCalledWith({
      message: 'Pick one:',
      choices: [{ name: 'a', value: 0 }, { name: 'b', value: 1 }],
    })
  })

  it('debe retornar los índices marcados', async () => {
    vi.mocked(checkbox).mockResolvedValueOnce([0, 2])

    expect(await prompter.selectMany('Pick many:', ['a', 'b', 'c'])).toEqual([0, 2])
  })

  it('no debe abrir el prompt si no hay opciones', async () => {
    expect(await prompter.selectMany('Pick many:', [])).toEqual([])
    expect(checkbox).not.toHaveBeenCalled()
  })

  it('debe validar números con el mensaje de error adecuado', async () => {
    vi.mocked(input).mockResolvedValueOnce('105')
    const validate = vi.fn((value: number) => (value === 105 ? true as const : 'Issue cannot be found'))

    const value = await prompter.number('Enter the ID:', validate)

    expect(value).toBe(105)
    const options = vi.mocked(input).mock.calls[0][0]
    expect(options.validate?.('abc')).toBe('Input is not a number')
    expect(options.validate?.('104')).toBe('Issue cannot be found')
    expect(options.validate?.('105')).toBe(true)
  })

  it('debe usar el default indicado en confirm', async () => {
    vi.mocked(confirm).mockResolvedValueOnce(true)

    await prompter.confirm('Continue?', true)

    expect(confirm).toHaveBeenCalledWith({ message: 'Continue?', default: true })
  })

  it('debe convertir ExitPromptError en AbortError', async () => {
    vi.mocked(confirm).mockRejectedValueOnce(exitPromptError())

    const error = await prompter.confirm('Continue?').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(AbortError)
    if (!(error instanceof AbortError)) return
    expect(error.exitCode).toBe(130)
    expect(error.message).toBe('Aborted')
  })

  it('debe propagar otros errores sin cambios', async () => {
    const failure = new Error('tty closed')
    vi.mocked(select).mockRejectedValueOnce(failure)

    await expect(prompter.selectOne('Pick one:', ['a'])).rejects.toBe(failure)
  })
})
