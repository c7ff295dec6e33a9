import { checkbox, confirm, input, select } from '@inquirer/prompts'
import { AbortError } from '../errors.js'

/**
 * Interactive input used by the roulette flow. Options are plain labels;
 * answers come back as indexes into them.
 */
export interface Prompter {
  selectOne(message: string, options: readonly string[]): Promise<number>
  selectMany(message: string, options: readonly string[]): Promise<number[]>
  /** `validate` devuelve true o el mensaje a mostrar */
  number(message: string, validate: (value: number) => true | string): Promise<number>
  confirm(message: string, defaultValue?: boolean): Promise<boolean>
}

/**
 * Entero en base 10, con signo opcional. Cualquier otra cosa es undefined.
 */
export function parseInteger(raw: string): number | undefined {
  const trimmed = raw.trim()
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return undefined
  }
  const value = Number(trimmed)
  return Number.isSafeInteger(value) ? value : undefined
}

/**
 * Ctrl+C en inquirer rechaza con ExitPromptError; lo convertimos en AbortError
 * para que corte toda la ejecución
 */
async function guard<T>(prompt: Promise<T>): Promise<T> {
  try {
    return await prompt
  } catch (error) {
    if (error instanceof Error && error.name === 'ExitPromptError') {
      throw new AbortError({ cause: error })
    }
    throw error
  }
}

function toChoices(options: readonly string[]) {
  return options.map((name, index) => ({ name, value: index }))
}

export class InquirerPrompter implements Prompter {
  async selectOne(message: string, options: readonly string[]): Promise<number> {
    return guard(select({ message, choices: toChoices(options) }))
  }

  async selectMany(message: string, options: readonly string[]): Promise<number[]> {
    if (options.length === 0) {
      return []
    }
    return guard(checkbox({ message, choices: toChoices(options) }))
  }

  async number(message: string, validate: (value: number) => true | string): Promise<number> {
    const answer = await guard(
      input({
        message,
        validate: raw => {
          const value = parseInteger(raw)
          return value === undefined ? 'Input is not a number' : validate(value)
        },
      })
    )

    const value = parseInteger(answer)
    if (value === undefined) {
      throw new Error(`Prompt returned a non numeric answer: ${answer}`)
    }
    return value
  }

  async confirm(message: string, defaultValue = false): Promise<boolean> {
    return guard(confirm({ message, default: defaultValue }))
  }
}
