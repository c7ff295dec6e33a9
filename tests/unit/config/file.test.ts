import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { loadConfigFile, parseConfigContent } from '../../../src/config/file.js'
import { ConfigError } from '../../../src/errors.js'

describe('config file', () => {
  let dir: string

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'roulette-config-'))
  })

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('debe leer un archivo TOML', () => {
    const path = join(dir, 'gitlab-roulette.toml')
    writeFileSync(path, 'url = "https://gitlab.example.com/team/roulette"\ntoken = "test-token"\nseed = 42\n')

    expect(loadConfigFile(path)).toEqual({
      url: 'https://gitlab.example.com/team/roulette',
      token: 'test-token',
      seed: 42,
    })
  })

  it('debe leer un archivo YAML según la extensión', () => {
    const path = join(dir, 'roulette.yml')
    writeFileSync(path, 'url: https://gitlab.example.com/team/roulette\ntoken: test-token\n')

    expect(loadConfigFile(path)).toEqual({
      url: 'https://gitlab.example.com/team/roulette',
      token: 'test-token',
    })
  })

  it('debe retornar config vacía si el archivo no existe', () => {
    expect(loadConfigFile(join(dir, 'missing.toml'))).toEqual({})
  })

  it('debe aceptar un YAML vacío', () => {
    expect(parseConfigContent('', 'empty.yaml')).toEqual({})
  })

  it('debe ignorar claves desconocidas', () => {
    expect(parseConfigContent('token = "test-token"\ncolor = true\n', 'a.toml')).toEqual({ token: 'test-token' })
  })

  it('debe lanzar ConfigError si el TOML está mal formado', () => {
    expect(() => parseConfigContent('url = ', 'broken.toml')).toThrow(ConfigError)
  })

  it('debe lanzar ConfigError si un campo tiene tipo incorrecto', () => {
    expect(() => parseConfigContent('token = 123\n', 'typed.toml'))
      .toThrow('Invalid config file typed.toml: token: Expected string, received number')
  })
})
