import { describe, it, expect } from 'vitest'
import { loadEnvironmentConfig } from '../../../src/config/environment.js'

describe('loadEnvironmentConfig', () => {
  it('debe leer GITLAB_URL, GITLAB_TOKEN y ROULETTE_SEED', () => {
    const config = loadEnvironmentConfig({
      GITLAB_URL: 'https://gitlab.example.com/team/roulette',
      GITLAB_TOKEN: 'test-token',
      ROULETTE_SEED: '17',
    })

    expect(config).toEqual({
      url: 'https://gitlab.example.com/team/roulette',
      token: 'test-token',
      seed: 17,
    })
  })

  it('debe tratar variables vacías como no definidas', () => {
    expect(loadEnvironmentConfig({ GITLAB_TOKEN: '', ROULETTE_SEED: '' })).toEqual({
      url: undefined,
      token: undefined,
      seed: undefined,
    })
  })

  it('debe fallar si la semilla no es entera', () => {
    expect(() => loadEnvironmentConfig({ ROULETTE_SEED: 'abc' })).toThrow('ROULETTE_SEED must be an integer')
  })
})
