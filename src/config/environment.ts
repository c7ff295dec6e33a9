import { z } from 'zod'
import { ConfigError } from '../errors.js'

const EnvironmentSchema = z.object({
  GITLAB_URL: z.string().optional(),
  GITLAB_TOKEN: z.string().optional(),
  ROULETTE_SEED: z.coerce.number().int().optional(),
})

export interface EnvironmentConfig {
  url?: string
  token?: string
  seed?: number
}

/**
 * Lee la configuración desde variables de entorno (dotenv ya cargó .env).
 * Variables vacías cuentan como no definidas.
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  )

  const parsed = EnvironmentSchema.safeParse(defined)
  if (!parsed.success) {
    throw new ConfigError('ROULETTE_SEED must be an integer', { cause: parsed.error })
  }

  return {
    url: parsed.data.GITLAB_URL,
    token: parsed.data.GITLAB_TOKEN,
    seed: parsed.data.ROULETTE_SEED,
  }
}
