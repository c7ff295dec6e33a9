import { z } from 'zod'
import { ConfigError } from '../errors.js'
import { logger } from '../utils/logger.js'
import { loadConfigFile, type FileConfig } from './file.js'
import { loadEnvironmentConfig, type EnvironmentConfig } from './environment.js'

export const DEFAULT_CONFIG_FILE = './gitlab-roulette.toml'

export interface CliOptions {
  url?: string
  token?: string
  configFile?: string
  seed?: number
}

export interface ResolvedConfig {
  /** URL tal como la dio el usuario; se compara contra web_url de los proyectos */
  url: string
  /** scheme://host[:port] de la URL, base de la API */
  baseUrl: string
  token: string
  seed?: number
}

const UrlSchema = z.string().url()

/**
 * Merges the three sources (flags > environment > file) and validates the
 * result. Throws ConfigError with the message the CLI prints.
 */
export function resolveConfig(
  flags: CliOptions,
  environment: EnvironmentConfig,
  file: FileConfig
): ResolvedConfig {
  const url = flags.url ?? environment.url ?? file.url
  const token = flags.token ?? environment.token ?? file.token
  const seed = flags.seed ?? environment.seed ?? file.seed

  if (url === undefined || url === '') {
    throw new ConfigError('Please add a url to the config file or using the --url argument')
  }

  const invalidUrl = new ConfigError(`the url "${url}" is not valid`)
  if (!UrlSchema.safeParse(url).success) {
    throw invalidUrl
  }
  const parsedUrl = new URL(url)
  if (parsedUrl.host === '') {
    throw invalidUrl
  }

  if (token === undefined || token === '') {
    throw new ConfigError('Please add a token to the config file or using the --token argument')
  }

  return {
    url,
    baseUrl: `${parsedUrl.protocol}//${parsedUrl.host}`,
    token,
    seed,
  }
}

export function loadConfig(flags: CliOptions): ResolvedConfig {
  const configFile = flags.configFile ?? DEFAULT_CONFIG_FILE
  const config = resolveConfig(flags, loadEnvironmentConfig(), loadConfigFile(configFile))

  logger.info({ baseUrl: config.baseUrl, configFile, seeded: config.seed !== undefined }, 'Config resolved')

  return config
}
