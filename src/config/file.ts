import { existsSync, readFileSync } from 'fs'
import { extname } from 'path'
import { z } from 'zod'
import yaml from 'js-yaml'
import { parse as parseToml } from 'smol-toml'
import { ConfigError } from '../errors.js'
import { logger } from '../utils/logger.js'

// Schema del archivo gitlab-roulette.toml (o .yml)
export const FileConfigSchema = z.object({
  url: z.string().optional(),
  token: z.string().optional(),
  seed: z.number().int().optional(),
})

export type FileConfig = z.infer<typeof FileConfigSchema>

/**
 * Parsea el contenido según la extensión: .yml/.yaml con js-yaml, el resto como TOML
 */
export function parseConfigContent(content: string, path: string): FileConfig {
  const extension = extname(path).toLowerCase()

  let rawConfig: unknown
  try {
    rawConfig = extension === '.yml' || extension === '.yaml'
      ? yaml.load(content)
      : parseToml(content)
  } catch (error) {
    const reason = error instanceof Error ? error.message.split('\n')[0] : String(error)
    throw new ConfigError(`Invalid config file ${path}: ${reason}`, { cause: error })
  }

  // Un YAML vacío carga como undefined
  const parsed = FileConfigSchema.safeParse(rawConfig ?? {})
  if (!parsed.success) {
    const first = parsed.error.issues[0]
    const reason = first ? `${first.path.join('.') || 'root'}: ${first.message}` : 'invalid content'
    throw new ConfigError(`Invalid config file ${path}: ${reason}`, { cause: parsed.error })
  }

  return parsed.data
}

/**
 * El archivo es opcional: si no existe devuelve una config vacía
 */
export function loadConfigFile(path: string): FileConfig {
  if (!existsSync(path)) {
    logger.debug({ path }, 'Config file not found, skipping')
    return {}
  }

  const content = readFileSync(path, 'utf-8')
  const config = parseConfigContent(content, path)

  logger.debug({
    path,
    hasUrl: config.url !== undefined,
    hasToken: config.token !== undefined,
  }, 'Config file loaded')

  return config
}
