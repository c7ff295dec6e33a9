import { Command, Flags } from '@oclif/core'
import chalk from 'chalk'
import { loadConfig, DEFAULT_CONFIG_FILE } from './config/resolver.js'
import { GitLabClient } from './gitlab/client.js'
import { InquirerPrompter } from './prompts/prompter.js'
import { createRandom } from './assignment/random.js'
import { createSelectionEngine } from './selection/index.js'
import { runRoulette } from './roulette.js'
import { AssignmentError, RouletteError } from './errors.js'
import { issueLabel } from './labels.js'
import { logger } from './utils/logger.js'

/**
 * Diagnóstico de una línea por error; para AssignmentError se agrega
 * lo que ya quedó asignado en GitLab
 */
export function describeFailure(error: RouletteError): string[] {
  const lines = [error.message]
  if (error instanceof AssignmentError) {
    lines.push(
      error.applied.length === 0
        ? 'no issue was assigned before the failure'
        : `already assigned: ${error.applied.map(pair => issueLabel(pair.issue)).join(', ')}`
    )
  }
  return lines
}

export default class Roulette extends Command {
  static override description = 'Distribute GitLab issues evenly and randomly among project members'

  static override flags = {
    url: Flags.string({ char: 'u', description: 'URL of the project' }),
    token: Flags.string({ char: 't', description: 'Gitlab token to use to connect' }),
    'config-file': Flags.string({
      char: 'c',
      description: 'File to use as config (.toml, .yml or .yaml)',
      default: DEFAULT_CONFIG_FILE,
    }),
    seed: Flags.integer({ description: 'Seed for a reproducible draw' }),
    'dry-run': Flags.boolean({ description: 'Show the assignment without writing it', default: false }),
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(Roulette)

    try {
      const config = loadConfig({
        url: flags.url,
        token: flags.token,
        configFile: flags['config-file'],
        seed: flags.seed,
      })

      await runRoulette(
        { url: config.url, dryRun: flags['dry-run'] },
        {
          gitlab: new GitLabClient({ baseUrl: config.baseUrl, token: config.token }),
          prompter: new InquirerPrompter(),
          random: createRandom(config.seed),
          selection: createSelectionEngine(),
          print: line => this.log(line),
        }
      )
    } catch (error) {
      if (error instanceof RouletteError) {
        logger.error({ error, code: error.code }, 'Roulette run failed')
        for (const line of describeFailure(error)) {
          this.logToStderr(chalk.red(line))
        }
        this.exit(error.exitCode)
      }
      throw error
    }
  }
}
