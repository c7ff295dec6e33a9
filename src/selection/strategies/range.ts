import type { Issue } from '../../gitlab/types.js'
import type { EntityStore } from '../../store/entity-store.js'
import type { Prompter } from '../../prompts/prompter.js'
import type { RangeSelection, SelectionParams, SelectionStrategy } from '../types.js'

/**
 * Issues with `start <= id <= end`. Boundaries are taken as entered: when
 * `start > end` nothing matches.
 */
export function filterByRange(issues: readonly Issue[], start: number, end: number): Issue[] {
  return issues.filter(issue => issue.id >= start && issue.id <= end)
}

/**
 * Validador para los límites: el número tiene que ser el id de un issue existente
 */
export function existingIssueId(store: EntityStore): (id: number) => true | string {
  return id => (store.hasIssue(id) ? true : 'Issue cannot be found')
}

/**
 * Range strategy: todos los issues entre dos ids (ambos inclusive)
 */
export class RangeStrategy implements SelectionStrategy {
  readonly name = 'range' as const

  async collect(store: EntityStore, prompter: Prompter): Promise<RangeSelection> {
    const validate = existingIssueId(store)
    const start = await prompter.number('Enter the ID of the first issue:', validate)
    const end = await prompter.number('Enter the ID of the last issue:', validate)

    return { strategy: 'range', start, end }
  }

  filter(issues: readonly Issue[], params: SelectionParams): Issue[] {
    if (params.strategy !== 'range') {
      throw new Error(`Range strategy cannot filter with ${params.strategy} params`)
    }
    return filterByRange(issues, params.start, params.end)
  }
}
