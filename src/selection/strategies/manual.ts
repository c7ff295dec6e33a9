import type { Issue } from '../../gitlab/types.js'
import type { EntityStore } from '../../store/entity-store.js'
import type { Prompter } from '../../prompts/prompter.js'
import type { ManualSelection, SelectionParams, SelectionStrategy } from '../types.js'
import { issueLabel } from '../../labels.js'

export function filterByIds(issues: readonly Issue[], issueIds: readonly number[]): Issue[] {
  const picked = new Set(issueIds)
  return issues.filter(issue => picked.has(issue.id))
}

/**
 * Manual strategy: el usuario marca los issues uno por uno.
 * El resultado respeta el orden original, no el orden en que se marcaron.
 */
export class ManualStrategy implements SelectionStrategy {
  readonly name = 'manual' as const

  async collect(store: EntityStore, prompter: Prompter): Promise<ManualSelection> {
    const picked = await prompter.selectMany(
      'Select all the issues that you want to use:',
      store.issues.map(issueLabel)
    )

    return {
      strategy: 'manual',
      issueIds: picked.map(index => store.issues[index].id),
    }
  }

  filter(issues: readonly Issue[], params: SelectionParams): Issue[] {
    if (params.strategy !== 'manual') {
      throw new Error(`Manual strategy cannot filter with ${params.strategy} params`)
    }
    return filterByIds(issues, params.issueIds)
  }
}
