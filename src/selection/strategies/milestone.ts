import type { Issue, Milestone } from '../../gitlab/types.js'
import type { EntityStore } from '../../store/entity-store.js'
import type { Prompter } from '../../prompts/prompter.js'
import type { MilestoneSelection, SelectionParams, SelectionStrategy } from '../types.js'
import { milestoneLabel } from '../../labels.js'
import { logger } from '../../utils/logger.js'

/**
 * Issues whose milestone is one of the picked ones. Membership is decided by
 * milestone id; issues without milestone never match.
 */
export function filterByMilestones(issues: readonly Issue[], milestones: readonly Milestone[]): Issue[] {
  const picked = new Set(milestones.map(m => m.id))
  return issues.filter(issue => issue.milestone !== null && picked.has(issue.milestone.id))
}

/**
 * Milestone strategy: el usuario elige uno o más milestones de los que
 * aparecen en los issues del proyecto
 */
export class MilestoneStrategy implements SelectionStrategy {
  readonly name = 'milestone' as const

  async collect(store: EntityStore, prompter: Prompter): Promise<MilestoneSelection> {
    const milestones = store.milestones()

    if (milestones.length === 0) {
      logger.warn({ projectId: store.project.id }, 'No issue in this project has a milestone')
      return { strategy: 'milestone', milestones: [] }
    }

    const picked = await prompter.selectMany(
      'Select all the milestones that you want to use:',
      milestones.map(milestoneLabel)
    )

    return {
      strategy: 'milestone',
      milestones: picked.map(index => milestones[index]),
    }
  }

  filter(issues: readonly Issue[], params: SelectionParams): Issue[] {
    if (params.strategy !== 'milestone') {
      throw new Error(`Milestone strategy cannot filter with ${params.strategy} params`)
    }
    return filterByMilestones(issues, params.milestones)
  }
}
