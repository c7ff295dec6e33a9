import type { Issue, Milestone } from '../gitlab/types.js'
import type { EntityStore } from '../store/entity-store.js'
import type { Prompter } from '../prompts/prompter.js'

export type SelectionStrategyName = 'milestone' | 'range' | 'manual'

export interface MilestoneSelection {
  strategy: 'milestone'
  milestones: Milestone[]
}

export interface RangeSelection {
  strategy: 'range'
  start: number
  end: number
}

export interface ManualSelection {
  strategy: 'manual'
  issueIds: number[]
}

/**
 * Parámetros ya recolectados de una estrategia; con ellos la selección es pura
 */
export type SelectionParams = MilestoneSelection | RangeSelection | ManualSelection

export interface SelectionStrategy {
  readonly name: SelectionStrategyName
  /** Pregunta al usuario lo necesario para filtrar */
  collect(store: EntityStore, prompter: Prompter): Promise<SelectionParams>
  filter(issues: readonly Issue[], params: SelectionParams): Issue[]
}
