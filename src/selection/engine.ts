import type { Issue } from '../gitlab/types.js'
import type { EntityStore } from '../store/entity-store.js'
import type { Prompter } from '../prompts/prompter.js'
import type { SelectionParams, SelectionStrategy, SelectionStrategyName } from './types.js'
import { logger } from '../utils/logger.js'

export class SelectionEngine {
  private strategies: Map<SelectionStrategyName, SelectionStrategy> = new Map()

  registerStrategy(strategy: SelectionStrategy) {
    this.strategies.set(strategy.name, strategy)
    logger.debug({ strategy: strategy.name }, 'Registered selection strategy')
  }

  /**
   * Estrategias registradas, en orden de registro (así se muestran en el menú)
   */
  strategyNames(): SelectionStrategyName[] {
    return [...this.strategies.keys()]
  }

  private resolve(name: SelectionStrategyName): SelectionStrategy {
    const strategy = this.strategies.get(name)
    if (strategy) {
      return strategy
    }

    logger.warn({ strategy: name }, 'Unknown selection strategy, using manual')
    // Fallback a manual
    const manual = this.strategies.get('manual')
    if (!manual) {
      throw new Error('No selection strategy available')
    }
    return manual
  }

  /**
   * Recolecta interactivamente los parámetros de la estrategia elegida
   */
  async collect(name: SelectionStrategyName, store: EntityStore, prompter: Prompter): Promise<SelectionParams> {
    return this.resolve(name).collect(store, prompter)
  }

  /**
   * Reduce los issues con parámetros ya recolectados. Es un filtro puro:
   * el resultado mantiene el orden de entrada y puede ser vacío.
   */
  select(issues: readonly Issue[], params: SelectionParams): Issue[] {
    const strategy = this.strategies.get(params.strategy)
    if (!strategy) {
      throw new Error('No selection strategy available')
    }

    const selected = strategy.filter(issues, params)

    logger.debug({
      strategy: params.strategy,
      totalIssues: issues.length,
      selectedCount: selected.length,
      selected: selected.map(issue => issue.iid),
    }, 'Issue selection completed')

    return selected
  }
}
