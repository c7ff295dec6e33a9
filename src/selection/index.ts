import { SelectionEngine } from './engine.js'
import { MilestoneStrategy } from './strategies/milestone.js'
import { RangeStrategy } from './strategies/range.js'
import { ManualStrategy } from './strategies/manual.js'

export function createSelectionEngine(): SelectionEngine {
  const engine = new SelectionEngine()

  engine.registerStrategy(new MilestoneStrategy())
  engine.registerStrategy(new RangeStrategy())
  engine.registerStrategy(new ManualStrategy())

  return engine
}
