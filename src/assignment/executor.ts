import type { Issue, Member } from '../gitlab/types.js'
import type { Assignment, AssignmentPair } from './balancer.js'
import { AssignmentError } from '../errors.js'
import { logger } from '../utils/logger.js'

/**
 * Side-effecting write of one pair. Rejecting means the pair was not applied.
 */
export type ExecuteAssignment = (issue: Issue, member: Member) => Promise<void>

export interface ExecutionReport {
  applied: AssignmentPair[]
}

/**
 * Aplica la asignación en el mismo orden que el preview.
 *
 * Se detiene en el primer fallo, sin rollback ni reintento: lo ya aplicado
 * queda asignado en GitLab y viaja en `AssignmentError.applied`.
 */
export async function applyAssignment(
  assignment: Assignment,
  execute: ExecuteAssignment,
  onApplied?: (pair: AssignmentPair) => void
): Promise<ExecutionReport> {
  const applied: AssignmentPair[] = []

  for (const pair of assignment) {
    try {
      await execute(pair.issue, pair.member)
    } catch (error) {
      logger.error({
        error,
        issue: pair.issue.iid,
        member: pair.member.username,
        appliedCount: applied.length,
        pendingCount: assignment.length - applied.length,
      }, 'Assignment failed, stopping')
      throw new AssignmentError(pair.issue, pair.member, [...applied], error)
    }

    applied.push(pair)
    onApplied?.(pair)
  }

  logger.info({ appliedCount: applied.length }, 'All assignments applied')

  return { applied }
}
