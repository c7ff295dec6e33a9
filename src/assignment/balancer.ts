import type { Issue, Member } from '../gitlab/types.js'
import { PreconditionError } from '../errors.js'
import { logger } from '../utils/logger.js'
import { shuffle, type Random } from './random.js'

export interface AssignmentPair {
  issue: Issue
  member: Member
}

/**
 * Issue → member pairs, one per selected issue, in issue order
 */
export type Assignment = AssignmentPair[]

/**
 * Vector de índices de miembro de largo `issueCount`.
 *
 * Con q = n div m y r = n mod m: cada miembro aparece q veces, r miembros
 * distintos (elegidos al azar, sin reemplazo) aparecen una vez más, y el
 * vector completo se baraja.
 */
export function buildAllocation(issueCount: number, memberCount: number, random: Random): number[] {
  if (memberCount < 1) {
    throw new PreconditionError('No members selected, cannot distribute issues')
  }

  const perMember = Math.floor(issueCount / memberCount)
  const rest = issueCount % memberCount

  const allocation: number[] = []
  for (let member = 0; member < memberCount; member++) {
    for (let k = 0; k < perMember; k++) {
      allocation.push(member)
    }
  }

  const memberIndexes = Array.from({ length: memberCount }, (_, index) => index)
  allocation.push(...shuffle(memberIndexes, random).slice(0, rest))

  return shuffle(allocation, random)
}

/**
 * Reparte los issues entre los miembros de forma balanceada y aleatoria.
 * Cada miembro recibe q o q+1 issues; cero issues da una asignación vacía.
 */
export function assign(issues: readonly Issue[], members: readonly Member[], random: Random): Assignment {
  const allocation = buildAllocation(issues.length, members.length, random)
  const assignment = issues.map((issue, i) => ({ issue, member: members[allocation[i]] }))

  logger.debug({
    issuesCount: issues.length,
    membersCount: members.length,
    pairs: assignment.map(pair => ({ issue: pair.issue.iid, member: pair.member.username })),
  }, 'Balanced assignment computed')

  return assignment
}

/**
 * Cantidad de issues por miembro (id → count), incluyendo miembros con cero
 */
export function countPerMember(assignment: Assignment, members: readonly Member[]): Map<number, number> {
  const counts = new Map<number, number>(members.map(member => [member.id, 0]))
  for (const { member } of assignment) {
    counts.set(member.id, (counts.get(member.id) ?? 0) + 1)
  }
  return counts
}
