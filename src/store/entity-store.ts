import type { Issue, Member, Milestone, Project } from '../gitlab/types.js'

/**
 * Distinct milestones referenced by the given issues, first-seen order.
 * Two milestones are the same only when their ids match; title and
 * description are never compared.
 */
export function distinctMilestones(issues: readonly Issue[]): Milestone[] {
  const seen = new Set<number>()
  const milestones: Milestone[] = []

  for (const issue of issues) {
    if (issue.milestone && !seen.has(issue.milestone.id)) {
      seen.add(issue.milestone.id)
      milestones.push(issue.milestone)
    }
  }

  return milestones
}

/**
 * Snapshot inmutable de lo que se trajo de GitLab para un proyecto.
 * Se llena una vez por ejecución y después solo se lee.
 */
export class EntityStore {
  readonly project: Project
  readonly issues: readonly Issue[]
  readonly members: readonly Member[]
  private issuesById: ReadonlyMap<number, Issue>

  constructor(project: Project, issues: readonly Issue[], members: readonly Member[]) {
    this.project = Object.freeze({ ...project })
    this.issues = Object.freeze([...issues])
    this.members = Object.freeze([...members])
    this.issuesById = new Map(issues.map(issue => [issue.id, issue]))
  }

  milestones(): Milestone[] {
    return distinctMilestones(this.issues)
  }

  findIssueById(id: number): Issue | undefined {
    return this.issuesById.get(id)
  }

  hasIssue(id: number): boolean {
    return this.issuesById.has(id)
  }
}
