import type { Issue, Member, Milestone, Project } from './gitlab/types.js'
import type { SelectionStrategyName } from './selection/types.js'

/**
 * Anything that can be shown in a menu or in the assignment preview.
 */
export type Labelable =
  | { kind: 'issue'; value: Issue }
  | { kind: 'member'; value: Member }
  | { kind: 'milestone'; value: Milestone }
  | { kind: 'project'; value: Project }
  | { kind: 'strategy'; value: SelectionStrategyName }

export function toLabel(item: Labelable): string {
  switch (item.kind) {
    case 'issue':
      return `#${item.value.iid}: ${item.value.title}`
    case 'member':
      return `${item.value.name} (${item.value.username})`
    case 'milestone':
      return `%${item.value.id}: ${item.value.title}`
    case 'project':
      return item.value.path_with_namespace
    case 'strategy':
      return item.value.charAt(0).toUpperCase() + item.value.slice(1)
  }
}

export const issueLabel = (issue: Issue): string => toLabel({ kind: 'issue', value: issue })
export const memberLabel = (member: Member): string => toLabel({ kind: 'member', value: member })
export const milestoneLabel = (milestone: Milestone): string => toLabel({ kind: 'milestone', value: milestone })
export const projectLabel = (project: Project): string => toLabel({ kind: 'project', value: project })
export const strategyLabel = (name: SelectionStrategyName): string => toLabel({ kind: 'strategy', value: name })
