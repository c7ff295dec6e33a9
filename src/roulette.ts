import chalk from 'chalk'
import type { Issue, Member, Project } from './gitlab/types.js'
import type { Prompter } from './prompts/prompter.js'
import type { Random } from './assignment/random.js'
import type { SelectionEngine } from './selection/engine.js'
import { resolveProject } from './gitlab/client.js'
import { EntityStore } from './store/entity-store.js'
import { assign, countPerMember, type Assignment } from './assignment/balancer.js'
import { applyAssignment, type ExecutionReport } from './assignment/executor.js'
import { PreconditionError } from './errors.js'
import { issueLabel, memberLabel, projectLabel, strategyLabel } from './labels.js'
import { logger } from './utils/logger.js'

/**
 * Lo que el flujo necesita de GitLab; GitLabClient lo cumple
 */
export interface RouletteGateway {
  listProjects(): Promise<Project[]>
  listIssues(projectId: number): Promise<Issue[]>
  listMembers(projectId: number): Promise<Member[]>
  assignIssue(projectId: number, issueIid: number, memberId: number): Promise<void>
}

export interface RouletteDeps {
  gitlab: RouletteGateway
  prompter: Prompter
  random: Random
  selection: SelectionEngine
  /** Una línea de salida para el usuario (stdout en la CLI) */
  print: (line: string) => void
}

export interface RouletteOptions {
  url: string
  /** Muestra la asignación pero no escribe nada en GitLab */
  dryRun?: boolean
}

export type RouletteOutcome =
  | { status: 'assigned'; assignment: Assignment; report: ExecutionReport }
  | { status: 'previewed'; assignment: Assignment }
  | { status: 'cancelled' }

async function pickProject(deps: RouletteDeps, url: string): Promise<Project> {
  const projects = await deps.gitlab.listProjects()

  const project = resolveProject(projects, url)
  if (project) {
    deps.print(`Found project: ${project.name}`)
    return project
  }

  if (projects.length === 0) {
    throw new PreconditionError('No projects available for this token')
  }

  logger.debug({ url, projectsCount: projects.length }, 'No project matches the url, asking the user')
  const index = await deps.prompter.selectOne('Select a project:', projects.map(projectLabel))
  return projects[index]
}

/**
 * Preview en el mismo orden en que se van a aplicar las asignaciones,
 * seguido del total por miembro
 */
export function renderPreview(assignment: Assignment, members: readonly Member[]): string[] {
  const lines = ['']

  for (const { issue, member } of assignment) {
    lines.push(chalk.bold(issueLabel(issue)))
    lines.push(`\t${chalk.cyan(memberLabel(member))}`)
  }

  const counts = countPerMember(assignment, members)
  lines.push('')
  for (const member of members) {
    const count = counts.get(member.id) ?? 0
    lines.push(`${memberLabel(member)}: ${count} ${count === 1 ? 'issue' : 'issues'}`)
  }

  return lines
}

/**
 * Flujo completo, estrictamente secuencial:
 * fetch → select → members → confirm → balance → preview → confirm → execute
 */
export async function runRoulette(options: RouletteOptions, deps: RouletteDeps): Promise<RouletteOutcome> {
  const { gitlab, prompter, selection, print } = deps

  const project = await pickProject(deps, options.url)
  const issues = await gitlab.listIssues(project.id)
  const members = await gitlab.listMembers(project.id)
  const store = new EntityStore(project, issues, members)

  logger.info({
    projectId: project.id,
    issuesCount: store.issues.length,
    membersCount: store.members.length,
  }, 'Project snapshot loaded')

  const strategies = selection.strategyNames()
  const strategyIndex = await prompter.selectOne(
    'Select the way you want to select the issues:',
    strategies.map(strategyLabel)
  )
  const params = await selection.collect(strategies[strategyIndex], store, prompter)
  const selectedIssues = selection.select(store.issues, params)

  const memberIndexes = await prompter.selectMany(
    'Select all the members you want to assign the issues to:',
    store.members.map(memberLabel)
  )
  const selectedMembers = memberIndexes.map(index => store.members[index])

  if (!(await prompter.confirm('Do you want to continue ?', true))) {
    print('Exiting')
    return { status: 'cancelled' }
  }

  const assignment = assign(selectedIssues, selectedMembers, deps.random)
  for (const line of renderPreview(assignment, selectedMembers)) {
    print(line)
  }

  if (options.dryRun) {
    print('Dry run, nothing was assigned')
    return { status: 'previewed', assignment }
  }

  if (!(await prompter.confirm('Do you want to confirm this assignment ?', false))) {
    print('Exiting')
    return { status: 'cancelled' }
  }

  const report = await applyAssignment(
    assignment,
    (issue, member) => gitlab.assignIssue(project.id, issue.iid, member.id)
  )

  print('issues assigned !')
  return { status: 'assigned', assignment, report }
}
