/**
 * Error taxonomy for a roulette run.
 *
 * Every fatal condition is a RouletteError carrying the process exit status
 * the CLI should end with. Nothing here is retried.
 */

import type { Issue, Member } from './gitlab/types.js'
import type { AssignmentPair } from './assignment/balancer.js'
import { issueLabel } from './labels.js'

export enum ErrorCode {
  CONFIG_ERROR = 'CONFIG_ERROR',
  TRANSPORT_ERROR = 'TRANSPORT_ERROR',
  PARSE_ERROR = 'PARSE_ERROR',
  PRECONDITION_ERROR = 'PRECONDITION_ERROR',
  ASSIGNMENT_ERROR = 'ASSIGNMENT_ERROR',
  ABORTED = 'ABORTED',
}

export class RouletteError extends Error {
  readonly code: ErrorCode
  readonly exitCode: number

  constructor(code: ErrorCode, message: string, exitCode: number, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
    this.exitCode = exitCode
  }
}

/**
 * Missing or invalid url/token, or a config file that cannot be parsed.
 * Raised before any network call.
 */
export class ConfigError extends RouletteError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.CONFIG_ERROR, message, 2, options)
  }
}

export class TransportError extends RouletteError {
  readonly status?: number

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(ErrorCode.TRANSPORT_ERROR, message, 1, options)
    this.status = options?.status
  }
}

export class ParseError extends RouletteError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.PARSE_ERROR, message, 1, options)
  }
}

export class PreconditionError extends RouletteError {
  constructor(message: string) {
    super(ErrorCode.PRECONDITION_ERROR, message, 1)
  }
}

/**
 * El usuario canceló un prompt (Ctrl+C)
 */
export class AbortError extends RouletteError {
  constructor(options?: { cause?: unknown }) {
    super(ErrorCode.ABORTED, 'Aborted', 130, options)
  }
}

/**
 * A write call failed mid-execution. Pairs in `applied` were already written
 * to GitLab before the failure and stay assigned.
 */
export class AssignmentError extends RouletteError {
  readonly failedIssue: Issue
  readonly member: Member
  readonly applied: AssignmentPair[]

  constructor(failedIssue: Issue, member: Member, applied: AssignmentPair[], cause: unknown) {
    super(ErrorCode.ASSIGNMENT_ERROR, `failed to assign issue ${issueLabel(failedIssue)}`, 1, { cause })
    this.failedIssue = failedIssue
    this.member = member
    this.applied = applied
  }
}
