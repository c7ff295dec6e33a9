import { describe, it, expect } from 'vitest'
import { describeFailure } from '../../src/command.js'
import { AssignmentError, ConfigError, TransportError } from '../../src/errors.js'
import { issue, alice, bob } from '../fixtures/gitlab.js'

describe('describeFailure', () => {
  it('debe dar una línea para errores fatales simples', () => {
    expect(describeFailure(new ConfigError('Please add a url to the config file or using the --url argument')))
      .toEqual(['Please add a url to the config file or using the --url argument'])
    expect(describeFailure(new TransportError('failed to send request to /projects')))
      .toEqual(['failed to send request to /projects'])
  })

  it('debe listar lo ya asignado cuando falla una asignación', () => {
    const error = new AssignmentError(
      issue(3),
      alice,
      [{ issue: issue(1), member: alice }, { issue: issue(2), member: bob }],
      new Error('GitLab API error: 500')
    )

    expect(describeFailure(error)).toEqual([
      'failed to assign issue #3: Issue 3',
      'already assigned: #1: Issue 1, #2: Issue 2',
    ])
  })

  it('debe aclarar cuando nada llegó a asignarse', () => {
    const error = new AssignmentError(issue(1), alice, [], new Error('GitLab API error: 403'))

    expect(describeFailure(error)).toEqual([
      'failed to assign issue #1: Issue 1',
      'no issue was assigned before the failure',
    ])
  })
})
