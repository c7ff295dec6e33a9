import { z } from 'zod'
import { ParseError, TransportError } from '../errors.js'
import { logger } from '../utils/logger.js'
import {
  GitLabIssueSchema,
  GitLabMemberSchema,
  GitLabProjectSchema,
  type Issue,
  type Member,
  type Project,
} from './types.js'

export interface GitLabClientOptions {
  /** Origen de la instancia, p.ej. https://gitlab.example.com */
  baseUrl: string
  token: string
}

export class GitLabClient {
  private baseUrl: string
  private token: string

  constructor(options: GitLabClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.token = options.token
  }

  /**
   * Hace un request autenticado a la API v4.
   * Solo falla si el request no se pudo enviar; el status lo revisa quien llama.
   */
  async request(method: string, path: string): Promise<Response> {
    const url = `${this.baseUrl}/api/v4${path}`

    try {
      return await fetch(url, {
        method,
        headers: {
          'PRIVATE-TOKEN': this.token,
          'Accept': 'application/json',
        },
      })
    } catch (error) {
      logger.error({ error, method, path }, 'GitLab API request could not be sent')
      throw new TransportError(`failed to send request to ${path}`, { cause: error })
    }
  }

  private async getJson<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.infer<S>> {
    const response = await this.request('GET', path)
    const body = await response.text()

    if (!response.ok) {
      logger.error({ path, status: response.status, error: body }, 'GitLab API request failed')
      throw new TransportError(`GitLab API error: ${response.status} ${body}`, { status: response.status })
    }

    let raw: unknown
    try {
      raw = JSON.parse(body)
    } catch (error) {
      throw new ParseError(`GitLab API returned invalid JSON for ${path}`, { cause: error })
    }

    const parsed = schema.safeParse(raw)
    if (!parsed.success) {
      const first = parsed.error.issues[0]
      const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : ''
      logger.error({ path, issues: parsed.error.issues }, 'GitLab API response did not match schema')
      throw new ParseError(`failed to parse response of ${path}${where}`, { cause: parsed.error })
    }

    return parsed.data
  }

  /**
   * Proyectos de los que el usuario del token es miembro
   */
  async listProjects(): Promise<Project[]> {
    return this.getJson('/projects?membership=true&simple=true', z.array(GitLabProjectSchema))
  }

  async listIssues(projectId: number): Promise<Issue[]> {
    return this.getJson(`/projects/${projectId}/issues`, z.array(GitLabIssueSchema))
  }

  async listMembers(projectId: number): Promise<Member[]> {
    return this.getJson(`/projects/${projectId}/members`, z.array(GitLabMemberSchema))
  }

  /**
   * Reemplaza los assignees del issue por un único miembro.
   * Cualquier status distinto de 200 se considera fallo.
   */
  async assignIssue(projectId: number, issueIid: number, memberId: number): Promise<void> {
    const path = `/projects/${projectId}/issues/${issueIid}?assignee_ids=${memberId}`
    const response = await this.request('PUT', path)

    if (response.status !== 200) {
      const body = await response.text()
      logger.error({ path, status: response.status, error: body }, 'GitLab rejected issue assignment')
      throw new TransportError(`GitLab API error: ${response.status} ${body}`, { status: response.status })
    }

    logger.debug({ projectId, issueIid, memberId }, 'Issue assigned')
  }
}

/**
 * Busca el proyecto cuyo web_url coincide exactamente con la URL configurada
 */
export function resolveProject(projects: readonly Project[], url: string): Project | undefined {
  return projects.find(project => project.web_url === url)
}
