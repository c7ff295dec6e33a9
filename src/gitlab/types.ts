import { z } from 'zod'

// Schemas de las respuestas de la API v4 de GitLab (solo los campos que usamos)

export const GitLabProjectSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  path_with_namespace: z.string(),
  web_url: z.string(),
})

export const GitLabMemberSchema = z.object({
  id: z.number().int(),
  username: z.string(),
  name: z.string(),
})

export const GitLabMilestoneSchema = z.object({
  id: z.number().int(),
  project_id: z.number().int().nullable().optional(), // null en milestones de grupo
  title: z.string(),
  description: z.string().nullable().optional(),
  state: z.string(),
})

export const GitLabIssueSchema = z.object({
  id: z.number().int(),
  iid: z.number().int(),
  project_id: z.number().int(),
  title: z.string(),
  description: z.string().nullable().optional(),
  state: z.string(),
  type: z.string().default('ISSUE'),
  assignees: z.array(GitLabMemberSchema).default([]),
  milestone: GitLabMilestoneSchema.nullable().default(null),
})

export type Project = z.infer<typeof GitLabProjectSchema>
export type Member = z.infer<typeof GitLabMemberSchema>
export type Milestone = z.infer<typeof GitLabMilestoneSchema>
export type Issue = z.infer<typeof GitLabIssueSchema>
