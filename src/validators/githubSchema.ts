import { z } from 'zod';

export const githubRepoSchema = z.object({
  name: z.string().optional(),
  description: z.string().nullable().optional(),
  language: z.string().nullable().optional(),
  default_branch: z.string().optional(),
  stargazers_count: z.number().nullable().optional(),
  forks_count: z.number().nullable().optional(),
  open_issues_count: z.number().nullable().optional(),
  pushed_at: z.string().nullable().optional(),
  updated_at: z.string().nullable().optional(),
  archived: z.boolean().optional(),
  fork: z.boolean().optional(),
  owner: z.object({ login: z.string() }).optional()
});

export type GitHubRepo = z.infer<typeof githubRepoSchema>;

export const githubTreeSchema = z.object({
  truncated: z.boolean().optional(),
  tree: z.array(z.object({ path: z.string(), type: z.string() }))
});

export const githubContentSchema = z.object({
  content: z.string(),
  encoding: z.string().optional()
});
