import { z } from 'zod';

export const analyzeSchema = z.object({
  repo: z.string().trim().min(1).max(300),
  githubToken: z.string().min(1).optional()
});

export type AnalyzeInput = z.infer<typeof analyzeSchema>;

export const listAnalysesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20)
});
