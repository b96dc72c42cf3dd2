import { z } from 'zod';
import rawTrends from './trends.json';
import { DIMENSIONS } from '../types/analysis';

const level = z.enum(['Low', 'Medium', 'High', 'Critical']);

const conditionSchema = z.union([
  z.object({ dimension: z.enum(DIMENSIONS), below: z.number() }),
  z.object({ dimension: z.enum(DIMENSIONS), above: z.number() }),
  z.object({ nameIncludes: z.array(z.string().min(1)).min(1) }),
  z.object({ always: z.literal(true) })
]);

const trendRuleSchema = z.object({
  when: conditionSchema,
  category: z.string().min(1),
  priority: level,
  action: z.string().min(1),
  impact: z.string().min(1),
  effort: level
});

const trendTableSchema = z.object({
  shownPerDigest: z.number().int().positive(),
  recommendations: z.array(trendRuleSchema).min(1)
});

export type TrendCondition = z.infer<typeof conditionSchema>;
export type TrendRule = z.infer<typeof trendRuleSchema>;
export type TrendTable = z.infer<typeof trendTableSchema>;

// Current AI adoption patterns, matched against a repository's scores and name.
export const trendTable: TrendTable = trendTableSchema.parse(rawTrends);
