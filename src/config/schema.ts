import { z } from 'zod';

const nonEmpty = z.string().trim().min(1);

const globRuleSchema = z.object({
  glob: nonEmpty,
  reason: z.string().optional(),
}).strict();

const regexRuleSchema = z.object({
  regex: nonEmpty,
  reason: z.string().optional(),
}).strict();

const suffixRuleSchema = z.object({
  suffix: nonEmpty,
  reason: z.string().optional(),
}).strict();

export const ruleConfigSchema = z.union([suffixRuleSchema, globRuleSchema, regexRuleSchema]);

export const scanConfigSchema = z.object({
  extensions: z.array(nonEmpty).optional(),
  extraSuffixes: z.array(nonEmpty).default([]),
  rules: z.array(ruleConfigSchema).default([]),
  exclude: z.array(nonEmpty).default([]),
  maxDepth: z.number().int().nonnegative().optional(),
  followSymlinks: z.boolean().optional(),
  sorted: z.boolean().optional(),
}).strict();

export type RuleConfig = z.infer<typeof ruleConfigSchema>;
export type ScanConfig = z.infer<typeof scanConfigSchema>;

/** Human-readable list of schema violations, one per line. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  ${where}: ${issue.message}`;
    })
    .join('\n');
}
