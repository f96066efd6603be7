import { z } from 'zod';

export const mappingRuleSchema = z.object({
  pattern: z.string().min(1),
  /** Destination path; `{name}`, `{stem}`, `{parent}` and `{ext}` are filled from the source */
  target: z.string().min(1),
  priority: z.number().int().nonnegative(),
});

const fileCheckSchema = z.object({
  /** File extension without the dot, e.g. `py` */
  type: z.string().min(1),
  maxSize: z.number().int().positive().optional(),
});

export const migrationMappingSchema = z.object({
  version: z.union([z.string(), z.number()]).transform(String),
  /** Rules keyed by file type (`python`, `config`, `docs`, ...) */
  patterns: z.record(z.string(), z.array(mappingRuleSchema)),
  special: z.object({
    ignore: z.array(z.string()).default([]),
  }),
  validation: z.object({
    requiredDirs: z.array(z.string()).default([]),
    fileChecks: z.array(fileCheckSchema).default([]),
  }),
});

export type MappingRule = z.infer<typeof mappingRuleSchema>;
export type MigrationMapping = z.infer<typeof migrationMappingSchema>;
