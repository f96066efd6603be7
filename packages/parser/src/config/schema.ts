import { z } from 'zod';

// ---------------------------------------------------------------------------
// Thresholds
// ---------------------------------------------------------------------------

const methodThresholdsSchema = z
  .object({
    cyclomatic: z.number().int().positive().default(10),
    lines: z.number().int().positive().default(50),
    parameters: z.number().int().nonnegative().default(5),
    nesting: z.number().int().nonnegative().default(3),
  })
  .default({});

const classThresholdsSchema = z
  .object({
    methods: z.number().int().nonnegative().default(20),
    lines: z.number().int().positive().default(300),
    instanceVars: z.number().int().nonnegative().default(10),
  })
  .default({});

/**
 * Risk thresholds. A metric strictly greater than its threshold is a risk.
 *
 * `method.lines`, `class.instanceVars`, `coupling` and `inheritance` are
 * accepted and reported but no risk check reads them.
 */
export const thresholdsSchema = z
  .object({
    method: methodThresholdsSchema,
    class: classThresholdsSchema,
    coupling: z.number().nonnegative().default(5.0),
    inheritance: z.number().int().nonnegative().default(3),
  })
  .default({});

const scanConfigSchema = z
  .object({
    exclude: z.array(z.string()).default([]),
    respectGitignore: z.boolean().default(true),
  })
  .default({});

export const pyscopeConfigSchema = z.object({
  thresholds: thresholdsSchema,
  scan: scanConfigSchema,
});

export type Thresholds = z.infer<typeof thresholdsSchema>;
export type PyscopeConfig = z.infer<typeof pyscopeConfigSchema>;

/** Partial overrides accepted by resolveThresholds */
export interface ThresholdOverrides {
  method?: Partial<Thresholds['method']>;
  class?: Partial<Thresholds['class']>;
  coupling?: number;
  inheritance?: number;
}

export const DEFAULT_THRESHOLDS: Thresholds = thresholdsSchema.parse({});

export const defaultConfig: PyscopeConfig = pyscopeConfigSchema.parse({});

/**
 * Deep-merge threshold overrides onto the defaults
 */
export function resolveThresholds(overrides?: ThresholdOverrides): Thresholds {
  return {
    method: { ...DEFAULT_THRESHOLDS.method, ...overrides?.method },
    class: { ...DEFAULT_THRESHOLDS.class, ...overrides?.class },
    coupling: overrides?.coupling ?? DEFAULT_THRESHOLDS.coupling,
    inheritance: overrides?.inheritance ?? DEFAULT_THRESHOLDS.inheritance,
  };
}
