import { z } from 'zod';
import { MARKET_KEYS } from '../picks/markets.js';

const probability = z.number().min(0).max(1);
const positive = z.number().positive().finite();

const ratePair = z.object({ home: positive, away: positive });

const marketKeys = new Set<string>(MARKET_KEYS);

export const engineConfigSchema = z
  .object({
    /** 'aggregate' = league multipliers, 'split' = recency-weighted venue form */
    model: z.enum(['aggregate', 'split']).default('aggregate'),
    /** Goal ceiling G of the truncated scoreline table */
    maxGoals: z.number().int().positive().max(20).default(8),
    lambdaMin: positive.default(0.1),
    lambdaMax: positive.default(4.5),
    /** Prior rates blended into the split model and used when it has no sample */
    defaultRates: ratePair.default({ home: 1.45, away: 1.15 }),
    /** League averages used when the lookback window has no finished matches */
    fallbackBaselines: ratePair.default({ home: 1.5, away: 1.2 }),
    /** Share of the computed form rate in the split blend */
    formBlend: probability.default(0.75),
    minProb: probability.default(0.5),
    /** Per-market minimum probability, keyed by market key */
    minProbOverrides: z
      .record(z.string(), probability)
      .refine((o) => Object.keys(o).every((k) => marketKeys.has(k)), {
        message: `keys must be one of: ${MARKET_KEYS.join(', ')}`,
      })
      .default({}),
    similarThreshold: probability.default(0.03),
    drawEdgeThreshold: probability.default(0.04),
    formDaysBack: z.number().int().positive().default(30),
    formLimit: z.number().int().positive().default(10),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.lambdaMin >= cfg.lambdaMax) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['lambdaMin'],
        message: `lambdaMin (${cfg.lambdaMin}) must be below lambdaMax (${cfg.lambdaMax})`,
      });
    }
  });

export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

export class EngineConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    const detail = issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    super(`Invalid engine configuration: ${detail}`);
    this.name = 'EngineConfigError';
    this.issues = issues;
  }
}

/**
 * Validate engine parameters. Throws EngineConfigError so a bad
 * configuration stops the process at startup instead of per fixture.
 */
export function buildEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const parsed = engineConfigSchema.safeParse(input);
  if (!parsed.success) throw new EngineConfigError(parsed.error.issues);
  return parsed.data;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = buildEngineConfig();
