/**
 * Receipt Split Engine - Configuration
 *
 * Thresholds the engine applies. Defaults match the behaviour users already
 * know; hosts can override them per call or through the environment.
 */

import { z } from 'zod';
import { invalidConfigError } from '../models/errors.js';

export const splitConfigSchema = z
  .object({
    varianceWarningPercent: z.number().min(0).describe('Variance above this percentage produces a warning'),
    varianceErrorPercent: z.number().min(0).describe('Variance above this percentage is fatal'),
    minimumSettlement: z.number().min(0).describe('Settlements at or below this amount are dropped'),
    minimumParticipants: z.number().int().min(1).describe('Participants needed for a valid session'),
    discrepancyTolerance: z.number().min(0).describe('Item-sum vs entered-total gap that is ignored'),
  })
  .refine(config => config.varianceErrorPercent >= config.varianceWarningPercent, {
    message: 'varianceErrorPercent must not be lower than varianceWarningPercent',
    path: ['varianceErrorPercent'],
  });

export type SplitConfig = z.infer<typeof splitConfigSchema>;

export const DEFAULT_SPLIT_CONFIG: Readonly<SplitConfig> = Object.freeze({
  varianceWarningPercent: 1.0,
  varianceErrorPercent: 10.0,
  minimumSettlement: 0.01,
  minimumParticipants: 2,
  discrepancyTolerance: 0.05,
});

/**
 * Merge overrides onto the defaults and validate the result.
 */
export function resolveSplitConfig(overrides: Partial<SplitConfig> = {}): SplitConfig {
  // An explicit undefined means "not set", not "clear the default"
  const defined = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
  const parsed = splitConfigSchema.safeParse({ ...DEFAULT_SPLIT_CONFIG, ...defined });
  if (!parsed.success) {
    throw invalidConfigError(parsed.error.issues);
  }
  return parsed.data;
}

const ENV_KEYS: Record<keyof SplitConfig, string> = {
  varianceWarningPercent: 'SPLIT_VARIANCE_WARNING_PERCENT',
  varianceErrorPercent: 'SPLIT_VARIANCE_ERROR_PERCENT',
  minimumSettlement: 'SPLIT_MINIMUM_SETTLEMENT',
  minimumParticipants: 'SPLIT_MINIMUM_PARTICIPANTS',
  discrepancyTolerance: 'SPLIT_DISCREPANCY_TOLERANCE',
};

// Blank values count as unset
const envNumber = z
  .string()
  .trim()
  .transform(value => (value === '' ? undefined : Number(value)))
  .pipe(z.number().finite().optional());

/**
 * Build a config from environment variables, falling back to defaults for
 * anything unset.
 */
export function loadSplitConfig(env: NodeJS.ProcessEnv = process.env): SplitConfig {
  const overrides: Partial<SplitConfig> = {};

  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const raw = env[envKey];
    if (raw === undefined) continue;

    const parsed = envNumber.safeParse(raw);
    if (!parsed.success) {
      throw invalidConfigError(parsed.error.issues.map(issue => ({ ...issue, path: [envKey] })));
    }
    if (parsed.data !== undefined && isConfigField(field)) {
      overrides[field] = parsed.data;
    }
  }

  return resolveSplitConfig(overrides);
}

function isConfigField(field: string): field is keyof SplitConfig {
  return field in ENV_KEYS;
}
