/**
 * Receipt Split Engine - Pipeline
 *
 * validate → allocate → reconcile → explain. Pure and synchronous: every call
 * builds its own working state, and a fatal problem aborts before any
 * settlement exists.
 */

import { resolveSplitConfig, type SplitConfig } from '../config/splitConfig.js';
import { isBillSplitError, type BillSplitError } from '../models/errors.js';
import type { ParticipantShare, Session, SettlementWarning, SplitResult } from '../models/types.js';
import { defaultLogger, type SplitLogger } from '../utils/logger.js';
import { fromMinorUnits, getCurrency, toMinorUnits } from '../utils/money.js';
import { allocateItems } from './allocator.js';
import { reconcileMinorUnits } from './reconciler.js';
import { generateSettlements } from './settlements.js';
import { checkPreconditions, checkVariance } from './validator.js';

/** The thresholds the engine itself applies. */
export type EngineConfig = Pick<SplitConfig, 'varianceWarningPercent' | 'varianceErrorPercent' | 'minimumSettlement'>;

export interface ComputeSplitsOptions {
  config?: Partial<EngineConfig>;
  logger?: SplitLogger;
}

export type SafeComputeSplitsResult =
  | { success: true; data: SplitResult }
  | { success: false; error: BillSplitError };

/**
 * Compute who owes the payer what.
 *
 * @throws BillSplitError when the session can't be split
 */
export function computeSplits(session: Session, options: ComputeSplitsOptions = {}): SplitResult {
  const logger = options.logger ?? defaultLogger;

  try {
    const result = runPipeline(session, resolveSplitConfig(options.config), logger);

    for (const warning of result.warnings) {
      logger.warn('computeSplits: warning', { ...warning });
    }
    return result;
  } catch (error) {
    if (isBillSplitError(error)) {
      logger.warn('computeSplits: rejected session', { code: error.code, message: error.message });
    }
    throw error;
  }
}

/**
 * Like `computeSplits`, but returns split failures instead of throwing them.
 * Anything that isn't a BillSplitError still throws.
 */
export function safeComputeSplits(session: Session, options: ComputeSplitsOptions = {}): SafeComputeSplitsResult {
  try {
    return { success: true, data: computeSplits(session, options) };
  } catch (error) {
    if (isBillSplitError(error)) {
      return { success: false, error };
    }
    throw error;
  }
}

function runPipeline(session: Session, config: SplitConfig, logger: SplitLogger): SplitResult {
  const currency = getCurrency(session.currency).code;
  const normalized: Session = { ...session, currency };

  const warnings: SettlementWarning[] = checkPreconditions(normalized);
  const totalMinor = toMinorUnits(normalized.enteredTotal, currency);

  logger.debug('computeSplits: validated session', {
    participants: normalized.participants.length,
    items: normalized.items.length,
    currency,
  });

  if (normalized.participants.length === 1) {
    return {
      settlements: [],
      warnings,
      shares: [{ participantId: normalized.participants[0], amount: fromMinorUnits(totalMinor, currency) }],
      currency,
    };
  }

  const { rawMinorUnits, allocatedMinor } = allocateItems(normalized);
  logger.debug('computeSplits: allocated items', { allocatedMinor, totalMinor });

  const variance = checkVariance(allocatedMinor, totalMinor, currency, config);
  if (variance) {
    warnings.push(variance);
  }

  const adjusted = reconcileMinorUnits(rawMinorUnits, totalMinor);
  const shares: ParticipantShare[] = normalized.participants.map(participantId => ({
    participantId,
    amount: fromMinorUnits(adjusted.get(participantId) ?? 0, currency),
  }));

  const settlements = generateSettlements(normalized, adjusted, config.minimumSettlement);
  logger.debug('computeSplits: generated settlements', { settlements: settlements.length });

  return { settlements, warnings, shares, currency };
}
