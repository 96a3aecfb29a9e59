/**
 * Receipt Split Engine - Validation
 *
 * Two passes: structural preconditions before anything is allocated, and a
 * variance check once the allocator knows how much of the bill it covered.
 */

import type { SplitConfig } from '../config/splitConfig.js';
import {
  invalidItemError,
  invalidPayerError,
  invalidTotalError,
  noItemsError,
  noParticipantsError,
  totalsDoNotMatchError,
  unknownAssigneeError,
} from '../models/errors.js';
import type { LineItem, Session, SettlementWarning } from '../models/types.js';
import { fromMinorUnits, toMinorUnits } from '../utils/money.js';

// ============================================================================
// Item Checks
// ============================================================================

/**
 * Why an item can't be split, or null when it is fine.
 */
export function itemProblem(item: LineItem): string | null {
  if (item.name.trim() === '') return 'name is empty';
  if (!Number.isInteger(item.quantity) || item.quantity < 1) return 'quantity must be a whole number of at least 1';
  if (!Number.isFinite(item.amount)) return 'amount is not a number';
  if (item.amount < 0) return 'amount cannot be negative';
  return null;
}

// ============================================================================
// Preconditions
// ============================================================================

/**
 * Throws on the first fatal problem; otherwise returns the warnings that
 * don't stop the split.
 */
export function checkPreconditions(session: Session): SettlementWarning[] {
  const { participants, items, payer, enteredTotal } = session;

  if (participants.length === 0) throw noParticipantsError();
  if (items.length === 0) throw noItemsError();
  if (!participants.includes(payer)) throw invalidPayerError(payer);
  // Less than one minor unit rounds to nothing to split
  if (!Number.isFinite(enteredTotal) || toMinorUnits(enteredTotal, session.currency) <= 0) {
    throw invalidTotalError(enteredTotal);
  }

  const roster = new Set(participants);
  for (const item of items) {
    const problem = itemProblem(item);
    if (problem) throw invalidItemError(item.name, problem);

    if (item.assignment.kind === 'subset') {
      const stranger = item.assignment.participantIds.find(id => !roster.has(id));
      if (stranger !== undefined) throw unknownAssigneeError(stranger, item.name);
    }
  }

  const warnings: SettlementWarning[] = [];

  const unassigned = items.filter(item => !isAssigned(item)).length;
  if (unassigned > 0) {
    warnings.push({ type: 'unassignedItems', count: unassigned });
  }

  if (participants.length === 1) {
    warnings.push({ type: 'singleParticipant' });
  }

  return warnings;
}

export function isAssigned(item: LineItem): boolean {
  switch (item.assignment.kind) {
    case 'everyone':
      return true;
    case 'subset':
      return item.assignment.participantIds.length > 0;
    case 'unassigned':
      return false;
  }
}

// ============================================================================
// Variance
// ============================================================================

/**
 * Compare what the items allocated against the entered total. Both figures
 * are minor units; the allocated figure may carry fractions from division.
 */
export function checkVariance(
  allocatedMinor: number,
  totalMinor: number,
  currency: string,
  config: SplitConfig
): SettlementWarning | null {
  // Scale before dividing so whole-percent variances come out exact
  const variancePercent = (Math.abs(allocatedMinor - totalMinor) * 100) / totalMinor;
  const allocated = fromMinorUnits(Math.round(allocatedMinor), currency);
  const expected = fromMinorUnits(totalMinor, currency);

  if (variancePercent > config.varianceErrorPercent) {
    throw totalsDoNotMatchError(allocated, expected, variancePercent);
  }

  if (variancePercent > config.varianceWarningPercent) {
    return { type: 'totalVariance', allocated, expected, variancePercent };
  }

  return null;
}
