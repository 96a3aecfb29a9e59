/**
 * Receipt Split Engine - Session Helpers
 *
 * Read-only views over a session for the editing flow: running totals,
 * discrepancy checks, and the human-readable problems that should block
 * splitting before the engine is ever called.
 */

import { DEFAULT_SPLIT_CONFIG, type SplitConfig } from '../config/splitConfig.js';
import { isAssigned, itemProblem } from '../engine/validator.js';
import type { LineItem, Session, Settlement, SettlementWarning } from '../models/types.js';
import { formatMoney, fromMinorUnits, minorUnitFactor, toMinorUnits } from './money.js';

// ============================================================================
// Totals
// ============================================================================

function itemsMinor(session: Session): number {
  return session.items.reduce((sum, item) => sum + toMinorUnits(item.amount, session.currency), 0);
}

/** Sum of the line totals. */
export function calculatedTotal(session: Session): number {
  return fromMinorUnits(itemsMinor(session), session.currency);
}

/** Entered total minus the sum of the line totals. */
export function totalDiscrepancy(session: Session): number {
  const discrepancy = toMinorUnits(session.enteredTotal, session.currency) - itemsMinor(session);
  return fromMinorUnits(discrepancy, session.currency);
}

export function hasTotalDiscrepancy(session: Session, config: SplitConfig = DEFAULT_SPLIT_CONFIG): boolean {
  const discrepancy = toMinorUnits(session.enteredTotal, session.currency) - itemsMinor(session);
  return Math.abs(discrepancy) > config.discrepancyTolerance * minorUnitFactor(session.currency);
}

export function unassignedItemCount(session: Session): number {
  return session.items.filter(item => !isAssigned(item)).length;
}

// ============================================================================
// Items
// ============================================================================

/** Line total divided back out by quantity. */
export function unitPrice(item: LineItem): number {
  return item.quantity > 0 ? item.amount / item.quantity : item.amount;
}

/**
 * What each sharer pays for this item before reconciliation; 0 when
 * unassigned.
 */
export function pricePerPerson(item: LineItem, rosterSize: number): number {
  switch (item.assignment.kind) {
    case 'everyone':
      return rosterSize > 0 ? item.amount / rosterSize : 0;
    case 'subset':
      return item.assignment.participantIds.length > 0 ? item.amount / item.assignment.participantIds.length : 0;
    case 'unassigned':
      return 0;
  }
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Every problem with the session, as messages for the user. Empty when the
 * session is ready to split.
 */
export function validateSession(session: Session, config: SplitConfig = DEFAULT_SPLIT_CONFIG): string[] {
  const errors: string[] = [];
  const { participants, payer, items } = session;

  if (participants.length === 0) {
    errors.push('No participants added');
  } else if (participants.length < config.minimumParticipants) {
    errors.push(`Need at least ${config.minimumParticipants} participants`);
  }

  if (payer.trim() === '') {
    errors.push('No payer selected');
  } else if (!participants.includes(payer)) {
    errors.push('Payer must be a participant');
  }

  if (items.length === 0) {
    errors.push('No items added');
  } else if (items.some(item => itemProblem(item) !== null)) {
    errors.push('Some items have invalid data');
  }

  if (!(session.enteredTotal > 0)) {
    errors.push('Total amount must be greater than 0');
  }

  const unassigned = unassignedItemCount(session);
  if (unassigned > 0) {
    errors.push(`${unassigned} item(s) not assigned`);
  }

  return errors;
}

// ============================================================================
// Messages
// ============================================================================

/**
 * User-facing text for a warning.
 */
export function describeWarning(warning: SettlementWarning, currency?: string): string {
  switch (warning.type) {
    case 'totalVariance':
      return (
        `Total mismatch: calculated ${formatMoney(toMinorUnits(warning.allocated, currency), currency)} ` +
        `vs entered ${formatMoney(toMinorUnits(warning.expected, currency), currency)} ` +
        `(variance ${warning.variancePercent.toFixed(2)}%). Please verify manually.`
      );
    case 'unassignedItems':
      return `${warning.count} item(s) not assigned to any participant`;
    case 'singleParticipant':
      return 'Only one participant - no splits necessary';
  }
}

/** e.g. "Bob → Alice: $12.50" */
export function summarizeSettlement(settlement: Settlement, currency?: string): string {
  return `${settlement.from} → ${settlement.to}: ${formatMoney(toMinorUnits(settlement.amount, currency), currency)}`;
}
