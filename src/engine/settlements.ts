/**
 * Receipt Split Engine - Settlement Generation
 *
 * Single-payer model: the payer fronted the whole bill, so every other
 * participant owes the payer their reconciled share directly. No debt
 * netting between non-payers is needed or attempted.
 */

import type { LineItem, ParticipantId, Session, Settlement } from '../models/types.js';
import { formatMoney, fromMinorUnits, minorUnitFactor, toMinorUnits } from '../utils/money.js';

// ============================================================================
// Explanations
// ============================================================================

const NO_ITEMS_LINE = 'Your share of the bill';

/**
 * How many people an item is divided between, or 0 when `participantId`
 * isn't one of them.
 */
function sharingCountFor(item: LineItem, participantId: ParticipantId, rosterSize: number): number {
  switch (item.assignment.kind) {
    case 'everyone':
      return rosterSize;
    case 'subset':
      return item.assignment.participantIds.includes(participantId) ? item.assignment.participantIds.length : 0;
    case 'unassigned':
      return 0;
  }
}

/**
 * One line per item the participant shares in, e.g.
 *   "Pizza: $24.00 ÷ 3 = $8.00"
 *   "Burger (×2): $15.98"
 */
export function explainShare(session: Session, participantId: ParticipantId): string {
  const { currency } = session;
  const lines: string[] = [];

  for (const item of session.items) {
    const count = sharingCountFor(item, participantId, session.participants.length);
    if (count === 0) continue;

    const lineMinor = toMinorUnits(item.amount, currency);
    const label = item.quantity > 1 ? `${item.name} (×${item.quantity})` : item.name;
    const total = formatMoney(lineMinor, currency);

    if (count === 1 && item.assignment.kind === 'subset') {
      lines.push(`${label}: ${total}`);
    } else {
      lines.push(`${label}: ${total} ÷ ${count} = ${formatMoney(lineMinor / count, currency)}`);
    }
  }

  return lines.length > 0 ? lines.join('\n') : NO_ITEMS_LINE;
}

// ============================================================================
// Settlements
// ============================================================================

/**
 * Turn reconciled shares into payer-directed settlements, largest first.
 * Amounts at or below `minimumSettlement` are dropped as noise.
 */
export function generateSettlements(
  session: Session,
  adjustedMinorUnits: Map<ParticipantId, number>,
  minimumSettlement: number
): Settlement[] {
  const { payer, currency } = session;
  // Not rounded: a threshold of 0.015 must still let 2¢ through
  const thresholdMinor = minimumSettlement * minorUnitFactor(currency);
  const settlements: Settlement[] = [];

  for (const participant of session.participants) {
    if (participant === payer) continue;

    const owedMinor = adjustedMinorUnits.get(participant) ?? 0;
    if (owedMinor <= thresholdMinor) continue;

    settlements.push({
      from: participant,
      to: payer,
      amount: fromMinorUnits(owedMinor, currency),
      explanation: explainShare(session, participant),
    });
  }

  // Stable: equal amounts keep roster order
  return settlements.sort((a, b) => b.amount - a.amount);
}
