/**
 * Receipt Split Engine - Allocation
 *
 * Spreads each line total across the people sharing it. Shares are kept in
 * fractional minor units here; rounding happens once, in the reconciler.
 */

import type { ParticipantId, Session } from '../models/types.js';
import { toMinorUnits } from '../utils/money.js';

export interface Allocation {
  rawMinorUnits: Map<ParticipantId, number>;
  allocatedMinor: number;
}

/**
 * Quantity is already part of the line amount and is never multiplied in.
 */
export function allocateItems(session: Session): Allocation {
  const rawMinorUnits = new Map<ParticipantId, number>();

  // Initialize all participants to zero
  for (const participant of session.participants) {
    rawMinorUnits.set(participant, 0);
  }

  const credit = (participantId: ParticipantId, amount: number) => {
    rawMinorUnits.set(participantId, (rawMinorUnits.get(participantId) ?? 0) + amount);
  };

  for (const item of session.items) {
    const lineMinor = toMinorUnits(item.amount, session.currency);
    const { assignment } = item;

    if (assignment.kind === 'everyone') {
      const share = lineMinor / session.participants.length;
      session.participants.forEach(participant => credit(participant, share));
    } else if (assignment.kind === 'subset' && assignment.participantIds.length > 0) {
      const share = lineMinor / assignment.participantIds.length;
      assignment.participantIds.forEach(participant => credit(participant, share));
    }
  }

  let allocatedMinor = 0;
  for (const amount of rawMinorUnits.values()) {
    allocatedMinor += amount;
  }

  return { rawMinorUnits, allocatedMinor };
}
