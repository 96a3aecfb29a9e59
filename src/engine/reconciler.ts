/**
 * Receipt Split Engine - Cent Reconciliation
 *
 * Rounds each person's allocation to whole minor units, then hands out the
 * leftover units one at a time in name order until the shares add up to the
 * entered total exactly.
 *
 * Example: $10.00 among Alice, Bob and Carol allocates 333.33¢ each, rounds
 * to 333¢ each (999¢), and the missing cent goes to Alice: 334/333/333.
 */

import type { ParticipantId } from '../models/types.js';

export function reconcileMinorUnits(
  rawMinorUnits: Map<ParticipantId, number>,
  totalMinor: number
): Map<ParticipantId, number> {
  const adjusted = new Map<ParticipantId, number>();
  let baseMinor = 0;

  for (const [participantId, raw] of rawMinorUnits) {
    const rounded = Math.round(raw);
    adjusted.set(participantId, rounded);
    baseMinor += rounded;
  }

  const remainder = totalMinor - baseMinor;
  if (remainder === 0 || adjusted.size === 0) {
    return adjusted;
  }

  // Name order, not allocation size, so the same bill always lands the same way
  const order = [...adjusted.keys()].sort();
  const step = remainder > 0 ? 1 : -1;

  for (let i = 0; i < Math.abs(remainder); i++) {
    const participantId = order[i % order.length];
    adjusted.set(participantId, (adjusted.get(participantId) ?? 0) + step);
  }

  return adjusted;
}
