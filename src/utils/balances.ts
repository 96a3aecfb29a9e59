/**
 * Receipt Split Engine - Balance Calculation
 *
 * Net position of each participant once the split is known.
 * Positive balance = person is owed money
 * Negative balance = person owes money
 */

import type { PersonBalance, Session, SplitResult } from '../models/types.js';
import { fromMinorUnits, toMinorUnits } from './money.js';

/**
 * Calculate the net balance for each person on the receipt. The payer paid
 * the entered total; everyone owes their reconciled share. Balances sum to
 * zero exactly.
 */
export function calculateBalances(session: Session, result: SplitResult): PersonBalance[] {
  const { currency } = result;
  const totalMinor = toMinorUnits(session.enteredTotal, currency);
  const owedMinor = new Map<string, number>();

  for (const share of result.shares) {
    owedMinor.set(share.participantId, toMinorUnits(share.amount, currency));
  }

  const balances: PersonBalance[] = session.participants.map(participantId => {
    const paid = participantId === session.payer ? totalMinor : 0;
    const owed = owedMinor.get(participantId) ?? 0;

    return {
      participantId,
      totalPaid: fromMinorUnits(paid, currency),
      totalOwed: fromMinorUnits(owed, currency),
      netBalance: fromMinorUnits(paid - owed, currency),
    };
  });

  return balances.sort((a, b) => b.netBalance - a.netBalance);
}
