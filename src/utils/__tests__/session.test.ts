import { describe, expect, it } from 'vitest';
import { DEFAULT_SPLIT_CONFIG, loadSplitConfig } from '../../config/splitConfig.js';
import type { LineItem, Session } from '../../models/types.js';
import {
  calculatedTotal,
  describeWarning,
  hasTotalDiscrepancy,
  pricePerPerson,
  summarizeSettlement,
  totalDiscrepancy,
  unassignedItemCount,
  unitPrice,
  validateSession,
} from '../session.js';

const lunch: Session = {
  participants: ['Alice', 'Bob'],
  payer: 'Alice',
  enteredTotal: 65.96,
  items: [
    { name: 'Burger', quantity: 1, amount: 12.99, assignment: { kind: 'subset', participantIds: ['Alice'] } },
    { name: 'Pasta', quantity: 1, amount: 15.99, assignment: { kind: 'subset', participantIds: ['Bob'] } },
    { name: 'Wine', quantity: 1, amount: 24.99, assignment: { kind: 'everyone' } },
    { name: 'Coffee', quantity: 1, amount: 2.99, assignment: { kind: 'unassigned' } },
  ],
};

describe('totals', () => {
  it('sums line totals in minor units', () => {
    expect(calculatedTotal(lunch)).toBe(56.96);
    expect(totalDiscrepancy(lunch)).toBe(9);
  });

  it('ignores discrepancies within the tolerance', () => {
    expect(hasTotalDiscrepancy(lunch)).toBe(true);
    expect(hasTotalDiscrepancy({ ...lunch, enteredTotal: 57 })).toBe(false);
    const strict = { ...DEFAULT_SPLIT_CONFIG, discrepancyTolerance: 0.01 };
    expect(hasTotalDiscrepancy({ ...lunch, enteredTotal: 57 }, strict)).toBe(true);
  });

  it('reads the tolerance from a loaded config', () => {
    const config = loadSplitConfig({ SPLIT_DISCREPANCY_TOLERANCE: '0.035' });

    expect(hasTotalDiscrepancy({ ...lunch, enteredTotal: 57 }, config)).toBe(true);
    expect(hasTotalDiscrepancy({ ...lunch, enteredTotal: 56.99 }, config)).toBe(false);
  });

  it('counts unassigned items', () => {
    expect(unassignedItemCount(lunch)).toBe(1);
  });
});

describe('item prices', () => {
  const burgers: LineItem = {
    name: 'Burger',
    quantity: 2,
    amount: 15.98,
    assignment: { kind: 'subset', participantIds: ['Alice', 'Bob'] },
  };

  it('divides the line total back out by quantity', () => {
    expect(unitPrice(burgers)).toBe(7.99);
  });

  it('divides by the people sharing the item', () => {
    expect(pricePerPerson(burgers, 3)).toBe(7.99);
    expect(pricePerPerson({ ...burgers, amount: 24, assignment: { kind: 'everyone' } }, 3)).toBe(8);
    expect(pricePerPerson({ ...burgers, assignment: { kind: 'unassigned' } }, 3)).toBe(0);
  });
});

describe('validateSession', () => {
  it('reports unassigned items', () => {
    expect(validateSession(lunch)).toEqual(['1 item(s) not assigned']);
  });

  it('reports every problem with an empty session', () => {
    expect(validateSession({ participants: [], payer: '', enteredTotal: 0, items: [] })).toEqual([
      'No participants added',
      'No payer selected',
      'No items added',
      'Total amount must be greater than 0',
    ]);
  });

  it('needs the minimum number of participants', () => {
    const solo: Session = { ...lunch, participants: ['Alice'], items: lunch.items.slice(0, 1) };

    expect(validateSession(solo)).toEqual(['Need at least 2 participants']);
    expect(validateSession(solo, { ...DEFAULT_SPLIT_CONFIG, minimumParticipants: 1 })).toEqual([]);
  });

  it('flags a payer who is not on the roster and broken items', () => {
    const session: Session = {
      ...lunch,
      payer: 'Dave',
      items: [{ ...lunch.items[0], quantity: 0 }],
    };

    expect(validateSession(session)).toEqual(['Payer must be a participant', 'Some items have invalid data']);
  });
});

describe('messages', () => {
  it('describes each warning', () => {
    expect(describeWarning({ type: 'totalVariance', allocated: 90.1, expected: 100, variancePercent: 9.9 })).toBe(
      'Total mismatch: calculated $90.10 vs entered $100.00 (variance 9.90%). Please verify manually.'
    );
    expect(describeWarning({ type: 'unassignedItems', count: 2 })).toBe('2 item(s) not assigned to any participant');
    expect(describeWarning({ type: 'singleParticipant' })).toBe('Only one participant - no splits necessary');
  });

  it('summarizes a settlement on one line', () => {
    const settlement = { from: 'Bob', to: 'Alice', amount: 12.5, explanation: 'Pasta: $12.50' };

    expect(summarizeSettlement(settlement)).toBe('Bob → Alice: $12.50');
    expect(summarizeSettlement(settlement, 'EUR')).toBe('Bob → Alice: €12.50');
  });
});
