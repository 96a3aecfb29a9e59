/**
 * Receipt Split Engine - Data Models
 *
 * Domain objects for splitting a single receipt between the people at the
 * table. Amounts on the public surface are decimals in major units (dollars);
 * the engine converts to integer minor units internally.
 */

// ============================================================================
// Core Identifiers
// ============================================================================

export type ParticipantId = string;

// ============================================================================
// Currency & Money
// ============================================================================

export interface Currency {
  code: string;      // ISO 4217 code (USD, EUR, GBP, etc.)
  symbol: string;    // Display symbol ($, €, £, etc.)
  decimals: number;  // Decimal places (2 for most, 0 for JPY, KRW)
}

export const SUPPORTED_CURRENCIES: Record<string, Currency> = {
  USD: { code: 'USD', symbol: '$', decimals: 2 },
  EUR: { code: 'EUR', symbol: '€', decimals: 2 },
  GBP: { code: 'GBP', symbol: '£', decimals: 2 },
  CAD: { code: 'CAD', symbol: 'C$', decimals: 2 },
  AUD: { code: 'AUD', symbol: 'A$', decimals: 2 },
  JPY: { code: 'JPY', symbol: '¥', decimals: 0 },
  KRW: { code: 'KRW', symbol: '₩', decimals: 0 },
  CNY: { code: 'CNY', symbol: '¥', decimals: 2 },
  MXN: { code: 'MXN', symbol: '$', decimals: 2 },
  INR: { code: 'INR', symbol: '₹', decimals: 2 },
  CHF: { code: 'CHF', symbol: 'Fr', decimals: 2 },
};

export const DEFAULT_CURRENCY = 'USD';

// ============================================================================
// Receipt Items
// ============================================================================

/**
 * Who shares a line item.
 *
 * `everyone` splits across the whole roster, including people added after
 * the item was assigned.
 */
export type ItemAssignment =
  | { kind: 'everyone' }
  | { kind: 'subset'; participantIds: ParticipantId[] }
  | { kind: 'unassigned' };

export interface LineItem {
  name: string;
  quantity: number;      // Display only; already baked into amount
  amount: number;        // Line total as printed, NOT unit price
  assignment: ItemAssignment;
}

// ============================================================================
// Session
// ============================================================================

export interface Session {
  participants: ParticipantId[];
  payer: ParticipantId;
  enteredTotal: number;  // Authoritative bill total, independent of items
  items: LineItem[];
  currency?: string;     // Defaults to USD
}

// ============================================================================
// Results
// ============================================================================

export type SettlementWarning =
  | { type: 'totalVariance'; allocated: number; expected: number; variancePercent: number }
  | { type: 'unassignedItems'; count: number }
  | { type: 'singleParticipant' };

export interface Settlement {
  from: ParticipantId;   // Who owes
  to: ParticipantId;     // Always the payer
  amount: number;        // Major units, rounded to the currency's digits
  explanation: string;   // One derivation line per item, newline-joined
}

export interface ParticipantShare {
  participantId: ParticipantId;
  amount: number;        // Reconciled share of the entered total
}

export interface SplitResult {
  settlements: Settlement[];
  warnings: SettlementWarning[];
  shares: ParticipantShare[];
  currency: string;
}

// ============================================================================
// Balances (Computed)
// ============================================================================

export interface PersonBalance {
  participantId: ParticipantId;
  totalPaid: number;      // What this person fronted
  totalOwed: number;      // Their reconciled share of the bill
  netBalance: number;     // Positive = owed money, negative = owes money
}
