/**
 * Receipt Split Engine - Money Utilities
 *
 * All arithmetic happens in integer minor units (cents for USD). Decimals in
 * major units only appear at the edges: parsing input and reporting output.
 */

import { Currency, DEFAULT_CURRENCY, SUPPORTED_CURRENCIES } from '../models/types.js';

// ============================================================================
// Currency Lookup
// ============================================================================

/**
 * Resolve a currency code. Unknown codes fall back to two decimals with the
 * code itself as the symbol.
 */
export function getCurrency(code: string = DEFAULT_CURRENCY): Currency {
  const normalized = code.trim().toUpperCase();
  return SUPPORTED_CURRENCIES[normalized] ?? { code: normalized, symbol: normalized + ' ', decimals: 2 };
}

export function minorUnitFactor(currency: string = DEFAULT_CURRENCY): number {
  return Math.pow(10, getCurrency(currency).decimals);
}

// ============================================================================
// Conversion
// ============================================================================

/**
 * Convert a major-unit decimal to integer minor units.
 */
export function toMinorUnits(amount: number, currency: string = DEFAULT_CURRENCY): number {
  return Math.round(amount * minorUnitFactor(currency));
}

/**
 * Convert minor units back to a major-unit decimal rounded to the currency's
 * digits.
 */
export function fromMinorUnits(minorUnits: number, currency: string = DEFAULT_CURRENCY): number {
  const { decimals } = getCurrency(currency);
  return Number((minorUnits / Math.pow(10, decimals)).toFixed(decimals));
}

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format an amount in minor units to a readable string. Fractional minor
 * units are rounded first, so `formatMoney(166.67)` gives "$1.67".
 */
export function formatMoney(amount: number, currency: string = DEFAULT_CURRENCY): string {
  const config = getCurrency(currency);
  const divisor = Math.pow(10, config.decimals);
  const value = Math.round(amount) / divisor;

  return `${config.symbol}${value.toFixed(config.decimals)}`;
}

/**
 * Parse a money value to a major-unit decimal. Returns null when nothing
 * numeric is left after stripping symbols and separators. The decimal
 * separator must be `.`; commas are only accepted as thousands separators.
 */
export function parseAmount(value: string | number): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  // Remove currency symbols and parse
  const stripped = value
    .trim()
    .replace(/^(C\$|A\$|Fr)/, '')
    .replace(/[$€£¥₩₹\s]/g, '');

  // Decimal comma ("12,50"); thousands groups always have three digits
  if (/^[^.]*,\d{1,2}$/.test(stripped)) return null;

  const cleaned = stripped.replace(/,/g, '');
  if (!/^-?(\d+\.?\d*|\.\d+)$/.test(cleaned)) return null;

  return parseFloat(cleaned);
}

/**
 * Parse a money value to minor units.
 */
export function parseMoney(value: string | number, currency: string = DEFAULT_CURRENCY): number | null {
  const amount = parseAmount(value);
  return amount === null ? null : toMinorUnits(amount, currency);
}
