import { describe, expect, it } from 'vitest';
import {
  formatMoney,
  fromMinorUnits,
  getCurrency,
  minorUnitFactor,
  parseAmount,
  parseMoney,
  toMinorUnits,
} from '../money.js';

describe('getCurrency', () => {
  it('looks up codes case-insensitively', () => {
    expect(getCurrency(' jpy ')).toEqual({ code: 'JPY', symbol: '¥', decimals: 0 });
    expect(getCurrency()).toEqual({ code: 'USD', symbol: '$', decimals: 2 });
  });

  it('falls back to two decimals for unknown codes', () => {
    expect(getCurrency('XYZ')).toEqual({ code: 'XYZ', symbol: 'XYZ ', decimals: 2 });
  });
});

describe('minor units', () => {
  it('uses the currency digits', () => {
    expect(minorUnitFactor('USD')).toBe(100);
    expect(minorUnitFactor('KRW')).toBe(1);
  });

  it('rounds binary fractions to the nearest minor unit', () => {
    expect(toMinorUnits(10.05)).toBe(1005);
    expect(toMinorUnits(0.1 + 0.2)).toBe(30);
    expect(toMinorUnits(1000, 'JPY')).toBe(1000);
  });

  it('converts back to major units', () => {
    expect(fromMinorUnits(1005)).toBe(10.05);
    expect(fromMinorUnits(-733)).toBe(-7.33);
    expect(fromMinorUnits(334, 'JPY')).toBe(334);
  });
});

describe('formatMoney', () => {
  it('formats minor units with the currency symbol', () => {
    expect(formatMoney(1250)).toBe('$12.50');
    expect(formatMoney(1250, 'GBP')).toBe('£12.50');
    expect(formatMoney(500, 'JPY')).toBe('¥500');
    expect(formatMoney(100, 'XYZ')).toBe('XYZ 1.00');
  });

  it('rounds fractional minor units', () => {
    expect(formatMoney(500 / 3)).toBe('$1.67');
    expect(formatMoney(1000 / 3, 'JPY')).toBe('¥333');
  });
});

describe('parseAmount', () => {
  it('strips symbols and separators', () => {
    expect(parseAmount(' $12.50 ')).toBe(12.5);
    expect(parseAmount('€1,234.50')).toBe(1234.5);
    expect(parseAmount('A$ 8')).toBe(8);
    expect(parseAmount('-3.25')).toBe(-3.25);
    expect(parseAmount('.5')).toBe(0.5);
    expect(parseAmount(7.25)).toBe(7.25);
  });

  it('returns null when nothing numeric is left', () => {
    expect(parseAmount('')).toBeNull();
    expect(parseAmount('abc')).toBeNull();
    expect(parseAmount('12.3.4')).toBeNull();
    expect(parseAmount(Number.NaN)).toBeNull();
  });

  it('rejects a decimal comma instead of reading it as thousands', () => {
    expect(parseAmount('12,50')).toBeNull();
    expect(parseAmount('€12,5')).toBeNull();
    expect(parseAmount('1,234')).toBe(1234);
    expect(parseAmount('1,234,567.89')).toBe(1234567.89);
  });
});

describe('parseMoney', () => {
  it('parses straight to minor units', () => {
    expect(parseMoney('$1,234.50')).toBe(123450);
    expect(parseMoney('C$12.00', 'CAD')).toBe(1200);
    expect(parseMoney('¥1,000', 'JPY')).toBe(1000);
    expect(parseMoney('abc')).toBeNull();
  });
});
