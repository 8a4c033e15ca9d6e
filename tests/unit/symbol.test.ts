import { describe, expect, it } from 'vitest';
import {
  inferBoard,
  isSpecialTreatmentName,
  isValidSymbol,
  normalizeSymbol,
  parseSymbol,
  venueOf,
} from '@/core/symbol';
import { instrumentFromName } from '@/data/instrument_registry';

describe('symbol utilities', () => {
  it('parses exchange-qualified codes', () => {
    expect(parseSymbol('600519.SH')).toEqual({ code: '600519', venue: 'SH' });
    expect(parseSymbol(' 300750.sz ')).toEqual({ code: '300750', venue: 'SZ' });
    expect(parseSymbol('600519')).toBeNull();
    expect(parseSymbol('60051.SH')).toBeNull();
    expect(parseSymbol('600519.HK')).toBeNull();
  });

  it('normalizes and validates', () => {
    expect(normalizeSymbol(' 000001.sz')).toBe('000001.SZ');
    expect(isValidSymbol('830799.BJ')).toBe(true);
    expect(isValidSymbol('AAPL')).toBe(false);
    expect(venueOf('601318.SH')).toBe('SH');
    expect(venueOf('bad')).toBeNull();
  });

  it('infers the board from the code prefix', () => {
    expect(inferBoard('688981.SH')).toBe('science-innovation');
    expect(inferBoard('300750.SZ')).toBe('growth-enterprise');
    expect(inferBoard('301001.SZ')).toBe('growth-enterprise');
    expect(inferBoard('600519.SH')).toBe('main');
    expect(inferBoard('000001.SZ')).toBe('main');
  });

  it('detects special-treatment names', () => {
    expect(isSpecialTreatmentName('ST Alpha')).toBe(true);
    expect(isSpecialTreatmentName('*ST Beta')).toBe(true);
    expect(isSpecialTreatmentName('S*ST Gamma')).toBe(true);
    expect(isSpecialTreatmentName('SST Delta')).toBe(true);
    expect(isSpecialTreatmentName('Steady Holdings')).toBe(false);
    expect(isSpecialTreatmentName('Alpha Tech')).toBe(false);
  });

  it('builds an instrument from code and name', () => {
    expect(instrumentFromName('300001.sz', '*ST Test')).toEqual({
      symbol: '300001.SZ',
      name: '*ST Test',
      board: 'growth-enterprise',
      specialTreatment: true,
      listingStatus: 'active',
    });
  });
});
