/**
 * Exchange-qualified symbol handling ('600519.SH', '300750.SZ')
 */

import type { Board, Venue } from '@/types/market';

export interface ParsedSymbol {
  code: string;
  venue: Venue;
}

const SYMBOL_PATTERN = /^(\d{6})\.(SH|SZ|BJ)$/;
// Prefix must not run into a Latin letter: 'ST Alpha' is flagged, 'Steady' is not.
const SPECIAL_TREATMENT_PATTERN = /^(S\*ST|SST|\*ST|ST)(?![A-Z])/;

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

export function parseSymbol(symbol: string): ParsedSymbol | null {
  const match = SYMBOL_PATTERN.exec(normalizeSymbol(symbol));
  if (!match) return null;
  const venue = match[2];
  if (venue !== 'SH' && venue !== 'SZ' && venue !== 'BJ') return null;
  return { code: match[1], venue };
}

export function isValidSymbol(symbol: string): boolean {
  return parseSymbol(symbol) !== null;
}

export function venueOf(symbol: string): Venue | null {
  return parseSymbol(symbol)?.venue ?? null;
}

/**
 * Board from the code prefix: 688xxx is STAR, 300xxx/301xxx is ChiNext.
 */
export function inferBoard(symbol: string): Board {
  const parsed = parseSymbol(symbol);
  if (!parsed) return 'main';
  if (parsed.code.startsWith('688')) return 'science-innovation';
  if (parsed.code.startsWith('300') || parsed.code.startsWith('301')) return 'growth-enterprise';
  return 'main';
}

export function isSpecialTreatmentName(name: string): boolean {
  return SPECIAL_TREATMENT_PATTERN.test(name.trim().toUpperCase());
}
