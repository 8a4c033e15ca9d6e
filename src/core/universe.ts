/**
 * Universe management - the list of symbols a run scores and trades
 */

import { getConfig, type AppConfig } from './config';
import { normalizeSymbol } from './symbol';

export interface UniverseInfo {
  name: string;
  benchmark: string | null;
  symbolCount: number;
}

export function getUniverse(appConfig: AppConfig = getConfig()): string[] {
  return appConfig.universe.symbols;
}

export function getUniverseInfo(appConfig: AppConfig = getConfig()): UniverseInfo {
  return {
    name: appConfig.universe.name,
    benchmark: appConfig.universe.benchmark,
    symbolCount: appConfig.universe.symbols.length,
  };
}

export function isInUniverse(symbol: string, appConfig: AppConfig = getConfig()): boolean {
  return appConfig.universe.symbols.includes(normalizeSymbol(symbol));
}
