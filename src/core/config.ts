/**
 * Application configuration loaded from JSON files
 * Files live in config/ under the project root, or in CONFIG_DIR. A missing
 * file falls back to the built-in defaults; a malformed value is a ConfigError.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { ConfigError } from './errors';
import { normalizeSymbol, isValidSymbol } from './symbol';
import { isIsoDate } from './time';
import { A_SHARE_RULES, type MarketRuleSet, type PriceBandRatios } from '@/market/rules';
import { DEFAULT_COST_CONFIG, type CostConfig } from '@/trading/costs';
import {
  DEFAULT_CONSENSUS_THRESHOLDS,
  type ConsensusThresholds,
} from '@/scoring/consensus_config';
import type { Venue } from '@/types/market';

export type FillPriceField = 'open' | 'close';

export interface BacktestConfig {
  initialCapital: number;
  /** Annual rate used by the Sharpe-like ratio. */
  riskFreeRate: number;
  /** Distinct symbols held at once; 0 disables the cap. */
  maxPositions: number;
  fillPriceField: FillPriceField;
  startDate: string | null;
  endDate: string | null;
  databasePath: string;
  /** Minimum consensus total for the reference policy to buy. */
  entryScore: number;
  /** Holdings scoring below this are sold by the reference policy. */
  exitScore: number;
  minCompleteness: number;
}

export interface UniverseConfig {
  name: string;
  benchmark: string | null;
  symbols: string[];
}

export interface AppConfig {
  marketRules: MarketRuleSet;
  costs: CostConfig;
  consensus: ConsensusThresholds;
  backtest: BacktestConfig;
  universe: UniverseConfig;
  configDir: string;
}

export const DEFAULT_BACKTEST_CONFIG: BacktestConfig = {
  initialCapital: 1_000_000,
  riskFreeRate: 0.02,
  maxPositions: 10,
  fillPriceField: 'close',
  startDate: null,
  endDate: null,
  databasePath: join('data', 'market.db'),
  entryScore: 60,
  exitScore: 30,
  minCompleteness: 0.5,
};

const VENUES: readonly Venue[] = ['SH', 'SZ', 'BJ'];

let cachedConfig: AppConfig | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readJsonFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot parse ${path}`, { path, cause: String(error) });
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${path} must contain a JSON object`, { path });
  }
  return parsed;
}

interface NumberBounds {
  min?: number;
  max?: number;
  integer?: boolean;
}

function readNumber(
  source: Record<string, unknown>,
  key: string,
  fallback: number,
  file: string,
  bounds: NumberBounds = {}
): number {
  const raw = source[key];
  if (raw === undefined) return fallback;
  if (typeof raw !== 'number' || !Number.isFinite(raw)) {
    throw new ConfigError(`${file}: ${key} must be a finite number`, { file, key, value: raw });
  }
  if (bounds.integer && !Number.isInteger(raw)) {
    throw new ConfigError(`${file}: ${key} must be an integer`, { file, key, value: raw });
  }
  if ((bounds.min !== undefined && raw < bounds.min) || (bounds.max !== undefined && raw > bounds.max)) {
    throw new ConfigError(`${file}: ${key} is out of range`, { file, key, value: raw, ...bounds });
  }
  return raw;
}

function readDate(value: unknown, label: string): string | null {
  if (value === undefined || value === null || value === '') return null;
  if (typeof value !== 'string' || !isIsoDate(value)) {
    throw new ConfigError(`${label} must be a YYYY-MM-DD date`, { label, value });
  }
  return value;
}

function isVenue(value: unknown): value is Venue {
  return VENUES.some((venue) => venue === value);
}

export function normalizeMarketRules(raw: Record<string, unknown>): MarketRuleSet {
  const file = 'market_rules.json';
  const bands = isRecord(raw.bandRatios) ? raw.bandRatios : {};
  const defaults = A_SHARE_RULES.bandRatios;
  const ratio = (key: keyof PriceBandRatios) =>
    readNumber(bands, key, defaults[key], file, { min: 0, max: 1 });

  return {
    name: typeof raw.name === 'string' && raw.name.trim() ? raw.name.trim() : A_SHARE_RULES.name,
    lotSize: readNumber(raw, 'lotSize', A_SHARE_RULES.lotSize, file, { min: 1, integer: true }),
    settlementDays: readNumber(raw, 'settlementDays', A_SHARE_RULES.settlementDays, file, {
      min: 0,
      integer: true,
    }),
    priceDecimals: readNumber(raw, 'priceDecimals', A_SHARE_RULES.priceDecimals, file, {
      min: 0,
      max: 6,
      integer: true,
    }),
    bandRatios: {
      main: ratio('main'),
      scienceInnovation: ratio('scienceInnovation'),
      growthEnterprise: ratio('growthEnterprise'),
      specialTreatment: ratio('specialTreatment'),
    },
  };
}

export function normalizeCosts(raw: Record<string, unknown>, priceDecimals: number): CostConfig {
  const file = 'costs.json';
  const rate = (key: string, fallback: number) => readNumber(raw, key, fallback, file, { min: 0, max: 1 });

  let venues = DEFAULT_COST_CONFIG.transferFeeVenues;
  if (raw.transferFeeVenues !== undefined) {
    if (!Array.isArray(raw.transferFeeVenues) || !raw.transferFeeVenues.every(isVenue)) {
      throw new ConfigError(`${file}: transferFeeVenues must list SH, SZ or BJ`, {
        value: raw.transferFeeVenues,
      });
    }
    venues = raw.transferFeeVenues.filter(isVenue);
  }

  return {
    commissionRate: rate('commissionRate', DEFAULT_COST_CONFIG.commissionRate),
    minCommission: readNumber(raw, 'minCommission', DEFAULT_COST_CONFIG.minCommission, file, { min: 0 }),
    stampDutyRate: rate('stampDutyRate', DEFAULT_COST_CONFIG.stampDutyRate),
    transferFeeRate: rate('transferFeeRate', DEFAULT_COST_CONFIG.transferFeeRate),
    transferFeeVenues: venues,
    slippageRate: rate('slippageRate', DEFAULT_COST_CONFIG.slippageRate),
    priceDecimals,
  };
}

export function normalizeConsensus(raw: Record<string, unknown>): ConsensusThresholds {
  const file = 'consensus.json';
  const d = DEFAULT_CONSENSUS_THRESHOLDS;
  const thresholds: ConsensusThresholds = {
    nearHighPct: readNumber(raw, 'nearHighPct', d.nearHighPct, file, { min: 0, max: 1 }),
    northboundNetInflowMin: readNumber(raw, 'northboundNetInflowMin', d.northboundNetInflowMin, file),
    marginNetBuyMin: readNumber(raw, 'marginNetBuyMin', d.marginNetBuyMin, file),
    analystBuyCountMin: readNumber(raw, 'analystBuyCountMin', d.analystBuyCountMin, file, { min: 0 }),
    sectorHeatTopN: readNumber(raw, 'sectorHeatTopN', d.sectorHeatTopN, file, { min: 1, integer: true }),
    discussionVolumeHigh: readNumber(raw, 'discussionVolumeHigh', d.discussionVolumeHigh, file, { min: 0 }),
    discussionVolumeLow: readNumber(raw, 'discussionVolumeLow', d.discussionVolumeLow, file, { min: 0 }),
  };
  if (thresholds.discussionVolumeLow > thresholds.discussionVolumeHigh) {
    throw new ConfigError(`${file}: discussionVolumeLow exceeds discussionVolumeHigh`, {
      low: thresholds.discussionVolumeLow,
      high: thresholds.discussionVolumeHigh,
    });
  }
  return thresholds;
}

export function normalizeBacktest(raw: Record<string, unknown>): BacktestConfig {
  const file = 'backtest.json';
  const d = DEFAULT_BACKTEST_CONFIG;
  const fillRaw = raw.fillPriceField;
  let fillPriceField: FillPriceField = d.fillPriceField;
  if (fillRaw === 'open' || fillRaw === 'close') {
    fillPriceField = fillRaw;
  } else if (fillRaw !== undefined) {
    throw new ConfigError(`${file}: fillPriceField must be "open" or "close"`, { value: fillRaw });
  }

  const config: BacktestConfig = {
    initialCapital: readNumber(raw, 'initialCapital', d.initialCapital, file, { min: 0 }),
    riskFreeRate: readNumber(raw, 'riskFreeRate', d.riskFreeRate, file),
    maxPositions: readNumber(raw, 'maxPositions', d.maxPositions, file, { min: 0, integer: true }),
    fillPriceField,
    startDate: readDate(raw.startDate, `${file}: startDate`),
    endDate: readDate(raw.endDate, `${file}: endDate`),
    databasePath: typeof raw.databasePath === 'string' && raw.databasePath ? raw.databasePath : d.databasePath,
    entryScore: readNumber(raw, 'entryScore', d.entryScore, file, { min: 0, max: 100 }),
    exitScore: readNumber(raw, 'exitScore', d.exitScore, file, { min: 0, max: 100 }),
    minCompleteness: readNumber(raw, 'minCompleteness', d.minCompleteness, file, { min: 0, max: 1 }),
  };
  return applyEnvOverrides(config);
}

function applyEnvOverrides(config: BacktestConfig): BacktestConfig {
  const next = { ...config };
  const capital = process.env.INITIAL_CAPITAL;
  if (capital) {
    const parsed = Number(capital);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new ConfigError('INITIAL_CAPITAL must be a positive number', { value: capital });
    }
    next.initialCapital = parsed;
  }
  const start = readDate(process.env.BACKTEST_START, 'BACKTEST_START');
  if (start) next.startDate = start;
  const end = readDate(process.env.BACKTEST_END, 'BACKTEST_END');
  if (end) next.endDate = end;
  if (process.env.MARKET_DB_PATH) next.databasePath = process.env.MARKET_DB_PATH;
  return next;
}

export function normalizeUniverse(raw: Record<string, unknown>): UniverseConfig {
  const symbols: string[] = [];
  const seen = new Set<string>();
  const list = Array.isArray(raw.symbols) ? raw.symbols : [];
  for (const entry of list) {
    if (typeof entry !== 'string') continue;
    const symbol = normalizeSymbol(entry);
    if (!isValidSymbol(symbol)) {
      throw new ConfigError(`universe.json: invalid symbol ${entry}`, { symbol: entry });
    }
    if (!seen.has(symbol)) {
      seen.add(symbol);
      symbols.push(symbol);
    }
  }
  return {
    name: typeof raw.name === 'string' ? raw.name : 'Universe',
    benchmark: typeof raw.benchmark === 'string' ? normalizeSymbol(raw.benchmark) : null,
    symbols,
  };
}

export function resolveConfigDir(): string {
  const override = process.env.CONFIG_DIR;
  if (override) {
    return isAbsolute(override) ? override : join(process.cwd(), override);
  }
  return join(process.cwd(), 'config');
}

export function loadConfig(configDir: string = resolveConfigDir()): AppConfig {
  const marketRules = normalizeMarketRules(readJsonFile(join(configDir, 'market_rules.json')));
  return {
    marketRules,
    costs: normalizeCosts(readJsonFile(join(configDir, 'costs.json')), marketRules.priceDecimals),
    consensus: normalizeConsensus(readJsonFile(join(configDir, 'consensus.json'))),
    backtest: normalizeBacktest(readJsonFile(join(configDir, 'backtest.json'))),
    universe: normalizeUniverse(readJsonFile(join(configDir, 'universe.json'))),
    configDir,
  };
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
