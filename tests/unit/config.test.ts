import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { getConfig, loadConfig, resetConfig } from '@/core/config';
import { ConfigError } from '@/core/errors';
import { getUniverse, getUniverseInfo, isInUniverse } from '@/core/universe';
import { A_SHARE_RULES } from '@/market/rules';

const ENV_KEYS = ['CONFIG_DIR', 'INITIAL_CAPITAL', 'BACKTEST_START', 'BACKTEST_END', 'MARKET_DB_PATH'];

let tempDir: string;
const originalEnv: Record<string, string | undefined> = {};

function writeConfig(file: string, content: unknown): void {
  writeFileSync(join(tempDir, file), JSON.stringify(content));
}

describe('config loader', () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'config-test-'));
    ENV_KEYS.forEach((key) => {
      originalEnv[key] = process.env[key];
      delete process.env[key];
    });
  });

  afterEach(() => {
    resetConfig();
    rmSync(tempDir, { recursive: true, force: true });
    ENV_KEYS.forEach((key) => {
      if (originalEnv[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = originalEnv[key];
      }
    });
  });

  it('falls back to defaults when files are missing', () => {
    const config = loadConfig(tempDir);
    expect(config.marketRules).toEqual(A_SHARE_RULES);
    expect(config.costs.transferFeeVenues).toEqual(['SH']);
    expect(config.backtest.initialCapital).toBe(1_000_000);
    expect(config.backtest.fillPriceField).toBe('close');
    expect(config.universe.symbols).toEqual([]);
  });

  it('merges partial files over the defaults', () => {
    writeConfig('market_rules.json', { lotSize: 200, bandRatios: { main: 0.08 } });
    writeConfig('costs.json', { minCommission: 0, transferFeeVenues: ['SH', 'SZ'] });
    const config = loadConfig(tempDir);
    expect(config.marketRules.lotSize).toBe(200);
    expect(config.marketRules.bandRatios.main).toBe(0.08);
    expect(config.marketRules.bandRatios.scienceInnovation).toBe(0.2);
    expect(config.costs.minCommission).toBe(0);
    expect(config.costs.transferFeeVenues).toEqual(['SH', 'SZ']);
    expect(config.costs.priceDecimals).toBe(2);
  });

  it('normalizes and de-duplicates the universe', () => {
    writeConfig('universe.json', { name: 'Test', symbols: ['600519.sh', '600519.SH', ' 000001.sz'] });
    const config = loadConfig(tempDir);
    expect(config.universe.symbols).toEqual(['600519.SH', '000001.SZ']);
    expect(isInUniverse('000001.sz', config)).toBe(true);
    expect(getUniverse(config)).toHaveLength(2);
    expect(getUniverseInfo(config)).toEqual({ name: 'Test', benchmark: null, symbolCount: 2 });
  });

  it('rejects invalid values with ConfigError', () => {
    writeConfig('market_rules.json', { lotSize: 0 });
    expect(() => loadConfig(tempDir)).toThrow(ConfigError);
  });

  it('rejects an unknown fill price field', () => {
    writeConfig('backtest.json', { fillPriceField: 'vwap' });
    expect(() => loadConfig(tempDir)).toThrow(ConfigError);
  });

  it('rejects malformed JSON', () => {
    writeFileSync(join(tempDir, 'consensus.json'), '{ not json');
    expect(() => loadConfig(tempDir)).toThrow(ConfigError);
  });

  it('rejects invalid universe symbols', () => {
    writeConfig('universe.json', { symbols: ['AAPL'] });
    expect(() => loadConfig(tempDir)).toThrow(ConfigError);
  });

  it('applies environment overrides to the backtest section', () => {
    writeConfig('backtest.json', { initialCapital: 500_000, startDate: '2023-01-03' });
    process.env.INITIAL_CAPITAL = '250000';
    process.env.BACKTEST_END = '2023-06-30';
    process.env.MARKET_DB_PATH = ':memory:';
    const config = loadConfig(tempDir);
    expect(config.backtest.initialCapital).toBe(250_000);
    expect(config.backtest.startDate).toBe('2023-01-03');
    expect(config.backtest.endDate).toBe('2023-06-30');
    expect(config.backtest.databasePath).toBe(':memory:');
  });

  it('rejects a malformed date override', () => {
    process.env.BACKTEST_START = '2023/01/03';
    expect(() => loadConfig(tempDir)).toThrow(ConfigError);
  });

  it('caches getConfig until reset and honours CONFIG_DIR', () => {
    writeConfig('backtest.json', { maxPositions: 3 });
    process.env.CONFIG_DIR = tempDir;
    resetConfig();
    const first = getConfig();
    expect(first.backtest.maxPositions).toBe(3);
    expect(getConfig()).toBe(first);

    writeConfig('backtest.json', { maxPositions: 4 });
    expect(getConfig().backtest.maxPositions).toBe(3);
    resetConfig();
    expect(getConfig().backtest.maxPositions).toBe(4);
  });

  it('loads the shipped configuration', () => {
    const config = loadConfig(join(process.cwd(), 'config'));
    expect(config.marketRules.name).toBe('a-share');
    expect(config.universe.symbols.length).toBeGreaterThan(0);
  });
});
