import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigValidationError, createSilentLogger, type Bar } from '@equity-pilot/shared';
import { parseBacktestArgs, runBacktestCli } from './backtest-cli.js';
import { sberCrossoverBars } from '../test-utils/bars.js';

function toCsv(bars: readonly Bar[]): string {
  const rows = bars.map((b) => [b.timestamp, b.open, b.high, b.low, b.close, b.volume].join(','));
  return ['timestamp,open,high,low,close,volume', ...rows, ''].join('\n');
}

function configYaml(symbols: string[]): string {
  return [
    'trading:',
    `  symbols: [${symbols.join(', ')}]`,
    'strategies:',
    '  active_strategies: [trend]',
    '  trend: { ema_short: 5, ema_long: 12, macd_fast: 5, macd_slow: 12, macd_signal: 3 }',
    '',
  ].join('\n');
}

describe('parseBacktestArgs', () => {
  it('reads long and short options', () => {
    expect(parseBacktestArgs(['--config', 'a.yaml', '-d', 'bars', '--out=r.json'])).toEqual({
      config: 'a.yaml',
      data: 'bars',
      out: 'r.json',
    });
  });

  it('requires a data directory', () => {
    expect(() => parseBacktestArgs(['--config', 'a.yaml'])).toThrow('--data is required');
  });

  it('rejects unknown options', () => {
    expect(() => parseBacktestArgs(['--data', 'bars', '--fast'])).toThrow(ConfigValidationError);
  });
});

describe('runBacktestCli', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'backtest-cli-'));
    fs.writeFileSync(path.join(dir, 'SBER.csv'), toCsv(sberCrossoverBars()));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('runs the configured symbols and writes both reports', async () => {
    const config = path.join(dir, 'config.yaml');
    const out = path.join(dir, 'reports', 'run.json');
    fs.writeFileSync(config, configYaml(['SBER']));
    const lines: string[] = [];

    const result = await runBacktestCli(
      { config, data: dir, out },
      { env: {}, logger: createSilentLogger(), write: (l) => lines.push(l) }
    );

    expect(result.trades).toHaveLength(1);
    expect(lines).toContain('  Total Return:  -3.94%');

    const report: unknown = JSON.parse(fs.readFileSync(out, 'utf-8'));
    expect(report).toMatchObject({
      metadata: { symbols: ['SBER'], excluded: [] },
      metrics: { totalTrades: 1, losses: 1 },
    });
  });

  it('excludes a symbol without a CSV file', async () => {
    const config = path.join(dir, 'config.yaml');
    fs.writeFileSync(config, configYaml(['SBER', 'GAZP']));

    const result = await runBacktestCli(
      { config, data: dir },
      { env: {}, logger: createSilentLogger(), write: () => undefined }
    );

    expect(result.symbols).toEqual(['SBER']);
    expect(result.excluded).toEqual([
      {
        symbol: 'GAZP',
        code: 'DATA_INTEGRITY',
        message: `GAZP: bar #0 no data file ${path.join(dir, 'GAZP.csv')}`,
      },
    ]);
  });

  it('reports a missing configuration file', async () => {
    const run = runBacktestCli(
      { config: path.join(dir, 'missing.yaml'), data: dir },
      { env: {}, logger: createSilentLogger(), write: () => undefined }
    );

    await expect(run).rejects.toThrow(ConfigValidationError);
  });
});
