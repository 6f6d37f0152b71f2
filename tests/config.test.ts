import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig } from '../src/config';
import { ConfigError } from '../src/errors';
import { DEFAULT_THRESHOLDS } from '../src/types';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'signals-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function thresholdsFile(contents: unknown): string {
    const path = join(dir, 'thresholds.json');
    writeFileSync(path, JSON.stringify(contents));
    return path;
  }

  it('should fall back to defaults', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      dbPath: 'data/signals.json',
      lookbackDays: 30,
      logFile: null,
      dryRun: false,
      email: null,
      thresholds: DEFAULT_THRESHOLDS,
    });
  });

  it('should apply threshold variables', () => {
    const config = loadConfig({
      CLUSTER_WINDOW_DAYS: '10',
      OPTIONS_VOL_OI_RATIO: '5.5',
      SI_MIN_DAYS_TO_COVER: '4',
      AVOID_BELOW_VALUE: '25000',
      DRY_RUN: 'true',
    });

    expect(config.dryRun).toBe(true);
    expect(config.thresholds.clusterWindowDays).toBe(10);
    expect(config.thresholds.options.volumeOiRatio).toBe(5.5);
    expect(config.thresholds.options.callPutRatio).toBe(1.25);
    expect(config.thresholds.shortInterest.minDaysToCover).toBe(4);
    expect(config.thresholds.buy.avoidBelowValue).toBe(25_000);
  });

  it('should configure e-mail only when SMTP is complete', () => {
    expect(loadConfig({ SMTP_HOST: 'smtp.test.com' }).email).toBeNull();

    const config = loadConfig({
      SMTP_HOST: 'smtp.test.com',
      SMTP_USER: 'bot@test.com',
      SMTP_PASS: 'test-secret',
      RECIPIENT_EMAIL: 'me@test.com',
    });

    expect(config.email).toEqual({
      smtpHost: 'smtp.test.com',
      smtpPort: 587,
      user: 'bot@test.com',
      pass: 'test-secret',
      recipientEmail: 'me@test.com',
    });
  });

  it('should treat empty variables as unset', () => {
    const config = loadConfig({
      SI_MIN_DAYS_TO_COVER: '',
      OPTIONS_VOL_OI_RATIO: ' ',
      LOOKBACK_DAYS: '',
      SMTP_PORT: '',
      RECIPIENT_EMAIL: '',
    });

    expect(config.thresholds.shortInterest.minDaysToCover).toBe(DEFAULT_THRESHOLDS.shortInterest.minDaysToCover);
    expect(config.thresholds.options.volumeOiRatio).toBe(DEFAULT_THRESHOLDS.options.volumeOiRatio);
    expect(config.lookbackDays).toBe(30);
    expect(config.email).toBeNull();
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ LOOKBACK_DAYS: 'abc' })).toThrow(ConfigError);
    expect(() => loadConfig({ OPTIONS_VOL_OI_RATIO: '-1' })).toThrow(ConfigError);
    expect(() => loadConfig({ RECIPIENT_EMAIL: 'not-an-address' })).toThrow(ConfigError);
  });

  describe('thresholds file', () => {
    it('should merge a partial file over the defaults', () => {
      const config = loadConfig({
        THRESHOLDS_FILE: thresholdsFile({ version: 'test-1', sell: { tierMinValue: 100_000 } }),
      });

      expect(config.thresholds.version).toBe('test-1');
      expect(config.thresholds.sell).toEqual({
        tierMinValue: 100_000,
        tierMaxValue: 5_000_000,
        watchMinValue: 50_000,
      });
    });

    it('should let variables win over the file', () => {
      const config = loadConfig({
        THRESHOLDS_FILE: thresholdsFile({ options: { volumeOiRatio: 9 } }),
        OPTIONS_VOL_OI_RATIO: '6',
      });

      expect(config.thresholds.options.volumeOiRatio).toBe(6);
    });

    it('should reject unknown keys and inconsistent ranges', () => {
      expect(() => loadConfig({ THRESHOLDS_FILE: thresholdsFile({ clusterWindow: 14 }) })).toThrow(ConfigError);
      expect(() =>
        loadConfig({ THRESHOLDS_FILE: thresholdsFile({ sell: { tierMinValue: 6_000_000 } }) })
      ).toThrow('sell.tierMinValue must not exceed sell.tierMaxValue');
    });

    it('should report a missing file', () => {
      expect(() => loadConfig({ THRESHOLDS_FILE: join(dir, 'absent.json') })).toThrow(ConfigError);
    });
  });
});
