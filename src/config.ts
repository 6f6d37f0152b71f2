import 'dotenv/config';
import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors';
import type { SignalThresholds, ThresholdOverrides } from './types';
import { DEFAULT_THRESHOLDS, mergeThresholds } from './types';

/** An empty variable (`KEY=`) counts as unset rather than coercing to 0. */
function unsetIfBlank<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((v) => (typeof v === 'string' && v.trim() === '' ? undefined : v), schema);
}

const optionalNumber = unsetIfBlank(z.coerce.number().finite().optional());
const optionalPositive = unsetIfBlank(z.coerce.number().finite().positive().optional());

const booleanFlag = z
  .string()
  .optional()
  .transform((v) => ['true', '1', 'yes'].includes((v ?? '').trim().toLowerCase()));

/** Validate & normalize environment variables */
const EnvSchema = z.object({
  DB_PATH: z.string().min(1).default('data/signals.json'),
  LOOKBACK_DAYS: unsetIfBlank(z.coerce.number().int().positive().default(30)),
  LOG_FILE: z.string().optional(),
  DRY_RUN: booleanFlag,
  SMTP_HOST: z.string().optional(),
  SMTP_PORT: unsetIfBlank(z.coerce.number().int().positive().default(587)),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  RECIPIENT_EMAIL: unsetIfBlank(z.string().email().optional()),
  THRESHOLDS_FILE: z.string().optional(),
  CLUSTER_WINDOW_DAYS: unsetIfBlank(z.coerce.number().int().positive().optional()),
  OPTIONS_VOL_OI_RATIO: optionalPositive,
  OPTIONS_CALL_PUT_RATIO: optionalPositive,
  OPTIONS_LOOKBACK_TRADING_DAYS: unsetIfBlank(z.coerce.number().int().nonnegative().optional()),
  SI_MIN_DAYS_TO_COVER: optionalNumber,
  SI_MIN_INCREASE_PCT: optionalNumber,
  AVOID_BELOW_VALUE: unsetIfBlank(z.coerce.number().finite().nonnegative().optional()),
});

const amount = z.number().finite().nonnegative();

const ThresholdOverridesSchema = z
  .object({
    version: z.string().min(1),
    clusterWindowDays: z.number().int().positive(),
    minClusterInsiders: z.number().int().min(1),
    cSuiteKeywords: z.array(z.string().min(1)),
    crossSignalTiers: z.array(z.enum(['CONVICTION_BUY', 'STRONG_SIGNAL', 'MEAN_REVERSION', 'WATCH', 'AVOID'])),
    buy: z
      .object({
        convictionMinValue: amount,
        strongMinValue: amount,
        avoidBelowValue: amount,
        meanReversionDropPct: z.number().finite(),
        priceLookbackDays: z.number().int().positive(),
      })
      .partial()
      .strict(),
    sell: z
      .object({ tierMinValue: amount, tierMaxValue: amount, watchMinValue: amount })
      .partial()
      .strict(),
    options: z
      .object({
        volumeOiRatio: z.number().positive(),
        callPutRatio: z.number().positive(),
        lookbackTradingDays: z.number().int().nonnegative(),
      })
      .partial()
      .strict(),
    shortInterest: z
      .object({
        minDaysToCover: z.number().finite(),
        minIncreasePct: z.number().finite(),
        surgePct: z.number().finite(),
        decreasePct: z.number().finite(),
      })
      .partial()
      .strict(),
    macro: z
      .object({
        vixMax: z.number().finite(),
        flatCurveMax: z.number().finite(),
        creditSpreadMax: z.number().finite(),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export interface EmailSettings {
  smtpHost: string;
  smtpPort: number;
  user: string;
  pass: string;
  recipientEmail: string;
}

export interface AppConfig {
  dbPath: string;
  lookbackDays: number;
  logFile: string | null;
  dryRun: boolean;
  /** Null when SMTP is not fully configured. */
  email: EmailSettings | null;
  thresholds: SignalThresholds;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export function loadThresholdsFile(path: string): ThresholdOverrides {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read thresholds file ${path}: ${errorMessage(error)}`, { cause: error });
  }
  const parsed = ThresholdOverridesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid thresholds file ${path}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

function checkConsistency(t: SignalThresholds): void {
  const problems: string[] = [];
  if (t.buy.strongMinValue > t.buy.convictionMinValue) {
    problems.push('buy.strongMinValue must not exceed buy.convictionMinValue');
  }
  if (t.sell.tierMinValue > t.sell.tierMaxValue) {
    problems.push('sell.tierMinValue must not exceed sell.tierMaxValue');
  }
  if (t.sell.watchMinValue > t.sell.tierMinValue) {
    problems.push('sell.watchMinValue must not exceed sell.tierMinValue');
  }
  if (problems.length > 0) {
    throw new ConfigError(`Inconsistent thresholds: ${problems.join('; ')}`);
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`);
  }
  const e = parsed.data;

  const fromFile = e.THRESHOLDS_FILE ? loadThresholdsFile(e.THRESHOLDS_FILE) : {};
  const base = mergeThresholds(DEFAULT_THRESHOLDS, fromFile);

  // Individual variables win over the file
  const thresholds = mergeThresholds(base, {
    clusterWindowDays: e.CLUSTER_WINDOW_DAYS ?? base.clusterWindowDays,
    buy: { avoidBelowValue: e.AVOID_BELOW_VALUE ?? base.buy.avoidBelowValue },
    options: {
      volumeOiRatio: e.OPTIONS_VOL_OI_RATIO ?? base.options.volumeOiRatio,
      callPutRatio: e.OPTIONS_CALL_PUT_RATIO ?? base.options.callPutRatio,
      lookbackTradingDays: e.OPTIONS_LOOKBACK_TRADING_DAYS ?? base.options.lookbackTradingDays,
    },
    shortInterest: {
      minDaysToCover: e.SI_MIN_DAYS_TO_COVER ?? base.shortInterest.minDaysToCover,
      minIncreasePct: e.SI_MIN_INCREASE_PCT ?? base.shortInterest.minIncreasePct,
    },
  });
  checkConsistency(thresholds);

  const email =
    e.SMTP_HOST && e.SMTP_USER && e.RECIPIENT_EMAIL
      ? {
          smtpHost: e.SMTP_HOST,
          smtpPort: e.SMTP_PORT,
          user: e.SMTP_USER,
          pass: e.SMTP_PASS ?? '',
          recipientEmail: e.RECIPIENT_EMAIL,
        }
      : null;

  return {
    dbPath: e.DB_PATH,
    lookbackDays: e.LOOKBACK_DAYS,
    logFile: e.LOG_FILE || null,
    dryRun: e.DRY_RUN,
    email,
    thresholds,
  };
}
