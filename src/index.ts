import { join, dirname, isAbsolute } from 'path';
import { fileURLToPath } from 'url';
import { loadConfig } from './config';
import { Database } from './db/database';
import { SignalEngine } from './analysis/signalEngine';
import { deliverRun } from './delivery';
import { EmailNotifier, formatUsd } from './email/notifier';
import { errorMessage } from './errors';
import { createLogger, setLogFile } from './logger';
import type { RunResult } from './types';

const __dirname = dirname(fileURLToPath(import.meta.url));
const log = createLogger('runner');

function printResult({ alerts, candidates, summary }: RunResult) {
  log.info('='.repeat(50));
  log.info(
    `Processed ${summary.processed} record(s): ${summary.malformed} malformed, ` +
      `${summary.clustered} cluster(s), ${summary.sellEvents} sell event(s), ${summary.contaminated} contaminated`
  );
  log.info(`Macro regime: ${summary.macro.label}${summary.macro.flags.length ? ` (${summary.macro.flags.join('; ')})` : ''}`);

  for (const c of candidates) {
    const cross = c.crossSignal && c.crossSignal !== 'NO_CROSS' ? ` + ${c.crossSignal}` : '';
    const sent = alerts.some((a) => a.signalId === c.signalId) ? 'NEW ' : '';
    log.info(`  ${sent}${c.ticker} [${c.tier}${cross}] ${formatUsd(c.stats.totalValue)} ${c.stats.insiderNames.join(', ')}`);
    for (const w of c.warnings) log.warn(`    ${w.code}: ${w.message}`);
  }

  const byCode = new Map<string, number>();
  for (const note of summary.notes) byCode.set(note.code, (byCode.get(note.code) ?? 0) + 1);
  for (const [code, count] of byCode) log.info(`  data quality: ${count} x ${code}`);
}

async function main() {
  const config = loadConfig();
  if (config.logFile) {
    setLogFile(isAbsolute(config.logFile) ? config.logFile : join(__dirname, '..', config.logFile));
  }

  log.info(`Insider signal engine (thresholds ${config.thresholds.version})${config.dryRun ? ' [dry run]' : ''}`);

  const db = new Database(config.dbPath);
  await db.initialize();

  if (!(await db.acquireRunLock())) {
    log.warn('Another run holds the lock, exiting');
    await db.close();
    return;
  }

  try {
    const stats = await db.getStats();
    log.info(
      `Store: ${stats.totalTransactions} transactions (${stats.purchases} buys, ${stats.sells} sells), ` +
        `${stats.alertsSent} alerts sent to date`
    );

    const asOf = new Date().toISOString().slice(0, 10);
    const transactions = await db.getTransactions(config.lookbackDays, asOf);
    const tickers = [...new Set(transactions.map((tx) => tx.ticker.toUpperCase()))];
    const market = await db.getMarketData(tickers, asOf);

    const engine = new SignalEngine(db, {
      thresholds: config.thresholds,
      logger: createLogger('engine'),
      dryRun: config.dryRun,
      deferRecording: true,
    });
    const result = await engine.run({ transactions, market, asOf });
    printResult(result);

    if (config.dryRun) {
      log.info('Dry run: alerts not recorded, e-mail not sent');
    } else {
      const notifier = config.email ? new EmailNotifier(config.email) : null;
      const outcome = await deliverRun(engine, notifier, result, await db.getStats(), log);
      if (outcome.status === 'failed') {
        for (const signature of outcome.pending) log.warn(`  unsent: ${signature}`);
        process.exitCode = 1;
      }
    }
  } finally {
    await db.releaseRunLock();
    await db.close();
  }

  log.info('Run complete');
}

main().catch((error) => {
  log.error(errorMessage(error));
  process.exitCode = 1;
});
