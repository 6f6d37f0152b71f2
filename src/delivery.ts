import type { SignalEngine } from './analysis/signalEngine';
import type { EmailNotifier } from './email/notifier';
import type { Logger } from './logger';
import type { Alert, DatabaseStats, RunResult } from './types';

export type DeliveryStatus = 'alerts-sent' | 'status-sent' | 'logged-only' | 'failed';

export interface DeliveryOutcome {
  status: DeliveryStatus;
  /** Alerts now recorded as sent. */
  recorded: Alert[];
  /** Signatures left unrecorded because delivery failed; the next run retries them. */
  pending: string[];
  messageId?: string;
  error?: string;
}

/**
 * Delivers the alerts of a deferred run and records them only once the
 * e-mail has gone out. Runs with no new alerts send a status report instead.
 * Without a notifier the log is the only channel, so alerts are recorded
 * straight away.
 */
export async function deliverRun(
  engine: SignalEngine,
  notifier: EmailNotifier | null,
  result: RunResult,
  stats: DatabaseStats,
  logger: Logger
): Promise<DeliveryOutcome> {
  const { alerts, summary } = result;

  if (!notifier) {
    logger.info('SMTP not configured: e-mail not sent');
    const recorded = await engine.record(alerts);
    return { status: 'logged-only', recorded, pending: [] };
  }

  if (alerts.length === 0) {
    const sent = await notifier.sendStatusReport(summary, stats);
    if (!sent.success) {
      logger.error(`Failed to send status report: ${sent.error}`);
      return { status: 'failed', recorded: [], pending: [], error: sent.error };
    }
    logger.info(`Status report sent (${sent.messageId})`);
    return { status: 'status-sent', recorded: [], pending: [], messageId: sent.messageId };
  }

  const sent = await notifier.sendNotification(alerts, summary);
  if (!sent.success) {
    const pending = alerts.map((a) => a.signature);
    logger.error(`Failed to send e-mail, ${pending.length} alert(s) left unrecorded: ${sent.error}`);
    return { status: 'failed', recorded: [], pending, error: sent.error };
  }

  logger.info(`E-mail sent (${sent.messageId})`);
  const recorded = await engine.record(alerts);
  return { status: 'alerts-sent', recorded, pending: [], messageId: sent.messageId };
}
