import nodemailer from 'nodemailer';
import type { Alert, DatabaseStats, RunSummary } from '../types';
import { errorMessage } from '../errors';

export interface EmailConfig {
  smtpHost: string;
  smtpPort: number;
  user: string;
  pass: string;
  recipientEmail: string;
  secure?: boolean;
}

export interface EmailContent {
  subject: string;
  text: string;
  html: string;
}

export interface SendResult {
  success: boolean;
  messageId?: string;
  error?: string;
}

export function formatUsd(value: number): string {
  if (value >= 1_000_000) return `$${(value / 1_000_000).toFixed(1)}M`;
  if (value >= 1_000) return `$${(value / 1_000).toFixed(0)}K`;
  return `$${value.toFixed(0)}`;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function tierLabel(alert: Alert): string {
  return alert.crossSignal && alert.crossSignal !== 'NO_CROSS'
    ? `${alert.tier} + ${alert.crossSignal}`
    : alert.tier;
}

function detailLine(alert: Alert): string {
  const s = alert.stats;
  const parts = [`${formatUsd(s.totalValue)} over ${s.transactionCount} trade(s)`, `${s.windowStart} to ${s.lastTradeDate}`];
  if (alert.kind === 'cluster') {
    parts.push(`${s.distinctInsiders ?? s.insiderNames.length} insiders${s.hasCSuite ? ' incl. C-suite' : ''}`);
  } else if (s.sellRole) {
    parts.push(s.sellRole);
  }
  if (typeof s.priceChangePct === 'number') parts.push(`30d ${s.priceChangePct.toFixed(1)}%`);
  if (typeof s.daysToCover === 'number') parts.push(`DTC ${s.daysToCover.toFixed(1)}`);
  return parts.join(' | ');
}

function countByCode(summary: RunSummary): [string, number][] {
  const counts = new Map<string, number>();
  for (const note of summary.notes) counts.set(note.code, (counts.get(note.code) ?? 0) + 1);
  return [...counts];
}

const count = (n: number) => n.toLocaleString('en-US');

export class EmailNotifier {
  private config: EmailConfig;
  private transporter: nodemailer.Transporter;

  constructor(config: EmailConfig) {
    this.config = config;
    this.transporter = nodemailer.createTransport({
      host: config.smtpHost,
      port: config.smtpPort,
      secure: config.secure ?? config.smtpPort === 465,
      auth: {
        user: config.user,
        pass: config.pass,
      },
    });
  }

  formatEmail(alerts: Alert[], summary: RunSummary): EmailContent {
    const actionable = alerts.filter((a) => a.actionable);
    const informational = alerts.filter((a) => !a.actionable);
    const warned = alerts.filter((a) => a.warnings.length > 0);

    const subject = `Insider signals ${summary.asOf}: ${actionable.length} actionable, ${informational.length} watch`;

    // Text version
    let text = `Insider Signal Alerts for ${summary.asOf}\n`;
    text += '='.repeat(50) + '\n';
    text += `Macro regime: ${summary.macro.label}`;
    if (summary.macro.flags.length > 0) text += ` (${summary.macro.flags.join('; ')})`;
    text += '\n\n';

    const section = (title: string, list: Alert[]) => {
      if (list.length === 0) return;
      text += `${title}\n` + '-'.repeat(40) + '\n';
      for (const alert of list) {
        text += `${alert.ticker} [${tierLabel(alert)}] ${alert.companyName ?? ''}`.trimEnd() + '\n';
        text += `  ${detailLine(alert)}\n`;
        text += `  Insiders: ${alert.stats.insiderNames.join(', ')}\n`;
      }
      text += '\n';
    };
    section('Actionable', actionable);
    section('Watch', informational);

    if (warned.length > 0) {
      text += 'WARNINGS\n' + '-'.repeat(40) + '\n';
      for (const alert of warned) {
        for (const w of alert.warnings) {
          text += `  ${alert.ticker} ${w.code}: ${w.message}\n`;
        }
      }
      text += '\n';
    }

    text += `Run ${summary.runId}: ${summary.processed} records, ${summary.malformed} malformed, `;
    text += `${summary.clustered} clusters, ${summary.sellEvents} sell events, ${summary.suppressed} already sent\n`;

    // HTML version
    const card = (alert: Alert) => `
  <div class="alert-card ${alert.kind}">
    <div style="display: flex; justify-content: space-between; align-items: center;">
      <div>
        <h2 style="margin: 0;">${escapeHtml(alert.ticker)}</h2>
        <p style="margin: 5px 0; color: #666;">${escapeHtml(alert.companyName ?? '')}</p>
      </div>
      <div class="tier-badge">${escapeHtml(tierLabel(alert))}</div>
    </div>
    <p>${escapeHtml(detailLine(alert))}</p>
    <p class="insiders">${alert.stats.insiderNames.map(escapeHtml).join(', ')}</p>
  </div>
`;

    let html = `
<!DOCTYPE html>
<html>
<head>
  <style>
    body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; max-width: 800px; margin: 0 auto; padding: 20px; }
    .header { background: #1f3a5f; color: white; padding: 20px; border-radius: 10px; margin-bottom: 20px; }
    .header h1 { margin: 0; }
    .alert-card { background: #f8f9fa; border-radius: 10px; padding: 20px; margin-bottom: 15px; border-left: 4px solid #2e7d32; }
    .alert-card.sell { border-left-color: #c62828; }
    .tier-badge { display: inline-block; background: #1f3a5f; color: white; padding: 5px 15px; border-radius: 20px; font-weight: bold; }
    .insiders { font-size: 13px; color: #666; }
    .warnings { background: #fff3cd; border: 1px solid #ffc107; padding: 15px; border-radius: 5px; margin-top: 20px; }
  </style>
</head>
<body>
  <div class="header">
    <h1>Insider Signal Alerts</h1>
    <p>${escapeHtml(summary.asOf)} &middot; Macro regime: ${summary.macro.label}</p>
  </div>
`;

    if (actionable.length > 0) html += `  <h2>Actionable</h2>\n${actionable.map(card).join('')}`;
    if (informational.length > 0) html += `  <h2>Watch</h2>\n${informational.map(card).join('')}`;

    if (warned.length > 0) {
      html += `
  <div class="warnings">
    <strong>Warnings</strong>
    <ul>
${warned
  .flatMap((a) => a.warnings.map((w) => `      <li><b>${escapeHtml(a.ticker)}</b> ${w.code}: ${escapeHtml(w.message)}</li>`))
  .join('\n')}
    </ul>
  </div>
`;
    }

    html += `
  <p style="text-align: center; color: #999; margin-top: 30px;">
    Run ${escapeHtml(summary.runId)} &middot; thresholds ${escapeHtml(summary.thresholdsVersion)}
  </p>
</body>
</html>
`;

    return { subject, text, html };
  }

  /** Per-run report for runs that produce no new alerts. */
  formatStatusReport(summary: RunSummary, stats: DatabaseStats): EmailContent {
    const subject = `Insider signal status ${summary.asOf}: ${summary.alerted} new alerts`;
    const range =
      stats.earliestTransaction && stats.latestTransaction
        ? `${stats.earliestTransaction} to ${stats.latestTransaction}`
        : 'n/a';
    const quality = countByCode(summary);

    const runLines = [
      `Records processed: ${count(summary.processed)} (${summary.malformed} malformed)`,
      `Clusters: ${summary.clustered} (${summary.contaminated} contaminated)`,
      `Sell events: ${summary.sellEvents}`,
      `New alerts: ${summary.alerted} (${summary.suppressed} already sent)`,
    ];
    const storeLines = [
      `Transactions: ${count(stats.totalTransactions)} (${count(stats.purchases)} buys, ${count(stats.sells)} sells)`,
      `Companies: ${count(stats.uniqueCompanies)} | Insiders: ${count(stats.uniqueInsiders)}`,
      `Date range: ${range}`,
      `Alerts sent to date: ${count(stats.alertsSent)}`,
    ];

    let text = `Insider Signal Status for ${summary.asOf}\n`;
    text += '='.repeat(50) + '\n';
    text += `Macro regime: ${summary.macro.label}`;
    if (summary.macro.flags.length > 0) text += ` (${summary.macro.flags.join('; ')})`;
    text += '\n\n';
    text += 'This run\n' + '-'.repeat(40) + '\n' + runLines.map((l) => `  ${l}\n`).join('') + '\n';
    text += 'Store\n' + '-'.repeat(40) + '\n' + storeLines.map((l) => `  ${l}\n`).join('') + '\n';
    if (quality.length > 0) {
      text += 'Data quality\n' + '-'.repeat(40) + '\n';
      text += quality.map(([code, n]) => `  ${n} x ${code}\n`).join('') + '\n';
    }
    text += `Run ${summary.runId} (thresholds ${summary.thresholdsVersion})\n`;

    const statBox = (value: number, label: string) => `
      <div class="stat-box"><div class="number">${count(value)}</div><div class="label">${label}</div></div>`;

    const html = `
<!DOCTYPE html>
<html>
<head>
  <style>
    body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; max-width: 700px; margin: 0 auto; padding: 20px; }
    .header { background: #1f3a5f; color: white; padding: 20px; border-radius: 10px; margin-bottom: 20px; }
    .header h1 { margin: 0; }
    .summary-grid { display: flex; gap: 15px; flex-wrap: wrap; margin-bottom: 20px; }
    .stat-box { background: #f8f9fa; border-radius: 8px; padding: 15px; text-align: center; flex: 1; min-width: 110px; }
    .stat-box .number { font-size: 28px; font-weight: bold; color: #1f3a5f; }
    .stat-box .label { font-size: 12px; color: #718096; text-transform: uppercase; }
    ul { background: #f8f9fa; border-radius: 8px; padding: 15px 30px; }
  </style>
</head>
<body>
  <div class="header">
    <h1>Insider Signal Status</h1>
    <p>${escapeHtml(summary.asOf)} &middot; Macro regime: ${summary.macro.label}</p>
  </div>
  <div class="summary-grid">${statBox(stats.totalTransactions, 'Transactions')}${statBox(stats.purchases, 'Purchases')}${statBox(stats.sells, 'Sells')}${statBox(stats.uniqueCompanies, 'Companies')}
  </div>
  <h2>This run</h2>
  <ul>
${runLines.map((l) => `    <li>${escapeHtml(l)}</li>`).join('\n')}
  </ul>
  <h2>Store</h2>
  <ul>
${storeLines.slice(1).map((l) => `    <li>${escapeHtml(l)}</li>`).join('\n')}
  </ul>
${
  quality.length > 0
    ? `  <h2>Data quality</h2>\n  <ul>\n${quality.map(([code, n]) => `    <li>${n} x ${code}</li>`).join('\n')}\n  </ul>\n`
    : ''
}
  <p style="text-align: center; color: #999; margin-top: 30px;">
    Run ${escapeHtml(summary.runId)} &middot; thresholds ${escapeHtml(summary.thresholdsVersion)}
  </p>
</body>
</html>
`;

    return { subject, text, html };
  }

  async send(content: EmailContent): Promise<SendResult> {
    try {
      const info = await this.transporter.sendMail({
        from: `"Insider Signals" <${this.config.user}>`,
        to: this.config.recipientEmail,
        subject: content.subject,
        text: content.text,
        html: content.html,
      });

      return {
        success: true,
        messageId: info.messageId,
      };
    } catch (error) {
      return {
        success: false,
        error: errorMessage(error),
      };
    }
  }

  async sendNotification(alerts: Alert[], summary: RunSummary): Promise<SendResult> {
    if (alerts.length === 0) {
      return {
        success: true,
        messageId: 'no-alerts',
      };
    }
    return this.send(this.formatEmail(alerts, summary));
  }

  async sendStatusReport(summary: RunSummary, stats: DatabaseStats): Promise<SendResult> {
    return this.send(this.formatStatusReport(summary, stats));
  }

  async verifyConnection(): Promise<boolean> {
    try {
      await this.transporter.verify();
      return true;
    } catch {
      return false;
    }
  }
}
