import { createHash } from 'crypto';
import type { Alert, AlertStore, SignalCandidate, SignalKind } from '../types';

export function signatureOf(ticker: string, kind: SignalKind, accessionNumbers: string[]): string {
  const ids = [...new Set(accessionNumbers)].sort();
  return `${ticker}|${kind}|${ids.join(',')}`;
}

export function alertIdOf(signature: string): string {
  return createHash('sha256').update(signature).digest('hex');
}

/**
 * The idempotence boundary: one Alert per signature, ever. The store's
 * batch insert-if-absent is the arbiter, so concurrent callers cannot
 * double-emit.
 */
export class AlertDeduplicator {
  private store: AlertStore;
  private now: () => Date;

  constructor(store: AlertStore, now: () => Date = () => new Date()) {
    this.store = store;
    this.now = now;
  }

  toAlert(candidate: SignalCandidate): Alert {
    const signature = signatureOf(candidate.ticker, candidate.kind, candidate.accessionNumbers);
    return {
      ...candidate,
      id: alertIdOf(signature),
      signature,
      createdAt: this.now().toISOString(),
    };
  }

  /** The new Alert, or null when the signature was already alerted. */
  async emit(candidate: SignalCandidate): Promise<Alert | null> {
    const [alert] = await this.emitAll([candidate]);
    return alert ?? null;
  }

  /**
   * Checks every candidate first, then records the new ones in a single
   * store write, so a failed write leaves no signature used up.
   */
  async emitAll(candidates: SignalCandidate[]): Promise<Alert[]> {
    return this.record(await this.previewAll(candidates));
  }

  /** Like `emit`, but records nothing. */
  async preview(candidate: SignalCandidate): Promise<Alert | null> {
    const alert = this.toAlert(candidate);
    return (await this.store.hasAlert(alert.signature)) ? null : alert;
  }

  async previewAll(candidates: SignalCandidate[]): Promise<Alert[]> {
    const previews = await Promise.all(candidates.map((c) => this.preview(c)));
    return previews.filter((a): a is Alert => a !== null);
  }

  /** Records previewed alerts once they are delivered; returns those not already stored. */
  async record(alerts: Alert[]): Promise<Alert[]> {
    if (alerts.length === 0) return [];
    return this.store.insertAlertsIfAbsent(alerts);
  }

  async wasAlerted(candidate: SignalCandidate): Promise<boolean> {
    return this.store.hasAlert(
      signatureOf(candidate.ticker, candidate.kind, candidate.accessionNumbers)
    );
  }
}
