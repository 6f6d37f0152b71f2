import type { Alert } from './signals';

/**
 * Alert history the deduplicator writes through. `insertAlertsIfAbsent` is
 * all-or-nothing: it records every alert whose signature is new in one
 * write, or nothing if that write fails, and returns the alerts it recorded.
 */
export interface AlertStore {
  ping(): Promise<void>;
  hasAlert(signature: string): Promise<boolean>;
  insertAlertsIfAbsent(alerts: Alert[]): Promise<Alert[]>;
}

export interface DatabaseStats {
  totalTransactions: number;
  purchases: number;
  sells: number;
  uniqueCompanies: number;
  uniqueInsiders: number;
  earliestTransaction: string | null;
  latestTransaction: string | null;
  alertsSent: number;
}
