import type { InsiderRoles, InsiderTransaction, SellEvent, SellRole, SignalThresholds } from '../types';
import { DEFAULT_THRESHOLDS } from '../types';
import { byDateThenAccession, sortedAccessions } from './clusterDetector';
import { scanWindows } from './windowing';

export function sellRoleOf(roles: InsiderRoles): SellRole {
  if (roles.isOfficer && roles.isDirector) return 'OFFICER_AND_DIRECTOR';
  if (roles.isOfficer) return 'OFFICER_ONLY';
  if (roles.isDirector) return 'DIRECTOR_ONLY';
  return 'OTHER';
}

/**
 * Groups one insider's sells at one issuer into windows. Unlike buy
 * clusters there is no multi-insider requirement.
 */
export class SellSignalDetector {
  private thresholds: SignalThresholds;

  constructor(thresholds: SignalThresholds = DEFAULT_THRESHOLDS) {
    this.thresholds = thresholds;
  }

  detect(transactions: InsiderTransaction[]): SellEvent[] {
    const groups = new Map<string, InsiderTransaction[]>();
    for (const tx of transactions) {
      if (tx.transactionType !== 'SELL') continue;
      const key = `${tx.ticker}|${tx.insiderCIK}`;
      const list = groups.get(key) ?? [];
      list.push(tx);
      groups.set(key, list);
    }

    const events: SellEvent[] = [];
    for (const key of [...groups.keys()].sort()) {
      const sorted = [...(groups.get(key) ?? [])].sort(byDateThenAccession);
      const { windows } = scanWindows(
        sorted,
        (tx) => tx.transactionDate,
        this.thresholds.clusterWindowDays
      );
      for (const w of windows) {
        events.push(this.buildEvent(w.start, w.end, w.members));
      }
    }
    return events;
  }

  private buildEvent(start: string, end: string, members: InsiderTransaction[]): SellEvent {
    const first = members[0];
    const roles: InsiderRoles = {
      isOfficer: members.some((tx) => tx.roles.isOfficer),
      isDirector: members.some((tx) => tx.roles.isDirector),
      isTenPercentOwner: members.some((tx) => tx.roles.isTenPercentOwner),
    };
    const accessionNumbers = sortedAccessions(members);

    return {
      id: `${first.ticker}:${first.insiderCIK}:${start}:${accessionNumbers.join(',')}`,
      ticker: first.ticker,
      companyName: members.find((tx) => tx.companyName)?.companyName,
      insiderCIK: first.insiderCIK,
      insiderName: first.insiderName,
      insiderTitle: members.find((tx) => tx.insiderTitle)?.insiderTitle ?? '',
      transactions: members,
      windowStart: start,
      windowEnd: end,
      lastTradeDate: members[members.length - 1].transactionDate,
      totalValue: members.reduce((sum, tx) => sum + tx.totalValue, 0),
      roles,
      role: sellRoleOf(roles),
      accessionNumbers,
    };
  }
}
