import type { Cluster, DataQualityNote, InsiderTransaction, SignalThresholds } from '../types';
import { DEFAULT_THRESHOLDS } from '../types';
import { scanWindows } from './windowing';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Title-based C-suite check. Keywords match on word boundaries so that
 * "Director" is not read as "CTO", and "Vice President" is not a President.
 */
export function isCSuiteTitle(title: string, keywords: string[]): boolean {
  if (!title || keywords.length === 0) return false;
  const pattern = new RegExp(`\\b(?:${keywords.map(escapeRegExp).join('|')})\\b`, 'i');
  return pattern.test(title.replace(/\b(?:senior\s+|executive\s+)?vice\s+president\b/gi, ''));
}

export function byDateThenAccession(a: InsiderTransaction, b: InsiderTransaction): number {
  if (a.transactionDate !== b.transactionDate) {
    return a.transactionDate < b.transactionDate ? -1 : 1;
  }
  if (a.accessionNumber !== b.accessionNumber) {
    return a.accessionNumber < b.accessionNumber ? -1 : 1;
  }
  return a.insiderCIK < b.insiderCIK ? -1 : a.insiderCIK > b.insiderCIK ? 1 : 0;
}

export function sortedAccessions(transactions: InsiderTransaction[]): string[] {
  return [...new Set(transactions.map((tx) => tx.accessionNumber))].sort();
}

export interface ClusterDetection {
  clusters: Cluster[];
  residue: InsiderTransaction[];
  notes: DataQualityNote[];
}

export class ClusterDetector {
  private thresholds: SignalThresholds;

  constructor(thresholds: SignalThresholds = DEFAULT_THRESHOLDS) {
    this.thresholds = thresholds;
  }

  /** Clusters the BUY transactions of any number of issuers. */
  detect(transactions: InsiderTransaction[]): ClusterDetection {
    const byTicker = new Map<string, InsiderTransaction[]>();
    for (const tx of transactions) {
      if (tx.transactionType !== 'BUY') continue;
      const list = byTicker.get(tx.ticker) ?? [];
      list.push(tx);
      byTicker.set(tx.ticker, list);
    }

    const result: ClusterDetection = { clusters: [], residue: [], notes: [] };
    for (const ticker of [...byTicker.keys()].sort()) {
      const issuer = this.detectForIssuer(byTicker.get(ticker) ?? []);
      result.clusters.push(...issuer.clusters);
      result.residue.push(...issuer.residue);
      result.notes.push(...issuer.notes);
    }
    return result;
  }

  detectForIssuer(buys: InsiderTransaction[]): ClusterDetection {
    const sorted = [...buys].sort(byDateThenAccession);
    const { minClusterInsiders, clusterWindowDays } = this.thresholds;

    const { windows, residue } = scanWindows(
      sorted,
      (tx) => tx.transactionDate,
      clusterWindowDays,
      (members) => new Set(members.map((tx) => tx.insiderCIK)).size >= minClusterInsiders
    );

    const clusters = windows.map((w) => this.buildCluster(w.start, w.end, w.members));

    const notes: DataQualityNote[] = [];
    if (residue.length > 0) {
      const insiders = new Set(residue.map((tx) => tx.insiderName));
      notes.push({
        code: 'SINGLE_INSIDER_RESIDUE',
        ticker: residue[0].ticker,
        message: `${residue.length} buy(s) by ${[...insiders].join(', ')} did not form a cluster`,
      });
    }

    return { clusters, residue, notes };
  }

  private buildCluster(start: string, end: string, members: InsiderTransaction[]): Cluster {
    const ticker = members[0].ticker;
    const accessionNumbers = sortedAccessions(members);
    const insiderCIKs = [...new Set(members.map((tx) => tx.insiderCIK))].sort();

    return {
      id: `${ticker}:${start}:${accessionNumbers.join(',')}`,
      ticker,
      companyName: members.find((tx) => tx.companyName)?.companyName,
      transactions: members,
      windowStart: start,
      windowEnd: end,
      firstTradeDate: members[0].transactionDate,
      lastTradeDate: members[members.length - 1].transactionDate,
      totalValue: members.reduce((sum, tx) => sum + tx.totalValue, 0),
      distinctInsiders: insiderCIKs.length,
      insiderCIKs,
      hasCSuite: members.some((tx) =>
        isCSuiteTitle(tx.insiderTitle, this.thresholds.cSuiteKeywords)
      ),
      accessionNumbers,
    };
  }
}
