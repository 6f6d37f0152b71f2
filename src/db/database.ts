import { Low, Memory } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { join, dirname, isAbsolute } from 'path';
import { fileURLToPath } from 'url';
import { mkdir, open, stat, unlink } from 'fs/promises';
import type {
  Alert,
  AlertStore,
  DatabaseStats,
  MacroSnapshot,
  MarketData,
  OptionsSnapshot,
  PricePoint,
  RawInsiderTransaction,
  ShortInterestSnapshot,
} from '../types';
import { addDays } from '../analysis/windowing';
import { StoreUnavailableError, errorMessage } from '../errors';
import { Mutex } from './mutex';

interface DatabaseSchema {
  insider_transactions: RawInsiderTransaction[];
  sent_alerts: Alert[];
  stock_prices: Record<string, PricePoint[]>;
  options_snapshots: Record<string, OptionsSnapshot[]>;
  short_interest: Record<string, ShortInterestSnapshot[]>;
  macro_snapshots: MacroSnapshot[];
  metadata: {
    lastUpdated: string;
    version: string;
  };
}

function defaultData(): DatabaseSchema {
  return {
    insider_transactions: [],
    sent_alerts: [],
    stock_prices: {},
    options_snapshots: {},
    short_interest: {},
    macro_snapshots: [],
    metadata: {
      lastUpdated: new Date().toISOString(),
      version: '1.0.0',
    },
  };
}

export interface DatabaseOptions {
  /** A run lock older than this is treated as left over from a crashed run. */
  lockStaleMs?: number;
}

/** Merges snapshots by date, the newer write winning. */
function mergeByDate<T extends { date: string }>(existing: T[], incoming: T[]): T[] {
  const byDate = new Map(existing.map((s) => [s.date, s]));
  for (const s of incoming) byDate.set(s.date, s);
  return [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/** Market data is keyed by the upper-case symbol, as validated transactions are. */
function tickerKey(ticker: string): string {
  return ticker.trim().toUpperCase();
}

function withTicker<T extends { ticker: string }>(ticker: string, snapshots: T[]): T[] {
  return snapshots.map((s) => ({ ...s, ticker }));
}

function transactionDay(tx: RawInsiderTransaction): string {
  return tx.transactionDate ?? tx.filedAt.slice(0, 10);
}

export class Database implements AlertStore {
  private db: Low<DatabaseSchema> | null = null;
  private dbPath: string;
  private lockStaleMs: number;
  private writeLock = new Mutex();

  constructor(dbPath: string = 'data/signals.json', options: DatabaseOptions = {}) {
    if (dbPath === ':memory:' || isAbsolute(dbPath)) {
      this.dbPath = dbPath;
    } else {
      const __dirname = dirname(fileURLToPath(import.meta.url));
      this.dbPath = join(__dirname, '../../', dbPath);
    }
    this.lockStaleMs = options.lockStaleMs ?? 10 * 60 * 1000;
  }

  private get inMemory(): boolean {
    return this.dbPath === ':memory:';
  }

  private get lockPath(): string {
    return `${this.dbPath}.lock`;
  }

  async initialize(): Promise<void> {
    try {
      if (this.inMemory) {
        this.db = new Low<DatabaseSchema>(new Memory<DatabaseSchema>(), defaultData());
      } else {
        await mkdir(dirname(this.dbPath), { recursive: true });
        this.db = new Low<DatabaseSchema>(new JSONFile<DatabaseSchema>(this.dbPath), defaultData());
        await this.db.read();
        await this.db.write();
      }
    } catch (error) {
      this.db = null;
      throw new StoreUnavailableError(`Could not open store at ${this.dbPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async close(): Promise<void> {
    if (this.db && !this.inMemory) {
      await this.persist(this.db);
    }
    this.db = null;
  }

  async getTables(): Promise<string[]> {
    return [
      'insider_transactions',
      'sent_alerts',
      'stock_prices',
      'options_snapshots',
      'short_interest',
      'macro_snapshots',
    ];
  }

  private requireDb(): Low<DatabaseSchema> {
    if (!this.db) throw new StoreUnavailableError('Database not initialized');
    return this.db;
  }

  private async persist(db: Low<DatabaseSchema>): Promise<void> {
    db.data.metadata.lastUpdated = new Date().toISOString();
    if (this.inMemory) return;
    try {
      await db.write();
    } catch (error) {
      throw new StoreUnavailableError(`Could not write ${this.dbPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async refresh(db: Low<DatabaseSchema>): Promise<void> {
    if (this.inMemory) return;
    try {
      await db.read();
    } catch (error) {
      throw new StoreUnavailableError(`Could not read ${this.dbPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  // Run lock

  /**
   * Takes an exclusive lock file so overlapping scheduled runs do not
   * interleave. Returns false when another live run holds it.
   */
  async acquireRunLock(): Promise<boolean> {
    if (this.inMemory) return true;
    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        const handle = await open(this.lockPath, 'wx');
        await handle.writeFile(`${process.pid} ${new Date().toISOString()}\n`);
        await handle.close();
        return true;
      } catch (error) {
        if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) {
          throw new StoreUnavailableError(`Could not create run lock: ${errorMessage(error)}`, {
            cause: error,
          });
        }
        const info = await stat(this.lockPath);
        if (Date.now() - info.mtimeMs < this.lockStaleMs) return false;
        await unlink(this.lockPath);
      }
    }
    return false;
  }

  async releaseRunLock(): Promise<void> {
    if (this.inMemory) return;
    try {
      await unlink(this.lockPath);
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
    }
  }

  // Insider Transactions
  private getTransactionKey(tx: RawInsiderTransaction): string {
    return [
      tx.accessionNumber,
      tx.insiderCIK,
      tx.transactionDate ?? '',
      tx.transactionType,
      tx.shares ?? '',
      tx.pricePerShare ?? '',
    ].join('-');
  }

  async saveInsiderTransactions(transactions: RawInsiderTransaction[]): Promise<number> {
    const db = this.requireDb();
    return this.writeLock.runExclusive(async () => {
      const keys = new Set(db.data.insider_transactions.map((tx) => this.getTransactionKey(tx)));
      let added = 0;
      for (const tx of transactions) {
        const key = this.getTransactionKey(tx);
        if (keys.has(key)) continue;
        keys.add(key);
        db.data.insider_transactions.push({ ...tx });
        added++;
      }
      if (added > 0) await this.persist(db);
      return added;
    });
  }

  async saveInsiderTransaction(transaction: RawInsiderTransaction): Promise<boolean> {
    return (await this.saveInsiderTransactions([transaction])) === 1;
  }

  /** Transactions traded (or, when undated, filed) within `lookbackDays` of `asOf`. */
  async getTransactions(lookbackDays: number, asOf: string): Promise<RawInsiderTransaction[]> {
    const db = this.requireDb();
    const cutoff = addDays(asOf, -lookbackDays);
    return db.data.insider_transactions.filter((tx) => {
      const day = transactionDay(tx);
      return day >= cutoff && day <= asOf;
    });
  }

  // Market data
  async saveStockPrices(ticker: string, prices: PricePoint[]): Promise<void> {
    const db = this.requireDb();
    const key = tickerKey(ticker);
    await this.writeLock.runExclusive(async () => {
      db.data.stock_prices[key] = mergeByDate(db.data.stock_prices[key] ?? [], prices);
      await this.persist(db);
    });
  }

  async saveOptionsSnapshots(ticker: string, snapshots: OptionsSnapshot[]): Promise<void> {
    const db = this.requireDb();
    const key = tickerKey(ticker);
    await this.writeLock.runExclusive(async () => {
      db.data.options_snapshots[key] = mergeByDate(
        db.data.options_snapshots[key] ?? [],
        withTicker(key, snapshots)
      );
      await this.persist(db);
    });
  }

  async saveShortInterest(ticker: string, snapshots: ShortInterestSnapshot[]): Promise<void> {
    const db = this.requireDb();
    const key = tickerKey(ticker);
    await this.writeLock.runExclusive(async () => {
      db.data.short_interest[key] = mergeByDate(
        db.data.short_interest[key] ?? [],
        withTicker(key, snapshots)
      );
      await this.persist(db);
    });
  }

  async saveMacroSnapshot(snapshot: MacroSnapshot): Promise<void> {
    const db = this.requireDb();
    await this.writeLock.runExclusive(async () => {
      db.data.macro_snapshots = mergeByDate(db.data.macro_snapshots, [snapshot]);
      await this.persist(db);
    });
  }

  /** Read-only copies of everything the engine needs for `tickers`, keyed upper-case. */
  async getMarketData(tickers: string[], asOf: string): Promise<MarketData> {
    const db = this.requireDb();
    const market: MarketData = { prices: {}, options: {}, shortInterest: {}, macro: null };

    for (const key of new Set(tickers.map(tickerKey))) {
      market.prices[key] = (db.data.stock_prices[key] ?? []).filter((p) => p.date <= asOf);
      market.options[key] = [...(db.data.options_snapshots[key] ?? [])];
      market.shortInterest[key] = (db.data.short_interest[key] ?? []).filter(
        (s) => s.date <= asOf
      );
    }

    const macro = db.data.macro_snapshots.filter((m) => m.date <= asOf);
    market.macro = macro.length > 0 ? { ...macro[macro.length - 1] } : null;
    return market;
  }

  // Sent alerts
  async ping(): Promise<void> {
    const db = this.requireDb();
    await this.refresh(db);
  }

  async hasAlert(signature: string): Promise<boolean> {
    const db = this.requireDb();
    return this.writeLock.runExclusive(async () => {
      await this.refresh(db);
      return db.data.sent_alerts.some((a) => a.signature === signature);
    });
  }

  /**
   * Records the alerts whose signatures are not yet stored, in one write.
   * If the write fails none of them stay recorded.
   */
  async insertAlertsIfAbsent(alerts: Alert[]): Promise<Alert[]> {
    const db = this.requireDb();
    return this.writeLock.runExclusive(async () => {
      await this.refresh(db);
      const seen = new Set(db.data.sent_alerts.map((a) => a.signature));
      const inserted: Alert[] = [];
      for (const alert of alerts) {
        if (seen.has(alert.signature)) continue;
        seen.add(alert.signature);
        inserted.push(alert);
      }
      if (inserted.length === 0) return inserted;

      const before = db.data.sent_alerts.length;
      db.data.sent_alerts.push(...inserted);
      try {
        await this.persist(db);
      } catch (error) {
        db.data.sent_alerts.splice(before);
        throw error;
      }
      return inserted;
    });
  }

  async getAlerts(lookbackDays?: number): Promise<Alert[]> {
    const db = this.requireDb();
    if (lookbackDays === undefined) return [...db.data.sent_alerts];
    const cutoff = new Date(Date.now() - lookbackDays * 864e5).toISOString();
    return db.data.sent_alerts.filter((a) => a.createdAt >= cutoff);
  }

  async getStats(): Promise<DatabaseStats> {
    const db = this.requireDb();
    const txs = db.data.insider_transactions;
    const dates = txs
      .map((tx) => tx.transactionDate)
      .filter((d): d is string => typeof d === 'string')
      .sort();

    return {
      totalTransactions: txs.length,
      purchases: txs.filter((tx) => tx.transactionType === 'BUY').length,
      sells: txs.filter((tx) => tx.transactionType === 'SELL').length,
      uniqueCompanies: new Set(txs.map((tx) => tx.ticker)).size,
      uniqueInsiders: new Set(txs.map((tx) => tx.insiderCIK)).size,
      earliestTransaction: dates[0] ?? null,
      latestTransaction: dates[dates.length - 1] ?? null,
      alertsSent: db.data.sent_alerts.length,
    };
  }
}
