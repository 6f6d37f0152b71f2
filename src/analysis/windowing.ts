const MS_PER_DAY = 864e5;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  return ISO_DATE.test(value) && !Number.isNaN(Date.parse(`${value}T00:00:00Z`));
}

function toUtc(date: string): Date {
  return new Date(`${date}T00:00:00Z`);
}

function toIso(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addDays(date: string, days: number): string {
  const d = toUtc(date);
  d.setUTCDate(d.getUTCDate() + days);
  return toIso(d);
}

/** Whole calendar days from `a` to `b` (negative when `b` is earlier). */
export function daysBetween(a: string, b: string): number {
  return Math.round((toUtc(b).getTime() - toUtc(a).getTime()) / MS_PER_DAY);
}

function isWeekend(d: Date): boolean {
  const day = d.getUTCDay();
  return day === 0 || day === 6;
}

/**
 * Moves `tradingDays` weekdays forward (or back, when negative). Exchange
 * holidays are not modelled.
 */
export function shiftTradingDays(date: string, tradingDays: number): string {
  const d = toUtc(date);
  const step = tradingDays < 0 ? -1 : 1;
  let remaining = Math.abs(tradingDays);
  while (remaining > 0) {
    d.setUTCDate(d.getUTCDate() + step);
    if (!isWeekend(d)) remaining--;
  }
  return toIso(d);
}

export interface DatedWindow<T> {
  start: string;
  end: string; // exclusive
  members: T[];
}

export interface WindowScan<T> {
  windows: DatedWindow<T>[];
  residue: T[];
}

/**
 * Greedy forward scan shared by the cluster and sell detectors.
 *
 * `items` must already be sorted by date. A window opens at the first
 * unassigned item and spans `[date, date + windowDays)`; every later item
 * inside it joins. When `accept` rejects the window, only its anchor is
 * released to the residue and the scan re-opens at the next item.
 */
export function scanWindows<T>(
  items: T[],
  dateOf: (item: T) => string,
  windowDays: number,
  accept: (members: T[]) => boolean = () => true
): WindowScan<T> {
  const windows: DatedWindow<T>[] = [];
  const residue: T[] = [];
  let i = 0;

  while (i < items.length) {
    const start = dateOf(items[i]);
    const end = addDays(start, windowDays);
    let j = i;
    while (j < items.length && dateOf(items[j]) < end) j++;

    const members = items.slice(i, j);
    if (accept(members)) {
      windows.push({ start, end, members });
      i = j;
    } else {
      residue.push(items[i]);
      i++;
    }
  }

  return { windows, residue };
}
