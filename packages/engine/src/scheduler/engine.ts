const MS_PER_DAY = 86_400_000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function toUtc(date: string): number {
  const [y, m, d] = date.split('-').map(Number);
  return Date.UTC(y, m - 1, d);
}

function fromUtc(ms: number): string {
  return new Date(ms).toISOString().split('T')[0];
}

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match.map(Number);
  const date = new Date(Date.UTC(y, m - 1, d));
  return date.getUTCFullYear() === y && date.getUTCMonth() === m - 1 && date.getUTCDate() === d;
}

export function todayIsoDate(): string {
  return new Date().toISOString().split('T')[0];
}

export function lastDayOfMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function addMonths(date: string, months: number): string {
  const [y, m, d] = date.split('-').map(Number);
  const monthIndex = m - 1 + months;
  const year = y + Math.floor(monthIndex / 12);
  const month = (((monthIndex % 12) + 12) % 12) + 1;
  // Clamp e.g. Jan 31 + 1 month to the last day of February
  const day = Math.min(d, lastDayOfMonth(year, month));
  return fromUtc(Date.UTC(year, month - 1, day));
}

export function addDays(date: string, days: number): string {
  return fromUtc(toUtc(date) + days * MS_PER_DAY);
}

export function daysBetween(from: string, to: string): number {
  return Math.round((toUtc(to) - toUtc(from)) / MS_PER_DAY);
}

/**
 * Due date of cycle `cycleIndex`, always computed from the origination date
 * so clamped months (Feb 28) never shift later cycles off the origination day.
 */
export function nextDueDate(originationDate: string, cycleIndex: number): string {
  return addMonths(originationDate, cycleIndex);
}

/**
 * Index of the last cycle worth generating: the first due date that falls
 * strictly after one month past the last payment.
 */
export function dueDateHorizon(originationDate: string, lastPaymentDate: string | null): number {
  const limit = addMonths(lastPaymentDate ?? originationDate, 1);
  let cycle = 1;
  while (nextDueDate(originationDate, cycle) <= limit) cycle++;
  return cycle;
}

/** Latest due date on or before `when`; the origination date when none has passed yet. */
export function previousDueDate(originationDate: string, when: string): string {
  if (when <= originationDate) return originationDate;

  const [oy, om] = originationDate.split('-').map(Number);
  const [wy, wm] = when.split('-').map(Number);
  let cycle = (wy - oy) * 12 + (wm - om);
  if (nextDueDate(originationDate, cycle) > when) cycle--;

  return cycle <= 0 ? originationDate : nextDueDate(originationDate, cycle);
}
