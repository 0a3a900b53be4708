export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

export function toDateOnly(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function todayDateOnly(clock: Clock = systemClock): string {
  return toDateOnly(clock());
}

/** UTC wall-clock text in the shape SQL CURRENT_TIMESTAMP produces. */
export function toSqlTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

export function isDateOnly(value: string): boolean {
  if (!DATE_ONLY.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && toDateOnly(parsed) === value;
}

export function addDays(dateOnly: string, days: number): string {
  const date = new Date(`${dateOnly}T00:00:00Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return toDateOnly(date);
}
