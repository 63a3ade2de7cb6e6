const MS_PER_HOUR = 60 * 60 * 1000;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

export function utcNow(): Date {
  return new Date();
}

export function daysAgo(days: number, from: Date = utcNow()): Date {
  return new Date(from.getTime() - days * MS_PER_DAY);
}

export function daysFromNow(days: number, from: Date = utcNow()): Date {
  return new Date(from.getTime() + days * MS_PER_DAY);
}

export function hoursAgo(hours: number, from: Date = utcNow()): Date {
  return new Date(from.getTime() - hours * MS_PER_HOUR);
}

export const tomorrow = (from?: Date): Date => daysFromNow(1, from);

/** Whole days from `from` to `to`, floored (so 36h ahead is 1, 12h behind is -1). */
export function wholeDaysBetween(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / MS_PER_DAY);
}
