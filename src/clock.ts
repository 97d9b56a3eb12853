import { differenceInMinutes, format, isBefore, isValid, parse } from 'date-fns';

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** Calendar key (YYYY-MM-DD) of a timestamp in server local time. */
export function dateKey(at: Date): string {
  return format(at, 'yyyy-MM-dd');
}

export function isDateKey(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && isValid(parse(value, 'yyyy-MM-dd', new Date()));
}

/** The moment the cutoff (HH:MM) falls on the given date. */
export function cutoffOn(date: string, cutoffTime: string): Date {
  return parse(`${date} ${cutoffTime}`, 'yyyy-MM-dd HH:mm', new Date());
}

export function isCutoffReached(clock: Clock, date: string, cutoffTime: string): boolean {
  return !isBefore(clock.now(), cutoffOn(date, cutoffTime));
}

/** Whole minutes between login and logout, or null unless both are set. */
export function workDurationMinutes(loginTime: Date | null, logoutTime: Date | null): number | null {
  if (!loginTime || !logoutTime) return null;
  const minutes = differenceInMinutes(logoutTime, loginTime);
  return minutes < 0 ? null : minutes;
}

export function formatTime(at: Date): string {
  return format(at, 'hh:mm a');
}
