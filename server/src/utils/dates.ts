// src/utils/dates.ts
import { format } from "date-fns";

export interface ActiveWindow {
  start_date?: string | null;
  expiration_date: string;
}

// Local calendar date, e.g. 2026-10-19
export const todayString = (now: Date = new Date()): string => format(now, "yyyy-MM-dd");

/**
 * True when the announcement has started (or has no start) and has not expired.
 * Dates are compared as strings; `yyyy-MM-dd` sorts the same lexically and chronologically.
 */
export const isActiveOn = (announcement: ActiveWindow, today: string): boolean => {
  if (announcement.expiration_date < today) return false;
  if (!announcement.start_date) return true;
  return announcement.start_date <= today;
};
