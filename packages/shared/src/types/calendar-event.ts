/**
 * A single scheduled workout in the calendar view of a plan.
 */
import { formatDateKey, parseDateKey, startOfUtcDay } from '../utils/date-key.js';

export const DAYS_OF_WEEK = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
] as const;

export type DayOfWeek = (typeof DAYS_OF_WEEK)[number];

export interface CalendarEvent {
  id: string;
  /** The owning workout plan */
  planId: string;
  workoutId: string;
  /** ISO timestamp */
  scheduledDate: string;
  dayOfWeek: string;
  /** Position among events on the same date */
  sortOrder: number;
  isRestDay: boolean;
  notes?: string;
  /** "#RRGGBB" */
  calendarColor?: string;
  isCompleted?: boolean;
  completionDate?: string;
  /** From the expanded plan relation */
  planName?: string;
  planDescription?: string;
  created?: string;
  updated?: string;
}

export type CalendarEventInput = Omit<
  CalendarEvent,
  'id' | 'planName' | 'planDescription' | 'created' | 'updated'
>;

export interface CalendarEventStatusUpdate {
  isCompleted?: boolean;
  completionDate?: string;
  notes?: string;
  calendarColor?: string;
}

export function isDayOfWeek(value: string): value is DayOfWeek {
  return DAYS_OF_WEEK.some((day) => day === value.toLowerCase());
}

/**
 * Day name of a date, Monday first.
 */
export function dayOfWeekFor(date: Date): DayOfWeek {
  const index = (date.getUTCDay() + 6) % 7;
  return DAYS_OF_WEEK[index] ?? 'monday';
}

export function calendarEventDateKey(event: Pick<CalendarEvent, 'scheduledDate'>): string {
  const date = parseDateKey(event.scheduledDate);
  return date === null ? event.scheduledDate.slice(0, 10) : formatDateKey(date);
}

export function isPastEvent(event: Pick<CalendarEvent, 'scheduledDate'>, now: Date = new Date()): boolean {
  return calendarEventDateKey(event) < formatDateKey(startOfUtcDay(now));
}

export function isTodayEvent(event: Pick<CalendarEvent, 'scheduledDate'>, now: Date = new Date()): boolean {
  return calendarEventDateKey(event) === formatDateKey(now);
}

export function groupEventsByDate(events: CalendarEvent[]): Map<string, CalendarEvent[]> {
  const grouped = new Map<string, CalendarEvent[]>();
  for (const event of events) {
    const key = calendarEventDateKey(event);
    const list = grouped.get(key) ?? [];
    list.push(event);
    grouped.set(key, list);
  }
  return grouped;
}
