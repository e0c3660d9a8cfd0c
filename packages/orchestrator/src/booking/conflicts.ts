import type { CalendarEvent, TimeWindow } from '../contracts/index.js';

export interface BusinessHours {
  startHour: number; // UTC, inclusive
  endHour: number; // UTC, exclusive
}

export const DEFAULT_BUSINESS_HOURS: BusinessHours = { startHour: 9, endHour: 17 };

export interface Interval {
  start: number; // epoch ms
  end: number; // epoch ms, exclusive
}

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export function toInterval(window: { start_utc: string; end_utc: string }): Interval {
  return { start: Date.parse(window.start_utc), end: Date.parse(window.end_utc) };
}

export function toWindow(start: number, durationMs: number): TimeWindow {
  return {
    start_utc: new Date(start).toISOString(),
    end_utc: new Date(start + durationMs).toISOString(),
  };
}

/**
 * Half-open overlap: touching intervals do not conflict.
 */
export function overlaps(a: Interval, b: Interval): boolean {
  return a.start < b.end && a.end > b.start;
}

export function findConflicts(requested: Interval, events: CalendarEvent[]): CalendarEvent[] {
  return events.filter((event) => overlaps(requested, toInterval(event)));
}

export function isWeekend(ms: number): boolean {
  const day = new Date(ms).getUTCDay();
  return day === 0 || day === 6;
}

function startOfUtcDay(ms: number): number {
  return ms - (((ms % DAY_MS) + DAY_MS) % DAY_MS);
}

/**
 * Move a start time forward into business hours on a weekday. Only the start
 * is checked: a start before closing stays on that day. Times already inside
 * the window are returned unchanged.
 */
export function clampToBusinessHours(ms: number, hours: BusinessHours = DEFAULT_BUSINESS_HOURS): number {
  let candidate = ms;

  for (;;) {
    const dayStart = startOfUtcDay(candidate);
    const open = dayStart + hours.startHour * HOUR_MS;
    const close = dayStart + hours.endHour * HOUR_MS;

    if (isWeekend(candidate) || candidate >= close) {
      candidate = dayStart + DAY_MS + hours.startHour * HOUR_MS;
      continue;
    }
    return Math.max(candidate, open);
  }
}

/**
 * Exactly two alternatives for a conflicting request: right after the
 * blocking event, and two hours after the requested start. The second one is
 * pushed past the first when it would land on the blocking event or on the first.
 */
export function proposeAlternatives(
  requested: Interval,
  conflicts: CalendarEvent[],
  hours: BusinessHours = DEFAULT_BUSINESS_HOURS,
): [TimeWindow, TimeWindow] {
  if (conflicts.length === 0) {
    throw new RangeError('proposeAlternatives needs at least one conflicting event');
  }

  const duration = requested.end - requested.start;
  const blocking = conflicts
    .map(toInterval)
    .reduce((latest, current) => (current.end > latest.end ? current : latest));

  const first = clampToBusinessHours(blocking.end, hours);
  let second = clampToBusinessHours(requested.start + 2 * HOUR_MS, hours);

  const secondWindow = { start: second, end: second + duration };
  if (overlaps(secondWindow, { start: first, end: first + duration }) || overlaps(secondWindow, blocking)) {
    second = clampToBusinessHours(first + Math.max(duration, HOUR_MS), hours);
  }

  return [toWindow(first, duration), toWindow(second, duration)];
}

export function formatSlot(isoUtc: string): string {
  return `${isoUtc.slice(0, 10)} ${isoUtc.slice(11, 16)} UTC`;
}
