import { createHash } from 'crypto';
import { readFileSync } from 'fs';
import { z } from 'zod';
import { CalendarEventSchema, type CalendarEvent } from '../contracts/index.js';
import { ExternalServiceError, FatalError, formatZodIssues } from '../errors/index.js';
import { overlaps, toInterval } from '../booking/conflicts.js';

export interface AvailabilityWindow {
  from: string; // RFC 3339 UTC
  to: string; // RFC 3339 UTC
}

export interface NewCalendarEvent {
  subject: string;
  start_utc: string;
  end_utc: string;
  attendees: string[];
  description?: string;
  idempotency_key: string;
}

export interface CreatedEvent {
  id: string;
  link: string | null;
}

export interface CalendarService {
  listEvents(window: AvailabilityWindow): Promise<CalendarEvent[]>;
  createEvent(input: NewCalendarEvent): Promise<CreatedEvent>;
}

/**
 * Generate deterministic iCal UID from the idempotency key and start time
 */
export function generateICalUID(idempotencyKey: string, startUtc: string): string {
  const hash = createHash('sha256').update(`${idempotencyKey}-${startUtc}`).digest('hex');
  return `${hash.substring(0, 8)}-${hash.substring(8, 12)}-${hash.substring(12, 16)}-${hash.substring(16, 20)}-${hash.substring(20, 32)}`;
}

/**
 * In-memory calendar for local runs and tests
 */
export class InMemoryCalendar implements CalendarService {
  private readonly events: Map<string, CalendarEvent> = new Map();

  constructor(
    seed: CalendarEvent[] = [],
    private readonly linkBase = 'https://calendar.example.com/events',
  ) {
    for (const event of seed) {
      this.events.set(event.id, event);
    }
  }

  async listEvents(window: AvailabilityWindow): Promise<CalendarEvent[]> {
    const range = { start: Date.parse(window.from), end: Date.parse(window.to) };
    return [...this.events.values()]
      .filter((event) => overlaps(range, toInterval(event)))
      .sort((a, b) => Date.parse(a.start_utc) - Date.parse(b.start_utc));
  }

  async createEvent(input: NewCalendarEvent): Promise<CreatedEvent> {
    const id = generateICalUID(input.idempotency_key, input.start_utc);
    const existing = this.events.get(id);
    if (existing) {
      return { id, link: existing.link };
    }

    const requested = toInterval(input);
    for (const event of this.events.values()) {
      if (overlaps(requested, toInterval(event))) {
        throw new ExternalServiceError('Time slot overlaps with an existing event');
      }
    }

    const event: CalendarEvent = {
      id,
      subject: input.subject,
      start_utc: input.start_utc,
      end_utc: input.end_utc,
      attendees: input.attendees,
      link: `${this.linkBase}/${id}`,
    };
    this.events.set(id, event);
    return { id, link: event.link };
  }

  /**
   * Get all events (for testing)
   */
  all(): CalendarEvent[] {
    return [...this.events.values()];
  }
}

export function loadCalendarSeed(file: string): CalendarEvent[] {
  const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  const result = z.array(CalendarEventSchema).safeParse(raw);
  if (!result.success) {
    throw new FatalError(`Invalid calendar seed in ${file}`, formatZodIssues(result.error));
  }
  return result.data;
}
