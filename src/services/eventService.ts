// ============================================
// src/services/eventService.ts
// ============================================

import type { EventRecord, EventSearch, LmsStore } from '../repositories/types';
import type { EventType } from '../models/Event';
import { RegistrationStatus } from '../models/EventRegistration';
import { ConflictError, DuplicateKeyError, NotFoundError, ValidationError } from '../utils/errors';
import { Logger } from '../utils/loggers';
import { Notifier, runInBackground } from './whatsappService';

const DEFAULT_EVENT_PAGE_SIZE = 12;
const MAX_EVENT_PAGE_SIZE = 100;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface EventListQuery {
  search?: string;
  eventType?: EventType;
  /** YYYY-MM-DD, inclusive. */
  dateFrom?: string;
  /** YYYY-MM-DD, inclusive. */
  dateTo?: string;
  limit?: number;
  offset?: number;
}

export interface EventSummary {
  id: string;
  title: string;
  description: string;
  eventType: EventType;
  date: string;
  time: string;
  duration: number;
  location: string | null;
  eventUrl: string | null;
  capacity: number;
  registered: number;
}

export interface EventDetail extends EventSummary {
  spotsLeft: number;
}

export interface EventList {
  data: EventSummary[];
  total: number;
  limit: number;
  offset: number;
}

export interface RsvpResult {
  registrationId: string;
  eventUrl: string | null;
  calendarDownload: string;
}

export interface ScheduledEvent {
  registrationId: string;
  eventId: string;
  title: string;
  description: string;
  date: string;
  time: string;
  duration: number;
  location: string | null;
  eventUrl: string | null;
  registeredAt: string;
}

export interface CalendarFile {
  filename: string;
  content: string;
}

const pad = (value: number): string => String(value).padStart(2, '0');

const parseDay = (value: string, field: string): Date => {
  const day = /^\d{4}-\d{2}-\d{2}$/.test(value) ? new Date(`${value}T00:00:00.000Z`) : null;
  if (!day || Number.isNaN(day.getTime())) {
    throw new ValidationError(`${field} must be a YYYY-MM-DD date`, [{ field, message: 'Invalid date' }]);
  }
  return day;
};

const toSummary = (event: EventRecord): EventSummary => ({
  id: event.id,
  title: event.title,
  description: event.description,
  eventType: event.eventType,
  date: event.date.toISOString(),
  time: event.time,
  duration: event.duration,
  location: event.location,
  eventUrl: event.eventUrl,
  capacity: event.capacity,
  registered: event.registered,
});

const MAX_LINE_OCTETS = 75;

/** Splits a content line into 75-octet pieces joined by CRLF + space. */
export const foldIcsLine = (line: string): string => {
  const pieces: string[] = [];
  let current = '';
  let size = 0;
  for (const char of line) {
    const octets = Buffer.byteLength(char, 'utf8');
    // continuation lines spend one octet on the leading space
    const limit = pieces.length === 0 ? MAX_LINE_OCTETS : MAX_LINE_OCTETS - 1;
    if (size + octets > limit) {
      pieces.push(current);
      current = '';
      size = 0;
    }
    current += char;
    size += octets;
  }
  pieces.push(current);
  return pieces.join('\r\n ');
};

/** RFC 5545 TEXT escaping. */
const escapeIcsText = (value: string): string =>
  value
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r?\n/g, '\\n');

/** Floating local start, e.g. 20250301T183000. */
export const formatIcsStart = (date: Date, time: string): string => {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const [hours = '00', minutes = '00'] = time.split(':');
  return `${day}T${hours.padStart(2, '0')}${minutes.padStart(2, '0')}00`;
};

export const buildIcs = (event: EventRecord, stamp: Date): string =>
  [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    'PRODID:-//Course Progress API//Events//EN',
    'CALSCALE:GREGORIAN',
    'BEGIN:VEVENT',
    `UID:${event.id}@course-progress-api`,
    `DTSTAMP:${stamp.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '')}`,
    `DTSTART:${formatIcsStart(event.date, event.time)}`,
    `DURATION:PT${event.duration}M`,
    `SUMMARY:${escapeIcsText(event.title)}`,
    `DESCRIPTION:${escapeIcsText(event.description)}`,
    `LOCATION:${escapeIcsText(event.location ?? 'Online')}`,
    ...(event.eventUrl ? [`URL:${event.eventUrl}`] : []),
    'END:VEVENT',
    'END:VCALENDAR',
  ]
    .map(foldIcsLine)
    .join('\r\n');

export class EventService {
  constructor(
    private readonly store: LmsStore,
    private readonly notifier: Notifier,
    private readonly now: () => Date = () => new Date()
  ) {}

  async list(query: EventListQuery = {}): Promise<EventList> {
    const limit = Math.min(Math.max(query.limit ?? DEFAULT_EVENT_PAGE_SIZE, 1), MAX_EVENT_PAGE_SIZE);
    const offset = Math.max(query.offset ?? 0, 0);

    const filter: EventSearch = { limit, offset };
    const text = query.search?.trim();
    if (text) filter.text = text;
    if (query.eventType) filter.eventType = query.eventType;
    if (query.dateFrom) filter.from = parseDay(query.dateFrom, 'dateFrom');
    if (query.dateTo) filter.until = new Date(parseDay(query.dateTo, 'dateTo').getTime() + DAY_MS);

    const page = await this.store.events.search(filter);
    return { data: page.items.map(toSummary), total: page.total, limit, offset };
  }

  async detail(eventId: string): Promise<EventDetail> {
    const event = await this.store.events.findById(eventId);
    if (!event) throw new NotFoundError('Event not found');

    return { ...toSummary(event), spotsLeft: Math.max(event.capacity - event.registered, 0) };
  }

  async rsvp(userId: string, eventId: string): Promise<RsvpResult> {
    const event = await this.store.events.findById(eventId);
    if (!event) throw new NotFoundError('Event not found');

    const existing = await this.store.registrations.findByUserAndEvent(userId, eventId);
    if (existing) throw new ConflictError('Already registered for this event', 'ALREADY_REGISTERED');

    let registrationId: string;
    try {
      registrationId = await this.store.transaction(async (tx) => {
        if (!(await tx.events.reserveSeat(eventId))) {
          throw new ConflictError('Event is full', 'EVENT_FULL');
        }
        const registration = await tx.registrations.insert({
          userId,
          eventId,
          status: RegistrationStatus.CONFIRMED,
          registeredAt: this.now(),
        });
        return registration.id;
      });
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        throw new ConflictError('Already registered for this event', 'ALREADY_REGISTERED');
      }
      throw error;
    }

    Logger.info('Event RSVP confirmed', { userId, eventId });
    runInBackground('Event RSVP notification', () => this.notifyRsvp(userId, event));

    return {
      registrationId,
      eventUrl: event.eventUrl,
      calendarDownload: `/api/v1/events/${eventId}/calendar`,
    };
  }

  async mySchedule(userId: string): Promise<ScheduledEvent[]> {
    const registrations = (await this.store.registrations.listByUser(userId)).filter(
      (r) => r.status === RegistrationStatus.CONFIRMED
    );
    const events = await this.store.events.findManyByIds(registrations.map((r) => r.eventId));
    const eventById = new Map(events.map((e) => [e.id, e]));

    const scheduled: ScheduledEvent[] = [];
    for (const registration of registrations) {
      const event = eventById.get(registration.eventId);
      if (!event) continue;
      scheduled.push({
        registrationId: registration.id,
        eventId: event.id,
        title: event.title,
        description: event.description,
        date: event.date.toISOString(),
        time: event.time,
        duration: event.duration,
        location: event.location,
        eventUrl: event.eventUrl,
        registeredAt: registration.registeredAt.toISOString(),
      });
    }

    return scheduled.sort((a, b) => a.date.localeCompare(b.date) || a.time.localeCompare(b.time));
  }

  async calendar(eventId: string): Promise<CalendarFile> {
    const event = await this.store.events.findById(eventId);
    if (!event) throw new NotFoundError('Event not found');

    return {
      filename: `${event.title.replace(/[^A-Za-z0-9_-]+/g, '_')}.ics`,
      content: buildIcs(event, this.now()),
    };
  }

  private async notifyRsvp(userId: string, event: EventRecord): Promise<void> {
    const user = await this.store.users.findById(userId);
    if (!user?.phone) return;

    await this.notifier.send(user.phone, 'event_rsvp', {
      userName: user.name,
      eventTitle: event.title,
      eventDate: event.date.toISOString().slice(0, 10),
      eventTime: event.time,
      eventLink: event.eventUrl,
    });
  }
}
