import { addMinutes } from 'date-fns';
import { calendar_v3, google } from 'googleapis';
import type {
  CreatedEvent,
  MeetingRequest,
  ReferenceEvent,
  TimeSlot,
  WorkingHoursConfig,
} from '../../types/index.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import type { AvailabilityCollaborator } from '../collaborators.js';
import { generateSlots, type BusyInterval } from './slots.js';

/** The slice of the Google Calendar events resource this service uses. */
export interface CalendarEventsApi {
  list(params: calendar_v3.Params$Resource$Events$List): Promise<{ data: calendar_v3.Schema$Events }>;
  insert(params: calendar_v3.Params$Resource$Events$Insert): Promise<{ data: calendar_v3.Schema$Event }>;
}

export interface GoogleCalendarConfig {
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
  refreshToken?: string;
  calendarId: string;
  timezone: string;
}

export interface CalendarServiceOptions {
  /** Pre-built events API; skips OAuth setup */
  eventsApi?: CalendarEventsApi;
  logger?: Logger;
}

/**
 * Availability collaborator backed by Google Calendar.
 */
export class CalendarService implements AvailabilityCollaborator {
  private eventsApi: CalendarEventsApi | null;
  private readonly logger: Logger;

  constructor(private readonly config: GoogleCalendarConfig, options: CalendarServiceOptions = {}) {
    this.eventsApi = options.eventsApi ?? null;
    this.logger = options.logger ?? defaultLogger;
  }

  private getEventsApi(): CalendarEventsApi {
    if (this.eventsApi) return this.eventsApi;

    const { clientId, clientSecret, redirectUri, refreshToken } = this.config;
    if (!clientId || !clientSecret) {
      throw new Error('Google OAuth client is not configured properly.');
    }
    if (!refreshToken) {
      throw new Error('Google account is not connected (GOOGLE_REFRESH_TOKEN missing).');
    }

    const oauthClient = new google.auth.OAuth2(clientId, clientSecret, redirectUri);
    oauthClient.setCredentials({ refresh_token: refreshToken });

    this.eventsApi = google.calendar({ version: 'v3', auth: oauthClient }).events;
    return this.eventsApi;
  }

  private async fetchEvents(windowStart: Date, windowEnd: Date): Promise<calendar_v3.Schema$Event[]> {
    const response = await this.getEventsApi().list({
      calendarId: this.config.calendarId,
      timeMin: windowStart.toISOString(),
      timeMax: windowEnd.toISOString(),
      singleEvents: true,
      orderBy: 'startTime',
      maxResults: 250,
    });
    return response.data.items ?? [];
  }

  async findSlots(
    windowStart: Date,
    windowEnd: Date,
    durationMinutes: number,
    workingHours: WorkingHoursConfig
  ): Promise<TimeSlot[]> {
    this.logger.info(
      `📅 Checking availability ${windowStart.toISOString()} → ${windowEnd.toISOString()} (${durationMinutes} min)`
    );

    const events = await this.fetchEvents(windowStart, windowEnd);
    const busy = events
      .filter(event => event.status !== 'cancelled' && event.transparency !== 'transparent')
      .map(toInterval)
      .filter((interval): interval is BusyInterval => interval !== null);

    const slots = generateSlots(windowStart, windowEnd, durationMinutes, workingHours, busy);
    this.logger.info(
      `✅ ${slots.filter(slot => slot.isAvailable).length} of ${slots.length} slots free (${busy.length} busy events)`
    );
    return slots;
  }

  async listEvents(windowStart: Date, windowEnd: Date): Promise<ReferenceEvent[]> {
    const events = await this.fetchEvents(windowStart, windowEnd);
    return events.flatMap(event => {
      const interval = toInterval(event);
      if (!interval) return [];
      return [{ id: event.id ?? undefined, title: event.summary || 'No title', start: interval.start, end: interval.end }];
    });
  }

  async createEvent(request: MeetingRequest, title: string): Promise<CreatedEvent | null> {
    if (!request.specificTime || !request.durationMinutes) {
      this.logger.warn('Cannot create event without a specific time and duration');
      return null;
    }

    const start = request.specificTime;
    const end = addMinutes(start, request.durationMinutes);
    const description = request.description ?? `${request.durationMinutes}-minute meeting`;

    try {
      this.logger.info(`📅 Creating calendar event: "${title}"`);

      const requestBody: calendar_v3.Schema$Event = {
        summary: title,
        description,
        start: { dateTime: start.toISOString(), timeZone: this.config.timezone },
        end: { dateTime: end.toISOString(), timeZone: this.config.timezone },
      };
      if (request.attendees && request.attendees.length > 0) {
        this.logger.info(`📧 Adding ${request.attendees.length} attendees: ${request.attendees.join(', ')}`);
        requestBody.attendees = request.attendees.map(email => ({ email }));
      }

      const response = await this.getEventsApi().insert({
        calendarId: this.config.calendarId,
        requestBody,
      });

      if (!response.data.id) {
        this.logger.error('Calendar API returned an event without an id');
        return null;
      }

      this.logger.info(`✅ Event created: "${title}"`);
      return {
        id: response.data.id,
        title,
        start,
        end,
        description,
        attendees: request.attendees,
        htmlLink: response.data.htmlLink ?? undefined,
      };
    } catch (error) {
      this.logger.error('Error creating calendar event:', error);
      return null;
    }
  }
}

function toInterval(event: calendar_v3.Schema$Event): BusyInterval | null {
  const startRaw = event.start?.dateTime ?? event.start?.date;
  const endRaw = event.end?.dateTime ?? event.end?.date;
  if (!startRaw || !endRaw) return null;

  const start = new Date(startRaw);
  const end = new Date(endRaw);
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) return null;

  return { start, end, summary: event.summary ?? undefined };
}
