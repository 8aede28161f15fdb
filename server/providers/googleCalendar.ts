/**
 * Google Calendar provider.
 *
 * Authenticates with a stored OAuth "authorized user" token file (the JSON
 * written by Google's installed-app flow) and inserts events into the
 * configured calendar. Obtaining that file is outside this service.
 */

import { readFile } from "fs/promises";
import { google, type calendar_v3 } from "googleapis";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import type { CalendarConfig } from "../config/env";
import { EVENT_CONSTANTS } from "../config/constants";
import { ExternalServiceError } from "../utils/errorHandler";
import { logInfo } from "../utils/logger";
import type { CalendarEventInput, CalendarProvider, CreatedCalendarEvent } from "./types";

const authorizedUserSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().min(1),
  token: z.string().optional(),
  access_token: z.string().optional(),
});

export type AuthorizedUserToken = z.infer<typeof authorizedUserSchema>;

export function parseAuthorizedUserToken(raw: string): AuthorizedUserToken {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ExternalServiceError("Google Calendar", "token file is not valid JSON", { cause: err });
  }
  const parsed = authorizedUserSchema.safeParse(json);
  if (!parsed.success) {
    throw new ExternalServiceError("Google Calendar", fromZodError(parsed.error).message);
  }
  return parsed.data;
}

/**
 * Builds the events.insert request body. Slot times are UTC wall-clock
 * times, so they are sent in UTC.
 */
export function buildEventBody(input: CalendarEventInput): calendar_v3.Schema$Event {
  const timeZone = EVENT_CONSTANTS.CALENDAR_TIME_ZONE;
  return {
    summary: input.title,
    description: input.description ?? "",
    start: { dateTime: input.start.toISOString(), timeZone },
    end: { dateTime: input.end.toISOString(), timeZone },
  };
}

export class GoogleCalendarProvider implements CalendarProvider {
  private client: calendar_v3.Calendar | null = null;

  constructor(private readonly config: CalendarConfig) {}

  private async getClient(): Promise<calendar_v3.Calendar> {
    if (this.client) return this.client;

    let raw: string;
    try {
      raw = await readFile(this.config.tokenFile, "utf-8");
    } catch (err) {
      throw new ExternalServiceError("Google Calendar", `cannot read token file ${this.config.tokenFile}`, { cause: err });
    }
    const token = parseAuthorizedUserToken(raw);

    const auth = new google.auth.OAuth2(token.client_id, token.client_secret);
    auth.setCredentials({
      refresh_token: token.refresh_token,
      access_token: token.access_token ?? token.token,
    });
    this.client = google.calendar({ version: "v3", auth });
    return this.client;
  }

  async createEvent(input: CalendarEventInput): Promise<CreatedCalendarEvent> {
    const calendar = await this.getClient();
    try {
      const response = await calendar.events.insert({
        calendarId: this.config.calendarId,
        requestBody: buildEventBody(input),
      });
      logInfo("[Calendar] Event created", { eventId: response.data.id ?? undefined });
      return {
        id: response.data.id ?? null,
        link: response.data.htmlLink ?? null,
      };
    } catch (err) {
      throw new ExternalServiceError("Google Calendar", err instanceof Error ? err.message : String(err), { cause: err });
    }
  }
}
