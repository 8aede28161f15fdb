/**
 * Provider Contracts
 *
 * Built-in providers (local todo list, calendar) are bound at start-up.
 * Remote capabilities come from capability sources that are opened fresh
 * on every turn and closed when the turn ends.
 */

import type { Todo, TodoStatus } from "@shared/schema";
import type { Capability } from "../assistant/types";

export interface LocalTaskProvider {
  create(text: string, due: Date | null): Promise<Todo>;
  list(status?: TodoStatus): Promise<Todo[]>;
}

export type CalendarEventInput = {
  title: string;
  start: Date;
  end: Date;
  description?: string;
};

export type CreatedCalendarEvent = {
  id: string | null;
  link: string | null;
};

export interface CalendarProvider {
  createEvent(input: CalendarEventInput): Promise<CreatedCalendarEvent>;
}

export interface CapabilitySession {
  readonly capabilities: Capability[];
  close(): Promise<void>;
}

export interface CapabilitySource {
  readonly name: string;
  open(): Promise<CapabilitySession>;
}
