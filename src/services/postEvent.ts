import type { EventStatus, PostEventDoc } from "./types";

export const MIN_NAME_LENGTH = 5;
export const MAX_NAME_LENGTH = 30;
export const MAX_RAW_INVITEES = 10;

export const EVENT_STATUSES: readonly EventStatus[] = ["standalone", "public", "private"];

export class EventValidationError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid event: ${errors.join("; ")}`);
    this.name = "EventValidationError";
    this.errors = errors;
  }
}

export function isEventStatus(value: string): value is EventStatus {
  return (EVENT_STATUSES as readonly string[]).includes(value);
}

export function parseEventStatus(value: string): EventStatus {
  const normalized = value.trim().toLowerCase();
  if (!isEventStatus(normalized)) {
    throw new EventValidationError([`Unknown status "${value}"`]);
  }
  return normalized;
}

/**
 * Fields that may be missing while a merged candidate is still being checked.
 */
export type EventCandidate = Omit<PostEventDoc, "startsAt"> & { startsAt?: Date };

export function collectEventErrors(event: EventCandidate): string[] {
  const errors: string[] = [];

  if (!(event.startsAt instanceof Date) || Number.isNaN(event.startsAt.getTime())) {
    errors.push("startsAt is required");
  }

  // length counts characters of the stored value, not UTF-16 units
  const name = event.name ?? "";
  const length = [...name].length;
  if (name.trim() && (length < MIN_NAME_LENGTH || length > MAX_NAME_LENGTH)) {
    errors.push(`name must be between ${MIN_NAME_LENGTH} and ${MAX_NAME_LENGTH} characters`);
  }

  if (event.rawInvitees.length > MAX_RAW_INVITEES) {
    errors.push(`at most ${MAX_RAW_INVITEES} invitees can be listed`);
  }

  if (event.startsAt && event.endsAt && event.startsAt.getTime() >= event.endsAt.getTime()) {
    errors.push("endsAt must be after startsAt");
  }

  return errors;
}

/**
 * Throws every failing rule at once; returns the candidate narrowed to a full event.
 */
export function assertValidEvent(event: EventCandidate): PostEventDoc {
  const errors = collectEventErrors(event);
  const { startsAt } = event;
  if (errors.length || !startsAt) throw new EventValidationError(errors);
  return { ...event, startsAt };
}

// no endsAt => startsAt is the boundary
export function isExpired(event: Pick<PostEventDoc, "startsAt" | "endsAt">, now: Date = new Date()) {
  const boundary = event.endsAt ?? event.startsAt ?? now;
  return now.getTime() > boundary.getTime();
}

export function splitRawInvitees(allowedGroups: string | undefined): string[] {
  if (!allowedGroups) return [];
  return allowedGroups
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}
