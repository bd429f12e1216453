import { toIsoUtc, toUtc } from "../utils/time";
import {
  assertValidEvent,
  EventValidationError,
  parseEventStatus,
  splitRawInvitees,
  type EventCandidate,
} from "./postEvent";
import { reconcile, type ReconcileResult } from "./inviteeReconciler";
import type {
  ContentItem,
  EventRepository,
  EventStatus,
  EventTextParser,
  InviteeRepository,
  InviteeResolver,
  NotificationChannel,
  ParsedEvent,
  PostEventDoc,
  RealtimePublisher,
  SideFieldMirror,
} from "./types";

/**
 * Event update pipeline
 * - Single entry point for creating/updating/removing the event of a post
 * - Used by: HTTP routes (post saved / rebaked on the forum host)
 * - Does NOT know about HTTP, Telegram or Redis; everything goes through the ports
 */

export const STARTS_AT_FIELD = "post_event_starts_at";

export function eventChannel(topicId: number) {
  return `event-channel/${topicId}`;
}

export type EventServiceDeps = {
  events: EventRepository;
  invitees: InviteeRepository;
  parser: EventTextParser;
  resolver: InviteeResolver;
  notifications: NotificationChannel;
  publisher: RealtimePublisher;
  mirror: SideFieldMirror;
};

export type EventParams = {
  name?: string;
  startsAt?: Date;
  endsAt?: Date;
  status: EventStatus;
  rawInvitees: string[];
};

function normalizeTime(value: string | undefined, field: string, errors: string[]): Date | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const date = toUtc(value);
  if (!date) {
    errors.push(`${field} is not a valid timestamp`);
    return undefined;
  }
  return date;
}

/**
 * Field-by-field fallback: anything the parsed markup leaves out keeps its stored value.
 * allowedGroups is the exception and is always taken from the markup.
 */
export function mergeParams(parsed: ParsedEvent, existing: PostEventDoc | null): EventParams {
  const errors: string[] = [];

  const startsAt = normalizeTime(parsed.start, "startsAt", errors) ?? existing?.startsAt;
  const endsAt = normalizeTime(parsed.end, "endsAt", errors) ?? existing?.endsAt;

  let status: EventStatus = existing?.status ?? "standalone";
  if (parsed.status) {
    try {
      status = parseEventStatus(parsed.status);
    } catch (err) {
      if (!(err instanceof EventValidationError)) throw err;
      errors.push(...err.errors);
    }
  }

  if (errors.length) throw new EventValidationError(errors);

  return {
    name: parsed.name ?? existing?.name,
    startsAt,
    endsAt,
    status,
    rawInvitees: splitRawInvitees(parsed.allowedGroups),
  };
}

export function createEventService(deps: EventServiceDeps) {
  async function publish(post: ContentItem) {
    await deps.publisher.publish(eventChannel(post.topicId), { eventId: post.id });
  }

  async function persist(post: ContentItem, candidate: EventCandidate, isNew: boolean) {
    const event = assertValidEvent(candidate);
    const saved = isNew ? await deps.events.create(event) : await deps.events.update(event);

    // post-commit: expose the start time on the topic when this is the topic's event
    if (post.isFirstPost) {
      await deps.mirror.upsert(post.topicId, STARTS_AT_FIELD, toIsoUtc(saved.startsAt));
    }

    return saved;
  }

  /**
   * Writes the merged params and runs the side effects of the target status.
   * Public intentionally leaves existing invitee rows in place.
   */
  async function applyParams(
    post: ContentItem,
    params: EventParams,
    existing: PostEventDoc | null
  ): Promise<PostEventDoc> {
    const base = {
      id: post.id,
      ownerId: post.userId,
      topicId: post.topicId,
      name: params.name,
      startsAt: params.startsAt,
      endsAt: params.endsAt,
      status: params.status,
      deletedAt: existing?.deletedAt,
      createdAt: existing?.createdAt,
    };

    const rawInvitees = params.status === "private" ? params.rawInvitees : [];
    const saved = await persist(post, { ...base, rawInvitees }, !existing);

    if (saved.status === "private") {
      await reconcile(deps, saved, post);
    } else if (saved.status === "standalone") {
      await deps.invitees.deleteAll(saved.id);
    }

    await publish(post);
    return saved;
  }

  async function destroyEvent(post: ContentItem): Promise<void> {
    await deps.invitees.deleteAll(post.id);
    await deps.events.delete(post.id);

    if (post.isFirstPost) {
      await deps.mirror.remove(post.topicId, STARTS_AT_FIELD);
    }

    await publish(post);
    console.log(`[EVENT] Removed event ${post.id} (topic ${post.topicId})`);
  }

  /**
   * Re-reads the post markup and brings the stored event in line with it.
   * Returns null when the post no longer carries an event.
   */
  async function createOrUpdateFromSource(post: ContentItem): Promise<PostEventDoc | null> {
    const parsed = deps.parser.extract(post.raw);
    const existing = await deps.events.findById(post.id);

    if (!parsed) {
      if (existing) await destroyEvent(post);
      return null;
    }

    const params = mergeParams(parsed, existing);
    const saved = await applyParams(post, params, existing);
    console.log(`[EVENT] Saved ${saved.status} event ${saved.id} (topic ${saved.topicId})`);
    return saved;
  }

  async function reconcileInvitees(event: PostEventDoc, post: ContentItem): Promise<ReconcileResult> {
    if (event.status !== "private") {
      return { removed: 0, added: 0, notifications: { sent: [], failed: [] } };
    }
    return reconcile(deps, event, post);
  }

  return {
    createOrUpdateFromSource,
    applyParams,
    destroyEvent,
    reconcileInvitees,
  };
}

export type EventService = ReturnType<typeof createEventService>;
