import type {
  ContentItem,
  InviteeRepository,
  InviteeResolver,
  NotificationChannel,
  PostEventDoc,
} from "./types";
import { dispatchInvitations, type DispatchResult } from "./notificationDispatcher";

export type ReconcileDeps = {
  invitees: InviteeRepository;
  resolver: InviteeResolver;
  notifications: NotificationChannel;
};

export type ReconcileResult = {
  removed: number;
  added: number;
  notifications: DispatchResult;
};

export async function destroyExtraneous(
  invitees: InviteeRepository,
  event: PostEventDoc,
  resolvedUserIds: number[]
): Promise<number> {
  return invitees.deleteExcept(event.id, resolvedUserIds);
}

export async function fillMissing(
  invitees: InviteeRepository,
  event: PostEventDoc,
  resolvedUserIds: number[]
): Promise<number> {
  const existing = new Set((await invitees.listByPost(event.id)).map((i) => i.userId));
  const missing = resolvedUserIds.filter((id) => !existing.has(id));
  if (missing.length === 0) return 0;

  return invitees.insertMany(
    missing.map((userId) => ({ postId: event.id, userId, status: null, notified: false }))
  );
}

/**
 * Makes the stored roster match rawInvitees, then invites whoever has not been invited yet.
 * Running it twice with the same input changes nothing.
 */
export async function reconcile(
  deps: ReconcileDeps,
  event: PostEventDoc,
  post: ContentItem
): Promise<ReconcileResult> {
  const resolved = await deps.resolver.resolve(event.rawInvitees);

  const removed = await destroyExtraneous(deps.invitees, event, resolved);
  const added = await fillMissing(deps.invitees, event, resolved);
  const notifications = await dispatchInvitations(deps, event, post);

  return { removed, added, notifications };
}
