import type {
  ContentItem,
  InviteNotification,
  InviteeRepository,
  NotificationChannel,
  PostEventDoc,
} from "./types";

export const INVITE_MESSAGE_KEY = "invite_user_notification";

export type DispatchResult = {
  sent: number[];
  failed: number[];
};

export function buildInviteNotification(post: ContentItem): InviteNotification {
  return {
    threadId: post.topicId,
    itemSequence: post.postNumber,
    threadTitle: post.topicTitle,
    authorName: post.authorName,
    messageKey: INVITE_MESSAGE_KEY,
  };
}

/**
 * Claim-then-send: a row is flipped to notified before the send, so two
 * concurrent dispatches never message the same invitee. A failed send hands
 * the claim back so the next reconcile retries it.
 */
export async function dispatchInvitations(
  deps: { invitees: InviteeRepository; notifications: NotificationChannel },
  event: PostEventDoc,
  post: ContentItem
): Promise<DispatchResult> {
  const result: DispatchResult = { sent: [], failed: [] };
  const pending = await deps.invitees.listUnnotified(event.id);
  const payload = buildInviteNotification(post);

  for (const invitee of pending) {
    const claimed = await deps.invitees.claimNotification(event.id, invitee.userId);
    if (!claimed) continue;

    try {
      await deps.notifications.send(invitee.userId, payload);
      result.sent.push(invitee.userId);
    } catch (err) {
      console.error(`[NOTIFY] Invite to user ${invitee.userId} for event ${event.id} failed:`, err);
      await deps.invitees.releaseNotification(event.id, invitee.userId);
      result.failed.push(invitee.userId);
    }
  }

  return result;
}
