import { isExpired } from "./postEvent";
import type { InviteeDoc, InviteeRepository, InviteeStatus, PostEventDoc } from "./types";

export class AttendanceForbiddenError extends Error {
  constructor(message = "You cannot change attendance for this event") {
    super(message);
    this.name = "AttendanceForbiddenError";
  }
}

export type AttendanceDeps = {
  invitees: InviteeRepository;
  now?: () => Date;
};

/**
 * Who may self-register: not the owner, not after the event, and on private
 * events only people already on the roster.
 */
export async function canUpdateAttendance(
  deps: AttendanceDeps,
  event: PostEventDoc,
  userId: number
): Promise<boolean> {
  const now = deps.now ? deps.now() : new Date();

  if (isExpired(event, now)) return false;
  if (event.ownerId === userId) return false;

  if (event.status === "public") return true;
  if (event.status === "private") return deps.invitees.exists(event.id, userId);
  return false;
}

/**
 * Preview list for the event card: the viewer (if they can respond), the owner,
 * then stored invitees by (status, userId). Placeholders are never saved.
 */
export async function mostLikelyGoing(
  deps: AttendanceDeps,
  event: PostEventDoc,
  userId: number,
  limit: number
): Promise<InviteeDoc[]> {
  const out: InviteeDoc[] = [];

  if (await canUpdateAttendance(deps, event, userId)) {
    const own = await deps.invitees.find(event.id, userId);
    out.push(own ?? { postId: event.id, userId, status: null, notified: false });
  }

  out.push({ postId: event.id, userId: event.ownerId, status: "going", notified: false });

  const remaining = limit - out.length;
  if (remaining > 0) {
    out.push(...(await deps.invitees.listForPreview(event.id, userId, remaining)));
  }

  return out.slice(0, Math.max(limit, 0));
}

export async function updateAttendance(
  deps: AttendanceDeps,
  event: PostEventDoc,
  userId: number,
  status: InviteeStatus
): Promise<InviteeDoc> {
  if (!(await canUpdateAttendance(deps, event, userId))) {
    throw new AttendanceForbiddenError();
  }
  return deps.invitees.upsertStatus(event.id, userId, status);
}
