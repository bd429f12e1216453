// In-memory stand-ins for the Mongo/Telegram/Redis adapters, used by tests.

import type {
  ContentItem,
  EventRepository,
  InviteNotification,
  InviteeDoc,
  InviteeRepository,
  InviteeResolver,
  InviteeStatus,
  NotificationChannel,
  PostEventDoc,
  RealtimePublisher,
  SideFieldMirror,
} from "../services/types";

const STATUS_RANK: Record<InviteeStatus, number> = { going: 0, interested: 1, not_going: 2 };

function rank(status: InviteeStatus | null) {
  return status === null ? 3 : STATUS_RANK[status];
}

export class InMemoryEventRepository implements EventRepository {
  rows = new Map<number, PostEventDoc>();

  async findById(id: number) {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async findVisible(id: number) {
    const row = this.rows.get(id);
    return row && !row.deletedAt ? { ...row } : null;
  }

  async listUpcoming(now: Date, limit: number) {
    return Array.from(this.rows.values())
      .filter((e) => !e.deletedAt && e.startsAt.getTime() > now.getTime())
      .sort((a, b) => a.startsAt.getTime() - b.startsAt.getTime())
      .slice(0, limit)
      .map((e) => ({ ...e }));
  }

  async create(event: PostEventDoc) {
    if (this.rows.has(event.id)) throw new Error(`Event ${event.id} already exists`);
    const row = { ...event, rawInvitees: [...event.rawInvitees] };
    this.rows.set(event.id, row);
    return { ...row };
  }

  async update(event: PostEventDoc) {
    if (!this.rows.has(event.id)) throw new Error("Event not found");
    const row = { ...event, rawInvitees: [...event.rawInvitees] };
    this.rows.set(event.id, row);
    return { ...row };
  }

  async delete(id: number) {
    this.rows.delete(id);
  }
}

export class InMemoryInviteeRepository implements InviteeRepository {
  rows: InviteeDoc[] = [];

  private of(postId: number) {
    return this.rows.filter((r) => r.postId === postId);
  }

  async listByPost(postId: number) {
    return this.of(postId)
      .sort((a, b) => a.userId - b.userId)
      .map((r) => ({ ...r }));
  }

  async find(postId: number, userId: number) {
    const row = this.rows.find((r) => r.postId === postId && r.userId === userId);
    return row ? { ...row } : null;
  }

  async exists(postId: number, userId: number) {
    return this.rows.some((r) => r.postId === postId && r.userId === userId);
  }

  async insertMany(rows: InviteeDoc[]) {
    let inserted = 0;
    for (const row of rows) {
      if (await this.exists(row.postId, row.userId)) continue;
      this.rows.push({ ...row });
      inserted++;
    }
    return inserted;
  }

  async deleteExcept(postId: number, keepUserIds: number[]) {
    const keep = new Set(keepUserIds);
    const before = this.rows.length;
    this.rows = this.rows.filter((r) => r.postId !== postId || keep.has(r.userId));
    return before - this.rows.length;
  }

  async deleteAll(postId: number) {
    const before = this.rows.length;
    this.rows = this.rows.filter((r) => r.postId !== postId);
    return before - this.rows.length;
  }

  async listUnnotified(postId: number) {
    return (await this.listByPost(postId)).filter((r) => !r.notified);
  }

  async claimNotification(postId: number, userId: number) {
    const row = this.rows.find((r) => r.postId === postId && r.userId === userId);
    if (!row || row.notified) return false;
    row.notified = true;
    return true;
  }

  async releaseNotification(postId: number, userId: number) {
    const row = this.rows.find((r) => r.postId === postId && r.userId === userId);
    if (row) row.notified = false;
  }

  async listForPreview(postId: number, excludeUserId: number, limit: number) {
    if (limit <= 0) return [];
    return this.of(postId)
      .filter((r) => r.userId !== excludeUserId)
      .sort((a, b) => rank(a.status) - rank(b.status) || a.userId - b.userId)
      .slice(0, limit)
      .map((r) => ({ ...r }));
  }

  async upsertStatus(postId: number, userId: number, status: InviteeStatus) {
    let row = this.rows.find((r) => r.postId === postId && r.userId === userId);
    if (!row) {
      row = { postId, userId, status, notified: true };
      this.rows.push(row);
    }
    row.status = status;
    return { ...row };
  }
}

/**
 * Maps specifiers (group or user names) to user ids from a fixed table.
 */
export class StaticInviteeResolver implements InviteeResolver {
  calls: string[][] = [];

  constructor(private readonly table: Record<string, number[]>) {}

  async resolve(rawInvitees: string[]) {
    this.calls.push([...rawInvitees]);
    const ids = new Set<number>();
    for (const name of rawInvitees) for (const id of this.table[name] ?? []) ids.add(id);
    return Array.from(ids).sort((a, b) => a - b);
  }
}

export class RecordingNotificationChannel implements NotificationChannel {
  sent: Array<{ userId: number; payload: InviteNotification }> = [];
  failFor = new Set<number>();

  async send(userId: number, payload: InviteNotification) {
    if (this.failFor.has(userId)) throw new Error(`send to ${userId} failed`);
    this.sent.push({ userId, payload });
  }
}

export class RecordingPublisher implements RealtimePublisher {
  published: Array<{ channel: string; payload: { eventId: number } }> = [];

  async publish(channel: string, payload: { eventId: number }) {
    this.published.push({ channel, payload });
  }
}

export class InMemorySideFieldMirror implements SideFieldMirror {
  fields = new Map<string, string>();

  private key(topicId: number, name: string) {
    return `${topicId}:${name}`;
  }

  async upsert(topicId: number, name: string, value: string) {
    this.fields.set(this.key(topicId, name), value);
  }

  async remove(topicId: number, name: string) {
    this.fields.delete(this.key(topicId, name));
  }

  get(topicId: number, name: string) {
    return this.fields.get(this.key(topicId, name));
  }
}

export function makePost(overrides: Partial<ContentItem> = {}): ContentItem {
  return {
    id: 101,
    topicId: 7,
    topicTitle: "Board game night",
    postNumber: 1,
    userId: 1,
    authorName: "alice",
    isFirstPost: true,
    raw: "",
    ...overrides,
  };
}
