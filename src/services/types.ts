// src/services/types.ts
// Ports the event core depends on. Mongo/Telegram/Redis implementations live in
// src/repositories and src/integrations; tests use src/testing/inMemory.ts.

export type EventStatus = "standalone" | "public" | "private";

export type InviteeStatus = "going" | "interested" | "not_going";

export type PostEventDoc = {
  id: number; // same as the post id
  name?: string;
  startsAt: Date;
  endsAt?: Date;
  status: EventStatus;
  rawInvitees: string[];
  ownerId: number; // post author
  topicId: number;
  deletedAt?: Date;
  createdAt?: Date;
  updatedAt?: Date;
};

export type InviteeDoc = {
  postId: number;
  userId: number;
  status: InviteeStatus | null; // null = no answer yet
  notified: boolean;
  createdAt?: Date;
  updatedAt?: Date;
};

/**
 * The post an event lives on, as handed to us by the forum host.
 */
export type ContentItem = {
  id: number;
  topicId: number;
  topicTitle: string;
  postNumber: number;
  userId: number;
  authorName: string;
  isFirstPost: boolean;
  raw: string;
};

export type ParsedEvent = {
  name?: string;
  start?: string;
  end?: string;
  status?: string;
  allowedGroups?: string;
};

export interface EventTextParser {
  extract(raw: string): ParsedEvent | null;
}

export interface InviteeResolver {
  /** Deduplicated user ids for group names / usernames. */
  resolve(rawInvitees: string[]): Promise<number[]>;
}

export type InviteNotification = {
  threadId: number;
  itemSequence: number;
  threadTitle: string;
  authorName: string;
  messageKey: string;
};

export interface NotificationChannel {
  send(userId: number, payload: InviteNotification): Promise<void>;
}

export interface RealtimePublisher {
  publish(channel: string, payload: { eventId: number }): Promise<void>;
}

export interface SideFieldMirror {
  upsert(topicId: number, name: string, value: string): Promise<void>;
  remove(topicId: number, name: string): Promise<void>;
}

export interface EventRepository {
  findById(id: number): Promise<PostEventDoc | null>;
  findVisible(id: number): Promise<PostEventDoc | null>;
  listUpcoming(now: Date, limit: number): Promise<PostEventDoc[]>;
  create(event: PostEventDoc): Promise<PostEventDoc>;
  update(event: PostEventDoc): Promise<PostEventDoc>;
  delete(id: number): Promise<void>;
}

export interface InviteeRepository {
  listByPost(postId: number): Promise<InviteeDoc[]>;
  find(postId: number, userId: number): Promise<InviteeDoc | null>;
  exists(postId: number, userId: number): Promise<boolean>;
  /** Inserts rows, skipping (postId, userId) pairs that already exist. Returns the inserted count. */
  insertMany(rows: InviteeDoc[]): Promise<number>;
  deleteExcept(postId: number, keepUserIds: number[]): Promise<number>;
  deleteAll(postId: number): Promise<number>;
  listUnnotified(postId: number): Promise<InviteeDoc[]>;
  /** Atomically flips notified false -> true. False when someone else already did. */
  claimNotification(postId: number, userId: number): Promise<boolean>;
  releaseNotification(postId: number, userId: number): Promise<void>;
  /** Ordered by (status rank, userId), unanswered last. */
  listForPreview(postId: number, excludeUserId: number, limit: number): Promise<InviteeDoc[]>;
  upsertStatus(postId: number, userId: number, status: InviteeStatus): Promise<InviteeDoc>;
}
