import { mongo } from "mongoose";
import { Invitee, type InviteeRecord } from "../models/Invitee";
import type { InviteeDoc, InviteeRepository } from "../services/types";

function toInvitee(rec: InviteeRecord): InviteeDoc {
  return {
    postId: rec.postId,
    userId: rec.userId,
    status: rec.status ?? null,
    notified: rec.notified,
    createdAt: rec.createdAt,
    updatedAt: rec.updatedAt,
  };
}

// Concurrent reconciles can race on the same (postId, userId) upsert.
function isOnlyDuplicateKeyErrors(err: unknown): err is mongo.MongoBulkWriteError {
  if (!(err instanceof mongo.MongoBulkWriteError)) return false;
  const writeErrors = Array.isArray(err.writeErrors) ? err.writeErrors : [err.writeErrors];
  return writeErrors.length > 0 && writeErrors.every((e) => e.code === 11000);
}

export function createMongoInviteeRepository(): InviteeRepository {
  return {
    async listByPost(postId) {
      const docs = await Invitee.find({ postId }).sort({ userId: 1 });
      return docs.map((d) => toInvitee(d.toObject()));
    },

    async find(postId, userId) {
      const doc = await Invitee.findOne({ postId, userId });
      return doc ? toInvitee(doc.toObject()) : null;
    },

    async exists(postId, userId) {
      return (await Invitee.exists({ postId, userId })) !== null;
    },

    async insertMany(rows) {
      if (rows.length === 0) return 0;

      const ops = rows.map((row) => ({
        updateOne: {
          filter: { postId: row.postId, userId: row.userId },
          update: { $setOnInsert: { status: row.status, notified: row.notified } },
          upsert: true,
        },
      }));

      try {
        const res = await Invitee.bulkWrite(ops, { ordered: false });
        return res.upsertedCount;
      } catch (err) {
        if (!isOnlyDuplicateKeyErrors(err)) throw err;
        console.log(`[EVENT] Skipped invitees already present on post ${rows[0].postId}`);
        return err.result.upsertedCount;
      }
    },

    async deleteExcept(postId, keepUserIds) {
      const res = await Invitee.deleteMany({ postId, userId: { $nin: keepUserIds } });
      return res.deletedCount;
    },

    async deleteAll(postId) {
      const res = await Invitee.deleteMany({ postId });
      return res.deletedCount;
    },

    async listUnnotified(postId) {
      const docs = await Invitee.find({ postId, notified: false }).sort({ userId: 1 });
      return docs.map((d) => toInvitee(d.toObject()));
    },

    async claimNotification(postId, userId) {
      const res = await Invitee.updateOne(
        { postId, userId, notified: false },
        { $set: { notified: true } }
      );
      return res.modifiedCount === 1;
    },

    async releaseNotification(postId, userId) {
      await Invitee.updateOne({ postId, userId }, { $set: { notified: false } });
    },

    // status strings sort going < interested < not_going; unanswered rows go last
    async listForPreview(postId, excludeUserId, limit) {
      if (limit <= 0) return [];

      const answered = await Invitee.find({
        postId,
        userId: { $ne: excludeUserId },
        status: { $ne: null },
      })
        .sort({ status: 1, userId: 1 })
        .limit(limit);

      const out = answered.map((d) => toInvitee(d.toObject()));
      if (out.length >= limit) return out;

      const unanswered = await Invitee.find({
        postId,
        userId: { $ne: excludeUserId },
        status: null,
      })
        .sort({ userId: 1 })
        .limit(limit - out.length);

      return out.concat(unanswered.map((d) => toInvitee(d.toObject())));
    },

    async upsertStatus(postId, userId, status) {
      const doc = await Invitee.findOneAndUpdate(
        { postId, userId },
        { $set: { status }, $setOnInsert: { notified: true } },
        { new: true, upsert: true }
      );
      if (!doc) throw new Error("Invitee upsert returned nothing");
      return toInvitee(doc.toObject());
    },
  };
}
