import { PostEvent, type PostEventRecord } from "../models/PostEvent";
import type { EventRepository, PostEventDoc } from "../services/types";

function toEvent(rec: PostEventRecord): PostEventDoc {
  return {
    id: rec._id,
    name: rec.name ?? undefined,
    startsAt: rec.startsAt,
    endsAt: rec.endsAt ?? undefined,
    status: rec.status,
    rawInvitees: [...rec.rawInvitees],
    ownerId: rec.ownerId,
    topicId: rec.topicId,
    deletedAt: rec.deletedAt ?? undefined,
    createdAt: rec.createdAt,
    updatedAt: rec.updatedAt,
  };
}

export function createMongoEventRepository(): EventRepository {
  return {
    async findById(id) {
      const doc = await PostEvent.findById(id);
      return doc ? toEvent(doc.toObject()) : null;
    },

    async findVisible(id) {
      const doc = await PostEvent.findOne({ _id: id, deletedAt: null });
      return doc ? toEvent(doc.toObject()) : null;
    },

    // uses the { deletedAt, startsAt } index
    async listUpcoming(now, limit) {
      const docs = await PostEvent.find({ deletedAt: null, startsAt: { $gt: now } })
        .sort({ startsAt: 1 })
        .limit(limit);
      return docs.map((d) => toEvent(d.toObject()));
    },

    async create(event) {
      const doc = await PostEvent.create({
        _id: event.id,
        name: event.name,
        startsAt: event.startsAt,
        endsAt: event.endsAt,
        status: event.status,
        rawInvitees: event.rawInvitees,
        ownerId: event.ownerId,
        topicId: event.topicId,
      });
      return toEvent(doc.toObject());
    },

    async update(event) {
      const doc = await PostEvent.findById(event.id);
      if (!doc) throw new Error("Event not found");

      // undefined clears optional fields (name, endsAt)
      doc.name = event.name;
      doc.startsAt = event.startsAt;
      doc.endsAt = event.endsAt;
      doc.status = event.status;
      doc.rawInvitees = event.rawInvitees;
      doc.ownerId = event.ownerId;
      doc.topicId = event.topicId;

      await doc.save();
      return toEvent(doc.toObject());
    },

    async delete(id) {
      await PostEvent.deleteOne({ _id: id });
    },
  };
}
