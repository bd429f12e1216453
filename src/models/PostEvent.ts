import mongoose, { Schema, Model } from "mongoose";
import type { EventStatus } from "../services/types";

export type PostEventRecord = {
  _id: number; // post id, not an ObjectId
  name?: string;
  startsAt: Date;
  endsAt?: Date;
  status: EventStatus;
  rawInvitees: string[];
  ownerId: number; // post author
  topicId: number;
  deletedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
};

const PostEventSchema = new Schema<PostEventRecord>(
  {
    _id: { type: Number, required: true },
    name: { type: String, required: false },
    startsAt: { type: Date, required: true, index: true },
    endsAt: { type: Date, required: false },
    status: {
      type: String,
      enum: ["standalone", "public", "private"],
      required: true,
      default: "standalone",
    },
    rawInvitees: { type: [String], required: true, default: [] },
    ownerId: { type: Number, required: true, index: true },
    topicId: { type: Number, required: true, index: true },
    deletedAt: { type: Date, required: false, default: null },
  },
  { timestamps: true }
);

PostEventSchema.index({ deletedAt: 1, startsAt: 1 });

export const PostEvent: Model<PostEventRecord> =
  (mongoose.models.PostEvent as Model<PostEventRecord>) ||
  mongoose.model<PostEventRecord>("PostEvent", PostEventSchema);
