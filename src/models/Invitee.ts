// models/Invitee.ts
import mongoose, { Schema, Model } from "mongoose";
import type { InviteeStatus } from "../services/types";

export type InviteeRecord = {
  postId: number;
  userId: number;
  status: InviteeStatus | null;
  notified: boolean;
  createdAt: Date;
  updatedAt: Date;
};

const InviteeSchema = new Schema<InviteeRecord>(
  {
    postId: {
      type: Number,
      ref: "PostEvent",
      required: true,
      index: true,
    },
    userId: {
      type: Number,
      required: true,
      index: true,
    },
    status: {
      type: String,
      enum: ["going", "interested", "not_going", null],
      required: false,
      default: null,
    },
    notified: {
      type: Boolean,
      required: true,
      default: false,
    },
  },
  { timestamps: true }
);

// one row per user per event
InviteeSchema.index({ postId: 1, userId: 1 }, { unique: true });
InviteeSchema.index({ postId: 1, notified: 1 });

export const Invitee: Model<InviteeRecord> =
  (mongoose.models.Invitee as Model<InviteeRecord>) ||
  mongoose.model<InviteeRecord>("Invitee", InviteeSchema);
