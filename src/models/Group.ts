import mongoose, { Schema, Model, Types } from "mongoose";

export type GroupDoc = {
  _id: Types.ObjectId;
  name: string;        // what authors write in allowed-groups
  memberIds: number[]; // Telegram user ids
  createdAt: Date;
  updatedAt: Date;
};

const GroupSchema = new Schema<GroupDoc>(
  {
    name: { type: String, required: true, unique: true, lowercase: true, trim: true },
    memberIds: { type: [Number], required: true, default: [] }
  },
  { timestamps: true }
);

export const Group: Model<GroupDoc> =
  (mongoose.models.Group as Model<GroupDoc>) ||
  mongoose.model<GroupDoc>("Group", GroupSchema);
