import mongoose, { Schema, Model } from "mongoose";

export type TopicCustomFieldDoc = {
  topicId: number;
  name: string;    // e.g. "post_event_starts_at"
  value: string;
  createdAt: Date;
  updatedAt: Date;
};

const TopicCustomFieldSchema = new Schema<TopicCustomFieldDoc>(
  {
    topicId: { type: Number, required: true, index: true },
    name: { type: String, required: true },
    value: { type: String, required: true }
  },
  { timestamps: true }
);

TopicCustomFieldSchema.index({ topicId: 1, name: 1 }, { unique: true });

export const TopicCustomField: Model<TopicCustomFieldDoc> =
  (mongoose.models.TopicCustomField as Model<TopicCustomFieldDoc>) ||
  mongoose.model<TopicCustomFieldDoc>("TopicCustomField", TopicCustomFieldSchema);
