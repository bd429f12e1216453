import mongoose, { Schema, Model } from "mongoose";

export type UserSettingsDoc = {
  userId: number; // Telegram user id
  username?: string; // Telegram @username, lowercased, without "@"
  dmChatId?: number; // Telegram private chat id with bot (needed for DM delivery)
  displayName?: string;
  createdAt: Date;
  updatedAt: Date;
};

const UserSettingsSchema = new Schema<UserSettingsDoc>(
  {
    userId: { type: Number, required: true, unique: true, index: true },
    username: { type: String, required: false, lowercase: true, trim: true, index: true },
    dmChatId: { type: Number, required: false, index: true },

    displayName: {
      type: String,
      required: false,
      default: "",
      trim: true,
      maxlength: 48,
    }
  },
  { timestamps: true }
);

export const UserSettings: Model<UserSettingsDoc> =
  (mongoose.models.UserSettings as Model<UserSettingsDoc>) ||
  mongoose.model<UserSettingsDoc>("UserSettings", UserSettingsSchema);
