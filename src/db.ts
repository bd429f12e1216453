import mongoose from "mongoose";
import { Invitee } from "./models/Invitee";
import { TopicCustomField } from "./models/TopicCustomField";

export async function connectDb(mongoUri: string) {
  mongoose.set("strictQuery", true);
  await mongoose.connect(mongoUri);

  // roster dedupe and the topic mirror upsert both rely on these unique indexes
  await Promise.all([Invitee.syncIndexes(), TopicCustomField.syncIndexes()]);

  return mongoose.connection;
}
