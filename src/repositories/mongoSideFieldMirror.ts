import { TopicCustomField } from "../models/TopicCustomField";
import type { SideFieldMirror } from "../services/types";

export function createMongoSideFieldMirror(): SideFieldMirror {
  return {
    async upsert(topicId, name, value) {
      await TopicCustomField.updateOne(
        { topicId, name },
        { $set: { value } },
        { upsert: true }
      );
    },

    async remove(topicId, name) {
      await TopicCustomField.deleteMany({ topicId, name });
    },
  };
}
