import { Group } from "../models/Group";
import { UserSettings } from "../models/UserSettings";
import type { InviteeResolver } from "../services/types";

function normalizeName(raw: string) {
  return raw.trim().replace(/^@/, "").toLowerCase();
}

/**
 * Each entry may name a group or a single user; both are looked up.
 */
export function createMongoInviteeResolver(): InviteeResolver {
  return {
    async resolve(rawInvitees) {
      const names = Array.from(new Set(rawInvitees.map(normalizeName).filter(Boolean)));
      if (names.length === 0) return [];

      const [groups, users] = await Promise.all([
        Group.find({ name: { $in: names } }).lean(),
        UserSettings.find({ username: { $in: names } }).lean(),
      ]);

      const ids = new Set<number>();
      for (const g of groups) for (const id of g.memberIds) ids.add(id);
      for (const u of users) ids.add(u.userId);

      return Array.from(ids).sort((a, b) => a - b);
    },
  };
}
