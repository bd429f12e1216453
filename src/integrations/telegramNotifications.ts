import type { Telegram } from "telegraf";
import { UserSettings } from "../models/UserSettings";
import type { InviteNotification, NotificationChannel } from "../services/types";

type ChatLookup = (userId: number) => Promise<number | null>;

const MESSAGES: Record<string, (p: InviteNotification) => string> = {
  invite_user_notification: (p) =>
    `📅 ${p.authorName} invited you to an event in "${p.threadTitle}" (post #${p.itemSequence}).`,
};

export function renderNotification(payload: InviteNotification): string {
  const render = MESSAGES[payload.messageKey];
  if (!render) throw new Error(`Unknown notification message key: ${payload.messageKey}`);
  return render(payload);
}

async function findDmChatId(userId: number): Promise<number | null> {
  const settings = await UserSettings.findOne({ userId }).lean();
  return settings?.dmChatId ?? null;
}

/**
 * Delivers invitations as a bot DM. Users who never opened a chat with the
 * bot have no dmChatId and cannot be reached, which counts as a failed send.
 */
export function createTelegramNotificationChannel(opts: {
  telegram: Pick<Telegram, "sendMessage">;
  findChatId?: ChatLookup;
}): NotificationChannel {
  const findChatId = opts.findChatId ?? findDmChatId;

  return {
    async send(userId, payload) {
      const chatId = await findChatId(userId);
      if (!chatId) throw new Error(`User ${userId} has no DM chat with the bot`);

      await opts.telegram.sendMessage(chatId, renderNotification(payload));
      console.log(`[NOTIFY] Sent ${payload.messageKey} to user ${userId}`);
    },
  };
}
