import { Telegraf } from "telegraf";
import { UserSettings } from "./models/UserSettings";

/**
 * The bot only exists so invitees can be reached: /start records the DM chat
 * id and @username that invitations are delivered to / resolved from.
 */
export function createBot(token: string) {
  const bot = new Telegraf(token);

  bot.use(async (ctx, next) => {
    console.log("[BOT] Update received:", ctx.updateType);
    return next();
  });

  bot.start(async (ctx) => {
    const from = ctx.from;
    const chat = ctx.chat;

    if (from && chat && chat.type === "private") {
      await UserSettings.findOneAndUpdate(
        { userId: from.id },
        {
          $set: {
            userId: from.id,
            dmChatId: chat.id,
            username: from.username?.toLowerCase(),
          },
          $setOnInsert: { displayName: from.first_name }
        },
        { upsert: true, new: true }
      );
    }

    await ctx.reply(
      "You're set up.\n\nEvent invitations will be delivered to this chat."
    );
  });

  bot.command("ping", async (ctx) => {
    await ctx.reply("pong");
  });

  return bot;
}
