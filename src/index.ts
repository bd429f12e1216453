import { loadConfig } from "./config";
import { connectDb } from "./db";
import { createBot } from "./bot";
import { startServer } from "./server/startServer";
import { createEventService } from "./services/event.service";
import { createEventParser } from "./services/eventParser";
import { createMongoEventRepository } from "./repositories/mongoEventRepository";
import { createMongoInviteeRepository } from "./repositories/mongoInviteeRepository";
import { createMongoInviteeResolver } from "./repositories/mongoInviteeResolver";
import { createMongoSideFieldMirror } from "./repositories/mongoSideFieldMirror";
import { createTelegramNotificationChannel } from "./integrations/telegramNotifications";
import { createRedisPublisher } from "./integrations/redisPublisher";

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function main() {
  const config = loadConfig();

  // DB connection
  const conn = await connectDb(config.mongoUri);
  console.log("Connected to MongoDB:", conn.name);

  const bot = createBot(config.botToken);

  const events = createMongoEventRepository();
  const invitees = createMongoInviteeRepository();

  const service = createEventService({
    events,
    invitees,
    parser: createEventParser(),
    resolver: createMongoInviteeResolver(),
    notifications: createTelegramNotificationChannel({ telegram: bot.telegram }),
    publisher: createRedisPublisher(config.redisUrl),
    mirror: createMongoSideFieldMirror(),
  });

  const server = startServer({
    port: config.port,
    service,
    events,
    invitees,
    jwtSecret: config.jwtSecret,
    displayedInviteesLimit: config.displayedInviteesLimit,
  });

  // launch() resolves only when polling stops
  void bot.launch({ dropPendingUpdates: true }).catch((e) => {
    console.error("[BOT] Launch error:", e);
  });
  console.log("Bot launched.");

  async function shutdown(signal: string) {
    console.log(`Shutdown signal received: ${signal}`);

    try {
      bot.stop(signal);
    } catch (e) {
      console.error("Bot stop error:", e);
    }

    server.close();
    await conn.close();

    // Small delay to let logs flush
    await sleep(250);

    process.exit(0);
  }

  const onSignal = (signal: string) => {
    shutdown(signal).catch((e) => {
      console.error("Shutdown error:", e);
      process.exit(1);
    });
  };

  process.once("SIGINT", () => onSignal("SIGINT"));
  process.once("SIGTERM", () => onSignal("SIGTERM"));
}

main().catch((e) => {
  console.error("Fatal startup error:", e);
  process.exit(1);
});
