import "dotenv/config";

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) throw new Error(`Missing required env var: ${name}`);
  return value;
}

function getNumberEnv(name: string, fallback: number) {
  const raw = process.env[name];
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0) return fallback;
  return n;
}

export type AppConfig = {
  botToken: string;
  mongoUri: string;
  redisUrl: string;
  jwtSecret: string;
  port: number;
  displayedInviteesLimit: number;
};

export function loadConfig(): AppConfig {
  return {
    botToken: requireEnv("BOT_TOKEN"),
    mongoUri: requireEnv("MONGODB_URI"),
    redisUrl: requireEnv("REDIS_URL"),
    jwtSecret: requireEnv("JWT_SECRET"),
    port: getNumberEnv("PORT", 3000),
    displayedInviteesLimit: getNumberEnv("DISPLAYED_INVITEES_LIMIT", 10),
  };
}
