import type { RedisOptions } from "ioredis";

export const redisConfigFromUrl = (url: string): RedisOptions => {
  const parsed = new URL(url);
  const dbValue = parsed.pathname.replace("/", "").trim();
  const parsedDb = Number.parseInt(dbValue, 10);

  return {
    host: parsed.hostname,
    port: Number(parsed.port || 6379),
    username: parsed.username || undefined,
    password: parsed.password || undefined,
    db: Number.isFinite(parsedDb) ? parsedDb : 0,
    // BullMQ workers block on Redis; it requires retries to be unlimited.
    maxRetriesPerRequest: null,
  };
};
