import Redis from "ioredis";
import { getEnv } from "../config/env";
import { getLogger } from "../logger";

const BASE_OPTIONS = {
  // BullMQ requires blocking commands to wait indefinitely.
  maxRetriesPerRequest: null,
  connectTimeout: 2000,
  enableReadyCheck: true,
  lazyConnect: false,
};

function requireRedisUrl(): string {
  const { REDIS_URL } = getEnv();
  if (!REDIS_URL) {
    throw new Error("REDIS_URL is not configured");
  }
  return REDIS_URL;
}

export function createRedisClient(connectionName?: string): Redis {
  const url = requireRedisUrl();
  const log = getLogger();
  const client = new Redis(url, {
    ...BASE_OPTIONS,
    connectionName,
  });
  client.on("error", (error) => {
    log.error({ err: error, connectionName }, "[REDIS] Connection error");
  });
  client.on("ready", () => {
    log.info({ connectionName }, "[REDIS] ready");
  });
  return client;
}
