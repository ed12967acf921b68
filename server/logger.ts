import pino from "pino";
import type { FastifyBaseLogger } from "fastify";
import { getEnv } from "./config/env";

let sharedLogger: FastifyBaseLogger | null = null;

export function getLogger(): FastifyBaseLogger {
  if (!sharedLogger) {
    const env = getEnv();
    sharedLogger = pino({
      name: "pdf-layout-translator",
      level: env.LOG_LEVEL,
    });
  }
  return sharedLogger;
}

export function createSilentLogger(): FastifyBaseLogger {
  return pino({ level: "silent" });
}
