import pino, { type Logger } from "pino";
import type { Env } from "./types/index.js";

export type { Logger };

export function createLogger(env: Pick<Env, "NODE_ENV" | "LOG_LEVEL">): Logger {
  return pino({
    level: env.LOG_LEVEL,
    transport:
      env.NODE_ENV === "development"
        ? {
            target: "pino-pretty",
            options: {
              translateTime: "HH:MM:ss Z",
              ignore: "pid,hostname",
            },
          }
        : undefined,
  });
}

/** Logger for tests and library use where output is unwanted. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
