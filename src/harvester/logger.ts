import pino from "pino";
import { config } from "./config.js";

const usePrettyTransport = config.NODE_ENV !== "production" && config.NODE_ENV !== "test";

export const logger = pino({
  level: config.LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: "comment-harvester",
  },
  transport: usePrettyTransport
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          singleLine: true,
          translateTime: "SYS:standard",
        },
      }
    : undefined,
});
