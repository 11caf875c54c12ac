import pino from "pino";
import { cfg } from "./config";

export const log = pino({
  level: cfg.LOG_LEVEL,
  transport:
    cfg.NODE_ENV === "development"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            destination: 2,
          },
        }
      : undefined,
});
