import pino from "pino";
import type { AppConfig } from "./config";

export interface Loggers {
  app: pino.Logger;
  lookups: pino.Logger;
}

export function createLoggers(config: AppConfig): Loggers {
  const app = pino({
    level: config.logLevel,
    base: {
      service: "banwatch",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    browser: {
      asObject: true,
    },
  });

  const lookups = pino({
    level: config.logLevel,
    base: {
      service: "banwatch-lookups",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    browser: {
      asObject: true,
    },
  });

  return { app, lookups };
}
