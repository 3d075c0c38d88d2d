import { ConsoleTransport, LogLayer } from "loglayer";

import type { EngineLogLevel } from "@/engine/config";

export const LOGGER_PREFIX = "[swiss]";

export type EngineLogger = LogLayer;

export function createEngineLogger(level: EngineLogLevel): EngineLogger {
  return new LogLayer({
    prefix: LOGGER_PREFIX,
    transport: new ConsoleTransport({
      logger: console,
      level,
    }),
  });
}
