import type { Operation } from "effection";
import { loggerApi } from "./logger.ts";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEvent {
  level: LogLevel;
  message: string;
}

/**
 * Capture log output for the rest of the current scope instead of writing
 * it to the console. Returns the captured events.
 */
export function* setupLogging(): Operation<LogEvent[]> {
  let events: LogEvent[] = [];
  let capture = (level: LogLevel) =>
    function* ([message]: [string, ...unknown[]]): Operation<void> {
      events.push({ level, message });
    };
  yield* loggerApi.around({
    debug: capture("debug"),
    info: capture("info"),
    warn: capture("warn"),
    error: capture("error"),
  });
  return events;
}
