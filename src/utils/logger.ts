/***
 * Logger — Leveled console output with a fixed context prefix.
 *
 * Every message is written as `[idref:<context>] <message>` followed by an
 * optional structured payload. Messages below the configured level are
 * dropped before formatting.
 *
 *   const log = create_console_logger("objects", "debug");
 *   log.warn("repaired id collision", { previous_id: 2, id: 3 });
 *   // console.warn("[idref:objects] repaired id collision", { previous_id: 2, id: 3 })
 *
 ***/

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogPayload = Record<string, unknown>;

export interface Logger {
  debug(message: string, payload?: LogPayload): void;
  info(message: string, payload?: LogPayload): void;
  warn(message: string, payload?: LogPayload): void;
  error(message: string, payload?: LogPayload): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const is_log_level = (v: string): v is LogLevel =>
  Object.prototype.hasOwnProperty.call(LEVEL_RANK, v);

export function create_console_logger(
  context: string,
  level: LogLevel,
): Logger {
  const threshold = LEVEL_RANK[level];
  const prefix = `[idref:${context}]`;

  const emit =
    (at: Exclude<LogLevel, "silent">) =>
    (message: string, payload?: LogPayload): void => {
      if (LEVEL_RANK[at] < threshold) return;
      if (payload === undefined) console[at](`${prefix} ${message}`);
      else console[at](`${prefix} ${message}`, payload);
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

const noop = (): void => {};

export const silent_logger: Logger = Object.freeze({
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
});
