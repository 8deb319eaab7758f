import pino from "pino";

export interface LoggerOptions {
  name?: string;
  level?: pino.Level | "silent";
}

/**
 * Creates a JSON logger writing to stderr, leaving stdout to the schedule.
 */
export function createLogger({ name = "callplan", level = "info" }: LoggerOptions = {}): pino.Logger {
  return pino({ name, level }, pino.destination(2));
}

let _silent: pino.Logger | null = null;

/**
 * Shared logger that discards everything; the default for library calls.
 */
export function silentLogger(): pino.Logger {
  if (!_silent) {
    _silent = pino({ level: "silent" });
  }
  return _silent;
}
