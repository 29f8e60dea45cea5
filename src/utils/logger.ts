type LogLevel = "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  action: string;
  [key: string]: unknown;
}

// One JSON object per line, so log shippers can index on `action`.
export function log(entry: LogEntry): void {
  const line = JSON.stringify({ time: new Date().toISOString(), ...entry });
  switch (entry.level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

export const logger = {
  info: (action: string, fields: Record<string, unknown> = {}) =>
    log({ ...fields, level: "info", action }),
  warn: (action: string, fields: Record<string, unknown> = {}) =>
    log({ ...fields, level: "warn", action }),
  error: (action: string, fields: Record<string, unknown> = {}) =>
    log({ ...fields, level: "error", action }),
};

export const describeError = (error: unknown): Record<string, unknown> =>
  error instanceof Error
    ? { error: error.message, name: error.name, stack: error.stack }
    : { error: String(error) };
