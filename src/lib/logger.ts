import pino, { type Logger } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type { Logger };

interface LoggerOptions {
  level?: LogLevel | "silent";
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const pretty = options.pretty ?? process.stdout.isTTY;

  if (pretty) {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino({ level });
}

export const silentLogger: Logger = pino({ level: "silent" });

// First 100 characters of a response body, for debug output
export function snippet(body: string, max = 100): string {
  const flat = body.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}
