import { config as dotenvConfig } from "dotenv";
import { z } from "zod";
import { ConfigError, errorMessage, type ConfigIssue } from "./errors";
import type { LogLevel } from "./logger";
import { PassSchedule } from "./schedule";
import type { Credentials } from "./types";

export interface AppConfig {
  readonly portal: {
    readonly baseUrl: string;
    readonly credentials: Credentials;
    readonly groupId: number;
    readonly proxyUrl?: string;
    readonly maxLoginRedirects: number;
    readonly maxActionRedirects: number;
    readonly timeoutMs: number;
  };
  readonly sync: {
    readonly pollIntervalMs: number;
    readonly weeks: number;
    readonly loginRetries: number;
    readonly loginRetryDelayMs: number;
  };
  readonly schedule: PassSchedule;
  readonly databasePath: string;
  readonly telegram?: {
    readonly token: string;
    readonly chatIds: readonly string[];
  };
  readonly logLevel: LogLevel;
}

export interface LoadConfigOptions {
  path?: string;
}

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

// Empty strings count as unset so `FOO=` in .env falls back to the default
const blankAsUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const optionalText = z.preprocess(blankAsUndefined, z.string().trim().optional());

const positiveInt = (fallback: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(fallback));

const envSchema = z.object({
  PORTAL_BASE_URL: z.string().trim().url(),
  PORTAL_USERNAME: z.string().trim().min(1, "is required"),
  PORTAL_PASSWORD: z.string().min(1, "is required"),
  BOOKING_GROUP_ID: positiveInt(2),
  POLL_INTERVAL_MS: positiveInt(300_000),
  WEEKS_TO_TRACK: positiveInt(3),
  LOGIN_MAX_RETRIES: positiveInt(3),
  LOGIN_RETRY_DELAY_MS: z.preprocess(blankAsUndefined, z.coerce.number().int().nonnegative().default(1000)),
  MAX_LOGIN_REDIRECTS: positiveInt(30),
  MAX_ACTION_REDIRECTS: positiveInt(10),
  HTTP_TIMEOUT_MS: positiveInt(30_000),
  PASS_SCHEDULE: optionalText,
  DATABASE_PATH: optionalText,
  TELEGRAM_BOT_TOKEN: optionalText,
  TELEGRAM_CHAT_IDS: optionalText,
  PORTAL_PROXY_URL: z.preprocess(blankAsUndefined, z.string().trim().url().optional()),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === "string" && value.trim() !== "" ? value.trim().toLowerCase() : undefined),
    z.enum(LOG_LEVELS).default("info")
  ),
});

function splitList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Validate an environment map into an AppConfig. Every problem is collected
 * into a single ConfigError.
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues: ConfigIssue[] = parsed.error.issues.map((issue) => ({
      field: issue.path.join(".") || "(root)",
      message: issue.message,
    }));
    throw new ConfigError(issues);
  }

  const vars = parsed.data;
  const issues: ConfigIssue[] = [];

  let schedule = new PassSchedule();
  if (vars.PASS_SCHEDULE) {
    try {
      schedule = PassSchedule.parse(vars.PASS_SCHEDULE);
    } catch (error) {
      issues.push({ field: "PASS_SCHEDULE", message: errorMessage(error) });
    }
  }

  const chatIds = splitList(vars.TELEGRAM_CHAT_IDS);
  if (vars.TELEGRAM_BOT_TOKEN && chatIds.length === 0) {
    issues.push({ field: "TELEGRAM_CHAT_IDS", message: "is required when TELEGRAM_BOT_TOKEN is set" });
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return Object.freeze({
    portal: Object.freeze({
      baseUrl: vars.PORTAL_BASE_URL.replace(/\/+$/, ""),
      credentials: Object.freeze({ username: vars.PORTAL_USERNAME, password: vars.PORTAL_PASSWORD }),
      groupId: vars.BOOKING_GROUP_ID,
      proxyUrl: vars.PORTAL_PROXY_URL,
      maxLoginRedirects: vars.MAX_LOGIN_REDIRECTS,
      maxActionRedirects: vars.MAX_ACTION_REDIRECTS,
      timeoutMs: vars.HTTP_TIMEOUT_MS,
    }),
    sync: Object.freeze({
      pollIntervalMs: vars.POLL_INTERVAL_MS,
      weeks: vars.WEEKS_TO_TRACK,
      loginRetries: vars.LOGIN_MAX_RETRIES,
      loginRetryDelayMs: vars.LOGIN_RETRY_DELAY_MS,
    }),
    schedule,
    databasePath: vars.DATABASE_PATH ?? "data/slots.db",
    telegram: vars.TELEGRAM_BOT_TOKEN
      ? Object.freeze({ token: vars.TELEGRAM_BOT_TOKEN, chatIds: Object.freeze(chatIds) })
      : undefined,
    logLevel: vars.LOG_LEVEL,
  });
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  dotenvConfig({ path: options.path });
  return parseConfig(process.env);
}

function mask(secret: string): string {
  return secret.length <= 4 ? "****" : `${secret.slice(0, 4)}****`;
}

// Printable view of the config with credentials and tokens masked
export function redactConfig(config: AppConfig): Record<string, unknown> {
  return {
    portal: {
      baseUrl: config.portal.baseUrl,
      username: config.portal.credentials.username,
      password: "****",
      groupId: config.portal.groupId,
      proxyUrl: config.portal.proxyUrl ? config.portal.proxyUrl.replace(/\/\/[^@/]*@/, "//****@") : undefined,
      maxLoginRedirects: config.portal.maxLoginRedirects,
      maxActionRedirects: config.portal.maxActionRedirects,
      timeoutMs: config.portal.timeoutMs,
    },
    sync: { ...config.sync },
    schedule: config.schedule.entries().map((e) => `${e.passNo}: ${config.schedule.label(e.passNo)}`),
    databasePath: config.databasePath,
    telegram: config.telegram
      ? { token: mask(config.telegram.token), chatIds: [...config.telegram.chatIds] }
      : undefined,
    logLevel: config.logLevel,
  };
}
