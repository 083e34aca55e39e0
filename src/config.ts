import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./log.js";
import type { ChannelName } from "./notify/index.js";
import type { RunConfig } from "./types.js";

export const CHANNELS = ["console", "webhook"] as const satisfies readonly ChannelName[];

export const DEFAULT_READ_COUNT = 40;
export const MAX_READ_COUNT = 500;

export interface AppConfig {
  capturedRequest: string;
  run: RunConfig;
  requestTimeoutMs: number;
  deadlineMinutes?: number;
  maxFailedReads?: number;
  sessionCookies: string[];
  sessionCheckUrl?: string;
  notify: {
    channels: ChannelName[];
    webhookUrl?: string;
  };
  logLevel: LogLevel;
  testNotify: boolean;
}

type Env = Record<string, string | undefined>;

const blank = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const list = (value: string) =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

export const EnvSchema = z
  .object({
    CAPTURED_REQUEST: z.preprocess(blank, z.string().optional()),
    READ_COUNT: z.preprocess(blank, z.coerce.number().int().min(1).max(MAX_READ_COUNT).optional()),
    READ_MINUTES: z.preprocess(blank, z.coerce.number().positive().max(1440).optional()),
    MIN_DELAY_SECONDS: z.preprocess(blank, z.coerce.number().min(0).max(600).default(25)),
    MAX_DELAY_SECONDS: z.preprocess(blank, z.coerce.number().min(0).max(600).default(35)),
    MAX_RETRIES: z.preprocess(blank, z.coerce.number().int().min(0).max(10).default(3)),
    RETRY_BACKOFF_SECONDS: z.preprocess(blank, z.coerce.number().min(0).max(60).default(1)),
    REQUEST_TIMEOUT_SECONDS: z.preprocess(blank, z.coerce.number().positive().max(300).default(30)),
    RUN_DEADLINE_MINUTES: z.preprocess(blank, z.coerce.number().positive().optional()),
    MAX_FAILED_READS: z.preprocess(blank, z.coerce.number().int().min(0).optional()),
    SESSION_COOKIES: z.preprocess(blank, z.string().default("wr_skey")).transform(list),
    SESSION_CHECK_URL: z.preprocess(blank, z.string().url().optional()),
    NOTIFY_CHANNELS: z
      .preprocess(blank, z.string().default("console"))
      .transform((value) => (value.trim().toLowerCase() === "none" ? [] : list(value)))
      .pipe(z.array(z.enum(CHANNELS))),
    NOTIFY_WEBHOOK_URL: z.preprocess(blank, z.string().url().optional()),
    LOG_LEVEL: z.preprocess(
      (value) => (typeof blank(value) === "string" ? String(value).toLowerCase() : undefined),
      z.enum(LOG_LEVELS).default("info")
    ),
  })
  .superRefine((env, ctx) => {
    if (env.MIN_DELAY_SECONDS > env.MAX_DELAY_SECONDS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MIN_DELAY_SECONDS"],
        message: "must not exceed MAX_DELAY_SECONDS",
      });
    }
    if (env.NOTIFY_CHANNELS.includes("webhook") && !env.NOTIFY_WEBHOOK_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["NOTIFY_WEBHOOK_URL"],
        message: "is required when the webhook channel is selected",
      });
    }
    if (env.SESSION_COOKIES.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SESSION_COOKIES"],
        message: "must name at least one cookie",
      });
    }
  });

export interface CliOptions {
  overrides: Env;
  testNotify: boolean;
  showVersion: boolean;
  configFile?: string;
}

const FLAG_TO_ENV: Record<string, string> = {
  "--read-count": "READ_COUNT",
  "--minutes": "READ_MINUTES",
  "--deadline-minutes": "RUN_DEADLINE_MINUTES",
  "--channels": "NOTIFY_CHANNELS",
  "--log-level": "LOG_LEVEL",
};

const flagValue = (argv: string[], i: number): string => {
  const value = argv[i + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new ConfigError(`Option ${argv[i]} needs a value`);
  }
  return value;
};

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { overrides: {}, testNotify: false, showVersion: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--test-notify") {
      options.testNotify = true;
      continue;
    }
    if (arg === "--version" || arg === "-v") {
      options.showVersion = true;
      continue;
    }
    if (arg === "--config" || arg === "-c") {
      options.configFile = flagValue(argv, i);
      i++;
      continue;
    }
    const envKey = FLAG_TO_ENV[arg];
    if (!envKey) {
      throw new ConfigError(`Unknown option ${arg}`);
    }
    options.overrides[envKey] = flagValue(argv, i);
    i++;
  }

  return options;
}

// Setting names of earlier releases, still honoured when the current name is unset.
const LEGACY_NAMES: Record<string, string> = {
  WXREAD_CURL_BASH: "CAPTURED_REQUEST",
  READ_NUM: "READ_COUNT",
};

export function withLegacyNames(env: Env): Env {
  const resolved: Env = { ...env };
  for (const [legacy, current] of Object.entries(LEGACY_NAMES)) {
    if (blank(resolved[current]) === undefined && env[legacy] !== undefined) {
      resolved[current] = env[legacy];
    }
  }
  return resolved;
}

const SettingsFileSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

/**
 * Parse a settings file: a JSON object, or `KEY=value` lines with `#`
 * comments. Keys are the environment variable names.
 */
export function parseSettingsFile(path: string, text: string): Env {
  if (path.endsWith(".json")) {
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Settings file ${path} is not valid JSON`, [reason]);
    }
    const parsed = SettingsFileSchema.safeParse(value);
    if (!parsed.success) {
      throw new ConfigError(
        `Settings file ${path} must be an object of plain values`,
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "file"} ${issue.message}`)
      );
    }
    return Object.fromEntries(
      Object.entries(parsed.data).map(([key, setting]) => [key, String(setting)])
    );
  }

  const settings: Env = {};
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;
    const eq = line.indexOf("=");
    if (eq <= 0) continue;
    settings[line.slice(0, eq).trim()] = line.slice(eq + 1).trim();
  }
  return settings;
}

export interface LoadOptions {
  readFile?: (path: string) => string;
}

function readSettingsFile(path: string, readFile: (path: string) => string): Env {
  let text: string;
  try {
    text = readFile(path);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read settings file ${path}`, [reason]);
  }
  return withLegacyNames(parseSettingsFile(path, text));
}

/** Reads to schedule for a wall-clock budget, using the mean pacing delay. */
export function deriveReadCount(minutes: number, minDelaySeconds: number, maxDelaySeconds: number): number {
  const meanDelay = Math.max(1, (minDelaySeconds + maxDelaySeconds) / 2);
  const count = Math.round((minutes * 60) / meanDelay);
  return Math.min(MAX_READ_COUNT, Math.max(1, count));
}

/** Settings come from the file, then the environment, then flags; later wins. */
export function loadConfig(env: Env, argv: string[] = [], options: LoadOptions = {}): AppConfig {
  const cli = parseArgs(argv);
  const fromFile = cli.configFile
    ? readSettingsFile(cli.configFile, options.readFile ?? ((path) => readFileSync(path, "utf8")))
    : {};
  const fromEnv = Object.fromEntries(
    Object.entries(withLegacyNames(env)).filter(([, value]) => blank(value) !== undefined)
  );
  const parsed = EnvSchema.safeParse({ ...fromFile, ...fromEnv, ...cli.overrides });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`);
    throw new ConfigError("Invalid configuration", issues);
  }
  const values = parsed.data;

  if (!values.CAPTURED_REQUEST && !cli.testNotify) {
    throw new ConfigError("Invalid configuration", ["CAPTURED_REQUEST is required"]);
  }

  const readCount =
    values.READ_COUNT ??
    (values.READ_MINUTES !== undefined
      ? deriveReadCount(values.READ_MINUTES, values.MIN_DELAY_SECONDS, values.MAX_DELAY_SECONDS)
      : DEFAULT_READ_COUNT);

  return {
    capturedRequest: values.CAPTURED_REQUEST ?? "",
    run: {
      readCount,
      minDelaySeconds: values.MIN_DELAY_SECONDS,
      maxDelaySeconds: values.MAX_DELAY_SECONDS,
      maxRetriesPerCall: values.MAX_RETRIES,
      retryBackoffBase: values.RETRY_BACKOFF_SECONDS,
    },
    requestTimeoutMs: values.REQUEST_TIMEOUT_SECONDS * 1000,
    ...(values.RUN_DEADLINE_MINUTES !== undefined ? { deadlineMinutes: values.RUN_DEADLINE_MINUTES } : {}),
    ...(values.MAX_FAILED_READS !== undefined ? { maxFailedReads: values.MAX_FAILED_READS } : {}),
    sessionCookies: values.SESSION_COOKIES,
    ...(values.SESSION_CHECK_URL ? { sessionCheckUrl: values.SESSION_CHECK_URL } : {}),
    notify: {
      channels: [...new Set(values.NOTIFY_CHANNELS)],
      ...(values.NOTIFY_WEBHOOK_URL ? { webhookUrl: values.NOTIFY_WEBHOOK_URL } : {}),
    },
    logLevel: values.LOG_LEVEL,
    testNotify: cli.testNotify,
  };
}

/** Configuration as it may appear in logs: credentials and webhook paths hidden. */
export function describeConfig(config: AppConfig): Record<string, unknown> {
  return {
    capturedRequest: config.capturedRequest ? `<${config.capturedRequest.length} chars>` : "<unset>",
    run: config.run,
    requestTimeoutMs: config.requestTimeoutMs,
    deadlineMinutes: config.deadlineMinutes ?? null,
    maxFailedReads: config.maxFailedReads ?? null,
    sessionCookies: config.sessionCookies,
    sessionCheckUrl: config.sessionCheckUrl ?? null,
    notify: {
      channels: config.notify.channels,
      webhookUrl: config.notify.webhookUrl ? `${new URL(config.notify.webhookUrl).origin}/***` : null,
    },
    logLevel: config.logLevel,
  };
}
