import { z } from "zod";
import {
  DEFAULT_ALGORITHM,
  DEFAULT_DIGITS,
  DEFAULT_PERIOD,
  MAX_DIGITS,
  MIN_DIGITS,
} from "../../core/entities/otp-params.js";
import { type AppError, invalidParameter } from "../../core/errors/app-error.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { printConfigError } from "../../shared/cli.js";
import { DEFAULT_RETENTION_PERIODS } from "../security/replay-guard.js";
import { DEFAULT_WINDOW } from "../security/totp-service.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

/**
 * Runtime config — validated at startup via Zod.
 * Fails fast with a field-by-field report if the environment is wrong.
 */
const configSchema = z
  .object({
    totp: z.object({
      digits: z.coerce.number().int().min(MIN_DIGITS).max(MAX_DIGITS).default(DEFAULT_DIGITS),
      period: z.coerce.number().int().positive().default(DEFAULT_PERIOD),
      algorithm: z
        .string()
        .transform((s) => s.toUpperCase())
        .pipe(z.enum(["SHA1", "SHA256", "SHA512"]))
        .default(DEFAULT_ALGORITHM),
      window: z.coerce.number().int().min(0).default(DEFAULT_WINDOW),
      issuer: z.string().min(1).default("totpgate"),
    }),

    auth: z.object({
      maxAttempts: z.coerce.number().int().positive().default(10),
    }),

    replay: z.object({
      directory: z.string().min(1).default("/var/run/totpgate"),
      retentionPeriods: z.coerce.number().int().positive().default(DEFAULT_RETENTION_PERIODS),
      lockTimeoutMs: z.coerce.number().int().positive().default(5_000),
      lockStaleMs: z.coerce.number().int().positive().default(30_000),
    }),

    secrets: z.object({
      directory: z.string().min(1).default("/etc/totpgate/secrets"),
    }),

    setup: z.object({
      requireRoot: booleanFlag.default("true"),
    }),

    log: z.object({
      level: z.enum(["debug", "info", "warn", "error", "fatal"]).default("warn"),
      format: z.enum(["pretty", "json"]).default("pretty"),
    }),
  })
  .superRefine((cfg, ctx) => {
    // A counter pruned while it could still match would verify a second time.
    const minimum = 2 * cfg.totp.window + 1;
    if (cfg.replay.retentionPeriods < minimum) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["replay", "retentionPeriods"],
        message: `must be at least 2 * window + 1 (${minimum})`,
      });
    }
  });

export type AppConfig = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

const ENV_NAMES: Record<string, string> = {
  "totp.digits": "TOTP_DIGITS",
  "totp.period": "TOTP_PERIOD",
  "totp.algorithm": "TOTP_ALGORITHM",
  "totp.window": "TOTP_WINDOW",
  "totp.issuer": "TOTP_ISSUER",
  "auth.maxAttempts": "TOTP_MAX_ATTEMPTS",
  "replay.directory": "TOTP_REPLAY_DIR",
  "replay.retentionPeriods": "TOTP_REPLAY_RETENTION_PERIODS",
  "replay.lockTimeoutMs": "TOTP_LOCK_TIMEOUT_MS",
  "replay.lockStaleMs": "TOTP_LOCK_STALE_MS",
  "secrets.directory": "TOTP_SECRET_DIR",
  "setup.requireRoot": "TOTP_SETUP_REQUIRE_ROOT",
  "log.level": "LOG_LEVEL",
  "log.format": "LOG_FORMAT",
};

/** Empty strings count as unset so `FOO= totpgate …` falls back to the default. */
const read = (env: Env, name: string): string | undefined => {
  const value = env[name];
  return value === undefined || value.trim() === "" ? undefined : value.trim();
};

export const parseConfig = (env: Env = process.env): Result<AppConfig, AppError> => {
  const result = configSchema.safeParse({
    totp: {
      digits: read(env, "TOTP_DIGITS"),
      period: read(env, "TOTP_PERIOD"),
      algorithm: read(env, "TOTP_ALGORITHM"),
      window: read(env, "TOTP_WINDOW"),
      issuer: read(env, "TOTP_ISSUER"),
    },
    auth: {
      maxAttempts: read(env, "TOTP_MAX_ATTEMPTS"),
    },
    replay: {
      directory: read(env, "TOTP_REPLAY_DIR"),
      retentionPeriods: read(env, "TOTP_REPLAY_RETENTION_PERIODS"),
      lockTimeoutMs: read(env, "TOTP_LOCK_TIMEOUT_MS"),
      lockStaleMs: read(env, "TOTP_LOCK_STALE_MS"),
    },
    secrets: {
      directory: read(env, "TOTP_SECRET_DIR"),
    },
    setup: {
      requireRoot: read(env, "TOTP_SETUP_REQUIRE_ROOT"),
    },
    log: {
      level: read(env, "LOG_LEVEL"),
      format: read(env, "LOG_FORMAT"),
    },
  });

  if (!result.success) {
    const fields: Record<string, string[]> = {};
    for (const issue of result.error.issues) {
      const key = issue.path.join(".");
      const name = ENV_NAMES[key] ?? key;
      fields[name] = [...(fields[name] ?? []), issue.message];
    }
    return err(invalidParameter("Invalid configuration", { fields }));
  }

  return ok(result.data);
};

export const loadConfig = (env: Env = process.env): AppConfig => {
  const result = parseConfig(env);
  if (!result.ok) {
    const fields = result.error.details?.["fields"];
    printConfigError(isFieldMap(fields) ? fields : {});
    process.exit(1);
  }
  return result.value;
};

const isFieldMap = (value: unknown): value is Record<string, string[]> =>
  typeof value === "object" &&
  value !== null &&
  Object.values(value).every((v) => Array.isArray(v) && v.every((m) => typeof m === "string"));
