import { describe, expect, it } from "vitest";
import { ErrorCode } from "../../src/core/errors/app-error.js";
import { parseConfig } from "../../src/infrastructure/config/config.js";
import { DEFAULT_RETENTION_PERIODS } from "../../src/infrastructure/security/replay-guard.js";
import { DEFAULT_WINDOW } from "../../src/infrastructure/security/totp-service.js";

const fieldsOf = (env: Record<string, string>): Record<string, unknown> => {
  const r = parseConfig(env);
  if (r.ok) throw new Error("expected a configuration error");
  expect(r.error.code).toBe(ErrorCode.INVALID_PARAMETER);
  expect(r.error.message).toBe("Invalid configuration");
  const fields = r.error.details?.["fields"];
  if (typeof fields !== "object" || fields === null) throw new Error("missing field report");
  return Object.fromEntries(Object.entries(fields));
};

describe("parseConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(parseConfig({})).toEqual({
      ok: true,
      value: {
        totp: { digits: 6, period: 30, algorithm: "SHA1", window: 1, issuer: "totpgate" },
        auth: { maxAttempts: 10 },
        replay: {
          directory: "/var/run/totpgate",
          retentionPeriods: 10,
          lockTimeoutMs: 5000,
          lockStaleMs: 30000,
        },
        secrets: { directory: "/etc/totpgate/secrets" },
        setup: { requireRoot: true },
        log: { level: "warn", format: "pretty" },
      },
    });
  });

  it("takes its window and retention defaults from the verifier and replay guard", () => {
    const r = parseConfig({});
    expect(r.ok).toBe(true);
    if (r.ok) {
      expect(r.value.totp.window).toBe(DEFAULT_WINDOW);
      expect(r.value.replay.retentionPeriods).toBe(DEFAULT_RETENTION_PERIODS);
    }
  });

  it("reads and coerces variables", () => {
    const r = parseConfig({
      TOTP_DIGITS: "8",
      TOTP_PERIOD: "60",
      TOTP_ALGORITHM: "sha512",
      TOTP_WINDOW: "0",
      TOTP_ISSUER: "Example Corp",
      TOTP_REPLAY_DIR: "/tmp/replay",
      TOTP_SETUP_REQUIRE_ROOT: "0",
      LOG_LEVEL: "debug",
      LOG_FORMAT: "json",
    });
    expect(r.ok).toBe(true);
    if (r.ok) {
      expect(r.value.totp).toEqual({
        digits: 8,
        period: 60,
        algorithm: "SHA512",
        window: 0,
        issuer: "Example Corp",
      });
      expect(r.value.replay.directory).toBe("/tmp/replay");
      expect(r.value.setup.requireRoot).toBe(false);
      expect(r.value.log).toEqual({ level: "debug", format: "json" });
    }
  });

  it("treats blank values as unset", () => {
    const r = parseConfig({ TOTP_DIGITS: "  ", TOTP_ISSUER: "" });
    expect(r.ok && r.value.totp.digits).toBe(6);
    expect(r.ok && r.value.totp.issuer).toBe("totpgate");
  });

  it("reports invalid fields by variable name", () => {
    const fields = fieldsOf({
      TOTP_DIGITS: "3",
      TOTP_ALGORITHM: "MD5",
      TOTP_SETUP_REQUIRE_ROOT: "maybe",
    });
    expect(Object.keys(fields).sort()).toEqual([
      "TOTP_ALGORITHM",
      "TOTP_DIGITS",
      "TOTP_SETUP_REQUIRE_ROOT",
    ]);
  });

  it("rejects a non-numeric period", () => {
    expect(Object.keys(fieldsOf({ TOTP_PERIOD: "soon" }))).toEqual(["TOTP_PERIOD"]);
  });

  it("requires replay retention to cover the whole window", () => {
    expect(fieldsOf({ TOTP_WINDOW: "6" })).toEqual({
      TOTP_REPLAY_RETENTION_PERIODS: ["must be at least 2 * window + 1 (13)"],
    });
    expect(parseConfig({ TOTP_WINDOW: "6", TOTP_REPLAY_RETENTION_PERIODS: "13" }).ok).toBe(true);
  });
});
