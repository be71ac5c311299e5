import { describe, expect, it } from "vitest";
import { type OtpParams, otpParams } from "../../src/core/entities/otp-params.js";
import { ErrorCode, persistenceFailure } from "../../src/core/errors/app-error.js";
import type { ReplayGuard } from "../../src/core/ports/replay-guard.js";
import { type TotpService, VerifyOutcome } from "../../src/core/ports/totp-service.js";
import { err } from "../../src/core/types/result.js";
import { type HotpGenerator, hotp } from "../../src/infrastructure/crypto/hotp.js";
import { createLogger } from "../../src/infrastructure/logging/logger.js";
import { createTotpService } from "../../src/infrastructure/security/totp-service.js";
import { HELLO_SECRET, SEED_SHA1, at } from "../helpers/fixtures.js";
import { createMemoryReplayGuard } from "../helpers/memory-replay-guard.js";
import { createRecordingLogger } from "../helpers/recording-logger.js";

const params8: OtpParams = (() => {
  const r = otpParams({ digits: 8 });
  if (!r.ok) throw new Error(r.error.message);
  return r.value;
})();

interface Setup {
  readonly window?: number;
  readonly replayGuard?: ReplayGuard;
  readonly hotp?: HotpGenerator;
  readonly byteProbe?: (i: number) => void;
}

const service = (setup: Setup = {}): TotpService => {
  const r = createTotpService({
    params: params8,
    window: setup.window ?? 1,
    issuer: "totpgate",
    replayGuard: setup.replayGuard ?? createMemoryReplayGuard(),
    logger: createRecordingLogger(),
    ...(setup.hotp ? { hotp: setup.hotp } : {}),
    ...(setup.byteProbe ? { byteProbe: setup.byteProbe } : {}),
  });
  if (!r.ok) throw new Error(r.error.message);
  return r.value;
};

/** 8-digit SHA1 code of the RFC seed at `counter`. */
const codeAt = (counter: number) => hotp(SEED_SHA1, counter, 8, "SHA1");

// T = 1111111109 → counter 37037036
const T = 1111111109;
const C = 37037036;

describe("TotpService.check", () => {
  it("accepts the RFC 6238 code and reports its counter", () => {
    expect(service().check("07081804", SEED_SHA1, { at: at(T) })).toEqual({
      outcome: VerifyOutcome.ACCEPTED,
      counter: C,
    });
  });

  it("accepts neighbours inside the window", () => {
    const s = service({ window: 1 });
    expect(s.check(codeAt(C - 1), SEED_SHA1, { at: at(T) }).counter).toBe(C - 1);
    expect(s.check(codeAt(C + 1), SEED_SHA1, { at: at(T) }).counter).toBe(C + 1);
  });

  it("rejects counters just outside the window", () => {
    const s = service({ window: 1 });
    expect(s.check(codeAt(C - 2), SEED_SHA1, { at: at(T) }).outcome).toBe(VerifyOutcome.NO_MATCH);
    expect(s.check(codeAt(C + 2), SEED_SHA1, { at: at(T) }).outcome).toBe(VerifyOutcome.NO_MATCH);
  });

  it("window 0 accepts only the current counter", () => {
    const s = service({ window: 0 });
    expect(s.check(codeAt(C), SEED_SHA1, { at: at(T) }).outcome).toBe(VerifyOutcome.ACCEPTED);
    expect(s.check(codeAt(C + 1), SEED_SHA1, { at: at(T) }).outcome).toBe(VerifyOutcome.NO_MATCH);
  });

  it.each(["0708180", "070818044", "0708180a", "", " 7081804", "０7081804"])(
    "rejects malformed %j",
    (candidate) => {
      expect(service().check(candidate, SEED_SHA1, { at: at(T) })).toEqual({
        outcome: VerifyOutcome.INVALID_FORMAT,
      });
    },
  );

  it("rejects a replayed code for the same principal only", () => {
    const s = service();
    const opts = { at: at(T), principal: "alice" };
    expect(s.check("07081804", SEED_SHA1, opts).outcome).toBe(VerifyOutcome.ACCEPTED);
    expect(s.check("07081804", SEED_SHA1, opts).outcome).toBe(VerifyOutcome.REJECTED_REPLAY);
    expect(s.check("07081804", SEED_SHA1, { at: at(T), principal: "bob" }).outcome).toBe(
      VerifyOutcome.ACCEPTED,
    );
  });

  it("rejects a code replayed later from a neighbouring period", () => {
    const s = service();
    expect(s.check("07081804", SEED_SHA1, { at: at(T), principal: "alice" }).outcome).toBe(
      VerifyOutcome.ACCEPTED,
    );
    // Thirty seconds on, the same code is now the previous-period neighbour.
    expect(s.check("07081804", SEED_SHA1, { at: at(T + 30), principal: "alice" }).outcome).toBe(
      VerifyOutcome.REJECTED_REPLAY,
    );
  });

  it("does not record anything without a principal", () => {
    const guard = createMemoryReplayGuard();
    const s = service({ replayGuard: guard });
    s.check("07081804", SEED_SHA1, { at: at(T) });
    expect(guard.isUsed("alice", C)).toBe(false);
    expect(s.check("07081804", SEED_SHA1, { at: at(T) }).outcome).toBe(VerifyOutcome.ACCEPTED);
  });

  it("fails closed when the replay guard cannot persist", () => {
    const failing: ReplayGuard = {
      isUsed: () => true,
      markUsed: () => false,
      consume: () => err(persistenceFailure("disk gone")),
    };
    const s = service({ replayGuard: failing });
    expect(s.check("07081804", SEED_SHA1, { at: at(T), principal: "alice" })).toEqual({
      outcome: VerifyOutcome.REPLAY_UNAVAILABLE,
      counter: C,
    });
    expect(s.verify("07081804", SEED_SHA1, { at: at(T), principal: "alice" })).toBe(false);
  });

  it("reports an invalid verification time instead of throwing", () => {
    const guard = createMemoryReplayGuard();
    const s = service({ replayGuard: guard });
    const invalid = new Date(Number.NaN);
    expect(s.check("07081804", SEED_SHA1, { at: invalid, principal: "alice" })).toEqual({
      outcome: VerifyOutcome.INVALID_TIME,
    });
    expect(s.verify("07081804", SEED_SHA1, { at: invalid })).toBe(false);
    expect(guard.isUsed("alice", C)).toBe(false);
  });

  it("checks counter 0 without going negative at the epoch", () => {
    expect(service().check(codeAt(0), SEED_SHA1, { at: at(0) })).toEqual({
      outcome: VerifyOutcome.ACCEPTED,
      counter: 0,
    });
  });
});

describe("TotpService work is independent of the candidate", () => {
  const countingHotp = () => {
    let calls = 0;
    const generator: HotpGenerator = (...args) => {
      calls++;
      return hotp(...args);
    };
    return { generator, calls: () => calls };
  };

  it.each(["07081804", "12345678", "abc", "", "070818041234"])(
    "computes 2·window+1 codes for %j",
    (candidate) => {
      const counter = countingHotp();
      service({ window: 2, hotp: counter.generator }).check(candidate, SEED_SHA1, { at: at(T) });
      expect(counter.calls()).toBe(5);
    },
  );

  it("computes 2·window+1 codes for an invalid verification time", () => {
    const counter = countingHotp();
    let bytes = 0;
    service({ window: 2, hotp: counter.generator, byteProbe: () => bytes++ }).check(
      "07081804",
      SEED_SHA1,
      { at: new Date(Number.NaN) },
    );
    expect(counter.calls()).toBe(5);
    expect(bytes).toBe(8 * 5);
  });

  it.each(["07081804", "00000000", "x", "", "0708180412345"])(
    "compares digits × (2·window+1) bytes for %j",
    (candidate) => {
      let bytes = 0;
      service({ window: 1, byteProbe: () => bytes++ }).check(candidate, SEED_SHA1, { at: at(T) });
      expect(bytes).toBe(8 * 3);
    },
  );
});

describe("TotpService.verify", () => {
  it("collapses outcomes to a boolean", () => {
    const s = service();
    expect(s.verify("07081804", SEED_SHA1, { at: at(T) })).toBe(true);
    expect(s.verify("00000000", SEED_SHA1, { at: at(T) })).toBe(false);
    expect(s.verify("bad", SEED_SHA1, { at: at(T) })).toBe(false);
  });

  it("logs the outcome at debug without the candidate", () => {
    const lines: string[] = [];
    const r = createTotpService({
      params: params8,
      window: 1,
      issuer: "totpgate",
      replayGuard: createMemoryReplayGuard(),
      logger: createLogger("debug", {}, "json", { write: (line: string) => lines.push(line) }),
    });
    if (!r.ok) throw new Error(r.error.message);
    r.value.verify("07081804", SEED_SHA1, { at: at(T), principal: "alice" });

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? "");
    expect(entry).toEqual({
      level: "debug",
      msg: "TOTP verification",
      time: expect.any(String),
      service: "totp",
      outcome: "accepted",
      principal: "alice",
      counter: C,
    });
    expect(lines[0]).not.toContain("07081804");
  });
});

describe("createTotpService", () => {
  it.each([-1, 0.5])("rejects window %d", (window) => {
    const r = createTotpService({
      params: params8,
      window,
      issuer: "totpgate",
      replayGuard: createMemoryReplayGuard(),
      logger: createRecordingLogger(),
    });
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error.code).toBe(ErrorCode.INVALID_PARAMETER);
  });

  it("generates codes and URIs with its parameters", () => {
    const s = service();
    expect(s.generate(SEED_SHA1, at(59))).toBe("94287082");
    expect(s.generateUri(HELLO_SECRET, "alice")).toBe(
      "otpauth://totp/totpgate:alice?secret=JBSWY3DPEHPK3PXP&issuer=totpgate&algorithm=SHA1&digits=8&period=30",
    );
    expect(s.generateSecret()).toHaveLength(20);
  });
});
