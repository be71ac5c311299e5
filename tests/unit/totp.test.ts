import { describe, expect, it } from "vitest";
import { type OtpParams, otpParams } from "../../src/core/entities/otp-params.js";
import { ErrorCode, UnrecoverableError } from "../../src/core/errors/app-error.js";
import {
  counterAt,
  generateSecret,
  generateTotp,
  totpCounter,
} from "../../src/infrastructure/crypto/totp.js";
import { SEED_SHA1, SEED_SHA256, SEED_SHA512, at } from "../helpers/fixtures.js";

const params = (algorithm: string): OtpParams => {
  const r = otpParams({ digits: 8, period: 30, algorithm });
  if (!r.ok) throw new Error(r.error.message);
  return r.value;
};

const caught = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (e: unknown) {
    return e;
  }
  return undefined;
};

describe("generateTotp", () => {
  // RFC 6238 Appendix B
  it.each([
    [59, "94287082", "46119246", "90693936"],
    [1111111109, "07081804", "68084774", "25091201"],
    [1111111111, "14050471", "67062674", "99943326"],
    [1234567890, "89005924", "91819424", "93441116"],
    [2000000000, "69279037", "90698825", "38618901"],
    [20000000000, "65353130", "77737706", "47863826"],
  ])("T=%i", (seconds, sha1, sha256, sha512) => {
    expect(generateTotp(SEED_SHA1, at(seconds), params("SHA1"))).toBe(sha1);
    expect(generateTotp(SEED_SHA256, at(seconds), params("SHA256"))).toBe(sha256);
    expect(generateTotp(SEED_SHA512, at(seconds), params("SHA512"))).toBe(sha512);
  });

  it("passes the derived counter to the generator", () => {
    const calls: number[] = [];
    generateTotp(SEED_SHA1, at(95), params("SHA1"), (_secret, counter) => {
      calls.push(counter);
      return "00000000";
    });
    expect(calls).toEqual([3]);
  });
});

describe("totpCounter", () => {
  it("divides unix seconds by the period", () => {
    expect(totpCounter(at(59), 30)).toEqual({ ok: true, value: 1 });
    expect(totpCounter(at(60), 30)).toEqual({ ok: true, value: 2 });
    expect(totpCounter(at(59), 60)).toEqual({ ok: true, value: 0 });
  });

  it("clamps instants before the epoch to 0", () => {
    expect(totpCounter(at(-100), 30)).toEqual({ ok: true, value: 0 });
  });

  it("rejects an invalid Date", () => {
    const r = totpCounter(new Date(Number.NaN), 30);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error.code).toBe(ErrorCode.INVALID_PARAMETER);
  });

  it.each([0, -30, 1.5])("rejects period %d", (period) => {
    const r = totpCounter(at(59), period);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error.code).toBe(ErrorCode.INVALID_PARAMETER);
  });

  it("counterAt agrees for validated params", () => {
    expect(counterAt(at(1111111109), params("SHA1"))).toBe(37037036);
  });
});

describe("generateSecret", () => {
  it("returns 20 random bytes by default", () => {
    const a = generateSecret();
    const b = generateSecret();
    expect(a).toHaveLength(20);
    expect(b).toHaveLength(20);
    expect(a).not.toEqual(b);
  });

  it("uses the injected source", () => {
    const secret = generateSecret(4, (size) => new Uint8Array(size).fill(7));
    expect(secret).toEqual(Uint8Array.from([7, 7, 7, 7]));
  });

  it("fails when the source throws", () => {
    const e = caught(() =>
      generateSecret(20, () => {
        throw new Error("entropy exhausted");
      }),
    );
    expect(e).toBeInstanceOf(UnrecoverableError);
    if (e instanceof UnrecoverableError) {
      expect(e.error.code).toBe(ErrorCode.RANDOM_SOURCE_UNAVAILABLE);
    }
  });

  it("fails and zeroes a short result", () => {
    const short = new Uint8Array(5).fill(9);
    const e = caught(() => generateSecret(20, () => short));
    expect(e).toBeInstanceOf(UnrecoverableError);
    expect(short).toEqual(new Uint8Array(5));
  });

  it.each([0, -1, 2.5])("rejects length %d", (length) => {
    const e = caught(() => generateSecret(length));
    expect(e).toBeInstanceOf(UnrecoverableError);
    if (e instanceof UnrecoverableError) {
      expect(e.error.code).toBe(ErrorCode.INVALID_PARAMETER);
    }
  });
});
