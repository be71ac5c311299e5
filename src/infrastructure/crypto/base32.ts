import { type AppError, invalidCharacter } from "../../core/errors/app-error.js";
import { type Result, err, ok } from "../../core/types/result.js";

/** Base32 alphabet (RFC 4648 §6) */
const BASE32_CHARS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567";
const PAD = "=";

const LOWER_A = 0x61;
const LOWER_Z = 0x7a;
const CASE_BIT = 0x20;

/** Alphabet index of `code`, folding ASCII a–z only; -1 for anything else. */
const alphabetIndex = (code: number): number => {
  const folded = code >= LOWER_A && code <= LOWER_Z ? code - CASE_BIT : code;
  return BASE32_CHARS.indexOf(String.fromCharCode(folded));
};

/** Encode bytes to padded base32. Empty input encodes to "". */
export const base32Encode = (data: Uint8Array): string => {
  let result = "";
  let bits = 0;
  let value = 0;
  for (const byte of data) {
    value = ((value << 8) | byte) & 0xffff;
    bits += 8;
    while (bits >= 5) {
      bits -= 5;
      result += BASE32_CHARS[(value >>> bits) & 0x1f];
    }
  }
  if (bits > 0) {
    result += BASE32_CHARS[(value << (5 - bits)) & 0x1f];
  }
  while (result.length % 8 !== 0) {
    result += PAD;
  }
  return result;
};

/** Encoded form without "=" padding, as authenticator apps expect in URIs. */
export const base32EncodeUnpadded = (data: Uint8Array): string =>
  base32Encode(data).replace(/=+$/, "");

/**
 * Decode base32. ASCII letters match in either case. "=" is ignored wherever it appears; any
 * other character outside the alphabet is an INVALID_CHARACTER error.
 * Leftover bits that do not complete a byte are dropped.
 */
export const base32Decode = (encoded: string): Result<Uint8Array, AppError> => {
  const out = new Uint8Array(Math.floor((encoded.length * 5) / 8));
  let length = 0;
  let bits = 0;
  let value = 0;

  for (let i = 0; i < encoded.length; i++) {
    const char = encoded.charAt(i);
    if (char === PAD) continue;
    const idx = alphabetIndex(encoded.charCodeAt(i));
    if (idx === -1) {
      out.fill(0);
      return err(invalidCharacter(char, i));
    }
    value = ((value << 5) | idx) & 0xffff;
    bits += 5;
    if (bits >= 8) {
      bits -= 8;
      out[length++] = (value >>> bits) & 0xff;
    }
  }

  const bytes = out.slice(0, length);
  out.fill(0);
  return ok(bytes);
};
