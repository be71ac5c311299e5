import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

const encoder = new TextEncoder();

/** RFC 4226 / RFC 6238 test seeds. */
export const SEED_SHA1 = encoder.encode("12345678901234567890");
export const SEED_SHA256 = encoder.encode("12345678901234567890123456789012");
export const SEED_SHA512 = encoder.encode(
  "1234567890123456789012345678901234567890123456789012345678901234",
);

/** "JBSWY3DPEHPK3PXP" decoded: "Hello!" followed by 0xDEADBEEF. */
export const HELLO_SECRET = Uint8Array.from([
  0x48, 0x65, 0x6c, 0x6c, 0x6f, 0x21, 0xde, 0xad, 0xbe, 0xef,
]);

export const at = (seconds: number): Date => new Date(seconds * 1000);

export interface TempDir {
  readonly path: string;
  cleanup(): void;
}

export const createTempDir = (prefix = "totpgate-"): TempDir => {
  const path = mkdtempSync(join(tmpdir(), prefix));
  return {
    path,
    cleanup: () => rmSync(path, { recursive: true, force: true }),
  };
};
