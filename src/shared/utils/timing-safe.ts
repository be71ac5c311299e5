/**
 * Constant-time comparison of fixed-width codes.
 *
 * Exactly `width` byte positions are visited for every input: short inputs
 * read as zero bytes past their end, long inputs are never read past
 * `width`, and a length mismatch is folded into the same accumulator.
 */

const encoder = new TextEncoder();

/** Called once per compared byte position; lets tests count the work done. */
export type ByteProbe = (index: number) => void;

export const fixedWidthEqual = (
  a: string,
  b: string,
  width: number,
  probe?: ByteProbe,
): boolean => {
  const bufA = encoder.encode(a);
  const bufB = encoder.encode(b);

  let mismatch = (bufA.byteLength ^ width) | (bufB.byteLength ^ width);
  for (let i = 0; i < width; i++) {
    mismatch |= (bufA[i] ?? 0) ^ (bufB[i] ?? 0);
    probe?.(i);
  }
  return mismatch === 0;
};
