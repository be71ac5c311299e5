const encoder = new TextEncoder();
const SAFE_CHAR = /^[A-Za-z0-9]$/;

/**
 * Map a principal to a file name: every UTF-8 byte outside [A-Za-z0-9] is
 * percent-encoded, so no principal can name a path outside its directory or
 * collide with a lock or temp file (those contain "." or start with one).
 */
export const principalFileName = (principal: string): string => {
  let name = "";
  for (const byte of encoder.encode(principal)) {
    const char = String.fromCharCode(byte);
    name += SAFE_CHAR.test(char) ? char : `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
  }
  return name;
};
