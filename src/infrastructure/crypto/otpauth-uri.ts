import { type OtpParams, type Secret, otpParams } from "../../core/entities/otp-params.js";
import { type AppError, invalidFormat } from "../../core/errors/app-error.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { base32Decode, base32EncodeUnpadded } from "./base32.js";

/**
 * Key URI format understood by authenticator apps:
 *
 *   otpauth://totp/<issuer>:<principal>?secret=…&issuer=…&algorithm=SHA1&digits=6&period=30
 */

export interface OtpauthUri {
  readonly issuer: string;
  readonly principal: string;
  readonly secret: Secret;
  readonly params: OtpParams;
}

export const buildOtpauthUri = (
  secret: Secret,
  principal: string,
  issuer: string,
  params: OtpParams,
): string => {
  const encodedIssuer = encodeURIComponent(issuer);
  const encodedPrincipal = encodeURIComponent(principal);
  const query = [
    `secret=${base32EncodeUnpadded(secret)}`,
    `issuer=${encodedIssuer}`,
    `algorithm=${params.algorithm}`,
    `digits=${params.digits}`,
    `period=${params.period}`,
  ].join("&");
  return `otpauth://totp/${encodedIssuer}:${encodedPrincipal}?${query}`;
};

const parseInteger = (raw: string | null): number | undefined =>
  raw === null || !/^\d+$/.test(raw) ? undefined : Number.parseInt(raw, 10);

export const parseOtpauthUri = (uri: string): Result<OtpauthUri, AppError> => {
  let url: URL;
  let label: string;
  try {
    url = new URL(uri);
    label = decodeURIComponent(url.pathname.replace(/^\//, ""));
  } catch {
    return err(invalidFormat("Not a valid URI"));
  }

  if (url.protocol !== "otpauth:" || url.host !== "totp") {
    return err(invalidFormat("Expected an otpauth://totp/ URI"));
  }

  const separator = label.indexOf(":");
  const labelIssuer = separator === -1 ? "" : label.slice(0, separator);
  const principal = separator === -1 ? label : label.slice(separator + 1);
  const issuer = url.searchParams.get("issuer") ?? labelIssuer;

  if (principal.length === 0) {
    return err(invalidFormat("URI label has no account name"));
  }

  const rawSecret = url.searchParams.get("secret");
  if (rawSecret === null || rawSecret.length === 0) {
    return err(invalidFormat("URI has no secret parameter"));
  }
  const secret = base32Decode(rawSecret);
  if (!secret.ok) return secret;

  const digits = url.searchParams.get("digits");
  const period = url.searchParams.get("period");
  const params = otpParams({
    digits: digits === null ? undefined : (parseInteger(digits) ?? Number.NaN),
    period: period === null ? undefined : (parseInteger(period) ?? Number.NaN),
    algorithm: url.searchParams.get("algorithm") ?? undefined,
  });
  if (!params.ok) {
    secret.value.fill(0);
    return params;
  }

  return ok({ issuer, principal, secret: secret.value, params: params.value });
};
