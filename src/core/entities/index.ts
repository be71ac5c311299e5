export {
  Algorithm,
  ALGORITHMS,
  type Code,
  type Counter,
  DEFAULT_ALGORITHM,
  DEFAULT_DIGITS,
  DEFAULT_PERIOD,
  DEFAULT_SECRET_BYTES,
  isAlgorithm,
  MAX_DIGITS,
  MIN_DIGITS,
  type OtpParams,
  type OtpParamsInput,
  otpParams,
  type Secret,
  validateAlgorithm,
  validateDigits,
  validatePeriod,
} from "./otp-params.js";
