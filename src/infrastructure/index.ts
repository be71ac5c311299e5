export { loadConfig, parseConfig, type AppConfig } from "./config/config.js";
export { createLogger, type LogFormat, type LogSink } from "./logging/logger.js";
export { base32Decode, base32Encode, base32EncodeUnpadded } from "./crypto/base32.js";
export { type HotpGenerator, hotp } from "./crypto/hotp.js";
export { counterAt, generateSecret, generateTotp, totpCounter } from "./crypto/totp.js";
export { buildOtpauthUri, parseOtpauthUri, type OtpauthUri } from "./crypto/otpauth-uri.js";
export { createFileLock, type FileLock, type FileLockOptions } from "./security/file-lock.js";
export {
  createFileReplayGuard,
  DEFAULT_RETENTION_PERIODS,
  type FileReplayGuardOptions,
} from "./security/replay-guard.js";
export {
  createTotpService,
  DEFAULT_WINDOW,
  type TotpServiceOptions,
} from "./security/totp-service.js";
export { createFileSecretStore } from "./storage/file-secret-store.js";
export { createInMemorySecretStore } from "./storage/in-memory-secret-store.js";
export {
  createTerminalConversation,
  type TerminalConversation,
} from "./conversation/terminal-conversation.js";
