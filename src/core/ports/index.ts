export type { Logger, LogLevel } from "./logger.js";
export type { ReplayGuard } from "./replay-guard.js";
export type { SecretStore } from "./secret-store.js";
export type { Conversation, PromptOptions } from "./conversation.js";
export type { TotpService, VerifyOptions, VerifyReport } from "./totp-service.js";
export { VerifyOutcome } from "./totp-service.js";
