export {
  type AppError,
  ErrorCode,
  UnrecoverableError,
  appError,
  codeMismatch,
  describeCause,
  exitCode,
  invalidCharacter,
  invalidFormat,
  invalidParameter,
  notFound,
  persistenceFailure,
  randomSourceUnavailable,
  secretUnavailable,
} from "./app-error.js";
