export {
  ConsoleLogger,
  type ConsoleLoggerDeps,
  type ConsoleWriter,
  createConsoleLogger,
} from "./adapters/console/console-logger"
export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
export { createPinoLogger, PinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
export { type CreateLoggerDeps, createLogger } from "./create-logger"
export { EmittingLogger, type LoggerDeps } from "./core/emitting-logger"
export { defaultLogDispatcher, LogDispatcher } from "./core/log-dispatcher"
export {
  type LogDriverName,
  type LogSettings,
  LogSettingsError,
  loadLogSettings,
  logDriverNames,
} from "./core/log-settings"
export { messageText } from "./core/message-text"
export { type NamedOrigin, originName } from "./core/origin-name"
export {
  LEVEL_SEVERITY,
  type LogLevel,
  type LogLevelName,
  LogLevels,
  logLevelNames,
} from "./ports/log-level"
export type { LogListener } from "./ports/log-listener"
export type { LogEntry, Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
