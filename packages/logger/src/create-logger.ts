import { ConsoleLogger, type ConsoleLoggerDeps } from "./adapters/console/console-logger"
import { NullLogger } from "./adapters/null/null-logger"
import { PinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
import { type LogSettings, loadLogSettings } from "./core/log-settings"
import type { NamedOrigin } from "./core/origin-name"
import type { Logger } from "./ports/logger"

export type CreateLoggerDeps = ConsoleLoggerDeps & PinoLoggerDeps

/**
 * Build a logger for an origin using the adapter named by `settings.driver`.
 *
 * @example
 * ```ts
 * const log = createLogger(AccountService)              // settings from process.env
 * const quiet = createLogger("jobs", { ...settings, driver: "null" })
 * ```
 */
export function createLogger(
  origin: string | NamedOrigin,
  settings: LogSettings = loadLogSettings(),
  deps: CreateLoggerDeps = {},
): Logger {
  const opts = {
    level: settings.level,
    prettify: settings.prettify,
    timeZone: settings.timeZone,
  }

  switch (settings.driver) {
    case "pino":
      return new PinoLogger(origin, deps, opts)
    case "null":
      return new NullLogger(origin, deps, opts)
    case "console":
      return new ConsoleLogger(origin, deps, opts)
  }
}
