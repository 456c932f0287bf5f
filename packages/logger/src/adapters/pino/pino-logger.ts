import { formatTimeOfDay } from "@logtrap/clock"
import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { prettyFactory } from "pino-pretty"
import { errWithCause } from "pino-std-serializers"
import { type LoggerDeps, EmittingLogger } from "../../core/emitting-logger"
import { messageText } from "../../core/message-text"
import type { NamedOrigin } from "../../core/origin-name"
import type { LogEntry, Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = LoggerDeps & {
  /**
   * Base pino logger to create children from (inherits its sink and serializers).
   * When provided, this adapter adds the `name` binding and its own level via
   * `.child(...)`. The base's timestamp setting is kept.
   */
  base?: PinoLoggerBase
  /**
   * Destination for pino output, pretty or JSON. Defaults to stdout.
   */
  destination?: DestinationStream
}

export class PinoLogger extends EmittingLogger {
  protected readonly logger: PinoLoggerBase

  constructor(
    origin: string | NamedOrigin,
    deps: PinoLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
  ) {
    super(origin, deps, opts)
    this.logger = this.init(deps)
  }

  private init(deps: PinoLoggerDeps): PinoLoggerBase {
    if (deps.base) return deps.base.child({ name: this.name }, { level: this.level })

    // the event time comes from our clock, so pino's own timestamp is turned off
    const pinoOpts: PinoOptions = {
      name: this.name,
      level: this.level,
      timestamp: false,
      serializers: { err: errWithCause },
    }

    if (this.opts.prettify) return pino(pinoOpts, this.prettyDestination(deps.destination))
    if (deps.destination) return pino(pinoOpts, deps.destination)

    return pino(pinoOpts)
  }

  /**
   * Formats each JSON line with pino-pretty before writing it, synchronously. The
   * time of day is rendered in the configured zone.
   */
  private prettyDestination(destination: DestinationStream | undefined): DestinationStream {
    const zone = this.opts.timeZone
    const out = destination ?? process.stdout
    const prettify = prettyFactory({
      // pino-pretty decides colors for stdout itself
      ...(destination !== undefined && { colorize: false }),
      ignore: "hostname,pid",
      customPrettifiers: {
        time: (time) => formatTimeOfDay(Number(time), zone),
      },
    })

    return {
      write: (line: string) => {
        out.write(prettify(line))
      },
    }
  }

  protected write(entry: LogEntry): void {
    const fields = {
      time: entry.time,
      ...(entry.err !== null && { err: entry.err }),
    }

    this.logger[entry.level](fields, messageText(entry.message))
  }
}

export function createPinoLogger(
  origin: string | NamedOrigin,
  deps: PinoLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
): Logger {
  return new PinoLogger(origin, deps, opts)
}
