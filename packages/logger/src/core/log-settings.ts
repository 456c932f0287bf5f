import { isValidTimeZone, systemTimeZone, type TimeZone } from "@logtrap/clock"
import { BaseError } from "@logtrap/errors"
import { z } from "zod"
import { type LogLevelName, logLevelNames } from "../ports/log-level"

export const logDriverNames = ["console", "pino", "null"] as const

export type LogDriverName = (typeof logDriverNames)[number]

export type LogSettings = Readonly<{
  level: LogLevelName
  prettify: boolean
  driver: LogDriverName
  timeZone: TimeZone
}>

const envSchema = z.object({
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform((v) => v === "true" || v === "1"),
  LOG_DRIVER: z.enum(logDriverNames).default("console"),
  LOG_TIME_ZONE: z
    .string()
    .refine(isValidTimeZone, { message: "Unknown time zone" })
    .default(systemTimeZone),
})

export class LogSettingsError extends BaseError<"invalid_log_settings"> {
  constructor(message: string, keys: string[]) {
    super(message, {
      code: "invalid_log_settings",
      context: { keys },
      isOperational: false,
    })
  }
}

/**
 * Read logger settings from environment variables.
 *
 * | variable        | values                       | default          |
 * | --------------- | ---------------------------- | ---------------- |
 * | `LOG_LEVEL`     | trace, debug, info, warn, error | info          |
 * | `LOG_PRETTY`    | true, false, 1, 0            | false            |
 * | `LOG_DRIVER`    | console, pino, null          | console          |
 * | `LOG_TIME_ZONE` | any IANA zone                | process zone     |
 *
 * @throws LogSettingsError listing every invalid variable
 */
export function loadLogSettings(
  env: Record<string, string | undefined> = process.env,
): LogSettings {
  const result = envSchema.safeParse(env)

  if (!result.success) {
    const keys = [...new Set(result.error.issues.map((issue) => issue.path.map(String).join(".")))]

    throw new LogSettingsError(
      `Log settings validation failed:\n${z.prettifyError(result.error)}`,
      keys,
    )
  }

  return {
    level: result.data.LOG_LEVEL,
    prettify: result.data.LOG_PRETTY,
    driver: result.data.LOG_DRIVER,
    timeZone: result.data.LOG_TIME_ZONE,
  }
}
