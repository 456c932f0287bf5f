/**
 * Anything with a name that can stand for a log origin: a class, a function,
 * or an object such as a Logger.
 */
export type NamedOrigin = { readonly name: string }

/**
 * Canonical origin name for a string or a named thing (a class's `name`).
 *
 * @example
 * ```ts
 * class AccountService {}
 * originName(AccountService) // "AccountService"
 * originName("payments")     // "payments"
 * ```
 */
export function originName(origin: string | NamedOrigin): string {
  return typeof origin === "string" ? origin : origin.name
}
