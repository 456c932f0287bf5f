type Equatable = { equals(other: unknown): boolean }
type Hashable = { hashCode(): number }

function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined
}

function isEquatable(value: unknown): value is Equatable {
  return (
    typeof value === "object" &&
    value !== null &&
    "equals" in value &&
    typeof value.equals === "function"
  )
}

function isHashable(value: unknown): value is Hashable {
  return (
    typeof value === "object" &&
    value !== null &&
    "hashCode" in value &&
    typeof value.hashCode === "function"
  )
}

/**
 * Equality used for messages and errors: both absent, the same value, or
 * `a.equals(b)` when `a` defines it.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (isAbsent(a) || isAbsent(b)) return isAbsent(a) && isAbsent(b)
  if (Object.is(a, b)) return true

  return isEquatable(a) && a.equals(b)
}

const identityHashes = new WeakMap<object, number>()
let nextIdentityHash = 1

export function stringHash(text: string): number {
  let hash = 0

  for (let i = 0; i < text.length; i++) {
    hash = (Math.imul(31, hash) + text.charCodeAt(i)) | 0
  }

  return hash
}

export function numberHash(value: number): number {
  if (Number.isSafeInteger(value)) {
    return (value | 0) ^ (Math.floor(value / 2 ** 32) | 0)
  }

  return stringHash(String(value))
}

/**
 * 32-bit hash consistent with {@link valuesEqual}.
 */
export function hashOf(value: unknown): number {
  if (typeof value === "string") return stringHash(value)
  if (typeof value === "number") return numberHash(value)
  if (typeof value === "boolean") return value ? 1231 : 1237
  if (typeof value === "bigint" || typeof value === "symbol") return stringHash(value.toString())
  if (typeof value === "function") return identityHash(value)
  if (typeof value !== "object" || value === null) return 0
  if (isHashable(value)) return value.hashCode() | 0
  // custom equality without a hash: all such values share a bucket
  if (isEquatable(value)) return 0

  return identityHash(value)
}

function identityHash(value: object): number {
  let hash = identityHashes.get(value)

  if (hash === undefined) {
    hash = nextIdentityHash++
    identityHashes.set(value, hash)
  }

  return hash
}
