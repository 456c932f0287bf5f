/**
 * Text form of a logged message: its string conversion, or "" when absent.
 */
export function messageText(message: unknown): string {
  return message === null || message === undefined ? "" : String(message)
}
