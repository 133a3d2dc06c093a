export const USERNAME_PATTERN = /^[\w.@+-]+$/
export const SLUG_PATTERN = /^[-a-zA-Z0-9_]+$/
export const RESERVED_USERNAME = 'me'

/** A release year may not lie in the future. */
export function isPastOrCurrentYear(year: number, now: Date = new Date()) {
  return year <= now.getFullYear()
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}
