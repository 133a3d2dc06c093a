export function joinUrl(base: string, path: string) {
  if (!base.endsWith('/')) base += '/'
  if (path.startsWith('/')) path = path.slice(1)
  return base + path
}

/** Same URL with one query parameter replaced, or removed when `value` is null. */
export function withQueryParam(url: URL, key: string, value: string | null) {
  const next = new URL(url.toString())
  if (value === null) next.searchParams.delete(key)
  else next.searchParams.set(key, value)
  return next.toString()
}
