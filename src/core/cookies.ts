/** Reads name/value pairs out of Set-Cookie header values, ignoring their attributes. */
export function parseSetCookies(setCookieHeaders: string[]): Record<string, string> {
  const cookies: Record<string, string> = {}
  for (const header of setCookieHeaders) {
    const pair = header.split(';', 1)[0] ?? ''
    const separatorIndex = pair.indexOf('=')
    if (separatorIndex <= 0) continue
    const name = pair.slice(0, separatorIndex).trim()
    const value = pair.slice(separatorIndex + 1).trim()
    if (name) cookies[name] = value
  }
  return cookies
}

export function serializeCookies(cookies: Record<string, string>): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ')
}
