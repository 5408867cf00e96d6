import { ConfigurationError } from '../../core/errors.ts'

const MINIMUM_SEED_LENGTH = 12

export type TObfuscatedApiKey = {
  timestamp: number
  key: string
}

/**
 * Scrambles the portal API key seed with the request timestamp, the way the admin portal
 * expects it on login.
 *
 * With `n` the last six digits of the millisecond timestamp and `r` = `n >> 1` padded to six
 * digits, the key is `seed[d]` for every digit `d` of `n`, followed by `seed[d + 2]` for every
 * digit `d` of `r`.
 */
export function obfuscateApiKey(seed: string, timestamp: number = Date.now()): TObfuscatedApiKey {
  if (seed.length < MINIMUM_SEED_LENGTH) {
    throw new ConfigurationError(`API key seed must be at least ${MINIMUM_SEED_LENGTH} characters`)
  }

  const n: string = String(timestamp).slice(-6)
  const r: string = String(Number(n) >> 1).padStart(6, '0')

  let key = ''
  for (const digit of n) key += seed.charAt(Number(digit))
  for (const digit of r) key += seed.charAt(Number(digit) + 2)

  return { timestamp, key }
}
