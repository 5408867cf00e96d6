import { afterEach, describe, expect, it, vi } from 'vitest'
import { ConfigurationError } from '../../../../src/core/errors.ts'
import { obfuscateApiKey } from '../../../../src/providers/auth/api-key-obfuscation.ts'
import { TEST_CONFIG } from '../../../helpers/index.ts'

describe('obfuscateApiKey', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('derives the key from the last six timestamp digits and their half', () => {
    // n = 123456, r = 061728
    expect(obfuscateApiKey(TEST_CONFIG.seed, 1700000123456)).toEqual({
      timestamp: 1700000123456,
      key: 'bcdefgcidjek',
    })
  })

  it('pads a short half with leading zeros', () => {
    // n = 000010, r = 000005
    expect(obfuscateApiKey('0123456789AB', 1700000000010).key).toBe('000010222227')
  })

  it('uses the current time by default', () => {
    vi.useFakeTimers()
    vi.setSystemTime(1700000123456)

    expect(obfuscateApiKey(TEST_CONFIG.seed)).toEqual({
      timestamp: 1700000123456,
      key: 'bcdefgcidjek',
    })
  })

  it('rejects a seed shorter than twelve characters', () => {
    expect(() => obfuscateApiKey('abcdefghijk', 1700000123456)).toThrow(
      new ConfigurationError('API key seed must be at least 12 characters'),
    )
  })
})
