import { describe, expect, it } from 'vitest'
import { parseSetCookies, serializeCookies } from '../../../src/core/cookies.ts'

describe('parseSetCookies', () => {
  it('keeps name and value and drops attributes', () => {
    expect(
      parseSetCookies(['JSESSIONID=ABC123; Path=/; Secure; HttpOnly', 'ZS_SESSION_CODE=x=y']),
    ).toEqual({ JSESSIONID: 'ABC123', ZS_SESSION_CODE: 'x=y' })
  })

  it('ignores malformed entries and lets later duplicates win', () => {
    expect(parseSetCookies(['novalue', '=orphan', 'a=1', ' a = 2 ; Max-Age=0'])).toEqual({
      a: '2',
    })
  })
})

describe('serializeCookies', () => {
  it('joins pairs with a semicolon', () => {
    expect(serializeCookies({ a: '1', b: '2' })).toBe('a=1; b=2')
  })
})
