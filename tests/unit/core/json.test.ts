import { describe, expect, it, vi } from 'vitest'
import { APIError } from '../../../src/core/errors.ts'
import {
  expectJsonObject,
  expectJsonObjectArray,
  isJsonObject,
  requestObject,
  requestObjectArray,
} from '../../../src/core/json.ts'
import type { TRequester } from '../../../src/core/types.ts'

function createRequester(body: unknown): TRequester {
  return {
    request: vi.fn<TRequester['request']>(),
    requestJson: vi.fn<TRequester['requestJson']>().mockResolvedValue(body),
  }
}

describe('json helpers', () => {
  it('recognises plain objects only', () => {
    expect(isJsonObject({})).toBe(true)
    expect(isJsonObject([])).toBe(false)
    expect(isJsonObject(null)).toBe(false)
    expect(isJsonObject('text')).toBe(false)
  })

  it('throws APIError naming the request when the shape is wrong', () => {
    expect(() => expectJsonObject([], 'GET /eun')).toThrow(
      new APIError('Expected a JSON object from GET /eun'),
    )
    expect(() => expectJsonObjectArray([{}, 1], 'GET /pacFiles')).toThrow(
      'Expected a JSON array of objects from GET /pacFiles',
    )
  })

  it('requestObject returns the decoded object', async () => {
    const requester = createRequester({ id: 7 })

    await expect(requestObject(requester, 'GET', '/eun')).resolves.toEqual({ id: 7 })
    expect(requester.requestJson).toHaveBeenCalledWith('GET', '/eun', {})
  })

  it('requestObjectArray rejects an empty body', async () => {
    await expect(requestObjectArray(createRequester(null), 'GET', '/apiKeys')).rejects.toThrow(
      'Expected a JSON array of objects from GET /apiKeys',
    )
  })
})
