import { describe, expect, it } from 'vitest'
import { DlpApi } from '../../../../src/domains/portal/dlp.api.ts'
import { createRequesterMock, makeRawResponse } from '../../../helpers/index.ts'

function setup() {
  const mock = createRequesterMock()
  mock.request.mockResolvedValue(makeRawResponse(200, '{"id":9}'))
  return { ...mock, api: new DlpApi({ session: mock.requester }) }
}

describe('DlpApi', () => {
  it('addEngine builds a custom engine payload', async () => {
    const { api, request } = setup()

    const response = await api.addEngine({
      engineExpression: '((D63.S > 1))',
      name: 'Credit cards',
      description: 'PCI',
    })

    expect(response.status).toBe(200)
    expect(request).toHaveBeenCalledWith('POST', '/dlpEngines', {
      body: {
        EngineExpression: '((D63.S > 1))',
        CustomDlpEngine: true,
        Name: 'Credit cards',
        Description: 'PCI',
      },
      raiseOnError: false,
    })
  })

  it('addEngine names a predefined engine instead of a custom name', async () => {
    const { api, request } = setup()

    await api.addEngine({
      engineExpression: '((D1.S > 0))',
      name: 'ignored',
      customDlpEngine: false,
      predefinedEngineName: 'EXTERNAL',
    })

    expect(request).toHaveBeenCalledWith('POST', '/dlpEngines', {
      body: {
        EngineExpression: '((D1.S > 0))',
        CustomDlpEngine: false,
        PredefinedEngineName: 'EXTERNAL',
      },
      raiseOnError: false,
    })
  })

  it('addEngine sends a complete payload unchanged', async () => {
    const { api, request } = setup()
    const payload = { Name: 'raw', EngineExpression: 'x', CustomDlpEngine: true }

    await api.addEngine({ payload })

    expect(request).toHaveBeenCalledWith('POST', '/dlpEngines', {
      body: payload,
      raiseOnError: false,
    })
  })

  it('updateEngine puts to the engine path without raising', async () => {
    const { api, request } = setup()
    request.mockResolvedValueOnce(makeRawResponse(409, '{"code":"DUPLICATE_ITEM"}'))

    const response = await api.updateEngine(61, { Name: 'renamed' })

    expect(response.status).toBe(409)
    expect(request).toHaveBeenCalledWith('PUT', '/dlpEngines/61', {
      body: { Name: 'renamed' },
      raiseOnError: false,
    })
  })
})
