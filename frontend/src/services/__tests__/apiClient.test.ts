import { describe, it, expect } from 'vitest'
import { AxiosError, isAxiosError, type AxiosAdapter } from 'axios'
import { CommandRejectedError, createHttp, createSessionApi } from '@/services/apiClient'
import { makeSnapshot } from '@/test/fixtures'

interface Reply {
  status: number
  data: unknown
}

interface Request {
  method: string
  url: string
  body: unknown
}

function fakeServer(handle: (request: Request) => Reply, seen: Request[] = []): AxiosAdapter {
  return async (config) => {
    const request = {
      method: config.method ?? 'get',
      url: config.url ?? '',
      body: typeof config.data === 'string' ? JSON.parse(config.data) : undefined,
    }
    seen.push(request)
    const { status, data } = handle(request)
    const response = { data, status, statusText: String(status), headers: {}, config }
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', config, null, response)
    }
    return response
  }
}

function apiWith(handle: (request: Request) => Reply, seen?: Request[]) {
  return createSessionApi(createHttp('', { adapter: fakeServer(handle, seen) }))
}

describe('sessionApi', () => {
  it('fetches the current snapshot', async () => {
    const api = apiWith(() => ({ status: 200, data: makeSnapshot(4) }))
    const snapshot = await api.state()
    expect(snapshot.version).toBe(4)
  })

  it('posts commands and returns the new snapshot', async () => {
    const seen: Request[] = []
    const api = apiWith(() => ({ status: 200, data: { ok: true, snapshot: makeSnapshot(5, { phase: 'countingDown' }) } }), seen)

    const snapshot = await api.send({ type: 'start' }, 'tablet')

    expect(snapshot.phase).toBe('countingDown')
    expect(seen).toEqual([{ method: 'post', url: '/api/commands', body: { clientId: 'tablet', command: { type: 'start' } } }])
  })

  it('turns a refused command into a CommandRejectedError', async () => {
    const api = apiWith(() => ({
      status: 409,
      data: { error: { kind: 'IllegalTransition', message: 'cannot start while recording' } },
    }))

    const error = await api.send({ type: 'start' }).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(CommandRejectedError)
    if (error instanceof CommandRejectedError) {
      expect(error.kind).toBe('IllegalTransition')
      expect(error.message).toBe('cannot start while recording')
      expect(error.status).toBe(409)
    }
  })

  it('passes other failures through', async () => {
    const api = apiWith(() => ({ status: 500, data: 'Internal Server Error' }))
    const error = await api.send({ type: 'stop' }).catch((err: unknown) => err)
    expect(isAxiosError(error)).toBe(true)
  })

  it('unwraps devices and the remote URL', async () => {
    const api = apiWith(({ url }) => url === '/api/devices'
      ? { status: 200, data: { devices: [{ id: 'hw:0', name: 'USB', isDefault: true }] } }
      : { status: 200, data: { url: 'http://192.168.1.20:5555' } })

    expect(await api.devices()).toEqual([{ id: 'hw:0', name: 'USB', isDefault: true }])
    expect(await api.remoteUrl()).toBe('http://192.168.1.20:5555')
  })
})
