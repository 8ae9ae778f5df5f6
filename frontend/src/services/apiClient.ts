import axios, { isAxiosError, type AxiosInstance, type CreateAxiosDefaults } from 'axios'
import type { CommandError, InputDevice, SessionCommand, SessionSnapshot } from '@/types'

export function createHttp(baseURL = '', defaults: CreateAxiosDefaults = {}): AxiosInstance {
  return axios.create({
    baseURL,
    headers: { 'Content-Type': 'application/json' },
    ...defaults,
  })
}

/** A command the server refused; `kind` is the server's error kind. */
export class CommandRejectedError extends Error {
  constructor(readonly kind: string, message: string, readonly status: number) {
    super(message)
    this.name = 'CommandRejectedError'
  }
}

/** Reads `{ error: { kind, message } }` from a failure body. */
export function readCommandError(data: unknown): CommandError | null {
  if (typeof data !== 'object' || data === null || !('error' in data)) return null
  const { error } = data
  if (typeof error !== 'object' || error === null) return null
  if (!('kind' in error) || typeof error.kind !== 'string') return null
  const message = 'message' in error && typeof error.message === 'string' ? error.message : error.kind
  return { kind: error.kind, message }
}

// ─── Session ──────────────────────────────────────────────────────────────────

export function createSessionApi(http: AxiosInstance) {
  return {
    health: () =>
      http.get<{ status: string; service: string }>('/api/health').then((r) => r.data),

    state: () =>
      http.get<SessionSnapshot>('/api/state').then((r) => r.data),

    send: (command: SessionCommand, clientId?: string) =>
      http
        .post<{ ok: true; snapshot: SessionSnapshot }>('/api/commands', { clientId, command })
        .then((r) => r.data.snapshot)
        .catch((err: unknown) => {
          if (isAxiosError(err) && err.response) {
            const error = readCommandError(err.response.data)
            if (error) throw new CommandRejectedError(error.kind, error.message, err.response.status)
          }
          throw err
        }),

    devices: () =>
      http.get<{ devices: InputDevice[] }>('/api/devices').then((r) => r.data.devices),

    remoteUrl: () =>
      http.get<{ url: string }>('/api/remote-url').then((r) => r.data.url),

    shutdown: () =>
      http.post<{ ok: boolean }>('/api/shutdown').then((r) => r.data),
  }
}

export type SessionApi = ReturnType<typeof createSessionApi>

export const sessionApi = createSessionApi(createHttp())
