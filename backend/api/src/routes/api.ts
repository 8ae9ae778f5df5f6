import type { FastifyPluginAsync } from 'fastify'
import type { AudioCaptureService } from '../capture/types.js'
import { isValidationError } from '../core/errors.js'
import type { SyncHub } from '../core/syncHub.js'
import { remoteUrl } from '../network.js'

export interface ApiRoutesOptions {
  hub: SyncHub
  capture: AudioCaptureService
  port: number
  onShutdown?: () => void
}

interface CommandBody {
  clientId?: string
  command: Record<string, unknown>
}

const commandSchema = {
  body: {
    type: 'object',
    required: ['command'],
    properties: {
      clientId: { type: 'string', maxLength: 64 },
      command: {
        type: 'object',
        required: ['type'],
        properties: { type: { type: 'string' } },
      },
    },
  },
} as const

const SHUTDOWN_DELAY_MS = 500

export const apiRoutes: FastifyPluginAsync<ApiRoutesOptions> = async (app, { hub, capture, port, onShutdown }) => {
  // ── Health check ───────────────────────────────────────────────────────────

  app.get('/api/health', async () => ({ status: 'ok', service: 'organ-sampler-api' }))

  // ── Session ────────────────────────────────────────────────────────────────

  app.get('/api/state', async () => hub.snapshot())

  app.post<{ Body: CommandBody }>('/api/commands', { schema: commandSchema }, async (request, reply) => {
    const clientId = request.body.clientId ?? 'http'
    const result = await hub.submit(clientId, request.body.command)
    if (!result.ok) {
      return reply.status(isValidationError(result.error) ? 400 : 409).send({ error: result.error })
    }
    return { ok: true, snapshot: result.value }
  })

  // ── Devices & remote ───────────────────────────────────────────────────────

  app.get('/api/devices', async (request) => {
    try {
      return { devices: await capture.listDevices() }
    } catch (err) {
      request.log.error({ err }, 'Failed to list capture devices')
      return { devices: [] }
    }
  })

  app.get('/api/remote-url', async () => ({ url: remoteUrl(port) }))

  app.post('/api/shutdown', async (request) => {
    await hub.submit('server', { type: 'stop' })
    request.log.info('shutdown requested')
    if (onShutdown) setTimeout(onShutdown, SHUTDOWN_DELAY_MS)
    return { ok: true }
  })
}
