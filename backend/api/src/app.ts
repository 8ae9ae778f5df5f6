/**
 * Organ sampler API: Fastify app with the session routes and the live
 * WebSocket channel. The server entry point wires real services into it;
 * tests wire fakes.
 */

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify'
import cors from '@fastify/cors'
import websocket from '@fastify/websocket'
import type { AudioCaptureService } from './capture/types.js'
import type { AppConfig } from './config.js'
import type { SyncHub } from './core/syncHub.js'
import { apiRoutes } from './routes/api.js'
import { wsRoutes } from './routes/ws.js'

export interface AppDeps {
  hub: SyncHub
  capture: AudioCaptureService
  logger: FastifyBaseLogger
  config: Pick<AppConfig, 'port' | 'corsOrigin' | 'maxSocketBufferBytes'>
  onShutdown?: () => void
}

export async function buildApp({ hub, capture, logger, config, onShutdown }: AppDeps): Promise<FastifyInstance> {
  const app = Fastify({ loggerInstance: logger })

  await app.register(cors, {
    origin: config.corsOrigin,
    methods: ['GET', 'POST', 'OPTIONS'],
  })

  await app.register(websocket, {
    options: { maxPayload: 64 * 1024 },
  })

  await app.register(apiRoutes, { hub, capture, port: config.port, onShutdown })
  await app.register(wsRoutes, { hub, maxSocketBufferBytes: config.maxSocketBufferBytes })

  app.addHook('onClose', async () => {
    hub.close()
  })

  return app
}
