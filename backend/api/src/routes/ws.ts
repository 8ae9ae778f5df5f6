import { randomUUID } from 'node:crypto'
import type { FastifyPluginAsync } from 'fastify'
import type { SyncHub } from '../core/syncHub.js'
import { ClientBridge } from './clientBridge.js'

export interface WsRoutesOptions {
  hub: SyncHub
  maxSocketBufferBytes: number
}

export type ClientRole = 'display' | 'remote'

/** Role and client id from the `/ws` query; anonymous clients get a generated id. */
export function clientIdentity(query: { clientId?: string; role?: string }): { role: ClientRole; clientId: string } {
  const role: ClientRole = query.role === 'remote' ? 'remote' : 'display'
  return { role, clientId: query.clientId || `${role}-${randomUUID().slice(0, 8)}` }
}

export const wsRoutes: FastifyPluginAsync<WsRoutesOptions> = async (app, { hub, maxSocketBufferBytes }) => {
  app.get<{ Querystring: { clientId?: string; role?: string } }>('/ws', { websocket: true }, (socket, request) => {
    const { clientId } = clientIdentity(request.query)
    const bridge = new ClientBridge({
      hub,
      socket,
      clientId,
      log: request.log,
      maxBufferedBytes: maxSocketBufferBytes,
    })

    socket.on('message', (data) => {
      void bridge.handleMessage(data.toString())
    })
    socket.on('close', () => bridge.handleClose())
    void bridge.start()
  })
}
