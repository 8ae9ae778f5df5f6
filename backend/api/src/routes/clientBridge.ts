/**
 * One WebSocket client: pumps its snapshot stream out, feeds its command
 * messages into the hub, and answers each command to this client alone.
 */

import type { FastifyBaseLogger } from 'fastify'
import type { ClientMessage, ServerMessage } from '../types.js'
import type { SyncHub } from '../core/syncHub.js'
import type { SnapshotStream } from '../core/snapshotStream.js'

const OPEN = 1
export const CLOSE_TOO_SLOW = 4008

/** The part of a `ws` WebSocket the bridge uses. */
export interface ClientSocket {
  readonly readyState: number
  readonly bufferedAmount: number
  send(data: string): void
  close(code?: number, reason?: string): void
}

export interface ClientBridgeOptions {
  hub: SyncHub
  socket: ClientSocket
  clientId: string
  log: FastifyBaseLogger
  maxBufferedBytes: number
}

function parseMessage(text: string): ClientMessage | null {
  let value: unknown
  try {
    value = JSON.parse(text)
  } catch {
    return null
  }
  if (typeof value !== 'object' || value === null) return null
  if (!('type' in value) || value.type !== 'command') return null
  if (!('requestId' in value) || typeof value.requestId !== 'string') return null
  return { type: 'command', requestId: value.requestId, command: 'command' in value ? value.command : undefined }
}

export class ClientBridge {
  private readonly hub: SyncHub
  private readonly socket: ClientSocket
  private readonly log: FastifyBaseLogger
  private readonly maxBufferedBytes: number
  private stream: SnapshotStream | null = null
  readonly clientId: string

  constructor(options: ClientBridgeOptions) {
    this.hub = options.hub
    this.socket = options.socket
    this.clientId = options.clientId
    this.log = options.log
    this.maxBufferedBytes = options.maxBufferedBytes
  }

  /** Resolves once the stream has ended and the client is disconnected. */
  start(): Promise<void> {
    const stream = this.hub.connect(this.clientId)
    this.stream = stream
    return this.pump(stream).catch((err: unknown) => {
      this.log.error({ err, clientId: this.clientId }, 'snapshot pump failed')
      this.hub.disconnect(this.clientId, stream)
    })
  }

  async handleMessage(text: string): Promise<void> {
    const message = parseMessage(text)
    if (!message) {
      this.log.debug({ clientId: this.clientId }, 'ignored unreadable message')
      return
    }
    try {
      const result = await this.hub.submit(this.clientId, message.command)
      this.send(result.ok
        ? { type: 'result', requestId: message.requestId, ok: true, version: result.value.version }
        : { type: 'result', requestId: message.requestId, ok: false, error: result.error })
    } catch (err) {
      this.log.error({ err, clientId: this.clientId }, 'command failed')
      this.send({
        type: 'result',
        requestId: message.requestId,
        ok: false,
        error: { kind: 'Internal', message: 'command could not be processed' },
      })
    }
  }

  handleClose(): void {
    if (this.stream) this.hub.disconnect(this.clientId, this.stream)
  }

  private async pump(stream: SnapshotStream): Promise<void> {
    for await (const snapshot of stream) {
      if (this.socket.readyState !== OPEN) break
      if (this.socket.bufferedAmount > this.maxBufferedBytes) {
        this.log.warn({ clientId: this.clientId, buffered: this.socket.bufferedAmount }, 'client too slow, closing for resync')
        this.socket.close(CLOSE_TOO_SLOW, 'resync')
        break
      }
      this.send({ type: 'snapshot', snapshot })
    }
    this.hub.disconnect(this.clientId, stream)
  }

  private send(message: ServerMessage): void {
    if (this.socket.readyState !== OPEN) return
    this.socket.send(JSON.stringify(message))
  }
}
