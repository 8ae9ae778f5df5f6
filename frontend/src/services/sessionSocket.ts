/**
 * Session Socket: the live channel to the sampler API.
 *
 * Receives full snapshots (older or repeated versions are ignored), sends
 * commands and resolves each one with the server's answer. Reconnects with
 * backoff; the first snapshot after a reconnect resyncs the client.
 */

import type { ClientRole, ConnectionStatus, SessionCommand, SessionSnapshot, ServerMessage } from '@/types'
import { CommandRejectedError, readCommandError } from '@/services/apiClient'

export interface SocketHandlers {
  open(): void
  message(data: string): void
  close(): void
}

export interface SocketConnection {
  readonly isOpen: boolean
  send(data: string): void
  close(): void
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => SocketConnection

export const browserSocket: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url)
  ws.onopen = () => handlers.open()
  ws.onmessage = (event) => handlers.message(String(event.data))
  ws.onclose = () => handlers.close()
  return {
    get isOpen() {
      return ws.readyState === WebSocket.OPEN
    },
    send: (data) => ws.send(data),
    close: () => ws.close(),
  }
}

export interface SessionSocketOptions {
  url: string
  clientId: string
  role?: ClientRole
  createSocket?: SocketFactory
  reconnectDelayMs?: number
  maxReconnectDelayMs?: number
}

type SnapshotCallback = (snapshot: SessionSnapshot) => void
type StatusCallback = (status: ConnectionStatus) => void

interface PendingRequest {
  resolve: (version: number) => void
  reject: (error: Error) => void
}

const PHASES: readonly string[] = ['idle', 'countingDown', 'recording', 'reviewPending', 'finished']

function isSnapshot(value: unknown): value is SessionSnapshot {
  if (typeof value !== 'object' || value === null) return false
  return 'version' in value && typeof value.version === 'number'
    && 'phase' in value && typeof value.phase === 'string' && PHASES.includes(value.phase)
    && 'settings' in value && typeof value.settings === 'object' && value.settings !== null
    && 'progress' in value && typeof value.progress === 'object' && value.progress !== null
}

function parseServerMessage(data: string): ServerMessage | null {
  let value: unknown
  try {
    value = JSON.parse(data)
  } catch {
    return null
  }
  if (typeof value !== 'object' || value === null || !('type' in value)) return null
  if (value.type === 'snapshot' && 'snapshot' in value) {
    return isSnapshot(value.snapshot) ? { type: 'snapshot', snapshot: value.snapshot } : null
  }
  if (value.type === 'result' && 'requestId' in value && typeof value.requestId === 'string' && 'ok' in value) {
    if (value.ok === true) {
      const version = 'version' in value && typeof value.version === 'number' ? value.version : -1
      return { type: 'result', requestId: value.requestId, ok: true, version }
    }
    return {
      type: 'result',
      requestId: value.requestId,
      ok: false,
      error: readCommandError(value) ?? { kind: 'Unknown', message: 'command failed' },
    }
  }
  return null
}

export class SessionSocket {
  private connection: SocketConnection | null = null
  private snapshotCallbacks: SnapshotCallback[] = []
  private statusCallbacks: StatusCallback[] = []
  private pending = new Map<string, PendingRequest>()
  private lastVersion = -1
  private nextRequest = 1
  private attempts = 0
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null
  private disposed = false
  private readonly createSocket: SocketFactory

  constructor(private readonly options: SessionSocketOptions) {
    this.createSocket = options.createSocket ?? browserSocket
  }

  get version(): number {
    return this.lastVersion
  }

  connect(): void {
    this.disposed = false
    const query = `clientId=${encodeURIComponent(this.options.clientId)}&role=${this.options.role ?? 'display'}`
    this.emitStatus('connecting')
    this.connection = this.createSocket(`${this.options.url}?${query}`, {
      open: () => {
        this.attempts = 0
        this.emitStatus('open')
      },
      message: (data) => this.handleMessage(data),
      close: () => this.handleClose(),
    })
  }

  close(): void {
    this.disposed = true
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer)
    this.reconnectTimer = null
    this.connection?.close()
    this.connection = null
  }

  /** Resolves with the version the command produced; rejects when it was refused. */
  send(command: SessionCommand): Promise<number> {
    const connection = this.connection
    if (!connection?.isOpen) return Promise.reject(new Error('Session socket is not connected'))

    const requestId = `${this.options.clientId}-${this.nextRequest++}`
    return new Promise((resolve, reject) => {
      this.pending.set(requestId, { resolve, reject })
      connection.send(JSON.stringify({ type: 'command', requestId, command }))
    })
  }

  // ─── Callbacks ─────────────────────────────────────────────────────────────

  onSnapshot(cb: SnapshotCallback): () => void {
    this.snapshotCallbacks.push(cb)
    return () => {
      this.snapshotCallbacks = this.snapshotCallbacks.filter((c) => c !== cb)
    }
  }

  onStatus(cb: StatusCallback): () => void {
    this.statusCallbacks.push(cb)
    return () => {
      this.statusCallbacks = this.statusCallbacks.filter((c) => c !== cb)
    }
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private handleMessage(data: string): void {
    const message = parseServerMessage(data)
    if (!message) return

    if (message.type === 'snapshot') {
      if (message.snapshot.version <= this.lastVersion) return
      this.lastVersion = message.snapshot.version
      for (const cb of this.snapshotCallbacks) cb(message.snapshot)
      return
    }

    const request = this.pending.get(message.requestId)
    if (!request) return
    this.pending.delete(message.requestId)
    if (message.ok) request.resolve(message.version)
    else request.reject(new CommandRejectedError(message.error.kind, message.error.message, 0))
  }

  private handleClose(): void {
    this.connection = null
    // a new stream starts over with a full snapshot, possibly from a restarted server
    this.lastVersion = -1
    for (const request of this.pending.values()) request.reject(new Error('Session socket closed'))
    this.pending.clear()
    this.emitStatus('closed')

    if (this.disposed) return
    const base = this.options.reconnectDelayMs ?? 1000
    const max = this.options.maxReconnectDelayMs ?? 10_000
    const delay = Math.min(base * 2 ** this.attempts, max)
    this.attempts += 1
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null
      this.connect()
    }, delay)
  }

  private emitStatus(status: ConnectionStatus): void {
    for (const cb of this.statusCallbacks) cb(status)
  }
}
