import type { SessionSnapshot } from '@/types'
import type { SocketConnection, SocketFactory, SocketHandlers } from '@/services/sessionSocket'

export function makeSnapshot(version: number, overrides: Partial<SessionSnapshot> = {}): SessionSnapshot {
  return {
    version,
    phase: 'idle',
    organ: null,
    selection: null,
    noteIndex: 36,
    countdownRemaining: null,
    settings: {
      sampleRate: 44100,
      bitDepth: 16,
      channels: 'mono',
      mp3Bitrate: 192,
      countdownSeconds: 5,
      recordSeconds: 5,
      startNote: 36,
      endNote: 38,
    },
    microphones: [{ id: 'main', position: 'Main', enabled: true }],
    channelFailures: {},
    clients: [],
    note: { midi: 36, name: 'C2', filename: '036-c.mp3' },
    progress: { total: 3, done: 0, remaining: 3 },
    targetPaths: {},
    ...overrides,
  }
}

export class FakeConnection implements SocketConnection {
  isOpen = false
  closed = false
  readonly sent: string[] = []

  constructor(readonly url: string, private readonly handlers: SocketHandlers) {}

  send(data: string): void {
    this.sent.push(data)
  }

  close(): void {
    this.closed = true
    this.isOpen = false
  }

  // ── driven by tests

  open(): void {
    this.isOpen = true
    this.handlers.open()
  }

  receive(message: unknown): void {
    this.handlers.message(JSON.stringify(message))
  }

  drop(): void {
    this.isOpen = false
    this.handlers.close()
  }
}

export function fakeSockets(): { factory: SocketFactory; connections: FakeConnection[] } {
  const connections: FakeConnection[] = []
  const factory: SocketFactory = (url, handlers) => {
    const connection = new FakeConnection(url, handlers)
    connections.push(connection)
    return connection
  }
  return { factory, connections }
}
