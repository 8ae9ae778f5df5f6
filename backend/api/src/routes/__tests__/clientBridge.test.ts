import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import type { ServerMessage } from '../../types.js'
import { SessionState } from '../../core/sessionState.js'
import { SyncHub } from '../../core/syncHub.js'
import { ClientBridge, CLOSE_TOO_SLOW, type ClientSocket } from '../clientBridge.js'
import { FakeCaptureService } from '../../test/fakeCapture.js'
import { flush, silentLogger, testOrgan } from '../../test/helpers.js'

class FakeSocket implements ClientSocket {
  readyState = 1
  bufferedAmount = 0
  readonly sent: ServerMessage[] = []
  closed: { code?: number; reason?: string } | null = null

  send(data: string): void {
    this.sent.push(JSON.parse(data))
  }

  close(code?: number, reason?: string): void {
    this.closed = { code, reason }
    this.readyState = 3
  }
}

let hub: SyncHub
let socket: FakeSocket
let bridge: ClientBridge

function snapshotVersions(): number[] {
  return socket.sent.flatMap((m) => (m.type === 'snapshot' ? [m.snapshot.version] : []))
}

beforeEach(() => {
  hub = new SyncHub({ state: new SessionState(), capture: new FakeCaptureService(), logger: silentLogger })
  socket = new FakeSocket()
  bridge = new ClientBridge({ hub, socket, clientId: 'remote-1', log: silentLogger, maxBufferedBytes: 1024 })
})

afterEach(() => {
  hub.close()
})

describe('ClientBridge', () => {
  it('sends the current snapshot and every later version', async () => {
    void bridge.start()
    await flush()
    expect(snapshotVersions()).toEqual([0, 1])

    await hub.submit('display', { type: 'selectOrgan', organ: testOrgan })
    await flush()
    expect(snapshotVersions()).toEqual([0, 1, 2])
  })

  it('answers a command to its sender', async () => {
    void bridge.start()
    await bridge.handleMessage(JSON.stringify({ type: 'command', requestId: 'r1', command: { type: 'retry' } }))
    await bridge.handleMessage(JSON.stringify({ type: 'command', requestId: 'r2', command: { type: 'selectOrgan', organ: testOrgan } }))

    const results = socket.sent.filter((m) => m.type === 'result')
    expect(results).toEqual([
      { type: 'result', requestId: 'r1', ok: false, error: { kind: 'IllegalTransition', message: 'nothing to retry while idle' } },
      { type: 'result', requestId: 'r2', ok: true, version: 2 },
    ])
  })

  it('ignores messages it cannot read', async () => {
    await bridge.handleMessage('not json')
    await bridge.handleMessage(JSON.stringify({ type: 'hello' }))
    expect(socket.sent).toEqual([])
  })

  it('closes a socket that cannot keep up', async () => {
    const done = bridge.start()
    await flush()
    socket.bufferedAmount = 4096

    await hub.submit('display', { type: 'selectOrgan', organ: testOrgan })
    await done

    expect(socket.closed).toEqual({ code: CLOSE_TOO_SLOW, reason: 'resync' })
    expect(hub.clientIds).toEqual([])
  })

  it('disconnects from the hub when the socket closes', async () => {
    const done = bridge.start()
    await flush()
    expect(hub.clientIds).toEqual(['remote-1'])

    bridge.handleClose()
    await done
    expect(hub.clientIds).toEqual([])
  })
})
