import { describe, it, expect } from 'vitest'
import { bindSession, createSessionStore, sendCommand } from '@/store/sessionStore'
import { SessionSocket } from '@/services/sessionSocket'
import { fakeSockets, makeSnapshot } from '@/test/fixtures'

function connected() {
  const { factory, connections } = fakeSockets()
  const socket = new SessionSocket({ url: 'ws://sampler.local/ws', clientId: 'display', createSocket: factory })
  const store = createSessionStore()
  const unbind = bindSession(store, socket)
  socket.connect()
  connections[0].open()
  return { store, socket, connection: connections[0], unbind }
}

describe('sessionStore', () => {
  it('keeps only newer snapshots while connected', () => {
    const store = createSessionStore()
    store.getState().setStatus('open')
    store.getState().applySnapshot(makeSnapshot(5))
    store.getState().applySnapshot(makeSnapshot(4))
    expect(store.getState().snapshot?.version).toBe(5)

    store.getState().applySnapshot(makeSnapshot(6))
    expect(store.getState().snapshot?.version).toBe(6)
  })

  it('takes the first snapshot after a reconnect whatever its version', () => {
    const store = createSessionStore()
    store.getState().setStatus('open')
    store.getState().applySnapshot(makeSnapshot(9))

    store.getState().setStatus('closed')
    store.getState().setStatus('open')
    store.getState().applySnapshot(makeSnapshot(1))

    expect(store.getState().snapshot?.version).toBe(1)
  })

  it('follows the socket once bound', () => {
    const { store, connection, unbind } = connected()
    expect(store.getState().status).toBe('open')

    connection.receive({ type: 'snapshot', snapshot: makeSnapshot(3, { phase: 'recording' }) })
    expect(store.getState().snapshot?.phase).toBe('recording')

    unbind()
    connection.receive({ type: 'snapshot', snapshot: makeSnapshot(4) })
    expect(store.getState().snapshot?.version).toBe(3)
  })

  it('records a refused command as lastError', async () => {
    const { store, socket, connection } = connected()

    const sending = sendCommand(store, socket, { type: 'retry' })
    expect(store.getState().inFlight).toBe(1)
    connection.receive({
      type: 'result',
      requestId: 'display-1',
      ok: false,
      error: { kind: 'IllegalTransition', message: 'nothing to retry while idle' },
    })

    expect(await sending).toBe(false)
    expect(store.getState().lastError).toEqual({ kind: 'IllegalTransition', message: 'nothing to retry while idle' })
    expect(store.getState().inFlight).toBe(0)
  })

  it('clears lastError after an applied command', async () => {
    const { store, socket, connection } = connected()
    store.getState().setError({ kind: 'OutOfRange', message: 'note 20 is outside 36-38' })

    const sending = sendCommand(store, socket, { type: 'next' })
    connection.receive({ type: 'result', requestId: 'display-1', ok: true, version: 8 })

    expect(await sending).toBe(true)
    expect(store.getState().lastError).toBeNull()
  })
})
