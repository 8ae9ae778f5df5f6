import { createStore } from 'zustand/vanilla'
import { immer } from 'zustand/middleware/immer'
import type { CommandError, ConnectionStatus, SessionCommand, SessionSnapshot } from '@/types'
import { CommandRejectedError } from '@/services/apiClient'
import type { SessionSocket } from '@/services/sessionSocket'

interface SessionStoreState {
  snapshot: SessionSnapshot | null
  status: ConnectionStatus
  lastError: CommandError | null
  inFlight: number
  resyncing: boolean
}

interface SessionStoreActions {
  applySnapshot(snapshot: SessionSnapshot): void
  setStatus(status: ConnectionStatus): void
  setError(error: CommandError | null): void
  commandSent(): void
  commandSettled(): void
}

export type SessionStore = ReturnType<typeof createSessionStore>

export function createSessionStore() {
  return createStore<SessionStoreState & SessionStoreActions>()(
    immer((set) => ({
      snapshot: null,
      status: 'closed',
      lastError: null,
      inFlight: 0,
      resyncing: true,

      applySnapshot: (snapshot) => set((s) => {
        // the first snapshot of a new connection replaces whatever we had
        if (!s.resyncing && s.snapshot && snapshot.version <= s.snapshot.version) return
        s.snapshot = snapshot
        s.resyncing = false
      }),
      setStatus: (status) => set((s) => {
        s.status = status
        if (status !== 'open') s.resyncing = true
      }),
      setError: (error) => set((s) => { s.lastError = error }),
      commandSent: () => set((s) => { s.inFlight += 1 }),
      commandSettled: () => set((s) => { s.inFlight = Math.max(0, s.inFlight - 1) }),
    }))
  )
}

/** Feed a socket's snapshots and status into the store. Returns an unbind function. */
export function bindSession(store: SessionStore, socket: SessionSocket): () => void {
  const offSnapshot = socket.onSnapshot((snapshot) => store.getState().applySnapshot(snapshot))
  const offStatus = socket.onStatus((status) => store.getState().setStatus(status))
  return () => {
    offSnapshot()
    offStatus()
  }
}

/**
 * Send a command and record a refusal as `lastError`. Resolves true when the
 * server applied it.
 */
export async function sendCommand(store: SessionStore, socket: SessionSocket, command: SessionCommand): Promise<boolean> {
  const { commandSent, commandSettled, setError } = store.getState()
  commandSent()
  try {
    await socket.send(command)
    setError(null)
    return true
  } catch (err) {
    if (err instanceof CommandRejectedError) {
      setError({ kind: err.kind, message: err.message })
      return false
    }
    throw err
  } finally {
    commandSettled()
  }
}
