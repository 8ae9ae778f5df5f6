export * from '@/types'
export { createHttp, createSessionApi, sessionApi, CommandRejectedError, type SessionApi } from '@/services/apiClient'
export { SessionSocket, browserSocket, type SocketFactory, type SocketConnection, type SocketHandlers } from '@/services/sessionSocket'
export { createSessionStore, bindSession, sendCommand, type SessionStore } from '@/store/sessionStore'
export { phaseLabel, progressLabel, failureLines, canEdit } from '@/lib/notes'
