// ─── Session wire types (mirror of the API's snapshot) ──────────────────────

export interface Register {
  label: string
  tremulant: boolean
}

export interface Keyboard {
  name: string
  registers: Register[]
}

export interface Organ {
  name: string
  keyboards: Keyboard[]
}

export interface MicrophoneChannel {
  id: string
  position: string
  enabled: boolean
  device?: string
}

export type ChannelFailure = 'deviceUnavailable' | 'encodeFailed' | 'invalidSettings'

export interface RecordingSettings {
  sampleRate: 44100 | 48000 | 96000
  bitDepth: 16 | 24
  channels: 'mono' | 'stereo'
  mp3Bitrate: 128 | 192 | 256 | 320
  countdownSeconds: number
  recordSeconds: number
  startNote: number
  endNote: number
}

export type SequencerPhase = 'idle' | 'countingDown' | 'recording' | 'reviewPending' | 'finished'

export interface SessionSnapshot {
  version: number
  phase: SequencerPhase
  organ: Organ | null
  selection: { keyboard: string; register: Register } | null
  noteIndex: number
  countdownRemaining: number | null
  settings: RecordingSettings
  microphones: MicrophoneChannel[]
  channelFailures: Record<string, ChannelFailure>
  clients: string[]
  note: { midi: number; name: string; filename: string }
  progress: { total: number; done: number; remaining: number }
  targetPaths: Record<string, string>
}

export interface InputDevice {
  id: string
  name: string
  isDefault: boolean
}

// ─── Commands ───────────────────────────────────────────────────────────────

export type SessionCommand =
  | { type: 'selectOrgan'; organ: Organ }
  | { type: 'selectRegister'; keyboard: string; label: string; tremulant?: boolean }
  | { type: 'start' }
  | { type: 'stop' }
  | { type: 'retry' }
  | { type: 'next' }
  | { type: 'previous' }
  | { type: 'setNote'; midi: number }
  | { type: 'updateSettings'; settings: Partial<RecordingSettings> }
  | { type: 'updateMicrophones'; microphones: MicrophoneChannel[] }

export interface CommandError {
  kind: string
  message: string
}

// ─── WebSocket messages ─────────────────────────────────────────────────────

export type ServerMessage =
  | { type: 'snapshot'; snapshot: SessionSnapshot }
  | { type: 'result'; requestId: string; ok: true; version: number }
  | { type: 'result'; requestId: string; ok: false; error: CommandError }

export type ConnectionStatus = 'connecting' | 'open' | 'closed'

/** The wall display runs the session; remotes follow and steer it. */
export type ClientRole = 'display' | 'remote'
