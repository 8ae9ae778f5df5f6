// ─── Organ ──────────────────────────────────────────────────────────────────

export interface Register {
  label: string        // free text, e.g. "Holpijp 8 voet + tremulant"
  tremulant: boolean
}

export interface Keyboard {
  name: string         // "Hoofdwerk", "Pedaal", ...
  registers: Register[]
}

export interface Organ {
  name: string
  keyboards: Keyboard[]
}

export interface RegisterSelection {
  keyboard: string
  register: Register
}

// ─── Microphones ────────────────────────────────────────────────────────────

export interface MicrophoneChannel {
  id: string
  position: string     // "Front", "Rear", ...
  enabled: boolean
  device?: string      // capture device name, backend specific
}

export type ChannelFailure = 'deviceUnavailable' | 'encodeFailed' | 'invalidSettings'

// ─── Recording settings ─────────────────────────────────────────────────────

export type SampleRate = 44100 | 48000 | 96000
export type BitDepth = 16 | 24
export type ChannelLayout = 'mono' | 'stereo'
export type Mp3Bitrate = 128 | 192 | 256 | 320

export interface RecordingSettings {
  sampleRate: SampleRate
  bitDepth: BitDepth
  channels: ChannelLayout
  mp3Bitrate: Mp3Bitrate
  countdownSeconds: number   // 1-30
  recordSeconds: number      // 1-60
  startNote: number          // MIDI 0-127
  endNote: number            // MIDI 0-127, >= startNote
}

// ─── Sequencer ──────────────────────────────────────────────────────────────

export type SequencerPhase = 'idle' | 'countingDown' | 'recording' | 'reviewPending' | 'finished'

// ─── Snapshot (what every client receives) ──────────────────────────────────

export interface NoteInfo {
  midi: number
  name: string         // display name, e.g. "C#2"
  filename: string     // e.g. "037-c#.mp3"
}

export interface Progress {
  total: number
  done: number
  remaining: number
}

export interface SessionSnapshot {
  version: number
  phase: SequencerPhase
  organ: Organ | null
  selection: RegisterSelection | null
  noteIndex: number
  countdownRemaining: number | null
  settings: RecordingSettings
  microphones: MicrophoneChannel[]
  channelFailures: Record<string, ChannelFailure>
  clients: string[]
  // Derived on every snapshot, never stored
  note: NoteInfo
  progress: Progress
  targetPaths: Record<string, string>
}

// ─── WebSocket messages ─────────────────────────────────────────────────────

export interface WireError {
  kind: string
  message: string
}

export type ServerMessage =
  | { type: 'snapshot'; snapshot: SessionSnapshot }
  | { type: 'result'; requestId: string; ok: true; version: number }
  | { type: 'result'; requestId: string; ok: false; error: WireError }

export interface ClientMessage {
  type: 'command'
  requestId: string
  command: unknown
}
