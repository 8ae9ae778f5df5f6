/**
 * SessionState: the one authoritative copy of the recording session.
 *
 * Backed by a zustand vanilla store with the immer middleware, so every
 * committed mutation produces a new frozen tree. Only the Sequencer calls
 * `applyCommand`; everything else reads `snapshot()` or subscribes.
 */

import { createStore } from 'zustand/vanilla'
import { immer } from 'zustand/middleware/immer'
import { freeze } from 'immer'
import type {
  ChannelFailure, MicrophoneChannel, Organ, RecordingSettings, Register,
  RegisterSelection, SequencerPhase, SessionSnapshot,
} from '../types.js'
import { fail, ok, type Result } from './errors.js'
import { clampNote, DEFAULT_MICROPHONE, DEFAULT_SETTINGS, mergeSettings } from './settings.js'
import { displayName, fileStem, format, resolveTargets } from './naming.js'

// ─── State shape ─────────────────────────────────────────────────────────────

interface SessionData {
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
}

export type SessionMutation =
  | { type: 'selectOrgan'; organ: Organ }
  | { type: 'selectRegister'; keyboard: string; register: Register }
  | { type: 'updateSettings'; settings: Partial<RecordingSettings> }
  | { type: 'updateMicrophones'; microphones: MicrophoneChannel[] }
  | {
      type: 'transition'
      phase: SequencerPhase
      noteIndex?: number
      countdownRemaining?: number | null
      channelFailures?: Record<string, ChannelFailure>
    }
  | { type: 'setClients'; clients: string[] }

export interface SessionStateOptions {
  settings?: RecordingSettings
  microphones?: MicrophoneChannel[]
}

/** Allowed phase edges; self edges are countdown ticks and idle cursor moves. */
const TRANSITIONS: Record<SequencerPhase, readonly SequencerPhase[]> = {
  idle: ['idle', 'countingDown'],
  countingDown: ['countingDown', 'recording', 'idle'],
  recording: ['reviewPending', 'idle'],
  reviewPending: ['countingDown', 'finished', 'idle'],
  finished: ['countingDown', 'idle'],
}

/** Phases in which the organ, register, settings and microphones may change. */
const EDITABLE: readonly SequencerPhase[] = ['idle', 'reviewPending', 'finished']

function createSessionStore(initial: SessionData) {
  return createStore<SessionData>()(immer(() => initial))
}

// ─── SessionState ────────────────────────────────────────────────────────────

export class SessionState {
  private readonly store: ReturnType<typeof createSessionStore>
  private cached: SessionSnapshot | null = null

  constructor(options: SessionStateOptions = {}) {
    const settings = options.settings ?? DEFAULT_SETTINGS
    this.store = createSessionStore({
      version: 0,
      phase: 'idle',
      organ: null,
      selection: null,
      noteIndex: settings.startNote,
      countdownRemaining: null,
      settings,
      microphones: options.microphones?.length ? options.microphones : [DEFAULT_MICROPHONE],
      channelFailures: {},
      clients: [],
    })
  }

  get version(): number {
    return this.store.getState().version
  }

  get phase(): SequencerPhase {
    return this.store.getState().phase
  }

  snapshot(): SessionSnapshot {
    const data = this.store.getState()
    if (this.cached?.version === data.version) return this.cached

    const { settings, noteIndex } = data
    const total = settings.endNote - settings.startNote + 1
    const done = data.phase === 'finished' ? total : noteIndex - settings.startNote

    this.cached = freeze({
      ...data,
      note: {
        midi: noteIndex,
        name: displayName(noteIndex),
        filename: `${fileStem(noteIndex)}.mp3`,
      },
      progress: { total, done, remaining: total - done },
      targetPaths: resolveTargets(data.organ, data.selection, data.microphones, noteIndex),
    }, true)
    return this.cached
  }

  /** Called with the new snapshot after every committed mutation. */
  subscribe(listener: (snapshot: SessionSnapshot) => void): () => void {
    return this.store.subscribe((next, prev) => {
      if (next.version !== prev.version) listener(this.snapshot())
    })
  }

  applyCommand(mutation: SessionMutation): Result<SessionSnapshot> {
    const data = this.store.getState()
    const checked = this.check(data, mutation)
    if (!checked.ok) return checked

    this.store.setState((s) => {
      this.apply(s, mutation)
      s.version += 1
    })
    return ok(this.snapshot())
  }

  // ── Validation (no state change on failure)

  private check(data: SessionData, m: SessionMutation): Result<null> {
    switch (m.type) {
      case 'setClients':
        return ok(null)

      case 'selectOrgan':
      case 'updateMicrophones':
        if (!EDITABLE.includes(data.phase)) {
          return fail('IllegalTransition', `cannot change ${m.type === 'selectOrgan' ? 'organ' : 'microphones'} while ${data.phase}`)
        }
        if (m.type === 'updateMicrophones' && m.microphones.length === 0) {
          return fail('NoMicrophoneEnabled', 'at least one microphone channel must exist')
        }
        return ok(null)

      case 'selectRegister':
        if (!EDITABLE.includes(data.phase)) {
          return fail('IllegalTransition', `cannot select a register while ${data.phase}`)
        }
        if (!data.organ) return fail('UnknownKeyboard', 'no organ selected')
        if (!data.organ.keyboards.some((k) => k.name === m.keyboard)) {
          return fail('UnknownKeyboard', `organ "${data.organ.name}" has no keyboard "${m.keyboard}"`)
        }
        if (!format(m.register.label).replace(/_?trem$/, '')) {
          return fail('InvalidCommand', `"${m.register.label}" does not name a register`)
        }
        return ok(null)

      case 'updateSettings': {
        if (!EDITABLE.includes(data.phase)) {
          return fail('IllegalTransition', `cannot change settings while ${data.phase}`)
        }
        const merged = mergeSettings(data.settings, m.settings)
        return merged.ok ? ok(null) : merged
      }

      case 'transition': {
        if (!TRANSITIONS[data.phase].includes(m.phase)) {
          return fail('IllegalTransition', `cannot go from ${data.phase} to ${m.phase}`)
        }
        const note = m.noteIndex ?? data.noteIndex
        if (note < data.settings.startNote || note > data.settings.endNote) {
          return fail('OutOfRange', `note ${note} is outside ${data.settings.startNote}-${data.settings.endNote}`)
        }
        if (m.phase === 'countingDown' || m.phase === 'recording') {
          if (!data.selection) return fail('NoRegisterSelected', 'select a register first')
          if (!data.microphones.some((mic) => mic.enabled)) {
            return fail('NoMicrophoneEnabled', 'enable at least one microphone channel')
          }
        }
        return ok(null)
      }
    }
  }

  // ── Mutation (runs inside the immer producer)

  private apply(s: SessionData, m: SessionMutation): void {
    switch (m.type) {
      case 'setClients':
        s.clients = [...m.clients]
        break

      case 'selectOrgan':
        s.organ = m.organ
        s.selection = null
        s.phase = 'idle'
        s.noteIndex = s.settings.startNote
        s.countdownRemaining = null
        s.channelFailures = {}
        break

      case 'selectRegister': {
        const keyboard = s.organ?.keyboards.find((k) => k.name === m.keyboard)
        const known = keyboard?.registers.find(
          (r) => r.label === m.register.label && r.tremulant === m.register.tremulant,
        )
        if (keyboard && !known) keyboard.registers.push({ ...m.register })
        s.selection = { keyboard: m.keyboard, register: { ...m.register } }
        s.phase = 'idle'
        s.noteIndex = s.settings.startNote
        s.countdownRemaining = null
        s.channelFailures = {}
        break
      }

      case 'updateSettings': {
        const merged = mergeSettings(s.settings, m.settings)
        if (!merged.ok) break
        s.settings = merged.value
        s.noteIndex = clampNote(s.noteIndex, merged.value)
        break
      }

      case 'updateMicrophones':
        s.microphones = m.microphones.map((mic) => ({ ...mic }))
        s.channelFailures = {}
        break

      case 'transition':
        s.phase = m.phase
        if (m.noteIndex !== undefined) s.noteIndex = m.noteIndex
        s.countdownRemaining = m.countdownRemaining ?? null
        if (m.channelFailures !== undefined) s.channelFailures = { ...m.channelFailures }
        break
    }
  }
}
