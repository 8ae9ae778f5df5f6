/**
 * Sequencer: the recording state machine.
 *
 *   idle ─start─▶ countingDown ─(ticks)─▶ recording ─(record timer)─▶ reviewPending
 *                      ▲                                                 │
 *                      └──────────────── next / retry / previous ────────┘
 *   reviewPending ─next at endNote─▶ finished        any ─stop─▶ idle
 *
 * `handle` is only ever called from the SyncHub queue, one event at a time.
 * Timers and capture I/O never touch state directly: they run outside the
 * queue and `dispatch` their completion back into it, tagged with the take
 * they belong to. Events from a cancelled take are dropped.
 */

import type { Logger } from 'pino'
import type { ChannelFailure, SequencerPhase, SessionSnapshot } from '../types.js'
import type { AudioCaptureService, CaptureHandle, ChannelOutcome } from '../capture/types.js'
import type { CheckpointStore } from '../checkpoints.js'
import type { Command } from './commands.js'
import { CaptureError, DeviceUnavailableError, fail, InvalidSettingsError, ok, type Result } from './errors.js'
import { resolveTargets } from './naming.js'
import type { SessionState } from './sessionState.js'

const TICK_MS = 1000

export type SequencerEvent =
  | { type: 'command'; clientId: string; command: Command }
  | { type: 'presence'; clients: string[] }
  | { type: 'countdownTick'; take: number }
  | { type: 'captureStarted'; take: number; handle: CaptureHandle }
  | { type: 'captureFailed'; take: number; error: unknown }
  | { type: 'recordElapsed'; take: number }
  | { type: 'captureStopped'; take: number; outcomes: Map<string, ChannelOutcome> }
  | { type: 'stopFailed'; take: number; error: unknown }

export interface SequencerOptions {
  state: SessionState
  capture: AudioCaptureService
  dispatch: (event: SequencerEvent) => void
  logger: Logger
  checkpoints?: CheckpointStore
}

export class Sequencer {
  private readonly state: SessionState
  private readonly capture: AudioCaptureService
  private readonly dispatch: (event: SequencerEvent) => void
  private readonly log: Logger
  private readonly checkpoints?: CheckpointStore

  private take = 0
  private countdownTimer: ReturnType<typeof setTimeout> | null = null
  private recordTimer: ReturnType<typeof setTimeout> | null = null
  private inFlight: CaptureHandle | null = null

  constructor(options: SequencerOptions) {
    this.state = options.state
    this.capture = options.capture
    this.dispatch = options.dispatch
    this.log = options.logger
    this.checkpoints = options.checkpoints
  }

  handle(event: SequencerEvent): Result<SessionSnapshot> {
    switch (event.type) {
      case 'command':
        return this.command(event.command)
      case 'presence':
        return this.state.applyCommand({ type: 'setClients', clients: event.clients })
      case 'countdownTick':
        return this.onTick(event.take)
      case 'captureStarted':
        return this.onCaptureStarted(event.take, event.handle)
      case 'captureFailed':
        return this.onCaptureFailed(event.take, event.error)
      case 'recordElapsed':
        return this.onRecordElapsed(event.take)
      case 'captureStopped':
        return this.onCaptureStopped(event.take, event.outcomes)
      case 'stopFailed':
        return this.onStopFailed(event.take, event.error)
    }
  }

  /** Cancel timers and any running capture. Used on shutdown. */
  dispose(): void {
    this.abandonTake()
  }

  // ─── Commands ──────────────────────────────────────────────────────────────

  private command(cmd: Command): Result<SessionSnapshot> {
    const { phase } = this.state

    switch (cmd.type) {
      case 'start':
        if (phase !== 'idle') return fail('IllegalTransition', `cannot start while ${phase}`)
        return this.beginCountdown(this.state.snapshot().noteIndex)

      case 'stop':
        if (phase === 'idle') return ok(this.state.snapshot())
        this.abandonTake()
        this.log.info({ from: phase }, 'sequencer stopped')
        return this.state.applyCommand({ type: 'transition', phase: 'idle' })

      case 'retry':
        if (phase !== 'reviewPending' && phase !== 'finished') {
          return fail('IllegalTransition', `nothing to retry while ${phase}`)
        }
        return this.beginCountdown(this.state.snapshot().noteIndex)

      case 'next':
        return this.step(1)

      case 'previous':
        return this.step(-1)

      case 'setNote':
        if (phase === 'countingDown' || phase === 'recording') {
          return fail('IllegalTransition', `cannot jump to a note while ${phase}`)
        }
        return this.state.applyCommand({ type: 'transition', phase: 'idle', noteIndex: cmd.midi, channelFailures: {} })

      case 'selectOrgan':
        return this.state.applyCommand({ type: 'selectOrgan', organ: cmd.organ })

      case 'selectRegister':
        return this.state.applyCommand({
          type: 'selectRegister',
          keyboard: cmd.keyboard,
          register: { label: cmd.label, tremulant: cmd.tremulant ?? false },
        })

      case 'updateSettings':
        return this.state.applyCommand({ type: 'updateSettings', settings: cmd.settings })

      case 'updateMicrophones':
        return this.state.applyCommand({ type: 'updateMicrophones', microphones: cmd.microphones })
    }
  }

  /** next / previous: a cursor move when idle, a new take after a review. */
  private step(delta: 1 | -1): Result<SessionSnapshot> {
    const snapshot = this.state.snapshot()
    const { phase, noteIndex, settings } = snapshot
    const target = noteIndex + delta
    const inRange = target >= settings.startNote && target <= settings.endNote

    if (phase === 'idle') {
      if (!inRange) return ok(snapshot)
      return this.state.applyCommand({ type: 'transition', phase: 'idle', noteIndex: target, channelFailures: {} })
    }

    if (phase !== 'reviewPending' && phase !== 'finished') {
      return fail('IllegalTransition', `cannot move to another note while ${phase}`)
    }

    if (inRange) return this.beginCountdown(target)
    if (delta === 1 && phase === 'reviewPending') return this.finish()
    return ok(snapshot)
  }

  private finish(): Result<SessionSnapshot> {
    const result = this.state.applyCommand({ type: 'transition', phase: 'finished' })
    if (result.ok) {
      const snapshot = result.value
      this.log.info({ register: snapshot.selection?.register.label }, 'register finished')
      if (this.checkpoints) {
        void this.checkpoints.save(snapshot).catch((err: unknown) => {
          this.log.error({ err }, 'failed to save register checkpoint')
        })
      }
    }
    return result
  }

  // ─── Countdown ─────────────────────────────────────────────────────────────

  private beginCountdown(noteIndex: number): Result<SessionSnapshot> {
    const { settings } = this.state.snapshot()
    const result = this.state.applyCommand({
      type: 'transition',
      phase: 'countingDown',
      noteIndex,
      countdownRemaining: settings.countdownSeconds,
      channelFailures: {},
    })
    if (result.ok) {
      this.take += 1
      this.scheduleTick(this.take)
    }
    return result
  }

  private scheduleTick(take: number): void {
    this.countdownTimer = setTimeout(() => {
      this.countdownTimer = null
      this.dispatch({ type: 'countdownTick', take })
    }, TICK_MS)
  }

  private onTick(take: number): Result<SessionSnapshot> {
    const snapshot = this.state.snapshot()
    if (this.isStale(take, 'countingDown')) return ok(snapshot)

    const remaining = (snapshot.countdownRemaining ?? 1) - 1
    if (remaining > 0) {
      const result = this.state.applyCommand({ type: 'transition', phase: 'countingDown', countdownRemaining: remaining })
      if (result.ok) this.scheduleTick(take)
      return result
    }

    const result = this.state.applyCommand({ type: 'transition', phase: 'recording' })
    if (result.ok) this.openCapture(take, result.value)
    return result
  }

  // ─── Capture ───────────────────────────────────────────────────────────────

  private openCapture(take: number, snapshot: SessionSnapshot): void {
    const channels = snapshot.microphones.filter((m) => m.enabled)
    const targets = resolveTargets(snapshot.organ, snapshot.selection, snapshot.microphones, snapshot.noteIndex)
    this.log.info({ note: snapshot.noteIndex, targets }, 'opening capture')

    void this.capture.begin(channels, snapshot.settings, targets).then(
      (handle) => this.dispatch({ type: 'captureStarted', take, handle }),
      (error: unknown) => this.dispatch({ type: 'captureFailed', take, error }),
    )
  }

  private onCaptureStarted(take: number, handle: CaptureHandle): Result<SessionSnapshot> {
    if (this.isStale(take, 'recording')) {
      // opened after a stop: close it again without keeping anything
      this.discard(handle)
      return ok(this.state.snapshot())
    }
    this.inFlight = handle
    const { settings } = this.state.snapshot()
    this.recordTimer = setTimeout(() => {
      this.recordTimer = null
      this.dispatch({ type: 'recordElapsed', take })
    }, settings.recordSeconds * 1000)
    return ok(this.state.snapshot())
  }

  private onCaptureFailed(take: number, error: unknown): Result<SessionSnapshot> {
    if (this.isStale(take, 'recording')) return ok(this.state.snapshot())

    const snapshot = this.state.snapshot()
    const enabled = snapshot.microphones.filter((m) => m.enabled).map((m) => m.id)
    const kind: ChannelFailure = error instanceof InvalidSettingsError ? 'invalidSettings' : 'deviceUnavailable'
    const failedIds = error instanceof CaptureError && error.channelIds.length > 0 ? error.channelIds : enabled

    if (error instanceof DeviceUnavailableError || error instanceof InvalidSettingsError) {
      this.log.warn({ err: error, channels: failedIds }, 'capture could not start')
    } else {
      this.log.error({ err: error }, 'capture failed to start')
    }

    const channelFailures: Record<string, ChannelFailure> = {}
    for (const id of failedIds) channelFailures[id] = kind
    return this.state.applyCommand({ type: 'transition', phase: 'reviewPending', channelFailures })
  }

  private onRecordElapsed(take: number): Result<SessionSnapshot> {
    const handle = this.inFlight
    if (this.isStale(take, 'recording') || !handle) return ok(this.state.snapshot())

    void this.capture.stop(handle).then(
      (outcomes) => this.dispatch({ type: 'captureStopped', take, outcomes }),
      (error: unknown) => this.dispatch({ type: 'stopFailed', take, error }),
    )
    return ok(this.state.snapshot())
  }

  private onCaptureStopped(take: number, outcomes: Map<string, ChannelOutcome>): Result<SessionSnapshot> {
    if (this.isStale(take, 'recording')) return ok(this.state.snapshot())
    this.inFlight = null

    const snapshot = this.state.snapshot()
    const channelFailures: Record<string, ChannelFailure> = {}
    for (const mic of snapshot.microphones.filter((m) => m.enabled)) {
      const outcome = outcomes.get(mic.id)
      if (outcome?.status !== 'written') {
        channelFailures[mic.id] = 'encodeFailed'
        this.log.warn({ channel: mic.id, message: outcome?.message }, 'channel failed to encode')
      }
    }
    this.log.info({ note: snapshot.noteIndex, failed: Object.keys(channelFailures) }, 'take recorded')
    return this.state.applyCommand({ type: 'transition', phase: 'reviewPending', channelFailures })
  }

  private onStopFailed(take: number, error: unknown): Result<SessionSnapshot> {
    if (this.isStale(take, 'recording')) return ok(this.state.snapshot())
    this.inFlight = null
    this.log.error({ err: error }, 'capture failed to stop cleanly')

    const channelFailures: Record<string, ChannelFailure> = {}
    for (const mic of this.state.snapshot().microphones.filter((m) => m.enabled)) {
      channelFailures[mic.id] = 'encodeFailed'
    }
    return this.state.applyCommand({ type: 'transition', phase: 'reviewPending', channelFailures })
  }

  // ─── Take bookkeeping ──────────────────────────────────────────────────────

  private isStale(take: number, phase: SequencerPhase): boolean {
    return take !== this.take || this.state.phase !== phase
  }

  /** Invalidate the current take: pending timers and capture events are dropped. */
  private abandonTake(): void {
    this.take += 1
    if (this.countdownTimer) clearTimeout(this.countdownTimer)
    if (this.recordTimer) clearTimeout(this.recordTimer)
    this.countdownTimer = null
    this.recordTimer = null
    if (this.inFlight) {
      this.discard(this.inFlight)
      this.inFlight = null
    }
  }

  private discard(handle: CaptureHandle): void {
    void this.capture.cancel(handle).catch((err: unknown) => {
      this.log.error({ err, capture: handle.id }, 'failed to cancel capture')
    })
  }
}
