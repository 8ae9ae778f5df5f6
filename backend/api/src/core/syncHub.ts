/**
 * SyncHub: many clients, one sequencer.
 *
 * Inbound: every command and every timer/capture event goes through one FIFO
 * queue, so the sequencer never sees two things at once.
 * Outbound: every committed version is pushed to every client stream.
 */

import type { Logger } from 'pino'
import type { SessionSnapshot } from '../types.js'
import type { AudioCaptureService } from '../capture/types.js'
import type { CheckpointStore } from '../checkpoints.js'
import { CommandQueue } from './commandQueue.js'
import { parseCommand } from './commands.js'
import type { Result } from './errors.js'
import { Sequencer, type SequencerEvent } from './sequencer.js'
import type { SessionState } from './sessionState.js'
import { SnapshotStream } from './snapshotStream.js'

const DEFAULT_CLIENT_BUFFER = 16

export interface SyncHubOptions {
  state: SessionState
  capture: AudioCaptureService
  logger: Logger
  checkpoints?: CheckpointStore
  clientBufferSize?: number
}

export class SyncHub {
  readonly state: SessionState
  private readonly sequencer: Sequencer
  private readonly queue: CommandQueue<SequencerEvent, Result<SessionSnapshot>>
  private readonly streams = new Map<string, SnapshotStream>()
  private readonly log: Logger
  private readonly bufferSize: number
  private readonly unsubscribe: () => void

  constructor(options: SyncHubOptions) {
    this.state = options.state
    this.log = options.logger
    this.bufferSize = options.clientBufferSize ?? DEFAULT_CLIENT_BUFFER
    this.queue = new CommandQueue((event) => this.sequencer.handle(event))
    this.sequencer = new Sequencer({
      state: options.state,
      capture: options.capture,
      checkpoints: options.checkpoints,
      logger: options.logger.child({ module: 'sequencer' }),
      dispatch: (event) => this.dispatch(event),
    })
    this.unsubscribe = options.state.subscribe((snapshot) => this.broadcast(snapshot))
  }

  get clientIds(): string[] {
    return [...this.streams.keys()]
  }

  snapshot(): SessionSnapshot {
    return this.state.snapshot()
  }

  // ── Clients

  /** Opens a stream whose first item is the current snapshot. */
  connect(clientId: string): SnapshotStream {
    this.streams.get(clientId)?.close()
    const stream = new SnapshotStream(clientId, this.bufferSize, this.state.snapshot())
    this.streams.set(clientId, stream)
    this.log.info({ clientId, clients: this.streams.size }, 'client connected')
    this.dispatch({ type: 'presence', clients: this.clientIds })
    return stream
  }

  disconnect(clientId: string, stream?: SnapshotStream): void {
    const current = this.streams.get(clientId)
    if (!current || (stream && current !== stream)) return
    current.close()
    this.streams.delete(clientId)
    if (current.dropped > 0) {
      this.log.warn({ clientId, dropped: current.dropped }, 'client fell behind, snapshots were dropped')
    }
    this.log.info({ clientId, clients: this.streams.size }, 'client disconnected')
    this.dispatch({ type: 'presence', clients: this.clientIds })
  }

  // ── Commands

  /**
   * Validate and enqueue a command. The result goes back to this caller only;
   * a rejected command changes nothing and is not broadcast.
   */
  async submit(clientId: string, raw: unknown): Promise<Result<SessionSnapshot>> {
    const parsed = parseCommand(raw)
    if (!parsed.ok) {
      this.log.debug({ clientId, error: parsed.error }, 'rejected malformed command')
      return parsed
    }

    const command = parsed.value
    try {
      const result = await this.queue.push({ type: 'command', clientId, command })
      if (!result.ok) {
        this.log.info({ clientId, command: command.type, error: result.error }, 'command rejected')
      } else {
        this.log.debug({ clientId, command: command.type, version: result.value.version }, 'command applied')
      }
      return result
    } catch (err) {
      this.log.error({ err, clientId, command: command.type }, 'command handler threw')
      throw err
    }
  }

  /** Timer and capture completions re-enter here, behind any queued commands. */
  dispatch(event: SequencerEvent): void {
    void this.queue.push(event).then(
      (result) => {
        if (!result.ok) this.log.warn({ event: event.type, error: result.error }, 'internal event rejected')
      },
      (err: unknown) => {
        this.log.error({ err, event: event.type }, 'internal event handler threw')
      },
    )
  }

  /** Stop the sequencer and end every client stream. */
  close(): void {
    this.sequencer.dispose()
    this.unsubscribe()
    for (const stream of this.streams.values()) stream.close()
    this.streams.clear()
  }

  private broadcast(snapshot: SessionSnapshot): void {
    for (const stream of this.streams.values()) stream.push(snapshot)
  }
}
