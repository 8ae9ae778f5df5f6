import type { MicrophoneChannel, RecordingSettings } from '../types.js'
import type { AudioCaptureService, CaptureHandle, ChannelOutcome, InputDevice } from '../capture/types.js'

interface FakeRun {
  handle: CaptureHandle
  channels: MicrophoneChannel[]
  settings: RecordingSettings
  targets: Record<string, string>
}

/**
 * In-memory capture service. `files` maps a relative target path to the id of
 * the capture that wrote it; nothing ever touches the disk.
 */
export class FakeCaptureService implements AudioCaptureService {
  readonly files = new Map<string, string>()
  readonly begun: FakeRun[] = []
  readonly stopped: string[] = []
  readonly cancelled: string[] = []
  readonly failChannels = new Set<string>()
  beginError: Error | null = null
  devices: InputDevice[] = [{ id: 'hw:0', name: 'Test input', isDefault: true }]

  private readonly running = new Map<string, FakeRun>()
  private gate: Promise<void> | null = null
  private stopGate: Promise<void> | null = null
  private count = 0

  /** Holds every `begin` until the returned function is called. */
  holdBegin(): () => void {
    let release = () => {}
    this.gate = new Promise<void>((resolve) => { release = () => resolve() })
    return () => {
      this.gate = null
      release()
    }
  }

  /** Holds every `stop` mid-encode until the returned function is called. */
  holdStop(): () => void {
    let release = () => {}
    this.stopGate = new Promise<void>((resolve) => { release = () => resolve() })
    return () => {
      this.stopGate = null
      release()
    }
  }

  async begin(
    channels: MicrophoneChannel[],
    settings: RecordingSettings,
    targets: Record<string, string>,
  ): Promise<CaptureHandle> {
    if (this.gate) await this.gate
    if (this.beginError) throw this.beginError
    this.count += 1
    const run: FakeRun = { handle: { id: `capture-${this.count}` }, channels, settings, targets }
    this.running.set(run.handle.id, run)
    this.begun.push(run)
    return run.handle
  }

  async stop(handle: CaptureHandle): Promise<Map<string, ChannelOutcome>> {
    const outcomes = new Map<string, ChannelOutcome>()
    const run = this.running.get(handle.id)
    if (!run) return outcomes
    this.stopped.push(handle.id)
    if (this.stopGate) await this.stopGate
    // cancelled while encoding: nothing is kept
    if (!this.running.has(handle.id)) return outcomes
    this.running.delete(handle.id)
    for (const channel of run.channels) {
      const target = run.targets[channel.id]
      if (this.failChannels.has(channel.id)) {
        outcomes.set(channel.id, { status: 'encodeFailed', path: target, message: 'encoder crashed' })
        continue
      }
      this.files.set(target, handle.id)
      outcomes.set(channel.id, { status: 'written', path: target })
    }
    return outcomes
  }

  async cancel(handle: CaptureHandle): Promise<void> {
    this.running.delete(handle.id)
    this.cancelled.push(handle.id)
  }

  async listDevices(): Promise<InputDevice[]> {
    return this.devices
  }
}
