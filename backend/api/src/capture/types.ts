import type { MicrophoneChannel, RecordingSettings } from '../types.js'

/** Opaque token for one running capture (one take across all channels). */
export interface CaptureHandle {
  readonly id: string
}

export type ChannelOutcome =
  | { status: 'written'; path: string }
  | { status: 'encodeFailed'; path: string; message: string }

export interface InputDevice {
  id: string
  name: string
  isDefault: boolean
}

/**
 * Boundary to the audio hardware. Paths in `targets` are relative to the
 * service's output root and keyed by channel id.
 *
 * `begin` throws DeviceUnavailableError / InvalidSettingsError.
 * `stop` always ends the capture; failed channels come back as encodeFailed.
 * `cancel` discards everything; nothing may appear at a target path.
 */
export interface AudioCaptureService {
  begin(
    channels: MicrophoneChannel[],
    settings: RecordingSettings,
    targets: Record<string, string>,
  ): Promise<CaptureHandle>
  stop(handle: CaptureHandle): Promise<Map<string, ChannelOutcome>>
  cancel(handle: CaptureHandle): Promise<void>
  listDevices(): Promise<InputDevice[]>
}
