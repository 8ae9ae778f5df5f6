import type { MicrophoneChannel, RecordingSettings } from '../types.js'
import { fail, ok, type Result } from './errors.js'

export const SAMPLE_RATES = [44100, 48000, 96000] as const
export const BIT_DEPTHS = [16, 24] as const
export const CHANNEL_LAYOUTS = ['mono', 'stereo'] as const
export const MP3_BITRATES = [128, 192, 256, 320] as const

export const DEFAULT_SETTINGS: RecordingSettings = {
  sampleRate: 44100,
  bitDepth: 16,
  channels: 'mono',
  mp3Bitrate: 192,
  countdownSeconds: 5,
  recordSeconds: 5,
  startNote: 36,   // C2
  endNote: 96,     // C7
}

export const DEFAULT_MICROPHONE: MicrophoneChannel = {
  id: 'main',
  position: 'Main',
  enabled: true,
}

function oneOf<T>(allowed: readonly T[], value: unknown): value is T {
  return allowed.some((a) => a === value)
}

function intIn(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max
}

/**
 * Merge a partial update into the current settings and check every field.
 * Notes outside MIDI are OutOfRange and a reversed range is InvalidRange;
 * any other bad field is InvalidSettings.
 */
export function mergeSettings(
  current: RecordingSettings,
  patch: Partial<RecordingSettings>,
): Result<RecordingSettings> {
  const next: RecordingSettings = { ...current, ...patch }

  if (!oneOf(SAMPLE_RATES, next.sampleRate)) {
    return fail('InvalidSettings', `sampleRate must be one of ${SAMPLE_RATES.join(', ')}`)
  }
  if (!oneOf(BIT_DEPTHS, next.bitDepth)) {
    return fail('InvalidSettings', `bitDepth must be one of ${BIT_DEPTHS.join(', ')}`)
  }
  if (!oneOf(CHANNEL_LAYOUTS, next.channels)) {
    return fail('InvalidSettings', `channels must be one of ${CHANNEL_LAYOUTS.join(', ')}`)
  }
  if (!oneOf(MP3_BITRATES, next.mp3Bitrate)) {
    return fail('InvalidSettings', `mp3Bitrate must be one of ${MP3_BITRATES.join(', ')}`)
  }
  if (!intIn(next.countdownSeconds, 1, 30)) {
    return fail('InvalidSettings', 'countdownSeconds must be an integer between 1 and 30')
  }
  if (!intIn(next.recordSeconds, 1, 60)) {
    return fail('InvalidSettings', 'recordSeconds must be an integer between 1 and 60')
  }
  if (!intIn(next.startNote, 0, 127) || !intIn(next.endNote, 0, 127)) {
    return fail('OutOfRange', 'startNote and endNote must be MIDI notes between 0 and 127')
  }
  if (next.startNote > next.endNote) {
    return fail('InvalidRange', `startNote ${next.startNote} is above endNote ${next.endNote}`)
  }
  return ok(next)
}

export function clampNote(note: number, settings: RecordingSettings): number {
  return Math.max(settings.startNote, Math.min(settings.endNote, note))
}
