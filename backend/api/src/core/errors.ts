export type CommandErrorKind =
  | 'InvalidRange'
  | 'OutOfRange'
  | 'IllegalTransition'
  | 'NoRegisterSelected'
  | 'NoMicrophoneEnabled'
  | 'InvalidSettings'
  | 'InvalidCommand'
  | 'UnknownKeyboard'

export interface CommandError {
  kind: CommandErrorKind
  message: string
}

export type Result<T, E = CommandError> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function fail(kind: CommandErrorKind, message: string): Result<never, CommandError> {
  return { ok: false, error: { kind, message } }
}

/** Kinds that mean "bad input" rather than "wrong moment". */
export function isValidationError(error: CommandError): boolean {
  return error.kind !== 'IllegalTransition'
}

// ─── Capture faults ─────────────────────────────────────────────────────────
// Thrown by an AudioCaptureService; the sequencer records them per channel.

export class CaptureError extends Error {
  constructor(message: string, readonly channelIds: string[]) {
    super(message)
    this.name = new.target.name
  }
}

export class DeviceUnavailableError extends CaptureError {}

export class InvalidSettingsError extends CaptureError {}
