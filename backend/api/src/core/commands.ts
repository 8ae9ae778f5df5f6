/**
 * Client commands and their wire validation.
 *
 * Anything a display or remote sends goes through `parseCommand` before it
 * reaches the queue, so the sequencer only ever sees well-typed commands.
 */

import type { Keyboard, MicrophoneChannel, Organ, RecordingSettings, Register } from '../types.js'
import { fail, ok, type Result } from './errors.js'
import { isNameable, isRegisterLabel, segment } from './naming.js'

export type Command =
  | { type: 'selectOrgan'; organ: Organ }
  | { type: 'selectRegister'; keyboard: string; label: string; tremulant?: boolean }
  | { type: 'start' }
  | { type: 'stop' }
  | { type: 'retry' }
  | { type: 'next' }
  | { type: 'previous' }
  | { type: 'updateSettings'; settings: Partial<RecordingSettings> }
  | { type: 'setNote'; midi: number }
  | { type: 'updateMicrophones'; microphones: MicrophoneChannel[] }

export type CommandType = Command['type']

const BARE_COMMANDS = ['start', 'stop', 'retry', 'next', 'previous'] as const

const NUMERIC_SETTINGS = [
  'sampleRate', 'bitDepth', 'mp3Bitrate', 'countdownSeconds', 'recordSeconds', 'startNote', 'endNote',
] as const

// ─── Guards ──────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function nonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0
}

function parseRegister(value: unknown): Register | null {
  if (!isRecord(value) || !nonEmptyString(value.label) || !isRegisterLabel(value.label)) return null
  return { label: value.label.trim(), tremulant: value.tremulant === true }
}

function parseKeyboard(value: unknown): Keyboard | null {
  if (!isRecord(value) || !nonEmptyString(value.name) || !isNameable(value.name)) return null
  const registers: Register[] = []
  if (value.registers !== undefined) {
    if (!Array.isArray(value.registers)) return null
    for (const r of value.registers) {
      const register = parseRegister(r)
      if (!register) return null
      registers.push(register)
    }
  }
  return { name: value.name.trim(), registers }
}

function parseOrgan(value: unknown): Result<Organ> {
  if (!isRecord(value) || !nonEmptyString(value.name) || !Array.isArray(value.keyboards)) {
    return fail('InvalidCommand', 'organ needs a name and a keyboards array')
  }
  if (!isNameable(value.name)) return fail('InvalidCommand', `organ name "${value.name}" has no usable characters`)
  const keyboards: Keyboard[] = []
  for (const k of value.keyboards) {
    const keyboard = parseKeyboard(k)
    if (!keyboard) return fail('InvalidCommand', 'every keyboard needs a name and valid registers')
    if (keyboards.some((other) => other.name === keyboard.name)) {
      return fail('InvalidCommand', `duplicate keyboard "${keyboard.name}"`)
    }
    keyboards.push(keyboard)
  }
  if (keyboards.length === 0) return fail('InvalidCommand', 'organ needs at least one keyboard')
  return ok({ name: value.name.trim(), keyboards })
}

export function parseSettings(value: unknown): Result<Partial<RecordingSettings>> {
  if (!isRecord(value)) return fail('InvalidCommand', 'settings must be an object')
  const settings: Partial<RecordingSettings> = {}
  for (const key of NUMERIC_SETTINGS) {
    const v = value[key]
    if (v === undefined) continue
    if (typeof v !== 'number' || !Number.isFinite(v)) {
      return fail('InvalidCommand', `${key} must be a number`)
    }
    Object.assign(settings, { [key]: v })
  }
  if (value.channels !== undefined) {
    if (value.channels !== 'mono' && value.channels !== 'stereo') {
      return fail('InvalidSettings', 'channels must be mono or stereo')
    }
    settings.channels = value.channels
  }
  return ok(settings)
}

export function parseMicrophones(value: unknown): Result<MicrophoneChannel[]> {
  if (!Array.isArray(value) || value.length === 0) {
    return fail('InvalidCommand', 'microphones must be a non-empty array')
  }
  const microphones: MicrophoneChannel[] = []
  for (const m of value) {
    if (!isRecord(m) || !nonEmptyString(m.id) || !nonEmptyString(m.position)) {
      return fail('InvalidCommand', 'every microphone needs an id and a position')
    }
    if (microphones.some((other) => other.id === m.id)) {
      return fail('InvalidCommand', `duplicate microphone id "${m.id}"`)
    }
    if (!isNameable(m.position)) {
      return fail('InvalidCommand', `microphone position "${m.position}" has no usable characters`)
    }
    microphones.push({
      id: m.id,
      position: m.position.trim(),
      enabled: m.enabled !== false,
      ...(nonEmptyString(m.device) ? { device: m.device } : {}),
    })
  }
  // Enabled channels each get their own directory; case-insensitive filesystems fold case.
  const seen = new Map<string, string>()
  for (const mic of microphones.filter((m) => m.enabled)) {
    const key = segment(mic.position).toLowerCase()
    const other = seen.get(key)
    if (other !== undefined) {
      return fail('InvalidCommand', `microphones ${other} and ${mic.id} share the position "${mic.position}"`)
    }
    seen.set(key, mic.id)
  }
  return ok(microphones)
}

// ─── Entry point ─────────────────────────────────────────────────────────────

export function parseCommand(raw: unknown): Result<Command> {
  if (!isRecord(raw) || typeof raw.type !== 'string') {
    return fail('InvalidCommand', 'command must be an object with a type')
  }

  const bare = BARE_COMMANDS.find((t) => t === raw.type)
  if (bare) return ok<Command>({ type: bare })

  switch (raw.type) {
    case 'selectOrgan': {
      const organ = parseOrgan(raw.organ)
      return organ.ok ? ok<Command>({ type: 'selectOrgan', organ: organ.value }) : organ
    }
    case 'selectRegister':
      if (!nonEmptyString(raw.keyboard) || !nonEmptyString(raw.label)) {
        return fail('InvalidCommand', 'selectRegister needs a keyboard and a label')
      }
      if (!isRegisterLabel(raw.label)) {
        return fail('InvalidCommand', `register label "${raw.label}" has no usable characters`)
      }
      return ok<Command>({
        type: 'selectRegister',
        keyboard: raw.keyboard.trim(),
        label: raw.label.trim(),
        tremulant: raw.tremulant === true,
      })
    case 'updateSettings': {
      const settings = parseSettings(raw.settings)
      return settings.ok ? ok<Command>({ type: 'updateSettings', settings: settings.value }) : settings
    }
    case 'setNote':
      if (typeof raw.midi !== 'number' || !Number.isInteger(raw.midi)) {
        return fail('InvalidCommand', 'setNote needs an integer midi note')
      }
      return ok<Command>({ type: 'setNote', midi: raw.midi })
    case 'updateMicrophones': {
      const microphones = parseMicrophones(raw.microphones)
      return microphones.ok ? ok<Command>({ type: 'updateMicrophones', microphones: microphones.value }) : microphones
    }
    default:
      return fail('InvalidCommand', `unknown command "${raw.type}"`)
  }
}
