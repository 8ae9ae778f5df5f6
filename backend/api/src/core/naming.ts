/**
 * Naming engine: canonical register names and sample paths.
 *
 * Paths follow the sample-set layout organ players expect:
 *   <Organ>/<Keyboard>/<Register>[_trem]/[<Mic>/]<MMM>-<note>.mp3
 * e.g. "Dorpskerk/Hoofdwerk/Holpijp_8/036-c.mp3".
 */

import type { MicrophoneChannel, Organ, RegisterSelection } from '../types.js'

const NOTE_NAMES = ['c', 'c#', 'd', 'd#', 'e', 'f', 'f#', 'g', 'g#', 'a', 'a#', 'b']

const TREMULANT_TOKENS = new Set(['trem', 'tremulant'])
const MULTI_RANK_TOKENS = new Set(['sterk', 'rijen'])
const DECORATIVE_TOKENS = new Set(['voet'])

const NUMERIC = /^\d+(?:\/\d+)?$/
const RANK_COUNT = /^\d+st$/i
const FOOT_MARKS = /['’′]/g

// ─── Tokenizing ──────────────────────────────────────────────────────────────

function toAscii(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^\x20-\x7e]/g, '')
}

/** Strips separators and reserved characters; leading dots go too, so no segment is "." or "..". */
function pathSafe(token: string): string {
  return token.replace(/[\\/:*?"<>|]/g, '').replace(/^\.+/, '')
}

function splitTokens(text: string): string[] {
  return text.split(/[\s_]+/).filter(Boolean)
}

/** Split off tremulant markers ("+ tremulant", "trem"); they only set the flag. */
function extractTremulant(tokens: string[]): { tokens: string[]; tremulant: boolean } {
  let tremulant = false
  const rest: string[] = []
  for (const raw of tokens) {
    const token = raw.replace(/^\++/, '')
    if (!token) continue
    if (TREMULANT_TOKENS.has(token.toLowerCase())) {
      tremulant = true
      continue
    }
    rest.push(token)
  }
  return { tokens: rest, tremulant }
}

function isRankToken(token: string): boolean {
  const bare = token.replace(FOOT_MARKS, '')
  return NUMERIC.test(bare) || RANK_COUNT.test(bare)
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Canonical directory name for a register label.
 *
 *   format('Holpijp 8 voet')              → 'Holpijp_8'
 *   format('Holpijp 8 voet + tremulant')  → 'Holpijp_8_trem'
 *   format('Mixtuur 4 sterk')             → 'Mixtuur_4st'
 *   format("Prestant 8'", true)           → 'Prestant_8_trem'
 *
 * Labels without any numeric rank keep their words as-is, joined by `_`.
 * The output is a fixed point: `format(format(x)) === format(x)`.
 */
export function format(label: string, tremulant = false): string {
  const extracted = extractTremulant(splitTokens(toAscii(label).trim()))
  const trem = tremulant || extracted.tremulant
  const suffix = trem ? '_trem' : ''

  if (!extracted.tokens.some(isRankToken)) {
    return extracted.tokens.map(pathSafe).filter(Boolean).join('_') + suffix
  }

  const out: string[] = []
  for (const raw of extracted.tokens) {
    const token = raw.replace(FOOT_MARKS, '')
    const lower = token.toLowerCase()
    if (!token || DECORATIVE_TOKENS.has(lower)) continue

    if (MULTI_RANK_TOKENS.has(lower)) {
      const count = out[out.length - 1]
      if (count !== undefined && /^\d+$/.test(count)) out[out.length - 1] = `${count}st`
      continue
    }

    const safe = pathSafe(token.replace(/\//g, '-'))
    if (safe) out.push(safe)
  }
  return out.join('_') + suffix
}

/** Folds an organ, keyboard or microphone name into a single path segment. */
export function segment(name: string): string {
  return splitTokens(toAscii(name).trim()).map(pathSafe).filter(Boolean).join('_')
}

/** True when a name keeps at least one character once folded into a path segment. */
export function isNameable(name: string): boolean {
  return segment(name) !== ''
}

/** True when a register label yields a directory name of its own, not just a suffix. */
export function isRegisterLabel(label: string): boolean {
  const name = format(label)
  return name !== '' && !name.startsWith('_')
}

export function noteName(midi: number): string {
  return NOTE_NAMES[((midi % 12) + 12) % 12]
}

/** Display name with octave, MIDI 36 → "C2". */
export function displayName(midi: number): string {
  const octave = Math.floor(midi / 12) - 1
  return `${noteName(midi).toUpperCase()}${octave}`
}

/** MIDI 37 → "037-c#". */
export function fileStem(midi: number): string {
  return `${String(midi).padStart(3, '0')}-${noteName(midi)}`
}

export interface PathContext {
  organ: string
  keyboard: string
  register: string
  tremulant: boolean
  micPosition: string | null
  noteIndex: number
}

/** Relative path of one sample; callers resolve it against the output root. */
export function pathFor(ctx: PathContext): string {
  const parts = [
    segment(ctx.organ),
    segment(ctx.keyboard),
    format(ctx.register, ctx.tremulant),
  ]
  if (ctx.micPosition !== null) parts.push(segment(ctx.micPosition))
  parts.push(`${fileStem(ctx.noteIndex)}.mp3`)
  return parts.join('/')
}

/**
 * Target path per enabled microphone channel. A microphone directory is only
 * added when more than one channel records, so single-mic sets stay flat.
 */
export function resolveTargets(
  organ: Organ | null,
  selection: RegisterSelection | null,
  microphones: MicrophoneChannel[],
  noteIndex: number,
): Record<string, string> {
  if (!organ || !selection) return {}
  const enabled = microphones.filter((m) => m.enabled)
  const perMic = enabled.length > 1
  return Object.fromEntries(enabled.map((mic) => [mic.id, pathFor({
    organ: organ.name,
    keyboard: selection.keyboard,
    register: selection.register.label,
    tremulant: selection.register.tremulant,
    micPosition: perMic ? mic.position : null,
    noteIndex,
  })]))
}
