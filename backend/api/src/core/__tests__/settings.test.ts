import { describe, it, expect } from 'vitest'
import { clampNote, DEFAULT_SETTINGS, mergeSettings } from '../settings.js'

describe('mergeSettings', () => {
  it('applies a valid patch', () => {
    const result = mergeSettings(DEFAULT_SETTINGS, { sampleRate: 48000, startNote: 40, endNote: 60 })
    expect(result).toEqual({
      ok: true,
      value: { ...DEFAULT_SETTINGS, sampleRate: 48000, startNote: 40, endNote: 60 },
    })
  })

  it('rejects a start note above the end note', () => {
    const result = mergeSettings(DEFAULT_SETTINGS, { startNote: 70, endNote: 60 })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.kind).toBe('InvalidRange')
  })

  it('rejects notes outside MIDI', () => {
    const result = mergeSettings(DEFAULT_SETTINGS, { endNote: 128 })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.kind).toBe('OutOfRange')
  })

  it('rejects timings outside their bounds', () => {
    for (const patch of [{ countdownSeconds: 0 }, { recordSeconds: 61 }, { recordSeconds: 2.5 }]) {
      const result = mergeSettings(DEFAULT_SETTINGS, patch)
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.kind).toBe('InvalidSettings')
    }
  })
})

describe('clampNote', () => {
  it('keeps a note inside the range', () => {
    const settings = { ...DEFAULT_SETTINGS, startNote: 48, endNote: 60 }
    expect(clampNote(36, settings)).toBe(48)
    expect(clampNote(72, settings)).toBe(60)
    expect(clampNote(50, settings)).toBe(50)
  })
})
