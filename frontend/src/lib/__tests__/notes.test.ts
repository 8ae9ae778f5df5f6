import { describe, it, expect } from 'vitest'
import { canEdit, failureLines, phaseLabel, progressLabel } from '@/lib/notes'
import { makeSnapshot } from '@/test/fixtures'

describe('labels', () => {
  it('shows the countdown in the phase label', () => {
    expect(phaseLabel(makeSnapshot(1, { phase: 'countingDown', countdownRemaining: 3 }))).toBe('Get ready (3)')
    expect(phaseLabel(makeSnapshot(1, { phase: 'reviewPending' }))).toBe('Review take')
  })

  it('shows progress through the register', () => {
    expect(progressLabel(makeSnapshot(1, { progress: { total: 3, done: 1, remaining: 2 } }))).toBe('1 / 3')
  })

  it('names failed channels by microphone position', () => {
    const snapshot = makeSnapshot(1, {
      microphones: [{ id: 'rear', position: 'Rear', enabled: true }],
      channelFailures: { rear: 'encodeFailed', side: 'deviceUnavailable' },
    })
    expect(failureLines(snapshot)).toEqual(['Rear: encoding failed', 'side: device unavailable'])
  })

  it('allows edits only between takes', () => {
    expect(canEdit('idle')).toBe(true)
    expect(canEdit('reviewPending')).toBe(true)
    expect(canEdit('recording')).toBe(false)
  })
})
