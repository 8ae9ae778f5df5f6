import type { ChannelFailure, SessionSnapshot, SequencerPhase } from '@/types'

const PHASE_LABELS: Record<SequencerPhase, string> = {
  idle: 'Ready',
  countingDown: 'Get ready',
  recording: 'Recording',
  reviewPending: 'Review take',
  finished: 'Register done',
}

const FAILURE_LABELS: Record<ChannelFailure, string> = {
  deviceUnavailable: 'device unavailable',
  encodeFailed: 'encoding failed',
  invalidSettings: 'settings not supported',
}

export function phaseLabel(snapshot: SessionSnapshot): string {
  if (snapshot.phase === 'countingDown' && snapshot.countdownRemaining !== null) {
    return `${PHASE_LABELS.countingDown} (${snapshot.countdownRemaining})`
  }
  return PHASE_LABELS[snapshot.phase]
}

/** "12 / 61", notes done out of the register's range. */
export function progressLabel(snapshot: SessionSnapshot): string {
  return `${snapshot.progress.done} / ${snapshot.progress.total}`
}

/** One line per failed channel, using the microphone position as the name. */
export function failureLines(snapshot: SessionSnapshot): string[] {
  return Object.entries(snapshot.channelFailures).map(([id, failure]) => {
    const mic = snapshot.microphones.find((m) => m.id === id)
    return `${mic?.position ?? id}: ${FAILURE_LABELS[failure]}`
  })
}

export function canEdit(phase: SequencerPhase): boolean {
  return phase === 'idle' || phase === 'reviewPending' || phase === 'finished'
}
