import pino from 'pino'
import type { MicrophoneChannel, Organ } from '../types.js'

export const silentLogger = pino({ level: 'silent' })

/** Let every pending promise chain settle. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

export const testOrgan: Organ = {
  name: 'Dorpskerk',
  keyboards: [
    { name: 'Hoofdwerk', registers: [{ label: "Prestant 8'", tremulant: false }] },
    { name: 'Pedaal', registers: [] },
  ],
}

export const threeMics: MicrophoneChannel[] = [
  { id: 'front', position: 'Front', enabled: true },
  { id: 'rear', position: 'Rear', enabled: true },
  { id: 'ambient', position: 'Ambient', enabled: true },
]
