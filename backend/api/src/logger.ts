import pino, { type Logger } from 'pino'

export type { Logger }

/** Root logger; Fastify gets it as its loggerInstance, the core gets children. */
export function createLogger(level: string): Logger {
  return pino({
    level,
    base: { service: 'organ-sampler-api' },
  })
}
