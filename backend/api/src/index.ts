/**
 * Organ sampler API: server entry point.
 */

import 'dotenv/config'
import { buildApp } from './app.js'
import { FfmpegCaptureService } from './capture/ffmpegCapture.js'
import { MemoryCheckpointStore, PgCheckpointStore, type CheckpointStore } from './checkpoints.js'
import { loadConfig } from './config.js'
import { SessionState } from './core/sessionState.js'
import { SyncHub } from './core/syncHub.js'
import { createPool, initDB } from './db.js'
import { createLogger } from './logger.js'

const config = loadConfig()
const logger = createLogger(config.logLevel)

// ─── Persistence ─────────────────────────────────────────────────────────────

const pool = config.databaseUrl ? createPool(config.databaseUrl) : null
const checkpoints: CheckpointStore = pool ? new PgCheckpointStore(pool) : new MemoryCheckpointStore()

// ─── Session ─────────────────────────────────────────────────────────────────

const capture = new FfmpegCaptureService({
  outputDir: config.outputDir,
  ffmpegPath: config.ffmpegPath,
  inputFormat: config.captureInputFormat,
  defaultDevice: config.captureDevice,
  logger: logger.child({ module: 'capture' }),
})

let shuttingDown = false

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return
  shuttingDown = true
  app.log.info({ signal }, 'shutting down')
  try {
    await app.close()
    await pool?.end()
    process.exit(0)
  } catch (err) {
    app.log.error({ err }, 'shutdown failed')
    process.exit(1)
  }
}

try {
  if (pool) {
    await initDB(pool)
    logger.info('Database initialized')
  }
} catch (err) {
  logger.error({ err }, 'Database initialization failed')
  process.exit(1)
}

const last = await checkpoints.latest().catch((err: unknown) => {
  logger.warn({ err }, 'could not load last checkpoint, using defaults')
  return null
})

const state = new SessionState({
  settings: last?.settings,
  microphones: last?.microphones,
})

const hub = new SyncHub({
  state,
  capture,
  checkpoints,
  logger: logger.child({ module: 'hub' }),
  clientBufferSize: config.clientBufferSize,
})

const app = await buildApp({
  hub,
  capture,
  logger,
  config,
  onShutdown: () => void shutdown('api'),
})

process.on('SIGINT', () => void shutdown('SIGINT'))
process.on('SIGTERM', () => void shutdown('SIGTERM'))

// ─── Start ───────────────────────────────────────────────────────────────────

try {
  await app.listen({ port: config.port, host: config.host })
  app.log.info(`Organ sampler API running on http://localhost:${config.port}`)
} catch (err) {
  app.log.error(err)
  process.exit(1)
}
