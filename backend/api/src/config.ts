/**
 * Runtime configuration from the environment (.env is loaded by the entry
 * point through dotenv).
 */

import os from 'node:os'
import path from 'node:path'

export interface AppConfig {
  port: number
  host: string
  corsOrigin: string
  outputDir: string
  databaseUrl: string | undefined
  logLevel: string
  ffmpegPath: string
  captureInputFormat: string
  captureDevice: string
  clientBufferSize: number
  maxSocketBufferBytes: number
}

function defaultInputFormat(platform: NodeJS.Platform): string {
  if (platform === 'darwin') return 'avfoundation'
  if (platform === 'win32') return 'dshow'
  return 'alsa'
}

function defaultDevice(inputFormat: string): string {
  if (inputFormat === 'avfoundation') return ':0'
  if (inputFormat === 'dshow') return 'audio=Microphone'
  return 'default'
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const captureInputFormat = env.CAPTURE_INPUT_FORMAT || defaultInputFormat(process.platform)
  return {
    port: parseInt(env.PORT ?? '5555'),
    host: env.HOST ?? '0.0.0.0',
    corsOrigin: env.CORS_ORIGIN ?? 'http://localhost:5173',
    outputDir: env.OUTPUT_DIR || path.join(os.homedir(), 'OrganSamples'),
    databaseUrl: env.DATABASE_URL || undefined,
    logLevel: env.LOG_LEVEL ?? 'info',
    ffmpegPath: env.FFMPEG_PATH ?? 'ffmpeg',
    captureInputFormat,
    captureDevice: env.CAPTURE_DEVICE || defaultDevice(captureInputFormat),
    clientBufferSize: parseInt(env.CLIENT_BUFFER_SIZE ?? '16'),
    maxSocketBufferBytes: parseInt(env.MAX_SOCKET_BUFFER_BYTES ?? String(1024 * 1024)),
  }
}
