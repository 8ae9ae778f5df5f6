/**
 * ffmpeg capture backend: one ffmpeg process per microphone channel.
 *
 * Each process records straight to MP3 in a hidden temp file next to its
 * target. `stop` asks ffmpeg to finish ("q" on stdin) and renames the temp
 * file into place; `cancel` kills the processes and deletes the temp files.
 */

import { spawn, type SpawnOptions } from 'node:child_process'
import { randomUUID } from 'node:crypto'
import path from 'node:path'
import type { Logger } from 'pino'
import type { MicrophoneChannel, RecordingSettings } from '../types.js'
import { DeviceUnavailableError, InvalidSettingsError } from '../core/errors.js'
import { mergeSettings } from '../core/settings.js'
import { commitFile, discardFile, ensureParentDir, tempPathFor } from './atomicFile.js'
import type { AudioCaptureService, CaptureHandle, ChannelOutcome, InputDevice } from './types.js'

const OPEN_GRACE_MS = 400     // a device that fails to open makes ffmpeg exit well within this
const STOP_TIMEOUT_MS = 10_000

export interface FfmpegCaptureOptions {
  outputDir: string
  ffmpegPath: string
  inputFormat: string          // alsa, pulse, avfoundation, dshow
  defaultDevice: string
  logger: Logger
  spawnProcess?: SpawnProcess
}

/** The slice of a child process the service drives. */
export interface CaptureProcess {
  readonly exitCode: number | null
  readonly stdin: { end(chunk: string): unknown } | null
  readonly stdout: { on(event: 'data', listener: (chunk: Buffer) => void): unknown } | null
  readonly stderr: { on(event: 'data', listener: (chunk: Buffer) => void): unknown } | null
  kill(signal: NodeJS.Signals): boolean
  on(event: 'error', listener: (err: Error) => void): unknown
  once(event: 'exit', listener: (code: number | null) => void): unknown
}

export type SpawnProcess = (command: string, args: readonly string[], options: SpawnOptions) => CaptureProcess

interface ChannelProcess {
  channelId: string
  child: CaptureProcess
  tempPath: string
  finalPath: string
  exited: Promise<number | null>
  stderr: string
}

interface RunningCapture {
  handle: CaptureHandle
  processes: ChannelProcess[]
  cancelled: boolean
}

// ─── Argument building ───────────────────────────────────────────────────────

export function buildCaptureArgs(
  inputFormat: string,
  device: string,
  settings: RecordingSettings,
  outputPath: string,
): string[] {
  return [
    '-hide_banner', '-loglevel', 'error', '-nostats', '-y',
    '-f', inputFormat,
    '-c:a', settings.bitDepth === 24 ? 'pcm_s24le' : 'pcm_s16le',
    '-ar', String(settings.sampleRate),
    '-ac', settings.channels === 'stereo' ? '2' : '1',
    '-i', device,
    '-c:a', 'libmp3lame',
    '-b:a', `${settings.mp3Bitrate}k`,
    '-f', 'mp3',
    outputPath,
  ]
}

/** Parse `ffmpeg -sources <format>` output. */
export function parseSources(output: string): InputDevice[] {
  const devices: InputDevice[] = []
  for (const line of output.split('\n')) {
    const match = line.match(/^\s*(\*)?\s*(\S+)\s+\[(.+)\]\s*$/)
    if (!match) continue
    devices.push({ id: match[2], name: match[3], isDefault: match[1] === '*' })
  }
  return devices
}

function waitForExit(child: CaptureProcess): Promise<number | null> {
  return new Promise((resolve) => {
    if (child.exitCode !== null) return resolve(child.exitCode)
    child.on('error', () => resolve(null))
    child.once('exit', (code) => resolve(code))
  })
}

function exitWithin(exited: Promise<number | null>, ms: number): Promise<number | null | 'timeout'> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), ms)
  })
  return Promise.race([exited, timeout]).finally(() => clearTimeout(timer))
}

// ─── Service ─────────────────────────────────────────────────────────────────

export class FfmpegCaptureService implements AudioCaptureService {
  private readonly running = new Map<string, RunningCapture>()
  private readonly spawnProcess: SpawnProcess
  private readonly log: Logger

  constructor(private readonly options: FfmpegCaptureOptions) {
    this.spawnProcess = options.spawnProcess ?? spawn
    this.log = options.logger
  }

  async begin(
    channels: MicrophoneChannel[],
    settings: RecordingSettings,
    targets: Record<string, string>,
  ): Promise<CaptureHandle> {
    const checked = mergeSettings(settings, {})
    if (!checked.ok) throw new InvalidSettingsError(checked.error.message, channels.map((c) => c.id))

    const handle: CaptureHandle = { id: randomUUID() }
    const capture: RunningCapture = { handle, processes: [], cancelled: false }

    try {
      for (const [index, channel] of channels.entries()) {
        const finalPath = this.resolveTarget(channel.id, targets[channel.id])
        const tempPath = tempPathFor(finalPath, `${handle.id}.${index}`)
        await ensureParentDir(finalPath)
        capture.processes.push(this.spawnChannel(channel, settings, tempPath, finalPath))
      }
    } catch (err) {
      await this.teardown(capture)
      throw err
    }

    // A device that cannot open makes ffmpeg exit almost immediately.
    const early = await Promise.all(capture.processes.map((p) => exitWithin(p.exited, OPEN_GRACE_MS)))
    const failed = capture.processes.filter((_, i) => early[i] !== 'timeout')
    if (failed.length > 0) {
      await this.teardown(capture)
      const detail = failed.map((p) => `${p.channelId}: ${p.stderr.trim() || 'exited'}`).join('; ')
      throw new DeviceUnavailableError(`could not open input (${detail})`, failed.map((p) => p.channelId))
    }

    this.running.set(handle.id, capture)
    this.log.debug({ capture: handle.id, channels: channels.length }, 'ffmpeg capture started')
    return handle
  }

  async stop(handle: CaptureHandle): Promise<Map<string, ChannelOutcome>> {
    const capture = this.running.get(handle.id)
    const outcomes = new Map<string, ChannelOutcome>()
    if (!capture) return outcomes

    for (const p of capture.processes) p.child.stdin?.end('q')

    await Promise.all(capture.processes.map(async (p) => {
      const exit = await exitWithin(p.exited, STOP_TIMEOUT_MS)
      if (exit === 'timeout') p.child.kill('SIGKILL')

      if (capture.cancelled) return
      if (exit !== 0) {
        await discardFile(p.tempPath)
        outcomes.set(p.channelId, {
          status: 'encodeFailed',
          path: p.finalPath,
          message: exit === 'timeout' ? 'ffmpeg did not finish in time' : p.stderr.trim() || `ffmpeg exited with ${exit}`,
        })
        return
      }
      try {
        await commitFile(p.tempPath, p.finalPath)
        // cancel arrived while the file was being moved
        if (capture.cancelled) {
          await discardFile(p.finalPath)
          return
        }
        outcomes.set(p.channelId, { status: 'written', path: p.finalPath })
      } catch (err) {
        await discardFile(p.tempPath)
        outcomes.set(p.channelId, { status: 'encodeFailed', path: p.finalPath, message: String(err) })
      }
    }))

    this.running.delete(handle.id)
    return outcomes
  }

  async cancel(handle: CaptureHandle): Promise<void> {
    const capture = this.running.get(handle.id)
    if (!capture) return
    this.running.delete(handle.id)
    await this.teardown(capture)
    this.log.debug({ capture: handle.id }, 'ffmpeg capture cancelled')
  }

  async listDevices(): Promise<InputDevice[]> {
    const child = this.spawnProcess(this.options.ffmpegPath, ['-hide_banner', '-sources', this.options.inputFormat], {})
    let output = ''
    child.stdout?.on('data', (chunk: Buffer) => { output += chunk.toString() })
    const code = await waitForExit(child)
    if (code === null) {
      this.log.warn({ ffmpeg: this.options.ffmpegPath }, 'ffmpeg not available, no devices listed')
      return []
    }
    return parseSources(output)
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private resolveTarget(channelId: string, target: string | undefined): string {
    if (!target) throw new InvalidSettingsError(`no target path for channel ${channelId}`, [channelId])
    const root = path.resolve(this.options.outputDir)
    const finalPath = path.resolve(root, target)
    if (!finalPath.startsWith(root + path.sep)) {
      throw new InvalidSettingsError(`target for channel ${channelId} is outside the output directory`, [channelId])
    }
    return finalPath
  }

  private spawnChannel(
    channel: MicrophoneChannel,
    settings: RecordingSettings,
    tempPath: string,
    finalPath: string,
  ): ChannelProcess {
    const device = channel.device ?? this.options.defaultDevice
    const args = buildCaptureArgs(this.options.inputFormat, device, settings, tempPath)
    const child = this.spawnProcess(this.options.ffmpegPath, args, { stdio: ['pipe', 'ignore', 'pipe'] })

    const proc: ChannelProcess = {
      channelId: channel.id,
      child,
      tempPath,
      finalPath,
      exited: waitForExit(child),
      stderr: '',
    }
    child.stderr?.on('data', (chunk: Buffer) => {
      proc.stderr = (proc.stderr + chunk.toString()).slice(-2000)
    })
    return proc
  }

  /** Kill every process of a capture and remove what it wrote. */
  private async teardown(capture: RunningCapture): Promise<void> {
    capture.cancelled = true
    for (const p of capture.processes) {
      if (p.child.exitCode === null) p.child.kill('SIGKILL')
    }
    await Promise.all(capture.processes.map(async (p) => {
      await p.exited
      await discardFile(p.tempPath)
    }))
  }
}
