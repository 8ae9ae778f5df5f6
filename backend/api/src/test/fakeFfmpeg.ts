import { EventEmitter } from 'node:events'
import { appendFileSync, writeFileSync } from 'node:fs'
import type { CaptureProcess, SpawnProcess } from '../capture/ffmpegCapture.js'

/**
 * How a fake ffmpeg behaves:
 *   record      writes its output and exits 0 on "q"
 *   failEncode  writes part of its output and exits 1 on "q"
 *   noDevice    exits 1 right after starting, before writing anything
 *   holdEncode  writes its output on "q" and then never exits by itself
 */
export type FfmpegScript = 'record' | 'failEncode' | 'noDevice' | 'holdEncode'

export class FakeFfmpeg implements CaptureProcess {
  exitCode: number | null = null
  killed = false
  readonly stdout = new EventEmitter()
  readonly stderr = new EventEmitter()
  readonly stdin = {
    end: (chunk: string): void => {
      if (chunk === 'q') this.quit()
    },
  }

  private exited = false
  private readonly exitListeners: ((code: number | null) => void)[] = []

  constructor(readonly args: readonly string[], private readonly script: FfmpegScript) {
    if (script === 'noDevice') {
      setImmediate(() => {
        this.stderr.emit('data', Buffer.from('hw:9: No such device\n'))
        this.exit(1)
      })
      return
    }
    writeFileSync(this.outputPath, '')
  }

  get outputPath(): string {
    return this.args[this.args.length - 1]
  }

  kill(): boolean {
    this.killed = true
    this.exit(null)
    return true
  }

  on(): this {
    return this
  }

  once(_event: 'exit', listener: (code: number | null) => void): this {
    this.exitListeners.push(listener)
    return this
  }

  private quit(): void {
    if (this.exited) return
    appendFileSync(this.outputPath, 'mp3 frames')
    if (this.script === 'record') setImmediate(() => this.exit(0))
    if (this.script === 'failEncode') {
      setImmediate(() => {
        this.stderr.emit('data', Buffer.from('Error while encoding\n'))
        this.exit(1)
      })
    }
  }

  private exit(code: number | null): void {
    if (this.exited) return
    this.exited = true
    if (code !== null) this.exitCode = code
    for (const listener of this.exitListeners) listener(code)
  }
}

/** Hands out scripted processes in spawn order; unscripted spawns record normally. */
export class FakeFfmpegRunner {
  readonly processes: FakeFfmpeg[] = []

  constructor(private readonly scripts: FfmpegScript[] = []) {}

  readonly spawn: SpawnProcess = (_command, args) => {
    const proc = new FakeFfmpeg(args, this.scripts[this.processes.length] ?? 'record')
    this.processes.push(proc)
    return proc
  }
}
