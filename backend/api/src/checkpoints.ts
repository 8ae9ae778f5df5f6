/**
 * Register checkpoints: a record of every finished register, and the
 * settings the next process start picks up again.
 */

import { randomUUID } from 'node:crypto'
import type { MicrophoneChannel, RecordingSettings, SessionSnapshot } from './types.js'
import { parseMicrophones, parseSettings } from './core/commands.js'
import { mergeSettings, DEFAULT_SETTINGS } from './core/settings.js'
import { insertCheckpoint, loadLatestCheckpoint, type Queryable } from './db.js'

export interface RegisterCheckpoint {
  organ: string
  keyboard: string
  register: string
  tremulant: boolean
  settings: RecordingSettings
  microphones: MicrophoneChannel[]
  completedAt: string
}

export interface CheckpointStore {
  save(snapshot: SessionSnapshot): Promise<void>
  latest(): Promise<RegisterCheckpoint | null>
}

function fromSnapshot(snapshot: SessionSnapshot): RegisterCheckpoint | null {
  if (!snapshot.organ || !snapshot.selection) return null
  return {
    organ: snapshot.organ.name,
    keyboard: snapshot.selection.keyboard,
    register: snapshot.selection.register.label,
    tremulant: snapshot.selection.register.tremulant,
    settings: snapshot.settings,
    microphones: snapshot.microphones,
    completedAt: new Date().toISOString(),
  }
}

// ─── In-memory (no DATABASE_URL) ─────────────────────────────────────────────

export class MemoryCheckpointStore implements CheckpointStore {
  readonly saved: RegisterCheckpoint[] = []

  async save(snapshot: SessionSnapshot): Promise<void> {
    const checkpoint = fromSnapshot(snapshot)
    if (checkpoint) this.saved.push(checkpoint)
  }

  async latest(): Promise<RegisterCheckpoint | null> {
    return this.saved[this.saved.length - 1] ?? null
  }
}

// ─── PostgreSQL ──────────────────────────────────────────────────────────────

export class PgCheckpointStore implements CheckpointStore {
  constructor(private readonly db: Queryable) {}

  async save(snapshot: SessionSnapshot): Promise<void> {
    const checkpoint = fromSnapshot(snapshot)
    if (!checkpoint) return
    await insertCheckpoint(this.db, {
      id: randomUUID(),
      organ: checkpoint.organ,
      keyboard: checkpoint.keyboard,
      registerLabel: checkpoint.register,
      tremulant: checkpoint.tremulant,
      startNote: checkpoint.settings.startNote,
      endNote: checkpoint.settings.endNote,
      settings: checkpoint.settings,
      microphones: checkpoint.microphones,
    })
  }

  async latest(): Promise<RegisterCheckpoint | null> {
    const row = await loadLatestCheckpoint(this.db)
    if (!row) return null

    // Rows written by an older build may miss fields; fall back to defaults.
    const patch = parseSettings(row.settings)
    const settings = mergeSettings(DEFAULT_SETTINGS, patch.ok ? patch.value : {})
    const microphones = parseMicrophones(row.microphones)

    return {
      organ: row.organ,
      keyboard: row.keyboard,
      register: row.registerLabel,
      tremulant: row.tremulant,
      settings: settings.ok ? settings.value : DEFAULT_SETTINGS,
      microphones: microphones.ok ? microphones.value : [],
      completedAt: row.completedAt,
    }
  }
}
