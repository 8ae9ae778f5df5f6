/**
 * Database module: PostgreSQL connection pool and auto-migration.
 */

import pg from 'pg'

const { Pool } = pg

/** The slice of pg.Pool this module needs; lets tests pass a stand-in. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>
}

export function createPool(connectionString: string): pg.Pool {
  return new Pool({ connectionString })
}

/**
 * Auto-create tables on startup if they don't exist.
 */
export async function initDB(db: Queryable): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS register_checkpoints (
      id             TEXT PRIMARY KEY,
      organ          TEXT NOT NULL,
      keyboard       TEXT NOT NULL,
      register_label TEXT NOT NULL,
      tremulant      BOOLEAN NOT NULL DEFAULT FALSE,
      start_note     INTEGER NOT NULL,
      end_note       INTEGER NOT NULL,
      settings       JSONB NOT NULL,
      microphones    JSONB NOT NULL,
      completed_at   TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE INDEX IF NOT EXISTS idx_checkpoints_completed ON register_checkpoints(completed_at DESC);
  `)
}

export interface CheckpointRow {
  id: string
  organ: string
  keyboard: string
  registerLabel: string
  tremulant: boolean
  startNote: number
  endNote: number
  settings: unknown
  microphones: unknown
  completedAt: string
}

export async function insertCheckpoint(db: Queryable, row: Omit<CheckpointRow, 'completedAt'>): Promise<void> {
  await db.query(
    `INSERT INTO register_checkpoints
       (id, organ, keyboard, register_label, tremulant, start_note, end_note, settings, microphones)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
    [
      row.id, row.organ, row.keyboard, row.registerLabel, row.tremulant,
      row.startNote, row.endNote, JSON.stringify(row.settings), JSON.stringify(row.microphones),
    ]
  )
}

export async function loadLatestCheckpoint(db: Queryable): Promise<CheckpointRow | null> {
  const res = await db.query(
    'SELECT * FROM register_checkpoints ORDER BY completed_at DESC LIMIT 1'
  )
  const r = res.rows[0]
  if (!r) return null

  return {
    id: String(r.id),
    organ: String(r.organ),
    keyboard: String(r.keyboard),
    registerLabel: String(r.register_label),
    tremulant: r.tremulant === true,
    startNote: Number(r.start_note),
    endNote: Number(r.end_note),
    settings: r.settings,
    microphones: r.microphones,
    completedAt: r.completed_at instanceof Date ? r.completed_at.toISOString() : String(r.completed_at),
  }
}
