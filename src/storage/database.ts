import BetterSqlite3 from 'better-sqlite3'
import { z } from 'zod'
import { StillpointError, StorageError } from '../errors.js'
import type { Turn, RedactionRecord, TurnOutput, LearningSnapshot } from '../turns/types.js'
import {
  parseTurnState,
  parseTurnSource,
  parseCaptureContext,
  parseTranscriptionProvider,
  parseReflectProvider,
  parseContemplationMode
} from '../turns/state.js'
import type { PatternKind, PatternStat } from '../learning/types.js'
import { parsePatternKind } from '../learning/types.js'
import type { Capsule, CapsulePreferences, CapsuleTendency } from '../capsule/types.js'

interface TurnRow {
  id: string
  source: string
  recorded_at: string
  ended_at: string | null
  duration_seconds: number | null
  capture_context: string
  title: string
  audio_path: string | null
  audio_bytes: number
  transcript_raw: string | null
  transcript_redacted_active: string
  redaction_version: number
  redaction_timestamp: string | null
  redaction_input_hash: string | null
  state: string
  transcription_provider: string
  transcription_locale: string | null
  reflect_provider: string
  prompt_version: string | null
  toolchain_version: string | null
  capsule_snapshot_hash: string | null
  processing_started_at: string | null
  processing_finished_at: string | null
  learning_snapshot: string
  talk_last_response_id: string | null
  error_domain: string | null
  error_code: number | null
  error_user_facing_key: string | null
  error_debug_message: string | null
}

interface RedactionRow {
  id: string
  turn_id: string
  version: number
  timestamp: string
  input_hash: string
  text_redacted: string
}

interface OutputRow {
  turn_id: string
  mode: string
  text: string
  prompt_version: string
  provider: string
  updated_at: string
}

interface PatternRow {
  kind: string
  key: string
  score: number
  count: number
  first_seen_at: string
  last_seen_at: string
  half_life_days: number
}

interface CapsuleRow {
  version: number
  learning_enabled: number
  updated_at: string
  preferences: string
  learned_tendencies: string
  learning_reset_at: string | null
}

const learningSnapshotSchema = z.object({
  observedAt: z.string().optional(),
  observations: z.array(z.object({
    kind: z.string(),
    key: z.string(),
    weight: z.number()
  })).optional()
})

const preferencesSchema = z.object({
  outputStyle: z.string().optional(),
  optionsBeforeQuestions: z.boolean().optional(),
  noTherapyFraming: z.boolean().optional(),
  noPersona: z.boolean().optional(),
  pseudonym: z.string().optional(),
  extras: z.record(z.string()).default({})
})

const tendencySchema = z.object({
  id: z.string(),
  statement: z.string(),
  evidenceCount: z.number(),
  firstSeenAt: z.string(),
  lastSeenAt: z.string(),
  isOverridden: z.boolean(),
  sourceKind: z.string().optional(),
  sourceKey: z.string().optional()
})

function parseJSONColumn<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T {
  try {
    const parsed = schema.safeParse(JSON.parse(raw))
    return parsed.success ? parsed.data : fallback
  } catch {
    console.warn('[storage] Discarding unreadable JSON column')
    return fallback
  }
}

function toISO(date: Date | null): string | null {
  return date ? date.toISOString() : null
}

function fromISO(value: string | null): Date | null {
  return value === null ? null : new Date(value)
}

export class Database {
  private db: BetterSqlite3.Database

  constructor(dbPath: string) {
    try {
      this.db = new BetterSqlite3(dbPath)
      this.db.pragma('journal_mode = WAL')
      this.db.pragma('foreign_keys = ON')
      this.createTables()
    } catch (err) {
      throw new StorageError('open', err)
    }
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS turns (
        id TEXT PRIMARY KEY,
        source TEXT NOT NULL,
        recorded_at DATETIME NOT NULL,
        ended_at DATETIME,
        duration_seconds REAL,
        capture_context TEXT NOT NULL,
        title TEXT NOT NULL DEFAULT '',
        audio_path TEXT,
        audio_bytes INTEGER NOT NULL DEFAULT 0,
        transcript_raw TEXT,
        transcript_redacted_active TEXT NOT NULL DEFAULT '',
        redaction_version INTEGER NOT NULL DEFAULT 1,
        redaction_timestamp DATETIME,
        redaction_input_hash TEXT,
        state TEXT NOT NULL,
        transcription_provider TEXT NOT NULL DEFAULT 'unknown',
        transcription_locale TEXT,
        reflect_provider TEXT NOT NULL DEFAULT 'none',
        prompt_version TEXT,
        toolchain_version TEXT,
        capsule_snapshot_hash TEXT,
        processing_started_at DATETIME,
        processing_finished_at DATETIME,
        learning_snapshot JSON NOT NULL DEFAULT '{}',
        talk_last_response_id TEXT,
        error_domain TEXT,
        error_code INTEGER,
        error_user_facing_key TEXT,
        error_debug_message TEXT
      );

      CREATE TABLE IF NOT EXISTS redaction_records (
        id TEXT PRIMARY KEY,
        turn_id TEXT NOT NULL REFERENCES turns(id) ON DELETE CASCADE,
        version INTEGER NOT NULL,
        timestamp DATETIME NOT NULL,
        input_hash TEXT NOT NULL,
        text_redacted TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS turn_outputs (
        turn_id TEXT NOT NULL REFERENCES turns(id) ON DELETE CASCADE,
        mode TEXT NOT NULL,
        text TEXT NOT NULL,
        prompt_version TEXT NOT NULL,
        provider TEXT NOT NULL,
        updated_at DATETIME NOT NULL,
        PRIMARY KEY (turn_id, mode)
      );

      CREATE TABLE IF NOT EXISTS pattern_stats (
        kind TEXT NOT NULL,
        key TEXT NOT NULL,
        score REAL NOT NULL,
        count INTEGER NOT NULL,
        first_seen_at DATETIME NOT NULL,
        last_seen_at DATETIME NOT NULL,
        half_life_days REAL NOT NULL,
        PRIMARY KEY (kind, key)
      );

      CREATE TABLE IF NOT EXISTS capsule (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        version INTEGER NOT NULL,
        learning_enabled BOOLEAN NOT NULL,
        updated_at DATETIME NOT NULL,
        preferences JSON NOT NULL,
        learned_tendencies JSON NOT NULL,
        learning_reset_at DATETIME
      );

      CREATE INDEX IF NOT EXISTS idx_turns_recorded_at ON turns(recorded_at);
      CREATE INDEX IF NOT EXISTS idx_turns_state ON turns(state);
      CREATE INDEX IF NOT EXISTS idx_redaction_records_turn ON redaction_records(turn_id);
    `)
  }

  /** Wraps driver failures so callers see one error kind for persistence. */
  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn()
    } catch (err) {
      if (err instanceof StillpointError) throw err
      throw new StorageError(operation, err)
    }
  }

  transaction<T>(fn: () => T): T {
    return this.run('transaction', () => this.db.transaction(fn)())
  }

  listTables(): string[] {
    const rows = this.db.prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'"
    ).all()
    return rows.map(r => r.name)
  }

  // --- Turns ---

  insertTurn(turn: Turn): void {
    this.run('insertTurn', () => {
      this.db.prepare(`
        INSERT INTO turns (
          id, source, recorded_at, ended_at, duration_seconds, capture_context, title,
          audio_path, audio_bytes, transcript_raw, transcript_redacted_active,
          redaction_version, redaction_timestamp, redaction_input_hash, state,
          transcription_provider, transcription_locale, reflect_provider, prompt_version,
          toolchain_version, capsule_snapshot_hash, processing_started_at, processing_finished_at,
          learning_snapshot, talk_last_response_id,
          error_domain, error_code, error_user_facing_key, error_debug_message
        ) VALUES (
          @id, @source, @recorded_at, @ended_at, @duration_seconds, @capture_context, @title,
          @audio_path, @audio_bytes, @transcript_raw, @transcript_redacted_active,
          @redaction_version, @redaction_timestamp, @redaction_input_hash, @state,
          @transcription_provider, @transcription_locale, @reflect_provider, @prompt_version,
          @toolchain_version, @capsule_snapshot_hash, @processing_started_at, @processing_finished_at,
          @learning_snapshot, @talk_last_response_id,
          @error_domain, @error_code, @error_user_facing_key, @error_debug_message
        )
      `).run(this.serializeTurn(turn))
    })
  }

  updateTurn(turn: Turn): void {
    this.run('updateTurn', () => {
      this.db.prepare(`
        UPDATE turns SET
          source = @source,
          recorded_at = @recorded_at,
          ended_at = @ended_at,
          duration_seconds = @duration_seconds,
          capture_context = @capture_context,
          title = @title,
          audio_path = @audio_path,
          audio_bytes = @audio_bytes,
          transcript_raw = @transcript_raw,
          transcript_redacted_active = @transcript_redacted_active,
          redaction_version = @redaction_version,
          redaction_timestamp = @redaction_timestamp,
          redaction_input_hash = @redaction_input_hash,
          state = @state,
          transcription_provider = @transcription_provider,
          transcription_locale = @transcription_locale,
          reflect_provider = @reflect_provider,
          prompt_version = @prompt_version,
          toolchain_version = @toolchain_version,
          capsule_snapshot_hash = @capsule_snapshot_hash,
          processing_started_at = @processing_started_at,
          processing_finished_at = @processing_finished_at,
          learning_snapshot = @learning_snapshot,
          talk_last_response_id = @talk_last_response_id,
          error_domain = @error_domain,
          error_code = @error_code,
          error_user_facing_key = @error_user_facing_key,
          error_debug_message = @error_debug_message
        WHERE id = @id
      `).run(this.serializeTurn(turn))
    })
  }

  getTurn(id: string): Turn | null {
    return this.run('getTurn', () => {
      const row = this.db.prepare<[string], TurnRow>('SELECT * FROM turns WHERE id = ?').get(id)
      return row ? this.deserializeTurn(row) : null
    })
  }

  listTurns(filter: { states?: string[]; limit?: number } = {}): Turn[] {
    return this.run('listTurns', () => {
      let sql = 'SELECT * FROM turns'
      const params: (string | number)[] = []

      if (filter.states && filter.states.length > 0) {
        sql += ` WHERE state IN (${filter.states.map(() => '?').join(', ')})`
        params.push(...filter.states)
      }

      sql += ' ORDER BY recorded_at DESC, rowid DESC'

      if (filter.limit !== undefined) {
        sql += ' LIMIT ?'
        params.push(filter.limit)
      }

      const rows = this.db.prepare<(string | number)[], TurnRow>(sql).all(...params)
      return rows.map(row => this.deserializeTurn(row))
    })
  }

  deleteTurn(id: string): boolean {
    return this.run('deleteTurn', () => {
      const result = this.db.prepare('DELETE FROM turns WHERE id = ?').run(id)
      return result.changes > 0
    })
  }

  private serializeTurn(turn: Turn): Record<string, string | number | null> {
    return {
      id: turn.id,
      source: turn.source,
      recorded_at: turn.recordedAt.toISOString(),
      ended_at: toISO(turn.endedAt),
      duration_seconds: turn.durationSeconds,
      capture_context: turn.captureContext,
      title: turn.title,
      audio_path: turn.audioPath,
      audio_bytes: turn.audioBytes,
      transcript_raw: turn.transcriptRaw,
      transcript_redacted_active: turn.transcriptRedactedActive,
      redaction_version: turn.redactionVersion,
      redaction_timestamp: toISO(turn.redactionTimestamp),
      redaction_input_hash: turn.redactionInputHash,
      state: turn.state,
      transcription_provider: turn.transcriptionProvider,
      transcription_locale: turn.transcriptionLocale,
      reflect_provider: turn.reflectProvider,
      prompt_version: turn.promptVersion,
      toolchain_version: turn.toolchainVersion,
      capsule_snapshot_hash: turn.capsuleSnapshotHash,
      processing_started_at: toISO(turn.processingStartedAt),
      processing_finished_at: toISO(turn.processingFinishedAt),
      learning_snapshot: JSON.stringify(turn.learningSnapshot),
      talk_last_response_id: turn.talkLastResponseId,
      error_domain: turn.error?.domain ?? null,
      error_code: turn.error?.code ?? null,
      error_user_facing_key: turn.error?.userFacingKey ?? null,
      error_debug_message: turn.error?.debugMessage ?? null
    }
  }

  private deserializeTurn(row: TurnRow): Turn {
    const hasError = row.error_domain !== null &&
      row.error_code !== null &&
      row.error_user_facing_key !== null &&
      row.error_debug_message !== null

    const learningSnapshot: LearningSnapshot = parseJSONColumn(row.learning_snapshot, learningSnapshotSchema, {})

    return {
      id: row.id,
      source: parseTurnSource(row.source),
      recordedAt: new Date(row.recorded_at),
      endedAt: fromISO(row.ended_at),
      durationSeconds: row.duration_seconds,
      captureContext: parseCaptureContext(row.capture_context),
      title: row.title,
      audioPath: row.audio_path,
      audioBytes: row.audio_bytes,
      transcriptRaw: row.transcript_raw,
      transcriptRedactedActive: row.transcript_redacted_active,
      redactionVersion: row.redaction_version,
      redactionTimestamp: fromISO(row.redaction_timestamp),
      redactionInputHash: row.redaction_input_hash,
      state: parseTurnState(row.state),
      transcriptionProvider: parseTranscriptionProvider(row.transcription_provider),
      transcriptionLocale: row.transcription_locale,
      reflectProvider: parseReflectProvider(row.reflect_provider),
      promptVersion: row.prompt_version,
      toolchainVersion: row.toolchain_version,
      capsuleSnapshotHash: row.capsule_snapshot_hash,
      processingStartedAt: fromISO(row.processing_started_at),
      processingFinishedAt: fromISO(row.processing_finished_at),
      learningSnapshot,
      talkLastResponseId: row.talk_last_response_id,
      error: hasError
        ? {
            domain: row.error_domain ?? '',
            code: row.error_code ?? 0,
            userFacingKey: row.error_user_facing_key ?? '',
            debugMessage: row.error_debug_message ?? ''
          }
        : null
    }
  }

  // --- Redaction records (append-only) ---

  insertRedactionRecord(record: RedactionRecord): void {
    this.run('insertRedactionRecord', () => {
      this.db.prepare(`
        INSERT INTO redaction_records (id, turn_id, version, timestamp, input_hash, text_redacted)
        VALUES (?, ?, ?, ?, ?, ?)
      `).run(
        record.id,
        record.turnId,
        record.version,
        record.timestamp.toISOString(),
        record.inputHash,
        record.textRedacted
      )
    })
  }

  getRedactionRecords(turnId: string): RedactionRecord[] {
    return this.run('getRedactionRecords', () => {
      const rows = this.db.prepare<[string], RedactionRow>(
        'SELECT * FROM redaction_records WHERE turn_id = ? ORDER BY rowid ASC'
      ).all(turnId)
      return rows.map(row => ({
        id: row.id,
        turnId: row.turn_id,
        version: row.version,
        timestamp: new Date(row.timestamp),
        inputHash: row.input_hash,
        textRedacted: row.text_redacted
      }))
    })
  }

  // --- Turn outputs ---

  upsertTurnOutput(output: TurnOutput): void {
    this.run('upsertTurnOutput', () => {
      this.db.prepare(`
        INSERT INTO turn_outputs (turn_id, mode, text, prompt_version, provider, updated_at)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT(turn_id, mode) DO UPDATE SET
          text = excluded.text,
          prompt_version = excluded.prompt_version,
          provider = excluded.provider,
          updated_at = excluded.updated_at
      `).run(
        output.turnId,
        output.mode,
        output.text,
        output.promptVersion,
        output.provider,
        output.updatedAt.toISOString()
      )
    })
  }

  getTurnOutputs(turnId: string): TurnOutput[] {
    return this.run('getTurnOutputs', () => {
      const rows = this.db.prepare<[string], OutputRow>(
        'SELECT * FROM turn_outputs WHERE turn_id = ? ORDER BY mode ASC'
      ).all(turnId)

      const outputs: TurnOutput[] = []
      for (const row of rows) {
        const mode = parseContemplationMode(row.mode)
        if (!mode) continue
        outputs.push({
          turnId: row.turn_id,
          mode,
          text: row.text,
          promptVersion: row.prompt_version,
          provider: parseReflectProvider(row.provider),
          updatedAt: new Date(row.updated_at)
        })
      }
      return outputs
    })
  }

  // --- Pattern stats ---

  getPatternStat(kind: PatternKind, key: string): PatternStat | null {
    return this.run('getPatternStat', () => {
      const row = this.db.prepare<[string, string], PatternRow>(
        'SELECT * FROM pattern_stats WHERE kind = ? AND key = ?'
      ).get(kind, key)
      return row ? this.deserializePattern(row) : null
    })
  }

  getPatternStats(kind?: PatternKind): PatternStat[] {
    return this.run('getPatternStats', () => {
      const rows = kind
        ? this.db.prepare<[string], PatternRow>('SELECT * FROM pattern_stats WHERE kind = ?').all(kind)
        : this.db.prepare<[], PatternRow>('SELECT * FROM pattern_stats').all()

      const stats: PatternStat[] = []
      for (const row of rows) {
        const stat = this.deserializePattern(row)
        if (stat) stats.push(stat)
      }
      return stats
    })
  }

  upsertPatternStat(stat: PatternStat): void {
    this.run('upsertPatternStat', () => {
      this.db.prepare(`
        INSERT INTO pattern_stats (kind, key, score, count, first_seen_at, last_seen_at, half_life_days)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(kind, key) DO UPDATE SET
          score = excluded.score,
          count = excluded.count,
          last_seen_at = excluded.last_seen_at,
          half_life_days = excluded.half_life_days
      `).run(
        stat.kind,
        stat.key,
        stat.score,
        stat.count,
        stat.firstSeenAt.toISOString(),
        stat.lastSeenAt.toISOString(),
        stat.halfLifeDays
      )
    })
  }

  clearPatternStats(): number {
    return this.run('clearPatternStats', () => {
      return this.db.prepare('DELETE FROM pattern_stats').run().changes
    })
  }

  private deserializePattern(row: PatternRow): PatternStat | null {
    const kind = parsePatternKind(row.kind)
    if (!kind) return null
    return {
      kind,
      key: row.key,
      score: row.score,
      count: row.count,
      firstSeenAt: new Date(row.first_seen_at),
      lastSeenAt: new Date(row.last_seen_at),
      halfLifeDays: row.half_life_days
    }
  }

  // --- Capsule (singleton row) ---

  saveCapsule(capsule: Capsule): void {
    this.run('saveCapsule', () => {
      this.db.prepare(`
        INSERT INTO capsule (id, version, learning_enabled, updated_at, preferences, learned_tendencies, learning_reset_at)
        VALUES (1, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          version = excluded.version,
          learning_enabled = excluded.learning_enabled,
          updated_at = excluded.updated_at,
          preferences = excluded.preferences,
          learned_tendencies = excluded.learned_tendencies,
          learning_reset_at = excluded.learning_reset_at
      `).run(
        capsule.version,
        capsule.learningEnabled ? 1 : 0,
        capsule.updatedAt.toISOString(),
        JSON.stringify(capsule.preferences),
        JSON.stringify(capsule.learnedTendencies.map(t => ({
          ...t,
          firstSeenAt: t.firstSeenAt.toISOString(),
          lastSeenAt: t.lastSeenAt.toISOString()
        }))),
        toISO(capsule.learningResetAt)
      )
    })
  }

  loadCapsule(): Capsule | null {
    return this.run('loadCapsule', () => {
      const row = this.db.prepare<[], CapsuleRow>('SELECT * FROM capsule WHERE id = 1').get()
      if (!row) return null

      const preferences: CapsulePreferences = parseJSONColumn(row.preferences, preferencesSchema, { extras: {} })
      const rawTendencies = parseJSONColumn(row.learned_tendencies, z.array(tendencySchema), [])

      const learnedTendencies: CapsuleTendency[] = rawTendencies.map(t => ({
        id: t.id,
        statement: t.statement,
        evidenceCount: t.evidenceCount,
        firstSeenAt: new Date(t.firstSeenAt),
        lastSeenAt: new Date(t.lastSeenAt),
        isOverridden: t.isOverridden,
        sourceKind: parsePatternKind(t.sourceKind) ?? undefined,
        sourceKey: t.sourceKey
      }))

      return {
        version: row.version,
        learningEnabled: row.learning_enabled === 1,
        updatedAt: new Date(row.updated_at),
        preferences,
        learnedTendencies,
        learningResetAt: fromISO(row.learning_reset_at)
      }
    })
  }

  // --- Lifecycle ---

  close(): void {
    this.db.close()
  }
}
