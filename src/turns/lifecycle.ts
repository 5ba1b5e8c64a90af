import { existsSync, unlinkSync } from 'node:fs'
import { nanoid } from 'nanoid'
import { Database } from '../storage/database.js'
import { NotFoundError, ValidationError } from '../errors.js'
import { UNTITLED } from './types.js'
import type {
  Turn,
  TurnError,
  TurnState,
  CaptureContext,
  TranscriptionProvider,
  ReflectProvider,
  RedactionRecord,
  TurnOutput,
  ContemplationMode,
  LearningSnapshot
} from './types.js'
import { TURN_STATES } from './types.js'
import { isTerminal } from './state.js'

export interface MarkReadyInput {
  endedAt?: Date
  /** Stored only when provided and raw transcripts are persisted. */
  rawTranscript?: string | null
  redactedTranscript: string
  redactionVersion: number
  redactionTimestamp?: Date
  /** Applied only while the current title is blank or the placeholder. */
  autoTitle?: string | null
}

export interface RedactionProvenance {
  version: number
  inputHash: string
  timestamp?: Date
}

export interface ReflectionInput {
  mode: ContemplationMode
  text: string
  promptVersion: string
  provider: ReflectProvider
  capsuleSnapshotHash?: string | null
  /** Continuation token for the next talk request. */
  responseId?: string | null
  startedAt?: Date
  finishedAt?: Date
}

export type AudioCleanup = 'none' | 'removed' | 'missing' | 'failed'

export interface DeleteOutcome {
  deleted: boolean
  audio: AudioCleanup
}

export interface LifecycleOptions {
  persistRawTranscript?: boolean
  /** Stamped on new Turns. */
  toolchainVersion?: string
}

const DEFAULT_ERROR: Omit<TurnError, 'debugMessage'> = {
  domain: 'pipeline',
  code: 1,
  userFacingKey: 'turn.error.processing_failed'
}

export function isUnsetTitle(title: string): boolean {
  const trimmed = title.trim()
  return trimmed.length === 0 || trimmed.toLowerCase() === UNTITLED.toLowerCase()
}

export function blankTurn(id: string, recordedAt: Date): Turn {
  return {
    id,
    source: 'captured',
    recordedAt,
    endedAt: null,
    durationSeconds: null,
    captureContext: 'unknown',
    title: '',
    audioPath: null,
    audioBytes: 0,
    transcriptRaw: null,
    transcriptRedactedActive: '',
    redactionVersion: 1,
    redactionTimestamp: null,
    redactionInputHash: null,
    state: 'queued',
    transcriptionProvider: 'unknown',
    transcriptionLocale: null,
    reflectProvider: 'none',
    promptVersion: null,
    toolchainVersion: null,
    capsuleSnapshotHash: null,
    processingStartedAt: null,
    processingFinishedAt: null,
    learningSnapshot: {},
    talkLastResponseId: null,
    error: null
  }
}

/**
 * Owns every write to a Turn. Each operation is a single read-modify-write
 * inside one transaction, so a process that stops between calls leaves the
 * Turn in its last written state.
 *
 * Transitions are not validated: callers order them.
 */
export class TurnLifecycle {
  private db: Database
  private persistRawTranscript: boolean
  private toolchainVersion: string | null

  constructor(db: Database, options: LifecycleOptions = {}) {
    this.db = db
    this.persistRawTranscript = options.persistRawTranscript ?? true
    this.toolchainVersion = options.toolchainVersion ?? null
  }

  // --- Creation ---

  createCapture(audioPath: string, recordedAt: Date = new Date(), context: CaptureContext = 'unknown'): string {
    if (!audioPath.trim()) {
      throw new ValidationError('audioPath', 'Capture needs an audio path')
    }

    const turn = blankTurn(nanoid(), recordedAt)
    turn.captureContext = context
    turn.audioPath = audioPath
    turn.toolchainVersion = this.toolchainVersion

    this.db.insertTurn(turn)
    console.log(`[lifecycle] Created capture ${turn.id}`)
    return turn.id
  }

  /**
   * Creates a Turn that is `ready` from the start. The text must already be
   * redacted; it becomes the canonical transcript and no raw text is kept.
   */
  createTextImport(
    redactedText: string,
    recordedAt: Date = new Date(),
    context: CaptureContext = 'unknown',
    provenance?: RedactionProvenance
  ): string {
    if (!redactedText.trim()) {
      throw new ValidationError('text', 'Imported text is empty')
    }

    const turn = blankTurn(nanoid(), recordedAt)
    turn.source = 'importedText'
    turn.captureContext = context
    turn.state = 'ready'
    turn.endedAt = recordedAt
    turn.durationSeconds = 0
    turn.transcriptRedactedActive = redactedText
    turn.toolchainVersion = this.toolchainVersion

    this.db.transaction(() => {
      if (provenance) {
        const timestamp = provenance.timestamp ?? new Date()
        turn.redactionVersion = Math.max(1, provenance.version)
        turn.redactionTimestamp = timestamp
        turn.redactionInputHash = provenance.inputHash
        this.db.insertTurn(turn)
        this.db.insertRedactionRecord({
          id: nanoid(),
          turnId: turn.id,
          version: turn.redactionVersion,
          timestamp,
          inputHash: provenance.inputHash,
          textRedacted: redactedText
        })
      } else {
        this.db.insertTurn(turn)
      }
    })

    console.log(`[lifecycle] Imported text as ${turn.id}`)
    return turn.id
  }

  // --- Capture states ---

  markRecording(id: string): Turn {
    return this.mutate(id, turn => {
      turn.state = 'recording'
    })
  }

  markCaptured(id: string, endedAt: Date = new Date(), audioBytes?: number): Turn {
    return this.mutate(id, turn => {
      if (audioBytes !== undefined) {
        if (!Number.isFinite(audioBytes) || audioBytes < 0) {
          throw new ValidationError('audioBytes', 'Audio size must be a non-negative number')
        }
        turn.audioBytes = Math.floor(audioBytes)
      }
      turn.endedAt = endedAt
      turn.durationSeconds = durationBetween(turn.recordedAt, endedAt)
      turn.state = 'captured'
    })
  }

  markTranscribing(id: string, provider: TranscriptionProvider, locale: string | null = null): Turn {
    return this.mutate(id, turn => {
      turn.transcriptionProvider = provider
      turn.transcriptionLocale = locale
      turn.processingStartedAt = turn.processingStartedAt ?? new Date()
      turn.state = 'transcribing'
    })
  }

  markTranscribedRaw(id: string, rawTranscript: string): Turn {
    return this.mutate(id, turn => {
      if (this.persistRawTranscript) turn.transcriptRaw = rawTranscript
      turn.state = 'transcribedRaw'
    })
  }

  markRedacting(id: string): Turn {
    return this.mutate(id, turn => {
      turn.state = 'redacting'
    })
  }

  // --- Terminal states ---

  markReady(id: string, input: MarkReadyInput): Turn {
    return this.mutate(id, turn => {
      const endedAt = input.endedAt ?? new Date()
      turn.endedAt = endedAt
      turn.durationSeconds = durationBetween(turn.recordedAt, endedAt)

      if (input.rawTranscript != null && this.persistRawTranscript) {
        turn.transcriptRaw = input.rawTranscript
      }
      turn.transcriptRedactedActive = input.redactedTranscript
      turn.redactionTimestamp = input.redactionTimestamp ?? new Date()
      turn.redactionVersion = Math.max(turn.redactionVersion, input.redactionVersion)

      const autoTitle = input.autoTitle?.trim()
      if (autoTitle && isUnsetTitle(turn.title)) {
        turn.title = autoTitle
      }

      turn.processingFinishedAt = new Date()
      turn.state = 'ready'
    })
  }

  markReadyPartial(id: string, redactedTranscript?: string): Turn {
    return this.mutate(id, turn => {
      if (redactedTranscript !== undefined) turn.transcriptRedactedActive = redactedTranscript
      turn.processingFinishedAt = new Date()
      turn.state = 'readyPartial'
    })
  }

  markInterrupted(id: string): Turn {
    return this.mutate(id, turn => {
      turn.processingFinishedAt = new Date()
      turn.state = 'interrupted'
    })
  }

  /** Transcripts already written are kept. */
  markFailed(id: string, debugMessage: string, error: Partial<Omit<TurnError, 'debugMessage'>> = {}): Turn {
    return this.mutate(id, turn => {
      turn.error = { ...DEFAULT_ERROR, ...error, debugMessage }
      turn.processingFinishedAt = new Date()
      turn.state = 'failed'
    })
  }

  // --- Edits ---

  rename(id: string, title: string): Turn {
    return this.mutate(id, turn => {
      turn.title = title.trim()
    })
  }

  /**
   * Appends a redaction record and makes its text canonical. The stored
   * version never goes down, even if an older dictionary is re-applied.
   */
  applyRedaction(id: string, textRedacted: string, provenance: RedactionProvenance): RedactionRecord {
    const timestamp = provenance.timestamp ?? new Date()
    const record: RedactionRecord = {
      id: nanoid(),
      turnId: id,
      version: provenance.version,
      timestamp,
      inputHash: provenance.inputHash,
      textRedacted
    }

    this.mutate(id, turn => {
      this.db.insertRedactionRecord(record)
      turn.transcriptRedactedActive = textRedacted
      turn.redactionVersion = Math.max(turn.redactionVersion, provenance.version)
      turn.redactionTimestamp = timestamp
      turn.redactionInputHash = provenance.inputHash
    })
    return record
  }

  recordReflection(id: string, input: ReflectionInput): TurnOutput {
    const output: TurnOutput = {
      turnId: id,
      mode: input.mode,
      text: input.text,
      promptVersion: input.promptVersion,
      provider: input.provider,
      updatedAt: input.finishedAt ?? new Date()
    }

    this.mutate(id, turn => {
      this.db.upsertTurnOutput(output)
      turn.reflectProvider = input.provider
      turn.promptVersion = input.promptVersion
      if (input.capsuleSnapshotHash !== undefined) turn.capsuleSnapshotHash = input.capsuleSnapshotHash
      if (input.mode === 'talkItThrough' && input.responseId) turn.talkLastResponseId = input.responseId
      if (input.startedAt) turn.processingStartedAt = input.startedAt
      turn.processingFinishedAt = output.updatedAt
    })
    return output
  }

  setLearningSnapshot(id: string, snapshot: LearningSnapshot): Turn {
    return this.mutate(id, turn => {
      turn.learningSnapshot = snapshot
    })
  }

  // --- Removal ---

  /**
   * Removes the audio file (best effort, logged) and then the record. An
   * unknown id is a no-op.
   */
  delete(id: string): DeleteOutcome {
    const turn = this.db.getTurn(id)
    if (!turn) return { deleted: false, audio: 'none' }

    const audio = removeAudio(turn.audioPath)
    const deleted = this.db.deleteTurn(id)
    console.log(`[lifecycle] Deleted ${id} (audio: ${audio})`)
    return { deleted, audio }
  }

  // --- Reads ---

  get(id: string): Turn | null {
    return this.db.getTurn(id)
  }

  require(id: string): Turn {
    const turn = this.db.getTurn(id)
    if (!turn) throw new NotFoundError('Turn', id)
    return turn
  }

  list(options: { states?: TurnState[]; limit?: number } = {}): Turn[] {
    return this.db.listTurns(options)
  }

  /** Turns left in a non-terminal state, oldest first, for callers that resume work. */
  listUnfinished(): Turn[] {
    const states = TURN_STATES.filter(s => !isTerminal(s))
    return this.db.listTurns({ states }).reverse()
  }

  redactionHistory(id: string): RedactionRecord[] {
    return this.db.getRedactionRecords(id)
  }

  outputs(id: string): TurnOutput[] {
    return this.db.getTurnOutputs(id)
  }

  private mutate(id: string, apply: (turn: Turn) => void): Turn {
    return this.db.transaction(() => {
      const turn = this.db.getTurn(id)
      if (!turn) throw new NotFoundError('Turn', id)

      apply(turn)

      if (turn.audioBytes > 0 && !turn.audioPath) {
        throw new ValidationError('audioBytes', 'Audio size recorded without an audio path')
      }
      if (turn.state !== 'failed') turn.error = null

      this.db.updateTurn(turn)
      return turn
    })
  }
}

function durationBetween(start: Date, end: Date): number {
  return Math.max(0, (end.getTime() - start.getTime()) / 1000)
}

function removeAudio(audioPath: string | null): AudioCleanup {
  if (!audioPath) return 'none'
  if (!existsSync(audioPath)) return 'missing'
  try {
    unlinkSync(audioPath)
    return 'removed'
  } catch (err) {
    console.warn(`[lifecycle] Could not remove audio ${audioPath}:`, err)
    return 'failed'
  }
}
