import { Database } from '../storage/database.js'
import { ValidationError } from '../errors.js'
import { redact } from '../redaction/redactor.js'
import { RedactionDictionary } from '../redaction/dictionary.js'
import { PatternStore } from '../learning/patterns.js'
import { deriveObservations } from '../learning/learner.js'
import type { PatternObservation } from '../learning/types.js'
import { CapsuleManager } from '../capsule/capsule.js'
import { KeyedLock } from '../util/keyed-lock.js'
import { isBlank, truncate } from '../util/text.js'
import { TurnLifecycle } from './lifecycle.js'
import type { Turn, TurnError, CaptureContext, TranscriptionProvider, RedactionRecord } from './types.js'

const TITLE_WORDS = 7
const TITLE_MAX = 56

/** First few words of the redacted text, or null when there are none. */
export function autoTitle(text: string): string | null {
  const words = text.trim().split(/\s+/).filter(Boolean).slice(0, TITLE_WORDS)
  const title = truncate(words.join(' '), TITLE_MAX).trim()
  return title || null
}

export interface PipelineDeps {
  db: Database
  lifecycle: TurnLifecycle
  dictionary: RedactionDictionary
  patterns: PatternStore
  capsule: CapsuleManager
  lock: KeyedLock
}

export interface ImportOptions {
  recordedAt?: Date
  context?: CaptureContext
  now?: Date
}

export type ReRedactStatus = 'applied' | 'unchanged' | 'no_source'

export interface ReRedactOutcome {
  status: ReRedactStatus
  record: RedactionRecord | null
}

/**
 * Moves a Turn from transcript to `ready`: redaction, the append-only
 * redaction record, and one round of learning per Turn. Work for one Turn
 * runs under its lock.
 */
export class CapturePipeline {
  private db: Database
  private lifecycle: TurnLifecycle
  private dictionary: RedactionDictionary
  private patterns: PatternStore
  private capsule: CapsuleManager
  private lock: KeyedLock

  constructor(deps: PipelineDeps) {
    this.db = deps.db
    this.lifecycle = deps.lifecycle
    this.dictionary = deps.dictionary
    this.patterns = deps.patterns
    this.capsule = deps.capsule
    this.lock = deps.lock
  }

  async beginTranscription(id: string, provider: TranscriptionProvider, locale: string | null = null): Promise<Turn> {
    return this.lock.run(id, () => this.lifecycle.markTranscribing(id, provider, locale))
  }

  /**
   * An empty transcript fails the Turn rather than leaving it mid-pipeline.
   * Any other error marks the Turn failed and is rethrown.
   */
  async completeTranscript(id: string, rawTranscript: string, endedAt: Date = new Date()): Promise<Turn> {
    return this.lock.run(id, () => {
      if (isBlank(rawTranscript)) {
        return this.lifecycle.markFailed(id, 'No transcript captured', {
          domain: 'transcription',
          code: 2,
          userFacingKey: 'turn.error.no_transcript'
        })
      }

      this.lifecycle.markTranscribedRaw(id, rawTranscript)
      this.lifecycle.markRedacting(id)

      try {
        const result = redact(rawTranscript, this.dictionary.tokens)
        const timestamp = new Date()
        const version = this.dictionary.version

        this.db.transaction(() => {
          this.lifecycle.applyRedaction(id, result.redactedText, {
            version,
            inputHash: result.inputHash,
            timestamp
          })
          this.lifecycle.markReady(id, {
            endedAt,
            rawTranscript,
            redactedTranscript: result.redactedText,
            redactionVersion: version,
            redactionTimestamp: timestamp,
            autoTitle: autoTitle(result.redactedText)
          })
        })
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e)
        console.error(`[pipeline] Could not finish ${id}:`, e)
        try {
          this.lifecycle.markFailed(id, message, { code: 3, userFacingKey: 'turn.error.save_failed' })
        } catch (markError) {
          console.error(`[pipeline] Could not mark ${id} failed:`, markError)
        }
        throw e
      }

      this.learnUnlocked(id, endedAt)
      return this.lifecycle.require(id)
    })
  }

  /** Redacts before anything is stored; the raw text is never persisted. */
  async importText(rawText: string, options: ImportOptions = {}): Promise<Turn> {
    if (isBlank(rawText)) {
      throw new ValidationError('text', 'Imported text is empty')
    }

    const now = options.now ?? new Date()
    const result = redact(rawText, this.dictionary.tokens)
    const id = this.lifecycle.createTextImport(
      result.redactedText,
      options.recordedAt ?? now,
      options.context ?? 'unknown',
      { version: this.dictionary.version, inputHash: result.inputHash, timestamp: now }
    )

    return this.lock.run(id, () => {
      const title = autoTitle(result.redactedText)
      if (title) this.lifecycle.rename(id, title)
      this.learnUnlocked(id, now)
      return this.lifecycle.require(id)
    })
  }

  /**
   * Re-applies the current dictionary. Uses the raw transcript when one is
   * kept, otherwise the canonical text of an imported Turn. Skipped when the
   * dictionary version is unchanged and so is the input or the result, and
   * whenever the dictionary is older than the Turn's redaction version.
   */
  async reRedact(id: string): Promise<ReRedactOutcome> {
    return this.lock.run(id, (): ReRedactOutcome => {
      const turn = this.lifecycle.require(id)
      const source = turn.transcriptRaw ??
        (turn.source === 'importedText' ? turn.transcriptRedactedActive : null)
      if (source === null || isBlank(source)) {
        return { status: 'no_source', record: null }
      }

      const version = this.dictionary.version
      if (version < turn.redactionVersion) {
        console.warn(`[pipeline] Dictionary version ${version} is older than ${turn.redactionVersion} on ${id}, skipping`)
        return { status: 'unchanged', record: null }
      }

      const result = redact(source, this.dictionary.tokens)
      const sameInput = result.inputHash === turn.redactionInputHash ||
        result.redactedText === turn.transcriptRedactedActive
      if (sameInput && version === turn.redactionVersion) {
        return { status: 'unchanged', record: null }
      }

      const record = this.lifecycle.applyRedaction(id, result.redactedText, {
        version,
        inputHash: result.inputHash
      })
      console.log(`[pipeline] Re-redacted ${id} at version ${version}`)
      return { status: 'applied', record }
    })
  }

  async fail(id: string, debugMessage: string, error: Partial<Omit<TurnError, 'debugMessage'>> = {}): Promise<Turn> {
    return this.lock.run(id, () => this.lifecycle.markFailed(id, debugMessage, error))
  }

  /** Learns from a Turn's redacted text once. Returns what was observed. */
  async learn(id: string, now: Date = new Date()): Promise<PatternObservation[]> {
    return this.lock.run(id, () => this.learnUnlocked(id, now))
  }

  private learnUnlocked(id: string, now: Date): PatternObservation[] {
    const turn = this.lifecycle.require(id)
    if (turn.learningSnapshot.observedAt) return []
    if (!this.capsule.isLearningEnabled()) return []

    const observations = deriveObservations(turn.transcriptRedactedActive)
    this.db.transaction(() => {
      this.patterns.observeAll(observations, now)
      this.lifecycle.setLearningSnapshot(id, { observedAt: now.toISOString(), observations })
    })

    if (observations.length > 0) {
      this.capsule.syncLearnedTendencies(now)
      console.log(`[pipeline] Learned ${observations.length} observation(s) from ${id}`)
    }
    return observations
  }
}
