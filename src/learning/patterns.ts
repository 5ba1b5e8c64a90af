import { Database } from '../storage/database.js'
import { ValidationError } from '../errors.js'
import type { PatternKind, PatternStat, ScoredPattern, PatternObservation } from './types.js'

const MS_PER_DAY = 24 * 60 * 60 * 1000
export const MAX_KEY_LENGTH = 64
export const DEFAULT_HALF_LIFE_DAYS = 14

export function daysBetween(from: Date, to: Date): number {
  return Math.max(0, (to.getTime() - from.getTime()) / MS_PER_DAY)
}

/** `score` halved every `halfLifeDays` since it was last seen. Pure; nothing is written back. */
export function decayedScore(stat: Pick<PatternStat, 'score' | 'lastSeenAt' | 'halfLifeDays'>, now: Date): number {
  const halfLife = Math.max(1, stat.halfLifeDays)
  return stat.score * Math.pow(0.5, daysBetween(stat.lastSeenAt, now) / halfLife)
}

/**
 * How long a pattern should linger. Day-state cues fade within a week,
 * situational triggers and hard preferences persist for months.
 */
export function halfLifeFor(kind: PatternKind, key: string, fallback: number = DEFAULT_HALF_LIFE_DAYS): number {
  // Ephemeral
  if (key.startsWith('release:')) return 7
  if (key.includes('deadline') || key.includes('time_pressure')) return 7
  if (key.includes('low_energy') || key.includes('low_sleep')) return 7

  // Sticky
  if (kind === 'constraint_trigger' || key.startsWith('trigger:')) return 365
  if (key === 'question_light') return 180
  if (key === 'prefers_no_fluff') return 120

  // Seasonal
  if (kind === 'style_preference' || kind === 'workflow_preference') return 90

  return fallback
}

export interface PatternStoreOptions {
  defaultHalfLifeDays?: number
}

export class PatternStore {
  private db: Database
  private defaultHalfLifeDays: number

  constructor(db: Database, options: PatternStoreOptions = {}) {
    this.db = db
    this.defaultHalfLifeDays = options.defaultHalfLifeDays ?? DEFAULT_HALF_LIFE_DAYS
  }

  /**
   * Decays the stored score to `now` and adds `weight`, in one transaction.
   * A negative weight on an unknown pattern is ignored. Scores never drop
   * below zero. Returns the row as stored, or null when nothing was written.
   */
  observe(kind: PatternKind, key: string, weight: number = 1.0, now: Date = new Date()): PatternStat | null {
    const trimmedKey = key.trim()
    if (!trimmedKey) throw new ValidationError('key', 'Pattern key is empty')
    if (trimmedKey.length > MAX_KEY_LENGTH) {
      throw new ValidationError('key', `Pattern key exceeds ${MAX_KEY_LENGTH} characters`)
    }
    if (!Number.isFinite(weight)) throw new ValidationError('weight', 'Weight must be finite')

    return this.db.transaction(() => {
      const existing = this.db.getPatternStat(kind, trimmedKey)
      const halfLifeDays = halfLifeFor(kind, trimmedKey, this.defaultHalfLifeDays)

      let next: PatternStat
      if (existing) {
        next = {
          ...existing,
          score: Math.max(0, decayedScore(existing, now) + weight),
          count: existing.count + 1,
          lastSeenAt: now,
          halfLifeDays
        }
      } else {
        if (weight <= 0) return null
        next = {
          kind,
          key: trimmedKey,
          score: weight,
          count: 1,
          firstSeenAt: now,
          lastSeenAt: now,
          halfLifeDays
        }
      }

      this.db.upsertPatternStat(next)
      return next
    })
  }

  observeAll(observations: PatternObservation[], now: Date = new Date()): number {
    if (observations.length === 0) return 0
    return this.db.transaction(() => {
      let written = 0
      for (const o of observations) {
        if (this.observe(o.kind, o.key, o.weight, now)) written++
      }
      return written
    })
  }

  /** Strongest patterns at `now`, ties broken by most recently seen. */
  topPatterns(options: { kind?: PatternKind; limit?: number; now?: Date } = {}): ScoredPattern[] {
    const now = options.now ?? new Date()
    const scored = this.all(now)
      .filter(p => !options.kind || p.kind === options.kind)
      .sort(compareScored)

    return options.limit === undefined ? scored : scored.slice(0, Math.max(0, options.limit))
  }

  all(now: Date = new Date()): ScoredPattern[] {
    return this.db.getPatternStats().map(stat => ({
      ...stat,
      decayedScore: decayedScore(stat, now)
    }))
  }

  reset(): number {
    const removed = this.db.clearPatternStats()
    console.log(`[learning] Cleared ${removed} pattern stats`)
    return removed
  }
}

export function compareScored(a: ScoredPattern, b: ScoredPattern): number {
  if (b.decayedScore !== a.decayedScore) return b.decayedScore - a.decayedScore
  return b.lastSeenAt.getTime() - a.lastSeenAt.getTime()
}
