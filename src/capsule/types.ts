import type { PatternKind } from '../learning/types.js'

export interface CapsulePreferences {
  outputStyle?: string
  optionsBeforeQuestions?: boolean
  noTherapyFraming?: boolean
  noPersona?: boolean
  pseudonym?: string
  extras: Record<string, string>
}

export interface CapsuleTendency {
  id: string
  /** Short human-readable cue, e.g. "Prefers bullet points". Never user text. */
  statement: string
  evidenceCount: number
  firstSeenAt: Date
  lastSeenAt: Date
  isOverridden: boolean
  sourceKind?: PatternKind
  sourceKey?: string
}

export interface Capsule {
  version: number
  learningEnabled: boolean
  updatedAt: Date
  preferences: CapsulePreferences
  learnedTendencies: CapsuleTendency[]
  /** Projection ignores pattern stats last seen at or before this instant. */
  learningResetAt: Date | null
}

/** `null` clears a field; an absent field is left alone. */
export interface PreferenceEdits {
  outputStyle?: string | null
  optionsBeforeQuestions?: boolean | null
  noTherapyFraming?: boolean | null
  noPersona?: boolean | null
  pseudonym?: string | null
  extras?: Record<string, string | null>
}

export function emptyCapsule(now: Date = new Date()): Capsule {
  return {
    version: 1,
    learningEnabled: true,
    updatedAt: now,
    preferences: { extras: {} },
    learnedTendencies: [],
    learningResetAt: null
  }
}
