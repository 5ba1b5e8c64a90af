export const PATTERN_KINDS = [
  'style_preference',
  'workflow_preference',
  'topic_recurrence',
  'resolution_pattern',
  'constraints_sensitivity',
  'narrative_pattern',
  'lens_preference',
  'constraint_trigger',
  'contraction_pattern',
  'release_pattern'
] as const

export type PatternKind = typeof PATTERN_KINDS[number]

export interface PatternStat {
  kind: PatternKind
  key: string
  score: number
  count: number
  firstSeenAt: Date
  lastSeenAt: Date
  halfLifeDays: number
}

export interface ScoredPattern extends PatternStat {
  /** Score decayed to the read time. Never written back. */
  decayedScore: number
}

export interface PatternObservation {
  kind: PatternKind
  key: string
  /** Positive reinforces, negative releases an existing pattern. */
  weight: number
}

export function parsePatternKind(raw: unknown): PatternKind | null {
  for (const kind of PATTERN_KINDS) {
    if (kind === raw) return kind
  }
  return null
}
