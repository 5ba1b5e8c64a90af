import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { PATTERN_KINDS } from './types.js'
import type { PatternKind, ScoredPattern } from './types.js'
import type { CapsuleTendency } from '../capsule/types.js'
import { daysBetween } from './patterns.js'

const statementEntrySchema = z.object({
  fallback: z.string(),
  prefixes: z.record(z.string()).optional(),
  keys: z.record(z.string())
})

const statementTablesSchema = z.record(z.enum(PATTERN_KINDS), statementEntrySchema)

type StatementTables = z.infer<typeof statementTablesSchema>

const STATEMENTS_URL = new URL('../../data/statements.json', import.meta.url)

let cachedStatements: StatementTables | null = null

function loadStatements(): StatementTables {
  if (!cachedStatements) {
    cachedStatements = statementTablesSchema.parse(JSON.parse(readFileSync(STATEMENTS_URL, 'utf-8')))
  }
  return cachedStatements
}

function humanise(raw: string): string {
  return raw.replace(/_/g, ' ')
}

/** Short, neutral cue for a pattern. Never contains user text beyond the key. */
export function statementFor(kind: PatternKind, key: string): string {
  const entry = loadStatements()[kind]
  if (!entry) return humanise(key)

  const exact = entry.keys[key]
  if (exact) return exact

  for (const [prefix, template] of Object.entries(entry.prefixes ?? {})) {
    if (key.startsWith(prefix)) {
      return template.replace('{rest}', humanise(key.slice(prefix.length)))
    }
  }
  return entry.fallback.replace('{key}', humanise(key))
}

type Lane = 'sticky' | 'seasonal' | 'ephemeral'

export const LANE_CAPS: Record<Lane, number> = { sticky: 8, seasonal: 10, ephemeral: 4 }
export const GLOBAL_TENDENCY_CAP = 24
const MAX_PER_KIND_IN_LANE = 6
const EPHEMERAL_RECENCY_DAYS = 7
const EXCLUDED = new Set(['constraint_trigger|trigger:eye_contact'])
const GUARDED_WORKFLOW_KEYS = new Set(['question_light', 'question_guided', 'narrow_first', 'explore_space'])

function laneFor(p: ScoredPattern): Lane {
  if (p.kind === 'release_pattern') return 'ephemeral'
  if (p.kind === 'constraint_trigger' &&
      (p.key.includes('low_sleep') || p.key.includes('low_energy') || p.key.includes('deadline_pressure'))) {
    return 'ephemeral'
  }
  if (p.kind === 'constraints_sensitivity' && (p.key === 'time_pressure' || p.key === 'low_energy')) {
    return 'ephemeral'
  }

  if (p.kind === 'constraint_trigger') return 'sticky'
  if (p.kind === 'constraints_sensitivity' && p.key === 'sensory_noise') return 'sticky'
  if (p.kind === 'workflow_preference' && p.key === 'question_light') return 'sticky'

  return 'seasonal'
}

function passesThreshold(p: ScoredPattern): boolean {
  const score = p.decayedScore
  if (p.kind === 'constraints_sensitivity') return score >= 0.6 && p.count >= 2
  if (p.kind === 'workflow_preference' && GUARDED_WORKFLOW_KEYS.has(p.key)) return score >= 0.4 && p.count >= 2
  return score >= 0.3
}

/** Per-kind score and evidence thresholds, minus excluded keys. Lanes are not applied. */
export function isProjectable(p: ScoredPattern): boolean {
  return !EXCLUDED.has(`${p.kind}|${p.key}`) && passesThreshold(p)
}

function passesEphemeralGate(p: ScoredPattern, now: Date): boolean {
  if (daysBetween(p.lastSeenAt, now) > EPHEMERAL_RECENCY_DAYS) return false
  const score = p.decayedScore
  switch (p.kind) {
    case 'release_pattern':
      return score >= 0.4
    case 'constraint_trigger':
      return score >= 0.5 && p.count >= 2
    case 'constraints_sensitivity':
      return score >= 0.6 && p.count >= 2
    default:
      return score >= 0.5
  }
}

function byStrength(a: ScoredPattern, b: ScoredPattern): number {
  if (b.decayedScore !== a.decayedScore) return b.decayedScore - a.decayedScore
  if (b.lastSeenAt.getTime() !== a.lastSeenAt.getTime()) return b.lastSeenAt.getTime() - a.lastSeenAt.getTime()
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0
}

function selectLane(candidates: ScoredPattern[], cap: number): ScoredPattern[] {
  const perKind = new Map<PatternKind, ScoredPattern[]>()
  for (const p of candidates) {
    const list = perKind.get(p.kind) ?? []
    list.push(p)
    perKind.set(p.kind, list)
  }

  const flattened: ScoredPattern[] = []
  for (const list of perKind.values()) {
    flattened.push(...list.sort(byStrength).slice(0, MAX_PER_KIND_IN_LANE))
  }
  return flattened.sort(byStrength).slice(0, cap)
}

export interface ProjectionOptions {
  now?: Date
  /** Stats last seen at or before this instant are ignored. */
  learningResetAt?: Date | null
}

/**
 * Turns scored pattern stats into the capsule's learned tendencies:
 * per-kind thresholds, then three lanes with their own caps, emitted
 * sticky first, then seasonal, then ephemeral.
 */
export function projectTendencies(stats: ScoredPattern[], options: ProjectionOptions = {}): CapsuleTendency[] {
  const now = options.now ?? new Date()
  const resetAt = options.learningResetAt ?? null

  const eligible = stats
    .filter(p => !resetAt || p.lastSeenAt.getTime() > resetAt.getTime())
    .filter(isProjectable)
    .filter(p => laneFor(p) !== 'ephemeral' || passesEphemeralGate(p, now))

  const lanes: Record<Lane, ScoredPattern[]> = { sticky: [], seasonal: [], ephemeral: [] }
  for (const p of eligible) lanes[laneFor(p)].push(p)

  let combined = [
    ...selectLane(lanes.sticky, LANE_CAPS.sticky),
    ...selectLane(lanes.seasonal, LANE_CAPS.seasonal),
    ...selectLane(lanes.ephemeral, LANE_CAPS.ephemeral)
  ]
  if (combined.length > GLOBAL_TENDENCY_CAP) {
    combined = combined.sort(byStrength).slice(0, GLOBAL_TENDENCY_CAP)
  }

  return combined.map(p => ({
    id: `${p.kind}:${p.key}`,
    statement: statementFor(p.kind, p.key),
    evidenceCount: p.count,
    firstSeenAt: p.firstSeenAt,
    lastSeenAt: p.lastSeenAt,
    isOverridden: false,
    sourceKind: p.kind,
    sourceKey: p.key
  }))
}

function tendencyFingerprint(t: CapsuleTendency): string {
  return [
    t.statement,
    t.evidenceCount,
    t.firstSeenAt.getTime(),
    t.lastSeenAt.getTime(),
    t.isOverridden,
    t.sourceKind ?? '',
    t.sourceKey ?? ''
  ].join('\u0000')
}

/** Order- and id-insensitive comparison, so an unchanged projection is not rewritten. */
export function sameTendencies(a: CapsuleTendency[], b: CapsuleTendency[]): boolean {
  if (a.length !== b.length) return false
  const left = a.map(tendencyFingerprint).sort()
  const right = b.map(tendencyFingerprint).sort()
  return left.every((value, i) => value === right[i])
}
