import type { Capsule, CapsuleTendency } from './types.js'
import type { ScoredPattern } from '../learning/types.js'
import { statementFor, isProjectable } from '../learning/sync.js'
import { compareScored } from '../learning/patterns.js'
import { truncate, isBlank } from '../util/text.js'
import { fingerprintJSON } from '../util/hash.js'

export type CapsuleMode = 'reflect' | 'talk'

export const MAX_PREFERENCE_ENTRIES = 24
export const PREFERENCE_KEY_MAX = 32
export const PREFERENCE_VALUE_MAX = 128
export const CUE_LIMITS: Record<CapsuleMode, number> = { reflect: 12, talk: 8 }
const STATEMENT_MAX = 140
const EVIDENCE_MAX = 999

export interface LearnedCue {
  statement: string
  evidenceCount: number
  lastSeenAtISO: string
  kindRaw?: string
  key?: string
}

export interface ExportSnapshot {
  version: number
  updatedAt: string
  preferences: Record<string, string>
  learnedCues?: LearnedCue[]
}

export interface SnapshotRequestBase {
  text: string
  recordedAt?: string
  client: string
  appVersion: string
  capsule?: ExportSnapshot
}

export type ReflectRequest = SnapshotRequestBase

export interface TalkRequest extends SnapshotRequestBase {
  previous_response_id?: string
}

function boundPreferences(capsule: Capsule): Record<string, string> {
  const p = capsule.preferences
  const out: Record<string, string> = {}

  const typed: [string, string | boolean | undefined][] = [
    ['output_style', p.outputStyle],
    ['options_before_questions', p.optionsBeforeQuestions],
    ['no_therapy_framing', p.noTherapyFraming],
    ['no_persona', p.noPersona],
    ['pseudonym', p.pseudonym]
  ]
  for (const [key, value] of typed) {
    if (typeof value === 'boolean') {
      out[key] = value ? 'true' : 'false'
    } else if (typeof value === 'string' && !isBlank(value)) {
      out[key] = truncate(value, PREFERENCE_VALUE_MAX)
    }
  }

  const extras = p.extras ?? {}
  for (const rawKey of Object.keys(extras).sort()) {
    if (Object.keys(out).length >= MAX_PREFERENCE_ENTRIES) break

    const key = truncate(rawKey, PREFERENCE_KEY_MAX)
    const value = truncate(String(extras[rawKey] ?? ''), PREFERENCE_VALUE_MAX)
    if (!key || isBlank(value) || Object.hasOwn(out, key)) continue
    out[key] = value
  }

  return out
}

function cueFromTendency(t: CapsuleTendency): LearnedCue | null {
  const statement = t.statement.trim()
  if (!statement || t.isOverridden) return null

  const cue: LearnedCue = {
    statement: truncate(statement, STATEMENT_MAX),
    evidenceCount: Math.max(1, Math.min(EVIDENCE_MAX, Math.floor(t.evidenceCount))),
    lastSeenAtISO: safeISO(t.lastSeenAt)
  }
  if (t.sourceKind) cue.kindRaw = t.sourceKind
  if (t.sourceKey) cue.key = t.sourceKey
  return cue
}

function cueFromPattern(p: ScoredPattern): LearnedCue | null {
  return cueFromTendency({
    id: `${p.kind}:${p.key}`,
    statement: statementFor(p.kind, p.key),
    evidenceCount: p.count,
    firstSeenAt: p.firstSeenAt,
    lastSeenAt: p.lastSeenAt,
    isOverridden: false,
    sourceKind: p.kind,
    sourceKey: p.key
  })
}

/**
 * Bounded, outbound view of the capsule. Cues come from `patterns` when
 * given (only those past the learning thresholds), otherwise from the
 * capsule's learned tendencies, and are left out
 * entirely while learning is disabled or when none survive. Never throws.
 */
export function project(capsule: Capsule, mode: CapsuleMode = 'reflect', patterns?: ScoredPattern[]): ExportSnapshot {
  const snapshot: ExportSnapshot = {
    version: capsule.version,
    updatedAt: safeISO(capsule.updatedAt),
    preferences: boundPreferences(capsule)
  }

  if (!capsule.learningEnabled) return snapshot

  const limit = CUE_LIMITS[mode]
  const cues: LearnedCue[] = []
  const source = patterns
    ? patterns.filter(isProjectable).sort(compareScored).map(cueFromPattern)
    : capsule.learnedTendencies.map(cueFromTendency)

  for (const cue of source) {
    if (cues.length >= limit) break
    if (cue) cues.push(cue)
  }

  if (cues.length > 0) snapshot.learnedCues = cues
  return snapshot
}

function safeISO(date: Date): string {
  return Number.isNaN(date.getTime()) ? new Date(0).toISOString() : date.toISOString()
}

export function snapshotHash(snapshot: ExportSnapshot): string {
  return fingerprintJSON(snapshot)
}

export interface RequestContext {
  text: string
  recordedAt?: Date | null
  client: string
  appVersion: string
  snapshot?: ExportSnapshot
}

export function buildReflectRequest(ctx: RequestContext): ReflectRequest {
  const request: ReflectRequest = {
    text: ctx.text,
    client: ctx.client,
    appVersion: ctx.appVersion
  }
  if (ctx.recordedAt) request.recordedAt = safeISO(ctx.recordedAt)
  if (ctx.snapshot) request.capsule = ctx.snapshot
  return request
}

/** The continuation token is forwarded exactly as received. */
export function buildTalkRequest(ctx: RequestContext & { previousResponseId?: string | null }): TalkRequest {
  const request: TalkRequest = buildReflectRequest(ctx)
  if (ctx.previousResponseId) request.previous_response_id = ctx.previousResponseId
  return request
}
