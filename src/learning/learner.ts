import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { PATTERN_KINDS } from './types.js'
import type { PatternKind, PatternObservation } from './types.js'

export const MAX_OBSERVATIONS_PER_TURN = 12

const phraseList = z.array(z.string().min(1))

const phraseTablesSchema = z.object({
  desiredOutput: z.record(phraseList),
  constraints: z.record(phraseList),
  urgency: phraseList,
  release: z.record(z.object({ weight: z.number(), phrases: phraseList })),
  situational: z.object({
    weight: z.number(),
    limit: z.number().int().positive(),
    keys: z.record(phraseList)
  }),
  workflow: z.object({
    weight: z.number(),
    keys: z.record(phraseList)
  }),
  deactivation: z.object({
    weight: z.number().negative(),
    markers: phraseList,
    targets: z.array(z.object({
      kind: z.enum(PATTERN_KINDS),
      key: z.string().min(1),
      phrases: phraseList
    }))
  })
})

export type PhraseTables = z.infer<typeof phraseTablesSchema>

const PHRASES_URL = new URL('../../data/phrases.json', import.meta.url)

let cachedTables: PhraseTables | null = null

export function loadPhraseTables(): PhraseTables {
  if (!cachedTables) {
    cachedTables = phraseTablesSchema.parse(JSON.parse(readFileSync(PHRASES_URL, 'utf-8')))
  }
  return cachedTables
}

const CONSTRAINT_KEYS: Record<string, string> = {
  time: 'time_pressure',
  energy: 'low_energy',
  money: 'money_limit',
  social: 'social_overload',
  dependencies: 'dependency_blocked',
  sensory: 'sensory_noise',
  legal: 'legal_risk'
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

const phrasePatterns = new Map<string, RegExp>()

/** Whole-phrase match: "ease" hits "with ease" but not "please". */
export function containsPhrase(text: string, phrase: string): boolean {
  let pattern = phrasePatterns.get(phrase)
  if (!pattern) {
    pattern = new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(phrase)}(?![\\p{L}\\p{N}])`, 'u')
    phrasePatterns.set(phrase, pattern)
  }
  return pattern.test(text)
}

function hitsAny(text: string, phrases: string[]): boolean {
  return phrases.some(p => containsPhrase(text, p))
}

function matchedKeys(text: string, table: Record<string, string[]>): Set<string> {
  const out = new Set<string>()
  for (const [key, phrases] of Object.entries(table)) {
    if (hitsAny(text, phrases)) out.add(key)
  }
  return out
}

/**
 * Reads explicit phrases in a redacted transcript and turns them into
 * pattern observations. Nothing is inferred from tone or silence.
 *
 * One entry per (kind, key). A deactivation outranks any reinforcement of
 * the same pattern in the same text; otherwise the strongest weight wins.
 * At most {@link MAX_OBSERVATIONS_PER_TURN} are returned.
 */
export function deriveObservations(redactedText: string, tables: PhraseTables = loadPhraseTables()): PatternObservation[] {
  const text = redactedText.toLowerCase().replace(/[‘’]/g, "'")
  if (!text.trim()) return []

  const out: PatternObservation[] = []
  const add = (kind: PatternKind, key: string, weight: number) => out.push({ kind, key, weight })

  const desired = matchedKeys(text, tables.desiredOutput)
  const constraints = matchedKeys(text, tables.constraints)
  const urgent = hitsAny(text, tables.urgency)

  // Style
  const wantsList = desired.has('steps') || desired.has('checklist')
  if (wantsList) add('style_preference', 'bullets', 0.7)
  if (desired.has('summary')) add('style_preference', 'concise', 0.5)
  if (desired.has('script')) add('style_preference', 'scripted_reply', 0.5)
  if (desired.has('summary') && wantsList) {
    add('style_preference', 'prefers_tldr_then_detail', 0.6)
  } else if (desired.has('summary')) {
    add('style_preference', 'prefers_brief', 0.5)
  }
  if (desired.has('steps')) add('style_preference', 'prefers_numbered_steps', 0.6)
  if (desired.has('checklist')) add('style_preference', 'prefers_checklist', 0.6)
  if (desired.has('decision_tree')) add('style_preference', 'prefers_decision_tree', 0.6)
  if (urgent || constraints.has('time')) add('style_preference', 'prefers_no_fluff', 0.4)

  // Workflow
  if (desired.has('options')) add('workflow_preference', 'options_first', 0.6)
  const wantsDirect = desired.has('steps') || desired.has('options') || desired.has('summary')
  if (wantsDirect && !desired.has('questions')) {
    add('workflow_preference', 'prefers_execute_immediately', 0.3)
    add('workflow_preference', 'prefers_few_questions', 0.3)
    if (desired.has('summary')) add('workflow_preference', 'prefers_just_answer', 0.3)
  }
  for (const key of matchedKeys(text, tables.workflow.keys)) {
    add('workflow_preference', key, tables.workflow.weight)
  }

  // Resolution
  if (constraints.size > 0) add('resolution_pattern', 'constraints_first', 0.5)
  if (constraints.size >= 3) add('resolution_pattern', 'complexity_high', 0.5)
  if (desired.has('reframe') && wantsList) add('resolution_pattern', 'prefers_reframe_then_steps', 0.5)

  // Low weight so a single mention does not surface.
  for (const constraint of constraints) {
    const key = CONSTRAINT_KEYS[constraint]
    if (key) add('constraints_sensitivity', key, 0.25)
  }

  for (const [key, entry] of Object.entries(tables.release)) {
    if (hitsAny(text, entry.phrases)) add('release_pattern', key, entry.weight)
  }

  let situational = 0
  for (const key of matchedKeys(text, tables.situational.keys)) {
    if (situational >= tables.situational.limit) break
    add('constraint_trigger', key, tables.situational.weight)
    situational++
  }

  if (hitsAny(text, tables.deactivation.markers)) {
    for (const target of tables.deactivation.targets) {
      if (hitsAny(text, target.phrases)) add(target.kind, target.key, tables.deactivation.weight)
    }
  }

  return dedupe(out).slice(0, MAX_OBSERVATIONS_PER_TURN)
}

function dedupe(observations: PatternObservation[]): PatternObservation[] {
  const unique = new Map<string, PatternObservation>()
  for (const o of observations) {
    const id = `${o.kind}|${o.key}`
    const existing = unique.get(id)
    if (!existing || outranks(o, existing)) unique.set(id, o)
  }

  return [...unique.values()].sort((a, b) => {
    const byWeight = Math.abs(b.weight) - Math.abs(a.weight)
    if (byWeight !== 0) return byWeight
    return a.key < b.key ? -1 : a.key > b.key ? 1 : 0
  })
}

function outranks(candidate: PatternObservation, existing: PatternObservation): boolean {
  if ((candidate.weight < 0) !== (existing.weight < 0)) return candidate.weight < 0
  return Math.abs(candidate.weight) > Math.abs(existing.weight)
}
