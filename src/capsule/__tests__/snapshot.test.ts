import { describe, it, expect } from 'vitest'
import {
  project,
  snapshotHash,
  buildReflectRequest,
  buildTalkRequest,
  MAX_PREFERENCE_ENTRIES,
  PREFERENCE_KEY_MAX,
  PREFERENCE_VALUE_MAX
} from '../snapshot.js'
import { emptyCapsule } from '../types.js'
import type { Capsule, CapsuleTendency } from '../types.js'
import type { ScoredPattern } from '../../learning/types.js'
import { Database } from '../../storage/database.js'
import { PatternStore } from '../../learning/patterns.js'

const UPDATED = new Date('2026-02-01T09:30:00Z')

function capsuleWith(overrides: Partial<Capsule> = {}): Capsule {
  return { ...emptyCapsule(UPDATED), ...overrides }
}

function tendency(i: number, overrides: Partial<CapsuleTendency> = {}): CapsuleTendency {
  return {
    id: `style_preference:key_${i}`,
    statement: `Statement ${i}`,
    evidenceCount: 2,
    firstSeenAt: UPDATED,
    lastSeenAt: UPDATED,
    isOverridden: false,
    sourceKind: 'style_preference',
    sourceKey: `key_${i}`,
    ...overrides
  }
}

describe('project', () => {
  it('bounds the number and size of preference entries', () => {
    const extras: Record<string, string> = {}
    for (let i = 0; i < 40; i++) {
      extras[`key_${String(i).padStart(2, '0')}_${'x'.repeat(35)}`] = 'v'.repeat(200)
    }
    const snapshot = project(capsuleWith({ preferences: { extras } }))

    const entries = Object.entries(snapshot.preferences)
    expect(entries).toHaveLength(MAX_PREFERENCE_ENTRIES)
    for (const [key, value] of entries) {
      expect(key.length).toBeLessThanOrEqual(PREFERENCE_KEY_MAX)
      expect(value.length).toBe(PREFERENCE_VALUE_MAX)
    }
  })

  it('puts typed preferences first as strings', () => {
    const snapshot = project(capsuleWith({
      preferences: { optionsBeforeQuestions: false, outputStyle: 'bullets', extras: { energy: 'mornings' } }
    }))
    expect(snapshot.preferences).toEqual({
      output_style: 'bullets',
      options_before_questions: 'false',
      energy: 'mornings'
    })
    expect(snapshot.version).toBe(1)
    expect(snapshot.updatedAt).toBe('2026-02-01T09:30:00.000Z')
  })

  it('leaves cues out while learning is disabled', () => {
    const capsule = capsuleWith({ learningEnabled: false, learnedTendencies: [tendency(1)] })
    const strong: ScoredPattern = {
      kind: 'style_preference',
      key: 'bullets',
      score: 2,
      decayedScore: 2,
      count: 5,
      firstSeenAt: UPDATED,
      lastSeenAt: UPDATED,
      halfLifeDays: 90
    }
    expect(project(capsule).learnedCues).toBeUndefined()
    expect(project(capsule, 'reflect', [strong]).learnedCues).toBeUndefined()
  })

  it('leaves cues out when none survive', () => {
    const snapshot = project(capsuleWith({ learnedTendencies: [tendency(1, { isOverridden: true })] }))
    expect(snapshot.learnedCues).toBeUndefined()
  })

  it('limits cues per mode', () => {
    const learnedTendencies = Array.from({ length: 20 }, (_, i) => tendency(i))
    expect(project(capsuleWith({ learnedTendencies }), 'reflect').learnedCues).toHaveLength(12)
    expect(project(capsuleWith({ learnedTendencies }), 'talk').learnedCues).toHaveLength(8)
  })

  it('clamps evidence counts and keeps the source', () => {
    const snapshot = project(capsuleWith({ learnedTendencies: [tendency(1, { evidenceCount: 5000 })] }))
    expect(snapshot.learnedCues).toEqual([{
      statement: 'Statement 1',
      evidenceCount: 999,
      lastSeenAtISO: '2026-02-01T09:30:00.000Z',
      kindRaw: 'style_preference',
      key: 'key_1'
    }])
  })

  it('builds cues from scored patterns when given', () => {
    const pattern: ScoredPattern = {
      kind: 'style_preference',
      key: 'bullets',
      score: 0.7,
      decayedScore: 0.7,
      count: 3,
      firstSeenAt: UPDATED,
      lastSeenAt: UPDATED,
      halfLifeDays: 90
    }
    const snapshot = project(capsuleWith({ learnedTendencies: [tendency(1)] }), 'reflect', [pattern])
    expect(snapshot.learnedCues?.map(c => c.statement)).toEqual(['Prefers bullet points'])
  })

  it('leaves out patterns below the learning thresholds', () => {
    const weak: ScoredPattern = {
      kind: 'constraints_sensitivity',
      key: 'sensory_noise',
      score: 0.9,
      decayedScore: 0.9,
      count: 1,
      firstSeenAt: UPDATED,
      lastSeenAt: UPDATED,
      halfLifeDays: 30
    }
    const excluded: ScoredPattern = { ...weak, kind: 'constraint_trigger', key: 'trigger:eye_contact', count: 4 }
    expect(project(capsuleWith(), 'reflect', [weak, excluded]).learnedCues).toBeUndefined()
  })

  it('does not export a pattern the user switched off', () => {
    const db = new Database(':memory:')
    try {
      const store = new PatternStore(db)
      store.observe('style_preference', 'bullets', 0.7, UPDATED)
      store.observe('style_preference', 'bullets', -1, UPDATED)

      const patterns = store.topPatterns({ now: UPDATED })
      expect(patterns.map(p => p.decayedScore)).toEqual([0])
      expect(project(capsuleWith(), 'reflect', patterns).learnedCues).toBeUndefined()
    } finally {
      db.close()
    }
  })

  it('writes the epoch for an invalid date', () => {
    expect(project(capsuleWith({ updatedAt: new Date('nope') })).updatedAt).toBe('1970-01-01T00:00:00.000Z')
  })

  it('hashes equal snapshots equally', () => {
    const capsule = capsuleWith({ learnedTendencies: [tendency(1)] })
    expect(snapshotHash(project(capsule))).toBe(snapshotHash(project(capsule)))
    expect(snapshotHash(project(capsule))).not.toBe(snapshotHash(project(capsule, 'reflect', [])))
  })
})

describe('request builders', () => {
  const ctx = { text: 'hello', client: 'cli', appVersion: '0.1.0' }

  it('omits optional fields when absent', () => {
    expect(buildReflectRequest(ctx)).toEqual({ text: 'hello', client: 'cli', appVersion: '0.1.0' })
  })

  it('carries the recording time and snapshot', () => {
    const snapshot = project(capsuleWith())
    const request = buildReflectRequest({ ...ctx, recordedAt: UPDATED, snapshot })
    expect(request.recordedAt).toBe('2026-02-01T09:30:00.000Z')
    expect(request.capsule).toBe(snapshot)
  })

  it('forwards the continuation token exactly', () => {
    expect(buildTalkRequest({ ...ctx, previousResponseId: 'resp_AbC-1' }).previous_response_id).toBe('resp_AbC-1')
    expect(buildTalkRequest({ ...ctx, previousResponseId: null })).not.toHaveProperty('previous_response_id')
  })
})
