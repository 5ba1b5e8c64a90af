import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { unlinkSync, existsSync } from 'fs'
import { Database } from '../../storage/database.js'
import { PatternStore } from '../../learning/patterns.js'
import { CapsuleManager, normaliseKey, parseBool, EXTRAS_MAX_ITEMS } from '../capsule.js'
import { ValidationError } from '../../errors.js'

const TEST_DB = '/tmp/stillpoint-capsule-test.db'

describe('normaliseKey', () => {
  it('lower-cases and joins words with underscores', () => {
    expect(normaliseKey('  Output-Style ')).toBe('output_style')
    expect(normaliseKey('Tone  Of Voice')).toBe('tone_of_voice')
    expect(normaliseKey('__x__')).toBe('x')
  })
})

describe('parseBool', () => {
  it('accepts the usual spellings', () => {
    expect(parseBool('Yes')).toBe(true)
    expect(parseBool(' on ')).toBe(true)
    expect(parseBool('0')).toBe(false)
    expect(parseBool('maybe')).toBeNull()
  })
})

describe('CapsuleManager', () => {
  let db: Database
  let patterns: PatternStore
  let manager: CapsuleManager

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    if (existsSync(TEST_DB)) unlinkSync(TEST_DB)
    db = new Database(TEST_DB)
    patterns = new PatternStore(db)
    manager = new CapsuleManager(db, patterns)
  })

  afterEach(() => {
    db.close()
    if (existsSync(TEST_DB)) unlinkSync(TEST_DB)
    vi.restoreAllMocks()
  })

  it('creates a default capsule on first access', () => {
    const capsule = manager.getOrCreate()
    expect(capsule.version).toBe(1)
    expect(capsule.learningEnabled).toBe(true)
    expect(capsule.preferences).toEqual({ extras: {} })
    expect(db.loadCapsule()?.version).toBe(1)
  })

  it('bumps the version on every update and persists it', () => {
    manager.update({ outputStyle: 'bullets' })
    manager.update({ extras: { 'Tone Of Voice': 'warm' } })

    const reloaded = new CapsuleManager(db, patterns).getOrCreate()
    expect(reloaded.version).toBe(3)
    expect(reloaded.preferences.outputStyle).toBe('bullets')
    expect(reloaded.preferences.extras).toEqual({ tone_of_voice: 'warm' })
  })

  it('clears fields with null', () => {
    manager.update({ pseudonym: 'Sam', extras: { tone: 'warm' } })
    const capsule = manager.update({ pseudonym: null, extras: { tone: null } })
    expect(capsule.preferences.pseudonym).toBeUndefined()
    expect(capsule.preferences.extras).toEqual({})
  })

  it('rejects invalid extra keys', () => {
    expect(() => manager.update({ extras: { 'bad!key': 'x' } })).toThrow(ValidationError)
    expect(manager.getOrCreate().version).toBe(1)
  })

  it('rejects extras beyond the cap', () => {
    const extras: Record<string, string> = {}
    for (let i = 0; i < EXTRAS_MAX_ITEMS; i++) extras[`key_${i}`] = 'v'
    manager.update({ extras })

    expect(() => manager.update({ extras: { one_more: 'v' } })).toThrow(ValidationError)
    expect(manager.update({ extras: { key_0: 'changed' } }).preferences.extras.key_0).toBe('changed')
  })

  it('maps typed preference keys from strings', () => {
    manager.setPreference('Options before questions', 'yes')
    manager.setPreference('output-style', 'short paragraphs')
    manager.setPreference('energy', 'mornings')

    expect(manager.preferenceEntries()).toEqual([
      { key: 'output_style', value: 'short paragraphs' },
      { key: 'options_before_questions', value: 'true' },
      { key: 'energy', value: 'mornings' }
    ])
  })

  it('rejects a non-boolean value for a boolean key', () => {
    expect(() => manager.setPreference('no_persona', 'maybe')).toThrow(ValidationError)
  })

  it('removes typed and extra preferences', () => {
    manager.setPreference('no_persona', 'true')
    manager.setPreference('energy', 'mornings')
    manager.removePreference('no persona')
    manager.removePreference('energy')
    expect(manager.preferenceEntries()).toEqual([])
  })

  it('toggles learning without bumping the version', () => {
    const capsule = manager.setLearningEnabled(false)
    expect(capsule.learningEnabled).toBe(false)
    expect(capsule.version).toBe(1)
    expect(manager.isLearningEnabled()).toBe(false)
  })

  it('projects pattern stats into tendencies and writes only on change', () => {
    const now = new Date('2026-04-01T00:00:00Z')
    patterns.observe('style_preference', 'bullets', 0.7, now)

    expect(manager.syncLearnedTendencies(now)).toBe(true)
    expect(manager.getOrCreate().learnedTendencies.map(t => t.statement)).toEqual(['Prefers bullet points'])
    expect(manager.syncLearnedTendencies(now)).toBe(false)
  })

  it('resets the learned profile but keeps preferences', () => {
    const now = new Date('2026-04-01T00:00:00Z')
    manager.update({ outputStyle: 'bullets' })
    patterns.observe('style_preference', 'bullets', 0.7, now)
    manager.syncLearnedTendencies(now)

    const later = new Date('2026-04-02T00:00:00Z')
    const capsule = manager.resetLearnedProfile(later)
    expect(capsule.version).toBe(3)
    expect(capsule.learnedTendencies).toEqual([])
    expect(capsule.learningResetAt?.getTime()).toBe(later.getTime())
    expect(capsule.preferences.outputStyle).toBe('bullets')
    expect(patterns.all(later)).toEqual([])
  })

  it('wipes back to defaults and keeps counting versions', () => {
    manager.update({ outputStyle: 'bullets' })
    manager.setLearningEnabled(false)

    const capsule = manager.wipe()
    expect(capsule.version).toBe(3)
    expect(capsule.learningEnabled).toBe(true)
    expect(capsule.preferences).toEqual({ extras: {} })
  })
})
