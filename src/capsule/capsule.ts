import { Database } from '../storage/database.js'
import { ValidationError } from '../errors.js'
import { PatternStore } from '../learning/patterns.js'
import { projectTendencies, sameTendencies } from '../learning/sync.js'
import { truncate } from '../util/text.js'
import { emptyCapsule } from './types.js'
import type { Capsule, CapsulePreferences, PreferenceEdits } from './types.js'

export const EXTRAS_MAX_ITEMS = 34
export const EXTRAS_KEY_MAX = 64
export const EXTRAS_VALUE_MAX = 128

const EXTRA_KEY_PATTERN = /^[a-z0-9]+(?:[:_][a-z0-9]+)*$/

const BOOLEAN_KEYS = {
  options_before_questions: 'optionsBeforeQuestions',
  no_therapy_framing: 'noTherapyFraming',
  no_persona: 'noPersona'
} as const

const STRING_KEYS = {
  output_style: 'outputStyle',
  pseudonym: 'pseudonym'
} as const

type BooleanField = typeof BOOLEAN_KEYS[keyof typeof BOOLEAN_KEYS]
type StringField = typeof STRING_KEYS[keyof typeof STRING_KEYS]

function isBooleanKey(key: string): key is keyof typeof BOOLEAN_KEYS {
  return Object.hasOwn(BOOLEAN_KEYS, key)
}

function isStringKey(key: string): key is keyof typeof STRING_KEYS {
  return Object.hasOwn(STRING_KEYS, key)
}

function fieldEdit(field: BooleanField, value: boolean | null): PreferenceEdits
function fieldEdit(field: StringField, value: string | null): PreferenceEdits
function fieldEdit(field: BooleanField | StringField, value: boolean | string | null): PreferenceEdits {
  const edits: PreferenceEdits = {}
  if (typeof value === 'boolean') {
    if (field === 'optionsBeforeQuestions' || field === 'noTherapyFraming' || field === 'noPersona') edits[field] = value
  } else if (value === null) {
    edits[field] = null
  } else if (field === 'outputStyle' || field === 'pseudonym') {
    edits[field] = value
  }
  return edits
}

/** "Output Style" and "output-style" both become "output_style". */
export function normaliseKey(input: string): string {
  return input
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, '_')
    .replace(/_{2,}/g, '_')
    .replace(/^_+|_+$/g, '')
}

export function parseBool(input: string): boolean | null {
  const v = input.trim().toLowerCase()
  if (['true', '1', 'yes', 'y', 'on'].includes(v)) return true
  if (['false', '0', 'no', 'n', 'off'].includes(v)) return false
  return null
}

function cleanString(value: string): string | undefined {
  const trimmed = value.trim()
  return trimmed ? truncate(trimmed, EXTRAS_VALUE_MAX) : undefined
}

/**
 * Owns the single capsule row: explicit preferences, learned tendencies and
 * the learning switch. Loaded once and cached.
 */
export class CapsuleManager {
  private db: Database
  private patterns: PatternStore
  private cached: Capsule | null = null

  constructor(db: Database, patterns: PatternStore) {
    this.db = db
    this.patterns = patterns
  }

  getOrCreate(): Capsule {
    if (this.cached) return this.cached

    const loaded = this.db.loadCapsule()
    if (loaded) {
      this.cached = loaded
      return loaded
    }

    const blank = emptyCapsule()
    this.save(blank)
    return blank
  }

  private save(capsule: Capsule): void {
    this.db.saveCapsule(capsule)
    this.cached = capsule
  }

  /** Stored patterns are kept while learning is off, so switching back on restores them. */
  setLearningEnabled(enabled: boolean): Capsule {
    const capsule = this.getOrCreate()
    if (capsule.learningEnabled === enabled) return capsule

    const next: Capsule = { ...capsule, learningEnabled: enabled, updatedAt: new Date() }
    this.save(next)
    console.log(`[capsule] Learning ${enabled ? 'enabled' : 'disabled'}`)
    return next
  }

  isLearningEnabled(): boolean {
    return this.getOrCreate().learningEnabled
  }

  /** Merges typed fields and extras. `null` clears. Bumps the version. */
  update(edits: PreferenceEdits): Capsule {
    const capsule = this.getOrCreate()
    const preferences: CapsulePreferences = {
      ...capsule.preferences,
      extras: { ...capsule.preferences.extras }
    }

    if (edits.outputStyle !== undefined) {
      preferences.outputStyle = edits.outputStyle === null ? undefined : cleanString(edits.outputStyle)
    }
    if (edits.pseudonym !== undefined) {
      preferences.pseudonym = edits.pseudonym === null ? undefined : cleanString(edits.pseudonym)
    }
    if (edits.optionsBeforeQuestions !== undefined) {
      preferences.optionsBeforeQuestions = edits.optionsBeforeQuestions ?? undefined
    }
    if (edits.noTherapyFraming !== undefined) {
      preferences.noTherapyFraming = edits.noTherapyFraming ?? undefined
    }
    if (edits.noPersona !== undefined) {
      preferences.noPersona = edits.noPersona ?? undefined
    }

    for (const [rawKey, rawValue] of Object.entries(edits.extras ?? {})) {
      const key = truncate(normaliseKey(rawKey), EXTRAS_KEY_MAX)
      if (!EXTRA_KEY_PATTERN.test(key)) {
        throw new ValidationError('extras', `Invalid preference key: ${rawKey}`)
      }

      const value = rawValue === null ? undefined : cleanString(rawValue)
      if (value === undefined) {
        delete preferences.extras[key]
        continue
      }
      if (!Object.hasOwn(preferences.extras, key) && Object.keys(preferences.extras).length >= EXTRAS_MAX_ITEMS) {
        throw new ValidationError('extras', `At most ${EXTRAS_MAX_ITEMS} extra preferences`)
      }
      preferences.extras[key] = value
    }

    const next: Capsule = {
      ...capsule,
      version: capsule.version + 1,
      updatedAt: new Date(),
      preferences
    }
    this.save(next)
    return next
  }

  /** String form used by the CLI: typed keys are recognised, anything else is an extra. */
  setPreference(key: string, value: string): Capsule {
    const k = normaliseKey(key)
    if (!k) throw new ValidationError('key', 'Preference key is empty')

    if (isBooleanKey(k)) {
      const trimmed = value.trim()
      const parsed = trimmed ? parseBool(trimmed) : null
      if (trimmed && parsed === null) {
        throw new ValidationError(k, `Expected a yes/no value, got "${value}"`)
      }
      return this.update(fieldEdit(BOOLEAN_KEYS[k], parsed))
    }
    if (isStringKey(k)) {
      return this.update(fieldEdit(STRING_KEYS[k], value.trim() ? value : null))
    }
    return this.update({ extras: { [k]: value } })
  }

  removePreference(key: string): Capsule {
    const k = normaliseKey(key)
    if (!k) throw new ValidationError('key', 'Preference key is empty')

    if (isBooleanKey(k)) return this.update(fieldEdit(BOOLEAN_KEYS[k], null))
    if (isStringKey(k)) return this.update(fieldEdit(STRING_KEYS[k], null))
    return this.update({ extras: { [k]: null } })
  }

  /** Typed entries first, then extras sorted by key. */
  preferenceEntries(): { key: string; value: string }[] {
    const p = this.getOrCreate().preferences
    const out: { key: string; value: string }[] = []

    if (p.outputStyle) out.push({ key: 'output_style', value: p.outputStyle })
    if (p.optionsBeforeQuestions !== undefined) out.push({ key: 'options_before_questions', value: String(p.optionsBeforeQuestions) })
    if (p.noTherapyFraming !== undefined) out.push({ key: 'no_therapy_framing', value: String(p.noTherapyFraming) })
    if (p.noPersona !== undefined) out.push({ key: 'no_persona', value: String(p.noPersona) })
    if (p.pseudonym) out.push({ key: 'pseudonym', value: p.pseudonym })

    for (const key of Object.keys(p.extras).sort()) {
      out.push({ key, value: p.extras[key] })
    }
    return out
  }

  /**
   * Clears learned tendencies and every pattern stat. Explicit preferences
   * stay. Stats seen before this instant no longer project.
   */
  resetLearnedProfile(now: Date = new Date()): Capsule {
    const capsule = this.getOrCreate()
    const next: Capsule = {
      ...capsule,
      version: capsule.version + 1,
      updatedAt: now,
      learnedTendencies: [],
      learningResetAt: now
    }

    this.db.transaction(() => {
      this.patterns.reset()
      this.db.saveCapsule(next)
    })
    this.cached = next
    console.log('[capsule] Learned profile reset')
    return next
  }

  /** Re-projects learned tendencies from pattern stats. Writes only on change. */
  syncLearnedTendencies(now: Date = new Date()): boolean {
    const capsule = this.getOrCreate()
    const projected = projectTendencies(this.patterns.all(now), {
      now,
      learningResetAt: capsule.learningResetAt
    })

    if (sameTendencies(capsule.learnedTendencies, projected)) return false

    this.save({ ...capsule, learnedTendencies: projected, updatedAt: now })
    console.log(`[capsule] Learned tendencies updated (${projected.length})`)
    return true
  }

  /** Back to defaults. The row is kept and the version keeps counting. */
  wipe(): Capsule {
    const capsule = this.getOrCreate()
    const next: Capsule = { ...emptyCapsule(), version: capsule.version + 1 }
    this.save(next)
    return next
  }
}
