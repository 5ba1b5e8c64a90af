import { readFileSync } from 'node:fs'
import { createApp } from '../app.js'
import type { Stillpoint } from '../app.js'
import { loadConfig, setConfigValue, validateConfig } from '../config.js'
import { ValidationError } from '../errors.js'
import { TURN_STATES, CONTEMPLATION_MODES, CAPTURE_CONTEXTS, TRANSCRIPTION_PROVIDERS } from '../turns/types.js'
import type { Turn, TurnState, ContemplationMode, CaptureContext, TranscriptionProvider } from '../turns/types.js'
import { PATTERN_KINDS } from '../learning/types.js'
import type { PatternKind } from '../learning/types.js'
import { project } from '../capsule/snapshot.js'
import type { CapsuleMode } from '../capsule/snapshot.js'
import type { StepsKind } from '../gateway/cloud.js'

async function withApp<T>(fn: (app: Stillpoint) => Promise<T> | T): Promise<T> {
  const app = createApp(loadConfig())
  try {
    return await fn(app)
  } finally {
    app.close()
  }
}

function pick<T extends string>(values: readonly T[], raw: string | undefined, field: string): T | undefined {
  if (raw === undefined) return undefined
  const found = values.find(v => v === raw)
  if (!found) {
    throw new ValidationError(field, `Unknown ${field} "${raw}". Expected one of: ${values.join(', ')}`)
  }
  return found
}

function readText(words: string[], file?: string): string {
  return file ? readFileSync(file, 'utf-8') : words.join(' ')
}

function parseDate(raw: string | undefined, field: string): Date | undefined {
  if (raw === undefined) return undefined
  const date = new Date(raw)
  if (isNaN(date.getTime())) throw new ValidationError(field, `Invalid timestamp: ${raw}`)
  return date
}

function formatDuration(seconds: number | null): string {
  if (seconds === null) return '-'
  const minutes = Math.floor(seconds / 60)
  return minutes > 0 ? `${minutes}m ${Math.round(seconds % 60)}s` : `${Math.round(seconds)}s`
}

function displayTitle(turn: Turn): string {
  return turn.title || '(untitled)'
}

// --- Capture pipeline ---

export async function captureCommand(audioPath: string, options: { context?: string; at?: string }): Promise<void> {
  await withApp(app => {
    const context: CaptureContext = pick(CAPTURE_CONTEXTS, options.context, 'context') ?? 'unknown'
    const id = app.lifecycle.createCapture(audioPath, parseDate(options.at, 'at'), context)
    app.lifecycle.markRecording(id)
    console.log(id)
  })
}

export async function capturedCommand(id: string, options: { bytes?: string; at?: string }): Promise<void> {
  await withApp(app => {
    const bytes = options.bytes === undefined ? undefined : Number(options.bytes)
    const turn = app.lifecycle.markCaptured(id, parseDate(options.at, 'at'), bytes)
    console.log(`${turn.id} captured (${formatDuration(turn.durationSeconds)})`)
  })
}

export async function transcribeCommand(id: string, options: { provider?: string; locale?: string }): Promise<void> {
  await withApp(async app => {
    const provider: TranscriptionProvider = pick(TRANSCRIPTION_PROVIDERS, options.provider, 'provider') ?? 'onDevice'
    const turn = await app.pipeline.beginTranscription(id, provider, options.locale ?? null)
    console.log(`${turn.id} ${turn.state}`)
  })
}

export async function transcriptCommand(id: string, words: string[], options: { file?: string }): Promise<void> {
  await withApp(async app => {
    const turn = await app.pipeline.completeTranscript(id, readText(words, options.file))
    console.log(`${turn.id} ${turn.state}: ${displayTitle(turn)}`)
  })
}

export async function failCommand(id: string, message: string): Promise<void> {
  await withApp(async app => {
    const turn = await app.pipeline.fail(id, message)
    console.log(`${turn.id} ${turn.state}`)
  })
}

export async function interruptCommand(id: string): Promise<void> {
  await withApp(app => {
    const turn = app.lifecycle.markInterrupted(id)
    console.log(`${turn.id} ${turn.state}`)
  })
}

export async function importCommand(words: string[], options: { file?: string; context?: string; at?: string }): Promise<void> {
  await withApp(async app => {
    const turn = await app.pipeline.importText(readText(words, options.file), {
      recordedAt: parseDate(options.at, 'at'),
      context: pick(CAPTURE_CONTEXTS, options.context, 'context')
    })
    console.log(`${turn.id} ${turn.state}: ${displayTitle(turn)}`)
  })
}

// --- Turns ---

export async function listCommand(options: { state?: string; limit?: string; unfinished?: boolean }): Promise<void> {
  await withApp(app => {
    const state: TurnState | undefined = pick(TURN_STATES, options.state, 'state')
    const turns = options.unfinished
      ? app.lifecycle.listUnfinished()
      : app.lifecycle.list({
        states: state ? [state] : undefined,
        limit: options.limit ? parseInt(options.limit, 10) : undefined
      })

    if (turns.length === 0) {
      console.log('No turns found.')
      return
    }

    for (const turn of turns) {
      console.log(`  ${turn.id}  ${turn.recordedAt.toISOString()}  ${turn.state.padEnd(14)} ${displayTitle(turn)}`)
    }
  })
}

export async function showCommand(id: string, options: { raw?: boolean; history?: boolean }): Promise<void> {
  await withApp(app => {
    const turn = app.lifecycle.require(id)

    console.log('')
    console.log(`  Turn: ${turn.id}`)
    console.log('  ' + '-'.repeat(40))
    console.log(`  Title:       ${displayTitle(turn)}`)
    console.log(`  State:       ${turn.state}`)
    console.log(`  Source:      ${turn.source} (${turn.captureContext})`)
    console.log(`  Recorded:    ${turn.recordedAt.toISOString()}`)
    console.log(`  Duration:    ${formatDuration(turn.durationSeconds)}`)
    console.log(`  Redaction:   v${turn.redactionVersion}${turn.redactionInputHash ? ` (${turn.redactionInputHash})` : ''}`)
    if (turn.audioPath) console.log(`  Audio:       ${turn.audioPath} (${turn.audioBytes} bytes)`)
    if (turn.error) console.log(`  Error:       ${turn.error.userFacingKey}: ${turn.error.debugMessage}`)

    if (turn.transcriptRedactedActive) {
      console.log('\n  Transcript:')
      console.log(`    ${turn.transcriptRedactedActive}`)
    }
    if (options.raw && turn.transcriptRaw) {
      console.log('\n  Raw transcript (local only):')
      console.log(`    ${turn.transcriptRaw}`)
    }

    const outputs = app.lifecycle.outputs(id)
    if (outputs.length > 0) {
      console.log('\n  Outputs:')
      for (const output of outputs) {
        console.log(`    [${output.mode}] via ${output.provider}, ${output.promptVersion}`)
        console.log(`      ${output.text.replace(/\n/g, '\n      ')}`)
      }
    }

    if (options.history) {
      const records = app.lifecycle.redactionHistory(id)
      console.log(`\n  Redaction history (${records.length}):`)
      for (const record of records) {
        console.log(`    v${record.version} ${record.timestamp.toISOString()} ${record.inputHash}`)
      }
    }
    console.log('')
  })
}

export async function renameCommand(id: string, title: string): Promise<void> {
  await withApp(app => {
    const turn = app.lifecycle.rename(id, title)
    console.log(`${turn.id}: ${displayTitle(turn)}`)
  })
}

export async function deleteCommand(id: string): Promise<void> {
  await withApp(app => {
    const outcome = app.lifecycle.delete(id)
    console.log(outcome.deleted ? `Deleted ${id} (audio: ${outcome.audio})` : `Turn not found: ${id}`)
  })
}

// --- Redaction ---

export async function reRedactCommand(id: string): Promise<void> {
  await withApp(async app => {
    const outcome = await app.pipeline.reRedact(id)
    switch (outcome.status) {
      case 'applied':
        console.log(`Re-redacted ${id} at version ${outcome.record?.version ?? app.dictionary.version}`)
        break
      case 'unchanged':
        console.log(`${id} is already redacted with the current dictionary.`)
        break
      case 'no_source':
        console.log(`${id} has no stored text to re-redact.`)
        break
    }
  })
}

export async function dictionaryCommand(action?: string, token?: string): Promise<void> {
  await withApp(app => {
    const dictionary = app.dictionary

    if (!action || action === 'list') {
      console.log(`Dictionary v${dictionary.version} (${dictionary.tokens.length} tokens)`)
      for (const t of dictionary.tokens) console.log(`  ${t}`)
      return
    }
    if (action === 'add' && token) {
      console.log(dictionary.add(token) ? `Added. Dictionary is now v${dictionary.version}.` : 'Already present or blank.')
      return
    }
    if (action === 'remove' && token) {
      console.log(dictionary.remove(token) ? `Removed. Dictionary is now v${dictionary.version}.` : 'Not found.')
      return
    }
    if (action === 'wipe') {
      dictionary.wipe()
      console.log(`Dictionary cleared (v${dictionary.version}).`)
      return
    }
    console.log('Usage: stillpoint dict [list | add <token> | remove <token> | wipe]')
  })
}

// --- Capsule and learning ---

export async function prefsCommand(action?: string, key?: string, value?: string): Promise<void> {
  await withApp(app => {
    if (!action || action === 'list') {
      const entries = app.capsule.preferenceEntries()
      if (entries.length === 0) {
        console.log('No preferences set.')
        return
      }
      for (const entry of entries) console.log(`  ${entry.key} = ${entry.value}`)
      return
    }
    if (action === 'set' && key && value !== undefined) {
      const capsule = app.capsule.setPreference(key, value)
      console.log(`Set ${key}. Capsule is now v${capsule.version}.`)
      return
    }
    if (action === 'remove' && key) {
      const capsule = app.capsule.removePreference(key)
      console.log(`Removed ${key}. Capsule is now v${capsule.version}.`)
      return
    }
    if (action === 'wipe') {
      const capsule = app.capsule.wipe()
      console.log(`Capsule reset to defaults (v${capsule.version}).`)
      return
    }
    console.log('Usage: stillpoint prefs [list | set <key> <value> | remove <key> | wipe]')
  })
}

export async function learningCommand(action?: string): Promise<void> {
  await withApp(app => {
    switch (action) {
      case 'on':
        app.capsule.setLearningEnabled(true)
        console.log('Learning enabled.')
        return
      case 'off':
        app.capsule.setLearningEnabled(false)
        console.log('Learning disabled. Learned patterns are kept but not shared.')
        return
      case 'reset':
        app.capsule.resetLearnedProfile()
        console.log('Learned profile cleared.')
        return
      case undefined:
      case 'status': {
        const capsule = app.capsule.getOrCreate()
        console.log(`Learning: ${capsule.learningEnabled ? 'on' : 'off'}`)
        console.log(`Tendencies: ${capsule.learnedTendencies.length}`)
        for (const t of capsule.learnedTendencies) {
          console.log(`  - ${t.statement} (seen ${t.evidenceCount}x)`)
        }
        return
      }
      default:
        console.log('Usage: stillpoint learning [status | on | off | reset]')
    }
  })
}

export async function patternsCommand(options: { kind?: string; limit?: string }): Promise<void> {
  await withApp(app => {
    const kind: PatternKind | undefined = pick(PATTERN_KINDS, options.kind, 'kind')
    const patterns = app.patterns.topPatterns({
      kind,
      limit: options.limit ? parseInt(options.limit, 10) : 20
    })

    if (patterns.length === 0) {
      console.log('No patterns learned yet.')
      return
    }
    for (const p of patterns) {
      console.log(`  ${p.decayedScore.toFixed(3)}  ${p.kind}:${p.key}  (seen ${p.count}x, last ${p.lastSeenAt.toISOString()})`)
    }
  })
}

export async function snapshotCommand(options: { mode?: string }): Promise<void> {
  await withApp(app => {
    const mode: CapsuleMode = pick(['reflect', 'talk'], options.mode, 'mode') ?? 'reflect'
    console.log(JSON.stringify(project(app.capsule.getOrCreate(), mode), null, 2))
  })
}

// --- Contemplation ---

export async function reflectCommand(id: string, options: { mode?: string; fallback?: boolean }): Promise<void> {
  await withApp(async app => {
    const mode: ContemplationMode = pick(CONTEMPLATION_MODES, options.mode, 'mode') ?? 'reflect'
    const output = await app.reflector.reflect(id, mode, { fallback: options.fallback })
    console.log(`\n[${output.mode} via ${output.provider}]\n`)
    console.log(output.text)
    console.log('')
  })
}

export async function stepsCommand(kind: string, options: { programme?: string; fallback?: boolean }): Promise<void> {
  await withApp(async app => {
    const stepsKind: StepsKind = pick(['reflect', 'focus', 'practice'], kind, 'kind') ?? 'reflect'
    const response = options.fallback
      ? await app.contemplation.stepsWithFallback(stepsKind, options.programme)
      : await app.contemplation.steps(stepsKind, options.programme)

    console.log(`\n  ${response.programmeSlug} (${response.count} steps)\n`)
    for (const step of response.steps) {
      console.log(`  ${step.stepIndex}. ${step.title}`)
      console.log(`     ${step.body}`)
    }
    console.log('')
  })
}

// --- Config ---

export async function configCommand(action?: string, key?: string, value?: string): Promise<void> {
  if (!action) {
    const config = loadConfig()
    const masked = {
      ...config,
      gateway: { ...config.gateway, apiKey: config.gateway.apiKey ? '***' : undefined },
      llm: { ...config.llm, apiKey: config.llm.apiKey ? '***' : undefined }
    }
    console.log(JSON.stringify(masked, null, 2))
    const problems = validateConfig(config)
    for (const problem of problems) {
      console.warn(`[config] ${problem.field} ${problem.message}`)
    }
    return
  }

  if (action === 'set' && key && value !== undefined) {
    setConfigValue(key, value)
    console.log(`Set ${key} = ${value}`)
    return
  }

  console.log('Usage: stillpoint config [set <key> <value>]')
}
