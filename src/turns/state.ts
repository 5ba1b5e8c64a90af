import {
  TURN_STATES,
  TURN_SOURCES,
  CAPTURE_CONTEXTS,
  TRANSCRIPTION_PROVIDERS,
  REFLECT_PROVIDERS,
  CONTEMPLATION_MODES
} from './types.js'
import type {
  TurnState,
  TurnSource,
  CaptureContext,
  TranscriptionProvider,
  ReflectProvider,
  ContemplationMode
} from './types.js'

const TERMINAL_STATES: ReadonlySet<TurnState> = new Set(['ready', 'readyPartial', 'interrupted', 'failed'])

export function isTerminal(state: TurnState): boolean {
  return TERMINAL_STATES.has(state)
}

export function isFailure(state: TurnState): boolean {
  return state === 'failed'
}

function parseEnum<T extends string>(values: readonly T[], raw: unknown, fallback: T): T {
  for (const value of values) {
    if (value === raw) return value
  }
  return fallback
}

// Unknown stored states (written by a newer build) read back as 'interrupted':
// terminal, not a failure, so the error invariant still holds.
export function parseTurnState(raw: unknown): TurnState {
  return parseEnum(TURN_STATES, raw, 'interrupted')
}

export function parseTurnSource(raw: unknown): TurnSource {
  return parseEnum(TURN_SOURCES, raw, 'captured')
}

export function parseCaptureContext(raw: unknown): CaptureContext {
  return parseEnum(CAPTURE_CONTEXTS, raw, 'unknown')
}

export function parseTranscriptionProvider(raw: unknown): TranscriptionProvider {
  return parseEnum(TRANSCRIPTION_PROVIDERS, raw, 'unknown')
}

export function parseReflectProvider(raw: unknown): ReflectProvider {
  return parseEnum(REFLECT_PROVIDERS, raw, 'none')
}

export function parseContemplationMode(raw: unknown): ContemplationMode | null {
  for (const mode of CONTEMPLATION_MODES) {
    if (mode === raw) return mode
  }
  return null
}
