export const TURN_STATES = [
  'queued',
  'recording',
  'captured',
  'transcribing',
  'transcribedRaw',
  'redacting',
  'ready',
  'readyPartial',
  'interrupted',
  'failed'
] as const

export type TurnState = typeof TURN_STATES[number]

export const TURN_SOURCES = ['captured', 'importedAudio', 'importedText'] as const
export type TurnSource = typeof TURN_SOURCES[number]

export const CAPTURE_CONTEXTS = ['unknown', 'handheld', 'handsfree', 'carplay', 'intent'] as const
export type CaptureContext = typeof CAPTURE_CONTEXTS[number]

export const TRANSCRIPTION_PROVIDERS = ['unknown', 'onDevice', 'server'] as const
export type TranscriptionProvider = typeof TRANSCRIPTION_PROVIDERS[number]

export const REFLECT_PROVIDERS = ['none', 'local', 'cloud', 'offline'] as const
export type ReflectProvider = typeof REFLECT_PROVIDERS[number]

export const UNTITLED = 'Untitled'

export interface TurnError {
  domain: string
  code: number
  userFacingKey: string
  debugMessage: string
}

export interface LearningSnapshot {
  observedAt?: string
  observations?: { kind: string; key: string; weight: number }[]
}

export interface Turn {
  id: string
  source: TurnSource
  recordedAt: Date
  endedAt: Date | null
  durationSeconds: number | null
  captureContext: CaptureContext

  /** User-editable. Empty string means no title has been set. */
  title: string

  audioPath: string | null
  audioBytes: number

  /** Local only, never sent anywhere. */
  transcriptRaw: string | null
  /** Canonical display text and the only text that may leave the device. */
  transcriptRedactedActive: string

  redactionVersion: number
  redactionTimestamp: Date | null
  redactionInputHash: string | null

  state: TurnState

  transcriptionProvider: TranscriptionProvider
  transcriptionLocale: string | null
  reflectProvider: ReflectProvider
  promptVersion: string | null
  toolchainVersion: string | null
  capsuleSnapshotHash: string | null

  processingStartedAt: Date | null
  processingFinishedAt: Date | null

  learningSnapshot: LearningSnapshot
  talkLastResponseId: string | null

  error: TurnError | null
}

export interface RedactionRecord {
  id: string
  turnId: string
  version: number
  timestamp: Date
  inputHash: string
  textRedacted: string
}

export const CONTEMPLATION_MODES = ['reflect', 'perspective', 'options', 'questions', 'talkItThrough'] as const
export type ContemplationMode = typeof CONTEMPLATION_MODES[number]

export interface TurnOutput {
  turnId: string
  mode: ContemplationMode
  text: string
  promptVersion: string
  provider: ReflectProvider
  updatedAt: Date
}
