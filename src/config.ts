import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs'
import { homedir } from 'node:os'
import path from 'node:path'
import { ValidationError } from './errors.js'

export const LLM_PROVIDERS = ['openai', 'ollama', 'openrouter'] as const
export const CONTEMPLATION_PROVIDERS = ['auto', 'cloud', 'llm'] as const

export type LLMProviderName = typeof LLM_PROVIDERS[number]
export type ContemplationProviderSetting = typeof CONTEMPLATION_PROVIDERS[number]

export interface StillpointConfig {
  gateway: {
    /** Functions root, e.g. https://example.test/functions/v1. Empty disables cloud calls. */
    baseUrl: string
    apiKey?: string
    client: string
    appVersion: string
    generativeTimeoutMs: number
    listTimeoutMs: number
  }
  llm: {
    provider: LLMProviderName
    model: string
    apiKey?: string
    baseUrl?: string
  }
  contemplation: {
    provider: ContemplationProviderSetting
    promptVersion: string
  }
  privacy: {
    /** Keep the unredacted transcript on this machine. It is never sent anywhere. */
    persistRawTranscript: boolean
  }
  learning: {
    defaultHalfLifeDays: number
  }
  storage: {
    dbPath: string
    dictionaryPath: string
  }
  trace: {
    enabled: boolean
  }
}

export const DEFAULT_CONFIG: StillpointConfig = {
  gateway: {
    baseUrl: '',
    client: 'stillpoint-cli',
    appVersion: '0.1.0',
    generativeTimeoutMs: 90_000,
    listTimeoutMs: 30_000
  },
  llm: {
    provider: 'openai',
    model: 'gpt-4o-mini',
    baseUrl: 'https://api.openai.com/v1'
  },
  contemplation: {
    provider: 'auto',
    promptVersion: 'local-v1'
  },
  privacy: {
    persistRawTranscript: true
  },
  learning: {
    defaultHalfLifeDays: 14
  },
  storage: {
    dbPath: '~/.stillpoint/stillpoint.db',
    dictionaryPath: '~/.stillpoint/redaction-dictionary.json'
  },
  trace: {
    enabled: false
  }
}

export const CONFIG_DIR = path.join(homedir(), '.stillpoint')
const CONFIG_PATH = path.join(CONFIG_DIR, 'config.json')

type JsonObject = { [key: string]: unknown }

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function deepMerge(target: JsonObject, source: JsonObject): JsonObject {
  const result: JsonObject = { ...target }
  for (const key of Object.keys(source)) {
    const incoming = source[key]
    const current = target[key]
    if (isObject(incoming)) {
      result[key] = deepMerge(isObject(current) ? current : {}, incoming)
    } else if (incoming !== undefined) {
      result[key] = incoming
    }
  }
  return result
}

function readSection<T extends object>(defaults: T, value: unknown, optionalStrings: string[] = []): T {
  const out: T = { ...defaults }
  if (!isObject(value)) return out
  for (const key of Object.keys(defaults)) {
    if (!Object.hasOwn(value, key)) continue
    const incoming = value[key]
    const fallback: unknown = Reflect.get(defaults, key)
    if (incoming !== undefined && (fallback === undefined || typeof incoming === typeof fallback)) {
      Reflect.set(out, key, incoming)
    }
  }
  // Optional fields have no default to compare against
  for (const key of optionalStrings) {
    if (typeof value[key] === 'string') Reflect.set(out, key, value[key])
  }
  return out
}

function oneOf<T extends string>(allowed: readonly T[], value: string, fallback: T, field: string): T {
  const match = allowed.find(a => a === value)
  if (match !== undefined) return match
  console.warn(`[config] Unknown ${field} "${value}", using "${fallback}"`)
  return fallback
}

/**
 * Copies each known section over the defaults, keeping only values of the
 * default's type. Unknown provider names fall back to the default.
 */
function fromJSON(raw: JsonObject): StillpointConfig {
  const llm = readSection(DEFAULT_CONFIG.llm, raw.llm, ['apiKey'])
  const contemplation = readSection(DEFAULT_CONFIG.contemplation, raw.contemplation)
  llm.provider = oneOf(LLM_PROVIDERS, llm.provider, DEFAULT_CONFIG.llm.provider, 'llm.provider')
  contemplation.provider = oneOf(
    CONTEMPLATION_PROVIDERS,
    contemplation.provider,
    DEFAULT_CONFIG.contemplation.provider,
    'contemplation.provider'
  )

  return {
    gateway: readSection(DEFAULT_CONFIG.gateway, raw.gateway, ['apiKey']),
    llm,
    contemplation,
    privacy: readSection(DEFAULT_CONFIG.privacy, raw.privacy),
    learning: readSection(DEFAULT_CONFIG.learning, raw.learning),
    storage: readSection(DEFAULT_CONFIG.storage, raw.storage),
    trace: readSection(DEFAULT_CONFIG.trace, raw.trace)
  }
}

export function expandHome(p: string): string {
  return p.startsWith('~') ? path.join(homedir(), p.slice(1)) : p
}

export function loadConfig(configPath: string = CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): StillpointConfig {
  let fileConfig: JsonObject = {}

  if (existsSync(configPath)) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'))
      if (isObject(parsed)) fileConfig = parsed
    } catch (e) {
      console.error('[config] Failed to load config:', e)
    }
  }

  const merged = fromJSON(fileConfig)

  // Environment wins over the file
  if (env.STILLPOINT_GATEWAY_URL) merged.gateway.baseUrl = env.STILLPOINT_GATEWAY_URL
  if (env.STILLPOINT_GATEWAY_KEY) merged.gateway.apiKey = env.STILLPOINT_GATEWAY_KEY
  if (env.OPENAI_API_KEY && !merged.llm.apiKey) merged.llm.apiKey = env.OPENAI_API_KEY
  if (env.STILLPOINT_TRACE === '1' || env.STILLPOINT_TRACE === 'true') merged.trace.enabled = true

  return merged
}

function readExisting(configPath: string): JsonObject {
  if (!existsSync(configPath)) return {}
  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'))
    if (isObject(parsed)) return parsed
  } catch {
    console.warn('[config] Existing config is unreadable, starting fresh')
  }
  return {}
}

function writeMerged(incoming: JsonObject, configPath: string): void {
  mkdirSync(path.dirname(configPath), { recursive: true })
  writeFileSync(configPath, JSON.stringify(deepMerge(readExisting(configPath), incoming), null, 2))
}

export function saveConfig(config: Partial<StillpointConfig>, configPath: string = CONFIG_PATH): void {
  writeMerged({ ...config }, configPath)
}

/**
 * Sets one value by dotted key, e.g. `gateway.baseUrl`. The value is read
 * as JSON when it parses, so numbers and booleans keep their type.
 */
export function setConfigValue(dottedKey: string, raw: string, configPath: string = CONFIG_PATH): void {
  const parts = dottedKey.split('.').map(p => p.trim()).filter(Boolean)
  if (parts.length === 0) throw new ValidationError('key', 'Config key is empty')

  let value: unknown
  try {
    value = JSON.parse(raw)
  } catch {
    value = raw
  }

  const root: JsonObject = {}
  let current = root
  for (const part of parts.slice(0, -1)) {
    const next: JsonObject = {}
    current[part] = next
    current = next
  }
  current[parts[parts.length - 1]] = value
  writeMerged(root, configPath)
}

export interface ConfigProblem {
  field: string
  message: string
}

export function validateConfig(config: StillpointConfig): ConfigProblem[] {
  const problems: ConfigProblem[] = []

  if (config.gateway.baseUrl) {
    try {
      const url = new URL(config.gateway.baseUrl)
      if (url.protocol !== 'https:' && url.protocol !== 'http:') {
        problems.push({ field: 'gateway.baseUrl', message: 'must be an http(s) URL' })
      }
    } catch {
      problems.push({ field: 'gateway.baseUrl', message: 'is not a valid URL' })
    }
    if (!config.gateway.apiKey) {
      problems.push({ field: 'gateway.apiKey', message: 'is required when gateway.baseUrl is set' })
    }
  }
  if (config.gateway.generativeTimeoutMs <= 0) {
    problems.push({ field: 'gateway.generativeTimeoutMs', message: 'must be positive' })
  }
  if (config.gateway.listTimeoutMs <= 0) {
    problems.push({ field: 'gateway.listTimeoutMs', message: 'must be positive' })
  }
  if (!LLM_PROVIDERS.some(p => p === config.llm.provider)) {
    problems.push({ field: 'llm.provider', message: `unknown provider "${config.llm.provider}"` })
  }
  if (!CONTEMPLATION_PROVIDERS.some(p => p === config.contemplation.provider)) {
    problems.push({ field: 'contemplation.provider', message: `unknown provider "${config.contemplation.provider}"` })
  }
  if (!(config.learning.defaultHalfLifeDays >= 1)) {
    problems.push({ field: 'learning.defaultHalfLifeDays', message: 'must be at least 1 day' })
  }
  if (!config.storage.dbPath) {
    problems.push({ field: 'storage.dbPath', message: 'is required' })
  }
  if (!config.storage.dictionaryPath) {
    problems.push({ field: 'storage.dictionaryPath', message: 'is required' })
  }

  return problems
}
