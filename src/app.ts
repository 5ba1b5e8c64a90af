import { mkdirSync } from 'node:fs'
import path from 'node:path'
import { Database } from './storage/database.js'
import { expandHome } from './config.js'
import type { StillpointConfig } from './config.js'
import { TurnLifecycle } from './turns/lifecycle.js'
import { CapturePipeline } from './turns/pipeline.js'
import { RedactionDictionary } from './redaction/dictionary.js'
import { PatternStore } from './learning/patterns.js'
import { CapsuleManager } from './capsule/capsule.js'
import { GatewayClient } from './gateway/cloud.js'
import type { GatewayClientOptions } from './gateway/cloud.js'
import { GatewayTrace } from './gateway/trace.js'
import { ContemplationService } from './gateway/service.js'
import type { LocalRunner } from './gateway/service.js'
import { TurnReflector } from './gateway/reflector.js'
import { KeyedLock } from './util/keyed-lock.js'

export const TOOLCHAIN_VERSION = 'stillpoint-0.1.0'

export interface Stillpoint {
  config: StillpointConfig
  db: Database
  lifecycle: TurnLifecycle
  dictionary: RedactionDictionary
  patterns: PatternStore
  capsule: CapsuleManager
  pipeline: CapturePipeline
  gateway: GatewayClient
  contemplation: ContemplationService
  reflector: TurnReflector
  close(): void
}

export interface AppOverrides {
  fetch?: GatewayClientOptions['fetch']
  local?: LocalRunner
}

/** Builds every service over one database. One lock is shared by all per-Turn work. */
export function createApp(config: StillpointConfig, overrides: AppOverrides = {}): Stillpoint {
  const dbPath = expandHome(config.storage.dbPath)
  const dictionaryPath = expandHome(config.storage.dictionaryPath)
  if (dbPath !== ':memory:') mkdirSync(path.dirname(dbPath), { recursive: true })

  const db = new Database(dbPath)
  const lock = new KeyedLock()

  const lifecycle = new TurnLifecycle(db, {
    persistRawTranscript: config.privacy.persistRawTranscript,
    toolchainVersion: TOOLCHAIN_VERSION
  })
  const dictionary = new RedactionDictionary(dictionaryPath)
  const patterns = new PatternStore(db, { defaultHalfLifeDays: config.learning.defaultHalfLifeDays })
  const capsule = new CapsuleManager(db, patterns)
  const pipeline = new CapturePipeline({ db, lifecycle, dictionary, patterns, capsule, lock })

  const gateway = new GatewayClient(config.gateway, {
    fetch: overrides.fetch,
    trace: new GatewayTrace(config.trace.enabled)
  })
  const contemplation = new ContemplationService(config, gateway, overrides.local)
  const reflector = new TurnReflector(lifecycle, capsule, contemplation, lock)

  return {
    config,
    db,
    lifecycle,
    dictionary,
    patterns,
    capsule,
    pipeline,
    gateway,
    contemplation,
    reflector,
    close: () => db.close()
  }
}
