import { readFileSync } from 'node:fs'
import { z } from 'zod'
import type { StillpointConfig } from '../config.js'
import { GatewayUnavailableError, isGatewayError } from '../errors.js'
import { CONTEMPLATION_MODES } from '../turns/types.js'
import type { ContemplationMode, ReflectProvider } from '../turns/types.js'
import { buildReflectRequest, buildTalkRequest } from '../capsule/snapshot.js'
import type { ExportSnapshot } from '../capsule/snapshot.js'
import { fnv1a64 } from '../util/hash.js'
import { GatewayClient } from './cloud.js'
import type { SingleShotMode, StepsKind, StepsResponse } from './cloud.js'
import { contemplateLocally, isLLMConfigured } from './llm.js'
import type { LocalContemplation } from './llm.js'

const seedStep = z.object({ title: z.string(), body: z.string() })

const seedsSchema = z.object({
  promptVersion: z.string(),
  contemplations: z.record(z.enum(CONTEMPLATION_MODES), z.array(z.string()).min(1)),
  steps: z.record(z.enum(['reflect', 'focus', 'practice']), z.array(seedStep))
})

type Seeds = z.infer<typeof seedsSchema>

const SEEDS_URL = new URL('../../data/seeds.json', import.meta.url)

let cachedSeeds: Seeds | null = null

function loadSeeds(): Seeds {
  if (!cachedSeeds) {
    cachedSeeds = seedsSchema.parse(JSON.parse(readFileSync(SEEDS_URL, 'utf-8')))
  }
  return cachedSeeds
}

export interface ContemplationRequest {
  mode: ContemplationMode
  /** Redacted text only. */
  text: string
  recordedAt?: Date | null
  snapshot?: ExportSnapshot
  previousResponseId?: string | null
}

export interface ContemplationResult {
  mode: ContemplationMode
  text: string
  promptVersion: string
  provider: ReflectProvider
  responseId: string | null
}

export type LocalRunner = (mode: SingleShotMode, text: string, snapshot?: ExportSnapshot) => Promise<LocalContemplation>

type Route = 'cloud' | 'local'

/**
 * Picks a provider per mode and runs it. Talk it through is multi-turn and
 * only the gateway carries it.
 */
export class ContemplationService {
  private config: StillpointConfig
  private gateway: GatewayClient
  private local: LocalRunner

  constructor(config: StillpointConfig, gateway: GatewayClient, local?: LocalRunner) {
    this.config = config
    this.gateway = gateway
    this.local = local ?? ((mode, text, snapshot) =>
      contemplateLocally(config.llm, config.contemplation.promptVersion, mode, text, snapshot))
  }

  route(mode: ContemplationMode): Route {
    if (mode === 'talkItThrough') {
      if (!this.gateway.isConfigured()) {
        throw new GatewayUnavailableError('Talk it through needs the gateway to be configured')
      }
      return 'cloud'
    }

    switch (this.config.contemplation.provider) {
      case 'cloud':
        return 'cloud'
      case 'llm':
        return 'local'
      case 'auto':
        if (this.gateway.isConfigured()) return 'cloud'
        if (isLLMConfigured(this.config.llm)) return 'local'
        throw new GatewayUnavailableError('No contemplation provider is configured')
      default:
        throw new GatewayUnavailableError(`Unknown contemplation provider "${String(this.config.contemplation.provider)}"`)
    }
  }

  async generate(request: ContemplationRequest): Promise<ContemplationResult> {
    const route = this.route(request.mode)
    const context = {
      text: request.text,
      recordedAt: request.recordedAt,
      client: this.config.gateway.client,
      appVersion: this.config.gateway.appVersion,
      snapshot: request.snapshot
    }

    if (request.mode === 'talkItThrough') {
      const response = await this.gateway.talkItThrough(
        buildTalkRequest({ ...context, previousResponseId: request.previousResponseId })
      )
      return {
        mode: request.mode,
        text: response.text,
        promptVersion: response.prompt_version,
        provider: 'cloud',
        responseId: response.response_id
      }
    }

    if (route === 'cloud') {
      const response = await this.gateway.generate(request.mode, buildReflectRequest(context))
      return {
        mode: request.mode,
        text: response.text,
        promptVersion: response.prompt_version,
        provider: 'cloud',
        responseId: null
      }
    }

    const local = await this.local(request.mode, request.text, request.snapshot)
    return {
      mode: request.mode,
      text: local.text,
      promptVersion: local.promptVersion,
      provider: 'local',
      responseId: null
    }
  }

  /** Remote failures become seed content. Local failures still throw. */
  async generateWithFallback(request: ContemplationRequest): Promise<ContemplationResult> {
    try {
      return await this.generate(request)
    } catch (e) {
      if (!isGatewayError(e)) throw e
      console.warn(`[gateway] ${request.mode} unavailable, using seed content: ${e.message}`)
      return seedContemplation(request.mode, request.text)
    }
  }

  async steps(kind: StepsKind, programme?: string): Promise<StepsResponse> {
    return this.gateway.steps(kind, programme)
  }

  async stepsWithFallback(kind: StepsKind, programme?: string): Promise<StepsResponse> {
    try {
      return await this.gateway.steps(kind, programme)
    } catch (e) {
      if (!isGatewayError(e)) throw e
      console.warn(`[gateway] ${kind} steps unavailable, using seed list: ${e.message}`)
      return seedSteps(kind, programme ?? 'seed')
    }
  }
}

/** Same text always picks the same seed. */
export function seedContemplation(mode: ContemplationMode, text: string): ContemplationResult {
  const seeds = loadSeeds()
  const options = seeds.contemplations[mode] ?? []
  const index = options.length > 0 ? parseInt(fnv1a64(text).slice(-8), 16) % options.length : 0

  return {
    mode,
    text: options[index] ?? '',
    promptVersion: seeds.promptVersion,
    provider: 'offline',
    responseId: null
  }
}

export function seedSteps(kind: StepsKind, programme: string): StepsResponse {
  const steps = loadSeeds().steps[kind] ?? []
  return {
    programmeSlug: programme,
    count: steps.length,
    maxVersion: 0,
    steps: steps.map((step, i) => ({ stepIndex: i + 1, title: step.title, body: step.body }))
  }
}
