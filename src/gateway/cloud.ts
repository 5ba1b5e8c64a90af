import { z } from 'zod'
import type { StillpointConfig } from '../config.js'
import type { ReflectRequest, TalkRequest } from '../capsule/snapshot.js'
import {
  GatewayUnavailableError,
  GatewayHttpError,
  GatewayDecodeError,
  GatewayNetworkError
} from '../errors.js'
import { GatewayTrace } from './trace.js'

export const reflectResponseSchema = z.object({
  text: z.string(),
  prompt_version: z.string()
})

export const talkResponseSchema = reflectResponseSchema.extend({
  response_id: z.string()
})

export const stepsResponseSchema = z.object({
  programmeSlug: z.string(),
  count: z.number().int(),
  maxVersion: z.number().int(),
  steps: z.array(z.object({
    stepIndex: z.number().int(),
    title: z.string(),
    body: z.string(),
    tags: z.array(z.string()).nullish(),
    version: z.number().int().nullish()
  }))
})

export type ReflectResponse = z.infer<typeof reflectResponseSchema>
export type TalkResponse = z.infer<typeof talkResponseSchema>
export type StepsResponse = z.infer<typeof stepsResponseSchema>

export type SingleShotMode = 'reflect' | 'perspective' | 'options' | 'questions'
export type StepsKind = 'reflect' | 'focus' | 'practice'

export const SINGLE_SHOT_ENDPOINTS: Record<SingleShotMode, string> = {
  reflect: 'cloudtap-reflect',
  perspective: 'cloudtap-clarity-perspective',
  options: 'cloudtap-options',
  questions: 'cloudtap-questions'
}
export const TALK_ENDPOINT = 'cloudtap-talkitthrough'

const STEPS_ENDPOINTS: Record<StepsKind, string> = {
  reflect: 'reflect-steps',
  focus: 'focus-steps',
  practice: 'practice-steps'
}
export const DEFAULT_PROGRAMMES: Record<StepsKind, string> = {
  reflect: 'starter_5day',
  focus: 'core',
  practice: 'core'
}

const ENDPOINT_PREFIX = 'cloudtap-'

/**
 * Endpoints sit beside each other under the functions root. A base URL that
 * already names one endpoint has that segment replaced.
 */
export function resolveEndpointURL(base: URL, endpoint: string): URL {
  const url = new URL(base.href)
  const segments = url.pathname.split('/').filter(Boolean)
  if (segments.length > 0 && segments[segments.length - 1].startsWith(ENDPOINT_PREFIX)) {
    segments.pop()
  }
  segments.push(endpoint)
  url.pathname = `/${segments.join('/')}`
  url.search = ''
  url.hash = ''
  return url
}

export interface GatewayClientOptions {
  fetch?: typeof fetch
  trace?: GatewayTrace
}

interface SendOptions {
  method: 'GET' | 'POST'
  body?: string
  query?: Record<string, string>
  timeoutMs: number
}

export class GatewayClient {
  private config: StillpointConfig['gateway']
  private fetchImpl: typeof fetch
  private trace: GatewayTrace

  constructor(config: StillpointConfig['gateway'], options: GatewayClientOptions = {}) {
    this.config = config
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))
    this.trace = options.trace ?? new GatewayTrace(false)
  }

  isConfigured(): boolean {
    return Boolean(this.config.baseUrl.trim() && this.config.apiKey?.trim())
  }

  async generate(mode: SingleShotMode, request: ReflectRequest): Promise<ReflectResponse> {
    return this.post(SINGLE_SHOT_ENDPOINTS[mode], request, reflectResponseSchema)
  }

  async reflect(request: ReflectRequest): Promise<ReflectResponse> {
    return this.generate('reflect', request)
  }

  async perspective(request: ReflectRequest): Promise<ReflectResponse> {
    return this.generate('perspective', request)
  }

  async options(request: ReflectRequest): Promise<ReflectResponse> {
    return this.generate('options', request)
  }

  async questions(request: ReflectRequest): Promise<ReflectResponse> {
    return this.generate('questions', request)
  }

  async talkItThrough(request: TalkRequest): Promise<TalkResponse> {
    return this.post(TALK_ENDPOINT, request, talkResponseSchema)
  }

  async steps(kind: StepsKind, programme: string = DEFAULT_PROGRAMMES[kind]): Promise<StepsResponse> {
    return this.send(STEPS_ENDPOINTS[kind], stepsResponseSchema, {
      method: 'GET',
      query: { programme },
      timeoutMs: this.config.listTimeoutMs
    })
  }

  private async post<T>(endpoint: string, request: ReflectRequest | TalkRequest, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    return this.send(endpoint, schema, {
      method: 'POST',
      body: JSON.stringify(request),
      timeoutMs: this.config.generativeTimeoutMs
    })
  }

  private resolveBase(): { base: URL; apiKey: string } {
    const baseUrl = this.config.baseUrl.trim()
    const apiKey = this.config.apiKey?.trim()
    if (!baseUrl) throw new GatewayUnavailableError('Gateway URL is not configured')
    if (!apiKey) throw new GatewayUnavailableError('Gateway key is not configured')

    let base: URL
    try {
      base = new URL(baseUrl)
    } catch {
      throw new GatewayUnavailableError(`Gateway URL is invalid: ${baseUrl}`)
    }
    if (base.protocol !== 'https:' && base.protocol !== 'http:') {
      throw new GatewayUnavailableError(`Gateway URL must be http(s): ${baseUrl}`)
    }
    return { base, apiKey }
  }

  private async send<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: SendOptions): Promise<T> {
    const { base, apiKey } = this.resolveBase()
    const url = resolveEndpointURL(base, endpoint)
    for (const [name, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(name, value)
    }

    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: `Bearer ${apiKey}`,
      apikey: apiKey
    }
    if (options.body !== undefined) headers['Content-Type'] = 'application/json'

    this.trace.request(endpoint, options.body)

    let response: Response
    let text: string
    try {
      response = await this.fetchImpl(url, {
        method: options.method,
        headers,
        body: options.body,
        signal: AbortSignal.timeout(options.timeoutMs)
      })
      text = await response.text()
    } catch (e) {
      console.error(`[gateway] ${endpoint} request failed:`, e)
      throw new GatewayNetworkError(endpoint, e)
    }

    this.trace.response(endpoint, text)

    if (!response.ok) {
      console.error(`[gateway] ${endpoint} responded ${response.status}`)
      throw new GatewayHttpError(response.status, text, endpoint)
    }

    let json: unknown
    try {
      json = JSON.parse(text)
    } catch (e) {
      throw new GatewayDecodeError(endpoint, e)
    }

    const parsed = schema.safeParse(json)
    if (!parsed.success) {
      throw new GatewayDecodeError(endpoint, parsed.error)
    }
    return parsed.data
  }
}
