import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { existsSync, unlinkSync, writeFileSync } from 'fs'
import { ContemplationService, seedContemplation, seedSteps } from '../service.js'
import type { LocalRunner } from '../service.js'
import { GatewayClient } from '../cloud.js'
import { DEFAULT_CONFIG, loadConfig } from '../../config.js'
import type { StillpointConfig, ContemplationProviderSetting } from '../../config.js'
import { GatewayUnavailableError, GatewayHttpError, ValidationError } from '../../errors.js'

const BASE = 'https://gateway.test/functions/v1'

function configWith(options: { gateway?: boolean; llm?: boolean; provider?: ContemplationProviderSetting } = {}): StillpointConfig {
  return {
    ...DEFAULT_CONFIG,
    gateway: options.gateway
      ? { ...DEFAULT_CONFIG.gateway, baseUrl: BASE, apiKey: 'test-key' }
      : DEFAULT_CONFIG.gateway,
    llm: options.llm ? { ...DEFAULT_CONFIG.llm, apiKey: 'test-key' } : DEFAULT_CONFIG.llm,
    contemplation: { ...DEFAULT_CONFIG.contemplation, provider: options.provider ?? 'auto' }
  }
}

function respondWith(body: unknown, status = 200) {
  return vi.fn<typeof fetch>(async () =>
    new Response(typeof body === 'string' ? body : JSON.stringify(body), { status }))
}

function serviceFor(config: StillpointConfig, fetchImpl: typeof fetch, local?: LocalRunner): ContemplationService {
  return new ContemplationService(config, new GatewayClient(config.gateway, { fetch: fetchImpl }), local)
}

describe('ContemplationService', () => {
  const local = vi.fn<LocalRunner>(async () => ({ text: 'local reply', promptVersion: 'local-v1' }))

  beforeEach(() => {
    local.mockClear()
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('route', () => {
    it('prefers the gateway, then the local model, when set to auto', () => {
      expect(serviceFor(configWith({ gateway: true, llm: true }), respondWith({})).route('reflect')).toBe('cloud')
      expect(serviceFor(configWith({ llm: true }), respondWith({})).route('reflect')).toBe('local')
      expect(() => serviceFor(configWith(), respondWith({})).route('reflect')).toThrow(GatewayUnavailableError)
    })

    it('follows an explicit provider setting', () => {
      expect(serviceFor(configWith({ gateway: true, provider: 'llm' }), respondWith({})).route('options')).toBe('local')
      expect(serviceFor(configWith({ provider: 'cloud' }), respondWith({})).route('options')).toBe('cloud')
    })

    it('uses the gateway when the provider setting is misspelled', async () => {
      const configPath = '/tmp/stillpoint-service-config.json'
      writeFileSync(configPath, JSON.stringify({
        gateway: { baseUrl: BASE, apiKey: 'test-key' },
        llm: { apiKey: 'test-key' },
        contemplation: { provider: 'gatway' }
      }))
      try {
        const config = loadConfig(configPath, {})
        const fetchMock = respondWith({ text: 'cloud reply', prompt_version: 'reflect-v4' })
        const service = serviceFor(config, fetchMock, local)

        expect(service.route('reflect')).toBe('cloud')
        expect((await service.generate({ mode: 'reflect', text: 'I feel stuck' })).provider).toBe('cloud')
        expect(local).not.toHaveBeenCalled()
      } finally {
        if (existsSync(configPath)) unlinkSync(configPath)
      }
    })

    it('sends talk it through only to the gateway', () => {
      expect(serviceFor(configWith({ gateway: true, provider: 'llm' }), respondWith({})).route('talkItThrough')).toBe('cloud')
      expect(() => serviceFor(configWith({ llm: true }), respondWith({})).route('talkItThrough'))
        .toThrow(GatewayUnavailableError)
    })
  })

  it('returns the gateway text and prompt version', async () => {
    const fetchMock = respondWith({ text: 'cloud reply', prompt_version: 'reflect-v4' })
    const service = serviceFor(configWith({ gateway: true }), fetchMock, local)

    const result = await service.generate({ mode: 'perspective', text: 'I feel stuck at work' })
    expect(result).toEqual({
      mode: 'perspective',
      text: 'cloud reply',
      promptVersion: 'reflect-v4',
      provider: 'cloud',
      responseId: null
    })
    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body))).toEqual({
      text: 'I feel stuck at work',
      client: 'stillpoint-cli',
      appVersion: '0.1.0'
    })
    expect(local).not.toHaveBeenCalled()
  })

  it('forwards the previous response id for talk it through', async () => {
    const fetchMock = respondWith({ text: 'go on', prompt_version: 'talk-v2', response_id: 'resp-2' })
    const service = serviceFor(configWith({ gateway: true }), fetchMock)

    const result = await service.generate({ mode: 'talkItThrough', text: 'hello', previousResponseId: 'resp-1' })
    expect(result.responseId).toBe('resp-2')
    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body)).previous_response_id).toBe('resp-1')
  })

  it('runs the local model when routed there', async () => {
    const service = serviceFor(configWith({ llm: true }), respondWith({}), local)

    const result = await service.generate({ mode: 'questions', text: 'hello' })
    expect(result).toEqual({
      mode: 'questions',
      text: 'local reply',
      promptVersion: 'local-v1',
      provider: 'local',
      responseId: null
    })
    expect(local).toHaveBeenCalledWith('questions', 'hello', undefined)
  })

  describe('generateWithFallback', () => {
    it('uses seed content when the gateway fails', async () => {
      const service = serviceFor(configWith({ gateway: true }), respondWith('down', 503))

      await expect(service.generate({ mode: 'reflect', text: 'hello' })).rejects.toThrow(GatewayHttpError)
      const result = await service.generateWithFallback({ mode: 'reflect', text: 'hello' })
      expect(result).toEqual(seedContemplation('reflect', 'hello'))
      expect(result.provider).toBe('offline')
      expect(result.promptVersion).toBe('seed-v1')
    })

    it('uses seed content when nothing is configured', async () => {
      const service = serviceFor(configWith(), respondWith({}))
      const result = await service.generateWithFallback({ mode: 'talkItThrough', text: 'hello' })
      expect(result.provider).toBe('offline')
      expect(result.responseId).toBeNull()
    })

    it('lets other errors through', async () => {
      const failing = vi.fn<LocalRunner>(async () => {
        throw new ValidationError('text', 'bad')
      })
      const service = serviceFor(configWith({ llm: true }), respondWith({}), failing)
      await expect(service.generateWithFallback({ mode: 'reflect', text: 'hello' })).rejects.toThrow(ValidationError)
    })
  })

  it('falls back to seed steps', async () => {
    const service = serviceFor(configWith({ gateway: true }), respondWith('down', 500))
    const steps = await service.stepsWithFallback('reflect')

    expect(steps).toEqual(seedSteps('reflect', 'seed'))
    expect(steps.count).toBe(5)
    expect(steps.steps.map(s => s.stepIndex)).toEqual([1, 2, 3, 4, 5])
  })
})

describe('seedContemplation', () => {
  it('picks the same seed for the same text', () => {
    expect(seedContemplation('options', 'same text')).toEqual(seedContemplation('options', 'same text'))
    expect(seedContemplation('options', 'same text').text).not.toBe('')
  })
})
