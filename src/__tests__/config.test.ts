import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { existsSync, unlinkSync, writeFileSync, readFileSync } from 'fs'
import { loadConfig, saveConfig, setConfigValue, validateConfig, DEFAULT_CONFIG } from '../config.js'
import { ValidationError } from '../errors.js'

const TEST_CONFIG = '/tmp/stillpoint-config-test.json'

describe('config', () => {
  beforeEach(() => {
    if (existsSync(TEST_CONFIG)) unlinkSync(TEST_CONFIG)
  })

  afterEach(() => {
    if (existsSync(TEST_CONFIG)) unlinkSync(TEST_CONFIG)
  })

  it('falls back to defaults when no file exists', () => {
    expect(loadConfig(TEST_CONFIG, {})).toEqual(DEFAULT_CONFIG)
  })

  it('merges the file over the defaults and drops values of the wrong type', () => {
    writeFileSync(TEST_CONFIG, JSON.stringify({
      gateway: { baseUrl: 'https://gateway.test/functions/v1', apiKey: 'test-key', listTimeoutMs: 'soon' },
      privacy: { persistRawTranscript: false },
      unknown: { x: 1 }
    }))

    const config = loadConfig(TEST_CONFIG, {})
    expect(config.gateway.baseUrl).toBe('https://gateway.test/functions/v1')
    expect(config.gateway.apiKey).toBe('test-key')
    expect(config.gateway.listTimeoutMs).toBe(DEFAULT_CONFIG.gateway.listTimeoutMs)
    expect(config.privacy.persistRawTranscript).toBe(false)
    expect(config.storage).toEqual(DEFAULT_CONFIG.storage)
  })

  it('lets the environment win over the file', () => {
    writeFileSync(TEST_CONFIG, JSON.stringify({ gateway: { baseUrl: 'https://file.test' } }))

    const config = loadConfig(TEST_CONFIG, {
      STILLPOINT_GATEWAY_URL: 'https://env.test',
      STILLPOINT_GATEWAY_KEY: 'test-secret',
      OPENAI_API_KEY: 'test-openai',
      STILLPOINT_TRACE: '1'
    })
    expect(config.gateway.baseUrl).toBe('https://env.test')
    expect(config.gateway.apiKey).toBe('test-secret')
    expect(config.llm.apiKey).toBe('test-openai')
    expect(config.trace.enabled).toBe(true)
  })

  it('does not let OPENAI_API_KEY replace a configured key', () => {
    writeFileSync(TEST_CONFIG, JSON.stringify({ llm: { apiKey: 'test-file-key' } }))
    expect(loadConfig(TEST_CONFIG, { OPENAI_API_KEY: 'test-openai' }).llm.apiKey).toBe('test-file-key')
  })

  it('falls back to the default for an unknown provider name', () => {
    writeFileSync(TEST_CONFIG, JSON.stringify({
      llm: { provider: 'anthropic' },
      contemplation: { provider: 'gatway', promptVersion: 'local-v2' }
    }))
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const config = loadConfig(TEST_CONFIG, {})
    expect(config.llm.provider).toBe('openai')
    expect(config.contemplation).toEqual({ provider: 'auto', promptVersion: 'local-v2' })
    expect(warn).toHaveBeenCalledWith('[config] Unknown contemplation.provider "gatway", using "auto"')
    expect(warn).toHaveBeenCalledTimes(2)
    warn.mockRestore()
  })

  it('ignores an unreadable file', () => {
    writeFileSync(TEST_CONFIG, '{ not json')
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    expect(loadConfig(TEST_CONFIG, {})).toEqual(DEFAULT_CONFIG)
    expect(error).toHaveBeenCalledTimes(1)
    error.mockRestore()
  })

  it('saves by merging into the existing file', () => {
    saveConfig({ trace: { enabled: true } }, TEST_CONFIG)
    saveConfig({ contemplation: { provider: 'llm', promptVersion: 'local-v2' } }, TEST_CONFIG)

    expect(JSON.parse(readFileSync(TEST_CONFIG, 'utf-8'))).toEqual({
      trace: { enabled: true },
      contemplation: { provider: 'llm', promptVersion: 'local-v2' }
    })
  })

  it('sets one value by dotted key, keeping JSON types', () => {
    setConfigValue('gateway.generativeTimeoutMs', '5000', TEST_CONFIG)
    setConfigValue('gateway.baseUrl', 'https://gateway.test', TEST_CONFIG)
    setConfigValue('privacy.persistRawTranscript', 'false', TEST_CONFIG)

    const config = loadConfig(TEST_CONFIG, {})
    expect(config.gateway.generativeTimeoutMs).toBe(5000)
    expect(config.gateway.baseUrl).toBe('https://gateway.test')
    expect(config.privacy.persistRawTranscript).toBe(false)
  })

  it('rejects an empty key', () => {
    expect(() => setConfigValue(' . ', '1', TEST_CONFIG)).toThrow(ValidationError)
  })

  describe('validateConfig', () => {
    it('accepts the defaults', () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual([])
    })

    it('flags a gateway URL without a key and bad values', () => {
      const problems = validateConfig({
        ...DEFAULT_CONFIG,
        gateway: { ...DEFAULT_CONFIG.gateway, baseUrl: 'ftp://gateway.test', listTimeoutMs: 0 },
        learning: { defaultHalfLifeDays: 0 }
      })
      expect(problems.map(p => p.field)).toEqual([
        'gateway.baseUrl',
        'gateway.apiKey',
        'gateway.listTimeoutMs',
        'learning.defaultHalfLifeDays'
      ])
    })
  })
})
