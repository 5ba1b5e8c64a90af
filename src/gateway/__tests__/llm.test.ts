import { describe, it, expect } from 'vitest'
import { createLLMProvider, isLLMConfigured, contemplateLocally } from '../llm.js'
import { buildContemplationPrompt } from '../prompts.js'
import { DEFAULT_CONFIG } from '../../config.js'
import { GatewayUnavailableError } from '../../errors.js'

describe('LLM Provider', () => {
  it('creates an OpenAI-compatible provider for openai', () => {
    const provider = createLLMProvider({
      ...DEFAULT_CONFIG.llm,
      provider: 'openai',
      apiKey: 'test-key'
    })
    expect(typeof provider).toBe('function')
  })

  it('creates an OpenAI-compatible provider for ollama without a key', () => {
    const provider = createLLMProvider({
      ...DEFAULT_CONFIG.llm,
      provider: 'ollama',
      baseUrl: 'http://localhost:11434/v1'
    })
    expect(typeof provider).toBe('function')
  })

  it('creates an OpenAI-compatible provider for openrouter', () => {
    const provider = createLLMProvider({
      ...DEFAULT_CONFIG.llm,
      provider: 'openrouter',
      baseUrl: 'https://openrouter.ai/api/v1',
      apiKey: 'test-key'
    })
    expect(typeof provider).toBe('function')
  })

  it('throws when a hosted provider has no key', () => {
    expect(() => createLLMProvider({ ...DEFAULT_CONFIG.llm, provider: 'openrouter' }))
      .toThrow(GatewayUnavailableError)
  })

  it('reports whether it is configured', () => {
    expect(isLLMConfigured(DEFAULT_CONFIG.llm)).toBe(false)
    expect(isLLMConfigured({ ...DEFAULT_CONFIG.llm, apiKey: 'test-key' })).toBe(true)
    expect(isLLMConfigured({ ...DEFAULT_CONFIG.llm, provider: 'ollama' })).toBe(true)
  })

  it('fails before any request when unconfigured', async () => {
    await expect(contemplateLocally(DEFAULT_CONFIG.llm, 'local-v1', 'reflect', 'text'))
      .rejects.toThrow(GatewayUnavailableError)
  })
})

describe('buildContemplationPrompt', () => {
  it('includes the text and the mode instructions', () => {
    const prompt = buildContemplationPrompt('questions', 'I feel stuck at work')
    expect(prompt).toContain('Ask three open questions')
    expect(prompt).toContain('"""\nI feel stuck at work\n"""')
    expect(prompt).not.toContain('Preferences to respect')
  })

  it('lists preferences and learned cues', () => {
    const prompt = buildContemplationPrompt('options', 'text', {
      version: 2,
      updatedAt: '2026-01-01T00:00:00.000Z',
      preferences: { output_style: 'bullets' },
      learnedCues: [{ statement: 'Prefers checklists', evidenceCount: 2, lastSeenAtISO: '2026-01-01T00:00:00.000Z' }]
    })
    expect(prompt).toContain('Preferences to respect:\n- output_style: bullets\n- tends to: Prefers checklists\n')
  })
})
