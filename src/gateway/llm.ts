import { createOpenAI } from '@ai-sdk/openai'
import { APICallError, generateText } from 'ai'
import type { LanguageModel } from 'ai'
import type { StillpointConfig } from '../config.js'
import { GatewayDecodeError, GatewayHttpError, GatewayNetworkError, GatewayUnavailableError } from '../errors.js'
import type { ExportSnapshot } from '../capsule/snapshot.js'
import type { SingleShotMode } from './cloud.js'
import { buildContemplationPrompt } from './prompts.js'

export function createLLMProvider(config: StillpointConfig['llm']): (modelId: string) => LanguageModel {
  // OpenAI, Ollama and OpenRouter all speak the OpenAI chat format
  if (config.provider !== 'ollama' && !config.apiKey) {
    throw new GatewayUnavailableError(`No API key configured for ${config.provider}`)
  }

  const openai = createOpenAI({
    apiKey: config.apiKey || 'ollama',
    baseURL: config.baseUrl || 'https://api.openai.com/v1',
    name: config.provider
  })

  // chat() rather than the default Responses API, which only OpenAI serves
  return (modelId: string) => openai.chat(modelId)
}

export function isLLMConfigured(config: StillpointConfig['llm']): boolean {
  return config.provider === 'ollama' || Boolean(config.apiKey)
}

export interface LocalContemplation {
  text: string
  promptVersion: string
}

/** Runs a single-shot mode against the configured chat model. */
export async function contemplateLocally(
  config: StillpointConfig['llm'],
  promptVersion: string,
  mode: SingleShotMode,
  text: string,
  snapshot?: ExportSnapshot
): Promise<LocalContemplation> {
  const model = createLLMProvider(config)(config.model)
  const endpoint = `llm:${mode}`

  let completion: string
  try {
    const result = await generateText({
      model,
      prompt: buildContemplationPrompt(mode, text, snapshot),
      maxOutputTokens: 800
    })
    completion = result.text.trim()
  } catch (e) {
    console.error(`[gateway] ${endpoint} failed:`, e)
    if (APICallError.isInstance(e) && e.statusCode !== undefined) {
      throw new GatewayHttpError(e.statusCode, e.responseBody ?? '', endpoint)
    }
    throw new GatewayNetworkError(endpoint, e)
  }

  if (!completion) throw new GatewayDecodeError(endpoint, new Error('Empty completion'))
  return { text: completion, promptVersion }
}
