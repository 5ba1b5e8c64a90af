import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { createApp } from '../../app.js'
import type { Stillpoint } from '../../app.js'
import { DEFAULT_CONFIG } from '../../config.js'
import type { StillpointConfig } from '../../config.js'
import { project, snapshotHash } from '../../capsule/snapshot.js'
import { GatewayHttpError, ValidationError } from '../../errors.js'

const CONFIG: StillpointConfig = {
  ...DEFAULT_CONFIG,
  gateway: { ...DEFAULT_CONFIG.gateway, baseUrl: 'https://gateway.test/functions/v1', apiKey: 'test-key' },
  storage: { dbPath: ':memory:', dictionaryPath: '/tmp/stillpoint-reflector-dictionary.json' }
}

describe('TurnReflector', () => {
  let app: Stillpoint
  const fetchMock = vi.fn<typeof fetch>()

  beforeEach(() => {
    fetchMock.mockReset()
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    app = createApp(CONFIG, { fetch: fetchMock })
  })

  afterEach(() => {
    app.close()
    vi.restoreAllMocks()
  })

  function respond(body: unknown, status = 200): void {
    fetchMock.mockImplementationOnce(async () =>
      new Response(typeof body === 'string' ? body : JSON.stringify(body), { status }))
  }

  it('stores the output with the snapshot hash that went out', async () => {
    app.capsule.update({ outputStyle: 'bullets' })
    const turn = await app.pipeline.importText('I feel stuck at work')
    respond({ text: 'Here is a thought', prompt_version: 'reflect-v4' })

    const output = await app.reflector.reflect(turn.id, 'reflect')

    const expectedHash = snapshotHash(project(app.capsule.getOrCreate(), 'reflect'))
    expect(output).toMatchObject({
      turnId: turn.id,
      mode: 'reflect',
      text: 'Here is a thought',
      promptVersion: 'reflect-v4',
      provider: 'cloud'
    })

    const body = JSON.parse(String(fetchMock.mock.calls[0][1]?.body))
    expect(body.text).toBe('I feel stuck at work')
    expect(body.capsule.preferences).toEqual({ output_style: 'bullets' })

    const stored = app.lifecycle.require(turn.id)
    expect(stored.reflectProvider).toBe('cloud')
    expect(stored.capsuleSnapshotHash).toBe(expectedHash)
  })

  it('threads talk it through replies by response id', async () => {
    const turn = await app.pipeline.importText('I keep going back and forth')
    respond({ text: 'Tell me more', prompt_version: 'talk-v2', response_id: 'resp-1' })
    respond({ text: 'And then?', prompt_version: 'talk-v2', response_id: 'resp-2' })

    await app.reflector.reflect(turn.id, 'talkItThrough')
    expect(app.lifecycle.require(turn.id).talkLastResponseId).toBe('resp-1')

    await app.reflector.reflect(turn.id, 'talkItThrough')
    const first = JSON.parse(String(fetchMock.mock.calls[0][1]?.body))
    const second = JSON.parse(String(fetchMock.mock.calls[1][1]?.body))
    expect(first).not.toHaveProperty('previous_response_id')
    expect(second.previous_response_id).toBe('resp-1')
    expect(app.lifecycle.require(turn.id).talkLastResponseId).toBe('resp-2')
  })

  it('throws gateway failures unless fallback is asked for', async () => {
    const turn = await app.pipeline.importText('I feel stuck at work')
    respond('down', 503)
    respond('down', 503)

    await expect(app.reflector.reflect(turn.id, 'reflect')).rejects.toThrow(GatewayHttpError)
    expect(app.lifecycle.outputs(turn.id)).toEqual([])

    const output = await app.reflector.reflect(turn.id, 'reflect', { fallback: true })
    expect(output.provider).toBe('offline')
    expect(output.promptVersion).toBe('seed-v1')
  })

  it('refuses a turn without a transcript', async () => {
    const id = app.lifecycle.createCapture('/audio/one.m4a')
    await expect(app.reflector.reflect(id, 'reflect')).rejects.toThrow(ValidationError)
    expect(fetchMock).not.toHaveBeenCalled()
  })
})
