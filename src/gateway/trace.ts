import { fnv1a64 } from '../util/hash.js'

const SNIPPET_MAX = 400
const KEY_PREVIEW = 10

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function fingerprint(body: string | undefined): string {
  return body === undefined ? 'nil' : fnv1a64(body)
}

/** `prefs=N cues=N keys=a,b,...` for the capsule inside a request body. */
export function summariseExport(body: string | undefined): string {
  if (body === undefined) return 'no-body'

  let parsed: unknown
  try {
    parsed = JSON.parse(body)
  } catch {
    return 'no-body'
  }
  if (!isRecord(parsed)) return 'no-body'

  const capsule = parsed.capsule
  if (!isRecord(capsule)) return 'no-capsule'

  const prefKeys = isRecord(capsule.preferences) ? Object.keys(capsule.preferences).sort() : []
  const cues = Array.isArray(capsule.learnedCues) ? capsule.learnedCues.length : 0
  return `prefs=${prefKeys.length} cues=${cues} keys=${prefKeys.slice(0, KEY_PREVIEW).join(',')}`
}

export function responseSnippet(body: string): string {
  return body.length > SNIPPET_MAX ? `${body.slice(0, SNIPPET_MAX)}…` : body
}

/** Debug view of what crosses the gateway boundary. Silent unless enabled. */
export class GatewayTrace {
  private enabled: boolean

  constructor(enabled: boolean) {
    this.enabled = enabled
  }

  request(endpoint: string, body: string | undefined): void {
    if (!this.enabled) return
    console.debug(`[trace] export endpoint=${endpoint} fp=${fingerprint(body)} ${summariseExport(body)}`)
  }

  response(endpoint: string, body: string): void {
    if (!this.enabled) return
    console.debug(`[trace] response endpoint=${endpoint} fp=${fingerprint(body)} snippet=${responseSnippet(body)}`)
  }
}
