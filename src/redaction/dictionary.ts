import { readFileSync, writeFileSync, existsSync, mkdirSync, renameSync } from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import { StorageError } from '../errors.js'

const dictionaryFileSchema = z.object({
  version: z.number().int().min(1),
  tokens: z.array(z.string())
})

export type DictionaryFile = z.infer<typeof dictionaryFileSchema>

function compareTokens(a: string, b: string): number {
  return a.localeCompare(b, undefined, { sensitivity: 'base' })
}

/**
 * User-maintained list of words to redact, stored as `{ version, tokens }`.
 * Every change bumps `version`, which becomes the redaction version of any
 * transcript redacted against it.
 */
export class RedactionDictionary {
  private filePath: string
  private state: DictionaryFile = { version: 1, tokens: [] }

  constructor(filePath: string) {
    this.filePath = filePath
    this.load()
  }

  get version(): number {
    return this.state.version
  }

  get tokens(): readonly string[] {
    return this.state.tokens
  }

  /** Returns false for blank tokens and case-insensitive duplicates. */
  add(token: string): boolean {
    const trimmed = token.trim()
    if (!trimmed) return false

    const lower = trimmed.toLowerCase()
    if (this.state.tokens.some(t => t.toLowerCase() === lower)) return false

    this.commit([...this.state.tokens, trimmed].sort(compareTokens))
    return true
  }

  remove(token: string): boolean {
    const lower = token.trim().toLowerCase()
    const remaining = this.state.tokens.filter(t => t.toLowerCase() !== lower)
    if (remaining.length === this.state.tokens.length) return false

    this.commit(remaining)
    return true
  }

  wipe(): void {
    this.commit([])
  }

  private commit(tokens: string[]): void {
    this.state = { version: this.state.version + 1, tokens }
    this.save()
  }

  private load(): void {
    if (!existsSync(this.filePath)) return

    try {
      const parsed = dictionaryFileSchema.safeParse(JSON.parse(readFileSync(this.filePath, 'utf-8')))
      if (parsed.success) {
        this.state = parsed.data
      } else {
        console.error('[redaction] Ignoring malformed dictionary:', parsed.error.message)
      }
    } catch (err) {
      console.error('[redaction] Failed to read dictionary:', err)
    }
  }

  private save(): void {
    try {
      mkdirSync(path.dirname(this.filePath), { recursive: true })
      const tmp = `${this.filePath}.tmp`
      writeFileSync(tmp, JSON.stringify(this.state, null, 2))
      renameSync(tmp, this.filePath)
    } catch (err) {
      throw new StorageError('saveDictionary', err)
    }
  }
}
