import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, unlinkSync, readFileSync, writeFileSync } from 'fs'
import { RedactionDictionary } from '../dictionary.js'

const TEST_FILE = '/tmp/stillpoint-dictionary-test.json'

describe('RedactionDictionary', () => {
  beforeEach(() => {
    if (existsSync(TEST_FILE)) unlinkSync(TEST_FILE)
  })

  afterEach(() => {
    if (existsSync(TEST_FILE)) unlinkSync(TEST_FILE)
  })

  it('starts empty at version 1 when no file exists', () => {
    const dictionary = new RedactionDictionary(TEST_FILE)
    expect(dictionary.version).toBe(1)
    expect(dictionary.tokens).toEqual([])
  })

  it('adds tokens sorted, ignoring case-insensitive duplicates and blanks', () => {
    const dictionary = new RedactionDictionary(TEST_FILE)

    expect(dictionary.add('Bob')).toBe(true)
    expect(dictionary.add('bob')).toBe(false)
    expect(dictionary.add('   ')).toBe(false)
    expect(dictionary.add(' alice ')).toBe(true)

    expect(dictionary.tokens).toEqual(['alice', 'Bob'])
    expect(dictionary.version).toBe(3)
  })

  it('persists and reloads', () => {
    const dictionary = new RedactionDictionary(TEST_FILE)
    dictionary.add('Bob')

    const reloaded = new RedactionDictionary(TEST_FILE)
    expect(reloaded.version).toBe(2)
    expect(reloaded.tokens).toEqual(['Bob'])
    expect(JSON.parse(readFileSync(TEST_FILE, 'utf-8'))).toEqual({ version: 2, tokens: ['Bob'] })
  })

  it('bumps the version on remove and wipe', () => {
    const dictionary = new RedactionDictionary(TEST_FILE)
    dictionary.add('Bob')
    dictionary.add('alice')

    expect(dictionary.remove('BOB')).toBe(true)
    expect(dictionary.remove('nobody')).toBe(false)
    expect(dictionary.tokens).toEqual(['alice'])
    expect(dictionary.version).toBe(4)

    dictionary.wipe()
    expect(dictionary.tokens).toEqual([])
    expect(dictionary.version).toBe(5)
  })

  it('ignores a malformed file', () => {
    writeFileSync(TEST_FILE, JSON.stringify({ version: 'x', tokens: 3 }))
    const dictionary = new RedactionDictionary(TEST_FILE)
    expect(dictionary.version).toBe(1)
    expect(dictionary.tokens).toEqual([])
  })
})
