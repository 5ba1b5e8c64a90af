import { describe, it, expect } from 'vitest'
import { redact, luhnValid, normaliseTokens } from '../redactor.js'
import { fnv1a64 } from '../../util/hash.js'

describe('redact', () => {
  it('replaces a dictionary token the same way every time', () => {
    const first = redact('call 555-1234', ['555-1234'])
    const second = redact('call 555-1234', ['555-1234'])

    expect(first.redactedText).toBe('call [CUSTOM]')
    expect(second.redactedText).toBe(first.redactedText)
    expect(second.inputHash).toBe(first.inputHash)
    expect(first.didRedact).toBe(true)
  })

  it('hashes the text before redaction', () => {
    expect(redact('call 555-1234', ['555-1234']).inputHash).toBe(fnv1a64('call 555-1234'))
  })

  it('leaves text without matches untouched', () => {
    const result = redact('I feel stuck at work')
    expect(result.redactedText).toBe('I feel stuck at work')
    expect(result.didRedact).toBe(false)
  })

  it('matches dictionary tokens case-insensitively and only as whole tokens', () => {
    expect(redact('Anne and Ann and ANN', ['ann']).redactedText).toBe('Anne and [CUSTOM] and [CUSTOM]')
  })

  it('redacts email addresses', () => {
    expect(redact('mail me at jo@example.com today').redactedText).toBe('mail me at [EMAIL] today')
  })

  it('lets structural matches win over dictionary tokens inside them', () => {
    expect(redact('Jo said hi to jo@example.com', ['jo']).redactedText).toBe('[CUSTOM] said hi to [EMAIL]')
  })

  it('redacts UK mobile numbers', () => {
    expect(redact('call 07700 900123').redactedText).toBe('call [PHONE]')
  })

  it('redacts postcodes', () => {
    expect(redact('I live at SW1A 1AA').redactedText).toBe('I live at [POSTCODE]')
  })

  it('redacts a labelled sort code and account number', () => {
    expect(redact('sort code 12-34-56').redactedText).toBe('sort code [SORTCODE]')
    expect(redact('account number 12345678').redactedText).toBe('account number [ACCOUNT]')
  })

  it('redacts national insurance numbers', () => {
    expect(redact('my NI number is AB123456C').redactedText).toBe('my NI number is [NINO]')
  })

  it('redacts Luhn-valid card numbers', () => {
    expect(redact('my card is 4111 1111 1111 1111').redactedText).toBe('my card is [CARD]')
  })

  it('flags an invalid card number only near card words', () => {
    expect(redact('card 4111 1111 1111 1112').redactedText).toBe('card [CARD?]')
    expect(redact('ref 4111 1111 1111 1112').redactedText).toBe('ref 4111 1111 1111 1112')
  })

  it('returns empty input unchanged', () => {
    expect(redact('', ['x'])).toEqual({ redactedText: '', inputHash: fnv1a64(''), didRedact: false })
  })
})

describe('luhnValid', () => {
  it('accepts a valid sequence', () => {
    expect(luhnValid([4, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1])).toBe(true)
  })

  it('rejects an invalid or empty sequence', () => {
    expect(luhnValid([1, 2, 3])).toBe(false)
    expect(luhnValid([])).toBe(false)
  })
})

describe('normaliseTokens', () => {
  it('trims, drops blanks and puts longer tokens first', () => {
    expect(normaliseTokens([' ab ', '', 'abcd', '   '])).toEqual(['abcd', 'ab'])
  })
})
