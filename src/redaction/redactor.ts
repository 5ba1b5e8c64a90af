import { fnv1a64 } from '../util/hash.js'

export interface RedactionResult {
  redactedText: string
  /** FNV-1a 64 of the text before redaction. */
  inputHash: string
  didRedact: boolean
}

// Higher value wins when matches overlap.
const KIND_PRIORITY = {
  custom: 10,
  vat: 20,
  utr: 21,
  nino: 22,
  postcode: 23,
  sortcode: 24,
  phone: 25,
  account: 26,
  cardQ: 27,
  card: 28,
  bic: 29,
  iban: 30,
  email: 31
} as const

export type MatchKind = keyof typeof KIND_PRIORITY

const LABELS: Record<MatchKind, string> = {
  custom: '[CUSTOM]',
  vat: '[VAT]',
  utr: '[UTR]',
  nino: '[NINO]',
  postcode: '[POSTCODE]',
  sortcode: '[SORTCODE]',
  phone: '[PHONE]',
  account: '[ACCOUNT]',
  cardQ: '[CARD?]',
  card: '[CARD]',
  bic: '[BIC]',
  iban: '[IBAN]',
  email: '[EMAIL]'
}

interface Match {
  start: number
  end: number
  kind: MatchKind
}

const EMAIL = /\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/gi
const PHONE_INTL = /\b(?:\+|00)\d{1,3}[\s-]?(?:\(?\d+\)?[\s-]?){3,}\d\b/gi
const PHONE_UK_MOBILE = /\b(\+44\s?7\d{3}|\(?07\d{3}\)?)\s?\d{3}\s?\d{3}\b/gi
const POSTCODE = /\b([A-Z]{1,2}\d{1,2}[A-Z]?)\s?(\d[A-Z]{2})\b/gi
const IBAN = /\b[A-Z]{2}\d{2}[A-Z0-9]{11,30}\b/gi
const IBAN_SPACED = /\b[A-Z]{2}\d{2}(?:[\s-]?[A-Z0-9]){11,40}\b/gi
const SORT_CODE_LABELLED = /\b(sort\s*code|s\/c)\s*(?:is|:)?\s*(\d{2}[-\s]?\d{2}[-\s]?\d{2})\b/dgi
const SORT_CODE = /\b\d{2}[-\s]\d{2}[-\s]\d{2}\b/gi
const ACCOUNT_LABELLED = /\b((?:bank\s*)?account(?:\s*(?:number|no\.?|#))?|acc(?:ount)?(?:\s*(?:number|no\.?|#))?|acct(?:\.|ount)?(?:\s*(?:number|no\.?|#))?|a\/c)\s*(?:is|:)?\s*([0-9](?:[0-9\s-]{3,}[0-9])?)\b/dgi
const NINO = /\b[A-CEGHJ-PR-TW-Z]{2}\d{6}[A-D]\b/gi
const UTR = /\b(utr|unique\s*taxpayer\s*reference)\s*(?:is|:)?\s*(\d{10})\b/dgi
const VAT = /\b(vat\s*(?:number|no\.?|#))\s*(?:is|:)?\s*(?:GB)?\s*(\d{9}(?:\d{3})?)\b/dgi
const BIC_LABELLED = /\b(?:bic|swift)(?:\s*code)?\s*(?:is|:)?\s*([A-Z0-9](?:[A-Z0-9\s-]{6,}[A-Z0-9])?)\b/dgi
const CARD_CANDIDATE = /\b(?:\d[ -]*?){13,19}\b/g

const CARD_KEYWORDS = [
  'card', 'debit', 'credit', 'visa', 'mastercard', 'amex', 'american express',
  'cvv', 'cvc', 'expiry', 'expiration', 'exp date'
]
const CARD_CONTEXT_WINDOW = 28

function spans(input: string, pattern: RegExp): [number, number][] {
  const out: [number, number][] = []
  for (const m of input.matchAll(pattern)) {
    if (m[0].length === 0) continue
    const start = m.index ?? 0
    out.push([start, start + m[0].length])
  }
  return out
}

function groupSpans(input: string, pattern: RegExp, group: number): [number, number][] {
  const out: [number, number][] = []
  for (const m of input.matchAll(pattern)) {
    const span = m.indices?.[group]
    if (!span || span[1] <= span[0]) continue
    out.push([span[0], span[1]])
  }
  return out
}

function alnum(text: string): string {
  return text.replace(/[^\p{L}\p{N}]/gu, '').toUpperCase()
}

function isLetters(text: string): boolean {
  return /^\p{L}+$/u.test(text)
}

function isDigits(text: string): boolean {
  return /^\d+$/.test(text)
}

export function luhnValid(digits: number[]): boolean {
  let sum = 0
  let double = false
  for (let i = digits.length - 1; i >= 0; i--) {
    let d = digits[i]
    if (double) {
      d *= 2
      if (d > 9) d -= 9
    }
    sum += d
    double = !double
  }
  return digits.length > 0 && sum % 10 === 0
}

function hasCardContext(input: string, start: number, end: number): boolean {
  const context = input
    .slice(Math.max(0, start - CARD_CONTEXT_WINDOW), Math.min(input.length, end + CARD_CONTEXT_WINDOW))
    .toLowerCase()
  return CARD_KEYWORDS.some(keyword => context.includes(keyword))
}

function structuralMatches(input: string): Match[] {
  const out: Match[] = []
  const add = (kind: MatchKind, found: [number, number][]) => {
    for (const [start, end] of found) out.push({ start, end, kind })
  }

  add('email', spans(input, EMAIL))
  add('phone', spans(input, PHONE_INTL))
  add('phone', spans(input, PHONE_UK_MOBILE))
  add('postcode', spans(input, POSTCODE))
  add('iban', spans(input, IBAN))

  // Transcribed IBANs arrive with spaces; validate the compacted form.
  for (const [start, end] of spans(input, IBAN_SPACED)) {
    const cleaned = alnum(input.slice(start, end))
    if (
      cleaned.length >= 15 && cleaned.length <= 34 &&
      isLetters(cleaned.slice(0, 2)) &&
      isDigits(cleaned.slice(2, 4))
    ) {
      out.push({ start, end, kind: 'iban' })
    }
  }

  add('sortcode', groupSpans(input, SORT_CODE_LABELLED, 2))
  add('sortcode', spans(input, SORT_CODE))

  for (const [start, end] of groupSpans(input, ACCOUNT_LABELLED, 2)) {
    const digitCount = input.slice(start, end).replace(/\D/g, '').length
    if (digitCount >= 6 && digitCount <= 12) {
      out.push({ start, end, kind: 'account' })
    }
  }

  add('nino', spans(input, NINO))
  add('utr', groupSpans(input, UTR, 2))
  add('vat', groupSpans(input, VAT, 2))

  // BIC only next to a label; bare 8-letter words are too common.
  for (const [start, end] of groupSpans(input, BIC_LABELLED, 1)) {
    const cleaned = alnum(input.slice(start, end))
    if ((cleaned.length === 8 || cleaned.length === 11) && isLetters(cleaned.slice(0, 6))) {
      out.push({ start, end, kind: 'bic' })
    }
  }

  for (const [start, end] of spans(input, CARD_CANDIDATE)) {
    const digits = Array.from(input.slice(start, end).replace(/\D/g, ''), Number)
    if (digits.length < 13 || digits.length > 19) continue
    if (luhnValid(digits)) {
      out.push({ start, end, kind: 'card' })
    } else if (hasCardContext(input, start, end)) {
      out.push({ start, end, kind: 'cardQ' })
    }
  }

  return out
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&')
}

function overlaps(a: Match, b: Match): boolean {
  return a.start < b.end && b.start < a.end
}

/** Trimmed, non-empty, longest first. */
export function normaliseTokens(tokens: readonly string[]): string[] {
  return tokens
    .map(t => t.trim())
    .filter(t => t.length > 0)
    .sort((a, b) => b.length - a.length)
}

function customMatches(input: string, tokens: string[], occupied: Match[]): Match[] {
  const out: Match[] = []
  for (const token of tokens) {
    const pattern = new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(token)}(?![\\p{L}\\p{N}_])`, 'giu')
    for (const [start, end] of spans(input, pattern)) {
      const candidate: Match = { start, end, kind: 'custom' }
      if (occupied.some(m => overlaps(m, candidate))) continue
      out.push(candidate)
    }
  }
  return out
}

function chooseNonOverlapping(candidates: Match[]): Match[] {
  const sorted = [...candidates].sort((a, b) => {
    const byKind = KIND_PRIORITY[b.kind] - KIND_PRIORITY[a.kind]
    if (byKind !== 0) return byKind
    const byLength = (b.end - b.start) - (a.end - a.start)
    if (byLength !== 0) return byLength
    return a.start - b.start
  })

  const chosen: Match[] = []
  for (const m of sorted) {
    if (chosen.some(c => overlaps(c, m))) continue
    chosen.push(m)
  }
  return chosen.sort((a, b) => a.start - b.start)
}

function apply(input: string, matches: Match[]): string {
  let cursor = 0
  let out = ''
  for (const m of matches) {
    if (m.start < cursor) continue
    out += input.slice(cursor, m.start) + LABELS[m.kind]
    cursor = m.end
  }
  return out + input.slice(cursor)
}

/**
 * Replaces structural PII and every dictionary token (case-insensitive, whole
 * token) with a bracketed label. Matches are collected on the original text
 * and applied in one pass, so token order never changes the output.
 */
export function redact(rawText: string, dictionary: readonly string[] = []): RedactionResult {
  const inputHash = fnv1a64(rawText)
  if (rawText.length === 0) {
    return { redactedText: rawText, inputHash, didRedact: false }
  }

  let chosen = chooseNonOverlapping(structuralMatches(rawText))

  const tokens = normaliseTokens(dictionary)
  if (tokens.length > 0) {
    chosen = chooseNonOverlapping([...chosen, ...customMatches(rawText, tokens, chosen)])
  }

  if (chosen.length === 0) {
    return { redactedText: rawText, inputHash, didRedact: false }
  }
  return { redactedText: apply(rawText, chosen), inputHash, didRedact: true }
}
