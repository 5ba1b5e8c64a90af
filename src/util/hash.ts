const FNV_OFFSET_BASIS = 0xcbf29ce484222325n
const FNV_PRIME = 0x100000001b3n
const MASK_64 = 0xffffffffffffffffn

const encoder = new TextEncoder()

/**
 * 64-bit FNV-1a over the UTF-8 bytes of `input`, as 16 lowercase hex digits.
 * Change detection and trace fingerprints only; not a security boundary.
 */
export function fnv1a64(input: string | Uint8Array): string {
  const bytes = typeof input === 'string' ? encoder.encode(input) : input
  let hash = FNV_OFFSET_BASIS
  for (const byte of bytes) {
    hash ^= BigInt(byte)
    hash = (hash * FNV_PRIME) & MASK_64
  }
  return hash.toString(16).padStart(16, '0')
}

export function fingerprintJSON(value: unknown): string {
  return fnv1a64(JSON.stringify(value))
}
