/** Truncates by code points so a surrogate pair is never split. */
export function truncate(value: string, max: number): string {
  if (value.length <= max) return value
  return Array.from(value).slice(0, Math.max(0, max)).join('')
}

export function isBlank(value: string | null | undefined): boolean {
  return value == null || value.trim().length === 0
}
