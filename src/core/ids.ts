import { createHash } from 'crypto'
import { ulid } from 'ulid'

export function generateId(): string {
  return ulid()
}

// Dedup key for memory content; whitespace runs collapse so re-recorded exchanges match
export function contentHash(text: string): string {
  const normalized = text.trim().replace(/\s+/g, ' ')
  return createHash('sha256').update(normalized, 'utf8').digest('hex')
}
