const ULID_REGEX = /^[0123456789ABCDEFGHJKMNPQRSTVWXYZ]{26}$/i
const ID_SEGMENT_REGEX = /^[A-Za-z0-9._@-]{1,128}$/
const TAG_REGEX = /^[A-Za-z0-9_-]{1,64}$/

export function isValidUlid(id: string): boolean {
  return typeof id === 'string' && ULID_REGEX.test(id)
}

// Tenant, agent, thread and user ids become namespace segments and filter literals
export function isValidIdSegment(id: string): boolean {
  return typeof id === 'string' && ID_SEGMENT_REGEX.test(id)
}

export function isValidTag(tag: string): boolean {
  return typeof tag === 'string' && TAG_REGEX.test(tag)
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max)
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
