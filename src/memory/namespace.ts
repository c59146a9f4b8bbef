import { ValidationError } from '../core/errors.js'
import { isValidIdSegment } from '../utils/validation.js'

export type NamespaceScope = 'agent' | 'thread' | 'user'

/**
 * Memory namespace built from validated ids. There is no way to construct one
 * from a raw string, so callers cannot widen a search past their own agent.
 *
 *   {tenant}:{agent}
 *   {tenant}:{agent}:thread:{thread}
 *   {tenant}:{agent}:user:{user}
 */
export class Namespace {
  private constructor(
    readonly tenantId: string,
    readonly agentId: string,
    readonly scope: NamespaceScope,
    readonly key: string,
  ) {}

  static agent(tenantId: string, agentId: string): Namespace {
    requireSegment('tenant_id', tenantId)
    requireSegment('agent_id', agentId)
    return new Namespace(tenantId, agentId, 'agent', `${tenantId}:${agentId}`)
  }

  static thread(tenantId: string, agentId: string, threadId: string): Namespace {
    requireSegment('thread_id', threadId)
    const base = Namespace.agent(tenantId, agentId)
    return new Namespace(tenantId, agentId, 'thread', `${base.key}:thread:${threadId}`)
  }

  static user(tenantId: string, agentId: string, userId: string): Namespace {
    requireSegment('user_id', userId)
    const base = Namespace.agent(tenantId, agentId)
    return new Namespace(tenantId, agentId, 'user', `${base.key}:user:${userId}`)
  }

  /** True when `namespace` is this one or, with `includeDescendants`, nested beneath it. */
  contains(namespace: string, includeDescendants: boolean): boolean {
    return namespace === this.key || (includeDescendants && namespace.startsWith(`${this.key}:`))
  }

  toString(): string {
    return this.key
  }
}

function requireSegment(field: string, value: string): void {
  if (!isValidIdSegment(value)) {
    throw new ValidationError(`Invalid ${field}: ${JSON.stringify(value)}`, [
      `${field}: must match [A-Za-z0-9._@-]{1,128}`,
    ])
  }
}
