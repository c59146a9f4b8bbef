import type { CompletionMessage, MemoryContext, RenderedPrompt, ThreadMessage } from '../core/types.js'
import { escapeXml, formatXml } from '../utils/xml.js'

export interface BuiltPrompt {
  system: string
  messages: CompletionMessage[]
}

export function formatMemories(context: MemoryContext): string | null {
  if (context.retrieved.length === 0) return null
  const entries = context.retrieved.map(m =>
    formatXml('memory', {
      type: m.memory_type,
      relevance: m.similarity.toFixed(2),
      created_at: m.created_at,
    }, escapeXml(m.content)),
  )
  return [
    '## RELEVANT MEMORIES',
    'Things you remember from earlier conversations. Use them when they help; do not recite them.',
    ...entries,
  ].join('\n')
}

/**
 * History becomes alternating user/assistant messages ending with the new
 * input. System turns are dropped, adjacent same-role turns are merged and
 * the conversation always opens with a user turn.
 */
export function toMessages(history: ThreadMessage[], userInput: string): CompletionMessage[] {
  const messages: CompletionMessage[] = []
  const turns: CompletionMessage[] = []
  for (const m of history) {
    if (m.role === 'user' || m.role === 'assistant') turns.push({ role: m.role, content: m.content })
  }
  turns.push({ role: 'user', content: userInput })

  for (const turn of turns) {
    if (messages.length === 0 && turn.role === 'assistant') continue
    const last = messages[messages.length - 1]
    if (last && last.role === turn.role) {
      last.content = `${last.content}\n\n${turn.content}`
    } else {
      messages.push({ ...turn })
    }
  }
  return messages
}

export function buildPrompt(rendered: RenderedPrompt, context: MemoryContext, userInput: string): BuiltPrompt {
  const memories = formatMemories(context)
  return {
    system: memories ? `${rendered.system_prompt}\n\n${memories}` : rendered.system_prompt,
    messages: toMessages(context.recent, userInput),
  }
}
