import type { Config } from '../../core/config.js'
import { openRuntime } from '../../runtime/runtime.js'

export interface ChatOptions {
  agentId: string
  tenantId: string
  userId: string
  threadId?: string
}

export async function runChat(config: Config, message: string, options: ChatOptions): Promise<void> {
  const runtime = openRuntime(config)

  try {
    const result = await runtime.orchestrator.process({
      agentId: options.agentId,
      tenantId: options.tenantId,
      userId: options.userId,
      threadId: options.threadId,
      userInput: message,
    })

    console.log(result.response)
    console.log()
    console.log(`thread: ${result.thread_id}`)
    console.log(`messages: ${result.metadata.message_count}, memories used: ${result.metadata.retrieved_memories}, confidence: ${result.metadata.memory_confidence.toFixed(2)}`)
  } finally {
    runtime.close()
  }
}
