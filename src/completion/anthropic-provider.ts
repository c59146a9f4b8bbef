import Anthropic from '@anthropic-ai/sdk'
import { CompletionError } from '../core/errors.js'
import type { CompletionProvider, CompletionRequest, CompletionResult } from '../core/types.js'
import { logger } from '../utils/logger.js'

const log = logger.child('completion')

// 408 timeout, 409 lock contention, 429 rate limit, 5xx upstream
function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 429 || status >= 500
}

function statusOf(err: unknown): number | null {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status
  }
  return null
}

export class AnthropicCompletionProvider implements CompletionProvider {
  readonly name = 'anthropic'
  private client: Anthropic | null = null

  constructor(apiKey: string | null) {
    if (apiKey) {
      // Retries are the orchestrator's call, not the SDK's
      this.client = new Anthropic({ apiKey, maxRetries: 0 })
    }
  }

  get enabled(): boolean {
    return this.client !== null
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    if (!this.client) {
      throw new CompletionError('ANTHROPIC_API_KEY is not configured', undefined, false)
    }

    let response: Anthropic.Message
    try {
      response = await this.client.messages.create(
        {
          model: request.model,
          system: request.system,
          messages: request.messages,
          temperature: request.temperature,
          max_tokens: request.maxTokens,
        },
        { signal: request.signal },
      )
    } catch (err) {
      const status = statusOf(err)
      const detail = err instanceof Error ? err.message : String(err)
      // No status means the request never got an answer (network, abort)
      const retryable = status === null || isRetryableStatus(status)
      log.warn(`Completion request failed${status !== null ? ` (${status})` : ''}`, { error: detail })
      throw new CompletionError(`Completion failed: ${detail}`, err, retryable)
    }

    const text = response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim()
    if (!text) {
      throw new CompletionError(`Completion returned no text (stop reason: ${response.stop_reason ?? 'unknown'})`)
    }

    return {
      text,
      model: response.model,
      input_tokens: response.usage.input_tokens,
      output_tokens: response.usage.output_tokens,
    }
  }
}
