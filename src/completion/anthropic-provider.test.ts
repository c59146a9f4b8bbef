import { describe, it, expect, vi, beforeEach } from 'vitest'
import { AnthropicCompletionProvider } from './anthropic-provider.js'
import { CompletionError } from '../core/errors.js'
import type { CompletionRequest } from '../core/types.js'

const { create, constructed } = vi.hoisted(() => {
  const constructed: unknown[] = []
  return { create: vi.fn(), constructed }
})

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create }
    constructor(options: unknown) {
      constructed.push(options)
    }
  },
}))

const request: CompletionRequest = {
  model: 'test-model',
  system: 'You are Guide.',
  messages: [{ role: 'user', content: 'hello' }],
  temperature: 0.7,
  maxTokens: 500,
}

function apiError(status: number): Error {
  return Object.assign(new Error(`${status} error`), { status })
}

describe('AnthropicCompletionProvider', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    create.mockReset()
    constructed.length = 0
  })

  it('disables SDK retries and forwards the request and signal', async () => {
    create.mockResolvedValue({
      model: 'test-model-2025',
      content: [{ type: 'text', text: ' Hi ' }, { type: 'text', text: 'there. ' }],
      stop_reason: 'end_turn',
      usage: { input_tokens: 12, output_tokens: 3 },
    })
    const provider = new AnthropicCompletionProvider('test-secret')
    const controller = new AbortController()

    const result = await provider.complete({ ...request, signal: controller.signal })

    expect(constructed).toEqual([{ apiKey: 'test-secret', maxRetries: 0 }])
    expect(create).toHaveBeenCalledWith(
      { model: 'test-model', system: 'You are Guide.', messages: request.messages, temperature: 0.7, max_tokens: 500 },
      { signal: controller.signal },
    )
    expect(result).toEqual({ text: 'Hi there.', model: 'test-model-2025', input_tokens: 12, output_tokens: 3 })
  })

  it('refuses to run without an API key', async () => {
    const provider = new AnthropicCompletionProvider(null)
    expect(provider.enabled).toBe(false)
    await expect(provider.complete(request)).rejects.toMatchObject({ retryable: false, code: 'COMPLETION_ERROR' })
    expect(create).not.toHaveBeenCalled()
  })

  it.each([
    [429, true],
    [529, true],
    [500, true],
    [400, false],
    [401, false],
  ])('marks HTTP %i as retryable=%s', async (status, retryable) => {
    create.mockRejectedValue(apiError(status))
    const provider = new AnthropicCompletionProvider('test-secret')
    await expect(provider.complete(request)).rejects.toMatchObject({ name: 'CompletionError', retryable })
  })

  it('treats connection failures as retryable and keeps the cause', async () => {
    const cause = new Error('socket hang up')
    create.mockRejectedValue(cause)
    const provider = new AnthropicCompletionProvider('test-secret')

    const error = await provider.complete(request).catch((err: unknown) => err)
    expect(error).toBeInstanceOf(CompletionError)
    expect(error instanceof CompletionError && error.retryable).toBe(true)
    expect(error instanceof CompletionError && error.cause).toBe(cause)
    expect(error instanceof CompletionError && error.message).toBe('Completion failed: socket hang up')
  })

  it('rejects a response without text', async () => {
    create.mockResolvedValue({
      model: 'test-model',
      content: [{ type: 'tool_use', id: 't', name: 'x', input: {} }],
      stop_reason: 'tool_use',
      usage: { input_tokens: 1, output_tokens: 1 },
    })
    const provider = new AnthropicCompletionProvider('test-secret')
    await expect(provider.complete(request)).rejects.toThrow('Completion returned no text (stop reason: tool_use)')
  })
})
