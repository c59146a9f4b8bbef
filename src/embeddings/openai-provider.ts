import OpenAI from 'openai'
import type { EmbeddingProvider } from '../core/types.js'
import { EmbeddingError } from '../core/errors.js'
import { logger } from '../utils/logger.js'

const log = logger.child('embeddings')

export interface OpenAIEmbeddingOptions {
  apiKey: string | null
  baseUrl: string | null
  model: string
  dimensions: number
}

function statusOf(err: unknown): number | null {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status
  }
  return null
}

/**
 * Embeddings from an OpenAI-compatible `/embeddings` endpoint. `baseUrl`
 * points it at any compatible server; without an API key every call fails.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private client: OpenAI | null = null
  private model: string
  private dims: number

  constructor(options: OpenAIEmbeddingOptions) {
    this.model = options.model
    this.dims = options.dimensions
    if (options.apiKey) {
      // Timeouts and retries belong to the memory manager
      this.client = new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl ?? undefined,
        maxRetries: 0,
      })
    }
  }

  get enabled(): boolean {
    return this.client !== null
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.request([text], signal)
    return vector
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return []
    return this.request(texts, signal)
  }

  dimensions(): number {
    return this.dims
  }

  private async request(input: string[], signal?: AbortSignal): Promise<number[][]> {
    if (!this.client) {
      throw new EmbeddingError('EMBEDDING_API_KEY is not configured')
    }

    let response: OpenAI.CreateEmbeddingResponse
    try {
      response = await this.client.embeddings.create(
        { model: this.model, input, encoding_format: 'float' },
        { signal },
      )
    } catch (err) {
      const status = statusOf(err)
      const detail = err instanceof Error ? err.message : String(err)
      log.warn(`Embedding request failed${status !== null ? ` (${status})` : ''}`, { error: detail })
      throw new EmbeddingError(`Embedding request failed: ${detail}`, err)
    }

    const vectors = [...response.data]
      .sort((a, b) => a.index - b.index)
      .map(d => d.embedding)
    if (vectors.length !== input.length) {
      throw new EmbeddingError(`Expected ${input.length} embeddings, got ${vectors.length}`)
    }
    for (const vector of vectors) {
      if (vector.length !== this.dims) {
        throw new EmbeddingError(`Embedding dimension mismatch: expected ${this.dims}, got ${vector.length}`)
      }
    }
    return vectors
  }
}
