export class AgentRuntimeError extends Error {
  constructor(
    message: string,
    public code: string,
    cause?: unknown,
    public retryable: boolean = false,
  ) {
    super(message)
    this.name = 'AgentRuntimeError'
    if (cause) this.cause = cause
  }
}

export class ValidationError extends AgentRuntimeError {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(message, 'VALIDATION_ERROR')
    this.name = 'ValidationError'
  }
}

export class NotFoundError extends AgentRuntimeError {
  constructor(message: string) {
    super(message, 'NOT_FOUND')
    this.name = 'NotFoundError'
  }
}

// Caller must reload and retry; never resolved by overwriting
export class ConflictError extends AgentRuntimeError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFLICT', cause)
    this.name = 'ConflictError'
  }
}

export class PersistenceError extends AgentRuntimeError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PERSISTENCE_ERROR', cause, true)
    this.name = 'PersistenceError'
  }
}

export class ProviderError extends AgentRuntimeError {
  constructor(message: string, cause?: unknown, code: string = 'PROVIDER_ERROR', retryable: boolean = true) {
    super(message, code, cause, retryable)
    this.name = 'ProviderError'
  }
}

export class ProviderTimeoutError extends ProviderError {
  constructor(message: string) {
    super(message, undefined, 'PROVIDER_TIMEOUT')
    this.name = 'ProviderTimeoutError'
  }
}

export class EmbeddingError extends ProviderError {
  constructor(message: string, cause?: unknown) {
    super(message, cause, 'EMBEDDING_ERROR')
    this.name = 'EmbeddingError'
  }
}

export class CompletionError extends ProviderError {
  constructor(message: string, cause?: unknown, retryable: boolean = true) {
    super(message, cause, 'COMPLETION_ERROR', retryable)
    this.name = 'CompletionError'
  }
}

export class CancelledError extends AgentRuntimeError {
  constructor(message: string = 'Operation cancelled') {
    super(message, 'CANCELLED')
    this.name = 'CancelledError'
  }
}
