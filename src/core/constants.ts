export const stateKeys = {
  lastValidationAt: 'last_validation_at',
  lastValidationSummary: 'last_validation_summary',
}

export const INITIAL_CONTRACT_VERSION = '1.0.0'

export const CONVERSATION_MEMORY_TYPE = 'conversation'
