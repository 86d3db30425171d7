/**
 * Error Classification
 *
 * Failures that abort a run are raised as PriceSyncError subclasses carrying
 * the pipeline stage and a stable code. classifyError() maps anything thrown
 * into a flat shape for logging.
 *
 * Per-record lookup failures never reach this module: the price fetcher
 * reports them as "not found".
 */

/**
 * Error categories for classification
 */
export type ErrorCategory =
  | 'configuration' // Missing or invalid env configuration
  | 'db' // Warehouse connection or query failure
  | 'storage' // Object store write failure
  | 'external' // Network failures outside the warehouse/storage clients
  | 'timeout' // Operation timeout
  | 'internal' // Unexpected errors (bugs)

export type PipelineStage = 'config' | 'warehouse' | 'storage'

export const ERROR_CODES = {
  // Configuration
  CONFIG_INVALID: 'CONFIG_INVALID',

  // Warehouse
  WAREHOUSE_CONNECT_FAILED: 'WAREHOUSE_CONNECT_FAILED',
  WAREHOUSE_QUERY_FAILED: 'WAREHOUSE_QUERY_FAILED',

  // Storage
  STORAGE_WRITE_FAILED: 'STORAGE_WRITE_FAILED',

  // External
  NETWORK_ERROR: 'NETWORK_ERROR',
  EXTERNAL_TIMEOUT: 'EXTERNAL_TIMEOUT',
  OPERATION_TIMEOUT: 'OPERATION_TIMEOUT',

  // Internal
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

/**
 * Structured error information for logging
 */
export interface ClassifiedError {
  category: ErrorCategory
  code: ErrorCode
  message: string
  stage?: PipelineStage
  isOperational: boolean // Expected failures vs bugs
  isRetryable: boolean
  details?: Record<string, unknown>
  originalError?: Error
}

export class PriceSyncError extends Error {
  readonly code: ErrorCode
  readonly stage: PipelineStage
  readonly details?: Record<string, unknown>

  constructor(
    message: string,
    options: { code: ErrorCode; stage: PipelineStage; cause?: unknown; details?: Record<string, unknown> }
  ) {
    super(message, { cause: options.cause })
    this.name = 'PriceSyncError'
    this.code = options.code
    this.stage = options.stage
    this.details = options.details
  }
}

export class ConfigError extends PriceSyncError {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, {
      code: ERROR_CODES.CONFIG_INVALID,
      stage: 'config',
      details: { issues },
    })
    this.name = 'ConfigError'
    this.issues = issues
  }
}

export class WarehouseError extends PriceSyncError {
  constructor(
    message: string,
    code: typeof ERROR_CODES.WAREHOUSE_CONNECT_FAILED | typeof ERROR_CODES.WAREHOUSE_QUERY_FAILED,
    cause?: unknown
  ) {
    super(message, { code, stage: 'warehouse', cause })
    this.name = 'WarehouseError'
  }
}

export class StorageError extends PriceSyncError {
  readonly key: string

  constructor(key: string, cause?: unknown) {
    super(`Failed to write object '${key}': ${describeCause(cause)}`, {
      code: ERROR_CODES.STORAGE_WRITE_FAILED,
      stage: 'storage',
      cause,
      details: { key },
    })
    this.name = 'StorageError'
    this.key = key
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  return String(cause)
}

const CATEGORY_BY_STAGE: Record<PipelineStage, ErrorCategory> = {
  config: 'configuration',
  warehouse: 'db',
  storage: 'storage',
}

// Node.js network error codes
const NETWORK_ERROR_CODES = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
]

/**
 * Classify an error into a structured format
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof PriceSyncError) {
    return {
      category: CATEGORY_BY_STAGE[error.stage],
      code: error.code,
      message: error.message,
      stage: error.stage,
      isOperational: true,
      isRetryable: error.stage !== 'config',
      details: error.details,
      originalError: error,
    }
  }

  if (error instanceof Error) {
    const networkClassified = classifyNetworkError(error)
    if (networkClassified) {
      return networkClassified
    }

    return {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      isOperational: false,
      isRetryable: false,
      originalError: error,
    }
  }

  // Non-Error thrown values
  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    isOperational: false,
    isRetryable: false,
  }
}

function errorCodeOf(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

/**
 * Classify network and timeout errors
 */
function classifyNetworkError(error: Error): ClassifiedError | null {
  const code = errorCodeOf(error)

  if (code && NETWORK_ERROR_CODES.includes(code)) {
    const isTimeout = code === 'ETIMEDOUT'
    return {
      category: isTimeout ? 'timeout' : 'external',
      code: isTimeout ? ERROR_CODES.EXTERNAL_TIMEOUT : ERROR_CODES.NETWORK_ERROR,
      message: `Network error: ${code}`,
      isOperational: true,
      isRetryable: true,
      details: { errorCode: code },
      originalError: error,
    }
  }

  const lower = error.message.toLowerCase()
  if (lower.includes('timeout') || lower.includes('timed out')) {
    return {
      category: 'timeout',
      code: ERROR_CODES.OPERATION_TIMEOUT,
      message: error.message,
      isOperational: true,
      isRetryable: true,
      originalError: error,
    }
  }

  return null
}

/**
 * Flatten a classified error into log metadata
 */
export function formatErrorForLog(classified: ClassifiedError): Record<string, unknown> {
  return {
    errorCategory: classified.category,
    errorCode: classified.code,
    errorMessage: classified.message,
    ...(classified.stage ? { stage: classified.stage } : {}),
    isOperational: classified.isOperational,
    isRetryable: classified.isRetryable,
    ...(classified.details ? { errorDetails: classified.details } : {}),
  }
}
