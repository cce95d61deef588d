// Error types shared by the scale pool and its callers

/**
 * Error severity levels for categorization and handling
 */
export type ErrorSeverity = 'critical' | 'error' | 'warning' | 'info'

/**
 * Error categories for grouping and filtering
 */
export type ErrorCategory = 'config' | 'validation' | 'pool' | 'task' | 'unknown'

/**
 * Structured error context for debugging
 */
export interface ErrorContext {
  operation: string
  component?: string
  taskId?: number
  metadata?: Record<string, unknown>
}

/**
 * Base error class with enhanced context
 */
export class AppError extends Error {
  public readonly code: string
  public readonly severity: ErrorSeverity
  public readonly category: ErrorCategory
  public readonly context: ErrorContext
  public readonly timestamp: number
  public readonly isOperational: boolean

  constructor(
    message: string,
    options: {
      code?: string
      severity?: ErrorSeverity
      category?: ErrorCategory
      context: ErrorContext
      cause?: Error
      isOperational?: boolean
    }
  ) {
    super(message)
    this.name = 'AppError'
    this.code = options.code ?? 'ERR_UNKNOWN'
    this.severity = options.severity ?? 'error'
    this.category = options.category ?? 'unknown'
    this.context = options.context
    this.timestamp = Date.now()
    this.isOperational = options.isOperational ?? true
    this.cause = options.cause

    Error.captureStackTrace(this, this.constructor)
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      category: this.category,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    }
  }
}

/**
 * Invalid startup configuration. Fatal: the component never becomes usable.
 */
export class ConfigurationError extends AppError {
  public readonly setting: string
  public readonly value: unknown

  constructor(
    message: string,
    options: {
      setting: string
      value: unknown
      cause?: Error
    }
  ) {
    super(message, {
      code: 'ERR_CONFIG',
      severity: 'critical',
      category: 'config',
      context: {
        operation: 'config:resolve',
        metadata: { setting: options.setting, value: options.value },
      },
      cause: options.cause,
      isOperational: false,
    })
    this.name = 'ConfigurationError'
    this.setting = options.setting
    this.value = options.value
  }
}

/**
 * Bad arguments to a scale operation. Thrown by scaling routines and
 * delivered through the task's handle, never at submission time.
 */
export class ScaleArgumentError extends AppError {
  public readonly field?: string
  public readonly value?: unknown

  constructor(
    message: string,
    options: {
      field?: string
      value?: unknown
      operation?: string
    } = {}
  ) {
    super(message, {
      code: 'ERR_VALIDATION',
      severity: 'warning',
      category: 'validation',
      context: {
        operation: options.operation ?? 'scale:resize',
        metadata: { field: options.field },
      },
      isOperational: true,
    })
    this.name = 'ScaleArgumentError'
    this.field = options.field
    this.value = options.value
  }
}

/**
 * The pool refused a task: its bounded queue is full or it no longer
 * accepts work.
 */
export class RejectedSubmissionError extends AppError {
  public readonly reason: 'queue-full' | 'shutdown'

  constructor(
    message: string,
    options: {
      reason: 'queue-full' | 'shutdown'
      queueSize?: number
      maxQueue?: number
    }
  ) {
    super(message, {
      code: 'ERR_REJECTED',
      severity: 'warning',
      category: 'pool',
      context: {
        operation: 'pool:submit',
        metadata: { reason: options.reason, queueSize: options.queueSize, maxQueue: options.maxQueue },
      },
      isOperational: true,
    })
    this.name = 'RejectedSubmissionError'
    this.reason = options.reason
  }
}

/**
 * Result requested from a handle whose task was cancelled before it ran
 */
export class TaskCancelledError extends AppError {
  constructor(message: string, options: { taskId: number }) {
    super(message, {
      code: 'ERR_CANCELLED',
      severity: 'info',
      category: 'task',
      context: { operation: 'task:get', taskId: options.taskId },
      isOperational: true,
    })
    this.name = 'TaskCancelledError'
  }
}

/**
 * Wait on a handle elapsed. The task itself is unaffected.
 */
export class TaskTimeoutError extends AppError {
  public readonly timeoutMs: number

  constructor(message: string, options: { taskId: number; timeoutMs: number }) {
    super(message, {
      code: 'ERR_TIMEOUT',
      severity: 'warning',
      category: 'task',
      context: {
        operation: 'task:get',
        taskId: options.taskId,
        metadata: { timeoutMs: options.timeoutMs },
      },
      isOperational: true,
    })
    this.name = 'TaskTimeoutError'
    this.timeoutMs = options.timeoutMs
  }
}

/**
 * Result type for operations that can fail
 */
export type Result<T, E = AppError> =
  | { success: true; data: T }
  | { success: false; error: E }

/**
 * Helper to create success result
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data }
}

/**
 * Helper to create error result
 */
export function err<E>(error: E): Result<never, E> {
  return { success: false, error }
}

/**
 * Check if an error is an operational error (expected, can be handled)
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational
}

/**
 * Extract error message safely
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string') {
    return error
  }
  return 'An unknown error occurred'
}

/**
 * Extract error code safely
 */
export function getErrorCode(error: unknown): string {
  if (error instanceof AppError) {
    return error.code
  }
  return 'ERR_UNKNOWN'
}
