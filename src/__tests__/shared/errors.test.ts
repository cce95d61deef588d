import { describe, it, expect } from 'vitest'
import {
  AppError,
  ConfigurationError,
  ScaleArgumentError,
  RejectedSubmissionError,
  TaskCancelledError,
  TaskTimeoutError,
  ok,
  err,
  isOperationalError,
  getErrorMessage,
  getErrorCode,
} from '../../shared/errors'

describe('Error Classes', () => {
  describe('AppError', () => {
    it('should create error with default values', () => {
      const error = new AppError('Test error', {
        context: { operation: 'test' },
      })

      expect(error.message).toBe('Test error')
      expect(error.code).toBe('ERR_UNKNOWN')
      expect(error.severity).toBe('error')
      expect(error.category).toBe('unknown')
      expect(error.isOperational).toBe(true)
      expect(error.timestamp).toBeDefined()
      expect(error.name).toBe('AppError')
    })

    it('should serialize to JSON correctly', () => {
      const error = new AppError('JSON test', {
        code: 'ERR_JSON',
        context: { operation: 'json', taskId: 4 },
      })

      const json = error.toJSON()

      expect(json.name).toBe('AppError')
      expect(json.message).toBe('JSON test')
      expect(json.code).toBe('ERR_JSON')
      expect(json.context).toEqual({ operation: 'json', taskId: 4 })
      expect(json.stack).toBeDefined()
    })

    it('should preserve cause error', () => {
      const cause = new Error('Original error')
      const error = new AppError('Wrapped error', {
        context: { operation: 'wrap' },
        cause,
      })

      expect(error.cause).toBe(cause)
    })
  })

  describe('ConfigurationError', () => {
    it('should be critical and non-operational', () => {
      const error = new ConfigurationError('Thread count is 0', { setting: 'threadCount', value: 0 })

      expect(error.name).toBe('ConfigurationError')
      expect(error.code).toBe('ERR_CONFIG')
      expect(error.severity).toBe('critical')
      expect(error.category).toBe('config')
      expect(error.isOperational).toBe(false)
      expect(error.setting).toBe('threadCount')
      expect(error.value).toBe(0)
      expect(error.context.metadata).toEqual({ setting: 'threadCount', value: 0 })
    })
  })

  describe('ScaleArgumentError', () => {
    it('should create validation error with field info', () => {
      const error = new ScaleArgumentError('targetWidth must be > 0', {
        field: 'targetWidth',
        value: -10,
      })

      expect(error.name).toBe('ScaleArgumentError')
      expect(error.code).toBe('ERR_VALIDATION')
      expect(error.category).toBe('validation')
      expect(error.field).toBe('targetWidth')
      expect(error.value).toBe(-10)
      expect(error.context.operation).toBe('scale:resize')
    })

    it('should work without options', () => {
      const error = new ScaleArgumentError('source is required')

      expect(error.field).toBeUndefined()
      expect(error.severity).toBe('warning')
    })
  })

  describe('RejectedSubmissionError', () => {
    it('should record why the task was rejected', () => {
      const error = new RejectedSubmissionError('Queue is full', {
        reason: 'queue-full',
        queueSize: 10,
        maxQueue: 10,
      })

      expect(error.name).toBe('RejectedSubmissionError')
      expect(error.code).toBe('ERR_REJECTED')
      expect(error.category).toBe('pool')
      expect(error.reason).toBe('queue-full')
      expect(error.context.metadata).toEqual({ reason: 'queue-full', queueSize: 10, maxQueue: 10 })
    })
  })

  describe('TaskCancelledError', () => {
    it('should carry the task id', () => {
      const error = new TaskCancelledError('Task 3 was cancelled', { taskId: 3 })

      expect(error.code).toBe('ERR_CANCELLED')
      expect(error.severity).toBe('info')
      expect(error.context.taskId).toBe(3)
    })
  })

  describe('TaskTimeoutError', () => {
    it('should carry the timeout', () => {
      const error = new TaskTimeoutError('Task 3 did not finish within 50ms', { taskId: 3, timeoutMs: 50 })

      expect(error.code).toBe('ERR_TIMEOUT')
      expect(error.timeoutMs).toBe(50)
      expect(error.context).toEqual({ operation: 'task:get', taskId: 3, metadata: { timeoutMs: 50 } })
    })
  })
})

describe('Result Type Helpers', () => {
  describe('ok', () => {
    it('should create success result', () => {
      expect(ok({ width: 10 })).toEqual({ success: true, data: { width: 10 } })
    })
  })

  describe('err', () => {
    it('should create error result', () => {
      const error = new TaskCancelledError('cancelled', { taskId: 1 })

      expect(err(error)).toEqual({ success: false, error })
    })
  })
})

describe('Helper Functions', () => {
  describe('isOperationalError', () => {
    it('should return true for operational AppError', () => {
      expect(isOperationalError(new TaskTimeoutError('t', { taskId: 1, timeoutMs: 1 }))).toBe(true)
    })

    it('should return false for non-operational AppError', () => {
      expect(isOperationalError(new ConfigurationError('c', { setting: 'threadCount', value: 0 }))).toBe(
        false
      )
    })

    it('should return false for regular Error', () => {
      expect(isOperationalError(new Error('Regular error'))).toBe(false)
    })
  })

  describe('getErrorMessage', () => {
    it('should extract message from Error', () => {
      expect(getErrorMessage(new Error('Test message'))).toBe('Test message')
    })

    it('should return string as-is', () => {
      expect(getErrorMessage('String error')).toBe('String error')
    })

    it('should return default for unknown types', () => {
      expect(getErrorMessage(42)).toBe('An unknown error occurred')
    })
  })

  describe('getErrorCode', () => {
    it('should return code from AppError', () => {
      expect(getErrorCode(new RejectedSubmissionError('r', { reason: 'shutdown' }))).toBe('ERR_REJECTED')
    })

    it('should return ERR_UNKNOWN for regular Error', () => {
      expect(getErrorCode(new Error('Regular error'))).toBe('ERR_UNKNOWN')
    })
  })
})
