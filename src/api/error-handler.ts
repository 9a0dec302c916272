/**
 * Error Handler Middleware
 */

import type { NextFunction, Request, Response } from 'express'
import type { Logger } from 'pino'
import { MutexError, ProtocolViolation } from '../errors'

export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string,
    public details?: string[]
  ) {
    super(message)
    this.name = 'ApiError'
  }
}

export function createErrorHandler(logger: Logger) {
  return (error: Error, req: Request, res: Response, _next: NextFunction): void => {
    if (error instanceof ApiError) {
      res.status(error.statusCode).json({ error: error.message, code: error.code, details: error.details })
      return
    }

    if ('type' in error && error.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'Malformed JSON body', code: 'VALIDATION_ERROR' })
      return
    }

    if (error instanceof ProtocolViolation) {
      logger.warn({ path: req.path, error: error.message }, 'Rejected protocol violation')
      res.status(409).json({ error: error.message, code: error.code })
      return
    }

    logger.error({ error: error.message, stack: error.stack, path: req.path, method: req.method }, 'Error handling request')
    const code = error instanceof MutexError ? error.code : undefined
    res.status(500).json({ error: 'Internal server error', code })
  }
}
