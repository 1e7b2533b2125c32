import type { Request, Response, NextFunction } from 'express'
import { logger } from '../config/logger'

/**
 * Custom error class for operational errors
 *
 * - Distinguishes operational errors (expected) from programming errors
 * - Includes HTTP status code for API responses
 */
export class AppError extends Error {
  statusCode: number
  isOperational: boolean

  constructor(message: string, statusCode: number = 500) {
    super(message)
    this.name = 'AppError'
    this.statusCode = statusCode
    this.isOperational = true
    Error.captureStackTrace(this, this.constructor)
  }
}

/**
 * Raised by express.json() when the request body is not valid JSON
 */
function isBodyParseError(err: Error): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed'
}

/**
 * Error handling middleware
 * Must be the last middleware in the chain
 *
 * Handles:
 * - AppError instances (operational errors)
 * - Malformed JSON bodies
 * - Validation errors
 * - Unknown errors
 */
export function errorHandler(
  err: Error | AppError,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler
  next: NextFunction
): void {
  logger.error('Error occurred', {
    error: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  })

  if (err instanceof AppError) {
    res.status(err.statusCode).json({
      error: err.message,
      ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
    })
    return
  }

  if (isBodyParseError(err)) {
    res.status(400).json({ error: 'Malformed JSON body' })
    return
  }

  if (err.name === 'ValidationError') {
    res.status(400).json({ error: err.message })
    return
  }

  res.status(500).json({
    error: 'Internal server error',
    ...(process.env.NODE_ENV === 'development' && { message: err.message, stack: err.stack }),
  })
}
