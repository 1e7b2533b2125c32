import type { Request, Response, NextFunction } from 'express'
import { ZodError, type ZodTypeAny } from 'zod'
import { validationResult } from 'express-validator'
import { AppError } from './error.middleware'

/**
 * Zod validation middleware
 * Used for request body validation
 *
 * The parsed value replaces `req.body`, so schema defaults and coercions
 * reach the controller. Accepts ZodObject and ZodEffects alike.
 */
export const validate = (schema: ZodTypeAny) => async (req: Request, res: Response, next: NextFunction) => {
  try {
    req.body = await schema.parseAsync(req.body ?? {})
    next()
  } catch (error) {
    if (error instanceof ZodError) {
      const errorMessage = error.errors.map((err) => err.message).join(', ')
      next(new AppError(errorMessage, 400))
    } else {
      next(error)
    }
  }
}

/**
 * Express-validator validation middleware
 * Checks validation results from express-validator chains
 * Must be used after express-validator validation chains
 */
export const validateRequest = (req: Request, res: Response, next: NextFunction): void => {
  const errors = validationResult(req)
  if (!errors.isEmpty()) {
    const errorMessages = errors
      .array()
      .map((err) => err.msg)
      .join(', ')
    next(new AppError(errorMessages, 400))
    return
  }
  next()
}
