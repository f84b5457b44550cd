import type { Request, Response, NextFunction } from 'express';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';
import { createLogger } from '../services/logger.js';

const logger = createLogger('Validation');

export interface ValidationIssue {
  field: string;
  message: string;
}

function toIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      req.body = schema.parse(req.body);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const issues = toIssues(error);
        logger.warn('Validation failed', { path: req.path, issues });
        res.status(400).json({
          error: 'Validation failed',
          issues,
        });
        return;
      }
      next(error);
    }
  };
}

/**
 * Parsed query is placed on res.locals.query; req.query keeps the raw strings
 */
export function validateQuery<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      res.locals.query = schema.parse(req.query);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const issues = toIssues(error);
        logger.warn('Query validation failed', { path: req.path, issues });
        res.status(400).json({
          error: 'Invalid query parameters',
          issues,
        });
        return;
      }
      next(error);
    }
  };
}
