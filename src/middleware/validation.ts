import { NextFunction, Request, Response } from 'express';
import { ValidationChain, validationResult } from 'express-validator';
import type { ZodTypeAny } from 'zod';
import { ValidationError } from '../utils/errors';

/** Runs express-validator chains and forwards a ValidationError on failure. */
export const validate = (validations: ValidationChain[]) => {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      for (const validation of validations) {
        await validation.run(req);
      }
    } catch (error) {
      next(error);
      return;
    }

    const errors = validationResult(req);
    if (errors.isEmpty()) {
      next();
      return;
    }

    next(new ValidationError('Invalid request', { errors: errors.array() }));
  };
};

/** Replaces `req.body` with the parsed value; unknown keys are dropped. */
export const validateBody = (schema: ZodTypeAny) => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const parsed = schema.safeParse(req.body ?? {});
    if (!parsed.success) {
      next(new ValidationError('Invalid request payload', { details: parsed.error.flatten() }));
      return;
    }

    req.body = parsed.data;
    next();
  };
};
