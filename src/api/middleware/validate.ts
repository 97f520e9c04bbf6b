import type { Request, Response, NextFunction } from 'express';
import { validationResult, type ValidationChain, type ValidationError } from 'express-validator';

function describe(error: ValidationError): string {
  return error.type === 'field' ? `${error.path}: ${error.msg}` : String(error.msg);
}

/** Runs the chains in order; on failure answers 400 with the same { error, details } shape as sendError. */
export function validate(validations: ValidationChain[]) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    for (const validation of validations) {
      await validation.run(req);
    }
    const errors = validationResult(req);
    if (errors.isEmpty()) {
      next();
      return;
    }
    res.status(400).json({ error: 'Validation failed', details: errors.array().map(describe) });
  };
}
