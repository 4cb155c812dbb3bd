import { Request, Response, NextFunction } from 'express';
import { validationResult, ValidationChain, ValidationError } from 'express-validator';

export interface ValidationIssue {
  field: string;
  location?: string;
  message: string;
}

function toIssue(error: ValidationError): ValidationIssue {
  if (error.type === 'field') {
    return { field: error.path, location: error.location, message: String(error.msg) };
  }
  return { field: error.type, message: String(error.msg) };
}

/**
 * Run the chains and answer 422 before the handler sees an invalid request,
 * so handlers can read the body as its declared shape.
 */
export function validate(validations: ValidationChain[]) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await Promise.all(validations.map((v) => v.run(req)));
    const result = validationResult(req);
    if (result.isEmpty()) {
      next();
      return;
    }
    const details = result.array({ onlyFirstError: true }).map(toIssue);
    res.status(422).json({ error: 'Validation failed', details });
  };
}
