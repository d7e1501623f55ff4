import { ZodError } from 'zod';

export class AppError extends Error {
  status: number;
  code: string;
  constructor(message: string, status = 400, code = 'BAD_REQUEST'){
    super(message);
    this.name = 'AppError';
    this.status = status;
    this.code = code;
  }
}

// Raised when a caller hands the layout engine values it should have validated
export class InvalidArgumentError extends AppError {
  constructor(message: string){
    super(message, 400, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

export interface ErrorPayload {
  message: string;
  code: string;
  issues?: { path: (string | number)[]; message: string }[];
}

export function toErrorPayload(e: unknown): ErrorPayload {
  if(e instanceof AppError){
    return { message: e.message, code: e.code };
  }
  if(e instanceof ZodError){
    return {
      message: 'Validation failed',
      code: 'VALIDATION',
      issues: e.issues.map(i => ({ path: i.path, message: i.message }))
    };
  }
  return { message: 'Internal error', code: 'INTERNAL_ERROR' };
}
