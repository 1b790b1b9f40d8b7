import type { Request, Response, NextFunction, RequestHandler } from 'express';
import morgan from 'morgan';
import type { z } from 'zod';
import { PRINCIPAL_HEADER } from '@shared/constants';
import type { ApiResponse } from '@shared/types';
import { DeskError, ValidationError, type DeskErrorCode } from '@core/errors';
import type { CallerContext } from '@core/report-context';

export const requestLogger = morgan('dev');

export class MissingPrincipalError extends Error {
  readonly status = 401;

  constructor() {
    super(`${PRINCIPAL_HEADER} header is required`);
    this.name = 'MissingPrincipalError';
  }
}

const STATUS_BY_CODE: Record<DeskErrorCode, number> = {
  UNAUTHORIZED: 403,
  INVALID_INPUT: 400,
  UNKNOWN_REPORT: 404,
  UNKNOWN_REQUEST: 404,
  INVALID_STATE: 409,
  TIMEOUT_NOT_REACHED: 409,
  INVALID_PROOF: 422,
};

/** Client errors raised by express middleware (body-parser) carry their own status. */
function clientStatus(err: Error): number | null {
  if (!('status' in err)) return null;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function statusForError(err: Error): number {
  if (err instanceof DeskError) return STATUS_BY_CODE[err.code];
  if (err instanceof MissingPrincipalError) return err.status;
  return clientStatus(err) ?? 500;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  const status = statusForError(err);
  if (status >= 500) {
    console.error('[ERROR]', err);
  }
  const body: ApiResponse = { success: false, error: status >= 500 ? 'Internal server error' : err.message };
  res.status(status).json(body);
}

/** Forwards a rejected handler promise to the error handler. */
export function asyncHandler(
  fn: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export function callerContext(req: Request): CallerContext {
  const caller = req.header(PRINCIPAL_HEADER);
  if (!caller) {
    throw new MissingPrincipalError();
  }
  return { caller };
}

export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ValidationError(`${where}${issue?.message ?? 'Invalid request'}`);
  }
  return result.data;
}
