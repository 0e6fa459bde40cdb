import { NextFunction, Request, Response } from 'express';
import { config } from '../config/env';
import { ApiResponse, ErrorBody } from '../utils/ApiResponse';
import { AppError } from '../utils/errors';
import { Logger } from '../utils/loggers';

// body-parser and friends attach a 4xx `status` to client errors
const clientStatus = (error: unknown): number | null => {
  if (typeof error !== 'object' || error === null || !('status' in error)) return null;
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
};

export const errorHandler = (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const stack = error instanceof Error ? error.stack : undefined;
  let body: ErrorBody;

  if (error instanceof AppError) {
    body = ApiResponse.error(error.message, error.statusCode, error.code, error.details);
  } else {
    const status = clientStatus(error);
    if (status !== null) {
      body = ApiResponse.error(error instanceof Error ? error.message : 'Bad request', status, 'BAD_REQUEST');
    } else {
      Logger.error(`Unhandled error on ${req.method} ${req.path}`, error);
      // Don't expose internal errors in production
      const message = config.isDevelopment && error instanceof Error ? error.message : 'Server error';
      body = ApiResponse.error(message, 500, 'INTERNAL_ERROR');
    }
  }

  if (body.statusCode >= 500 && error instanceof AppError) {
    Logger.error(`${error.code} on ${req.method} ${req.path}`, error.message);
  }
  if (config.isDevelopment && stack) {
    body.stack = stack;
  }

  res.status(body.statusCode).json(body);
};
