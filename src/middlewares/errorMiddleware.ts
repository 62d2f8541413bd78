import { Request, Response, NextFunction } from 'express';
import mongoose from 'mongoose';
import { logger } from '../utils/logger';
import { FieldIssue, listIssues } from '../models/validation';
import { StoreUnavailableError } from '../store/types';

const isProd = () => process.env.NODE_ENV === 'production';

// body-parser and friends attach the HTTP status to the error itself.
const attachedStatus = (err: Error): number | undefined => {
  if ('status' in err && typeof err.status === 'number') return err.status;
  return undefined;
};

export const notFound = (req: Request, res: Response, next: NextFunction) => {
  const error = new Error(`Not Found - ${req.originalUrl}`);
  res.status(404);
  next(error);
};

export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  let statusCode = res.statusCode === 200 ? 500 : res.statusCode;
  let message = err.message;
  let errors: FieldIssue[] | undefined;

  if (err instanceof mongoose.Error.ValidationError) {
    statusCode = 422;
    message = 'Validation failed';
    errors = listIssues(err);
  } else if (err instanceof StoreUnavailableError) {
    statusCode = err.statusCode;
  } else {
    statusCode = attachedStatus(err) ?? statusCode;
  }

  const context = {
    message: err.message,
    statusCode,
    method: req.method,
    path: req.originalUrl,
    stack: isProd() ? undefined : err.stack,
  };
  if (statusCode >= 500) {
    logger.error(context, 'API Error');
  } else {
    logger.warn(context, 'API Error');
  }

  res.status(statusCode).json({
    message,
    errors,
    stack: isProd() ? undefined : err.stack,
  });
};
