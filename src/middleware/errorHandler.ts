import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { logger } from '../utils/logger';

export class AppError extends Error {
  constructor(
    public message: string,
    public statusCode: number = 500,
    public code: string = 'INTERNAL_ERROR',
    public isOperational = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

function errorBody(code: string, message: string, statusCode: number, path: string) {
  return {
    error: {
      code,
      message,
      statusCode,
      timestamp: new Date().toISOString(),
      path,
    },
  };
}

export const errorHandler = (
  err: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const statusCode = err instanceof AppError ? err.statusCode : 500;
  const errorCode = err instanceof AppError ? err.code : 'INTERNAL_ERROR';
  const message = err.message || 'Internal server error';
  const isDevelopment = config.server.env === 'development';

  logger.error('Error occurred', {
    statusCode,
    errorCode,
    message,
    path: req.path,
    method: req.method,
    ip: req.ip,
    stack: isDevelopment ? err.stack : undefined,
  });

  res.status(statusCode).json({
    ...errorBody(errorCode, message, statusCode, req.path),
    ...(isDevelopment && { stack: err.stack }),
  });
};

export const notFoundHandler = (req: Request, res: Response) => {
  logger.warn(`Route not found: ${req.method} ${req.path}`);
  res.status(404).json(errorBody('NOT_FOUND', 'Route not found', 404, req.path));
};
