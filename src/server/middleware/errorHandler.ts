import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';
import { type ErrorResponse, NotFoundError, isOperationalError, toAppError } from '../types/errors.js';

/**
 * Transform any error into the standardized ErrorResponse
 */
export function transformErrorToResponse(err: unknown, req: Request, includeStack = false): ErrorResponse {
    // body-parser reports malformed JSON with a status and type
    if (err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed') {
        return {
            error: 'Bad Request',
            code: 'BAD_REQUEST',
            message: 'Request body is not valid JSON',
            statusCode: 400,
            timestamp: new Date().toISOString(),
            path: req.path,
        };
    }
    if (err instanceof Error && 'type' in err && err.type === 'entity.too.large') {
        return {
            error: 'Payload Too Large',
            code: 'BAD_REQUEST',
            message: 'Request body exceeds the size limit',
            statusCode: 413,
            timestamp: new Date().toISOString(),
            path: req.path,
        };
    }

    const appError = toAppError(err);
    // Internal faults never leak their message
    const message = appError.isOperational ? appError.message : 'An unexpected error occurred';
    return {
        error: appError.name,
        code: appError.code,
        message,
        statusCode: appError.statusCode,
        timestamp: new Date().toISOString(),
        path: req.path,
        ...(appError.isOperational && appError.context && { context: appError.context }),
        ...(includeStack && appError.stack && { stack: appError.stack }),
    };
}

/**
 * 404 for any route not matched above it
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
}

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app
 */
export function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    if (err instanceof NotFoundError) {
        logger.info({ message: err.message, path: req.path, method: req.method }, 'Resource not found');
    } else if (isOperationalError(err)) {
        logger.warn({ error: err, path: req.path, method: req.method }, 'Request failed');
    } else {
        logger.error(
            {
                error: err,
                stack: err instanceof Error ? err.stack : undefined,
                path: req.path,
                method: req.method,
            },
            'Unhandled error'
        );
    }

    const errorResponse = transformErrorToResponse(err, req, process.env.NODE_ENV === 'development');

    if (res.headersSent) {
        logger.debug({ path: req.path }, 'Response already sent, skipping error body');
        return;
    }
    res.status(errorResponse.statusCode).json(errorResponse);
}
