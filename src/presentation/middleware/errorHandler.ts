import { Request, Response, NextFunction } from 'express';
import { ConstraintViolationError } from '../../domain/entities/DurationConstraints';

/**
 * Application-specific error with status code.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string,
        public readonly details?: unknown
    ) {
        super(message);
        this.name = 'AppError';
    }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
    constructor(message: string = 'Bad request', details?: unknown) {
        super(400, message, details);
        this.name = 'BadRequestError';
    }
}

/**
 * Error response structure.
 */
interface ErrorResponse {
    error: {
        message: string;
        code: string;
        details?: unknown;
    };
}

/**
 * Maps errors from below the HTTP layer onto AppErrors.
 */
function toAppError(err: Error): AppError | null {
    if (err instanceof AppError) {
        return err;
    }
    if (err instanceof ConstraintViolationError) {
        return new BadRequestError(err.message);
    }
    // express.json() rejects unparseable bodies with a SyntaxError carrying the raw body
    if (err instanceof SyntaxError && 'body' in err) {
        return new BadRequestError('Request body is not valid JSON');
    }
    return null;
}

/**
 * Global error handler middleware.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction
): void {
    const appError = toAppError(err);

    if (appError && appError.statusCode < 500) {
        console.warn(`[WARN] ${appError.name}: ${appError.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    if (appError) {
        const response: ErrorResponse = {
            error: {
                message: appError.message,
                code: appError.name,
                details: appError.details,
            },
        };
        res.status(appError.statusCode).json(response);
        return;
    }

    // Generic server error
    const response: ErrorResponse = {
        error: {
            message: process.env.NODE_ENV === 'production'
                ? 'Internal server error'
                : err.message,
            code: 'INTERNAL_ERROR',
        },
    };
    res.status(500).json(response);
}

/**
 * Async route handler wrapper to catch errors.
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        return Promise.resolve(fn(req, res, next)).catch(next);
    };
}
