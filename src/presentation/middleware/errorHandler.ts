import { Request, Response, NextFunction } from 'express';
import { BorderDataError, BorderDataErrorCategory } from '../../domain/errors/BorderDataErrors';

/**
 * Application-specific error with status code and stable error code.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string,
        public readonly code: string = 'APP_ERROR',
        public readonly details?: string
    ) {
        super(message);
        this.name = 'AppError';
    }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found', code: string = 'NOT_FOUND', details?: string) {
        super(404, message, code, details);
        this.name = 'NotFoundError';
    }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
    constructor(message: string = 'Bad request', code: string = 'BAD_REQUEST', details?: string) {
        super(400, message, code, details);
        this.name = 'BadRequestError';
    }
}

/**
 * Error response structure.
 */
export interface ErrorResponse {
    success: false;
    error_code: string;
    message: string;
    details?: string;
}

const STATUS_BY_CATEGORY: Record<BorderDataErrorCategory, number> = {
    InvalidInput: 400,
    UpstreamUnavailable: 503,
    NotFound: 404,
    InternalError: 500,
};

export function statusForBorderDataError(err: BorderDataError): number {
    return STATUS_BY_CATEGORY[err.category];
}

function toResponse(code: string, message: string, details?: string): ErrorResponse {
    const response: ErrorResponse = { success: false, error_code: code, message };
    if (details !== undefined) {
        response.details = details;
    }
    return response;
}

/**
 * Global error handler middleware.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    // Express recognises error middleware by its four parameters
    _next: NextFunction
): void {
    if (err instanceof BorderDataError) {
        const status = statusForBorderDataError(err);
        if (status >= 500) {
            console.error(`[ERROR] ${err.code}: ${err.message} (${req.method} ${req.path})`);
        } else {
            console.warn(`[WARN] ${err.code}: ${err.message} (${req.method} ${req.path})`);
        }
        res.status(status).json(toResponse(err.code, err.message, err.details));
        return;
    }

    if (err instanceof AppError) {
        console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
        res.status(err.statusCode).json(toResponse(err.code, err.message, err.details));
        return;
    }

    console.error(`[ERROR] ${err.name}: ${err.message}`);
    if (err.stack) {
        console.error(err.stack);
    }

    // Generic server error
    res.status(500).json(
        toResponse(
            'INTERNAL_ERROR',
            process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message
        )
    );
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
