
import { Request, Response, NextFunction } from 'express';
import {
    errorHandler,
    asyncHandler,
    AppError,
    NotFoundError,
    BadRequestError,
    statusForBorderDataError,
} from '../../../../src/presentation/middleware/errorHandler';
import {
    InternalError,
    InvalidDateRangeError,
    NoDataFoundError,
    NoTableFoundError,
    UpstreamHttpError,
    UpstreamTimeoutError,
    UpstreamTransportError,
} from '../../../../src/domain/errors/BorderDataErrors';

describe('Error Handling Middleware', () => {
    describe('AppError Classes', () => {
        test('AppError should set properties correctly', () => {
            const err = new AppError(418, 'I am a teapot');
            expect(err.statusCode).toBe(418);
            expect(err.message).toBe('I am a teapot');
            expect(err.code).toBe('APP_ERROR');
            expect(err.name).toBe('AppError');
        });

        test('NotFoundError should default to 404', () => {
            const err = new NotFoundError();
            expect(err.statusCode).toBe(404);
            expect(err.message).toBe('Resource not found');
            expect(err.code).toBe('NOT_FOUND');
            expect(err.name).toBe('NotFoundError');
        });

        test('BadRequestError should carry a code and details', () => {
            const err = new BadRequestError('Bad input', 'INVALID_START_DATE', 'Received: x');
            expect(err.statusCode).toBe(400);
            expect(err.message).toBe('Bad input');
            expect(err.code).toBe('INVALID_START_DATE');
            expect(err.details).toBe('Received: x');
            expect(err.name).toBe('BadRequestError');
        });
    });

    describe('statusForBorderDataError', () => {
        const range = { start: { year: 2024, month: 12, day: 31 }, end: { year: 2024, month: 12, day: 1 } };

        test.each([
            [new InvalidDateRangeError(range), 400],
            [new UpstreamTimeoutError(30000), 503],
            [new UpstreamHttpError(502), 503],
            [new UpstreamTransportError('ECONNRESET: socket hang up'), 503],
            [new NoTableFoundError(), 404],
            [new NoDataFoundError(), 404],
            [new InternalError(new Error('boom')), 500],
        ])('%s should map to %i', (err, status) => {
            expect(statusForBorderDataError(err)).toBe(status);
        });
    });

    describe('errorHandler', () => {
        let req: Partial<Request>;
        let res: Partial<Response>;
        let next: NextFunction;

        beforeEach(() => {
            req = {
                method: 'GET',
                path: '/test'
            };
            res = {
                status: jest.fn().mockReturnThis(),
                json: jest.fn()
            };
            next = jest.fn();
            jest.spyOn(console, 'error').mockImplementation(() => { });
            jest.spyOn(console, 'warn').mockImplementation(() => { });
        });

        afterEach(() => {
            jest.restoreAllMocks();
        });

        test('should handle AppError correctly', () => {
            const err = new BadRequestError('Invalid ID', 'INVALID_ID');
            errorHandler(err, req as Request, res as Response, next);

            expect(res.status).toHaveBeenCalledWith(400);
            expect(res.json).toHaveBeenCalledWith({
                success: false,
                error_code: 'INVALID_ID',
                message: 'Invalid ID',
            });
        });

        test('should handle NotFoundError with warning log', () => {
            const err = new NotFoundError('Gate not found');
            errorHandler(err, req as Request, res as Response, next);

            expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('NotFoundError: Gate not found (GET /test)'));
            expect(res.status).toHaveBeenCalledWith(404);
        });

        test('should map upstream failures to 503 with details', () => {
            const err = new UpstreamHttpError(502);
            errorHandler(err, req as Request, res as Response, next);

            expect(res.status).toHaveBeenCalledWith(503);
            expect(res.json).toHaveBeenCalledWith({
                success: false,
                error_code: 'UPSTREAM_HTTP_ERROR',
                message: 'Data source unavailable',
                details: 'Data source responded with HTTP 502',
            });
            expect(console.error).toHaveBeenCalledWith(
                expect.stringContaining('UPSTREAM_HTTP_ERROR: Data source unavailable (GET /test)')
            );
        });

        test('should log client-side pipeline errors as warnings', () => {
            errorHandler(new NoDataFoundError(), req as Request, res as Response, next);

            expect(res.status).toHaveBeenCalledWith(404);
            expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('NO_DATA_FOUND'));
            expect(console.error).not.toHaveBeenCalled();
        });

        test('should handle generic Error as 500 Internal Server Error (production)', () => {
            const originalEnv = process.env.NODE_ENV;
            process.env.NODE_ENV = 'production';

            const err = new Error('Database connection failed');
            errorHandler(err, req as Request, res as Response, next);

            expect(res.status).toHaveBeenCalledWith(500);
            expect(res.json).toHaveBeenCalledWith({
                success: false,
                error_code: 'INTERNAL_ERROR',
                message: 'Internal server error',
            });
            expect(console.error).toHaveBeenCalled();

            process.env.NODE_ENV = originalEnv;
        });

        test('should show error details in non-production', () => {
            const originalEnv = process.env.NODE_ENV;
            process.env.NODE_ENV = 'development';

            const err = new Error('Database connection failed');
            errorHandler(err, req as Request, res as Response, next);

            expect(res.status).toHaveBeenCalledWith(500);
            expect(res.json).toHaveBeenCalledWith({
                success: false,
                error_code: 'INTERNAL_ERROR',
                message: 'Database connection failed',
            });

            process.env.NODE_ENV = originalEnv;
        });
    });

    describe('asyncHandler', () => {
        test('should execute the function and catch errors', async () => {
            const mockFn = jest.fn().mockRejectedValue(new Error('Async error'));
            const req = {} as Request;
            const res = {} as Response;
            const next = jest.fn();

            const wrapped = asyncHandler(mockFn);
            await wrapped(req, res, next);

            expect(mockFn).toHaveBeenCalledWith(req, res, next);
            expect(next).toHaveBeenCalledWith(expect.any(Error));
        });

        test('should work with successful async function', async () => {
            const mockFn = jest.fn().mockResolvedValue(undefined);
            const req = {} as Request;
            const res = {} as Response;
            const next = jest.fn();

            const wrapped = asyncHandler(mockFn);
            await wrapped(req, res, next);

            expect(mockFn).toHaveBeenCalled();
            expect(next).not.toHaveBeenCalled();
        });
    });
});
