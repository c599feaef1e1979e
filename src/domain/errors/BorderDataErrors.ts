import { DateRange, toIsoDate } from '../entities/DateRange';

/**
 * Stable machine-readable failure codes.
 */
export type BorderDataErrorCode =
    | 'INVALID_DATE_RANGE'
    | 'UPSTREAM_TIMEOUT'
    | 'UPSTREAM_HTTP_ERROR'
    | 'UPSTREAM_TRANSPORT_ERROR'
    | 'NO_TABLE_FOUND'
    | 'NO_DATA_FOUND'
    | 'INTERNAL_ERROR';

/**
 * Coarse failure classes the HTTP layer maps to status codes.
 */
export type BorderDataErrorCategory =
    | 'InvalidInput'
    | 'UpstreamUnavailable'
    | 'NotFound'
    | 'InternalError';

/**
 * Base class for every failure raised by the border data pipeline.
 */
export abstract class BorderDataError extends Error {
    abstract readonly code: BorderDataErrorCode;
    abstract readonly category: BorderDataErrorCategory;

    constructor(
        message: string,
        public readonly details?: string
    ) {
        super(message);
        this.name = new.target.name;
    }
}

export class InvalidDateRangeError extends BorderDataError {
    readonly code = 'INVALID_DATE_RANGE';
    readonly category = 'InvalidInput';

    constructor(range: DateRange) {
        super(
            'Start date must be before or equal to end date',
            `Start: ${toIsoDate(range.start)}, End: ${toIsoDate(range.end)}`
        );
    }
}

export class UpstreamTimeoutError extends BorderDataError {
    readonly code = 'UPSTREAM_TIMEOUT';
    readonly category = 'UpstreamUnavailable';

    constructor(public readonly timeoutMs: number) {
        super('Data source did not respond in time', `No response within ${timeoutMs}ms`);
    }
}

export class UpstreamHttpError extends BorderDataError {
    readonly code = 'UPSTREAM_HTTP_ERROR';
    readonly category = 'UpstreamUnavailable';

    constructor(public readonly status: number) {
        super('Data source unavailable', `Data source responded with HTTP ${status}`);
    }
}

export class UpstreamTransportError extends BorderDataError {
    readonly code = 'UPSTREAM_TRANSPORT_ERROR';
    readonly category = 'UpstreamUnavailable';

    constructor(public readonly detail: string) {
        super('Unable to reach data source', detail);
    }
}

export class NoTableFoundError extends BorderDataError {
    readonly code = 'NO_TABLE_FOUND';
    readonly category = 'NotFound';

    constructor() {
        super('No data table found on the source website');
    }
}

export class NoDataFoundError extends BorderDataError {
    readonly code = 'NO_DATA_FOUND';
    readonly category = 'NotFound';

    constructor() {
        super('No border gate data found in the specified date range');
    }
}

export class InternalError extends BorderDataError {
    readonly code = 'INTERNAL_ERROR';
    readonly category = 'InternalError';

    constructor(cause: unknown) {
        super(
            'Unexpected error while processing border gate data',
            cause instanceof Error ? cause.message : String(cause)
        );
    }
}
