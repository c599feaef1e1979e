import axios from 'axios';
import { DEFAULT_BORDER_SOURCE_URL, DEFAULT_USER_AGENT } from '../../domain/entities/BorderSource';
import { DateFormat, DateRange, formatCalendarDate } from '../../domain/entities/DateRange';
import {
    UpstreamHttpError,
    UpstreamTimeoutError,
    UpstreamTransportError,
} from '../../domain/errors/BorderDataErrors';
import { IBorderPageFetcher } from '../../domain/ports/IBorderPageFetcher';

export interface HttpBorderPageFetcherOptions {
    baseUrl?: string;
    /** Layout of the START_DATE / END_DATE query values */
    dateFormat?: DateFormat;
    timeoutMs?: number;
    userAgent?: string;
}

/**
 * Downloads the border density page with axios. One attempt per call.
 */
export class HttpBorderPageFetcher implements IBorderPageFetcher {
    private readonly baseUrl: string;
    private readonly dateFormat: DateFormat;
    private readonly timeoutMs: number;
    private readonly userAgent: string;

    constructor(options?: HttpBorderPageFetcherOptions) {
        this.baseUrl = options?.baseUrl ?? DEFAULT_BORDER_SOURCE_URL;
        this.dateFormat = options?.dateFormat ?? 'DD-MM-YYYY';
        this.timeoutMs = options?.timeoutMs ?? 30000;
        this.userAgent = options?.userAgent ?? DEFAULT_USER_AGENT;
    }

    async fetchPage(range: DateRange): Promise<string> {
        const params = {
            START_DATE: formatCalendarDate(range.start, this.dateFormat),
            END_DATE: formatCalendarDate(range.end, this.dateFormat),
        };

        try {
            const response = await axios.get<string>(this.baseUrl, {
                params,
                headers: {
                    'User-Agent': this.userAgent,
                    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                    'Accept-Language': 'tr-TR,tr;q=0.9,en-US;q=0.8,en;q=0.5',
                },
                timeout: this.timeoutMs,
                responseType: 'text',
                maxRedirects: 5,
            });
            return response.data;
        } catch (error) {
            if (axios.isAxiosError(error)) {
                if (error.response) {
                    console.error(`[BorderPageFetcher] HTTP ${error.response.status} from data source`);
                    throw new UpstreamHttpError(error.response.status);
                }
                if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
                    console.error(`[BorderPageFetcher] Request timed out after ${this.timeoutMs}ms`);
                    throw new UpstreamTimeoutError(this.timeoutMs);
                }
                const detail = error.code ? `${error.code}: ${error.message}` : error.message;
                console.error(`[BorderPageFetcher] Transport failure: ${detail}`);
                throw new UpstreamTransportError(detail);
            }
            throw error;
        }
    }
}
