import { DateRange } from '../entities/DateRange';

/**
 * Port for downloading the upstream border density page.
 */
export interface IBorderPageFetcher {
    /**
     * Issues a single request for the given range. No retries.
     * @returns Raw HTML of the page
     * @throws UpstreamTimeoutError, UpstreamHttpError or UpstreamTransportError
     */
    fetchPage(range: DateRange): Promise<string>;
}
