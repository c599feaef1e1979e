import { DataMatrix } from '../entities/BorderGate';

/**
 * Port for turning the upstream page into a gate matrix.
 */
export interface IGateTableParser {
    /**
     * @throws NoTableFoundError when the page has no table
     * @throws NoDataFoundError when the table has no usable rows
     */
    parse(html: string): DataMatrix;
}
