import * as cheerio from 'cheerio';
import { DataMatrix, freezeMatrix } from '../../domain/entities/BorderGate';
import { NoDataFoundError, NoTableFoundError } from '../../domain/errors/BorderDataErrors';
import { IGateTableParser } from '../../domain/ports/IGateTableParser';

/**
 * Extracts gate rows from the first <table> of the upstream page using cheerio.
 * Header rows (<th> only) and spacer rows (no cell text) are skipped.
 */
export class GateTableParser implements IGateTableParser {
    parse(html: string): DataMatrix {
        const $ = cheerio.load(html);
        const table = $('table').first();

        if (table.length === 0) {
            throw new NoTableFoundError();
        }

        const rows: string[][] = [];
        table.find('tr').each((_, row) => {
            const cells = $(row)
                .find('td')
                .toArray()
                .map((cell) => this.cellText($(cell).text()));

            if (cells.length > 0 && cells.some((cell) => cell !== '')) {
                rows.push(cells);
            }
        });

        if (rows.length === 0) {
            throw new NoDataFoundError();
        }

        return freezeMatrix(rows);
    }

    private cellText(raw: string): string {
        return raw.replace(/\s+/g, ' ').trim();
    }
}
