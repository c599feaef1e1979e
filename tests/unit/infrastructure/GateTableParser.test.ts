import { GateTableParser } from '../../../src/infrastructure/scraper/GateTableParser';
import { NoDataFoundError, NoTableFoundError } from '../../../src/domain/errors/BorderDataErrors';
import { borderPage, HAMZABEYLI, KAPIKULE } from '../../helpers/borderPage';

describe('GateTableParser', () => {
    const parser = new GateTableParser();

    describe('parse()', () => {
        it('should extract data rows and skip the header row', () => {
            const result = parser.parse(borderPage([KAPIKULE, HAMZABEYLI]));

            expect(result).toEqual([KAPIKULE, HAMZABEYLI]);
        });

        it('should discard an entirely blank row', () => {
            const html = borderPage(
                [KAPIKULE, HAMZABEYLI],
                '<tr><td> </td><td></td><td>\n</td><td></td><td></td></tr>'
            );

            const result = parser.parse(html);

            expect(result).toHaveLength(2);
        });

        it('should discard rows without cells', () => {
            const result = parser.parse(borderPage([KAPIKULE], '<tr></tr>'));

            expect(result).toEqual([KAPIKULE]);
        });

        it('should keep rows where only some cells are blank', () => {
            const partial = ['Sarp', 'Georgia', '', '', ''];

            const result = parser.parse(borderPage([partial]));

            expect(result).toEqual([partial]);
        });

        it('should trim cell text and collapse inner whitespace', () => {
            const html = `
                <table>
                    <tr><td>
                        Kapıkule
                    </td><td> Bulgaria </td><td>Normal</td><td>30-45
                        min</td><td><span>2024-12-15</span> <span>14:30</span></td></tr>
                </table>
            `;

            expect(parser.parse(html)).toEqual([KAPIKULE]);
        });

        it('should only read the first table in the document', () => {
            const html = `
                <table><tr><td>Kapıkule</td><td>Bulgaria</td></tr></table>
                <table><tr><td>Ipsala</td><td>Greece</td></tr></table>
            `;

            expect(parser.parse(html)).toEqual([['Kapıkule', 'Bulgaria']]);
        });

        it('should return a frozen matrix', () => {
            const result = parser.parse(borderPage([KAPIKULE]));

            expect(Object.isFrozen(result)).toBe(true);
            expect(Object.isFrozen(result[0])).toBe(true);
        });

        it('should fail with NoTableFoundError when the page has no table', () => {
            expect(() => parser.parse('<html><body><p>Bakım çalışması</p></body></html>')).toThrow(
                NoTableFoundError
            );
        });

        it('should fail with NoDataFoundError when the table has only headers', () => {
            expect(() => parser.parse(borderPage([]))).toThrow(NoDataFoundError);
        });

        it('should fail with NoDataFoundError for an empty document', () => {
            expect(() => parser.parse('<table></table>')).toThrow(NoDataFoundError);
        });
    });
});
