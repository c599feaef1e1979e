import { DataMatrix, gateName } from '../entities/BorderGate';

/**
 * Folds a gate name for case-insensitive comparison.
 *
 * Plain toLowerCase() maps the Turkish capital İ to "i" plus a combining dot
 * and leaves the dotless ı alone, so both are folded onto a bare "i".
 */
export function foldGateName(name: string): string {
    return name
        .trim()
        .toLowerCase()
        .replace(/\u0307/g, '')
        .replace(/\u0131/g, 'i');
}

/**
 * Folds, deduplicates and sorts a filter list. Blank names are dropped.
 */
export function normalizeGateNames(names: readonly string[] | undefined): string[] {
    if (!names) {
        return [];
    }
    const folded = names.map(foldGateName).filter((name) => name.length > 0);
    return [...new Set(folded)].sort();
}

/**
 * Keeps only the rows whose gate name matches one of `names`.
 * An absent or empty filter returns the matrix unchanged.
 */
export function filterGates(matrix: DataMatrix, names?: readonly string[]): DataMatrix {
    const wanted = new Set(normalizeGateNames(names));
    if (wanted.size === 0) {
        return matrix;
    }

    return Object.freeze(
        matrix.filter((row) => {
            const name = gateName(row);
            return name !== undefined && wanted.has(foldGateName(name));
        })
    );
}
