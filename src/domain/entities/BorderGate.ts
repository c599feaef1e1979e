/**
 * One border gate record as published by the upstream table.
 * Column 0 is the gate name; the remaining columns (destination country,
 * density, wait time, last update) are kept as the table yields them.
 */
export type GateRow = readonly string[];

/**
 * Ordered gate records, frozen once produced.
 */
export type DataMatrix = readonly GateRow[];

/**
 * Where a result came from.
 */
export type DataSource = 'cache' | 'live';

/**
 * Column positions of the upstream table as currently published.
 */
export const GATE_COLUMNS = {
    NAME: 0,
    COUNTRY: 1,
    DENSITY: 2,
    WAIT_TIME: 3,
    LAST_UPDATED: 4,
} as const;

/**
 * Deep-freezes a freshly built matrix so cached values cannot be mutated
 * through a returned reference.
 */
export function freezeMatrix(rows: ReadonlyArray<readonly string[]>): DataMatrix {
    return Object.freeze(rows.map((row) => Object.freeze([...row])));
}

/**
 * Type guard for values read back from an external store.
 */
export function isDataMatrix(value: unknown): value is string[][] {
    return (
        Array.isArray(value) &&
        value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
    );
}

export function gateName(row: GateRow): string | undefined {
    return row[GATE_COLUMNS.NAME];
}
