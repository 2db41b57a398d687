/**
 * Lattice coordinate types shared by the grid, registry and build session.
 * Base module with no dependencies to avoid circular imports.
 *
 * `x` is the column (world X axis), `y` the row (world Z axis).
 */

export interface GridCoord {
    x: number;
    y: number;
}

/** Convert cell coordinates to a string key for Map lookups */
export function cellKey(x: number, y: number): string {
    return x + ',' + y;
}

export function coordKey(cell: GridCoord): string {
    return cellKey(cell.x, cell.y);
}

/** Inverse of cellKey; returns null for anything that is not "int,int" */
export function parseCellKey(key: string): GridCoord | null {
    const parts = key.split(',');
    if (parts.length !== 2) return null;
    const x = Number(parts[0]);
    const y = Number(parts[1]);
    if (!Number.isInteger(x) || !Number.isInteger(y)) return null;
    return { x, y };
}

export function sameCell(a: GridCoord, b: GridCoord): boolean {
    return a.x === b.x && a.y === b.y;
}

/** 4-directional neighbor offsets (right, left, down, up) */
export const CARDINAL_OFFSETS: ReadonlyArray<readonly [number, number]> = [
    [1, 0], [-1, 0], [0, 1], [0, -1]
];
