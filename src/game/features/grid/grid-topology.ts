/**
 * World <-> lattice mapping and placement validation for raft cells.
 *
 * Cells lie on the horizontal plane: column x runs along world X,
 * row y along world Z. Heights are left to the caller (normally the
 * wave height at the cell).
 */

import { CARDINAL_OFFSETS, cellKey, parseCellKey, type GridCoord } from '../../coordinates';
import type { Footprint } from '../catalog/types';
import type { Vec3 } from '@/utilities/vec3';
import { PlacementStatus, type OccupancyView, type PlacementResult } from './types';

/** Round to nearest integer with ties away from zero; never returns -0 */
export function roundHalfAwayFromZero(value: number): number {
    const rounded = Math.sign(value) * Math.round(Math.abs(value));
    return rounded === 0 ? 0 : rounded;
}

export class GridTopology {
    constructor(public readonly cellSize: number) {
        if (!(cellSize > 0)) {
            throw new Error(`GridTopology: cellSize must be positive, got ${cellSize}`);
        }
    }

    worldToGrid(pos: Vec3): GridCoord {
        return {
            x: roundHalfAwayFromZero(pos.x / this.cellSize),
            y: roundHalfAwayFromZero(pos.z / this.cellSize),
        };
    }

    /** Cell center on the horizontal plane (y = 0) */
    gridToWorld(cell: GridCoord): Vec3 {
        return {
            x: cell.x * this.cellSize,
            y: 0,
            z: cell.y * this.cellSize,
        };
    }

    /** World-space mean of the footprint's cell centers */
    footprintCenter(origin: GridCoord, footprint: Footprint): Vec3 {
        return {
            x: (origin.x + (footprint.width - 1) / 2) * this.cellSize,
            y: 0,
            z: (origin.y + (footprint.depth - 1) / 2) * this.cellSize,
        };
    }
}

/** All cells covered by a footprint anchored at `origin`, row by row */
export function footprintCells(origin: GridCoord, footprint: Footprint): GridCoord[] {
    const cells: GridCoord[] = [];
    for (let dy = 0; dy < footprint.depth; dy++) {
        for (let dx = 0; dx < footprint.width; dx++) {
            cells.push({ x: origin.x + dx, y: origin.y + dy });
        }
    }
    return cells;
}

/** True if any of the cell's four orthogonal neighbors is occupied */
export function touchesStructure(cell: GridCoord, occupancy: OccupancyView): boolean {
    return CARDINAL_OFFSETS.some(([dx, dy]) => occupancy.has(cellKey(cell.x + dx, cell.y + dy)));
}

/**
 * Validate a placement with detailed status.
 *
 * Adjacency is checked for the origin cell only; a multi-cell item whose
 * other cells touch the structure is still rejected if the origin does not.
 */
export function validatePlacement(
    origin: GridCoord,
    footprint: Footprint,
    occupancy: OccupancyView,
): PlacementResult {
    for (const cell of footprintCells(origin, footprint)) {
        if (occupancy.has(cellKey(cell.x, cell.y))) {
            return { canPlace: false, status: PlacementStatus.Occupied };
        }
    }

    // First tile of a structure may go anywhere
    if (occupancy.size > 0 && !touchesStructure(origin, occupancy)) {
        return { canPlace: false, status: PlacementStatus.NotAdjacent };
    }

    return { canPlace: true, status: PlacementStatus.Valid };
}

/** Boolean form of validatePlacement */
export function isValidPlacement(
    origin: GridCoord,
    footprint: Footprint,
    occupancy: OccupancyView,
): boolean {
    return validatePlacement(origin, footprint, occupancy).canPlace;
}

/**
 * Unoccupied orthogonal neighbors of all occupied cells, each listed once
 * in discovery order. Drives placement-hint highlighting.
 */
export function frontier(occupancy: OccupancyView): GridCoord[] {
    const seen = new Set<string>();
    const result: GridCoord[] = [];

    for (const key of occupancy.keys()) {
        const cell = parseCellKey(key);
        if (!cell) continue;
        for (const [dx, dy] of CARDINAL_OFFSETS) {
            const nx = cell.x + dx;
            const ny = cell.y + dy;
            const nKey = cellKey(nx, ny);
            if (occupancy.has(nKey) || seen.has(nKey)) continue;
            seen.add(nKey);
            result.push({ x: nx, y: ny });
        }
    }

    return result;
}
