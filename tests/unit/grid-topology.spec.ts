import { describe, it, expect } from 'vitest';
import {
    GridTopology,
    PlacementStatus,
    footprintCells,
    frontier,
    isValidPlacement,
    roundHalfAwayFromZero,
    touchesStructure,
    validatePlacement,
} from '@/game/features/grid';
import { cellKey } from '@/game/coordinates';

function occupancyOf(...cells: Array<[number, number]>): Map<string, number> {
    const map = new Map<string, number>();
    cells.forEach(([x, y], i) => map.set(cellKey(x, y), i + 1));
    return map;
}

const SINGLE = { width: 1, depth: 1 };
const SQUARE = { width: 2, depth: 2 };

describe('roundHalfAwayFromZero', () => {
    it('should round ties away from zero', () => {
        expect(roundHalfAwayFromZero(2.5)).toBe(3);
        expect(roundHalfAwayFromZero(-2.5)).toBe(-3);
        expect(roundHalfAwayFromZero(1.49)).toBe(1);
        expect(roundHalfAwayFromZero(-1.51)).toBe(-2);
    });

    it('should never return negative zero', () => {
        expect(Object.is(roundHalfAwayFromZero(-0.4), 0)).toBe(true);
        expect(Object.is(roundHalfAwayFromZero(-0), 0)).toBe(true);
    });
});

describe('GridTopology', () => {
    const topology = new GridTopology(2);

    it('should reject a non-positive cell size', () => {
        expect(() => new GridTopology(0)).toThrow();
        expect(() => new GridTopology(-1)).toThrow();
    });

    it('should snap world positions to the nearest cell', () => {
        expect(topology.worldToGrid({ x: 3, y: 7, z: -3 })).toEqual({ x: 2, y: -2 });
        expect(topology.worldToGrid({ x: 0.9, y: 0, z: -0.9 })).toEqual({ x: 0, y: 0 });
        expect(topology.worldToGrid({ x: 4.1, y: 0, z: 5.9 })).toEqual({ x: 2, y: 3 });
    });

    it('should map cells to their world-space centers on the plane', () => {
        expect(topology.gridToWorld({ x: 2, y: -3 })).toEqual({ x: 4, y: 0, z: -6 });
    });

    it('should round-trip every cell through world space', () => {
        for (let x = -5; x <= 5; x++) {
            for (let y = -5; y <= 5; y++) {
                expect(topology.worldToGrid(topology.gridToWorld({ x, y }))).toEqual({ x, y });
            }
        }
    });

    it('should center multi-cell footprints between their cells', () => {
        expect(topology.footprintCenter({ x: 0, y: 0 }, SQUARE)).toEqual({ x: 1, y: 0, z: 1 });
        expect(topology.footprintCenter({ x: 1, y: 1 }, { width: 2, depth: 1 })).toEqual({ x: 3, y: 0, z: 2 });
        expect(topology.footprintCenter({ x: -1, y: 4 }, SINGLE)).toEqual({ x: -2, y: 0, z: 8 });
    });
});

describe('footprintCells', () => {
    it('should list cells row by row from the origin', () => {
        expect(footprintCells({ x: 3, y: -1 }, SQUARE)).toEqual([
            { x: 3, y: -1 },
            { x: 4, y: -1 },
            { x: 3, y: 0 },
            { x: 4, y: 0 },
        ]);
    });
});

describe('validatePlacement', () => {
    it('should allow the first tile anywhere', () => {
        expect(validatePlacement({ x: 40, y: -17 }, SINGLE, new Map())).toEqual({
            canPlace: true,
            status: PlacementStatus.Valid,
        });
    });

    it('should reject an occupied cell', () => {
        const occupancy = occupancyOf([0, 0]);
        expect(validatePlacement({ x: 0, y: 0 }, SINGLE, occupancy).status).toBe(PlacementStatus.Occupied);
    });

    it('should reject a footprint overlapping the structure', () => {
        const occupancy = occupancyOf([2, 0]);
        expect(validatePlacement({ x: 1, y: 0 }, { width: 2, depth: 1 }, occupancy).status)
            .toBe(PlacementStatus.Occupied);
    });

    it('should accept orthogonal neighbors and reject diagonal ones', () => {
        const occupancy = occupancyOf([0, 0]);
        expect(isValidPlacement({ x: 1, y: 0 }, SINGLE, occupancy)).toBe(true);
        expect(isValidPlacement({ x: -1, y: 0 }, SINGLE, occupancy)).toBe(true);
        expect(isValidPlacement({ x: 0, y: 1 }, SINGLE, occupancy)).toBe(true);
        expect(isValidPlacement({ x: 0, y: -1 }, SINGLE, occupancy)).toBe(true);
        expect(validatePlacement({ x: 1, y: 1 }, SINGLE, occupancy).status).toBe(PlacementStatus.NotAdjacent);
    });

    it('should check adjacency on the origin cell only', () => {
        // (1,0) of the footprint touches (2,0), but the origin (0,0) does not
        const occupancy = occupancyOf([2, 0]);
        expect(validatePlacement({ x: 0, y: 0 }, SQUARE, occupancy).status).toBe(PlacementStatus.NotAdjacent);
        expect(isValidPlacement({ x: 3, y: -1 }, SQUARE, occupancy)).toBe(false);
        expect(isValidPlacement({ x: 3, y: 0 }, SQUARE, occupancy)).toBe(true);
    });
});

describe('touchesStructure', () => {
    it('should only consider the four orthogonal neighbors', () => {
        const occupancy = occupancyOf([5, 5]);
        expect(touchesStructure({ x: 5, y: 6 }, occupancy)).toBe(true);
        expect(touchesStructure({ x: 6, y: 6 }, occupancy)).toBe(false);
        expect(touchesStructure({ x: 5, y: 5 }, new Map())).toBe(false);
    });
});

describe('frontier', () => {
    it('should be empty for an empty structure', () => {
        expect(frontier(new Map())).toEqual([]);
    });

    it('should list the free neighbors of a single tile', () => {
        expect(frontier(occupancyOf([0, 0]))).toEqual([
            { x: 1, y: 0 },
            { x: -1, y: 0 },
            { x: 0, y: 1 },
            { x: 0, y: -1 },
        ]);
    });

    it('should list each free neighbor once and skip occupied cells', () => {
        expect(frontier(occupancyOf([0, 0], [1, 0]))).toEqual([
            { x: -1, y: 0 },
            { x: 0, y: 1 },
            { x: 0, y: -1 },
            { x: 2, y: 0 },
            { x: 1, y: 1 },
            { x: 1, y: -1 },
        ]);
    });
});
