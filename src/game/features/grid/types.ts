/**
 * Grid placement types.
 */

/**
 * Spatial lookup of the structure: "x,y" -> tile id.
 * Every footprint cell of a tile maps to the same id.
 */
export type OccupancyView = ReadonlyMap<string, number>;

/**
 * Placement status indicating why placement can or cannot occur.
 * Used for both validation and preview feedback.
 */
export enum PlacementStatus {
    /** Can place */
    Valid = 0,
    /** Cannot place - a footprint cell is already taken */
    Occupied = 1,
    /** Cannot place - origin cell does not touch the structure */
    NotAdjacent = 2,
}

export interface PlacementResult {
    canPlace: boolean;
    status: PlacementStatus;
}
