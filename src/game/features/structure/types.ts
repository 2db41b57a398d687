/**
 * Structure (raft) types: tiles, aggregates and the persisted shape.
 */

import type { GridCoord } from '../../coordinates';
import type { ItemCategory } from '../catalog/types';
import type { Vec3 } from '@/utilities/vec3';

/**
 * A placed item. One record per placement, aliased by every cell in
 * `cells` through the registry's occupancy map.
 */
export interface Tile {
    readonly id: number;
    readonly itemId: string;
    readonly category: ItemCategory;
    /** Footprint origin (lowest x, lowest y) */
    readonly origin: GridCoord;
    readonly cells: readonly GridCoord[];
    /** Footprint center in world space (y = 0) */
    readonly position: Vec3;
    readonly maxHealth: number;
    /** In [0, maxHealth]; 0 means destroyed. Changes only through the registry */
    readonly health: number;
    readonly walkable: boolean;
    readonly isStorage: boolean;
    readonly storageCapacity: number;
}

/** Structure-wide values derived from the tile set */
export interface StructureAggregate {
    /** Mean of tile positions; (0, 0, 0) for an empty structure */
    centerOfMass: Vec3;
    /** Mean of health / maxHealth; 1 for an empty structure */
    healthPercent: number;
    /** At least one intact engine */
    canMove: boolean;
    /** Forward thrust magnitude along the structure-forward axis */
    thrust: number;
    /** Unitless steering magnitude (intact rudder count) */
    steering: number;
    tileCount: number;
    engineCount: number;
    rudderCount: number;
    /** Summed capacity of intact storage tiles */
    storageCapacity: number;
}

export const STRUCTURE_SNAPSHOT_VERSION = 1;

export interface SerializedTile {
    tileType: string;
    gridPosition: GridCoord;
    health: number;
    /** Present for storage tiles */
    storageCapacity?: number;
}

export interface StructureSnapshot {
    /** 0 for saves written before versioning */
    version: number;
    tiles: SerializedTile[];
    raftCenter: Vec3;
}

/** Outcome of restoring a snapshot */
export interface RestoreReport {
    restored: number;
    /** Entries whose tile type was unknown and replaced by the fallback */
    defaulted: number;
    /** Entries dropped (bad position or overlapping cells) */
    skipped: number;
}
