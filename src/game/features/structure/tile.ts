import type { GridCoord } from '../../coordinates';
import type { ItemDefinition } from '../catalog/types';
import type { Vec3 } from '@/utilities/vec3';
import { clamp } from '@/utilities/vec3';
import type { Tile } from './types';

/** Registry-owned tile state; never handed out directly */
export interface TileRecord extends Omit<Tile, 'health'> {
    health: number;
}

export function createTileRecord(
    id: number,
    definition: ItemDefinition,
    origin: GridCoord,
    cells: readonly GridCoord[],
    position: Vec3,
): TileRecord {
    return {
        id,
        itemId: definition.id,
        category: definition.category,
        origin: { x: origin.x, y: origin.y },
        cells: cells.map(c => ({ x: c.x, y: c.y })),
        position: { ...position },
        maxHealth: definition.maxHealth,
        health: definition.maxHealth,
        walkable: definition.walkable,
        isStorage: definition.isStorage,
        storageCapacity: definition.storageCapacity,
    };
}

/** Frozen copy of a record; writes to it cannot reach the registry */
export function snapshotTile(record: TileRecord): Tile {
    return Object.freeze({
        ...record,
        origin: Object.freeze({ ...record.origin }),
        cells: Object.freeze(record.cells.map(c => Object.freeze({ ...c }))),
        position: Object.freeze({ ...record.position }),
    });
}

export function isDestroyed(tile: Tile): boolean {
    return tile.health <= 0;
}

/** Intact tile of the given category */
export function isActive(tile: Tile, category: Tile['category']): boolean {
    return tile.category === category && !isDestroyed(tile);
}

/** Health left after `amount` damage; infinite damage is lethal */
export function healthAfterDamage(tile: Tile, amount: number): number {
    return clamp(tile.health - amount, 0, tile.maxHealth);
}

/** Health read from a save: clamped, and full when missing or non-finite */
export function restoredHealth(tile: Tile, health: number): number {
    if (!Number.isFinite(health)) return tile.maxHealth;
    return clamp(health, 0, tile.maxHealth);
}
