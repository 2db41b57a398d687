import { isActive } from './tile';
import type { StructureAggregate, Tile } from './types';

export function emptyAggregate(): StructureAggregate {
    return {
        centerOfMass: { x: 0, y: 0, z: 0 },
        healthPercent: 1,
        canMove: false,
        thrust: 0,
        steering: 0,
        tileCount: 0,
        engineCount: 0,
        rudderCount: 0,
        storageCapacity: 0,
    };
}

/**
 * Derive structure-wide physics from the tile set.
 * Destroyed tiles still count toward mass, center and health,
 * but contribute no thrust, steering or storage.
 */
export function computeAggregate(tiles: Iterable<Tile>, thrustPerEngine: number): StructureAggregate {
    const result = emptyAggregate();
    let sumX = 0;
    let sumY = 0;
    let sumZ = 0;
    let healthSum = 0;

    for (const tile of tiles) {
        result.tileCount++;
        sumX += tile.position.x;
        sumY += tile.position.y;
        sumZ += tile.position.z;
        healthSum += tile.health / tile.maxHealth;

        if (isActive(tile, 'engine')) result.engineCount++;
        if (isActive(tile, 'rudder')) result.rudderCount++;
        if (tile.isStorage && tile.health > 0) result.storageCapacity += tile.storageCapacity;
    }

    if (result.tileCount === 0) {
        return result;
    }

    const n = result.tileCount;
    result.centerOfMass = { x: sumX / n, y: sumY / n, z: sumZ / n };
    result.healthPercent = healthSum / n;
    result.canMove = result.engineCount > 0;
    result.thrust = result.engineCount * thrustPerEngine;
    result.steering = result.rudderCount;

    return result;
}
