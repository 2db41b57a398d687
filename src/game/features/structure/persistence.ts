/**
 * Structure snapshot (de)serialization.
 *
 * Reading is lenient: anything that is not recognisably a tile entry is
 * dropped with a warning, missing fields get conservative defaults, and a
 * save without a version field is treated as legacy version 0.
 */

import { LogHandler } from '@/utilities/log-handler';
import type { Vec3 } from '@/utilities/vec3';
import {
    STRUCTURE_SNAPSHOT_VERSION,
    type SerializedTile,
    type StructureSnapshot,
} from './types';

const log = new LogHandler('StructurePersistence');

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function finiteOr(value: unknown, fallback: number): number {
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function parseVec3(raw: unknown): Vec3 {
    if (!isRecord(raw)) return { x: 0, y: 0, z: 0 };
    return { x: finiteOr(raw.x, 0), y: finiteOr(raw.y, 0), z: finiteOr(raw.z, 0) };
}

function parseTile(raw: unknown, index: number): SerializedTile | null {
    if (!isRecord(raw)) {
        log.warn(`Tile entry ${index} is not an object; dropped`);
        return null;
    }

    const position = raw.gridPosition;
    const x = isRecord(position) ? position.x : undefined;
    const y = isRecord(position) ? position.y : undefined;
    if (typeof x !== 'number' || typeof y !== 'number') {
        log.warn(`Tile entry ${index} has no grid position; dropped`);
        return null;
    }

    const tile: SerializedTile = {
        tileType: typeof raw.tileType === 'string' ? raw.tileType : '',
        gridPosition: { x, y },
        // Non-finite health is clamped to max health on restore
        health: finiteOr(raw.health, Number.POSITIVE_INFINITY),
    };
    if (typeof raw.storageCapacity === 'number') {
        tile.storageCapacity = raw.storageCapacity;
    }
    return tile;
}

/** Build a snapshot from parsed JSON, defaulting whatever is malformed */
export function parseStructureSnapshot(raw: unknown): StructureSnapshot {
    if (!isRecord(raw)) {
        log.warn('Snapshot is not an object; treating as empty');
        return { version: STRUCTURE_SNAPSHOT_VERSION, tiles: [], raftCenter: { x: 0, y: 0, z: 0 } };
    }

    const version = typeof raw.version === 'number' ? raw.version : 0;
    if (version > STRUCTURE_SNAPSHOT_VERSION) {
        log.warn(`Snapshot version ${version} is newer than supported ${STRUCTURE_SNAPSHOT_VERSION}; reading known fields only`);
    }

    const rawTiles = Array.isArray(raw.tiles) ? raw.tiles : [];
    const tiles: SerializedTile[] = [];
    rawTiles.forEach((entry: unknown, index: number) => {
        const tile = parseTile(entry, index);
        if (tile) tiles.push(tile);
    });

    return { version, tiles, raftCenter: parseVec3(raw.raftCenter) };
}

export function serializeStructureSnapshot(snapshot: StructureSnapshot): string {
    return JSON.stringify(snapshot);
}

/** Parse snapshot JSON text; unparseable text yields an empty snapshot */
export function deserializeStructureSnapshot(json: string): StructureSnapshot {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (e) {
        log.error('Failed to parse structure snapshot', e instanceof Error ? e : new Error(String(e)));
        raw = null;
    }
    return parseStructureSnapshot(raw);
}
