/**
 * Owner of all placed tiles of one raft.
 *
 * Keeps the cell -> tile occupancy map consistent (every footprint cell of a
 * tile aliases the same id), recomputes aggregates synchronously after each
 * mutation and handles snapshot save/restore.
 */

import { coordKey, type GridCoord } from '../../coordinates';
import type { EventBus } from '../../event-bus';
import { commandFailed, commandSuccess, type CommandResult } from '../../commands/command-result';
import type { ConstructionCatalog } from '../catalog/construction-catalog';
import { FALLBACK_ITEM_ID } from '../catalog/construction-catalog';
import type { ItemDefinition } from '../catalog/types';
import { footprintCells, type GridTopology } from '../grid/grid-topology';
import type { OccupancyView } from '../grid/types';
import { deductAll, formatCost, type ResourceLedger } from '../resources/resource-ledger';
import { LogHandler } from '@/utilities/log-handler';
import { computeAggregate, emptyAggregate } from './aggregates';
import {
    createTileRecord,
    healthAfterDamage,
    isDestroyed,
    restoredHealth,
    snapshotTile,
    type TileRecord,
} from './tile';
import {
    STRUCTURE_SNAPSHOT_VERSION,
    type RestoreReport,
    type StructureAggregate,
    type StructureSnapshot,
    type Tile,
} from './types';

export interface StructureRegistryConfig {
    topology: GridTopology;
    catalog: ConstructionCatalog;
    eventBus: EventBus;
    thrustPerEngine: number;
}

export class StructureRegistry {
    private static log = new LogHandler('StructureRegistry');

    private readonly topology: GridTopology;
    private readonly catalog: ConstructionCatalog;
    private readonly eventBus: EventBus;
    private readonly thrustPerEngine: number;

    /** Spatial lookup: "x,y" -> tile id */
    private readonly cellOccupancy = new Map<string, number>();
    private readonly tilesById = new Map<number, TileRecord>();
    private nextId = 1;
    private cachedAggregate: StructureAggregate = emptyAggregate();

    constructor(config: StructureRegistryConfig) {
        this.topology = config.topology;
        this.catalog = config.catalog;
        this.eventBus = config.eventBus;
        this.thrustPerEngine = config.thrustPerEngine;
    }

    // ─────────────────────────────────────────────────────────────
    // Queries
    // ─────────────────────────────────────────────────────────────

    get occupancy(): OccupancyView {
        return this.cellOccupancy;
    }

    get size(): number {
        return this.tilesById.size;
    }

    /** Frozen copies; tiles change only through the mutation methods */
    get tiles(): Tile[] {
        return [...this.tilesById.values()].map(snapshotTile);
    }

    getTile(tileId: number): Tile | undefined {
        const record = this.tilesById.get(tileId);
        return record && snapshotTile(record);
    }

    getTileAt(cell: GridCoord): Tile | undefined {
        const record = this.recordAt(cell);
        return record && snapshotTile(record);
    }

    /** An intact walkable tile covers the cell */
    isWalkable(cell: GridCoord): boolean {
        const record = this.recordAt(cell);
        return record !== undefined && record.walkable && !isDestroyed(record);
    }

    /** Copy of the derived aggregate as of the last mutation */
    aggregate(): StructureAggregate {
        const a = this.cachedAggregate;
        return { ...a, centerOfMass: { ...a.centerOfMass } };
    }

    // ─────────────────────────────────────────────────────────────
    // Mutations
    // ─────────────────────────────────────────────────────────────

    /**
     * Insert a tile covering the definition's footprint at `cell`.
     * Callers validate placement first; an occupied footprint cell is a
     * programming error and throws without changing anything.
     */
    place(cell: GridCoord, definition: ItemDefinition): Tile {
        const cells = footprintCells(cell, definition.footprint);
        const taken = cells.find(c => this.cellOccupancy.has(coordKey(c)));
        if (taken) {
            throw new Error(`Cannot place ${definition.id} at (${cell.x}, ${cell.y}): cell (${taken.x}, ${taken.y}) is occupied`);
        }

        const record = this.insert(cell, cells, definition);
        this.recompute();
        return this.announcePlaced(record);
    }

    /**
     * Erase the tile covering `cell` together with every cell it aliases.
     * Returns the removed tile, or undefined if the cell was empty.
     */
    remove(cell: GridCoord): Tile | undefined {
        const record = this.recordAt(cell);
        if (!record) return undefined;

        for (const c of record.cells) {
            this.cellOccupancy.delete(coordKey(c));
        }
        this.tilesById.delete(record.id);
        this.recompute();

        StructureRegistry.log.debug(`Removed ${record.itemId} #${record.id}`);
        this.eventBus.emit('tile:removed', { tileId: record.id, cell: { ...record.origin } });
        return snapshotTile(record);
    }

    /** Remove every tile through the normal removal path */
    clear(): void {
        for (const record of [...this.tilesById.values()]) {
            this.remove(record.origin);
        }
        this.nextId = 1;
    }

    /**
     * Apply damage to the tile at `cell`. Health stops at 0; reaching it marks
     * the tile destroyed but leaves it in place. Infinite damage is lethal.
     */
    damage(cell: GridCoord, amount: number): CommandResult<{ tile: Tile }> {
        const record = this.recordAt(cell);
        if (!record) {
            return commandFailed('NoTileAtCell', `No tile at (${cell.x}, ${cell.y})`);
        }
        if (!(amount > 0)) {
            return commandSuccess({ tile: snapshotTile(record) });
        }

        const wasDestroyed = isDestroyed(record);
        record.health = healthAfterDamage(record, amount);
        this.recompute();

        this.eventBus.emit('tile:damaged', { tileId: record.id, health: record.health, maxHealth: record.maxHealth });
        if (!wasDestroyed && isDestroyed(record)) {
            StructureRegistry.log.info(`${record.itemId} #${record.id} destroyed`);
            this.eventBus.emit('tile:destroyed', { tileId: record.id, cell: { ...record.origin } });
        }
        return commandSuccess({ tile: snapshotTile(record) });
    }

    /**
     * Restore a tile to full health, paying the item's repair cost from the
     * ledger in one all-or-nothing transaction.
     */
    repair(cell: GridCoord, ledger: ResourceLedger | null): CommandResult<{ tile: Tile }> {
        const record = this.recordAt(cell);
        if (!record) {
            return commandFailed('NoTileAtCell', `No tile at (${cell.x}, ${cell.y})`);
        }
        if (record.health >= record.maxHealth) {
            return commandSuccess({ tile: snapshotTile(record) });
        }

        const repairCost = this.catalog.get(record.itemId)?.repairCost ?? {};
        if (!deductAll(ledger, repairCost)) {
            return commandFailed('InsufficientResources', `Cannot afford repair of ${record.itemId} (${formatCost(repairCost)})`);
        }

        record.health = record.maxHealth;
        this.recompute();
        this.eventBus.emit('tile:repaired', { tileId: record.id, health: record.health });
        return commandSuccess({ tile: snapshotTile(record) });
    }

    // ─────────────────────────────────────────────────────────────
    // Persistence
    // ─────────────────────────────────────────────────────────────

    persist(): StructureSnapshot {
        const tiles = [...this.tilesById.values()].map(tile => ({
            tileType: tile.itemId,
            gridPosition: { ...tile.origin },
            health: tile.health,
            ...(tile.isStorage ? { storageCapacity: tile.storageCapacity } : {}),
        }));

        return {
            version: STRUCTURE_SNAPSHOT_VERSION,
            tiles,
            raftCenter: { ...this.cachedAggregate.centerOfMass },
        };
    }

    /**
     * Replace the structure with a snapshot's tiles, announced as placed.
     * Unknown tile types fall back to the base foundation; entries that cannot
     * be placed are skipped. Never throws for bad entries.
     */
    restore(snapshot: StructureSnapshot): RestoreReport {
        this.clear();

        const report: RestoreReport = { restored: 0, defaulted: 0, skipped: 0 };
        for (const entry of snapshot.tiles) {
            let definition = this.catalog.get(entry.tileType);
            if (!definition) {
                definition = this.catalog.get(FALLBACK_ITEM_ID);
                if (!definition) {
                    StructureRegistry.log.warn(`Skipping "${entry.tileType}": no fallback item in catalog`);
                    report.skipped++;
                    continue;
                }
                StructureRegistry.log.warn(`Unknown tile type "${entry.tileType}", restoring as ${FALLBACK_ITEM_ID}`);
                report.defaulted++;
            }

            const { x, y } = entry.gridPosition;
            if (!Number.isInteger(x) || !Number.isInteger(y)) {
                StructureRegistry.log.warn(`Skipping ${entry.tileType}: invalid grid position`);
                report.skipped++;
                continue;
            }

            const cells = footprintCells({ x, y }, definition.footprint);
            if (cells.some(c => this.cellOccupancy.has(coordKey(c)))) {
                StructureRegistry.log.warn(`Skipping ${entry.tileType} at (${x}, ${y}): overlaps an earlier tile`);
                report.skipped++;
                continue;
            }

            const record = this.insert({ x, y }, cells, definition);
            record.health = restoredHealth(record, entry.health);
            this.recompute();
            this.announcePlaced(record);
            report.restored++;
        }

        StructureRegistry.log.info(`Restored ${report.restored} tiles (${report.defaulted} defaulted, ${report.skipped} skipped)`);
        return report;
    }

    private recordAt(cell: GridCoord): TileRecord | undefined {
        const id = this.cellOccupancy.get(coordKey(cell));
        return id === undefined ? undefined : this.tilesById.get(id);
    }

    private insert(cell: GridCoord, cells: readonly GridCoord[], definition: ItemDefinition): TileRecord {
        const position = this.topology.footprintCenter(cell, definition.footprint);
        const record = createTileRecord(this.nextId++, definition, cell, cells, position);

        this.tilesById.set(record.id, record);
        for (const c of cells) {
            this.cellOccupancy.set(coordKey(c), record.id);
        }
        return record;
    }

    private announcePlaced(record: TileRecord): Tile {
        const tile = snapshotTile(record);
        StructureRegistry.log.debug(`Placed ${tile.itemId} #${tile.id} at (${tile.origin.x}, ${tile.origin.y})`);
        this.eventBus.emit('tile:placed', { tile, cell: { ...tile.origin } });
        return tile;
    }

    private recompute(): void {
        this.cachedAggregate = computeAggregate(this.tilesById.values(), this.thrustPerEngine);
    }
}
