/**
 * Structure Feature Module
 *
 * Public API:
 * - StructureRegistry: tile ownership, aggregates, damage/repair, persist/restore
 * - Types: Tile, StructureAggregate, StructureSnapshot, SerializedTile, RestoreReport
 * - Persistence: parseStructureSnapshot, serializeStructureSnapshot, deserializeStructureSnapshot
 */

export type {
    Tile,
    StructureAggregate,
    StructureSnapshot,
    SerializedTile,
    RestoreReport,
} from './types';
export { STRUCTURE_SNAPSHOT_VERSION } from './types';
export { StructureRegistry } from './structure-registry';
export type { StructureRegistryConfig } from './structure-registry';
export { computeAggregate, emptyAggregate } from './aggregates';
export { isDestroyed } from './tile';
export {
    parseStructureSnapshot,
    serializeStructureSnapshot,
    deserializeStructureSnapshot,
} from './persistence';
