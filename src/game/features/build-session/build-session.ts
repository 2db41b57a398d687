/**
 * Per-actor build mode.
 *
 * idle --start--> active --cancel/exhausted--> idle
 *
 * While active, tick() keeps a snapped placement preview in front of the
 * actor; confirm() commits the previewed item to the structure after
 * validating placement and paying its full cost in one transaction.
 */

import type { GridCoord } from '../../coordinates';
import { sameCell } from '../../coordinates';
import type { EventBus } from '../../event-bus';
import { defineStateMachine } from '../../util/state-machine';
import {
    COMMAND_OK,
    commandFailed,
    commandSuccess,
    type BuildErrorKind,
    type CommandFailure,
    type CommandResult,
} from '../../commands/command-result';
import type { ConstructionCatalog } from '../catalog/construction-catalog';
import type { ItemDefinition } from '../catalog/types';
import { validatePlacement, type GridTopology } from '../grid/grid-topology';
import { canAfford, deductAll, formatCost, type ResourceLedger } from '../resources/resource-ledger';
import type { StructureRegistry } from '../structure/structure-registry';
import type { Tile } from '../structure/types';
import { LogHandler } from '@/utilities/log-handler';
import { addVec3, flattenToXZ, scaleVec3, type Vec3 } from '@/utilities/vec3';
import type { BuildAnchor, BuildEndReason, BuildPreview, BuildSessionState } from './types';

interface SessionContext {
    definition: ItemDefinition | null;
    preview: BuildPreview | null;
}

type SessionEvent = 'start' | 'cancel' | 'exhausted';

const sessionMachine = defineStateMachine<SessionContext, SessionEvent>()({
    idle: {
        transitions: { start: 'active' },
    },
    active: {
        transitions: { cancel: 'idle', exhausted: 'idle' },
        onExit: (ctx) => {
            ctx.definition = null;
            ctx.preview = null;
        },
    },
});

const DEFAULT_ANCHOR: BuildAnchor = {
    position: { x: 0, y: 0, z: 0 },
    forward: { x: 0, y: 0, z: 1 },
};

export interface BuildSessionConfig {
    catalog: ConstructionCatalog;
    topology: GridTopology;
    registry: StructureRegistry;
    /** null means nothing is affordable */
    ledger: ResourceLedger | null;
    eventBus: EventBus;
    /** Distance in front of the anchor at which the preview is placed */
    previewDistance: () => number;
}

export class BuildSession {
    private static log = new LogHandler('BuildSession');

    private readonly catalog: ConstructionCatalog;
    private readonly topology: GridTopology;
    private readonly registry: StructureRegistry;
    private readonly eventBus: EventBus;
    private readonly previewDistance: () => number;
    private readonly machine = sessionMachine.create('idle', { definition: null, preview: null });

    private ledger: ResourceLedger | null;
    private lastAnchor: BuildAnchor = DEFAULT_ANCHOR;

    constructor(config: BuildSessionConfig) {
        this.catalog = config.catalog;
        this.topology = config.topology;
        this.registry = config.registry;
        this.ledger = config.ledger;
        this.eventBus = config.eventBus;
        this.previewDistance = config.previewDistance;

        this.machine.onTransition((from, to, event) => {
            BuildSession.log.debug(`${from} -> ${to} (${event})`);
        });
    }

    get state(): BuildSessionState {
        return this.machine.state;
    }

    get isActive(): boolean {
        return this.machine.state === 'active';
    }

    /** Item being placed, or null while idle */
    get itemId(): string | null {
        return this.machine.context.definition?.id ?? null;
    }

    get preview(): BuildPreview | null {
        const preview = this.machine.context.preview;
        return preview ? { ...preview, cell: { ...preview.cell }, position: { ...preview.position } } : null;
    }

    /** Swap the ledger (e.g. the actor's inventory was replaced) */
    setLedger(ledger: ResourceLedger | null): void {
        this.ledger = ledger;
    }

    /**
     * Enter build mode for `itemId`. An active session is cancelled first.
     * The preview starts at `anchor`, or the last anchor seen by tick().
     */
    start(itemId: string, anchor?: BuildAnchor): CommandResult<{ preview: BuildPreview }> {
        if (this.isActive) {
            this.end('restarted');
        }

        const lookup = this.catalog.lookup(itemId);
        if (!lookup.success) {
            BuildSession.log.warn(lookup.message);
            return lookup;
        }

        const { definition } = lookup;
        if (!canAfford(this.ledger, definition.cost)) {
            return commandFailed('InsufficientResources', `Cannot afford ${itemId} (${formatCost(definition.cost)})`);
        }

        if (anchor) {
            this.lastAnchor = anchor;
        }

        const preview = this.computePreview(definition, this.lastAnchor);
        const ctx = this.machine.context;
        ctx.definition = definition;
        ctx.preview = preview;
        this.machine.send('start');

        this.eventBus.emit('build:started', { itemId });
        return commandSuccess({ preview: { ...preview, cell: { ...preview.cell } } });
    }

    /**
     * Recompute the preview from the actor's position and facing.
     * Presentation hint only; never changes state.
     */
    tick(anchorPosition: Vec3, anchorForward: Vec3): void {
        this.lastAnchor = { position: anchorPosition, forward: anchorForward };

        const ctx = this.machine.context;
        if (!this.isActive || !ctx.definition) return;

        const previous = ctx.preview;
        const next = this.computePreview(ctx.definition, this.lastAnchor);
        ctx.preview = next;

        if (!previous || !sameCell(previous.cell, next.cell) || previous.valid !== next.valid) {
            this.eventBus.emit('build:previewChanged', { itemId: next.itemId, cell: { ...next.cell }, valid: next.valid });
        }
    }

    /**
     * Place the previewed item. On failure the session stays active.
     * On success the session ends if the item is no longer affordable.
     */
    confirm(): CommandResult<{ tile: Tile; cell: GridCoord; sessionEnded: boolean }> {
        const ctx = this.machine.context;
        const definition = ctx.definition;
        const preview = ctx.preview;
        if (!this.isActive || !definition || !preview) {
            return commandFailed('NoActiveSession', 'confirm() called outside build mode');
        }

        const cell = this.topology.worldToGrid(preview.position);

        const placement = validatePlacement(cell, definition.footprint, this.registry.occupancy);
        if (!placement.canPlace) {
            ctx.preview = { ...preview, cell, valid: false, status: placement.status };
            return this.reject('InvalidPlacement', cell, `Cannot place ${definition.id} at (${cell.x}, ${cell.y})`);
        }

        if (!deductAll(this.ledger, definition.cost)) {
            return this.reject('InsufficientResources', cell, `Cannot afford ${definition.id} (${formatCost(definition.cost)})`);
        }

        const tile = this.registry.place(cell, definition);

        let sessionEnded = false;
        if (canAfford(this.ledger, definition.cost)) {
            ctx.preview = this.computePreview(definition, this.lastAnchor);
        } else {
            this.end('exhausted');
            sessionEnded = true;
        }

        return commandSuccess({ tile, cell, sessionEnded });
    }

    /** Leave build mode without touching resources */
    cancel(): CommandResult {
        if (!this.isActive) {
            return commandFailed('NoActiveSession', 'cancel() called outside build mode');
        }
        this.end('user');
        return COMMAND_OK;
    }

    private end(reason: BuildEndReason): void {
        const itemId = this.itemId ?? '';
        this.machine.send(reason === 'exhausted' ? 'exhausted' : 'cancel');
        this.eventBus.emit('build:cancelled', { itemId, reason });
    }

    private reject(error: BuildErrorKind, cell: GridCoord, message: string): CommandFailure {
        BuildSession.log.debug(message);
        this.eventBus.emit('build:placementInvalid', { itemId: this.itemId ?? '', reason: error, cell: { ...cell } });
        return commandFailed(error, message);
    }

    private computePreview(definition: ItemDefinition, anchor: BuildAnchor): BuildPreview {
        const forward = flattenToXZ(anchor.forward);
        const position = forward
            ? addVec3(anchor.position, scaleVec3(forward, this.previewDistance()))
            : { ...anchor.position };
        const cell = this.topology.worldToGrid(position);
        const placement = validatePlacement(cell, definition.footprint, this.registry.occupancy);

        return {
            itemId: definition.id,
            position,
            cell,
            valid: placement.canPlace,
            status: placement.status,
        };
    }
}
