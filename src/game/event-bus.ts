/**
 * Lightweight typed event bus for presentation notifications.
 * The simulation emits; renderers, audio and UI subscribe. Handlers run
 * synchronously and a failing handler never fails the emitting call.
 */

import type { GridCoord } from './coordinates';
import type { Tile } from './features/structure/types';
import type { BuildErrorKind } from './commands/command-result';
import type { BuildEndReason } from './features/build-session/types';
import { LogHandler } from '@/utilities/log-handler';

/** Event map defining all raft events and their payloads */
export interface RaftEvents {
    /** A tile was committed to the structure */
    'tile:placed': {
        tile: Tile;
        cell: GridCoord;
    };
    /** A tile and all of its footprint cells were erased */
    'tile:removed': {
        tileId: number;
        cell: GridCoord;
    };
    'tile:damaged': {
        tileId: number;
        health: number;
        maxHealth: number;
    };
    /** Health crossed zero; the tile stays registered */
    'tile:destroyed': {
        tileId: number;
        cell: GridCoord;
    };
    'tile:repaired': {
        tileId: number;
        health: number;
    };

    // === Build mode ===

    'build:started': {
        itemId: string;
    };
    'build:cancelled': {
        itemId: string;
        reason: BuildEndReason;
    };
    /** A confirm was rejected; the session stays active */
    'build:placementInvalid': {
        itemId: string;
        reason: BuildErrorKind;
        cell: GridCoord;
    };
    /** Preview cell or validity changed (placement hint) */
    'build:previewChanged': {
        itemId: string;
        cell: GridCoord;
        valid: boolean;
    };
}

type EventHandler<T> = (payload: T) => void;

type HandlerSets = { [K in keyof RaftEvents]?: Set<EventHandler<RaftEvents[K]>> };

export class EventBus {
    private static log = new LogHandler('EventBus');

    private handlers: HandlerSets = {};

    /** Register an event handler */
    on<K extends keyof RaftEvents>(event: K, handler: EventHandler<RaftEvents[K]>): void {
        this.handlersFor(event).add(handler);
    }

    /** Remove an event handler */
    off<K extends keyof RaftEvents>(event: K, handler: EventHandler<RaftEvents[K]>): void {
        this.handlers[event]?.delete(handler);
    }

    /** Emit an event to all registered handlers */
    emit<K extends keyof RaftEvents>(event: K, payload: RaftEvents[K]): void {
        const handlers = this.handlers[event];
        if (!handlers) return;
        for (const handler of handlers) {
            try {
                handler(payload);
            } catch (e) {
                const err = e instanceof Error ? e : new Error(String(e));
                EventBus.log.error(`Handler for '${event}' threw`, err);
            }
        }
    }

    /** Number of handlers registered for an event */
    listenerCount<K extends keyof RaftEvents>(event: K): number {
        return this.handlers[event]?.size ?? 0;
    }

    /** Remove all handlers */
    clear(): void {
        this.handlers = {};
    }

    private handlersFor<K extends keyof RaftEvents>(event: K): Set<EventHandler<RaftEvents[K]>> {
        const handlers: { [P in K]?: Set<EventHandler<RaftEvents[P]>> } = this.handlers;
        const existing = handlers[event];
        if (existing) return existing;
        const created = new Set<EventHandler<RaftEvents[K]>>();
        handlers[event] = created;
        return created;
    }
}

/**
 * Tracks subscriptions so a system can release them all at once.
 *
 * @example
 * ```ts
 * class HudBridge {
 *     private subscriptions = new EventSubscriptionManager();
 *
 *     attach(eventBus: EventBus): void {
 *         this.subscriptions.subscribe(eventBus, 'tile:placed', ({ tile }) => this.addIcon(tile));
 *     }
 *
 *     detach(): void {
 *         this.subscriptions.unsubscribeAll();
 *     }
 * }
 * ```
 */
export class EventSubscriptionManager {
    private unsubscribers: Array<() => void> = [];

    subscribe<K extends keyof RaftEvents>(
        eventBus: EventBus,
        event: K,
        handler: EventHandler<RaftEvents[K]>,
    ): void {
        eventBus.on(event, handler);
        this.unsubscribers.push(() => eventBus.off(event, handler));
    }

    unsubscribeAll(): void {
        for (const unsubscribe of this.unsubscribers) {
            unsubscribe();
        }
        this.unsubscribers = [];
    }

    get count(): number {
        return this.unsubscribers.length;
    }
}
