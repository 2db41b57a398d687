import type { TickSystem } from '../../tick-system';
import type { BuildSession } from './build-session';
import type { BuildAnchor } from './types';

/** Returns the actor's current anchor, or null if it has none this tick */
export type AnchorProvider = () => BuildAnchor | null;

/**
 * Feeds an actor's position and facing into its build session once per
 * simulation tick.
 */
export class BuildActor implements TickSystem {
    readonly name: string;

    constructor(
        readonly actorId: string,
        readonly session: BuildSession,
        private readonly anchor: AnchorProvider,
    ) {
        this.name = `build:${actorId}`;
    }

    tick(): void {
        const anchor = this.anchor();
        if (anchor) {
            this.session.tick(anchor.position, anchor.forward);
        }
    }
}
