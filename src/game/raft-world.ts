import { createSimulationConfig, type SimulationConfig, type SimulationConfigOverrides } from './config';
import { EventBus } from './event-bus';
import { SimulationLoop } from './simulation-loop';
import { SimulationSettingsManager, type SettingsStorage } from './simulation-settings';
import { WaveField } from './ocean/wave-field';
import { ConstructionCatalog } from './features/catalog/construction-catalog';
import { GridTopology } from './features/grid/grid-topology';
import type { ResourceLedger } from './features/resources/resource-ledger';
import { StructureRegistry } from './features/structure/structure-registry';
import { BuildSession } from './features/build-session/build-session';
import { BuildActor, type AnchorProvider } from './features/build-session/build-actor';
import { RaftMotion } from './features/motion/raft-motion';
import { LogHandler } from '@/utilities/log-handler';

export interface RaftWorldOptions {
    config?: SimulationConfigOverrides;
    catalog?: ConstructionCatalog;
    settingsStorage?: SettingsStorage;
}

/**
 * One raft on one ocean.
 *
 * Owns every simulation service and wires them together. Systems tick in
 * registration order: waves, motion, then build actors in creation order.
 */
export class RaftWorld {
    private static log = new LogHandler('RaftWorld');

    public readonly config: SimulationConfig;
    public readonly eventBus: EventBus;
    public readonly settings: SimulationSettingsManager;
    public readonly catalog: ConstructionCatalog;
    public readonly waves: WaveField;
    public readonly topology: GridTopology;
    public readonly registry: StructureRegistry;
    public readonly motion: RaftMotion;
    public readonly loop: SimulationLoop;

    private readonly actors = new Map<string, BuildActor>();

    public constructor(options: RaftWorldOptions = {}) {
        this.config = createSimulationConfig(options.config);
        this.eventBus = new EventBus();
        this.settings = new SimulationSettingsManager(options.settingsStorage);
        this.catalog = options.catalog ?? ConstructionCatalog.createDefault();
        this.waves = WaveField.fromConfig(this.config.waves);
        this.topology = new GridTopology(this.config.cellSize);

        this.registry = new StructureRegistry({
            topology: this.topology,
            catalog: this.catalog,
            eventBus: this.eventBus,
            thrustPerEngine: this.config.thrustPerEngine,
        });

        this.motion = new RaftMotion({
            registry: this.registry,
            waves: this.waves,
            massPerTile: this.config.massPerTile,
            turnRatePerRudder: this.config.turnRatePerRudder,
            linearDrag: this.config.linearDrag,
        });

        this.loop = new SimulationLoop(this.config.tickRate);
        this.loop.registerSystem(this.waves);
        this.loop.registerSystem(this.motion);

        this.settings.watchSetting('stormIntensity', (value) => this.waves.setStormIntensity(value));
        this.settings.watchSetting('logLevel', (level) => LogHandler.setLevel(level));
        this.settings.watchSetting('paused', (paused) => {
            if (paused) this.loop.pause();
            else this.loop.resume();
        });

        RaftWorld.log.debug(`Created world (cell size ${this.config.cellSize}, ${this.catalog.size} items)`);
    }

    /**
     * Create a build session for an actor. The session reads the actor's
     * anchor every tick; a second call for the same actor replaces it.
     */
    public createBuildSession(actorId: string, ledger: ResourceLedger | null, anchor: AnchorProvider): BuildSession {
        this.removeBuildSession(actorId);

        const session = new BuildSession({
            catalog: this.catalog,
            topology: this.topology,
            registry: this.registry,
            ledger,
            eventBus: this.eventBus,
            previewDistance: () => this.settings.state.previewDistance,
        });

        const actor = new BuildActor(actorId, session, anchor);
        this.actors.set(actorId, actor);
        this.loop.registerSystem(actor);
        return session;
    }

    public getBuildSession(actorId: string): BuildSession | undefined {
        return this.actors.get(actorId)?.session;
    }

    /** Cancels any active build mode for the actor and stops ticking it */
    public removeBuildSession(actorId: string): boolean {
        const actor = this.actors.get(actorId);
        if (!actor) return false;

        if (actor.session.isActive) {
            actor.session.cancel();
        }
        this.loop.unregisterSystem(actor);
        this.actors.delete(actorId);
        return true;
    }

    /** Advance by real elapsed seconds; returns fixed ticks executed */
    public update(deltaSec: number): number {
        return this.loop.advance(deltaSec);
    }

    public destroy(): void {
        for (const actorId of [...this.actors.keys()]) {
            this.removeBuildSession(actorId);
        }
        this.loop.destroy();
        this.settings.dispose();
        this.eventBus.clear();
    }
}
