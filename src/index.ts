/**
 * Public API
 *
 * - RaftWorld: composition root wiring every service below
 * - Ocean: WaveField sampling and storm interpolation
 * - Features: catalog, grid, resources, structure, build-session, motion
 * - Infrastructure: EventBus, SimulationLoop, settings, config, RNG, logging
 */

export { RaftWorld } from './game/raft-world';
export type { RaftWorldOptions } from './game/raft-world';

export * from './game/ocean';
export * from './game/features/catalog';
export * from './game/features/grid';
export * from './game/features/resources';
export * from './game/features/structure';
export * from './game/features/build-session';
export * from './game/features/motion';

export { EventBus, EventSubscriptionManager } from './game/event-bus';
export type { RaftEvents } from './game/event-bus';
export { SimulationLoop, MAX_TICKS_PER_ADVANCE } from './game/simulation-loop';
export type { TickSystem } from './game/tick-system';
export {
    SimulationSettingsManager,
    DEFAULT_SETTINGS,
    createMemorySettingsStorage,
} from './game/simulation-settings';
export type { SimulationSettings, SettingsStorage } from './game/simulation-settings';
export {
    CALM_SEA,
    STORM_SEA,
    DEFAULT_SIMULATION_CONFIG,
    DEFAULT_WAVE_CONFIG,
    createSimulationConfig,
} from './game/config';
export type { SeaStatePreset, SimulationConfig, SimulationConfigOverrides, WaveConfig } from './game/config';
export { SeededRng, DEFAULT_WORLD_SEED } from './game/rng';
export type { GridCoord } from './game/coordinates';
export type { BuildErrorKind, CommandResult, CommandFailure, CommandSuccess } from './game/commands/command-result';
export type { Vec3 } from './utilities/vec3';
export { LogHandler } from './utilities/log-handler';
export type { LogLevelName } from './utilities/log-manager';
