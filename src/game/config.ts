/**
 * Static simulation configuration.
 *
 * Values here are fixed for the lifetime of a RaftWorld. Runtime-tunable
 * values (storm intensity, preview distance, log level) live in
 * SimulationSettingsManager instead.
 */

import { DEFAULT_WORLD_SEED } from './rng';

/** Calm/storm endpoints for storm-intensity interpolation */
export interface SeaStatePreset {
    /** Multiplier applied to the base wave height */
    heightScale: number;
    /** Multiplier applied to the base wave speed */
    speedScale: number;
    /** Absolute current strength (world units per second) */
    currentStrength: number;
}

export interface WaveConfig {
    componentCount: number;
    baseHeight: number;
    baseSpeed: number;
    /** Wavelength of the first (longest-period) component */
    baseWavelength: number;
    seed: number;
    /** Horizontal unit direction of the steady current */
    currentDirection: { x: number; z: number };
    calm: SeaStatePreset;
    storm: SeaStatePreset;
}

export interface SimulationConfig {
    /** World units per grid cell edge */
    cellSize: number;
    /** Fixed simulation rate */
    tickRate: number;
    /** Forward thrust contributed by each intact engine */
    thrustPerEngine: number;
    /** Mass contributed by each tile (for motion integration) */
    massPerTile: number;
    /** Yaw rate (rad/s) per intact rudder at full rudder input */
    turnRatePerRudder: number;
    /** Exponential linear drag coefficient (1/s) */
    linearDrag: number;
    waves: WaveConfig;
}

export const DEFAULT_CELL_SIZE = 2;
export const DEFAULT_TICK_RATE = 30;

export const CALM_SEA: SeaStatePreset = {
    heightScale: 1,
    speedScale: 1,
    currentStrength: 0.4,
};

export const STORM_SEA: SeaStatePreset = {
    heightScale: 3,
    speedScale: 1.8,
    currentStrength: 2.2,
};

export const DEFAULT_WAVE_CONFIG: WaveConfig = {
    componentCount: 4,
    baseHeight: 0.6,
    baseSpeed: 1,
    baseWavelength: 18,
    seed: DEFAULT_WORLD_SEED,
    currentDirection: { x: 1, z: 0 },
    calm: CALM_SEA,
    storm: STORM_SEA,
};

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
    cellSize: DEFAULT_CELL_SIZE,
    tickRate: DEFAULT_TICK_RATE,
    thrustPerEngine: 250,
    massPerTile: 100,
    turnRatePerRudder: 0.15,
    linearDrag: 0.6,
    waves: DEFAULT_WAVE_CONFIG,
};

export type SimulationConfigOverrides = Partial<Omit<SimulationConfig, 'waves'>> & {
    waves?: Partial<WaveConfig>;
};

/** Merge overrides onto the defaults (wave settings merge one level deep) */
export function createSimulationConfig(overrides: SimulationConfigOverrides = {}): SimulationConfig {
    const { waves, ...rest } = overrides;
    const config: SimulationConfig = {
        ...DEFAULT_SIMULATION_CONFIG,
        ...rest,
        waves: { ...DEFAULT_WAVE_CONFIG, ...waves },
    };

    if (!(config.cellSize > 0)) {
        throw new Error(`cellSize must be positive, got ${config.cellSize}`);
    }
    if (!(config.tickRate > 0)) {
        throw new Error(`tickRate must be positive, got ${config.tickRate}`);
    }
    if (!Number.isInteger(config.waves.componentCount) || config.waves.componentCount < 0) {
        throw new Error(`waves.componentCount must be a non-negative integer, got ${config.waves.componentCount}`);
    }

    return config;
}
