import type { TickSystem } from '../tick-system';
import type { SeaStatePreset, WaveConfig } from '../config';
import { CALM_SEA, STORM_SEA } from '../config';
import { SeededRng } from '../rng';
import { LogHandler } from '@/utilities/log-handler';
import { clamp, lerp, normalizeVec3, type Vec3 } from '@/utilities/vec3';
import {
    TWO_PI,
    angularFrequency,
    generateWaveComponents,
    type WaveComponent,
} from './wave-component';

/** Peak turbulence added on top of the steady current at a wave crest */
export const TURBULENCE_STRENGTH = 0.35;

export interface WaveFieldOptions {
    count: number;
    baseHeight: number;
    baseSpeed: number;
    seed: number;
    baseWavelength?: number;
    currentDirection?: { x: number; z: number };
    calm?: SeaStatePreset;
    storm?: SeaStatePreset;
}

const DEFAULT_BASE_WAVELENGTH = 18;

/**
 * Procedural ocean surface: a fixed set of trochoidal components summed
 * into height, normal and current samples over continuous time.
 *
 * Sampling methods are pure with respect to the field and may be called any
 * number of times per tick. Only advance() and setStormIntensity() mutate.
 */
export class WaveField implements TickSystem {
    private static log = new LogHandler('WaveField');

    readonly name = 'waves';

    private readonly components: readonly WaveComponent[];
    /** Per-component ω·t, wrapped into [0, 2π) */
    private readonly timePhases: Float64Array;

    private readonly baseHeight: number;
    private readonly baseSpeed: number;
    private readonly calm: SeaStatePreset;
    private readonly storm: SeaStatePreset;
    private readonly currentDirX: number;
    private readonly currentDirZ: number;

    private elapsed = 0;
    private intensity = 0;
    private heightScale: number;
    private speedScale: number;
    private currentStrengthValue: number;

    constructor(options: WaveFieldOptions) {
        const rng = new SeededRng(options.seed);
        this.components = Object.freeze(generateWaveComponents(
            options.count,
            options.baseHeight,
            options.baseWavelength ?? DEFAULT_BASE_WAVELENGTH,
            rng,
        ));
        this.timePhases = new Float64Array(this.components.length);

        this.baseHeight = options.baseHeight;
        this.baseSpeed = options.baseSpeed;
        this.calm = options.calm ?? CALM_SEA;
        this.storm = options.storm ?? STORM_SEA;

        const dir = options.currentDirection ?? { x: 1, z: 0 };
        const dirLen = Math.hypot(dir.x, dir.z);
        this.currentDirX = dirLen > 0 ? dir.x / dirLen : 0;
        this.currentDirZ = dirLen > 0 ? dir.z / dirLen : 0;

        this.heightScale = this.calm.heightScale;
        this.speedScale = this.calm.speedScale;
        this.currentStrengthValue = this.calm.currentStrength;

        WaveField.log.debug(`Generated ${this.components.length} wave components (seed ${options.seed})`);
    }

    static fromConfig(config: WaveConfig): WaveField {
        return new WaveField({
            count: config.componentCount,
            baseHeight: config.baseHeight,
            baseSpeed: config.baseSpeed,
            seed: config.seed,
            baseWavelength: config.baseWavelength,
            currentDirection: config.currentDirection,
            calm: config.calm,
            storm: config.storm,
        });
    }

    get waveComponents(): readonly WaveComponent[] {
        return this.components;
    }

    /** Total simulated seconds */
    get time(): number {
        return this.elapsed;
    }

    get stormIntensity(): number {
        return this.intensity;
    }

    /** Current absolute wave height (base height × storm scale) */
    get waveHeight(): number {
        return this.baseHeight * this.heightScale;
    }

    /** Current speed multiplier applied to every ω */
    get waveSpeed(): number {
        return this.baseSpeed * this.speedScale;
    }

    get currentStrength(): number {
        return this.currentStrengthValue;
    }

    /** Upper bound of |height(p)| at the current sea state */
    amplitudeBound(): number {
        let sum = 0;
        for (const c of this.components) {
            sum += c.amplitude;
        }
        return sum * this.heightScale;
    }

    /** Advance the clock. Non-finite or negative steps are ignored. */
    advance(dt: number): void {
        if (!(dt > 0) || !Number.isFinite(dt)) return;

        this.elapsed += dt;
        const speed = this.waveSpeed;
        for (let i = 0; i < this.components.length; i++) {
            const next = this.timePhases[i] + angularFrequency(this.components[i], speed) * dt;
            this.timePhases[i] = next % TWO_PI;
        }
    }

    tick(dt: number): void {
        this.advance(dt);
    }

    height(pos: Vec3): number {
        let h = 0;
        for (let i = 0; i < this.components.length; i++) {
            const c = this.components[i];
            h += c.amplitude * Math.sin(this.phaseArgument(i, c, pos));
        }
        return h * this.heightScale;
    }

    /** Surface normal from summed partial slopes; (0, 1, 0) on a flat sea */
    normal(pos: Vec3): Vec3 {
        let dx = 0;
        let dz = 0;
        for (let i = 0; i < this.components.length; i++) {
            const c = this.components[i];
            const slope = c.amplitude * this.heightScale * c.k * Math.cos(this.phaseArgument(i, c, pos));
            dx += slope * c.dirX;
            dz += slope * c.dirZ;
        }
        return normalizeVec3({ x: -dx, y: 1, z: -dz });
    }

    /** Steady current plus deterministic turbulence that peaks at crests */
    current(pos: Vec3): Vec3 {
        const strength = this.currentStrengthValue;
        const waveHeight = this.waveHeight;
        const crestFactor = waveHeight > 0 ? clamp(this.height(pos) / waveHeight, 0, 1) : 0;
        const turbulence = TURBULENCE_STRENGTH * crestFactor;
        const t = this.elapsed;

        return {
            x: this.currentDirX * strength + Math.sin(t * 0.7 + pos.x * 0.13) * turbulence,
            y: 0,
            z: this.currentDirZ * strength + Math.cos(t * 0.5 + pos.z * 0.11) * turbulence,
        };
    }

    /**
     * Interpolate height, speed and current strength between the calm and
     * storm presets. Takes effect on the next sample; no smoothing.
     */
    setStormIntensity(intensity: number): void {
        const t = Number.isFinite(intensity) ? clamp(intensity, 0, 1) : 0;
        this.intensity = t;
        this.heightScale = lerp(this.calm.heightScale, this.storm.heightScale, t);
        this.speedScale = lerp(this.calm.speedScale, this.storm.speedScale, t);
        this.currentStrengthValue = lerp(this.calm.currentStrength, this.storm.currentStrength, t);
    }

    private phaseArgument(index: number, c: WaveComponent, pos: Vec3): number {
        return c.k * (c.dirX * pos.x + c.dirZ * pos.z) + this.timePhases[index] + c.phase;
    }
}
