/**
 * A single trochoidal wave component with precomputed parameters.
 *
 * Math background:
 * - Wave number k = 2π / wavelength
 * - Angular frequency ω = sqrt(g * k) for deep water, scaled by sea-state speed
 * - Phase argument θ = k * dot(xz, direction) + ω * t + phase
 * - Height = amplitude * sin(θ)
 * - Slope  = amplitude * k * direction * cos(θ)
 */

import type { SeededRng } from '../rng';

/** Deep-water gravity used for the dispersion relation (m/s²) */
export const GRAVITY = 9.8;

export const TWO_PI = Math.PI * 2;

/** Max random deviation from evenly-spaced directions (radians) */
export const WAVE_DIRECTION_JITTER = 0.35;

/** Wavelength growth per component index, as a fraction of the base */
const WAVELENGTH_GROWTH = 0.65;
/** Max random deviation of wavelength (world units) */
const WAVELENGTH_JITTER = 1;
const MIN_WAVELENGTH = 1;

export interface WaveComponent {
    /** Horizontal unit direction of travel */
    readonly dirX: number;
    readonly dirZ: number;
    readonly amplitude: number;
    readonly wavelength: number;
    /** Initial phase offset in [0, 2π) */
    readonly phase: number;
    /** Wave number 2π / wavelength */
    readonly k: number;
}

export function createWaveComponent(
    angle: number,
    amplitude: number,
    wavelength: number,
    phase: number,
): WaveComponent {
    return Object.freeze({
        dirX: Math.cos(angle),
        dirZ: Math.sin(angle),
        amplitude,
        wavelength,
        phase,
        k: TWO_PI / wavelength,
    });
}

/** Deep-water angular frequency at a given speed scale */
export function angularFrequency(component: WaveComponent, speedScale: number): number {
    return Math.sqrt(GRAVITY * component.k) * speedScale;
}

/**
 * Generate `count` components spread around the compass.
 * Later components are longer, lower and pointed further around the circle.
 */
export function generateWaveComponents(
    count: number,
    baseHeight: number,
    baseWavelength: number,
    rng: SeededRng,
): WaveComponent[] {
    const components: WaveComponent[] = [];

    for (let i = 0; i < count; i++) {
        const angle = (TWO_PI * i) / count + rng.nextFloat(-WAVE_DIRECTION_JITTER, WAVE_DIRECTION_JITTER);
        const wavelength = Math.max(
            MIN_WAVELENGTH,
            baseWavelength * (1 + WAVELENGTH_GROWTH * i) + rng.nextFloat(-WAVELENGTH_JITTER, WAVELENGTH_JITTER),
        );
        const amplitude = (baseHeight * rng.nextFloat(0.5, 1.0)) / (i + 1);
        const phase = rng.nextFloat(0, TWO_PI);

        components.push(createWaveComponent(angle, amplitude, wavelength, phase));
    }

    return components;
}
