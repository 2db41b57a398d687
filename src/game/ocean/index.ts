/**
 * Ocean Module
 *
 * Public API:
 * - WaveField: height/normal/current sampling over time, storm intensity
 * - WaveComponent helpers: generation and dispersion relation
 */

export { WaveField, TURBULENCE_STRENGTH } from './wave-field';
export type { WaveFieldOptions } from './wave-field';
export {
    GRAVITY,
    WAVE_DIRECTION_JITTER,
    angularFrequency,
    createWaveComponent,
    generateWaveComponents,
} from './wave-component';
export type { WaveComponent } from './wave-component';
