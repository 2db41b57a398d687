/**
 * Seeded random number generator for deterministic simulation.
 *
 * Uses the Mulberry32 algorithm. Wave generation and any other simulation
 * randomness MUST draw from this instead of Math.random() so that a seed
 * reproduces the same ocean.
 *
 * ```typescript
 * const rng = new SeededRng(12345);
 * rng.next();               // 0.0 to 1.0
 * rng.nextFloat(-0.5, 0.5); // -0.5 to 0.5
 * rng.nextInt(6);           // 0 to 5
 * ```
 */
export class SeededRng {
    private state: number;

    constructor(seed: number) {
        this.state = seed >>> 0;
        // Warm up: the first few outputs of a fresh state are poorly mixed
        for (let i = 0; i < 10; i++) {
            this.next();
        }
    }

    /** Current internal state (for serialization/replay) */
    getState(): number {
        return this.state;
    }

    setState(state: number): void {
        this.state = state >>> 0;
    }

    /** Next float in [0, 1) */
    next(): number {
        this.state = (this.state + 0x6D2B79F5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /** Next float in [min, max) */
    nextFloat(min: number, max: number): number {
        return min + this.next() * (max - min);
    }

    /** Next integer in [0, max) */
    nextInt(max: number): number {
        return Math.floor(this.next() * max);
    }

    /** Independent child stream for a subsystem */
    fork(): SeededRng {
        return new SeededRng(this.state ^ 0xDEADBEEF);
    }
}

export const DEFAULT_WORLD_SEED = 12345;
