import type { TickSystem } from './tick-system';
import { DEFAULT_TICK_RATE } from './config';
import { LogHandler } from '@/utilities/log-handler';
import { ThrottledLogger } from '@/utilities/throttled-logger';

/** Consecutive failures before a tick system is disabled */
const SYSTEM_CIRCUIT_BREAKER_THRESHOLD = 100;

/** Upper bound on catch-up ticks per advance() (spiral-of-death guard) */
export const MAX_TICKS_PER_ADVANCE = 10;

/** Per-system error tracking */
interface SystemErrorState {
    consecutiveFailures: number;
    disabled: boolean;
    logger: ThrottledLogger;
}

/**
 * Fixed-timestep simulation driver.
 *
 * The host calls advance() with real elapsed time; the loop runs registered
 * systems in registration order at a fixed rate and carries the remainder to
 * the next call. A system that throws is logged (throttled) and, after
 * repeated failures, disabled so the rest of the simulation keeps running.
 */
export class SimulationLoop {
    private static log = new LogHandler('SimulationLoop');

    readonly tickDuration: number;

    private accumulator = 0;
    private ticksPaused = false;
    private tickCount = 0;
    private systems: TickSystem[] = [];
    private systemErrors = new Map<TickSystem, SystemErrorState>();

    constructor(tickRate: number = DEFAULT_TICK_RATE) {
        this.tickDuration = 1 / tickRate;
    }

    registerSystem(system: TickSystem): void {
        this.systems.push(system);
        this.systemErrors.set(system, {
            consecutiveFailures: 0,
            disabled: false,
            logger: new ThrottledLogger(SimulationLoop.log.child(system.name), 1000),
        });
    }

    unregisterSystem(system: TickSystem): void {
        this.systems = this.systems.filter(s => s !== system);
        this.systemErrors.delete(system);
    }

    get isPaused(): boolean {
        return this.ticksPaused;
    }

    /** Total fixed ticks executed */
    get ticks(): number {
        return this.tickCount;
    }

    /** Fraction of a tick left in the accumulator (for render interpolation) */
    get alpha(): number {
        return this.accumulator / this.tickDuration;
    }

    pause(): void {
        this.ticksPaused = true;
    }

    resume(): void {
        this.ticksPaused = false;
    }

    isSystemDisabled(system: TickSystem): boolean {
        return this.systemErrors.get(system)?.disabled ?? false;
    }

    /** Re-enable a system disabled by the circuit breaker */
    resetSystem(system: TickSystem): void {
        const state = this.systemErrors.get(system);
        if (state) {
            state.consecutiveFailures = 0;
            state.disabled = false;
        }
    }

    /**
     * Feed real elapsed seconds; runs as many fixed ticks as fit.
     * Returns the number of ticks executed.
     */
    advance(deltaSec: number): number {
        if (this.ticksPaused || !(deltaSec > 0) || !Number.isFinite(deltaSec)) {
            return 0;
        }

        this.accumulator += deltaSec;

        let ran = 0;
        while (this.accumulator >= this.tickDuration && ran < MAX_TICKS_PER_ADVANCE) {
            this.runTick(this.tickDuration);
            this.accumulator -= this.tickDuration;
            ran++;
        }

        if (this.accumulator >= this.tickDuration) {
            SimulationLoop.log.warn(`Dropping ${(this.accumulator / this.tickDuration).toFixed(1)} ticks of backlog`);
            this.accumulator = 0;
        }

        return ran;
    }

    /** Run exactly one tick regardless of elapsed time (debug stepping) */
    step(): void {
        this.runTick(this.tickDuration);
    }

    destroy(): void {
        for (const system of this.systems) {
            system.destroy?.();
        }
        this.systems = [];
        this.systemErrors.clear();
    }

    private runTick(dt: number): void {
        for (const system of this.systems) {
            const state = this.systemErrors.get(system);
            if (!state || state.disabled) continue;

            try {
                system.tick(dt);
                state.consecutiveFailures = 0;
            } catch (e) {
                const err = e instanceof Error ? e : new Error(String(e));
                state.consecutiveFailures++;
                state.logger.error(`System "${system.name}" failed`, err);

                if (state.consecutiveFailures >= SYSTEM_CIRCUIT_BREAKER_THRESHOLD) {
                    state.disabled = true;
                    SimulationLoop.log.error(`System "${system.name}" disabled after ${state.consecutiveFailures} consecutive failures`);
                }
            }
        }
        this.tickCount++;
    }
}
