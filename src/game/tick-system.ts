/**
 * Interface for systems that update every simulation tick.
 * Systems register with the SimulationLoop instead of being called directly.
 */
export interface TickSystem {
    /** Name used in logs and error tracking */
    readonly name: string;

    /** Called each fixed-timestep tick */
    tick(dt: number): void;

    /**
     * Optional: called when the loop is destroyed.
     * Systems that subscribe to events MUST release them here.
     */
    destroy?(): void;
}
