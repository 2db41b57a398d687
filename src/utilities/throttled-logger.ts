import { LogHandler } from './log-handler';

/**
 * Logger for per-tick hot paths.
 *
 * Emits at most one entry per `throttleMs` and reports how many messages
 * were suppressed in between.
 *
 * Usage:
 *   const tl = new ThrottledLogger(log, 1000);
 *   tl.error('System "motion" failed', err);
 */
export class ThrottledLogger {
    private lastTime = Number.NEGATIVE_INFINITY;
    private suppressed = 0;

    constructor(
        private readonly log: LogHandler,
        private readonly throttleMs: number,
        private readonly now: () => number = () => performance.now()
    ) {}

    /** Returns the message to log (with suppression note), or null if throttled */
    private shouldLog(message: string): string | null {
        const now = this.now();
        if (now - this.lastTime < this.throttleMs) {
            this.suppressed++;
            return null;
        }

        this.lastTime = now;
        if (this.suppressed > 0) {
            const result = `${message} (${this.suppressed} similar suppressed)`;
            this.suppressed = 0;
            return result;
        }
        return message;
    }

    /**
     * Log an error if enough time has passed since the last one.
     * Returns `true` when the message was actually logged.
     */
    error(message: string, error: Error): boolean {
        const finalMessage = this.shouldLog(message);
        if (finalMessage === null) return false;
        this.log.error(finalMessage, error);
        return true;
    }

    /** Same throttling as error() for non-fatal issues. */
    warn(message: string): boolean {
        const finalMessage = this.shouldLog(message);
        if (finalMessage === null) return false;
        this.log.warn(finalMessage);
        return true;
    }

    /** Number of messages dropped since the last one that got through */
    get suppressedCount(): number {
        return this.suppressed;
    }
}
