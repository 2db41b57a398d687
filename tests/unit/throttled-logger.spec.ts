import { describe, it, expect, beforeEach } from 'vitest';
import { LogHandler } from '@/utilities/log-handler';
import { LogType, type ILogMessage } from '@/utilities/log-manager';
import { ThrottledLogger } from '@/utilities/throttled-logger';

describe('ThrottledLogger', () => {
    let now: number;
    let received: ILogMessage[];

    beforeEach(() => {
        now = 0;
        received = [];
        const manager = LogHandler.getLogManager();
        manager.clear();
        manager.setMinLevel('debug');
        manager.onLogMessage((msg) => received.push(msg));
    });

    it('should log the first message and suppress repeats inside the window', () => {
        const tl = new ThrottledLogger(new LogHandler('Throttle'), 1000, () => now);

        expect(tl.warn('slow tick')).toBe(true);
        now = 500;
        expect(tl.warn('slow tick')).toBe(false);
        expect(tl.warn('slow tick')).toBe(false);
        expect(tl.suppressedCount).toBe(2);

        now = 1000;
        expect(tl.warn('slow tick')).toBe(true);
        expect(tl.suppressedCount).toBe(0);

        expect(received.map(m => m.msg)).toEqual([
            'slow tick',
            'slow tick (2 similar suppressed)',
        ]);
        expect(received.every(m => m.type === LogType.Warn)).toBe(true);
    });

    it('should attach the exception to errors', () => {
        const tl = new ThrottledLogger(new LogHandler('Throttle'), 1000, () => now);
        const err = new Error('boom');

        expect(tl.error('System "waves" failed', err)).toBe(true);
        expect(received).toHaveLength(1);
        expect(received[0].exception).toBe(err);
        expect(received[0].source).toBe('Throttle');
    });
});
