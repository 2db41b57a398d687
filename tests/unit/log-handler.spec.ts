import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { LogHandler } from '@/utilities/log-handler';
import { LogType, type ILogMessage } from '@/utilities/log-manager';
import { SimulationLoop } from '@/game/simulation-loop';

describe('LogHandler', () => {
    let received: ILogMessage[];

    beforeEach(() => {
        received = [];
        const manager = LogHandler.getLogManager();
        manager.clear();
        LogHandler.setLevel('debug');
        manager.onLogMessage((msg) => received.push(msg));
    });

    afterEach(() => {
        LogHandler.getLogManager().onLogMessage(null);
        LogHandler.setLevel('debug');
    });

    it('should tag messages with the handler source and type', () => {
        const log = new LogHandler('Harbor');
        log.info('docked');
        log.debug({ tiles: 3 });

        expect(received.map(m => [m.source, m.type, m.msg])).toEqual([
            ['Harbor', LogType.Info, 'docked'],
            ['Harbor', LogType.Debug, { tiles: 3 }],
        ]);
    });

    it('should scope child handlers under the parent source', () => {
        const child = new LogHandler('SimulationLoop').child('waves');
        expect(child.source).toBe('SimulationLoop/waves');

        child.warn('slow tick');
        expect(received[0].source).toBe('SimulationLoop/waves');
    });

    it('should apply the level to every handler', () => {
        const a = new LogHandler('A');
        const b = new LogHandler('B');

        LogHandler.setLevel('warn');
        expect(LogHandler.getLevel()).toBe('warn');

        a.info('hidden');
        b.debug('hidden');
        a.warn('shown');
        b.error('shown too');

        expect(received.map(m => `${m.source}:${String(m.msg)}`)).toEqual(['A:shown', 'B:shown too']);
    });

    it('should report a failing system under its own source', () => {
        const loop = new SimulationLoop(4);
        const err = new Error('capsized');
        loop.registerSystem({
            name: 'waves',
            tick: () => {
                throw err;
            },
        });

        loop.step();

        const failure = received.find(m => m.type === LogType.Error);
        expect(failure?.source).toBe('SimulationLoop/waves');
        expect(failure?.msg).toBe('System "waves" failed');
        expect(failure?.exception).toBe(err);
        loop.destroy();
    });
});
