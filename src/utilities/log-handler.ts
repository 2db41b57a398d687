import { LogManager, LogType, type LogLevelName } from './log-manager';

const LEVEL_NAMES: Record<LogType, LogLevelName> = {
    [LogType.Debug]: 'debug',
    [LogType.Info]: 'info',
    [LogType.Warn]: 'warn',
    [LogType.Error]: 'error',
};

/**
 * Per-module logger. All handlers write into one shared LogManager, so the
 * level set here applies to every module at once.
 *
 * ```typescript
 * const log = new LogHandler('SimulationLoop');
 * const waves = log.child('waves'); // source "SimulationLoop/waves"
 * LogHandler.setLevel('warn');
 * ```
 */
export class LogHandler {
    private static manager = new LogManager();

    public readonly source: string;

    constructor(source: string) {
        this.source = source;
    }

    /** Handler whose messages carry `<source>/<scope>` */
    public child(scope: string): LogHandler {
        return new LogHandler(`${this.source}/${scope}`);
    }

    public error(msg: string, exception?: Error): void {
        this.write(LogType.Error, msg, exception);
    }

    public warn(msg: string): void {
        this.write(LogType.Warn, msg);
    }

    public info(msg: string): void {
        this.write(LogType.Info, msg);
    }

    /** Objects are dumped as {prop:value} */
    public debug(msg: string | Record<string, unknown>): void {
        this.write(LogType.Debug, msg);
    }

    private write(type: LogType, msg: string | Record<string, unknown>, exception?: Error): void {
        LogHandler.manager.push({ type, source: this.source, msg, exception });
    }

    /** Drop messages below `level` for every handler */
    public static setLevel(level: LogLevelName): void {
        this.manager.setMinLevel(level);
    }

    public static getLevel(): LogLevelName {
        return LEVEL_NAMES[this.manager.getMinLevel()];
    }

    public static getLogManager(): LogManager {
        return this.manager;
    }
}
