export enum LogType {
    Error,
    Debug,
    Warn,
    Info
}

/** Severity order used by the minimum-level filter (lowest first) */
const SEVERITY: Record<LogType, number> = {
    [LogType.Debug]: 0,
    [LogType.Info]: 1,
    [LogType.Warn]: 2,
    [LogType.Error]: 3,
};

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_BY_NAME: Record<LogLevelName, LogType> = {
    debug: LogType.Debug,
    info: LogType.Info,
    warn: LogType.Warn,
    error: LogType.Error,
};

export interface ILogMessage {
    type: LogType;
    source: string;
    msg: string | Record<string, unknown>;
    exception?: Error;
    index?: number;
}

export type LogMessageCallback = ((msg: ILogMessage) => void);

/** Minimum interval between identical console messages (in ms) */
const LOG_THROTTLE_MS = 1000;

/** Number of messages kept in the in-memory ring buffer */
const LOG_HISTORY_SIZE = 100;

/** Frames below these markers are node/vitest internals */
const INTERNAL_FRAME_PATTERNS = [
    /node:internal/,
    /node_modules[\\/]vitest/,
    /processTicksAndRejections/,
];

/**
 * Drop runner and node internals from a stack trace.
 * Keeps everything up to the first internal frame.
 */
function cleanStackTrace(stack: string): string {
    const lines = stack.split('\n');
    const result: string[] = [];

    for (const line of lines) {
        if (INTERNAL_FRAME_PATTERNS.some(p => p.test(line))) {
            result.push('    ... (internal frames truncated)');
            break;
        }
        result.push(line);
    }

    return result.join('\n');
}

export class LogManager {
    public log: ILogMessage[] = [];
    private logMsgCount = 0;
    private listener: LogMessageCallback | null = null;
    private minLevel: LogType = LogType.Debug;

    /** Throttle state: source+msg -> { lastTime, suppressedCount } */
    private throttleState = new Map<string, { lastTime: number; suppressedCount: number }>();

    public onLogMessage(callback: LogMessageCallback | null): void {
        this.listener = callback;

        if (!callback) {
            return;
        }

        // replay history
        for (const msg of this.log) {
            callback(msg);
        }
    }

    /** Messages below this level are dropped before reaching history or console */
    public setMinLevel(level: LogType | LogLevelName): void {
        this.minLevel = typeof level === 'string' ? LEVEL_BY_NAME[level] : level;
    }

    public getMinLevel(): LogType {
        return this.minLevel;
    }

    public clear(): void {
        this.log = [];
        this.throttleState.clear();
    }

    public push(msg: ILogMessage): void {
        if (SEVERITY[msg.type] < SEVERITY[this.minLevel]) {
            return;
        }

        msg.index = this.logMsgCount++;

        this.log.push(msg);
        if (this.log.length > LOG_HISTORY_SIZE) {
            this.log.shift();
        }

        if (this.listener) {
            this.listener(msg);
        }

        const msgStr = typeof msg.msg === 'string' ? msg.msg : JSON.stringify(msg.msg);
        const throttleKey = `${msg.source}:${msg.type}:${msgStr}`;
        const now = performance.now();
        const state = this.throttleState.get(throttleKey);

        if (state && now - state.lastTime < LOG_THROTTLE_MS) {
            state.suppressedCount++;
            return;
        }

        const suppressedNote = state && state.suppressedCount > 0
            ? ` (${state.suppressedCount} similar suppressed)`
            : '';

        this.throttleState.set(throttleKey, { lastTime: now, suppressedCount: 0 });

        if (typeof msg.msg !== 'string') {
            console.dir(msg.msg);
            return;
        }

        let formatted = msg.source + '\t' + msg.msg + suppressedNote;

        if (msg.exception) {
            formatted += '\n' + msg.exception.message;
            if (msg.exception.stack) {
                formatted += '\n' + cleanStackTrace(msg.exception.stack);
            }
        }

        switch (msg.type) {
        case LogType.Error:
            console.error(formatted);
            break;
        case LogType.Warn:
            console.warn(formatted);
            break;
        case LogType.Info:
            console.info(formatted);
            break;
        case LogType.Debug:
            console.log(formatted);
            break;
        }
    }
}
