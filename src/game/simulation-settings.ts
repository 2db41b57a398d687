import { reactive, watch, type WatchStopHandle } from 'vue';
import type { LogLevelName } from '@/utilities/log-manager';
import { LogHandler } from '@/utilities/log-handler';

const log = new LogHandler('SimulationSettings');

export const SETTINGS_STORAGE_KEY = 'tidewright_simulation_settings';

/** Delay before a burst of changes is written to storage */
const SAVE_DEBOUNCE_MS = 100;

/**
 * Runtime-tunable settings. Add new settings here and they are
 * persisted and restored automatically.
 */
export interface SimulationSettings {
    /** 0 = calm sea, 1 = full storm */
    stormIntensity: number;
    /** Distance (world units) in front of the builder where previews appear */
    previewDistance: number;
    logLevel: LogLevelName;
    paused: boolean;
}

export const DEFAULT_SETTINGS: SimulationSettings = {
    stormIntensity: 0,
    previewDistance: 2,
    logLevel: 'info',
    paused: false,
};

/** Minimal key-value store (localStorage-shaped) */
export interface SettingsStorage {
    getItem(key: string): string | null;
    setItem(key: string, value: string): void;
}

/** Process-local storage; settings survive only as long as the object */
export function createMemorySettingsStorage(initial: Record<string, string> = {}): SettingsStorage {
    const items = new Map(Object.entries(initial));
    return {
        getItem: (key) => items.get(key) ?? null,
        setItem: (key, value) => { items.set(key, value); },
    };
}

const LOG_LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Keep only stored values whose type matches the default */
function sanitize(parsed: unknown): Partial<SimulationSettings> {
    if (!isRecord(parsed)) return {};

    const result: Partial<SimulationSettings> = {};
    const { stormIntensity, previewDistance, logLevel, paused } = parsed;
    if (typeof stormIntensity === 'number' && Number.isFinite(stormIntensity)) {
        result.stormIntensity = Math.min(1, Math.max(0, stormIntensity));
    }
    if (typeof previewDistance === 'number' && Number.isFinite(previewDistance) && previewDistance >= 0) {
        result.previewDistance = previewDistance;
    }
    if (typeof logLevel === 'string') {
        const level = LOG_LEVELS.find(l => l === logLevel);
        if (level) result.logLevel = level;
    }
    if (typeof paused === 'boolean') {
        result.paused = paused;
    }
    return result;
}

/** Load settings from storage, merging with defaults */
function loadSettings(storage: SettingsStorage): SimulationSettings {
    try {
        const stored = storage.getItem(SETTINGS_STORAGE_KEY);
        if (!stored) return { ...DEFAULT_SETTINGS };

        // Merge with defaults so settings added later get a value
        return {
            ...DEFAULT_SETTINGS,
            ...sanitize(JSON.parse(stored)),
        };
    } catch (e) {
        log.warn(`Failed to load settings, using defaults: ${e instanceof Error ? e.message : String(e)}`);
        return { ...DEFAULT_SETTINGS };
    }
}

function saveSettings(storage: SettingsStorage, settings: SimulationSettings): void {
    try {
        storage.setItem(SETTINGS_STORAGE_KEY, JSON.stringify(settings));
    } catch (e) {
        log.warn(`Failed to save settings: ${e instanceof Error ? e.message : String(e)}`);
    }
}

/**
 * Runtime settings manager.
 * - Loads from storage on construction
 * - Saves (debounced) whenever a value changes
 * - Exposes reactive state so systems can watch individual settings
 */
export class SimulationSettingsManager {
    public readonly state: SimulationSettings;

    private readonly storage: SettingsStorage;
    private saveTimeoutId: ReturnType<typeof setTimeout> | null = null;
    private stopHandles: WatchStopHandle[] = [];

    constructor(storage: SettingsStorage = createMemorySettingsStorage()) {
        this.storage = storage;
        this.state = reactive<SimulationSettings>(loadSettings(storage));
        this.setupAutoSave();
    }

    /**
     * Call `callback` synchronously whenever `key` changes, and once now
     * with the current value.
     */
    watchSetting<K extends keyof SimulationSettings>(
        key: K,
        callback: (value: SimulationSettings[K]) => void,
    ): WatchStopHandle {
        const stop = watch(
            () => this.state[key],
            (value) => callback(value),
            { flush: 'sync', immediate: true },
        );
        this.stopHandles.push(stop);
        return stop;
    }

    /** Reset all settings to defaults */
    public resetToDefaults(): void {
        Object.assign(this.state, DEFAULT_SETTINGS);
    }

    public getDefaults(): SimulationSettings {
        return { ...DEFAULT_SETTINGS };
    }

    /** Write pending changes now */
    public flush(): void {
        if (this.saveTimeoutId !== null) {
            clearTimeout(this.saveTimeoutId);
            this.saveTimeoutId = null;
        }
        saveSettings(this.storage, this.state);
    }

    /** Stop all watchers and write any pending change */
    public dispose(): void {
        for (const stop of this.stopHandles) {
            stop();
        }
        this.stopHandles = [];
        if (this.saveTimeoutId !== null) {
            this.flush();
        }
    }

    private setupAutoSave(): void {
        const settingsKeys = Object.keys(DEFAULT_SETTINGS) as (keyof SimulationSettings)[];

        for (const key of settingsKeys) {
            this.stopHandles.push(watch(
                () => this.state[key],
                () => this.debouncedSave(),
                { flush: 'sync' }
            ));
        }
    }

    private debouncedSave(): void {
        if (this.saveTimeoutId !== null) {
            clearTimeout(this.saveTimeoutId);
        }
        this.saveTimeoutId = setTimeout(() => {
            this.saveTimeoutId = null;
            saveSettings(this.storage, this.state);
        }, SAVE_DEBOUNCE_MS);
    }
}
