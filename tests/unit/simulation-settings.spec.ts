import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
    DEFAULT_SETTINGS,
    SETTINGS_STORAGE_KEY,
    SimulationSettingsManager,
    createMemorySettingsStorage,
    type SettingsStorage,
} from '@/game/simulation-settings';

function storedSettings(storage: SettingsStorage): unknown {
    const raw = storage.getItem(SETTINGS_STORAGE_KEY);
    return raw === null ? null : JSON.parse(raw);
}

describe('SimulationSettingsManager', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('should start from defaults with empty storage', () => {
        const settings = new SimulationSettingsManager(createMemorySettingsStorage());
        expect({ ...settings.state }).toEqual(DEFAULT_SETTINGS);
        settings.dispose();
    });

    it('should merge stored values over defaults', () => {
        const storage = createMemorySettingsStorage({
            [SETTINGS_STORAGE_KEY]: JSON.stringify({ stormIntensity: 0.5, logLevel: 'warn' }),
        });
        const settings = new SimulationSettingsManager(storage);

        expect(settings.state.stormIntensity).toBe(0.5);
        expect(settings.state.logLevel).toBe('warn');
        expect(settings.state.previewDistance).toBe(DEFAULT_SETTINGS.previewDistance);
        settings.dispose();
    });

    it('should discard stored values of the wrong shape', () => {
        const storage = createMemorySettingsStorage({
            [SETTINGS_STORAGE_KEY]: JSON.stringify({
                stormIntensity: 5,
                previewDistance: -3,
                logLevel: 'verbose',
                paused: 'yes',
            }),
        });
        const settings = new SimulationSettingsManager(storage);

        expect(settings.state.stormIntensity).toBe(1);
        expect(settings.state.previewDistance).toBe(2);
        expect(settings.state.logLevel).toBe('info');
        expect(settings.state.paused).toBe(false);
        settings.dispose();
    });

    it('should fall back to defaults when storage holds invalid JSON', () => {
        const storage = createMemorySettingsStorage({ [SETTINGS_STORAGE_KEY]: '{not json' });
        const settings = new SimulationSettingsManager(storage);
        expect({ ...settings.state }).toEqual(DEFAULT_SETTINGS);
        settings.dispose();
    });

    it('should save changes after the debounce delay', () => {
        const storage = createMemorySettingsStorage();
        const settings = new SimulationSettingsManager(storage);

        settings.state.stormIntensity = 0.3;
        settings.state.previewDistance = 4;
        expect(storedSettings(storage)).toBeNull();

        vi.advanceTimersByTime(100);
        expect(storedSettings(storage)).toEqual({ ...DEFAULT_SETTINGS, stormIntensity: 0.3, previewDistance: 4 });
        settings.dispose();
    });

    it('should call setting watchers immediately and on every change', () => {
        const settings = new SimulationSettingsManager();
        const seen: number[] = [];

        settings.watchSetting('stormIntensity', (value) => seen.push(value));
        settings.state.stormIntensity = 0.25;
        settings.state.stormIntensity = 0.75;

        expect(seen).toEqual([0, 0.25, 0.75]);
        settings.dispose();
    });

    it('should reset every value to its default', () => {
        const settings = new SimulationSettingsManager();
        settings.state.stormIntensity = 1;
        settings.state.paused = true;

        settings.resetToDefaults();
        expect({ ...settings.state }).toEqual(DEFAULT_SETTINGS);
        expect(settings.getDefaults()).toEqual(DEFAULT_SETTINGS);
        settings.dispose();
    });

    it('should write pending changes and stop watching on dispose', () => {
        const storage = createMemorySettingsStorage();
        const settings = new SimulationSettingsManager(storage);
        const seen: boolean[] = [];
        settings.watchSetting('paused', (value) => seen.push(value));

        settings.state.paused = true;
        settings.dispose();
        expect(storedSettings(storage)).toEqual({ ...DEFAULT_SETTINGS, paused: true });

        settings.state.paused = false;
        vi.advanceTimersByTime(1000);
        expect(seen).toEqual([false, true]);
        expect(storedSettings(storage)).toEqual({ ...DEFAULT_SETTINGS, paused: true });
    });
});
