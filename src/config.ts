import Conf from 'conf';
import { InvalidOptionError } from './errors.js';
import type { OutputFormat } from './types.js';

export interface Settings {
    ccnThreshold: number;
    format: OutputFormat;
}

export const DEFAULT_SETTINGS: Settings = {
    ccnThreshold: 10,
    format: 'text',
};

/** Read side of the persisted store, enough to resolve defaults. */
export interface SettingsSource {
    get<K extends keyof Settings>(key: K): Settings[K];
}

let store: Conf<Settings> | undefined;

/** Persisted user settings, created on first use. */
export function getSettingsStore(): Conf<Settings> {
    store ??= new Conf<Settings>({ projectName: 'shccn', defaults: DEFAULT_SETTINGS });
    return store;
}

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];

export function parseFormat(value: string): OutputFormat {
    const format = OUTPUT_FORMATS.find(f => f === value);
    if (!format) {
        throw new InvalidOptionError('format', value, `one of: ${OUTPUT_FORMATS.join(', ')}`);
    }
    return format;
}

export function parseThreshold(value: string): number {
    const threshold = Number(value);
    if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(threshold) || threshold < 1) {
        throw new InvalidOptionError('threshold', value, 'a positive integer');
    }
    return threshold;
}

export interface CliOverrides {
    format?: string;
    threshold?: string;
}

/** Flags win over stored settings, stored settings over defaults. */
export function resolveSettings(overrides: CliOverrides, source: SettingsSource): Settings {
    return {
        ccnThreshold: overrides.threshold !== undefined
            ? parseThreshold(overrides.threshold)
            : source.get('ccnThreshold'),
        format: overrides.format !== undefined
            ? parseFormat(overrides.format)
            : source.get('format'),
    };
}

/** Maps user-facing `config` keys onto settings. */
export const CONFIG_KEYS = {
    threshold: 'ccnThreshold',
    format: 'format',
} as const satisfies Record<string, keyof Settings>;

export type ConfigKey = keyof typeof CONFIG_KEYS;

export function isConfigKey(key: string): key is ConfigKey {
    return Object.hasOwn(CONFIG_KEYS, key);
}
