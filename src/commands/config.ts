import chalk from 'chalk';
import {
    CONFIG_KEYS,
    DEFAULT_SETTINGS,
    getSettingsStore,
    isConfigKey,
    parseFormat,
    parseThreshold,
    type ConfigKey,
} from '../config.js';
import { InvalidOptionError, exitCodeFor } from '../errors.js';
import { consoleLogger } from '../logger.js';

function store(key: ConfigKey, value: string): void {
    const settings = getSettingsStore();
    if (key === 'threshold') {
        settings.set('ccnThreshold', parseThreshold(value));
    } else {
        settings.set('format', parseFormat(value));
    }
}

export const configAction = (key: string, value?: string) => {
    try {
        if (key === 'reset') {
            getSettingsStore().store = { ...DEFAULT_SETTINGS };
            console.log(chalk.yellow('ℹ Settings restored to defaults.'));
            return;
        }

        if (!isConfigKey(key)) {
            throw new InvalidOptionError('config key', key, `one of: ${Object.keys(CONFIG_KEYS).join(', ')}, reset`);
        }

        if (value === undefined) {
            console.log(String(getSettingsStore().get(CONFIG_KEYS[key])));
            return;
        }

        store(key, value);
        console.log(chalk.green(`✔ ${key} set to ${value}.`));
    } catch (error) {
        consoleLogger.error(error instanceof Error ? error.message : String(error));
        process.exitCode = exitCodeFor(error);
    }
};
