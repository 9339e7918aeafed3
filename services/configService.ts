import type { SettingsErrors, VisualizerSettings } from '../types';
import { LIMITS } from '../constants';

export const EMPTY_ERRORS: SettingsErrors = { arraySize: '', delay: '', seed: '' };

/**
 * Per-field messages for the settings form; an empty string means the field is valid.
 */
const isValidSeed = (seed: number | undefined) => seed === undefined || (Number.isInteger(seed) && seed >= 0);

export const validateSettings = (settings: VisualizerSettings): SettingsErrors => {
    const errors: SettingsErrors = { ...EMPTY_ERRORS };
    const { arraySize, delay, seed } = settings;

    if (!Number.isInteger(arraySize) || arraySize < LIMITS.minArraySize || arraySize > LIMITS.maxArraySize) {
        errors.arraySize = `Size must be ${LIMITS.minArraySize}-${LIMITS.maxArraySize}.`;
    }
    if (!Number.isFinite(delay) || delay < LIMITS.minDelay || delay > LIMITS.maxDelay) {
        errors.delay = `Delay must be ${LIMITS.minDelay}-${LIMITS.maxDelay}ms.`;
    }
    if (!isValidSeed(seed)) {
        errors.seed = 'Seed must be a non-negative integer.';
    }
    return errors;
};

export const hasErrors = (errors: SettingsErrors) => Object.values(errors).some(e => e !== '');

/**
 * The seed to run with. An invalid seed is shown as a field error and treated as unset.
 */
export const effectiveSeed = (settings: VisualizerSettings) => (isValidSeed(settings.seed) ? settings.seed : undefined);
