import { describe, it, expect } from 'vitest';
import { DEFAULT_SETTINGS } from '../constants';
import { EMPTY_ERRORS, effectiveSeed, hasErrors, validateSettings } from './configService';

describe('validateSettings', () => {
    it('accepts the defaults', () => {
        const errors = validateSettings(DEFAULT_SETTINGS);
        expect(errors).toEqual(EMPTY_ERRORS);
        expect(hasErrors(errors)).toBe(false);
    });

    it('reports each invalid field', () => {
        const errors = validateSettings({ ...DEFAULT_SETTINGS, arraySize: 201, delay: -1, seed: 1.5 });
        expect(errors).toEqual({
            arraySize: 'Size must be 0-200.',
            delay: 'Delay must be 0-1000ms.',
            seed: 'Seed must be a non-negative integer.',
        });
        expect(hasErrors(errors)).toBe(true);
    });

    it('accepts the range limits', () => {
        expect(validateSettings({ ...DEFAULT_SETTINGS, arraySize: 0, delay: 1000, seed: 0 })).toEqual(EMPTY_ERRORS);
    });
});

describe('effectiveSeed', () => {
    it('keeps a valid seed', () => {
        expect(effectiveSeed({ ...DEFAULT_SETTINGS, seed: 7 })).toBe(7);
        expect(effectiveSeed({ ...DEFAULT_SETTINGS, seed: 0 })).toBe(0);
        expect(effectiveSeed({ ...DEFAULT_SETTINGS, seed: undefined })).toBeUndefined();
    });

    it('drops a seed the form rejects', () => {
        for (const seed of [-3, 1.5, Number.NaN]) {
            expect(effectiveSeed({ ...DEFAULT_SETTINGS, seed })).toBeUndefined();
        }
    });
});
