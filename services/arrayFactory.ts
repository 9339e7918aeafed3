import type { ArrayRequest } from '../types';
import { VALUE_RANGE } from '../constants';
import { InvalidInputError } from './errors';
import { createRandomSource, randomInt } from './random';

/**
 * Builds an input sequence for the visualizer.
 * - `random`: independent values in [min, max] (duplicates allowed).
 * - `nearlySorted`: sorted values with size/10 random exchanges.
 * - `reversed`: sorted values in descending order.
 * The same request with the same seed always yields the same array.
 */
export const createArray = ({ size, type = 'random', min = VALUE_RANGE.min, max = VALUE_RANGE.max, seed }: ArrayRequest): number[] => {
    if (!Number.isInteger(size) || size < 0) {
        throw new InvalidInputError(`Array size must be a non-negative integer, got ${size}.`);
    }
    if (!Number.isFinite(min) || !Number.isFinite(max) || min > max) {
        throw new InvalidInputError(`Invalid value range ${min}..${max}.`);
    }

    const random = createRandomSource(seed);
    const arr = Array.from({ length: size }, () => randomInt(random, min, max));

    switch (type) {
        case 'random':
            break;
        case 'nearlySorted':
            arr.sort((a, b) => a - b);
            for (let i = 0; i < Math.floor(size / 10); i++) {
                const idx1 = randomInt(random, 0, size - 1);
                const idx2 = randomInt(random, 0, size - 1);
                [arr[idx1], arr[idx2]] = [arr[idx2], arr[idx1]];
            }
            break;
        case 'reversed':
            arr.sort((a, b) => b - a);
            break;
    }
    return arr;
};

/**
 * Parses user-typed input such as "5, 3 8,1" into numbers.
 */
export const parseSequence = (text: string): number[] => {
    const tokens = text.split(/[\s,]+/).filter(token => token !== '');
    return tokens.map(token => {
        const value = Number(token);
        if (Number.isNaN(value)) {
            throw new InvalidInputError(`"${token}" is not a number.`);
        }
        return value;
    });
};
