import { describe, it, expect } from 'vitest';
import type { AlgorithmKey, Trace } from '../types';
import { ALGORITHM_KEYS } from '../constants';
import { generateTrace, isAlgorithmKey } from './sortingService';
import { createArray } from './arrayFactory';
import { InvalidAlgorithmError, InvalidInputError } from './errors';

const byNumber = (a: number, b: number) => a - b;
const finalStep = (trace: Trace) => trace.steps[trace.steps.length - 1];

const cases: number[][] = [
    [3, 1, 2],
    [2, 1],
    [1, 2, 3, 4],
    [4, 3, 2, 1],
    [5, -1, 4, 0, 0, 3, 2, 2, 1],
    [7, 7, 7, 7],
    [-Infinity, 3, Infinity, -2],
    [0.5, -0.25, 0.5, 1e3],
    createArray({ size: 60, seed: 11 }),
    createArray({ size: 60, type: 'reversed', seed: 12 }),
    createArray({ size: 60, type: 'nearlySorted', seed: 13 }),
    createArray({ size: 40, min: 1, max: 5, seed: 14 }),
];

describe('generateTrace', () => {
    describe.each(ALGORITHM_KEYS.map(key => [key]))('%s', (algorithm: AlgorithmKey) => {
        it('ends with a sorted done step', () => {
            for (const input of cases) {
                const trace = generateTrace(input, algorithm);
                const last = finalStep(trace);
                expect(last.kind).toBe('done');
                expect(last.array).toEqual([...input].sort(byNumber));
                expect(last.settled).toHaveLength(input.length);
            }
        });

        it('keeps totals equal to the number of compare and swap steps', () => {
            for (const input of cases) {
                const trace = generateTrace(input, algorithm);
                expect(trace.totalComparisons).toBe(trace.steps.filter(s => s.kind === 'compare').length);
                expect(trace.totalSwaps).toBe(trace.steps.filter(s => s.kind === 'swap').length);
            }
        });

        it('tracks where every element came from', () => {
            const input = createArray({ size: 25, min: 1, max: 6, seed: 3 });
            const trace = generateTrace(input, algorithm);
            for (const step of trace.steps) {
                expect([...step.origins].sort(byNumber)).toEqual(input.map((_, i) => i));
                step.array.forEach((value, k) => expect(value).toBe(input[step.origins[k]]));
            }
        });

        it('emits only a done step for empty and single-element input', () => {
            for (const input of [[], [42]]) {
                const trace = generateTrace(input, algorithm);
                expect(trace.steps).toHaveLength(1);
                expect(trace.steps[0].kind).toBe('done');
                expect(trace.steps[0].array).toEqual(input);
                expect(trace.totalComparisons).toBe(0);
                expect(trace.totalSwaps).toBe(0);
                expect(trace.totalWrites).toBe(0);
            }
        });

        it('is deterministic for the same input and seed', () => {
            const input = createArray({ size: 30, seed: 5 });
            expect(generateTrace(input, algorithm, 9)).toEqual(generateTrace(input, algorithm, 9));
            expect(generateTrace(input, algorithm)).toEqual(generateTrace(input, algorithm));
        });

        it('does not mutate the caller input and freezes the trace', () => {
            const input = [3, 1, 2];
            const trace = generateTrace(input, algorithm);
            expect(input).toEqual([3, 1, 2]);
            expect(Object.isFrozen(trace)).toBe(true);
            expect(Object.isFrozen(trace.steps)).toBe(true);
            expect(Object.isFrozen(trace.steps[0].array)).toBe(true);
        });
    });

    it.each<AlgorithmKey>(['merge', 'insertion'])('%s keeps equal values in input order', algorithm => {
        const input = [2, 1, 2, 1, 2, 3, 1];
        const last = finalStep(generateTrace(input, algorithm));
        expect(last.array).toEqual([1, 1, 1, 2, 2, 2, 3]);
        expect(last.origins).toEqual([1, 3, 6, 0, 2, 4, 5]);
    });

    it('selection sort may reorder equal values', () => {
        const last = finalStep(generateTrace([2, 2, 1], 'selection'));
        expect(last.array).toEqual([1, 2, 2]);
        expect(last.origins).toEqual([2, 1, 0]);
    });

    describe('bubble sort', () => {
        it('records each comparison and swap for [3, 1, 2]', () => {
            const trace = generateTrace([3, 1, 2], 'bubble');
            expect(trace.steps.map(s => s.kind)).toEqual(['compare', 'swap', 'compare', 'swap', 'compare', 'done']);
            expect(trace.steps.map(s => s.indices)).toEqual([[0, 1], [0, 1], [1, 2], [1, 2], [0, 1], []]);
            expect(trace.steps.map(s => s.array)).toEqual([
                [3, 1, 2],
                [1, 3, 2],
                [1, 3, 2],
                [1, 2, 3],
                [1, 2, 3],
                [1, 2, 3],
            ]);
            expect(trace.totalComparisons).toBe(3);
            expect(trace.totalSwaps).toBe(2);
            expect(trace.totalWrites).toBe(4);
        });

        it('counts the comparisons of the final pass without swaps', () => {
            const trace = generateTrace([1, 2, 3, 4], 'bubble');
            expect(trace.totalComparisons).toBe(3);
            expect(trace.totalSwaps).toBe(0);
        });

        it('shrinks each pass on reversed input', () => {
            const trace = generateTrace([4, 3, 2, 1], 'bubble');
            expect(trace.totalComparisons).toBe(6);
            expect(trace.totalSwaps).toBe(6);
        });

        it('settles the tail after each pass', () => {
            const trace = generateTrace([3, 1, 2], 'bubble');
            expect(trace.steps[3].settled).toEqual([]);
            expect(trace.steps[4].settled).toEqual([2]);
            expect(trace.steps[5].settled).toEqual([0, 1, 2]);
        });
    });

    it('selection sort compares against the running minimum', () => {
        const trace = generateTrace([3, 1, 2], 'selection');
        expect(trace.steps.map(s => [s.kind, s.indices])).toEqual([
            ['compare', [0, 1]],
            ['compare', [1, 2]],
            ['swap', [0, 1]],
            ['compare', [1, 2]],
            ['swap', [1, 2]],
            ['done', []],
        ]);
    });

    it('insertion sort stops walking left at the first smaller neighbour', () => {
        const trace = generateTrace([3, 1, 2], 'insertion');
        expect(trace.steps.map(s => [s.kind, s.indices])).toEqual([
            ['compare', [0, 1]],
            ['swap', [0, 1]],
            ['compare', [1, 2]],
            ['swap', [1, 2]],
            ['compare', [0, 1]],
            ['done', []],
        ]);
    });

    describe('merge sort', () => {
        it('compares run heads before writing the merged range back', () => {
            const trace = generateTrace([2, 1], 'merge');
            expect(trace.steps.map(s => s.kind)).toEqual(['compare', 'merge', 'done']);
            expect(trace.steps[0].array).toEqual([2, 1]);
            expect(trace.steps[1].indices).toEqual([0, 1]);
            expect(trace.steps[1].array).toEqual([1, 2]);
            expect(trace.steps[1].origins).toEqual([1, 0]);
            expect(trace.totalComparisons).toBe(1);
            expect(trace.totalSwaps).toBe(0);
            expect(trace.totalWrites).toBe(2);
        });

        it('emits one merge step per merged sub-range', () => {
            const trace = generateTrace([4, 3, 2, 1], 'merge');
            expect(trace.steps.filter(s => s.kind === 'merge').map(s => s.indices)).toEqual([[0, 1], [2, 3], [0, 1, 2, 3]]);
        });
    });

    describe('quick sort', () => {
        it('partitions around the last element without a seed', () => {
            const trace = generateTrace([3, 1, 2], 'quick');
            expect(trace.steps.map(s => [s.kind, s.indices])).toEqual([
                ['partition-pivot', [2]],
                ['compare', [0, 2]],
                ['compare', [1, 2]],
                ['swap', [0, 1]],
                ['swap', [1, 2]],
                ['done', []],
            ]);
            expect(trace.steps[4].array).toEqual([1, 2, 3]);
            expect(trace.totalComparisons).toBe(2);
            expect(trace.totalSwaps).toBe(2);
        });

        it('uses the seed only to pick pivots', () => {
            const input = createArray({ size: 50, seed: 21 });
            const seeded = generateTrace(input, 'quick', 4);
            expect(seeded.seed).toBe(4);
            expect(finalStep(seeded).array).toEqual([...input].sort(byNumber));
            expect(generateTrace(input, 'quick').seed).toBeUndefined();
        });

        it('marks a pivot for every partitioned range', () => {
            const trace = generateTrace([5, 4, 3, 2, 1], 'quick');
            expect(trace.steps.filter(s => s.kind === 'partition-pivot').length).toBeGreaterThan(0);
            for (const step of trace.steps.filter(s => s.kind === 'partition-pivot')) {
                expect(step.indices).toHaveLength(1);
            }
        });
    });

    describe('errors', () => {
        it('rejects unknown algorithms', () => {
            expect(() => generateTrace([1, 2], 'bogo')).toThrow(InvalidAlgorithmError);
            try {
                generateTrace([1, 2], 'heap');
            } catch (e) {
                expect(e).toBeInstanceOf(InvalidAlgorithmError);
                expect(e).toMatchObject({ code: 'InvalidAlgorithm', algorithm: 'heap', name: 'InvalidAlgorithmError' });
            }
        });

        it('rejects elements that cannot be compared', () => {
            expect(() => generateTrace([1, Number.NaN, 2], 'merge')).toThrow(InvalidInputError);
            expect(() => generateTrace([1, Number.NaN, 2], 'merge')).toThrow('Element at index 1 is not a comparable number: NaN.');
        });

        it('rejects holes in sparse arrays', () => {
            const input = new Array<number>(3);
            input[0] = 5;
            input[2] = 1;
            expect(() => generateTrace(input, 'bubble')).toThrow(InvalidInputError);
            expect(() => generateTrace(input, 'bubble')).toThrow('Element at index 1 is not a comparable number: undefined.');
        });

        it('rejects a non-integer seed', () => {
            expect(() => generateTrace([1, 2], 'quick', 1.5)).toThrow(InvalidInputError);
        });
    });

    it('recognises the supported algorithm names', () => {
        expect(ALGORITHM_KEYS.every(isAlgorithmKey)).toBe(true);
        expect(isAlgorithmKey('toString')).toBe(false);
        expect(isAlgorithmKey('Bubble')).toBe(false);
    });
});
