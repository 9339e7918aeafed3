import type { AlgorithmKey, Step, StepKind, Trace } from '../types';
import { ALGORITHM_KEYS } from '../constants';
import { InvalidAlgorithmError, InvalidInputError } from './errors';
import { mulberry32, randomInt, type RandomSource } from './random';

/**
 * Records steps while a sort routine works on its private copy of the input.
 * Every step carries a frozen snapshot of the array taken right after the action.
 */
export interface TraceRecorder {
    readonly size: number;
    /** Records a comparison of the values at `i` and `j`; returns -1, 0 or 1 like a comparator. */
    compare(i: number, j: number): number;
    swap(i: number, j: number): void;
    pivot(index: number): void;
    /** Writes the elements currently at `order` (in that order) back to `start..start + order.length - 1`. */
    writeBack(start: number, order: readonly number[]): void;
    settle(index: number): void;
}

type SortRoutine = (recorder: TraceRecorder, random?: RandomSource) => void;

const range = (start: number, end: number) => Array.from({ length: Math.max(0, end - start) }, (_, i) => start + i);

const createRecorder = (input: readonly number[]) => {
    const arr = [...input];
    const origins = range(0, input.length);
    const settled = new Set<number>();
    const steps: Step[] = [];
    const stats = { comparisons: 0, swaps: 0, writes: 0 };

    const record = (kind: StepKind, indices: readonly number[]) => {
        steps.push(Object.freeze({
            kind,
            indices: Object.freeze([...indices]),
            array: Object.freeze([...arr]),
            origins: Object.freeze([...origins]),
            settled: Object.freeze([...settled].sort((a, b) => a - b)),
        }));
    };

    const exchange = (i: number, j: number) => {
        [arr[i], arr[j]] = [arr[j], arr[i]];
        [origins[i], origins[j]] = [origins[j], origins[i]];
    };

    const recorder: TraceRecorder = {
        size: arr.length,
        compare(i, j) {
            stats.comparisons++;
            record('compare', [i, j]);
            if (arr[i] < arr[j]) return -1;
            return arr[i] > arr[j] ? 1 : 0;
        },
        swap(i, j) {
            exchange(i, j);
            stats.swaps++;
            stats.writes += 2;
            record('swap', [i, j]);
        },
        pivot(index) {
            record('partition-pivot', [index]);
        },
        writeBack(start, order) {
            const values = order.map(k => arr[k]);
            const sources = order.map(k => origins[k]);
            values.forEach((value, offset) => {
                arr[start + offset] = value;
                origins[start + offset] = sources[offset];
            });
            stats.writes += order.length;
            record('merge', range(start, start + order.length));
        },
        settle(index) {
            settled.add(index);
        },
    };

    const finish = () => {
        range(0, arr.length).forEach(i => settled.add(i));
        record('done', []);
        return { steps, stats };
    };

    return { recorder, finish };
};

// Passes stop after the first pass without an exchange; that pass's comparisons still count.
const bubbleSort: SortRoutine = rec => {
    const n = rec.size;
    for (let pass = 0; pass < n - 1; pass++) {
        let swapped = false;
        for (let j = 0; j < n - pass - 1; j++) {
            if (rec.compare(j, j + 1) > 0) {
                rec.swap(j, j + 1);
                swapped = true;
            }
        }
        rec.settle(n - pass - 1);
        if (!swapped) break;
    }
};

const selectionSort: SortRoutine = rec => {
    const n = rec.size;
    for (let i = 0; i < n - 1; i++) {
        let minIdx = i;
        for (let j = i + 1; j < n; j++) {
            if (rec.compare(minIdx, j) > 0) {
                minIdx = j;
            }
        }
        if (minIdx !== i) {
            rec.swap(i, minIdx);
        }
        rec.settle(i);
    }
};

const insertionSort: SortRoutine = rec => {
    for (let i = 1; i < rec.size; i++) {
        for (let j = i; j > 0; j--) {
            if (rec.compare(j - 1, j) <= 0) break;
            rec.swap(j - 1, j);
        }
    }
};

const mergeSort: SortRoutine = rec => {
    // Runs [lo, mid) and [mid, hi) stay in place until the merged order is written back.
    const merge = (lo: number, mid: number, hi: number) => {
        const order: number[] = [];
        let i = lo;
        let j = mid;
        while (i < mid && j < hi) {
            if (rec.compare(i, j) <= 0) {
                order.push(i++);
            } else {
                order.push(j++);
            }
        }
        while (i < mid) order.push(i++);
        while (j < hi) order.push(j++);
        rec.writeBack(lo, order);
    };
    const sort = (lo: number, hi: number) => {
        if (hi - lo <= 1) return;
        const mid = Math.floor((lo + hi) / 2);
        sort(lo, mid);
        sort(mid, hi);
        merge(lo, mid, hi);
    };
    sort(0, rec.size);
};

/**
 * Lomuto partitioning from an explicit stack, left part first.
 * The pivot is the last element of the range, or a seeded random element moved there first.
 */
const quickSort: SortRoutine = (rec, random) => {
    const stack: Array<[number, number]> = [[0, rec.size - 1]];
    let next = stack.pop();
    while (next) {
        const [low, high] = next;
        if (low === high) {
            rec.settle(low);
        } else if (low < high) {
            if (random) {
                const chosen = randomInt(random, low, high);
                if (chosen !== high) rec.swap(chosen, high);
            }
            rec.pivot(high);
            let i = low;
            for (let j = low; j < high; j++) {
                if (rec.compare(j, high) < 0) {
                    if (i !== j) rec.swap(i, j);
                    i++;
                }
            }
            if (i !== high) rec.swap(i, high);
            rec.settle(i);
            stack.push([i + 1, high], [low, i - 1]);
        }
        next = stack.pop();
    }
};

const SORT_ROUTINES: Record<AlgorithmKey, SortRoutine> = {
    bubble: bubbleSort,
    selection: selectionSort,
    insertion: insertionSort,
    merge: mergeSort,
    quick: quickSort,
};

export const isAlgorithmKey = (value: string): value is AlgorithmKey => ALGORITHM_KEYS.some(key => key === value);

const validateSequence = (sequence: readonly number[]) => {
    if (!Array.isArray(sequence)) {
        throw new InvalidInputError('Input must be an array of numbers.');
    }
    // Indexed, not forEach: holes must be visited.
    for (let index = 0; index < sequence.length; index++) {
        const value: unknown = sequence[index];
        if (typeof value !== 'number' || Number.isNaN(value)) {
            throw new InvalidInputError(`Element at index ${index} is not a comparable number: ${String(value)}.`);
        }
    }
};

/**
 * Runs `algorithm` over a copy of `sequence` and returns the complete, frozen trace.
 * `seed` only affects quick sort, where it switches pivot selection to a seeded random choice.
 */
export function generateTrace(sequence: readonly number[], algorithm: string, seed?: number): Trace {
    if (!isAlgorithmKey(algorithm)) {
        throw new InvalidAlgorithmError(algorithm);
    }
    validateSequence(sequence);
    if (seed !== undefined && !Number.isInteger(seed)) {
        throw new InvalidInputError(`Seed must be an integer, got ${seed}.`);
    }

    const { recorder, finish } = createRecorder(sequence);
    if (recorder.size > 1) {
        SORT_ROUTINES[algorithm](recorder, seed === undefined ? undefined : mulberry32(seed));
    }
    const { steps, stats } = finish();

    return Object.freeze({
        algorithm,
        input: Object.freeze([...sequence]),
        ...(seed === undefined ? {} : { seed }),
        steps: Object.freeze(steps),
        totalComparisons: stats.comparisons,
        totalSwaps: stats.swaps,
        totalWrites: stats.writes,
    });
}
