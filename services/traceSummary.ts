import type { AlgorithmStats, Step, StepKind, Trace } from '../types';
import { ALGORITHMS, ALGORITHM_KEYS } from '../constants';
import { generateTrace } from './sortingService';

export const isSorted = (values: readonly number[]) => values.every((value, i) => i === 0 || values[i - 1] <= value);

export const countSteps = (trace: Trace, kind: StepKind) => trace.steps.filter(step => step.kind === kind).length;

/**
 * One-line narration of a step, for the caption under the bars.
 */
export const describeStep = (step: Step): string => {
    const { array, indices } = step;
    switch (step.kind) {
        case 'compare': {
            const [i, j] = indices;
            return `Compare ${array[i]} (index ${i}) with ${array[j]} (index ${j})`;
        }
        case 'swap': {
            const [i, j] = indices;
            return `Swap indices ${i} and ${j}: now ${array[i]} and ${array[j]}`;
        }
        case 'partition-pivot': {
            const [p] = indices;
            return `Partition around pivot ${array[p]} at index ${p}`;
        }
        case 'merge':
            return indices.length === 0
                ? 'Merge'
                : `Merge indices ${indices[0]}-${indices[indices.length - 1]}: ${indices.map(i => array[i]).join(', ')}`;
        case 'done':
            return `Done: ${array.length} element${array.length === 1 ? '' : 's'} sorted`;
    }
};

export const toStats = (trace: Trace): AlgorithmStats => ({
    algorithm: trace.algorithm,
    name: ALGORITHMS[trace.algorithm].name,
    comparisons: trace.totalComparisons,
    swaps: trace.totalSwaps,
    writes: trace.totalWrites,
    steps: trace.steps.length,
});

/**
 * Runs every algorithm over the same input, in catalogue order.
 */
export const compareAlgorithms = (input: readonly number[], seed?: number): AlgorithmStats[] =>
    ALGORITHM_KEYS.map(key => toStats(generateTrace(input, key, seed)));

/**
 * Cumulative comparison and swap counts after each step, so a renderer can show
 * the counters at any cursor without rescanning the trace.
 */
export const runningCounts = (trace: Trace) => {
    const comparisons: number[] = [];
    const swaps: number[] = [];
    let c = 0;
    let s = 0;
    for (const step of trace.steps) {
        if (step.kind === 'compare') c++;
        if (step.kind === 'swap') s++;
        comparisons.push(c);
        swaps.push(s);
    }
    return { comparisons, swaps };
};
