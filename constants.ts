import type { AlgorithmKey, VisualizerSettings } from './types';

export const ALGORITHMS: { [key in AlgorithmKey]: { name: string; description: string; complexity: string; stable: boolean } } = {
    bubble: {
        name: 'Bubble Sort',
        description: 'Compares adjacent elements and swaps them if they are in the wrong order. Stops after a pass without swaps.',
        complexity: 'O(n²)',
        stable: true,
    },
    selection: {
        name: 'Selection Sort',
        description: 'Repeatedly finds the minimum element of the unsorted part and swaps it to the front.',
        complexity: 'O(n²)',
        stable: false,
    },
    insertion: {
        name: 'Insertion Sort',
        description: 'Walks each element left past every larger neighbour. Efficient for small or nearly-sorted datasets.',
        complexity: 'O(n²)',
        stable: true,
    },
    merge: {
        name: 'Merge Sort',
        description: 'Divides the array into halves, sorts them, then merges the sorted halves back together.',
        complexity: 'O(n log n)',
        stable: true,
    },
    quick: {
        name: 'Quick Sort',
        description: 'Picks a pivot, partitions the range around it (Lomuto scheme) and sorts both sides.',
        complexity: 'O(n log n) average, O(n²) worst',
        stable: false,
    },
};

export const ALGORITHM_KEYS: readonly AlgorithmKey[] = ['bubble', 'selection', 'insertion', 'merge', 'quick'];

export const LIMITS = {
    minArraySize: 0,
    maxArraySize: 200,
    minDelay: 0,
    maxDelay: 1000,
};

export const VALUE_RANGE = { min: 1, max: 100 };

export const DEFAULT_SETTINGS: VisualizerSettings = {
    algorithm: 'bubble',
    arraySize: 40,
    arrayType: 'random',
    delay: 100,
};
