export type AlgorithmKey = 'bubble' | 'selection' | 'insertion' | 'merge' | 'quick';

export type StepKind = 'compare' | 'swap' | 'partition-pivot' | 'merge' | 'done';

export interface Step {
    kind: StepKind;
    indices: readonly number[];
    array: readonly number[];
    // origins[k] is the input position of the element now at k
    origins: readonly number[];
    settled: readonly number[];
}

export interface Trace {
    algorithm: AlgorithmKey;
    input: readonly number[];
    seed?: number;
    steps: readonly Step[];
    totalComparisons: number;
    totalSwaps: number;
    totalWrites: number;
}

export type PlaybackStatus = 'idle' | 'ready' | 'playing' | 'paused' | 'finished';

export interface PlaybackState {
    status: PlaybackStatus;
    cursor: number;
    length: number;
    delayMs: number;
}

export type ArrayType = 'random' | 'nearlySorted' | 'reversed';

export interface ArrayRequest {
    size: number;
    type?: ArrayType;
    min?: number;
    max?: number;
    seed?: number;
}

export interface VisualizerSettings {
    algorithm: AlgorithmKey;
    arraySize: number;
    arrayType: ArrayType;
    delay: number;
    seed?: number;
}

export type SettingsErrors = Record<'arraySize' | 'delay' | 'seed', string>;

export interface AlgorithmStats {
    algorithm: AlgorithmKey;
    name: string;
    comparisons: number;
    swaps: number;
    writes: number;
    steps: number;
}

export type ViewMode = 'visualize' | 'compare';
