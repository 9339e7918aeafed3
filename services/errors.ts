export type SortingErrorCode = 'InvalidAlgorithm' | 'InvalidInput';

export class SortingError extends Error {
    readonly code: SortingErrorCode;

    constructor(code: SortingErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

export class InvalidAlgorithmError extends SortingError {
    readonly algorithm: string;

    constructor(algorithm: string) {
        super('InvalidAlgorithm', `Unknown algorithm "${algorithm}". Expected one of: bubble, selection, insertion, merge, quick.`);
        this.algorithm = algorithm;
    }
}

export class InvalidInputError extends SortingError {
    constructor(message: string) {
        super('InvalidInput', message);
    }
}

export const isSortingError = (e: unknown): e is SortingError => e instanceof SortingError;
