/**
 * Request-scoped duration bounds for a scene.
 */
export interface DurationConstraints {
    /** Hard ceiling in seconds */
    maxDuration: number;
    /** Soft floor in seconds; the segmenter starts looking for break points past it */
    minDuration: number;
}

/**
 * Thrown when requested duration bounds cannot be satisfied.
 */
export class ConstraintViolationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConstraintViolationError';
    }
}

export const DEFAULT_MAX_DURATION = 8.0;
export const DEFAULT_MIN_DURATION = 7.0;

/**
 * Creates validated constraints, filling in the defaults.
 */
export function createDurationConstraints(params: Partial<DurationConstraints> = {}): DurationConstraints {
    const maxDuration = params.maxDuration ?? DEFAULT_MAX_DURATION;
    const minDuration = params.minDuration ?? Math.min(DEFAULT_MIN_DURATION, maxDuration * 0.875);

    if (!Number.isFinite(maxDuration) || maxDuration <= 0) {
        throw new ConstraintViolationError('maxDuration must be a positive number');
    }
    if (!Number.isFinite(minDuration) || minDuration <= 0) {
        throw new ConstraintViolationError('minDuration must be a positive number');
    }
    if (minDuration >= maxDuration) {
        throw new ConstraintViolationError('minDuration must be less than maxDuration');
    }

    return { maxDuration, minDuration };
}
