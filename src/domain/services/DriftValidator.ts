import { Scene, getSceneDuration } from '../entities/Scene';
import { roundSeconds } from '../entities/Segment';

export const DEFAULT_DRIFT_THRESHOLD_SECONDS = 1.0;

export interface DriftReport {
    sceneTotalSeconds: number;
    audioDurationSeconds: number | null;
    /** sceneTotal - audio; null when the audio duration is unknown */
    drift: number | null;
    ok: boolean;
    thresholdSeconds: number;
}

/**
 * Compares the summed scene durations with the measured audio length.
 * Always returns a report; callers decide whether to warn or block.
 */
export function validateDrift(
    scenes: readonly Pick<Scene, 'startTime' | 'endTime'>[],
    actualAudioDuration: number | null,
    thresholdSeconds: number = DEFAULT_DRIFT_THRESHOLD_SECONDS
): DriftReport {
    const sceneTotalSeconds = roundSeconds(
        scenes.reduce((sum, scene) => sum + getSceneDuration(scene), 0)
    );

    if (actualAudioDuration === null || !Number.isFinite(actualAudioDuration) || actualAudioDuration < 0) {
        return {
            sceneTotalSeconds,
            audioDurationSeconds: null,
            drift: null,
            ok: false,
            thresholdSeconds,
        };
    }

    const drift = roundSeconds(sceneTotalSeconds - actualAudioDuration);
    return {
        sceneTotalSeconds,
        audioDurationSeconds: actualAudioDuration,
        drift,
        ok: Math.abs(drift) <= thresholdSeconds,
        thresholdSeconds,
    };
}
