import { Scene, createScene } from '../entities/Scene';
import { CalibrationProfile } from '../entities/CalibrationProfile';
import { DurationConstraints } from '../entities/DurationConstraints';
import { roundSeconds } from '../entities/Segment';
import { estimateDuration, measureText } from './RateEstimator';
import { segmentText } from './TextSegmenter';
import { assembleScenes } from './SceneAssembler';

export interface SceneStats {
    totalScenes: number;
    totalDuration: number;
    averageDuration: number;
    minDuration: number;
    maxDuration: number;
    totalWords: number;
}

/**
 * Merges two consecutive scenes when the result still fits under `maxDuration`.
 * Returns null when it would not.
 */
export function mergeScenes(
    first: Scene,
    second: Scene,
    profile: CalibrationProfile,
    maxDuration: number
): Scene | null {
    const narrationText = `${first.narrationText} ${second.narrationText}`;
    const audioSynced = first.audioSynced && second.audioSynced;
    const duration = audioSynced
        ? roundSeconds(second.endTime - first.startTime)
        : estimateDuration(narrationText, profile);

    if (duration > maxDuration) {
        return null;
    }

    return createScene({
        order: first.order,
        startTime: first.startTime,
        endTime: audioSynced ? second.endTime : roundSeconds(first.startTime + duration),
        narrationText,
        estimatedDuration: duration,
        audioSynced,
    });
}

/**
 * Re-splits a scene that is too long. Pieces keep the scene's start as their origin
 * and carry estimated timing; renumber the full list afterwards.
 */
export function resplitScene(
    scene: Scene,
    profile: CalibrationProfile,
    constraints: DurationConstraints
): Scene[] {
    if (scene.estimatedDuration <= constraints.maxDuration) {
        return [scene];
    }

    return assembleScenes(segmentText(scene.narrationText, profile, constraints)).map((piece, index) => ({
        ...piece,
        order: scene.order + index,
        startTime: roundSeconds(scene.startTime + piece.startTime),
        endTime: roundSeconds(scene.startTime + piece.endTime),
    }));
}

/**
 * Restores a dense 1-based order after scenes were merged or split.
 */
export function renumberScenes(scenes: readonly Scene[]): Scene[] {
    return scenes.map((scene, index) => ({ ...scene, order: index + 1 }));
}

export function summarizeScenes(scenes: readonly Scene[]): SceneStats {
    if (scenes.length === 0) {
        return {
            totalScenes: 0,
            totalDuration: 0,
            averageDuration: 0,
            minDuration: 0,
            maxDuration: 0,
            totalWords: 0,
        };
    }

    const durations = scenes.map((s) => s.estimatedDuration);
    const totalDuration = roundSeconds(durations.reduce((sum, d) => sum + d, 0));

    return {
        totalScenes: scenes.length,
        totalDuration,
        averageDuration: roundSeconds(totalDuration / scenes.length, 1),
        minDuration: Math.min(...durations),
        maxDuration: Math.max(...durations),
        totalWords: scenes.reduce((sum, s) => sum + measureText(s.narrationText, 'en'), 0),
    };
}
