import { Segment, roundSeconds } from '../entities/Segment';
import { Scene, createScene } from '../entities/Scene';

/**
 * Maps segmenter output to domain scenes with a dense 1-based order.
 */
export function assembleScenes(segments: readonly Segment[]): Scene[] {
    return segments.map((segment, index) =>
        createScene({
            order: index + 1,
            startTime: segment.start,
            endTime: segment.end,
            narrationText: segment.text,
            estimatedDuration: roundSeconds(segment.end - segment.start),
            audioSynced: segment.timing === 'audio',
        })
    );
}
