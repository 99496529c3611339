/**
 * Scene is a bounded-duration unit of narration handed to downstream prompt generation.
 */
export interface Scene {
    /** 1-based, dense position of the scene in the narration */
    order: number;
    /** Start time in seconds from the beginning of the narration audio */
    startTime: number;
    /** End time in seconds */
    endTime: number;
    /** The narration spoken during this scene */
    narrationText: string;
    /** Duration in seconds: measured when audio-synced, estimated from text otherwise */
    estimatedDuration: number;
    /** True when startTime/endTime come from real audio timing */
    audioSynced: boolean;
}

/**
 * Creates a new Scene with validated properties.
 */
export function createScene(params: {
    order: number;
    startTime: number;
    endTime: number;
    narrationText: string;
    estimatedDuration?: number;
    audioSynced?: boolean;
}): Scene {
    if (!Number.isInteger(params.order) || params.order < 1) {
        throw new Error('Scene order must be a positive integer');
    }
    if (params.startTime < 0) {
        throw new Error('Scene startTime must be non-negative');
    }
    if (params.endTime < params.startTime) {
        throw new Error('Scene endTime must not be before startTime');
    }
    const narrationText = params.narrationText.replace(/\s+/g, ' ').trim();
    if (!narrationText) {
        throw new Error('Scene narrationText cannot be empty');
    }

    return {
        order: params.order,
        startTime: params.startTime,
        endTime: params.endTime,
        narrationText,
        estimatedDuration: params.estimatedDuration
            ?? Math.round((params.endTime - params.startTime) * 100) / 100,
        audioSynced: params.audioSynced ?? false,
    };
}

/**
 * Calculates the duration of a scene in seconds.
 */
export function getSceneDuration(scene: Pick<Scene, 'startTime' | 'endTime'>): number {
    return scene.endTime - scene.startTime;
}

/**
 * Formats the scene's time span as "m:ss.s - m:ss.s".
 */
export function formatTimeRange(scene: Scene): string {
    const fmt = (t: number): string => {
        const mins = Math.floor(t / 60);
        const secs = (t % 60).toFixed(1).padStart(4, '0');
        return `${mins}:${secs}`;
    };
    return `${fmt(scene.startTime)} - ${fmt(scene.endTime)}`;
}
