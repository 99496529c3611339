import { Language, getLanguageRules } from '../entities/Language';
import { Scene } from '../entities/Scene';
import {
    CalibrationProfile,
    clampRate,
    createDefaultProfile,
} from '../entities/CalibrationProfile';
import { roundSeconds } from '../entities/Segment';
import { measureText } from './RateEstimator';

export interface CalibrationOptions {
    /** Scenes ending after this time are not backed by the audio being calibrated against */
    audioDurationSeconds?: number;
    voiceType?: string;
    speakingRate?: number;
    now?: Date;
}

export type CalibrationComputation =
    | {
        status: 'calibrated';
        profile: CalibrationProfile;
        /** All ratios, ascending */
        ratios: number[];
        /** Ratios removed from each end before averaging */
        trimmedPerSide: number;
        /** Trimmed mean before clamping */
        rawRate: number;
    }
    | { status: 'insufficient-data'; reason: string };

/** Slack for scene end times that overrun the measured audio slightly. */
const AUDIO_END_TOLERANCE_SECONDS = 0.5;

/**
 * Averages the sorted samples after dropping the top and bottom 10%.
 * At least one sample is trimmed from each end, but only when more than
 * twice that many samples exist.
 */
export function trimmedMean(sortedSamples: readonly number[]): { mean: number; trimmedPerSide: number } {
    const trim = Math.max(1, Math.floor(sortedSamples.length / 10));
    const applied = sortedSamples.length > trim * 2 ? trim : 0;
    const kept = sortedSamples.slice(applied, sortedSamples.length - applied);
    const mean = kept.reduce((sum, r) => sum + r, 0) / kept.length;
    return { mean, trimmedPerSide: applied };
}

/**
 * Speaking-rate ratios (text measure per second) of every scene with real audio timing.
 */
export function collectRateSamples(
    scenes: readonly Scene[],
    language: Language,
    audioDurationSeconds?: number
): number[] {
    const ratios: number[] = [];
    for (const scene of scenes) {
        if (!scene.audioSynced) {
            continue;
        }
        const duration = scene.endTime - scene.startTime;
        if (!(duration > 0)) {
            continue;
        }
        if (audioDurationSeconds !== undefined && scene.endTime > audioDurationSeconds + AUDIO_END_TOLERANCE_SECONDS) {
            continue;
        }
        const measure = measureText(scene.narrationText, language);
        if (measure > 0) {
            ratios.push(measure / duration);
        }
    }
    return ratios.sort((a, b) => a - b);
}

/**
 * Batch recalibration: derives a fresh profile from scenes with real timing.
 * Never updates incrementally; the result replaces a stored profile wholesale.
 */
export function calibrateFromScenes(
    scenes: readonly Scene[],
    language: Language,
    options: CalibrationOptions = {}
): CalibrationComputation {
    if (!scenes.some((s) => s.audioSynced && s.endTime > s.startTime)) {
        return { status: 'insufficient-data', reason: 'No scenes with audio timing available for calibration' };
    }

    const ratios = collectRateSamples(scenes, language, options.audioDurationSeconds);
    if (ratios.length === 0) {
        return { status: 'insufficient-data', reason: 'Could not compute any rate samples from scene timing' };
    }

    const { mean, trimmedPerSide } = trimmedMean(ratios);
    const rate = roundSeconds(clampRate(mean, language));
    const base = createDefaultProfile(language, options.now);
    const measuresCharacters = getLanguageRules(language).measure === 'characters';

    return {
        status: 'calibrated',
        profile: {
            ...base,
            charsPerSecond: measuresCharacters ? rate : base.charsPerSecond,
            wordsPerSecond: measuresCharacters ? base.wordsPerSecond : rate,
            sampleCount: ratios.length,
            voiceType: options.voiceType ?? base.voiceType,
            speakingRate: options.speakingRate ?? base.speakingRate,
        },
        ratios,
        trimmedPerSide,
        rawRate: mean,
    };
}
