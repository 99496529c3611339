import { Scene } from './Scene';
import { CalibrationProfile } from './CalibrationProfile';

/**
 * Service-wide segmentation tuning, loaded from configuration.
 */
export interface SegmentationSettings {
    maxDuration: number;
    minDuration: number;
    mergeToleranceSeconds: number;
    breakSearchWindow: number;
    driftThresholdSeconds: number;
}

export type SegmentationWarningCode =
    | 'oversized-segment'
    | 'forced-cut'
    | 'fallback-to-text'
    | 'transcription-unavailable'
    | 'default-profile';

export interface SegmentationWarning {
    code: SegmentationWarningCode;
    message: string;
    /** Scene the warning is about, for per-scene warnings */
    sceneOrder?: number;
}

/** 'timestamp' when scene boundaries come from real audio timing, 'text' when estimated. */
export type SegmentationMode = 'text' | 'timestamp';

export interface SegmentationOutcome {
    mode: SegmentationMode;
    scenes: Scene[];
    warnings: SegmentationWarning[];
    /** Profile the estimates were computed with (text mode only) */
    profile?: CalibrationProfile;
}
