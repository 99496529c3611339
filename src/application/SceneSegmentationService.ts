import { ITranscriptionClient } from '../domain/ports/ITranscriptionClient';
import { IAudioDurationProbe } from '../domain/ports/IAudioDurationProbe';
import { Language } from '../domain/entities/Language';
import { Scene } from '../domain/entities/Scene';
import { Segment, getSegmentDuration, roundSeconds } from '../domain/entities/Segment';
import { TranscriptionResult } from '../domain/entities/TranscriptionResult';
import { DurationConstraints, createDurationConstraints } from '../domain/entities/DurationConstraints';
import {
    SegmentationOutcome,
    SegmentationSettings,
    SegmentationWarning,
} from '../domain/entities/SegmentationOutcome';
import { TokenStreamNormalizer } from '../domain/services/TokenStreamNormalizer';
import { segmentTokens } from '../domain/services/TimestampSegmenter';
import { segmentText } from '../domain/services/TextSegmenter';
import { assembleScenes } from '../domain/services/SceneAssembler';
import { DriftReport, validateDrift } from '../domain/services/DriftValidator';
import { CalibrationService, DEFAULT_PROFILE_KEY } from './CalibrationService';

export interface SegmentationRequest {
    language: Language;
    /** Narration text; the source in text mode and the fallback when timing is missing */
    narration?: string;
    /** Per-request overrides of the configured duration bounds */
    constraints?: Partial<DurationConstraints>;
    /** Calibration profile used for text-mode estimates */
    profileKey?: string;
}

export interface NarrationRequest extends SegmentationRequest {
    narration: string;
}

export interface AudioSegmentationRequest extends SegmentationRequest {
    /** Vocabulary hint handed to the transcription backend */
    transcriptionPrompt?: string;
}

/**
 * Turns narration text, a transcription or an audio file into duration-bounded scenes.
 *
 * Real audio timing is preferred; whenever it is missing the service falls back to
 * estimating from text with the calibrated speaking rate and says so in the warnings.
 */
export class SceneSegmentationService {
    private readonly normalizer = new TokenStreamNormalizer();

    constructor(
        private readonly calibrationService: CalibrationService,
        private readonly settings: SegmentationSettings,
        private readonly transcriptionClient: ITranscriptionClient | null = null,
        private readonly audioProbe: IAudioDurationProbe | null = null
    ) { }

    async splitNarration(request: NarrationRequest): Promise<SegmentationOutcome> {
        const constraints = this.resolveConstraints(request.constraints);
        return this.estimateFromText(request.narration, request, constraints, []);
    }

    async splitTranscription(
        result: TranscriptionResult,
        request: SegmentationRequest
    ): Promise<SegmentationOutcome> {
        const constraints = this.resolveConstraints(request.constraints);
        const tokens = this.normalizer.normalize(result);

        if (tokens.length === 0) {
            return this.fallBackToText(request, constraints, {
                code: 'fallback-to-text',
                message: 'Transcription contained no usable timing; scene timing estimated from text',
            });
        }

        const segments = segmentTokens(tokens, constraints, {
            language: request.language,
            mergeToleranceSeconds: this.settings.mergeToleranceSeconds,
            breakSearchWindow: this.settings.breakSearchWindow,
        });
        const scenes = assembleScenes(segments);
        console.log(`[Segmenter] ${tokens.length} tokens -> ${scenes.length} scenes (max ${constraints.maxDuration}s)`);

        return {
            mode: 'timestamp',
            scenes,
            warnings: collectSegmentWarnings(segments, constraints),
        };
    }

    async splitAudio(audioPath: string, request: AudioSegmentationRequest): Promise<SegmentationOutcome> {
        const constraints = this.resolveConstraints(request.constraints);

        if (!this.transcriptionClient) {
            return this.fallBackToText(request, constraints, {
                code: 'transcription-unavailable',
                message: 'No transcription backend configured; scene timing estimated from text',
            });
        }

        let result: TranscriptionResult;
        try {
            result = await this.transcriptionClient.transcribe(audioPath, {
                language: request.language,
                prompt: request.transcriptionPrompt,
            });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.warn(`[Segmenter] Transcription unavailable for ${audioPath}: ${message}`);
            return this.fallBackToText(request, constraints, {
                code: 'transcription-unavailable',
                message: `${message}; scene timing estimated from text`,
            });
        }

        return this.splitTranscription(result, { ...request, constraints });
    }

    /**
     * Compares the scenes' total length with the audio file's real duration.
     */
    async checkAudioSync(scenes: readonly Pick<Scene, 'startTime' | 'endTime'>[], audioPath: string): Promise<DriftReport> {
        const audioDuration = this.audioProbe
            ? await this.audioProbe.getDurationSeconds(audioPath)
            : null;
        if (audioDuration === null) {
            console.warn(`[Segmenter] Audio duration unknown for ${audioPath}; drift not checked`);
        }
        return this.measureDrift(scenes, audioDuration);
    }

    /**
     * Drift against an already known audio duration.
     */
    measureDrift(scenes: readonly Pick<Scene, 'startTime' | 'endTime'>[], audioDurationSeconds: number | null): DriftReport {
        const report = validateDrift(scenes, audioDurationSeconds, this.settings.driftThresholdSeconds);
        if (report.drift !== null && !report.ok) {
            console.warn(`[Segmenter] Scene total ${report.sceneTotalSeconds}s drifts ${report.drift}s from audio (${report.audioDurationSeconds}s)`);
        }
        return report;
    }

    private resolveConstraints(overrides: Partial<DurationConstraints> = {}): DurationConstraints {
        if (overrides.maxDuration === undefined) {
            return createDurationConstraints({
                maxDuration: this.settings.maxDuration,
                minDuration: overrides.minDuration ?? this.settings.minDuration,
            });
        }
        return createDurationConstraints(overrides);
    }

    private async fallBackToText(
        request: SegmentationRequest,
        constraints: DurationConstraints,
        warning: SegmentationWarning
    ): Promise<SegmentationOutcome> {
        const narration = request.narration?.trim() ?? '';
        if (!narration) {
            console.warn(`[Segmenter] ${warning.message}; no narration text to fall back on`);
            return { mode: 'text', scenes: [], warnings: [warning] };
        }
        console.warn(`[Segmenter] ${warning.message}`);
        return this.estimateFromText(narration, request, constraints, [warning]);
    }

    private async estimateFromText(
        narration: string,
        request: SegmentationRequest,
        constraints: DurationConstraints,
        warnings: SegmentationWarning[]
    ): Promise<SegmentationOutcome> {
        const key = request.profileKey || DEFAULT_PROFILE_KEY;
        const { profile, source } = await this.calibrationService.loadProfile(key, request.language);

        const profileWarnings: SegmentationWarning[] = source === 'default'
            ? [{ code: 'default-profile', message: `No calibration profile '${key}' for '${request.language}'; using default speaking rate` }]
            : [];

        const segments = segmentText(narration, profile, constraints);
        const scenes = assembleScenes(segments);
        console.log(`[Segmenter] Estimated ${scenes.length} scenes from text (profile '${key}', ${source})`);

        return {
            mode: 'text',
            scenes,
            warnings: [...warnings, ...profileWarnings, ...collectSegmentWarnings(segments, constraints)],
            profile,
        };
    }
}

function collectSegmentWarnings(segments: readonly Segment[], constraints: DurationConstraints): SegmentationWarning[] {
    return segments.flatMap((segment, index) => {
        const sceneOrder = index + 1;
        const warnings: SegmentationWarning[] = [];
        if (segment.oversized) {
            const duration = roundSeconds(getSegmentDuration(segment));
            warnings.push({
                code: 'oversized-segment',
                message: `Scene ${sceneOrder} runs ${duration}s, over the ${constraints.maxDuration}s ceiling`,
                sceneOrder,
            });
        }
        if (segment.cutReason === 'forced') {
            warnings.push({
                code: 'forced-cut',
                message: `Scene ${sceneOrder} was cut without a natural break`,
                sceneOrder,
            });
        }
        return warnings;
    });
}
