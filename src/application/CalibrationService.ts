import { ICalibrationProfileStore } from '../domain/ports/ICalibrationProfileStore';
import { IAudioDurationProbe } from '../domain/ports/IAudioDurationProbe';
import { CalibrationProfile, createDefaultProfile, describeProfile } from '../domain/entities/CalibrationProfile';
import { Language } from '../domain/entities/Language';
import { Scene } from '../domain/entities/Scene';
import { calibrateFromScenes } from '../domain/services/Calibrator';

export const DEFAULT_PROFILE_KEY = 'default';

export interface ProfileLookup {
    profile: CalibrationProfile;
    source: 'stored' | 'default';
}

export interface RecalibrationRequest {
    key: string;
    language: Language;
    /** Narration audio the scenes were timed against */
    audioPath: string;
    scenes: Scene[];
    voiceType?: string;
    speakingRate?: number;
}

export interface RecalibrationResult {
    profile: CalibrationProfile;
    updated: boolean;
    reason?: 'audio-unavailable' | 'no-samples';
    message?: string;
}

/**
 * Loads speaking-rate profiles and rebuilds them from scenes with real audio timing.
 */
export class CalibrationService {
    constructor(
        private readonly store: ICalibrationProfileStore,
        private readonly audioProbe: IAudioDurationProbe | null = null
    ) { }

    async loadProfile(key: string, language: Language): Promise<ProfileLookup> {
        const stored = await this.store.load(key, language);
        if (stored) {
            return { profile: stored, source: 'stored' };
        }
        return { profile: createDefaultProfile(language), source: 'default' };
    }

    /**
     * Replaces the stored profile under `key` with one computed from the given scenes.
     * The previous profile is kept when the audio cannot be checked or yields no samples.
     */
    async recalibrate(request: RecalibrationRequest): Promise<RecalibrationResult> {
        const previous = await this.loadProfile(request.key, request.language);

        const audioDuration = this.audioProbe
            ? await this.audioProbe.getDurationSeconds(request.audioPath)
            : null;
        if (audioDuration === null) {
            const message = this.audioProbe
                ? `Audio not readable: ${request.audioPath}`
                : 'No audio probe configured';
            console.warn(`[Calibration] Skipping recalibration of '${request.key}': ${message}`);
            return { profile: previous.profile, updated: false, reason: 'audio-unavailable', message };
        }

        const computation = calibrateFromScenes(request.scenes, request.language, {
            audioDurationSeconds: audioDuration,
            voiceType: request.voiceType,
            speakingRate: request.speakingRate,
        });

        if (computation.status === 'insufficient-data') {
            console.warn(`[Calibration] Skipping recalibration of '${request.key}': ${computation.reason}`);
            return {
                profile: previous.profile,
                updated: false,
                reason: 'no-samples',
                message: computation.reason,
            };
        }

        await this.store.save(computation.profile, request.key);
        console.log(
            `[Calibration] Profile '${request.key}' recalibrated from ${computation.ratios.length} samples ` +
            `(trimmed ${computation.trimmedPerSide} per side): ${describeProfile(computation.profile)}`
        );
        return { profile: computation.profile, updated: true };
    }
}
