import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { SceneSegmentationService } from '../application/SceneSegmentationService';
import { CalibrationService } from '../application/CalibrationService';
import { ITranscriptionClient } from '../domain/ports/ITranscriptionClient';
import { IAudioDurationProbe } from '../domain/ports/IAudioDurationProbe';
import { ICalibrationProfileStore } from '../domain/ports/ICalibrationProfileStore';
import { SegmentationSettings } from '../domain/entities/SegmentationOutcome';

// Infrastructure imports
import { FileCalibrationProfileStore } from '../infrastructure/calibration/FileCalibrationProfileStore';
import { FfprobeAudioDurationProbe } from '../infrastructure/audio/FfprobeAudioDurationProbe';
import {
    GROQ_WHISPER,
    OPENAI_WHISPER,
    WhisperTranscriptionClient,
} from '../infrastructure/transcription/WhisperTranscriptionClient';
import { LocalWhisperServerClient } from '../infrastructure/transcription/LocalWhisperServerClient';

// Route imports
import { createSceneRoutes } from './routes/sceneRoutes';
import { createCalibrationRoutes } from './routes/calibrationRoutes';
import { errorHandler, NotFoundError } from './middleware/errorHandler';

export interface AppDependencies {
    segmentationService: SceneSegmentationService;
    calibrationService: CalibrationService;
}

/**
 * Creates and configures the Express application.
 * Tests pass their own dependencies; production wiring comes from createDependencies.
 */
export function createApp(config: Config, deps: AppDependencies = createDependencies(config)): Application {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json({ limit: '10mb' }));

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            transcriptionBackend: config.transcriptionBackend,
        });
    });

    // Routes
    app.use('/api', createSceneRoutes(deps.segmentationService, config.defaultLanguage));
    app.use('/api', createCalibrationRoutes(deps.calibrationService, config.defaultLanguage));

    app.use((req: Request) => {
        throw new NotFoundError(`No route for ${req.method} ${req.path}`);
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Creates all dependencies with proper wiring.
 */
export function createDependencies(
    config: Config,
    overrides: {
        profileStore?: ICalibrationProfileStore;
        audioProbe?: IAudioDurationProbe | null;
        transcriptionClient?: ITranscriptionClient | null;
    } = {}
): AppDependencies {
    const profileStore = overrides.profileStore ?? new FileCalibrationProfileStore(config.calibrationProfilePath);
    const audioProbe = overrides.audioProbe !== undefined
        ? overrides.audioProbe
        : new FfprobeAudioDurationProbe(config.ffprobePath);
    const transcriptionClient = overrides.transcriptionClient !== undefined
        ? overrides.transcriptionClient
        : createTranscriptionClient(config);

    const calibrationService = new CalibrationService(profileStore, audioProbe);
    const segmentationService = new SceneSegmentationService(
        calibrationService,
        getSegmentationSettings(config),
        transcriptionClient,
        audioProbe
    );

    return { segmentationService, calibrationService };
}

export function getSegmentationSettings(config: Config): SegmentationSettings {
    return {
        maxDuration: config.maxSceneSeconds,
        minDuration: config.minSceneSeconds,
        mergeToleranceSeconds: config.mergeToleranceSeconds,
        breakSearchWindow: config.breakSearchWindow,
        driftThresholdSeconds: config.driftThresholdSeconds,
    };
}

/**
 * Picks the speech-to-text backend named by TRANSCRIPTION_BACKEND.
 * Returns null for 'none'; audio requests then fall back to text estimates.
 */
export function createTranscriptionClient(config: Config): ITranscriptionClient | null {
    const model = config.transcriptionModel || undefined;
    switch (config.transcriptionBackend) {
        case 'openai':
            console.log('🎙️ Using OpenAI Whisper transcription');
            return new WhisperTranscriptionClient(config.openaiApiKey, { provider: OPENAI_WHISPER, model });
        case 'groq':
            console.log('🎙️ Using Groq Whisper transcription');
            return new WhisperTranscriptionClient(config.groqApiKey, { provider: GROQ_WHISPER, model });
        case 'local':
            console.log(`🎙️ Using local Whisper server at ${config.localWhisperUrl}`);
            return new LocalWhisperServerClient(config.localWhisperUrl, { model });
        case 'none':
            console.log('🎙️ No transcription backend; audio requests use text estimates');
            return null;
    }
}
