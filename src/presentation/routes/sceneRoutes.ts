import { Router, Request, Response } from 'express';
import { SceneSegmentationService, SegmentationRequest } from '../../application/SceneSegmentationService';
import { Language } from '../../domain/entities/Language';
import { TranscriptionResult } from '../../domain/entities/TranscriptionResult';
import { parseTranscriptionPayload } from '../../infrastructure/transcription/TranscriptionPayloadParser';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';
import {
    parseBody,
    validateAudioScenesBody,
    validateDriftBody,
    validateTextScenesBody,
    validateTranscriptScenesBody,
} from '../validation/requestSchemas';

interface SegmentationFields {
    language?: Language;
    maxDuration?: number;
    minDuration?: number;
    profileKey?: string;
    narration?: string;
}

/**
 * Creates scene segmentation routes with dependency injection.
 */
export function createSceneRoutes(
    segmentationService: SceneSegmentationService,
    defaultLanguage: Language
): Router {
    const router = Router();

    const toRequest = (body: SegmentationFields): SegmentationRequest => ({
        language: body.language ?? defaultLanguage,
        narration: body.narration,
        constraints: { maxDuration: body.maxDuration, minDuration: body.minDuration },
        profileKey: body.profileKey,
    });

    /**
     * POST /scenes/text
     *
     * Splits narration text into scenes with estimated timing.
     */
    router.post(
        '/scenes/text',
        asyncHandler(async (req: Request, res: Response) => {
            const body = parseBody(validateTextScenesBody, req.body);
            const outcome = await segmentationService.splitNarration({
                ...toRequest(body),
                narration: body.narration,
            });
            res.json(outcome);
        })
    );

    /**
     * POST /scenes/transcript
     *
     * Splits an existing speech-to-text response into scenes on its real timing.
     */
    router.post(
        '/scenes/transcript',
        asyncHandler(async (req: Request, res: Response) => {
            const body = parseBody(validateTranscriptScenesBody, req.body);
            const request = toRequest(body);

            let transcription: TranscriptionResult;
            try {
                transcription = parseTranscriptionPayload(body.transcription, request.language);
            } catch (error) {
                throw new BadRequestError(error instanceof Error ? error.message : String(error));
            }

            res.json(await segmentationService.splitTranscription(transcription, request));
        })
    );

    /**
     * POST /scenes/audio
     *
     * Transcribes a narration audio file, then splits it on the transcription's timing.
     */
    router.post(
        '/scenes/audio',
        asyncHandler(async (req: Request, res: Response) => {
            const body = parseBody(validateAudioScenesBody, req.body);
            const outcome = await segmentationService.splitAudio(body.audioPath, {
                ...toRequest(body),
                transcriptionPrompt: body.transcriptionPrompt,
            });
            res.json(outcome);
        })
    );

    /**
     * POST /scenes/drift
     *
     * Reports how far the scene total is from the narration audio's length.
     */
    router.post(
        '/scenes/drift',
        asyncHandler(async (req: Request, res: Response) => {
            const body = parseBody(validateDriftBody, req.body);
            const report = body.audioDurationSeconds !== undefined
                ? segmentationService.measureDrift(body.scenes, body.audioDurationSeconds)
                : await segmentationService.checkAudioSync(body.scenes, body.audioPath ?? '');
            res.json(report);
        })
    );

    return router;
}
