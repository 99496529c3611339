import { Router, Request, Response } from 'express';
import { CalibrationService } from '../../application/CalibrationService';
import { Language, isLanguage } from '../../domain/entities/Language';
import { Scene, createScene } from '../../domain/entities/Scene';
import { describeProfile } from '../../domain/entities/CalibrationProfile';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';
import { SceneInput, parseBody, validateCalibrationBody } from '../validation/requestSchemas';

/**
 * Creates calibration profile routes with dependency injection.
 */
export function createCalibrationRoutes(
    calibrationService: CalibrationService,
    defaultLanguage: Language
): Router {
    const router = Router();

    /**
     * GET /calibration/:key?language=th
     *
     * Returns the stored profile, or the default one when none is stored.
     */
    router.get(
        '/calibration/:key',
        asyncHandler(async (req: Request, res: Response) => {
            const language = parseLanguageQuery(req.query.language, defaultLanguage);
            const { profile, source } = await calibrationService.loadProfile(req.params.key, language);
            res.json({ key: req.params.key, source, profile, summary: describeProfile(profile) });
        })
    );

    /**
     * POST /calibration/:key
     *
     * Recalibrates the profile from scenes timed against the given audio.
     */
    router.post(
        '/calibration/:key',
        asyncHandler(async (req: Request, res: Response) => {
            const body = parseBody(validateCalibrationBody, req.body);
            const result = await calibrationService.recalibrate({
                key: req.params.key,
                language: body.language ?? defaultLanguage,
                audioPath: body.audioPath,
                scenes: toScenes(body.scenes),
                voiceType: body.voiceType,
                speakingRate: body.speakingRate,
            });
            res.json({ key: req.params.key, ...result, summary: describeProfile(result.profile) });
        })
    );

    return router;
}

function parseLanguageQuery(value: unknown, fallback: Language): Language {
    if (value === undefined) {
        return fallback;
    }
    if (!isLanguage(value)) {
        throw new BadRequestError(`Unsupported language: ${String(value)}`);
    }
    return value;
}

/**
 * Scenes submitted for calibration carry real audio timing unless they say otherwise.
 */
function toScenes(inputs: SceneInput[]): Scene[] {
    return inputs.map((input) => {
        try {
            return createScene({ ...input, audioSynced: input.audioSynced ?? true });
        } catch (error) {
            throw new BadRequestError(error instanceof Error ? error.message : String(error));
        }
    });
}
