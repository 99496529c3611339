import Ajv, { ValidateFunction } from 'ajv';
import { Language, SUPPORTED_LANGUAGES } from '../../domain/entities/Language';
import { BadRequestError } from '../middleware/errorHandler';

interface SegmentationFields {
    language?: Language;
    maxDuration?: number;
    minDuration?: number;
    profileKey?: string;
}

export interface TextScenesBody extends SegmentationFields {
    narration: string;
}

export interface TranscriptScenesBody extends SegmentationFields {
    /** Raw backend response; its shape is checked by the payload parser */
    transcription: Record<string, unknown>;
    narration?: string;
}

export interface AudioScenesBody extends SegmentationFields {
    audioPath: string;
    narration?: string;
    transcriptionPrompt?: string;
}

export interface SceneTiming {
    startTime: number;
    endTime: number;
}

export interface DriftBody {
    scenes: SceneTiming[];
    audioPath?: string;
    audioDurationSeconds?: number;
}

export interface SceneInput extends SceneTiming {
    order: number;
    narrationText: string;
    estimatedDuration?: number;
    audioSynced?: boolean;
}

export interface CalibrationBody {
    audioPath: string;
    scenes: SceneInput[];
    language?: Language;
    voiceType?: string;
    speakingRate?: number;
}

const segmentationProperties = {
    language: { type: 'string', enum: [...SUPPORTED_LANGUAGES] },
    maxDuration: { type: 'number', exclusiveMinimum: 0 },
    minDuration: { type: 'number', exclusiveMinimum: 0 },
    profileKey: { type: 'string', minLength: 1 },
};

const sceneTimingProperties = {
    startTime: { type: 'number', minimum: 0 },
    endTime: { type: 'number', minimum: 0 },
};

const ajv = new Ajv({ allErrors: true });

export const validateTextScenesBody = ajv.compile<TextScenesBody>({
    type: 'object',
    properties: {
        ...segmentationProperties,
        narration: { type: 'string' },
    },
    required: ['narration'],
});

export const validateTranscriptScenesBody = ajv.compile<TranscriptScenesBody>({
    type: 'object',
    properties: {
        ...segmentationProperties,
        transcription: { type: 'object' },
        narration: { type: 'string' },
    },
    required: ['transcription'],
});

export const validateAudioScenesBody = ajv.compile<AudioScenesBody>({
    type: 'object',
    properties: {
        ...segmentationProperties,
        audioPath: { type: 'string', minLength: 1 },
        narration: { type: 'string' },
        transcriptionPrompt: { type: 'string' },
    },
    required: ['audioPath'],
});

export const validateDriftBody = ajv.compile<DriftBody>({
    type: 'object',
    properties: {
        scenes: {
            type: 'array',
            items: { type: 'object', properties: sceneTimingProperties, required: ['startTime', 'endTime'] },
        },
        audioPath: { type: 'string', minLength: 1 },
        audioDurationSeconds: { type: 'number', minimum: 0 },
    },
    required: ['scenes'],
    anyOf: [{ required: ['audioPath'] }, { required: ['audioDurationSeconds'] }],
});

export const validateCalibrationBody = ajv.compile<CalibrationBody>({
    type: 'object',
    properties: {
        audioPath: { type: 'string', minLength: 1 },
        scenes: {
            type: 'array',
            items: {
                type: 'object',
                properties: {
                    ...sceneTimingProperties,
                    order: { type: 'integer', minimum: 1 },
                    narrationText: { type: 'string', minLength: 1 },
                    estimatedDuration: { type: 'number', minimum: 0 },
                    audioSynced: { type: 'boolean' },
                },
                required: ['order', 'startTime', 'endTime', 'narrationText'],
            },
        },
        language: { type: 'string', enum: [...SUPPORTED_LANGUAGES] },
        voiceType: { type: 'string' },
        speakingRate: { type: 'number', exclusiveMinimum: 0 },
    },
    required: ['audioPath', 'scenes'],
});

/**
 * Narrows a request body with a compiled schema, or rejects it with a 400.
 */
export function parseBody<T>(validate: ValidateFunction<T>, body: unknown): T {
    if (!validate(body)) {
        throw new BadRequestError(
            `Invalid request body: ${ajv.errorsText(validate.errors, { dataVar: 'body' })}`,
            validate.errors
        );
    }
    return body;
}
