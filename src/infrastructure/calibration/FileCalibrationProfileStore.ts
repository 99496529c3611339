import fs from 'fs/promises';
import path from 'path';
import Ajv from 'ajv';
import { ICalibrationProfileStore } from '../../domain/ports/ICalibrationProfileStore';
import { CalibrationProfile, createDefaultProfile } from '../../domain/entities/CalibrationProfile';
import { Language, SUPPORTED_LANGUAGES } from '../../domain/entities/Language';

export const DEFAULT_PROFILE_PATH = 'data/calibration_profiles.json';

type StoredProfile = Omit<CalibrationProfile, 'voiceType' | 'speakingRate'>
    & Partial<Pick<CalibrationProfile, 'voiceType' | 'speakingRate'>>;

type ProfileDocument = Record<string, StoredProfile>;

const PROFILE_SCHEMA = {
    type: 'object',
    properties: {
        charsPerSecond: { type: 'number', exclusiveMinimum: 0 },
        wordsPerSecond: { type: 'number', exclusiveMinimum: 0 },
        language: { type: 'string', enum: [...SUPPORTED_LANGUAGES] },
        sampleCount: { type: 'integer', minimum: 0 },
        calibratedAt: { type: 'string' },
        voiceType: { type: 'string' },
        speakingRate: { type: 'number', exclusiveMinimum: 0 },
    },
    required: ['charsPerSecond', 'wordsPerSecond', 'language', 'sampleCount', 'calibratedAt'],
};

const ajv = new Ajv({ allErrors: true });
const validateDocument = ajv.compile<ProfileDocument>({
    type: 'object',
    additionalProperties: PROFILE_SCHEMA,
});

/**
 * Calibration profiles persisted as one flat JSON document: { [key]: profile }.
 * Saves are read-modify-write; concurrent writers to one key are last-writer-wins.
 */
export class FileCalibrationProfileStore implements ICalibrationProfileStore {
    private readonly filePath: string;

    constructor(filePath: string = DEFAULT_PROFILE_PATH) {
        this.filePath = path.resolve(filePath);
    }

    async load(key: string, language: Language): Promise<CalibrationProfile | null> {
        let document: ProfileDocument;
        try {
            document = await this.readDocument();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.warn(`[Calibration] Could not load calibration profile: ${message}`);
            return null;
        }

        const stored = document[key];
        if (!stored) {
            return null;
        }
        if (stored.language !== language) {
            console.warn(`[Calibration] Profile '${key}' is for '${stored.language}', not '${language}'`);
            return null;
        }

        return { ...createDefaultProfile(stored.language), ...stored };
    }

    async save(profile: CalibrationProfile, key: string): Promise<void> {
        const document = await this.readDocument();
        const updated: ProfileDocument = { ...document, [key]: profile };

        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.writeFile(this.filePath, JSON.stringify(updated, null, 2), 'utf-8');
        console.log(`[Calibration] Saved profile '${key}' to ${this.filePath}`);
    }

    private async readDocument(): Promise<ProfileDocument> {
        let raw: string;
        try {
            raw = await fs.readFile(this.filePath, 'utf-8');
        } catch (error) {
            if (isMissingFile(error)) {
                return {};
            }
            throw error;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.warn(`[Calibration] Ignoring unreadable profile file ${this.filePath}: ${message}`);
            return {};
        }

        if (!validateDocument(parsed)) {
            console.warn(`[Calibration] Ignoring invalid profile file ${this.filePath}: ${ajv.errorsText(validateDocument.errors)}`);
            return {};
        }
        return parsed;
    }
}

// fs errors may come from another realm, so no instanceof Error here
function isMissingFile(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
