import dotenv from 'dotenv';
import { Language, SUPPORTED_LANGUAGES } from '../domain/entities/Language';

// Load environment variables
dotenv.config();

export const TRANSCRIPTION_BACKENDS = ['openai', 'groq', 'local', 'none'] as const;
export type TranscriptionBackend = typeof TRANSCRIPTION_BACKENDS[number];

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;

    // Segmentation defaults (requests may override the durations)
    defaultLanguage: Language;
    maxSceneSeconds: number;
    minSceneSeconds: number;
    mergeToleranceSeconds: number;
    breakSearchWindow: number;
    driftThresholdSeconds: number;

    // Calibration
    calibrationProfilePath: string;

    // Transcription
    transcriptionBackend: TranscriptionBackend;
    transcriptionModel: string; // Empty string = backend default
    openaiApiKey: string;
    groqApiKey: string;
    localWhisperUrl: string;

    // Audio probing
    ffprobePath?: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
    const value = getEnvVar(key, defaultValue).toLowerCase();
    const match = choices.find((choice) => choice === value);
    if (match === undefined) {
        throw new Error(`Environment variable ${key} must be one of ${choices.join(', ')}, got: ${value}`);
    }
    return match;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),

        // Segmentation
        defaultLanguage: getEnvVarChoice('DEFAULT_LANGUAGE', SUPPORTED_LANGUAGES, 'th'),
        maxSceneSeconds: getEnvVarNumber('MAX_SCENE_SECONDS', 8),
        minSceneSeconds: getEnvVarNumber('MIN_SCENE_SECONDS', 7),
        mergeToleranceSeconds: getEnvVarNumber('MERGE_TOLERANCE_SECONDS', 2),
        breakSearchWindow: getEnvVarNumber('BREAK_SEARCH_WINDOW', 5),
        driftThresholdSeconds: getEnvVarNumber('DRIFT_THRESHOLD_SECONDS', 1),

        // Calibration
        calibrationProfilePath: getEnvVar('CALIBRATION_PROFILE_PATH', './data/calibration_profiles.json'),

        // Transcription
        transcriptionBackend: getEnvVarChoice('TRANSCRIPTION_BACKEND', TRANSCRIPTION_BACKENDS, 'none'),
        transcriptionModel: getEnvVar('TRANSCRIPTION_MODEL', ''),
        openaiApiKey: getEnvVar('OPENAI_API_KEY', ''),
        groqApiKey: getEnvVar('GROQ_API_KEY', ''),
        localWhisperUrl: getEnvVar('LOCAL_WHISPER_URL', 'http://localhost:9000'),

        // Audio probing
        ffprobePath: process.env.FFPROBE_PATH ? getEnvVar('FFPROBE_PATH') : undefined,
    };
}

/**
 * Checks the loaded values for combinations the service cannot run with.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!(config.maxSceneSeconds > 0)) {
        errors.push('MAX_SCENE_SECONDS must be positive');
    }
    if (!(config.minSceneSeconds > 0) || config.minSceneSeconds >= config.maxSceneSeconds) {
        errors.push('MIN_SCENE_SECONDS must be positive and less than MAX_SCENE_SECONDS');
    }
    if (config.mergeToleranceSeconds < 0) {
        errors.push('MERGE_TOLERANCE_SECONDS must not be negative');
    }
    if (!Number.isInteger(config.breakSearchWindow) || config.breakSearchWindow < 1) {
        errors.push('BREAK_SEARCH_WINDOW must be a positive integer');
    }
    if (config.driftThresholdSeconds < 0) {
        errors.push('DRIFT_THRESHOLD_SECONDS must not be negative');
    }
    if (config.transcriptionBackend === 'openai' && !config.openaiApiKey) {
        errors.push('OPENAI_API_KEY is required when TRANSCRIPTION_BACKEND is "openai"');
    }
    if (config.transcriptionBackend === 'groq' && !config.groqApiKey) {
        errors.push('GROQ_API_KEY is required when TRANSCRIPTION_BACKEND is "groq"');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
