import { Language, getLanguageRules } from './Language';

/**
 * Calibrated speaking-rate profile derived from real narration audio.
 * Feeds the rate estimator when no real timing exists.
 */
export interface CalibrationProfile {
    charsPerSecond: number;
    wordsPerSecond: number;
    language: Language;
    /** Number of (text, duration) ratios the profile was computed from; 0 for defaults */
    sampleCount: number;
    /** ISO-8601 timestamp of the calibration run */
    calibratedAt: string;
    /** Voice the audio was produced with, when known */
    voiceType: string;
    /** TTS speed multiplier the audio was produced with */
    speakingRate: number;
}

export const DEFAULT_CHARS_PER_SECOND = getLanguageRules('th').defaultRate;
export const DEFAULT_WORDS_PER_SECOND = getLanguageRules('en').defaultRate;

/**
 * Uncalibrated profile with hard-coded default rates.
 */
export function createDefaultProfile(language: Language, now: Date = new Date()): CalibrationProfile {
    return {
        charsPerSecond: DEFAULT_CHARS_PER_SECOND,
        wordsPerSecond: DEFAULT_WORDS_PER_SECOND,
        language,
        sampleCount: 0,
        calibratedAt: now.toISOString(),
        voiceType: 'unknown',
        speakingRate: 1.0,
    };
}

/**
 * Clamps a measured rate into the language's valid range.
 */
export function clampRate(rate: number, language: Language): number {
    const { min, max } = getLanguageRules(language).rateRange;
    return Math.max(min, Math.min(max, rate));
}

/**
 * The rate that applies to the profile's language.
 */
export function getActiveRate(profile: CalibrationProfile): number {
    return getLanguageRules(profile.language).measure === 'characters'
        ? profile.charsPerSecond
        : profile.wordsPerSecond;
}

/**
 * One-line summary, e.g. "11.2 chars/sec (faster than default 10)".
 */
export function describeProfile(profile: CalibrationProfile): string {
    const rules = getLanguageRules(profile.language);
    const rate = getActiveRate(profile);
    const unit = rules.measure === 'characters' ? 'chars/sec' : 'words/sec';
    if (rate === rules.defaultRate) {
        return `${rate.toFixed(1)} ${unit} (default)`;
    }
    const comparison = rate > rules.defaultRate ? 'faster' : 'slower';
    return `${rate.toFixed(1)} ${unit} (${comparison} than default ${rules.defaultRate})`;
}
