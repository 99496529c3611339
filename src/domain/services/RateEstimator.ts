import { Language, getLanguageRules } from '../entities/Language';
import { CalibrationProfile, getActiveRate } from '../entities/CalibrationProfile';
import { roundSeconds } from '../entities/Segment';

/**
 * Counts the text in the unit the language is measured in:
 * non-whitespace characters for 'th', words for 'en'.
 */
export function measureText(text: string, language: Language): number {
    if (getLanguageRules(language).measure === 'characters') {
        return text.replace(/\s/g, '').length;
    }
    const trimmed = text.trim();
    return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Estimates how long the text takes to speak, rounded to 0.1s.
 * Only used when no real timing exists.
 */
export function estimateDuration(text: string, profile: CalibrationProfile): number {
    const measure = measureText(text, profile.language);
    if (measure === 0) {
        return 0;
    }
    return roundSeconds(measure / getActiveRate(profile), 1);
}

/**
 * Largest character or word count that fits in `maxDuration` at the profile's rate.
 */
export function calculateMaxTextMeasure(maxDuration: number, profile: CalibrationProfile): number {
    return Math.floor(maxDuration * getActiveRate(profile));
}
