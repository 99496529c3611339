/**
 * Narration languages the segmenter understands.
 * - 'th': Thai, measured in characters (no spaces between words)
 * - 'en': English, measured in words
 */
export type Language = 'th' | 'en';

export type TextMeasure = 'characters' | 'words';

/**
 * Language-specific rules used for duration estimation and cut-point detection.
 */
export interface LanguageRules {
    measure: TextMeasure;
    /** Default speaking rate, in the unit given by `measure` per second */
    defaultRate: number;
    /** Biological range a calibrated rate is clamped to */
    rateRange: { min: number; max: number };
    /** Words/particles that close a clause when a token ends with them */
    breakParticles: readonly string[];
    /** Clause split patterns, coarsest first. Applied recursively to over-long sentences. */
    clauseTiers: readonly RegExp[];
}

export const SUPPORTED_LANGUAGES: readonly Language[] = ['th', 'en'];

/** Punctuation that marks a natural break at the end of a token, in any language. */
export const BREAK_PUNCTUATION: readonly string[] = [',', '.', '!', '?', '…', ';', ':'];

/** Sentence boundaries: keep the terminal mark with its sentence. */
export const SENTENCE_BOUNDARY = /(?<=[.!?…।॥])\s+/;

const LANGUAGE_RULES: Record<Language, LanguageRules> = {
    th: {
        measure: 'characters',
        defaultRate: 10.0,
        rateRange: { min: 6.0, max: 18.0 },
        breakParticles: ['ครับ', 'ค่ะ', 'นะ', 'เลย', 'ด้วย', 'แล้ว'],
        clauseTiers: [
            // After polite closing particles
            /(?<=ครับ|ค่ะ|นะคะ)\s*/,
            // Before conjunctions and transition words
            /\s+(?=แต่|แล้ว|และ|หรือ|เพราะ|ถ้า|จึง|ดังนั้น|โดย|ซึ่ง)/,
        ],
    },
    en: {
        measure: 'words',
        defaultRate: 2.5,
        rateRange: { min: 1.5, max: 5.0 },
        breakParticles: [],
        clauseTiers: [
            /(?<=[,;:—–])\s+/,
            /\s+(?=(?:and|but|or|because|so|which|while|although|though|when|then)\b)/i,
        ],
    },
};

export function getLanguageRules(language: Language): LanguageRules {
    return LANGUAGE_RULES[language];
}

export function isLanguage(value: unknown): value is Language {
    return SUPPORTED_LANGUAGES.some((language) => language === value);
}
