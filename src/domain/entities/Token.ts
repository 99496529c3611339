import { BREAK_PUNCTUATION, Language, getLanguageRules } from './Language';

/**
 * Token is the atomic timed unit of narration after normalization.
 * Usually one spoken word; a whole transcript segment when the backend gave no word timing.
 */
export interface Token {
    /** Fragment text exactly as spoken, including any leading space the backend emitted */
    text: string;
    /** Start time in seconds from the beginning of the audio */
    start: number;
    /** End time in seconds, never before `start` */
    end: number;
    /** Recognition confidence in [0, 1]; 0 when the backend does not report one */
    confidence: number;
}

export function getTokenDuration(token: Token): number {
    return token.end - token.start;
}

/**
 * True when the token closes a clause: it ends with a break particle of the
 * language or with break punctuation.
 */
export function isNaturalBreak(token: Token, language: Language): boolean {
    const stripped = token.text.trim();
    if (!stripped) {
        return false;
    }
    const { breakParticles } = getLanguageRules(language);
    return breakParticles.some((particle) => stripped.endsWith(particle))
        || BREAK_PUNCTUATION.some((mark) => stripped.endsWith(mark));
}

/**
 * Joins token fragments into readable text, collapsing whitespace.
 */
export function joinTokenText(tokens: readonly Token[]): string {
    return tokens.map((t) => t.text).join('').replace(/\s+/g, ' ').trim();
}
