import { SENTENCE_BOUNDARY, getLanguageRules } from '../entities/Language';
import { CalibrationProfile } from '../entities/CalibrationProfile';
import { DurationConstraints } from '../entities/DurationConstraints';
import { Segment, roundSeconds } from '../entities/Segment';
import { estimateDuration } from './RateEstimator';

type FitsCeiling = (text: string) => boolean;

/**
 * Splits narration into sentences: on newlines first, then after sentence-ending punctuation.
 */
export function splitIntoSentences(text: string): string[] {
    return text
        .split('\n')
        .map((line) => line.trim())
        .filter(Boolean)
        .flatMap((line) => line.split(SENTENCE_BOUNDARY))
        .map((sentence) => sentence.trim())
        .filter(Boolean);
}

/**
 * Greedily joins consecutive fragments while the joined text still fits.
 * A fragment that does not fit even alone is kept on its own.
 */
export function packFragments(fragments: readonly string[], fits: FitsCeiling): string[] {
    const { packed, buffer } = fragments.reduce<{ packed: string[]; buffer: string }>(
        (acc, fragment) => {
            if (!acc.buffer) {
                return { packed: acc.packed, buffer: fragment };
            }
            const candidate = `${acc.buffer} ${fragment}`;
            return fits(candidate)
                ? { packed: acc.packed, buffer: candidate }
                : { packed: [...acc.packed, acc.buffer], buffer: fragment };
        },
        { packed: [], buffer: '' }
    );
    return buffer ? [...packed, buffer] : packed;
}

/**
 * Splits an over-long sentence on clause markers, coarsest tier first, recursing into
 * pieces that are still too long, then re-packs the pieces so short clauses merge back.
 */
export function splitLongSentence(
    sentence: string,
    tiers: readonly RegExp[],
    fits: FitsCeiling
): string[] {
    if (fits(sentence) || tiers.length === 0) {
        return [sentence];
    }

    const [tier, ...deeper] = tiers;
    const clauses = sentence
        .split(tier)
        .map((clause) => clause.trim())
        .filter(Boolean);

    if (clauses.length <= 1) {
        return splitLongSentence(sentence, deeper, fits);
    }

    return packFragments(
        clauses.flatMap((clause) => splitLongSentence(clause, deeper, fits)),
        fits
    );
}

/**
 * Text mode: splits narration into segments whose estimated duration stays under
 * `maxDuration`, cutting only at sentence or clause boundaries.
 *
 * Segments are laid end to end from 0 on the estimated timeline. A clause that cannot
 * be split any further is emitted on its own and flagged oversized.
 */
export function segmentText(
    narration: string,
    profile: CalibrationProfile,
    constraints: DurationConstraints
): Segment[] {
    const fits: FitsCeiling = (text) => estimateDuration(text, profile) <= constraints.maxDuration;
    const { clauseTiers } = getLanguageRules(profile.language);

    const sentences = splitIntoSentences(narration)
        .flatMap((sentence) => splitLongSentence(sentence, clauseTiers, fits));
    const pieces = packFragments(sentences, fits);

    let cursor = 0;
    return pieces.map((text, index): Segment => {
        const duration = estimateDuration(text, profile);
        const start = roundSeconds(cursor);
        cursor += duration;
        return {
            order: index + 1,
            start,
            end: roundSeconds(cursor),
            text,
            sourceTokens: [],
            timing: 'estimated',
            cutReason: index === pieces.length - 1 ? 'end-of-input' : 'natural-break',
            oversized: duration > constraints.maxDuration,
        };
    });
}
