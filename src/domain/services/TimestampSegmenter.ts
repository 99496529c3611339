import { Language } from '../entities/Language';
import { Token, isNaturalBreak, joinTokenText } from '../entities/Token';
import { DurationConstraints } from '../entities/DurationConstraints';
import { CutReason, Segment, getSegmentDuration, roundSeconds } from '../entities/Segment';

export const DEFAULT_MERGE_TOLERANCE_SECONDS = 2.0;
export const DEFAULT_BREAK_SEARCH_WINDOW = 5;

/** Float slack when comparing rounded durations against the ceiling. */
const EPSILON = 1e-6;

export interface TimestampSegmenterOptions {
    language: Language;
    /** How far past maxDuration a trailing merge may go */
    mergeToleranceSeconds?: number;
    /** How many trailing tokens a hard cut searches for a natural break */
    breakSearchWindow?: number;
}

/**
 * Partitions a normalized token stream into segments of at most `maxDuration`.
 *
 * Three phases per segment:
 * 1. ACCUMULATE while the segment is no longer than `minDuration`.
 * 2. SWEET ZONE (min, max]: close right after the first token that ends on a natural break.
 * 3. HARD CUT when the next token would pass `maxDuration`: split after the latest
 *    natural break among the last few tokens, or at the buffer boundary if there is none.
 *
 * A trailing segment shorter than `minDuration` is then folded into its predecessor
 * when the result stays within `maxDuration + mergeToleranceSeconds`.
 */
export function segmentTokens(
    tokens: readonly Token[],
    constraints: DurationConstraints,
    options: TimestampSegmenterOptions
): Segment[] {
    if (tokens.length === 0) {
        return [];
    }

    const { maxDuration, minDuration } = constraints;
    const { language } = options;
    const searchWindow = options.breakSearchWindow ?? DEFAULT_BREAK_SEARCH_WINDOW;
    const tolerance = options.mergeToleranceSeconds ?? DEFAULT_MERGE_TOLERANCE_SECONDS;

    const segments: Segment[] = [];
    const close = (words: Token[], start: number, cutReason: CutReason): void => {
        const segment = buildSegment(words, start, cutReason, maxDuration);
        if (segment) {
            segments.push(segment);
        }
    };

    let buffer: Token[] = [];
    let bufferStart = tokens[0].start;

    for (const token of tokens) {
        const potentialDuration = token.end - bufferStart;

        if (potentialDuration <= minDuration + EPSILON) {
            buffer.push(token);
        } else if (potentialDuration <= maxDuration + EPSILON) {
            buffer.push(token);
            if (isNaturalBreak(token, language)) {
                close(buffer, bufferStart, 'natural-break');
                buffer = [];
                // Next scene picks up where this one stopped
                bufferStart = token.end;
            }
        } else if (buffer.length > 0) {
            const splitAt = findLatestBreak(buffer, language, searchWindow);
            const head = splitAt > 0 ? buffer.slice(0, splitAt) : buffer;
            const remainder = splitAt > 0 ? buffer.slice(splitAt) : [];
            close(head, bufferStart, splitAt > 0 ? 'natural-break' : 'forced');

            if (remainder.length > 0 && token.end - remainder[0].start > maxDuration + EPSILON) {
                close(remainder, remainder[0].start, 'forced');
                buffer = [token];
            } else {
                buffer = [...remainder, token];
            }
            bufferStart = buffer[0].start;
        } else {
            // Token alone is over the ceiling, or follows a long pause
            buffer = [token];
            bufferStart = token.start;
        }
    }

    close(buffer, bufferStart, 'end-of-input');

    return mergeTrailingSegment(segments, constraints, tolerance)
        .map((segment, index) => ({ ...segment, order: index + 1 }));
}

/**
 * Number of leading buffer tokens to keep so the cut lands after the latest natural
 * break within the last `window` tokens. 0 when there is none.
 */
export function findLatestBreak(buffer: readonly Token[], language: Language, window: number): number {
    const searchStart = Math.max(0, buffer.length - window);
    for (let j = buffer.length - 1; j >= searchStart; j--) {
        if (isNaturalBreak(buffer[j], language)) {
            return j + 1;
        }
    }
    return 0;
}

/**
 * Folds a trailing sliver into its predecessor. Touches only the last two segments, once.
 */
export function mergeTrailingSegment(
    segments: readonly Segment[],
    constraints: DurationConstraints,
    toleranceSeconds: number = DEFAULT_MERGE_TOLERANCE_SECONDS
): Segment[] {
    if (segments.length < 2) {
        return [...segments];
    }

    const last = segments[segments.length - 1];
    const previous = segments[segments.length - 2];
    if (getSegmentDuration(last) >= constraints.minDuration) {
        return [...segments];
    }

    const mergedDuration = last.end - previous.start;
    if (mergedDuration > constraints.maxDuration + toleranceSeconds) {
        return [...segments];
    }

    const sourceTokens = [...previous.sourceTokens, ...last.sourceTokens];
    const merged: Segment = {
        ...previous,
        end: last.end,
        text: sourceTokens.length > 0
            ? joinTokenText(sourceTokens)
            : `${previous.text} ${last.text}`,
        sourceTokens,
        cutReason: 'merged',
        oversized: mergedDuration > constraints.maxDuration + EPSILON,
    };

    return [...segments.slice(0, -2), merged];
}

function buildSegment(
    words: Token[],
    start: number,
    cutReason: CutReason,
    maxDuration: number
): Segment | null {
    if (words.length === 0) {
        return null;
    }
    const text = joinTokenText(words);
    if (!text) {
        return null;
    }
    const roundedStart = roundSeconds(start);
    const end = roundSeconds(words[words.length - 1].end);
    return {
        order: 0,
        start: roundedStart,
        end,
        text,
        sourceTokens: [...words],
        timing: 'audio',
        cutReason,
        oversized: end - roundedStart > maxDuration + EPSILON,
    };
}
