import { Token } from '../entities/Token';
import { roundSeconds } from '../entities/Segment';
import {
    TranscribedSegment,
    TranscribedWord,
    TranscriptionResult,
} from '../entities/TranscriptionResult';

/** Slack when deciding whether a word falls inside a segment's time range. */
const WORD_OVERLAP_TOLERANCE = 0.05;

/**
 * Converts backend-specific transcription output into one ordered token stream.
 * Word timing is used wherever it exists; a segment without words becomes a single token.
 */
export class TokenStreamNormalizer {

    public normalize(result: TranscriptionResult): Token[] {
        const collected = this.collectTokens(result);
        return this.clean(collected, this.findInputEnd(result));
    }

    private collectTokens(result: TranscriptionResult): Token[] {
        switch (result.kind) {
            case 'word-timestamps':
                return result.words.map((w) => this.fromWord(w));
            case 'segments':
                return result.segments.flatMap((segment) =>
                    segment.words && segment.words.length > 0
                        ? segment.words.map((w) => this.fromWord(w))
                        : [this.fromSegment(segment)]
                );
            case 'verbose':
                return this.alignWordsToSegments(result.segments, result.words);
        }
    }

    /**
     * Assigns flat words to the segment whose range contains them.
     * A segment that received no flat words uses its own embedded words, or else
     * becomes a whole-segment token. Words outside every segment are kept as well.
     */
    private alignWordsToSegments(segments: TranscribedSegment[], words: TranscribedWord[]): Token[] {
        const claimed = new Set<number>();
        const tokens: Token[] = [];

        for (const segment of segments) {
            const inside: Token[] = [];
            words.forEach((word, index) => {
                if (
                    !claimed.has(index)
                    && word.start >= segment.start - WORD_OVERLAP_TOLERANCE
                    && word.end <= segment.end + WORD_OVERLAP_TOLERANCE
                ) {
                    claimed.add(index);
                    inside.push(this.fromWord(word));
                }
            });

            if (inside.length > 0) {
                tokens.push(...inside);
            } else if (segment.words && segment.words.length > 0) {
                tokens.push(...segment.words.map((w) => this.fromWord(w)));
            } else {
                tokens.push(this.fromSegment(segment));
            }
        }

        words.forEach((word, index) => {
            if (!claimed.has(index)) {
                tokens.push(this.fromWord(word));
            }
        });

        return tokens;
    }

    private fromWord(word: TranscribedWord): Token {
        return {
            text: word.word,
            start: word.start,
            end: word.end,
            confidence: clampUnit(word.probability ?? 0),
        };
    }

    private fromSegment(segment: TranscribedSegment): Token {
        return {
            // Leading space keeps whole-segment tokens apart when joined
            text: ` ${segment.text.trim()}`,
            start: segment.start,
            end: segment.end,
            confidence: segment.avgLogprob !== undefined ? clampUnit(Math.exp(segment.avgLogprob)) : 0,
        };
    }

    /**
     * Drops unusable tokens, sorts by start, removes overlaps and
     * stretches the last token to the end of the input span.
     */
    private clean(tokens: Token[], inputEnd: number | null): Token[] {
        const usable = tokens.filter(
            (t) => Number.isFinite(t.start) && Number.isFinite(t.end) && t.text.trim().length > 0
        );
        if (usable.length < tokens.length) {
            console.warn(`[Normalizer] Dropped ${tokens.length - usable.length} token(s) with missing text or timing`);
        }
        if (usable.length === 0) {
            return [];
        }

        const sorted = [...usable].sort((a, b) => a.start - b.start);

        let previousEnd = 0;
        const cleaned = sorted.map((token) => {
            const start = roundSeconds(Math.max(token.start, previousEnd));
            const end = roundSeconds(Math.max(token.end, start));
            previousEnd = end;
            return { ...token, start, end };
        });

        const last = cleaned[cleaned.length - 1];
        if (inputEnd !== null && inputEnd > last.end) {
            cleaned[cleaned.length - 1] = { ...last, end: roundSeconds(inputEnd) };
        }

        return cleaned;
    }

    private findInputEnd(result: TranscriptionResult): number | null {
        const ends: number[] = [];
        if (result.kind !== 'word-timestamps') {
            for (const segment of result.segments) {
                if (segment.text.trim()) {
                    ends.push(segment.end);
                }
                segment.words?.forEach((w) => ends.push(w.end));
            }
        }
        if (result.kind !== 'segments') {
            result.words.forEach((w) => ends.push(w.end));
        }
        const finite = ends.filter((e) => Number.isFinite(e));
        return finite.length > 0 ? Math.max(...finite) : null;
    }
}

function clampUnit(value: number): number {
    if (!Number.isFinite(value)) {
        return 0;
    }
    return Math.max(0, Math.min(1, value));
}
