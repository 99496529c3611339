import {
    findLatestBreak,
    mergeTrailingSegment,
    segmentTokens,
} from '../../../src/domain/services/TimestampSegmenter';
import { createDurationConstraints } from '../../../src/domain/entities/DurationConstraints';
import { Segment } from '../../../src/domain/entities/Segment';
import { Token } from '../../../src/domain/entities/Token';
import { evenTokens, repeatWord } from '../../fixtures/tokens';

const constraints = createDurationConstraints({ maxDuration: 8, minDuration: 7 });

function span(segment: Segment): [number, number] {
    return [segment.start, segment.end];
}

describe('TimestampSegmenter', () => {
    describe('segmentTokens', () => {
        it('returns no segments for no tokens', () => {
            expect(segmentTokens([], constraints, { language: 'en' })).toEqual([]);
        });

        it('force-cuts 20s of speech without breaks into segments of at most 8s', () => {
            const tokens = evenTokens(repeatWord(' go', 40), 0.5);

            const segments = segmentTokens(tokens, constraints, { language: 'en' });

            expect(segments.map(span)).toEqual([[0, 8], [8, 16], [16, 20]]);
            expect(segments.map((s) => s.cutReason)).toEqual(['forced', 'forced', 'end-of-input']);
            expect(segments.every((s) => !s.oversized)).toBe(true);
            expect(segments.map((s) => s.order)).toEqual([1, 2, 3]);
        });

        it('cuts at a natural break inside the sweet zone', () => {
            const first = evenTokens([...repeatWord(' we', 11), ' stop.'], 0.6);
            const second = evenTokens([...repeatWord(' then', 9), ' done.'], 0.69, 7.2);

            const segments = segmentTokens([...first, ...second], constraints, { language: 'en' });

            expect(segments.map(span)).toEqual([[0, 7.2], [7.2, 14.1]]);
            expect(segments[0].cutReason).toBe('natural-break');
            expect(segments[0].text).toBe(`${repeatWord('we', 11).join(' ')} stop.`);
            expect(segments[1].cutReason).toBe('end-of-input');
            expect(segments[1].sourceTokens).toHaveLength(10);
        });

        it('merges a short trailing segment within tolerance', () => {
            const tokens = evenTokens([...repeatWord(' la', 14), ' done.', ...repeatWord(' la', 4)], 0.5);

            const segments = segmentTokens(tokens, constraints, { language: 'en', mergeToleranceSeconds: 2.0 });

            expect(segments).toHaveLength(1);
            expect(span(segments[0])).toEqual([0, 9.5]);
            expect(segments[0].cutReason).toBe('merged');
            expect(segments[0].oversized).toBe(true);
            expect(segments[0].sourceTokens).toHaveLength(19);
        });

        it('keeps the trailing segment when the merge would pass the tolerance', () => {
            const tokens = evenTokens([...repeatWord(' la', 14), ' done.', ...repeatWord(' la', 4)], 0.5);

            const segments = segmentTokens(tokens, constraints, { language: 'en', mergeToleranceSeconds: 1.0 });

            expect(segments.map(span)).toEqual([[0, 7.5], [7.5, 9.5]]);
        });

        it('treats Thai particles as natural breaks', () => {
            const tokens = evenTokens([...repeatWord('ดี', 14), 'ครับ', ...repeatWord('ดี', 16)], 0.5);

            const segments = segmentTokens(tokens, constraints, { language: 'th' });

            expect(segments[0].end).toBe(7.5);
            expect(segments[0].cutReason).toBe('natural-break');
            expect(segments[0].text).toBe(`${'ดี'.repeat(14)}ครับ`);
        });

        it('backs a hard cut up to the latest break within the search window', () => {
            // The comma ends at 5.0, before the sweet zone opens at 7.0
            const tokens = evenTokens([...repeatWord(' a', 9), ' b,', ...repeatWord(' c', 12)], 0.5);

            const segments = segmentTokens(tokens, constraints, { language: 'en', breakSearchWindow: 10 });

            expect(segments[0].end).toBe(5);
            expect(segments[0].cutReason).toBe('natural-break');
            expect(segments[1].start).toBe(5);
        });

        it('forces the cut when the break is outside the search window', () => {
            const tokens = evenTokens([...repeatWord(' a', 9), ' b,', ...repeatWord(' c', 12)], 0.5);

            const segments = segmentTokens(tokens, constraints, { language: 'en', breakSearchWindow: 5 });

            expect(span(segments[0])).toEqual([0, 8]);
            expect(segments[0].cutReason).toBe('forced');
        });

        it('isolates a single token longer than the ceiling and flags it', () => {
            const tokens: Token[] = [
                { text: ' hi', start: 0, end: 1, confidence: 1 },
                { text: ' looooong', start: 1, end: 11, confidence: 1 },
                { text: ' bye', start: 11, end: 12, confidence: 1 },
            ];

            const segments = segmentTokens(tokens, constraints, { language: 'en', mergeToleranceSeconds: 0 });

            expect(segments.map(span)).toEqual([[0, 1], [1, 11], [11, 12]]);
            expect(segments.map((s) => s.oversized)).toEqual([false, true, false]);
        });

        it('covers the token stream without gaps or overlaps', () => {
            const texts = Array.from({ length: 60 }, (_, i) => (i % 9 === 8 ? ' end.' : ' word'));
            const tokens = evenTokens(texts, 0.45);

            const segments = segmentTokens(tokens, constraints, { language: 'en' });

            expect(segments[0].start).toBe(tokens[0].start);
            expect(segments[segments.length - 1].end).toBe(tokens[tokens.length - 1].end);
            for (let i = 1; i < segments.length; i++) {
                expect(segments[i].start).toBeGreaterThanOrEqual(segments[i - 1].end);
            }
            expect(segments.flatMap((s) => s.sourceTokens)).toEqual(tokens);
            segments.slice(0, -1).forEach((s) => expect(s.end - s.start).toBeLessThanOrEqual(8));
        });

        it('returns identical output for identical input', () => {
            const tokens = evenTokens([...repeatWord(' x', 14), ' y.', ...repeatWord(' z', 20)], 0.5);
            expect(segmentTokens(tokens, constraints, { language: 'en' }))
                .toEqual(segmentTokens(tokens, constraints, { language: 'en' }));
        });

        it('keeps a break that lands exactly on the ceiling', () => {
            const at = (text: string, start: number, end: number): Token => ({ text, start, end, confidence: 1 });
            const tokens = [
                at(' a', 8.1, 12.1),
                at(' b', 12.1, 15.5),
                at(' c.', 15.5, 16.1),
                at(' d', 16.1, 20),
                at(' e', 20, 23.5),
            ];

            const segments = segmentTokens(tokens, constraints, { language: 'en' });

            expect(segments.map((s) => [s.start, s.end, s.cutReason, s.text])).toEqual([
                [8.1, 16.1, 'natural-break', 'a b c.'],
                [16.1, 23.5, 'end-of-input', 'd e'],
            ]);
            expect(segments[0].oversized).toBe(false);
        });
    });

    describe('findLatestBreak', () => {
        const buffer = evenTokens([' a,', ' b', ' c.', ' d', ' e'], 1);

        it('returns the count of tokens up to and including the latest break', () => {
            expect(findLatestBreak(buffer, 'en', 5)).toBe(3);
        });

        it('ignores breaks outside the window', () => {
            expect(findLatestBreak(buffer, 'en', 2)).toBe(0);
        });
    });

    describe('mergeTrailingSegment', () => {
        const segment = (start: number, end: number, text: string): Segment => ({
            order: 0,
            start,
            end,
            text,
            sourceTokens: [],
            timing: 'estimated',
            cutReason: 'natural-break',
            oversized: false,
        });

        it('leaves a single segment alone', () => {
            const only = [segment(0, 3, 'one')];
            expect(mergeTrailingSegment(only, constraints)).toEqual(only);
        });

        it('leaves a trailing segment that is long enough', () => {
            const segments = [segment(0, 7.5, 'one'), segment(7.5, 15, 'two')];
            expect(mergeTrailingSegment(segments, constraints)).toEqual(segments);
        });

        it('joins text with a space when there are no source tokens', () => {
            const merged = mergeTrailingSegment([segment(0, 6, 'one'), segment(6, 8, 'two')], constraints);

            expect(merged).toHaveLength(1);
            expect(merged[0]).toMatchObject({ start: 0, end: 8, text: 'one two', cutReason: 'merged', oversized: false });
        });

        it('only touches the last two segments', () => {
            const merged = mergeTrailingSegment(
                [segment(0, 2, 'a'), segment(2, 4, 'b'), segment(4, 5, 'c')],
                constraints
            );

            expect(merged.map((s) => s.text)).toEqual(['a', 'b c']);
        });
    });
});
