import { TokenStreamNormalizer } from '../../../src/domain/services/TokenStreamNormalizer';
import {
    fromSegments,
    fromVerboseJson,
    fromWordTimestamps,
} from '../../../src/domain/entities/TranscriptionResult';

describe('TokenStreamNormalizer', () => {
    const normalizer = new TokenStreamNormalizer();

    beforeEach(() => {
        jest.spyOn(console, 'warn').mockImplementation(() => { });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('returns no tokens for an empty transcription', () => {
        expect(normalizer.normalize(fromWordTimestamps([]))).toEqual([]);
        expect(normalizer.normalize(fromSegments([]))).toEqual([]);
        expect(normalizer.normalize(fromVerboseJson([], []))).toEqual([]);
    });

    it('keeps word timing and probability', () => {
        const tokens = normalizer.normalize(fromWordTimestamps([
            { word: ' Hello', start: 0, end: 0.5, probability: 0.9 },
            { word: ' world.', start: 0.5, end: 1 },
        ]));

        expect(tokens).toEqual([
            { text: ' Hello', start: 0, end: 0.5, confidence: 0.9 },
            { text: ' world.', start: 0.5, end: 1, confidence: 0 },
        ]);
    });

    it('turns a segment without words into one token', () => {
        const tokens = normalizer.normalize(fromSegments([
            { start: 0, end: 2, text: 'Hello there ', avgLogprob: 0 },
        ]));

        expect(tokens).toEqual([{ text: ' Hello there', start: 0, end: 2, confidence: 1 }]);
    });

    it('prefers embedded segment words and stretches the last one to the segment end', () => {
        const tokens = normalizer.normalize(fromSegments([
            {
                start: 0,
                end: 4,
                text: 'Hi there',
                words: [
                    { word: ' Hi', start: 0, end: 1, probability: 0.5 },
                    { word: ' there', start: 1.2, end: 3.8, probability: 0.7 },
                ],
            },
        ]));

        expect(tokens.map((t) => t.text)).toEqual([' Hi', ' there']);
        expect(tokens[1].end).toBe(4);
    });

    it('assigns flat words to segments and synthesizes tokens for segments without words', () => {
        const tokens = normalizer.normalize(fromVerboseJson(
            [
                { start: 0, end: 2, text: 'Hello world' },
                { start: 2, end: 4, text: 'Second part', avgLogprob: -1 },
            ],
            [
                { word: ' Hello', start: 0, end: 0.8 },
                { word: ' world', start: 0.9, end: 2.03 },
            ]
        ));

        expect(tokens.map((t) => [t.text, t.start, t.end])).toEqual([
            [' Hello', 0, 0.8],
            [' world', 0.9, 2.03],
            [' Second part', 2.03, 4],
        ]);
        expect(tokens[2].confidence).toBeCloseTo(Math.exp(-1), 10);
    });

    it('uses embedded words for a segment that claims no flat words', () => {
        const tokens = normalizer.normalize(fromVerboseJson(
            [
                { start: 0, end: 2, text: 'Hello world' },
                {
                    start: 2,
                    end: 4,
                    text: 'Second part',
                    words: [
                        { word: ' Second', start: 2, end: 2.9 },
                        { word: ' part', start: 3, end: 3.6 },
                    ],
                },
            ],
            [
                { word: ' Hello', start: 0, end: 0.8 },
                { word: ' world', start: 0.9, end: 2 },
            ]
        ));

        expect(tokens.map((t) => [t.text, t.start, t.end])).toEqual([
            [' Hello', 0, 0.8],
            [' world', 0.9, 2],
            [' Second', 2, 2.9],
            [' part', 3, 4],
        ]);
    });

    it('keeps words that fall outside every segment', () => {
        const tokens = normalizer.normalize(fromVerboseJson(
            [{ start: 0, end: 1, text: 'One' }],
            [
                { word: ' One', start: 0, end: 1 },
                { word: ' stray', start: 5, end: 5.5 },
            ]
        ));

        expect(tokens.map((t) => t.text)).toEqual([' One', ' stray']);
    });

    it('drops tokens without text or finite timing', () => {
        const tokens = normalizer.normalize(fromWordTimestamps([
            { word: ' ok', start: 0, end: 1 },
            { word: '   ', start: 1, end: 2 },
            { word: ' bad', start: Number.NaN, end: 3 },
            { word: ' fine', start: 3, end: 4 },
        ]));

        expect(tokens.map((t) => t.text)).toEqual([' ok', ' fine']);
        expect(console.warn).toHaveBeenCalledWith('[Normalizer] Dropped 2 token(s) with missing text or timing');
    });

    it('sorts tokens, removes overlaps and clamps negative times', () => {
        const tokens = normalizer.normalize(fromWordTimestamps([
            { word: ' b', start: 0.8, end: 1.5 },
            { word: ' a', start: -0.2, end: 1 },
            { word: ' c', start: 1.2, end: 1.3 },
        ]));

        expect(tokens.map((t) => [t.text, t.start, t.end])).toEqual([
            [' a', 0, 1],
            [' b', 1, 1.5],
            [' c', 1.5, 1.5],
        ]);
    });

    it('rounds times to two decimals and clamps probability', () => {
        const tokens = normalizer.normalize(fromWordTimestamps([
            { word: ' x', start: 0.123, end: 0.456, probability: 1.7 },
        ]));

        expect(tokens).toEqual([{ text: ' x', start: 0.12, end: 0.46, confidence: 1 }]);
    });
});
