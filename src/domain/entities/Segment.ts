import { Token } from './Token';

/**
 * Why the segmenter closed a segment where it did.
 * - 'natural-break': ended on a break particle or punctuation (preferred)
 * - 'forced': hit the ceiling with no break in the search window
 * - 'end-of-input': the last buffer of the narration
 * - 'merged': a trailing sliver folded into its predecessor
 */
export type CutReason = 'natural-break' | 'forced' | 'end-of-input' | 'merged';

/**
 * Segment is the segmenter's output, before it becomes a domain Scene.
 */
export interface Segment {
    /** 1-based position in the segmenter output */
    order: number;
    /** Start time in seconds */
    start: number;
    /** End time in seconds */
    end: number;
    text: string;
    /** Tokens the segment was built from; empty in text mode */
    sourceTokens: Token[];
    /** 'audio' when timing comes from a transcript, 'estimated' when from the rate estimator */
    timing: 'audio' | 'estimated';
    cutReason: CutReason;
    /** True when the segment exceeds the ceiling because it could not be split further */
    oversized: boolean;
}

/**
 * Calculates the duration of a segment in seconds.
 */
export function getSegmentDuration(segment: Pick<Segment, 'start' | 'end'>): number {
    return segment.end - segment.start;
}

export function roundSeconds(value: number, decimals: number = 2): number {
    const factor = 10 ** decimals;
    return Math.round(value * factor) / factor;
}
