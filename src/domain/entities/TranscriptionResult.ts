import { Language } from './Language';

/**
 * A word with timing as reported by a speech-to-text backend.
 */
export interface TranscribedWord {
    word: string;
    start: number;
    end: number;
    /** Per-word probability, when the backend reports one */
    probability?: number;
}

/**
 * A transcript segment (roughly a phrase or sentence) with timing.
 */
export interface TranscribedSegment {
    start: number;
    end: number;
    text: string;
    /** Average log-probability of the segment, when available */
    avgLogprob?: number;
    /** Word timing embedded in the segment (local faster-whisper style) */
    words?: TranscribedWord[];
}

interface TranscriptionMetadata {
    language?: Language;
    /** Total audio duration reported by the backend */
    durationSeconds?: number;
}

/**
 * Flat word-level timing with no segment breakdown.
 */
export interface WordTimestampTranscription extends TranscriptionMetadata {
    kind: 'word-timestamps';
    words: TranscribedWord[];
}

/**
 * Segment-level timing, each segment optionally carrying its own word list.
 */
export interface SegmentTranscription extends TranscriptionMetadata {
    kind: 'segments';
    segments: TranscribedSegment[];
}

/**
 * Segment list plus a separate flat word list (OpenAI/Groq verbose_json).
 */
export interface VerboseTranscription extends TranscriptionMetadata {
    kind: 'verbose';
    segments: TranscribedSegment[];
    words: TranscribedWord[];
}

export type TranscriptionResult =
    | WordTimestampTranscription
    | SegmentTranscription
    | VerboseTranscription;

export function fromWordTimestamps(
    words: TranscribedWord[],
    metadata: TranscriptionMetadata = {}
): WordTimestampTranscription {
    return { kind: 'word-timestamps', words, ...metadata };
}

export function fromSegments(
    segments: TranscribedSegment[],
    metadata: TranscriptionMetadata = {}
): SegmentTranscription {
    return { kind: 'segments', segments, ...metadata };
}

export function fromVerboseJson(
    segments: TranscribedSegment[],
    words: TranscribedWord[],
    metadata: TranscriptionMetadata = {}
): VerboseTranscription {
    return { kind: 'verbose', segments, words, ...metadata };
}

/**
 * Full transcript text, in spoken order.
 */
export function getTranscriptText(result: TranscriptionResult): string {
    switch (result.kind) {
        case 'word-timestamps':
            return result.words.map((w) => w.word).join('').replace(/\s+/g, ' ').trim();
        case 'segments':
        case 'verbose':
            return result.segments.map((s) => s.text.trim()).filter(Boolean).join(' ');
    }
}
