import Ajv from 'ajv';
import {
    TranscribedSegment,
    TranscribedWord,
    TranscriptionResult,
    fromSegments,
    fromVerboseJson,
    fromWordTimestamps,
} from '../../domain/entities/TranscriptionResult';
import { Language } from '../../domain/entities/Language';

interface RawWord {
    word: string;
    start?: number | null;
    end?: number | null;
    probability?: number;
}

interface RawSegment {
    start?: number | null;
    end?: number | null;
    text: string;
    avg_logprob?: number;
    words?: RawWord[];
}

interface RawTranscriptionPayload {
    language?: string;
    duration?: number;
    segments?: RawSegment[];
    words?: RawWord[];
}

const WORD_SCHEMA = {
    type: 'object',
    properties: {
        word: { type: 'string' },
        start: { type: ['number', 'null'] },
        end: { type: ['number', 'null'] },
        probability: { type: 'number' },
    },
    required: ['word'],
};

const PAYLOAD_SCHEMA = {
    type: 'object',
    properties: {
        language: { type: 'string' },
        duration: { type: 'number' },
        segments: {
            type: 'array',
            items: {
                type: 'object',
                properties: {
                    start: { type: ['number', 'null'] },
                    end: { type: ['number', 'null'] },
                    text: { type: 'string' },
                    avg_logprob: { type: 'number' },
                    words: { type: 'array', items: WORD_SCHEMA },
                },
                required: ['text'],
            },
        },
        words: { type: 'array', items: WORD_SCHEMA },
    },
};

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validatePayload = ajv.compile<RawTranscriptionPayload>(PAYLOAD_SCHEMA);

const LANGUAGE_NAMES: Record<string, Language> = {
    th: 'th',
    thai: 'th',
    en: 'en',
    english: 'en',
};

/**
 * Converts a speech-to-text response body into a TranscriptionResult.
 *
 * Handles the OpenAI/Groq `verbose_json` shape (segments plus a flat word list),
 * the local faster-whisper shape (segments with embedded words) and bare word lists.
 * The variant follows from which arrays are present; a body with neither is an empty
 * transcription. Missing or null times become NaN and are dropped by the normalizer.
 * `requestedLanguage` stands in when the response does not name a supported language.
 */
export function parseTranscriptionPayload(data: unknown, requestedLanguage?: Language): TranscriptionResult {
    if (!validatePayload(data)) {
        throw new Error(`Malformed transcription response: ${ajv.errorsText(validatePayload.errors)}`);
    }

    const metadata = {
        language: (data.language ? LANGUAGE_NAMES[data.language.toLowerCase()] : undefined) ?? requestedLanguage,
        durationSeconds: data.duration,
    };

    const words = data.words ? spaceWords(data.words.map(toWord), metadata.language) : undefined;

    if (data.segments && words) {
        return fromVerboseJson(data.segments.map(toSegment), words, metadata);
    }
    if (data.segments) {
        return fromSegments(data.segments.map(toSegment), metadata);
    }
    if (words) {
        return fromWordTimestamps(words, metadata);
    }
    return fromSegments([], metadata);
}

function toTime(value: number | null | undefined): number {
    return value ?? Number.NaN;
}

/**
 * Flat word lists from hosted APIs carry bare words; tokens are joined verbatim,
 * so space-delimited languages need the separator restored.
 */
function spaceWords(words: TranscribedWord[], language: Language | undefined): TranscribedWord[] {
    if (language !== 'en' || words.some((w) => /^\s/.test(w.word))) {
        return words;
    }
    return words.map((w, index) => (index === 0 ? w : { ...w, word: ` ${w.word}` }));
}

function toWord(raw: RawWord): TranscribedWord {
    return {
        word: raw.word,
        start: toTime(raw.start),
        end: toTime(raw.end),
        probability: raw.probability,
    };
}

function toSegment(raw: RawSegment): TranscribedSegment {
    return {
        start: toTime(raw.start),
        end: toTime(raw.end),
        text: raw.text,
        avgLogprob: raw.avg_logprob,
        words: raw.words?.map(toWord),
    };
}
