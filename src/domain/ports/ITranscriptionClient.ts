import { Language } from '../entities/Language';
import { TranscriptionResult } from '../entities/TranscriptionResult';

export interface TranscriptionOptions {
    language: Language;
    /** Context prompt to improve recognition of domain terms */
    prompt?: string;
}

/**
 * ITranscriptionClient - Port for speech-to-text backends that return timing.
 * Implementations: WhisperTranscriptionClient, LocalWhisperServerClient
 */
export interface ITranscriptionClient {
    /**
     * Transcribes a local audio file with segment and, where supported, word timing.
     * @param audioPath Path to the audio file
     */
    transcribe(audioPath: string, options: TranscriptionOptions): Promise<TranscriptionResult>;
}
