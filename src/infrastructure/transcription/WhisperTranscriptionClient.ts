import axios from 'axios';
import FormData from 'form-data';
import * as fs from 'fs';
import { ITranscriptionClient, TranscriptionOptions } from '../../domain/ports/ITranscriptionClient';
import { TranscriptionResult } from '../../domain/entities/TranscriptionResult';
import { describeHttpError, isRetryableHttpError, withRetry } from '../http/RetryUtils';
import { parseTranscriptionPayload } from './TranscriptionPayloadParser';

export interface WhisperProvider {
    /** Name used in log lines */
    name: string;
    baseUrl: string;
    model: string;
}

export const OPENAI_WHISPER: WhisperProvider = {
    name: 'OpenAI',
    baseUrl: 'https://api.openai.com/v1',
    model: 'whisper-1',
};

export const GROQ_WHISPER: WhisperProvider = {
    name: 'Groq',
    baseUrl: 'https://api.groq.com/openai/v1',
    model: 'whisper-large-v3',
};

export interface WhisperClientOptions {
    provider?: WhisperProvider;
    /** Overrides the provider's default model */
    model?: string;
    maxRetries?: number;
    /** First retry delay; later retries double it */
    retryDelayMs?: number;
    /** Per-attempt request timeout */
    timeoutMs?: number;
}

/**
 * Whisper transcription over an OpenAI-compatible /audio/transcriptions endpoint.
 * Requests verbose_json with word and segment timestamps.
 */
export class WhisperTranscriptionClient implements ITranscriptionClient {
    private readonly apiKey: string;
    private readonly provider: WhisperProvider;
    private readonly model: string;
    private readonly maxRetries: number;
    private readonly retryDelayMs: number;
    private readonly timeoutMs: number;

    constructor(apiKey: string, options: WhisperClientOptions = {}) {
        const provider = options.provider ?? OPENAI_WHISPER;
        if (!apiKey) {
            throw new Error(`${provider.name} API key is required`);
        }
        this.apiKey = apiKey;
        this.provider = provider;
        this.model = options.model || provider.model;
        this.maxRetries = options.maxRetries ?? 3;
        this.retryDelayMs = options.retryDelayMs ?? 2000;
        this.timeoutMs = options.timeoutMs ?? 120000;
    }

    async transcribe(audioPath: string, options: TranscriptionOptions): Promise<TranscriptionResult> {
        if (!audioPath) {
            throw new Error('Audio path is required');
        }
        if (!fs.existsSync(audioPath)) {
            throw new Error(`Audio file not found: ${audioPath}`);
        }

        const sizeMb = fs.statSync(audioPath).size / 1024 / 1024;
        console.log(`[Whisper] Sending ${sizeMb.toFixed(1)}MB to ${this.provider.name} (${this.model}, ${options.language})...`);

        try {
            const response = await withRetry(
                () => {
                    // A fresh form per attempt: the file stream is consumed by each upload
                    const formData = this.buildForm(audioPath, options);
                    return axios.post<unknown>(`${this.provider.baseUrl}/audio/transcriptions`, formData, {
                        headers: {
                            ...formData.getHeaders(),
                            Authorization: `Bearer ${this.apiKey}`,
                        },
                        maxContentLength: Infinity,
                        maxBodyLength: Infinity,
                        timeout: this.timeoutMs,
                    });
                },
                {
                    maxAttempts: this.maxRetries,
                    initialBackoffMs: this.retryDelayMs,
                    isRetryable: isRetryableHttpError,
                    onRetry: (attempt, error, delay) => {
                        const status = axios.isAxiosError(error) ? error.response?.status : undefined;
                        console.warn(`[Whisper] Transient error (${status}), retrying in ${delay / 1000}s (Attempt ${attempt}/${this.maxRetries})...`);
                    },
                }
            );

            const result = parseTranscriptionPayload(response.data, options.language);
            console.log(`[Whisper] ${this.provider.name} returned ${result.kind} timing`);
            return result;
        } catch (error) {
            const message = describeHttpError(error);
            console.error('[Whisper] Error:', message);
            throw new Error(`Transcription failed: ${message}`);
        }
    }

    private buildForm(audioPath: string, options: TranscriptionOptions): FormData {
        const formData = new FormData();
        formData.append('file', fs.createReadStream(audioPath));
        formData.append('model', this.model);
        formData.append('response_format', 'verbose_json');
        formData.append('timestamp_granularities[]', 'word');
        formData.append('timestamp_granularities[]', 'segment');
        formData.append('language', options.language);
        if (options.prompt) {
            formData.append('prompt', options.prompt);
        }
        return formData;
    }
}
