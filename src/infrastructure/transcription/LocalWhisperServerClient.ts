import axios from 'axios';
import FormData from 'form-data';
import * as fs from 'fs';
import { ITranscriptionClient, TranscriptionOptions } from '../../domain/ports/ITranscriptionClient';
import { TranscriptionResult } from '../../domain/entities/TranscriptionResult';
import { describeHttpError, isRetryableHttpError, withRetry } from '../http/RetryUtils';
import { parseTranscriptionPayload } from './TranscriptionPayloadParser';

/**
 * Client for a self-hosted faster-whisper server.
 * POST /transcribe returns segments with embedded word timing.
 */
export class LocalWhisperServerClient implements ITranscriptionClient {
    private readonly serverUrl: string;
    private readonly model?: string;
    private readonly timeoutMs: number;
    private readonly retryDelayMs: number;

    constructor(serverUrl: string = 'http://localhost:9000', options: { model?: string; timeoutMs?: number; retryDelayMs?: number } = {}) {
        this.serverUrl = serverUrl.replace(/\/$/, '');
        this.model = options.model || undefined;
        this.timeoutMs = options.timeoutMs ?? 300000;
        this.retryDelayMs = options.retryDelayMs ?? 2000;
    }

    async transcribe(audioPath: string, options: TranscriptionOptions): Promise<TranscriptionResult> {
        if (!fs.existsSync(audioPath)) {
            throw new Error(`Audio file not found: ${audioPath}`);
        }

        console.log(`[LocalWhisper] Transcribing ${audioPath} (${options.language})...`);

        try {
            const response = await withRetry(
                () => {
                    const formData = new FormData();
                    formData.append('file', fs.createReadStream(audioPath));
                    formData.append('language', options.language);
                    formData.append('word_timestamps', 'true');
                    if (this.model) {
                        formData.append('model', this.model);
                    }
                    if (options.prompt) {
                        formData.append('initial_prompt', options.prompt);
                    }
                    return axios.post<unknown>(`${this.serverUrl}/transcribe`, formData, {
                        headers: formData.getHeaders(),
                        timeout: this.timeoutMs,
                        maxContentLength: Infinity,
                        maxBodyLength: Infinity,
                    });
                },
                {
                    initialBackoffMs: this.retryDelayMs,
                    isRetryable: isRetryableHttpError,
                    onRetry: (attempt, _error, delay) => {
                        console.warn(`[LocalWhisper] Server busy, retrying in ${delay / 1000}s (Attempt ${attempt})...`);
                    },
                }
            );
            return parseTranscriptionPayload(response.data, options.language);
        } catch (error) {
            const message = describeHttpError(error);
            console.error('[LocalWhisper] Error:', message);
            throw new Error(`Transcription failed: ${message}`);
        }
    }
}
