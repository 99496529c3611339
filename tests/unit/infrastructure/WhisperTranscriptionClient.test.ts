import fs from 'fs';
import os from 'os';
import path from 'path';
import nock from 'nock';
import {
    GROQ_WHISPER,
    WhisperTranscriptionClient,
} from '../../../src/infrastructure/transcription/WhisperTranscriptionClient';

describe('WhisperTranscriptionClient', () => {
    const apiKey = 'test-api-key';
    let tempDir: string;
    let audioPath: string;

    const verboseResponse = {
        task: 'transcribe',
        language: 'english',
        duration: 2.4,
        text: 'Hello world.',
        segments: [{ id: 0, start: 0, end: 2.4, text: ' Hello world.', avg_logprob: -0.2 }],
        words: [
            { word: 'Hello', start: 0, end: 0.8 },
            { word: 'world.', start: 0.9, end: 2.4 },
        ],
    };

    beforeAll(() => {
        nock.disableNetConnect();
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    beforeEach(() => {
        nock.cleanAll();
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'whisper-test-'));
        audioPath = path.join(tempDir, 'narration.mp3');
        fs.writeFileSync(audioPath, Buffer.from('fake audio bytes'));
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });
    });

    afterEach(() => {
        nock.cleanAll();
        fs.rmSync(tempDir, { recursive: true, force: true });
        jest.restoreAllMocks();
    });

    it('requires an API key', () => {
        expect(() => new WhisperTranscriptionClient('')).toThrow('OpenAI API key is required');
        expect(() => new WhisperTranscriptionClient('', { provider: GROQ_WHISPER })).toThrow('Groq API key is required');
    });

    it('rejects a missing audio file before calling the API', async () => {
        const client = new WhisperTranscriptionClient(apiKey);
        await expect(client.transcribe(path.join(tempDir, 'missing.mp3'), { language: 'en' }))
            .rejects.toThrow('Audio file not found');
    });

    it('requests verbose JSON with word and segment timestamps', async () => {
        let requestBody = '';
        const scope = nock('https://api.openai.com', {
            reqheaders: { authorization: `Bearer ${apiKey}` },
        })
            .post('/v1/audio/transcriptions', (body) => {
                requestBody = String(body);
                return true;
            })
            .reply(200, verboseResponse);

        const client = new WhisperTranscriptionClient(apiKey);
        const result = await client.transcribe(audioPath, { language: 'en', prompt: 'Product names' });

        expect(scope.isDone()).toBe(true);
        expect(requestBody).toContain('verbose_json');
        expect(requestBody).toContain('whisper-1');
        expect(requestBody).toContain('timestamp_granularities[]');
        expect(requestBody).toContain('Product names');
        expect(result.kind).toBe('verbose');
        if (result.kind !== 'verbose') return;
        expect(result.language).toBe('en');
        expect(result.durationSeconds).toBe(2.4);
        expect(result.words.map((w) => w.word)).toEqual(['Hello', ' world.']);
        expect(result.segments[0].avgLogprob).toBe(-0.2);
    });

    it('sends the Groq model to the Groq endpoint', async () => {
        let requestBody = '';
        const scope = nock('https://api.groq.com')
            .post('/openai/v1/audio/transcriptions', (body) => {
                requestBody = String(body);
                return true;
            })
            .reply(200, { ...verboseResponse, language: 'thai' });

        const client = new WhisperTranscriptionClient(apiKey, { provider: GROQ_WHISPER });
        const result = await client.transcribe(audioPath, { language: 'th' });

        expect(scope.isDone()).toBe(true);
        expect(requestBody).toContain('whisper-large-v3');
        expect(result.language).toBe('th');
    });

    it('retries on rate limiting and then succeeds', async () => {
        const scope = nock('https://api.openai.com')
            .post('/v1/audio/transcriptions')
            .reply(429, { error: { message: 'Rate limit reached' } })
            .post('/v1/audio/transcriptions')
            .reply(200, verboseResponse);

        const client = new WhisperTranscriptionClient(apiKey, { retryDelayMs: 1 });
        const result = await client.transcribe(audioPath, { language: 'en' });

        expect(scope.isDone()).toBe(true);
        expect(result.kind).toBe('verbose');
        expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it('gives up after the last attempt with the API error message', async () => {
        nock('https://api.openai.com')
            .post('/v1/audio/transcriptions')
            .times(3)
            .reply(503, { error: { message: 'Service unavailable' } });

        const client = new WhisperTranscriptionClient(apiKey, { retryDelayMs: 1 });

        await expect(client.transcribe(audioPath, { language: 'en' }))
            .rejects.toThrow('Transcription failed: Service unavailable');
    });

    it('does not retry client errors', async () => {
        const scope = nock('https://api.openai.com')
            .post('/v1/audio/transcriptions')
            .reply(401, { error: { message: 'Invalid API key' } });

        const client = new WhisperTranscriptionClient(apiKey, { retryDelayMs: 1 });

        await expect(client.transcribe(audioPath, { language: 'en' }))
            .rejects.toThrow('Transcription failed: Invalid API key');
        expect(scope.isDone()).toBe(true);
    });

    it('returns an empty transcription for a response without timing', async () => {
        nock('https://api.openai.com')
            .post('/v1/audio/transcriptions')
            .reply(200, { text: 'Hello world.' });

        const client = new WhisperTranscriptionClient(apiKey);

        await expect(client.transcribe(audioPath, { language: 'en' })).resolves.toEqual({
            kind: 'segments',
            segments: [],
            language: 'en',
        });
    });

    it('gives up on a request that exceeds the timeout', async () => {
        nock('https://api.openai.com')
            .post('/v1/audio/transcriptions')
            .delay(500)
            .reply(200, verboseResponse);

        const client = new WhisperTranscriptionClient(apiKey, { timeoutMs: 50, retryDelayMs: 1 });

        await expect(client.transcribe(audioPath, { language: 'en' }))
            .rejects.toThrow('Transcription failed: timeout of 50ms exceeded');
    });
});
