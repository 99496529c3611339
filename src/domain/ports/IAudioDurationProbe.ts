/**
 * IAudioDurationProbe - Port for reading the decoded duration of an audio file.
 * Implementations: FfprobeAudioDurationProbe
 */
export interface IAudioDurationProbe {
    /**
     * @returns Duration in seconds, or null when the file or the probe backend is unavailable
     */
    getDurationSeconds(audioPath: string): Promise<number | null>;
}
