import fs from 'fs';
import ffmpeg from 'fluent-ffmpeg';
import { IAudioDurationProbe } from '../../domain/ports/IAudioDurationProbe';

/**
 * Reads the container duration of an audio file with ffprobe.
 * Resolves null instead of failing: the caller decides what an unknown duration means.
 */
export class FfprobeAudioDurationProbe implements IAudioDurationProbe {
    constructor(ffprobePath?: string) {
        if (ffprobePath) {
            ffmpeg.setFfprobePath(ffprobePath);
        }
    }

    async getDurationSeconds(audioPath: string): Promise<number | null> {
        if (!audioPath || !fs.existsSync(audioPath)) {
            console.warn(`[AudioProbe] Audio file not found: ${audioPath}`);
            return null;
        }

        return new Promise((resolve) => {
            ffmpeg.ffprobe(audioPath, (err: Error | null, metadata) => {
                if (err) {
                    console.warn(`[AudioProbe] ffprobe failed for ${audioPath}: ${err.message}`);
                    resolve(null);
                    return;
                }
                const duration = metadata?.format?.duration;
                if (typeof duration !== 'number' || !Number.isFinite(duration) || duration < 0) {
                    console.warn(`[AudioProbe] No usable duration reported for ${audioPath}`);
                    resolve(null);
                    return;
                }
                resolve(duration);
            });
        });
    }
}
