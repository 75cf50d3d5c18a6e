import * as fs from 'fs';
import { getAllAudioBase64 } from 'google-tts-api';
import { AudioArtifact } from '@/domain/article';
import { SynthesisError } from '@/domain/errors';
import { SpeechConfig } from '@/domain/source-config';
import { errorMessage, fatal, ok, StageResult } from '@/domain/stage-result';
import { logger } from '@/utils/logger';

/**
 * Converts text to an MP3 file in the base voice.
 * Returns `ok` with the written artifact or `fatal` once every attempt failed.
 */
export interface SpeechSynthesizer {
    synthesize(text: string, targetPath: string): Promise<StageResult<AudioArtifact>>;
}

export class GoogleSpeechSynthesizer implements SpeechSynthesizer {
    constructor(
        private readonly config: SpeechConfig,
        private readonly timeoutMs = 10000,
    ) {}

    async synthesize(text: string, targetPath: string): Promise<StageResult<AudioArtifact>> {
        let lastError = '';

        for (let attempt = 1; attempt <= this.config.attempts; attempt++) {
            try {
                await this.writeSpeech(text, targetPath);
                return ok({ path: targetPath, encoding: 'speech' });
            } catch (error) {
                lastError = errorMessage(error);
                logger.warn('Speech synthesis attempt failed', {
                    attempt,
                    attempts: this.config.attempts,
                    error: lastError,
                });
            }
        }

        return fatal(new SynthesisError(`Speech synthesis failed: ${lastError}`));
    }

    private async writeSpeech(text: string, targetPath: string): Promise<void> {
        // The engine caps each request at 200 characters; segments are plain MP3 frames
        // and can be concatenated.
        const segments = await getAllAudioBase64(text, {
            lang: this.config.language,
            slow: false,
            host: 'https://translate.google.com',
            timeout: this.timeoutMs,
            splitPunct: ',.?!;:',
        });

        if (segments.length === 0) {
            throw new Error('Speech engine returned no audio');
        }

        const audio = Buffer.concat(segments.map((segment) => Buffer.from(segment.base64, 'base64')));
        await fs.promises.writeFile(targetPath, audio);
    }
}
