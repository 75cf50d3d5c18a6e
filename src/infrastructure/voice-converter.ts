import * as fs from 'fs';
import * as path from 'path';
import { AudioArtifact, VoiceModelPackage } from '@/domain/article';
import { VoiceConversionError } from '@/domain/errors';
import { VoiceConversionConfig } from '@/domain/source-config';
import { degraded, errorMessage, ok, StageResult } from '@/domain/stage-result';
import { CommandRunner } from './command-runner';
import { logger } from '@/utils/logger';

/**
 * Changes the timbre of synthesized speech to the target voice.
 * Returns `ok` with the converted artifact, or `degraded` carrying the
 * unconverted input when any step fails.
 */
export interface VoiceConverter {
    convert(
        input: AudioArtifact,
        outputPath: string,
        model: VoiceModelPackage,
    ): Promise<StageResult<AudioArtifact>>;
}

type EngineConfig = Pick<VoiceConversionConfig, 'command' | 'args' | 'device'>;

export class RvcVoiceConverter implements VoiceConverter {
    constructor(
        private readonly engine: EngineConfig,
        private readonly runner: CommandRunner,
        private readonly ffmpegPath = 'ffmpeg',
    ) {}

    async convert(
        input: AudioArtifact,
        outputPath: string,
        model: VoiceModelPackage,
    ): Promise<StageResult<AudioArtifact>> {
        const base = path.join(path.dirname(input.path), path.parse(input.path).name);
        const wavIn = `${base}_in.wav`;
        const wavOut = `${base}_rvc.wav`;

        try {
            await this.step('decode', this.ffmpegPath, ['-y', '-i', input.path, wavIn]);
            await this.step('infer', this.engine.command, this.inferenceArgs(wavIn, wavOut, model));
            await this.step('encode', this.ffmpegPath, [
                '-y',
                '-i',
                wavOut,
                '-codec:a',
                'libmp3lame',
                '-qscale:a',
                '4',
                outputPath,
            ]);

            logger.info('Voice conversion succeeded', { outputPath });
            return ok({ path: outputPath, encoding: 'converted' });
        } catch (error) {
            const reason = errorMessage(error);
            logger.warn('Voice conversion failed, using unconverted speech', { error: reason });
            await removeQuietly(outputPath);
            return degraded(input, reason);
        } finally {
            await removeQuietly(wavIn);
            await removeQuietly(wavOut);
        }
    }

    private inferenceArgs(wavIn: string, wavOut: string, model: VoiceModelPackage): string[] {
        const args = [...this.engine.args, '-i', wavIn, '-o', wavOut, '-mp', model.weightsPath];
        if (model.indexPath) {
            args.push('-ip', model.indexPath);
        }
        args.push('-de', this.engine.device);
        return args;
    }

    private async step(name: string, command: string, args: readonly string[]): Promise<void> {
        try {
            await this.runner.run(command, args);
        } catch (error) {
            throw new VoiceConversionError(`Voice conversion ${name} step failed: ${errorMessage(error)}`, name);
        }
    }
}

async function removeQuietly(filePath: string): Promise<void> {
    try {
        await fs.promises.rm(filePath, { force: true });
    } catch (error) {
        logger.warn('Failed to remove intermediate audio file', {
            path: filePath,
            error: errorMessage(error),
        });
    }
}
