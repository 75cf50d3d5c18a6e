import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CommandRunner } from '@/infrastructure/command-runner';
import { RvcVoiceConverter } from '@/infrastructure/voice-converter';
import { AudioArtifact, VoiceModelPackage } from '@/domain/article';

const engine = { command: 'python', args: ['-m', 'rvc_python', 'cli'], device: 'cpu' };

/**
 * Pretends to be ffmpeg and the conversion engine by writing each step's output file.
 */
class FakeRunner implements CommandRunner {
    readonly calls: Array<{ command: string; args: readonly string[] }> = [];

    constructor(private readonly failOn?: string) {}

    async run(command: string, args: readonly string[]): Promise<void> {
        this.calls.push({ command, args });
        if (this.failOn === command) {
            throw new Error(`${command} crashed`);
        }
        const output = command === 'ffmpeg' ? args[args.length - 1] : args[args.indexOf('-o') + 1];
        await fs.promises.writeFile(output, `${command} output`);
    }
}

describe('RvcVoiceConverter', () => {
    let dir: string;
    let input: AudioArtifact;
    let output: string;
    const model: VoiceModelPackage = { weightsPath: '/models/voice.pth', indexPath: '/models/voice.index' };

    beforeEach(async () => {
        dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'rvc-test-'));
        input = { path: path.join(dir, 'speech.mp3'), encoding: 'speech' };
        output = path.join(dir, 'speech_converted.mp3');
        await fs.promises.writeFile(input.path, 'speech');
    });

    afterEach(async () => {
        await fs.promises.rm(dir, { recursive: true, force: true });
    });

    it('decodes, converts and re-encodes, then removes the intermediate files', async () => {
        const runner = new FakeRunner();
        const converter = new RvcVoiceConverter(engine, runner);

        const result = await converter.convert(input, output, model);

        const wavIn = path.join(dir, 'speech_in.wav');
        const wavOut = path.join(dir, 'speech_rvc.wav');
        expect(result).toEqual({ status: 'ok', value: { path: output, encoding: 'converted' } });
        expect(runner.calls).toEqual([
            { command: 'ffmpeg', args: ['-y', '-i', input.path, wavIn] },
            {
                command: 'python',
                args: [
                    '-m',
                    'rvc_python',
                    'cli',
                    '-i',
                    wavIn,
                    '-o',
                    wavOut,
                    '-mp',
                    '/models/voice.pth',
                    '-ip',
                    '/models/voice.index',
                    '-de',
                    'cpu',
                ],
            },
            {
                command: 'ffmpeg',
                args: ['-y', '-i', wavOut, '-codec:a', 'libmp3lame', '-qscale:a', '4', output],
            },
        ]);
        expect(fs.existsSync(wavIn)).toBe(false);
        expect(fs.existsSync(wavOut)).toBe(false);
        expect(fs.existsSync(output)).toBe(true);
    });

    it('omits the index argument when the model has no index', async () => {
        const runner = new FakeRunner();
        const converter = new RvcVoiceConverter(engine, runner);

        await converter.convert(input, output, { weightsPath: '/models/voice.pth', indexPath: null });

        expect(runner.calls[1].args).not.toContain('-ip');
    });

    it('falls back to the unconverted speech when inference fails', async () => {
        const runner = new FakeRunner('python');
        const converter = new RvcVoiceConverter(engine, runner);

        const result = await converter.convert(input, output, model);

        expect(result).toEqual({
            status: 'degraded',
            value: input,
            reason: 'Voice conversion infer step failed: python crashed',
        });
        expect(runner.calls).toHaveLength(2);
        expect(fs.existsSync(path.join(dir, 'speech_in.wav'))).toBe(false);
        expect(fs.existsSync(output)).toBe(false);
        expect(fs.existsSync(input.path)).toBe(true);
    });

    it('falls back when ffmpeg is unavailable', async () => {
        const converter = new RvcVoiceConverter(engine, new FakeRunner('ffmpeg'));

        const result = await converter.convert(input, output, model);

        expect(result.status).toBe('degraded');
        expect(fs.readdirSync(dir)).toEqual(['speech.mp3']);
    });
});
