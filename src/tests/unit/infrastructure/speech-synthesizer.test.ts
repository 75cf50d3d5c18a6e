import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { GoogleSpeechSynthesizer } from '@/infrastructure/speech-synthesizer';
import { SynthesisError } from '@/domain/errors';

const getAllAudioBase64Mock = jest.fn();

jest.mock('google-tts-api', () => ({
    getAllAudioBase64: (...args: unknown[]) => getAllAudioBase64Mock(...args),
}));

const speechConfig = { language: 'ru', language_name: 'Russian', attempts: 2 };

describe('GoogleSpeechSynthesizer', () => {
    let dir: string;

    beforeEach(async () => {
        getAllAudioBase64Mock.mockReset();
        dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'tts-test-'));
    });

    afterEach(async () => {
        await fs.promises.rm(dir, { recursive: true, force: true });
    });

    it('writes the concatenated audio segments to the target path', async () => {
        getAllAudioBase64Mock.mockResolvedValue([
            { shortText: 'Part one.', base64: Buffer.from('AAA').toString('base64') },
            { shortText: 'Part two.', base64: Buffer.from('BBB').toString('base64') },
        ]);
        const target = path.join(dir, 'speech.mp3');

        const result = await new GoogleSpeechSynthesizer(speechConfig).synthesize('Part one. Part two.', target);

        expect(result).toEqual({ status: 'ok', value: { path: target, encoding: 'speech' } });
        expect(await fs.promises.readFile(target, 'utf8')).toBe('AAABBB');
        expect(getAllAudioBase64Mock).toHaveBeenCalledWith(
            'Part one. Part two.',
            expect.objectContaining({ lang: 'ru', slow: false }),
        );
    });

    it('retries once before succeeding', async () => {
        getAllAudioBase64Mock
            .mockRejectedValueOnce(new Error('socket hang up'))
            .mockResolvedValueOnce([{ shortText: 'Hi', base64: Buffer.from('CC').toString('base64') }]);
        const target = path.join(dir, 'speech.mp3');

        const result = await new GoogleSpeechSynthesizer(speechConfig).synthesize('Hi', target);

        expect(result.status).toBe('ok');
        expect(getAllAudioBase64Mock).toHaveBeenCalledTimes(2);
    });

    it('reports a fatal result after every attempt fails', async () => {
        getAllAudioBase64Mock.mockRejectedValue(new Error('403 Forbidden'));
        const target = path.join(dir, 'speech.mp3');

        const result = await new GoogleSpeechSynthesizer(speechConfig).synthesize('Hi', target);

        expect(getAllAudioBase64Mock).toHaveBeenCalledTimes(2);
        expect(result.status).toBe('fatal');
        if (result.status === 'fatal') {
            expect(result.error).toBeInstanceOf(SynthesisError);
            expect(result.error.message).toBe('Speech synthesis failed: 403 Forbidden');
        }
        expect(fs.existsSync(target)).toBe(false);
    });
});
