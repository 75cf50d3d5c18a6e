import { BriefingService } from '@/application/briefing-service';
import { BriefingConfiguration } from '@/domain/source-config';
import { ExecFileCommandRunner } from '@/infrastructure/command-runner';
import { RssFeedReader } from '@/infrastructure/feed-reader';
import { OpenAISummarizer } from '@/infrastructure/openai-summarizer';
import { GoogleSpeechSynthesizer } from '@/infrastructure/speech-synthesizer';
import { messageLabels } from '@/infrastructure/message-labels';
import { TelegramDeliveryChannel } from '@/infrastructure/telegram-channel';
import { VoiceModelCache } from '@/infrastructure/voice-model-cache';
import { RvcVoiceConverter } from '@/infrastructure/voice-converter';

export function buildBriefingService(config: BriefingConfiguration): BriefingService {
    return new BriefingService(config, {
        feedReader: new RssFeedReader({
            lookbackHours: config.scan_config.lookback_hours,
            maxArticlesPerSource: config.scan_config.max_articles_per_source,
        }),
        summarizer: new OpenAISummarizer(config.summarizer, config.speech),
        synthesizer: new GoogleSpeechSynthesizer(config.speech),
        voiceModelCache: new VoiceModelCache({
            cacheDir: config.voice_conversion.cache_dir,
            modelUrl: config.voice_conversion.model_url,
        }),
        voiceConverter: new RvcVoiceConverter(config.voice_conversion, new ExecFileCommandRunner()),
        channel: new TelegramDeliveryChannel(config.telegram, messageLabels(config.speech.language)),
    });
}
