import { Article, AudioArtifact } from '@/domain/article';
import { BriefingReport, VoiceConversionMode } from '@/domain/briefing-report';
import { BriefingConfiguration, FeedSource } from '@/domain/source-config';
import { errorMessage } from '@/domain/stage-result';
import { FeedReader } from '@/infrastructure/feed-reader';
import { Summarizer } from '@/infrastructure/summarizer';
import { SpeechSynthesizer } from '@/infrastructure/speech-synthesizer';
import { VoiceModelProvider } from '@/infrastructure/voice-model-cache';
import { VoiceConverter } from '@/infrastructure/voice-converter';
import { MessageLabels, messageLabels } from '@/infrastructure/message-labels';
import { DeliveryChannel, formatBatchHeader } from '@/infrastructure/telegram-channel';
import { Sleep, sleep as defaultSleep } from '@/utils/delay';
import { TempWorkspace } from '@/utils/temp-workspace';
import { logger } from '@/utils/logger';

export interface BriefingDependencies {
    feedReader: FeedReader;
    summarizer: Summarizer;
    synthesizer: SpeechSynthesizer;
    voiceModelCache: VoiceModelProvider;
    voiceConverter: VoiceConverter;
    channel: DeliveryChannel;
    sleep?: Sleep;
    now?: () => Date;
    createWorkspace?: () => Promise<TempWorkspace>;
}

type ArticleOutcome = 'audio' | 'text' | 'failed';

interface RunCounters {
    audioDelivered: number;
    textOnly: number;
    failed: number;
}

export class BriefingService {
    private readonly sleep: Sleep;
    private readonly now: () => Date;
    private readonly createWorkspace: () => Promise<TempWorkspace>;
    private readonly labels: MessageLabels;

    constructor(
        private readonly config: BriefingConfiguration,
        private readonly deps: BriefingDependencies,
    ) {
        this.sleep = deps.sleep ?? defaultSleep;
        this.now = deps.now ?? (() => new Date());
        this.createWorkspace = deps.createWorkspace ?? (() => TempWorkspace.create());
        this.labels = messageLabels(config.speech.language);
    }

    async run(): Promise<BriefingReport> {
        logger.info('Starting security news briefing', {
            feeds: this.config.feeds.length,
            lookbackHours: this.config.scan_config.lookback_hours,
            maxArticlesPerSource: this.config.scan_config.max_articles_per_source,
        });

        const voiceMode = await this.resolveVoiceMode();
        const counters: RunCounters = { audioDelivered: 0, textOnly: 0, failed: 0 };

        for (const source of this.config.feeds) {
            await this.processSource(source, voiceMode, counters);
        }

        const report: BriefingReport = {
            sourcesProcessed: this.config.feeds.length,
            delivered: counters.audioDelivered + counters.textOnly,
            audioDelivered: counters.audioDelivered,
            textOnly: counters.textOnly,
            failed: counters.failed,
            voiceConversion: voiceMode.kind,
        };

        if (report.delivered === 0) {
            logger.info('No new articles found, nothing delivered', { ...report });
        } else {
            logger.info('Briefing completed', { ...report });
        }

        return report;
    }

    /**
     * Decided once per run; a failure here is never retried per article.
     */
    private async resolveVoiceMode(): Promise<VoiceConversionMode> {
        if (!this.config.voice_conversion.model_url) {
            logger.info('Voice conversion disabled: no model source configured');
            return { kind: 'disabled' };
        }

        try {
            const model = await this.deps.voiceModelCache.ensureAvailable();
            logger.info('Voice conversion enabled', { weightsPath: model.weightsPath });
            return { kind: 'enabled', model };
        } catch (error) {
            const reason = errorMessage(error);
            logger.error('Voice model unavailable, continuing with unconverted speech', {
                error: reason,
            });
            return { kind: 'failed', reason };
        }
    }

    private async processSource(
        source: FeedSource,
        voiceMode: VoiceConversionMode,
        counters: RunCounters,
    ): Promise<void> {
        const articles = await this.deps.feedReader.fetchArticles(source);
        if (articles.length === 0) {
            logger.info('No new articles for source', { source: source.name });
            return;
        }

        try {
            await this.deps.channel.announce(
                formatBatchHeader(source.name, this.now(), articles.length, this.labels),
            );
        } catch (error) {
            logger.warn('Failed to post batch header', { source: source.name, error: errorMessage(error) });
        }
        await this.sleep(this.config.pacing.header_delay_ms);

        for (const article of articles) {
            const outcome = await this.processArticle(article, voiceMode);
            if (outcome === 'audio') {
                counters.audioDelivered++;
            } else if (outcome === 'text') {
                counters.textOnly++;
            } else {
                counters.failed++;
            }
            await this.sleep(this.config.pacing.item_delay_ms);
        }
    }

    private async processArticle(
        article: Article,
        voiceMode: VoiceConversionMode,
    ): Promise<ArticleOutcome> {
        const { title, link } = article;
        logger.info('Processing article', { title: title.slice(0, 70), link });

        let workspace: TempWorkspace | null = null;
        try {
            workspace = await this.createWorkspace();

            const synopsis = await this.deps.summarizer.summarize(title, article.body);
            if (synopsis.status === 'fatal') {
                // Summarizers never report fatal; treat it like any unexpected error.
                throw synopsis.error;
            }

            const speech = await this.deps.synthesizer.synthesize(
                `${title}. ${synopsis.value}`,
                workspace.file('speech.mp3'),
            );
            if (speech.status === 'fatal') {
                logger.error('Speech synthesis failed, sending text-only notice', {
                    title,
                    error: speech.error.message,
                });
                await this.deps.channel.deliverTextOnly(title, link);
                return 'text';
            }

            let audio: AudioArtifact = speech.value;
            if (voiceMode.kind === 'enabled') {
                const converted = await this.deps.voiceConverter.convert(
                    audio,
                    workspace.file('speech_converted.mp3'),
                    voiceMode.model,
                );
                if (converted.status !== 'fatal') {
                    audio = converted.value;
                }
            }

            const delivery = await this.deps.channel.deliver(title, link, audio);
            if (delivery.status === 'fatal') {
                throw delivery.error;
            }
            return delivery.value;
        } catch (error) {
            logger.error('Failed to process article', { title, link, error: errorMessage(error) });
            return 'failed';
        } finally {
            await workspace?.dispose();
        }
    }
}
