import * as fs from 'fs';
import { encode } from 'html-entities';
import { AudioArtifact } from '@/domain/article';
import { DeliveryError } from '@/domain/errors';
import { TelegramConfig } from '@/domain/source-config';
import { degraded, errorMessage, ok, StageResult } from '@/domain/stage-result';
import { FetchFn, USER_AGENT } from '@/utils/http';
import { logger } from '@/utils/logger';
import { MessageLabels, messageLabels } from './message-labels';

export type DeliveryKind = 'audio' | 'text';

export interface DeliveryChannel {
    announce(text: string): Promise<void>;
    /**
     * Posts the audio with a title/link caption. Falls back to a text-only
     * notice (`degraded('text')`) when the audio post is rejected.
     * Throws `DeliveryError` only if the fallback fails too.
     */
    deliver(title: string, link: string, audio: AudioArtifact): Promise<StageResult<DeliveryKind>>;
    deliverTextOnly(title: string, link: string): Promise<void>;
}

export function formatBatchHeader(
    sourceName: string,
    date: Date,
    count: number,
    labels: MessageLabels,
): string {
    const [year, month, day] = date.toISOString().slice(0, 10).split('-');
    return `━━━━━━━━━━━━━━━━━━━━\n${encode(sourceName)}\n📅 ${day}.${month}.${year} · ${labels.articleCount(count)}`;
}

export function formatCaption(title: string, link: string, labels: MessageLabels): string {
    return `<b>${encode(title)}</b>\n\n🔗 <a href="${encode(link)}">${encode(labels.readFullArticle)}</a>`;
}

export function formatTextNotice(title: string, link: string): string {
    return `📄 <b>${encode(title)}</b>\n\n🔗 ${encode(link)}`;
}

export class TelegramDeliveryChannel implements DeliveryChannel {
    private readonly fetchFn: FetchFn;

    constructor(
        private readonly config: TelegramConfig,
        private readonly labels: MessageLabels = messageLabels('en'),
        fetchFn?: FetchFn,
    ) {
        this.fetchFn = fetchFn ?? fetch;
    }

    async announce(text: string): Promise<void> {
        await this.sendText(text);
    }

    async deliver(
        title: string,
        link: string,
        audio: AudioArtifact,
    ): Promise<StageResult<DeliveryKind>> {
        try {
            await this.sendAudio(formatCaption(title, link, this.labels), audio);
            logger.info('Audio delivered', { title, encoding: audio.encoding });
            return ok('audio');
        } catch (error) {
            const reason = errorMessage(error);
            logger.warn('Audio delivery failed, sending text notice', { title, error: reason });
            await this.deliverTextOnly(title, link);
            return degraded('text', reason);
        }
    }

    async deliverTextOnly(title: string, link: string): Promise<void> {
        await this.sendText(formatTextNotice(title, link));
    }

    private async sendText(text: string): Promise<void> {
        const response = await this.fetchFn(this.endpoint('sendMessage'), {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', 'User-Agent': USER_AGENT },
            body: JSON.stringify({
                chat_id: this.config.chat_id,
                text,
                parse_mode: 'HTML',
                disable_web_page_preview: true,
            }),
            signal: AbortSignal.timeout(30000),
        });

        await this.ensureOk(response, 'sendMessage');
    }

    private async sendAudio(caption: string, audio: AudioArtifact): Promise<void> {
        const bytes = await fs.promises.readFile(audio.path);

        const form = new FormData();
        form.append('chat_id', this.config.chat_id);
        form.append('caption', caption);
        form.append('parse_mode', 'HTML');
        form.append('audio', new Blob([new Uint8Array(bytes)], { type: 'audio/mpeg' }), 'news.mp3');

        const response = await this.fetchFn(this.endpoint('sendAudio'), {
            method: 'POST',
            headers: { 'User-Agent': USER_AGENT },
            body: form,
            signal: AbortSignal.timeout(60000),
        });

        await this.ensureOk(response, 'sendAudio');
    }

    private async ensureOk(response: Response, method: string): Promise<void> {
        if (response.ok) {
            return;
        }
        const errorText = (await response.text()).slice(0, 200);
        logger.error('Telegram API error', { method, status: response.status, error: errorText });
        throw new DeliveryError(
            `Telegram ${method} failed: ${response.status} - ${errorText}`,
            response.status,
        );
    }

    private endpoint(method: string): string {
        return `${this.config.api_base_url}/bot${this.config.bot_token}/${method}`;
    }
}
