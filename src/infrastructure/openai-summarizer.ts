import OpenAI from 'openai';
import { Synopsis } from '@/domain/article';
import { SpeechConfig, SummarizerConfig } from '@/domain/source-config';
import { degraded, errorMessage, ok, StageResult } from '@/domain/stage-result';
import { Summarizer, fallbackSynopsis } from './summarizer';
import { logger } from '@/utils/logger';

/**
 * Summarizer backed by any OpenAI-compatible chat completions endpoint
 * (Groq by default, selected through `base_url`).
 */
export class OpenAISummarizer implements Summarizer {
    private readonly client: OpenAI;

    constructor(
        private readonly config: SummarizerConfig,
        private readonly speech: SpeechConfig,
    ) {
        this.client = new OpenAI({
            apiKey: config.api_key,
            baseURL: config.base_url,
            timeout: 60000,
            maxRetries: 0,
        });
    }

    async summarize(title: string, body: string): Promise<StageResult<Synopsis>> {
        const prompt = this.buildPrompt(title, body);

        logger.info('Requesting synopsis', { model: this.config.model, title });

        try {
            const response = await this.client.chat.completions.create({
                model: this.config.model,
                messages: [{ role: 'user', content: prompt }],
                max_tokens: this.config.max_tokens,
                temperature: this.config.temperature,
            });

            const content = response.choices[0]?.message?.content?.trim();
            if (!content) {
                throw new Error('Empty response from summarization service');
            }

            return ok(content);
        } catch (error) {
            const reason = errorMessage(error);
            logger.warn('Summarization failed, using title fallback', { title, error: reason });
            return degraded(fallbackSynopsis(title), reason);
        }
    }

    buildPrompt(title: string, body: string): string {
        const language = this.speech.language_name;

        return `You are a cybersecurity news presenter. Write a short summary of this article in ${language}, exactly 3 sentences. Use plain language without technical jargon and without introductions such as "Here is the summary:". Output only the summary text.

Title: ${title}

Text: ${body}`;
    }
}
