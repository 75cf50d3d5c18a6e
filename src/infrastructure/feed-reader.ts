import Parser from 'rss-parser';
import { Article } from '@/domain/article';
import { FeedSource } from '@/domain/source-config';
import { USER_AGENT } from '@/utils/http';
import { logger } from '@/utils/logger';

export const BODY_MAX_CHARS = 4000;
export const UNTITLED = 'Untitled';

export interface FeedReaderOptions {
    lookbackHours: number;
    maxArticlesPerSource: number;
    timeoutMs?: number;
    now?: () => Date;
}

export interface FeedReader {
    fetchArticles(source: FeedSource): Promise<Article[]>;
}

type FeedItem = {
    updated?: string;
};

type ParsedItem = FeedItem & Parser.Item;

export class RssFeedReader implements FeedReader {
    private readonly rssParser: Parser<Record<string, unknown>, FeedItem>;
    private readonly now: () => Date;

    constructor(private readonly options: FeedReaderOptions) {
        this.rssParser = new Parser<Record<string, unknown>, FeedItem>({
            timeout: options.timeoutMs ?? 10000,
            headers: {
                'User-Agent': USER_AGENT,
            },
            customFields: {
                item: ['updated'],
            },
        });
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Returns the source's recent items in feed order, at most `maxArticlesPerSource`.
     * A feed that cannot be fetched or parsed yields an empty list.
     */
    async fetchArticles(source: FeedSource): Promise<Article[]> {
        logger.info('Fetching RSS feed', { source: source.name, url: source.url });

        let items: ParsedItem[];
        try {
            const feed = await this.rssParser.parseURL(source.url);
            items = feed.items || [];
        } catch (error) {
            logger.error('Failed to parse RSS feed', {
                source: source.name,
                url: source.url,
                error: error instanceof Error ? error.message : String(error),
            });
            return [];
        }

        const cutoffTime = this.now().getTime() - this.options.lookbackHours * 60 * 60 * 1000;
        const articles: Article[] = [];

        for (const item of items) {
            const publishedAt = this.resolveTimestamp(item);

            // Undated items cannot prove they are recent.
            if (!publishedAt || publishedAt.getTime() < cutoffTime) {
                logger.debug('Item outside lookback window, skipping', {
                    source: source.name,
                    title: item.title,
                    publishedAt: publishedAt?.toISOString(),
                });
                continue;
            }

            articles.push({
                title: item.title?.trim() || UNTITLED,
                link: item.link?.trim() || '',
                body: this.extractBody(item).slice(0, BODY_MAX_CHARS),
                publishedAt,
            });

            if (articles.length >= this.options.maxArticlesPerSource) {
                break;
            }
        }

        logger.info('RSS feed processed', {
            source: source.name,
            totalItems: items.length,
            eligibleItems: articles.length,
        });

        return articles;
    }

    private resolveTimestamp(item: ParsedItem): Date | null {
        // Publication date wins over last-updated.
        for (const candidate of [item.isoDate, item.pubDate, item.updated]) {
            if (!candidate) {
                continue;
            }
            const parsed = new Date(candidate);
            if (!Number.isNaN(parsed.getTime())) {
                return parsed;
            }
        }
        return null;
    }

    private extractBody(item: ParsedItem): string {
        return item.summary || item.contentSnippet || item.content || '';
    }
}
