import { BODY_MAX_CHARS, RssFeedReader } from '@/infrastructure/feed-reader';
import { FeedSource } from '@/domain/source-config';

const parseURLMock = jest.fn();

jest.mock('rss-parser', () => {
    return jest.fn().mockImplementation(() => ({
        parseURL: parseURLMock,
    }));
});

const NOW = new Date('2025-03-10T12:00:00.000Z');
const HOUR = 60 * 60 * 1000;

function hoursAgo(hours: number): string {
    return new Date(NOW.getTime() - hours * HOUR).toISOString();
}

const source: FeedSource = {
    name: 'Test Security Feed',
    url: 'https://example.com/feed.xml',
};

function createReader(maxArticlesPerSource = 2): RssFeedReader {
    return new RssFeedReader({
        lookbackHours: 24,
        maxArticlesPerSource,
        now: () => NOW,
    });
}

describe('RssFeedReader', () => {
    beforeEach(() => {
        parseURLMock.mockReset();
    });

    it('returns a single recent entry', async () => {
        parseURLMock.mockResolvedValue({
            items: [
                {
                    title: 'Ransomware hits hospital',
                    link: 'https://example.com/ransomware',
                    isoDate: hoursAgo(2),
                    summary: 'Systems were encrypted overnight.',
                },
            ],
        });

        const result = await createReader().fetchArticles(source);

        expect(parseURLMock).toHaveBeenCalledWith('https://example.com/feed.xml');
        expect(result).toEqual([
            {
                title: 'Ransomware hits hospital',
                link: 'https://example.com/ransomware',
                body: 'Systems were encrypted overnight.',
                publishedAt: new Date(hoursAgo(2)),
            },
        ]);
    });

    it('caps the result at the per-source limit, keeping feed order', async () => {
        parseURLMock.mockResolvedValue({
            items: ['First', 'Second', 'Third', 'Fourth', 'Fifth'].map((title) => ({
                title,
                link: `https://example.com/${title.toLowerCase()}`,
                isoDate: hoursAgo(1),
            })),
        });

        const result = await createReader(2).fetchArticles(source);

        expect(result.map((article) => article.title)).toEqual(['First', 'Second']);
    });

    it('excludes items older than the lookback window', async () => {
        parseURLMock.mockResolvedValue({
            items: [
                { title: 'Old news', link: 'https://example.com/old', isoDate: hoursAgo(30) },
                { title: 'Fresh news', link: 'https://example.com/fresh', isoDate: hoursAgo(3) },
            ],
        });

        const result = await createReader().fetchArticles(source);

        expect(result.map((article) => article.title)).toEqual(['Fresh news']);
    });

    it('includes an item published exactly at the cutoff and excludes one just before it', async () => {
        const cutoff = NOW.getTime() - 24 * HOUR;
        parseURLMock.mockResolvedValue({
            items: [
                { title: 'Too old', link: 'https://example.com/a', isoDate: new Date(cutoff - 1).toISOString() },
                { title: 'On the boundary', link: 'https://example.com/b', isoDate: new Date(cutoff).toISOString() },
            ],
        });

        const result = await createReader().fetchArticles(source);

        expect(result.map((article) => article.title)).toEqual(['On the boundary']);
    });

    it('skips undated items and falls back to the updated timestamp', async () => {
        parseURLMock.mockResolvedValue({
            items: [
                { title: 'No date', link: 'https://example.com/undated' },
                { title: 'Bad date', link: 'https://example.com/bad', pubDate: 'not a date' },
                { title: 'Updated only', link: 'https://example.com/updated', updated: hoursAgo(5) },
            ],
        });

        const result = await createReader(5).fetchArticles(source);

        expect(result).toHaveLength(1);
        expect(result[0].title).toBe('Updated only');
        expect(result[0].publishedAt.toISOString()).toBe(hoursAgo(5));
    });

    it('defaults a missing title and truncates the body', async () => {
        parseURLMock.mockResolvedValue({
            items: [
                {
                    link: 'https://example.com/untitled',
                    isoDate: hoursAgo(1),
                    contentSnippet: 'x'.repeat(BODY_MAX_CHARS + 500),
                },
            ],
        });

        const [article] = await createReader().fetchArticles(source);

        expect(article.title).toBe('Untitled');
        expect(article.body).toHaveLength(BODY_MAX_CHARS);
    });

    it('prefers the summary over other content fields', async () => {
        parseURLMock.mockResolvedValue({
            items: [
                {
                    title: 'Patch Tuesday',
                    link: 'https://example.com/patch',
                    isoDate: hoursAgo(1),
                    summary: 'Short summary',
                    contentSnippet: 'Longer snippet',
                    content: '<p>Full content</p>',
                },
            ],
        });

        const [article] = await createReader().fetchArticles(source);

        expect(article.body).toBe('Short summary');
    });

    it('returns an empty list when the feed cannot be parsed', async () => {
        parseURLMock.mockRejectedValue(new Error('Unexpected close tag'));

        const result = await createReader().fetchArticles(source);

        expect(result).toEqual([]);
    });
});
