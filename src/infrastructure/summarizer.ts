import { Synopsis } from '@/domain/article';
import { StageResult } from '@/domain/stage-result';

/**
 * Reduces an article to a short spoken-style synopsis.
 * Returns `ok` or `degraded` (title-only fallback); never `fatal`, never throws.
 */
export interface Summarizer {
    summarize(title: string, body: string): Promise<StageResult<Synopsis>>;
}

export function fallbackSynopsis(title: string): Synopsis {
    return `New article: ${title}`;
}
