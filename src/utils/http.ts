export const USER_AGENT = 'Security-Audio-Briefing/1.0';

export type FetchFn = typeof fetch;
