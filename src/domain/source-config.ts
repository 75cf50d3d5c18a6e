export interface FeedSource {
    readonly name: string;
    readonly url: string;
}

export interface TelegramConfig {
    readonly bot_token: string;
    readonly chat_id: string;
    readonly api_base_url: string;
}

export interface SummarizerConfig {
    readonly api_key: string;
    readonly base_url: string;
    readonly model: string;
    readonly max_tokens: number;
    readonly temperature: number;
}

export interface SpeechConfig {
    readonly language: string;
    readonly language_name: string;
    readonly attempts: number;
}

export interface VoiceConversionConfig {
    readonly model_url: string | null; // null disables voice conversion for every run
    readonly cache_dir: string;
    readonly voice_id: string;
    readonly command: string;
    readonly args: readonly string[];
    readonly device: string;
}

export interface ScanConfig {
    readonly lookback_hours: number;
    readonly max_articles_per_source: number;
}

export interface PacingConfig {
    readonly header_delay_ms: number;
    readonly item_delay_ms: number;
}

export interface BriefingConfiguration {
    readonly telegram: TelegramConfig;
    readonly summarizer: SummarizerConfig;
    readonly speech: SpeechConfig;
    readonly voice_conversion: VoiceConversionConfig;
    readonly scan_config: ScanConfig;
    readonly pacing: PacingConfig;
    readonly feeds: readonly FeedSource[];
}
