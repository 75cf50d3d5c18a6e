import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { BriefingConfiguration } from '@/domain/source-config';
import { ConfigurationError } from '@/domain/errors';
import { logger } from './logger';

const PLACEHOLDER_PATTERN = /\$\{([^}]+)\}/;

const requiredSecret = z
    .string()
    .trim()
    .min(1, 'must not be empty')
    .refine((value) => !PLACEHOLDER_PATTERN.test(value), {
        message: 'environment variable is not set',
    });

const optionalUrl = z
    .string()
    .nullish()
    .transform((value) => {
        const trimmed = value?.trim();
        if (!trimmed || PLACEHOLDER_PATTERN.test(trimmed)) {
            return null;
        }
        return trimmed;
    });

const positiveInt = z.coerce.number().int().positive();

const configSchema = z.object({
    telegram: z.object({
        bot_token: requiredSecret,
        chat_id: z.union([z.string(), z.number()]).transform(String).pipe(requiredSecret),
        api_base_url: z.string().url().default('https://api.telegram.org'),
    }),
    summarizer: z.object({
        api_key: requiredSecret,
        base_url: z.string().url().default('https://api.groq.com/openai/v1'),
        model: z.string().min(1).default('llama-3.3-70b-versatile'),
        max_tokens: positiveInt.default(300),
        temperature: z.coerce.number().min(0).max(2).default(0.4),
    }),
    speech: z
        .object({
            language: z.string().min(2).default('ru'),
            language_name: z.string().min(1).default('Russian'),
            attempts: positiveInt.default(2),
        })
        .default({}),
    voice_conversion: z
        .object({
            model_url: optionalUrl,
            cache_dir: z.string().optional(),
            voice_id: z.string().min(1).default('voice'),
            command: z.string().min(1).default('python'),
            args: z.array(z.string()).default(['-m', 'rvc_python', 'cli']),
            device: z.string().min(1).default('cpu'),
        })
        .default({})
        .transform((vc) => ({
            ...vc,
            cache_dir: vc.cache_dir || path.join(os.homedir(), '.rvc_models', vc.voice_id),
        })),
    scan_config: z
        .object({
            lookback_hours: positiveInt.default(24),
            max_articles_per_source: positiveInt.default(2),
        })
        .default({}),
    pacing: z
        .object({
            header_delay_ms: z.coerce.number().int().nonnegative().default(1000),
            item_delay_ms: z.coerce.number().int().nonnegative().default(2000),
        })
        .default({}),
    feeds: z
        .array(
            z.object({
                name: z.string().min(1),
                url: z.string().url(),
            }),
        )
        .min(1, 'at least one feed is required'),
});

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null) {
        Object.values(value).forEach((child) => deepFreeze(child));
        Object.freeze(value);
    }
    return value;
}

/**
 * Returns a copy of `config` with a different lookback window.
 * The override is held to the same rule as the file value.
 */
export function withLookbackHours(
    config: BriefingConfiguration,
    lookbackHours: unknown,
): BriefingConfiguration {
    const parsed = positiveInt.safeParse(lookbackHours);
    if (!parsed.success) {
        throw new ConfigurationError(
            `Invalid lookback_hours override ${String(lookbackHours)}: must be a positive integer`,
        );
    }

    return deepFreeze({
        ...config,
        scan_config: { ...config.scan_config, lookback_hours: parsed.data },
    });
}

export class ConfigLoader {
    private static instance: ConfigLoader;
    private config: BriefingConfiguration | null = null;

    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

    static getInstance(): ConfigLoader {
        if (!ConfigLoader.instance) {
            ConfigLoader.instance = new ConfigLoader();
        }
        return ConfigLoader.instance;
    }

    loadConfig(configPath?: string): BriefingConfiguration {
        if (this.config) {
            return this.config;
        }

        const finalPath =
            configPath ||
            this.env.BRIEFING_CONFIG_PATH ||
            path.join(__dirname, '../../config/briefing.yaml');

        let rawConfig: unknown;
        try {
            const fileContents = fs.readFileSync(finalPath, 'utf8');
            rawConfig = yaml.load(fileContents);
        } catch (error) {
            logger.error('Failed to load configuration', {
                error: error instanceof Error ? error.message : String(error),
                path: finalPath,
            });
            throw new ConfigurationError(`Failed to load configuration from ${finalPath}`);
        }

        const parsed = configSchema.safeParse(this.applyEnvOverrides(this.resolveEnvVars(rawConfig)));
        if (!parsed.success) {
            const problems = parsed.error.issues.map(
                (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
            );
            logger.error('Invalid configuration', { path: finalPath, problems });
            throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`);
        }

        const config: BriefingConfiguration = deepFreeze(parsed.data);
        this.config = config;

        logger.info('Configuration loaded successfully', {
            path: finalPath,
            feedCount: config.feeds.length,
            lookbackHours: config.scan_config.lookback_hours,
            maxArticlesPerSource: config.scan_config.max_articles_per_source,
            voiceConversionConfigured: config.voice_conversion.model_url !== null,
        });

        return config;
    }

    getConfig(): BriefingConfiguration {
        if (!this.config) {
            return this.loadConfig();
        }
        return this.config;
    }

    private resolveEnvVars(value: unknown): unknown {
        if (typeof value === 'string') {
            return value.replace(new RegExp(PLACEHOLDER_PATTERN.source, 'g'), (match, envVarName: string) => {
                const envValue = this.env[envVarName];
                if (!envValue) {
                    logger.debug(`Environment variable ${envVarName} is not set, keeping placeholder`);
                    return match;
                }
                return envValue;
            });
        }
        if (Array.isArray(value)) {
            return value.map((item) => this.resolveEnvVars(item));
        }
        if (isRecord(value)) {
            return Object.fromEntries(
                Object.entries(value).map(([key, item]) => [key, this.resolveEnvVars(item)]),
            );
        }
        return value;
    }

    // Plain environment tunables win over the file.
    private applyEnvOverrides(value: unknown): unknown {
        if (!isRecord(value)) {
            return value;
        }

        const section = (name: string): RawSection => {
            const existing = value[name];
            return isRecord(existing) ? { ...existing } : {};
        };

        const scanConfig = section('scan_config');
        const summarizer = section('summarizer');
        const voiceConversion = section('voice_conversion');

        if (this.env.LOOKBACK_HOURS) {
            scanConfig.lookback_hours = this.env.LOOKBACK_HOURS;
        }
        if (this.env.MAX_ARTICLES_PER_BLOG) {
            scanConfig.max_articles_per_source = this.env.MAX_ARTICLES_PER_BLOG;
        }
        if (this.env.SUMMARIZER_MODEL) {
            summarizer.model = this.env.SUMMARIZER_MODEL;
        }
        if (this.env.MODEL_CACHE_DIR) {
            voiceConversion.cache_dir = this.env.MODEL_CACHE_DIR;
        }

        return {
            ...value,
            scan_config: scanConfig,
            summarizer,
            voice_conversion: voiceConversion,
        };
    }
}
