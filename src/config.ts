import { z } from 'zod';
import { ConfigError } from './errors.js';
import { emptyPolicies, type EmptyGroupsPolicy } from './engine/filter.js';
import { assertTimeZone, parseTimeOfDay } from './scheduler/timing.js';
import type { LogLevel } from './logger.js';
import type { SchedulerConfig } from './scheduler/scheduler.js';

// ============================================================================
// Herald Configuration
// Validates all environment variables at startup
// ============================================================================

const MINUTE = 60_000;
const DAY = 24 * 60 * MINUTE;

const flag = (fallback: 'true' | 'false') => z.string().transform(v => v === 'true').default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const optionalText = z.string().optional().transform(v => v?.trim() || undefined);

const timeOfDay = (fallback: string) => z.string()
    .default(fallback)
    .refine(v => /^([01]?\d|2[0-3]):([0-5]\d)$/.test(v.trim()), 'must be HH:MM (24h)')
    .transform(parseTimeOfDay);

const timeZone = z.string().default('Europe/Moscow').refine(v => {
    try {
        assertTimeZone(v);
        return true;
    } catch {
        return false;
    }
}, 'must be an IANA time zone, e.g. Europe/Moscow');

const channelList = z.string({ required_error: 'SOURCE_CHANNELS is required' })
    .transform(v => v.split(',').map(c => c.trim().replace(/^@/, '')).filter(Boolean))
    .refine(list => list.length > 0, 'SOURCE_CHANNELS must name at least one channel');

const envSchema = z.object({
    // LLM
    ANTHROPIC_API_KEY: z.string().min(1, 'ANTHROPIC_API_KEY is required'),
    ANTHROPIC_MODEL: z.string().min(1).default('claude-haiku-4-5-20251001'),
    LLM_MAX_TOKENS: positiveInt(400),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.9),

    // Telegram
    TELEGRAM_BOT_TOKEN: z.string().min(1, 'TELEGRAM_BOT_TOKEN is required'),
    TELEGRAM_CHANNEL_ID: z.string().min(1, 'TELEGRAM_CHANNEL_ID is required'),

    // Sources
    SOURCE_CHANNELS: channelList,
    SOURCE_FEED_URL_TEMPLATE: z.string()
        .default('https://rsshub.app/telegram/channel/{channel}')
        .refine(v => v.includes('{channel}'), 'SOURCE_FEED_URL_TEMPLATE must contain {channel}'),

    // Content files
    KEYWORDS_PATH: optionalText,
    KEYWORDS_EMPTY_POLICY: z.enum(emptyPolicies).optional(),
    PROMPTS_DIR: optionalText,

    // Polling
    POLL_INTERVAL_MINUTES: positiveInt(30),
    POLL_JITTER_MINUTES: nonNegativeInt(10),
    MIN_POLL_INTERVAL_SECONDS: positiveInt(300),
    NEWS_LOOKBACK_MINUTES: nonNegativeInt(60),

    // Digests
    DIGEST_TIMEZONE: timeZone,
    DIGEST_MORNING_TIME: timeOfDay('11:00'),
    DIGEST_EVENING_TIME: timeOfDay('22:00'),
    DIGEST_JITTER_MINUTES: nonNegativeInt(10),
    DIGEST_WINDOW_MINUTES: positiveInt(60),
    DIGEST_COMMENTARY: flag('false'),

    // Retries
    BACKOFF_MAX_RETRIES: nonNegativeInt(3),
    BACKOFF_DELAY_SECONDS: positiveInt(60),
    PUBLISH_MAX_RETRIES: nonNegativeInt(3),
    PUBLISH_BASE_DELAY_MS: positiveInt(2000),

    // Dedup
    DEDUP_RETENTION_DAYS: positiveInt(7),
    NEWS_MAX_ATTEMPTS: positiveInt(3),

    // Timeouts
    INGESTION_TIMEOUT_MS: positiveInt(15_000),
    GENERATION_TIMEOUT_MS: positiveInt(60_000),
    PRICE_TIMEOUT_MS: positiveInt(10_000),
    PUBLISH_TIMEOUT_MS: positiveInt(15_000),

    // Price data
    ASSET_SYMBOL: z.string().min(1).default('TON'),
    ASSET_COINGECKO_ID: z.string().min(1).default('the-open-network'),
    PRICE_API_URL: z.string().url('PRICE_API_URL must be a valid URL').default('https://api.coingecko.com/api/v3'),
    PRICE_SECONDARY_CURRENCY: optionalText,
    PRICE_DECIMALS: nonNegativeInt(4),
    CHANGE_DECIMALS: nonNegativeInt(2),

    // Synthesis
    MAX_INPUT_CHARS: positiveInt(2000),
    MAX_POST_CHARS: positiveInt(1000),
    RECHECK_GENERATED_RELEVANCE: flag('false'),
    OPINION_FOOTER: flag('true'),
    TONE_PATH: optionalText,

    // Agent Config
    POSTING_ENABLED: flag('false'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
    anthropic: { apiKey: string; model: string; maxTokens: number; temperature: number };
    telegram: { botToken: string; channelId: string };
    sources: { channels: string[]; feedUrlTemplate: string };
    keywords: { path?: string; emptyPolicy?: EmptyGroupsPolicy };
    promptsDir?: string;
    scheduler: SchedulerConfig;
    publish: { maxRetries: number; baseDelayMs: number; timeoutMs: number };
    dedupRetentionMs: number;
    synthesis: { maxInputChars: number; maxOutputChars: number; timeoutMs: number };
    opinion: { enabled: boolean; tonePath?: string };
    digest: {
        assetSymbol: string;
        coingeckoId: string;
        priceApiUrl: string;
        secondaryCurrency?: string;
        priceDecimals: number;
        changeDecimals: number;
        timeoutMs: number;
        commentary: boolean;
    };
    postingEnabled: boolean;
    logLevel: LogLevel;
}

function toAppConfig(env: Env): AppConfig {
    return {
        anthropic: {
            apiKey: env.ANTHROPIC_API_KEY,
            model: env.ANTHROPIC_MODEL,
            maxTokens: env.LLM_MAX_TOKENS,
            temperature: env.LLM_TEMPERATURE,
        },
        telegram: { botToken: env.TELEGRAM_BOT_TOKEN, channelId: env.TELEGRAM_CHANNEL_ID },
        sources: { channels: env.SOURCE_CHANNELS, feedUrlTemplate: env.SOURCE_FEED_URL_TEMPLATE },
        keywords: { path: env.KEYWORDS_PATH, emptyPolicy: env.KEYWORDS_EMPTY_POLICY },
        promptsDir: env.PROMPTS_DIR,
        scheduler: {
            poll: {
                baseIntervalMs: env.POLL_INTERVAL_MINUTES * MINUTE,
                jitterMs: env.POLL_JITTER_MINUTES * MINUTE,
                minIntervalMs: env.MIN_POLL_INTERVAL_SECONDS * 1000,
                initialLookbackMs: env.NEWS_LOOKBACK_MINUTES * MINUTE,
            },
            digest: {
                timeZone: env.DIGEST_TIMEZONE,
                times: { morning: env.DIGEST_MORNING_TIME, evening: env.DIGEST_EVENING_TIME },
                jitterMinutes: env.DIGEST_JITTER_MINUTES,
                windowMinutes: env.DIGEST_WINDOW_MINUTES,
            },
            backoff: { delayMs: env.BACKOFF_DELAY_SECONDS * 1000, maxRetries: env.BACKOFF_MAX_RETRIES },
            ingestionTimeoutMs: env.INGESTION_TIMEOUT_MS,
            maxItemAttempts: env.NEWS_MAX_ATTEMPTS,
            recheckGeneratedRelevance: env.RECHECK_GENERATED_RELEVANCE,
        },
        publish: {
            maxRetries: env.PUBLISH_MAX_RETRIES,
            baseDelayMs: env.PUBLISH_BASE_DELAY_MS,
            timeoutMs: env.PUBLISH_TIMEOUT_MS,
        },
        dedupRetentionMs: env.DEDUP_RETENTION_DAYS * DAY,
        synthesis: {
            maxInputChars: env.MAX_INPUT_CHARS,
            maxOutputChars: env.MAX_POST_CHARS,
            timeoutMs: env.GENERATION_TIMEOUT_MS,
        },
        opinion: { enabled: env.OPINION_FOOTER, tonePath: env.TONE_PATH },
        digest: {
            assetSymbol: env.ASSET_SYMBOL,
            coingeckoId: env.ASSET_COINGECKO_ID,
            priceApiUrl: env.PRICE_API_URL,
            secondaryCurrency: env.PRICE_SECONDARY_CURRENCY,
            priceDecimals: env.PRICE_DECIMALS,
            changeDecimals: env.CHANGE_DECIMALS,
            timeoutMs: env.PRICE_TIMEOUT_MS,
            commentary: env.DIGEST_COMMENTARY,
        },
        postingEnabled: env.POSTING_ENABLED,
        logLevel: env.LOG_LEVEL,
    };
}

/**
 * Validate the environment. Throws a ConfigError listing every problem.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        throw new ConfigError(result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
    }
    return toAppConfig(result.data);
}
