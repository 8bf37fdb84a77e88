import { z } from 'zod';
import { createLogger } from '../logger.js';
import { PublishError, errorMessage } from '../errors.js';
import type { FetchLike } from '../data/market.js';
import type { PostContent, PublishReceipt, PublishSink } from '../types.js';

// ============================================================================
// Herald — Telegram Platform
// Posts to the target channel through the Bot API
// ============================================================================

const log = createLogger('Telegram');

/** Bot API limit for photo captions */
export const CAPTION_LIMIT = 1024;

export interface TelegramSinkOptions {
    botToken: string;
    baseUrl?: string;
    fetch?: FetchLike;
}

const botResponseSchema = z.object({
    ok: z.boolean(),
    result: z.object({ message_id: z.number() }).optional(),
    error_code: z.number().optional(),
    description: z.string().optional(),
    parameters: z.object({ retry_after: z.number().optional() }).optional(),
});

type BotResponse = z.infer<typeof botResponseSchema>;

function toPublishError(status: number, body: BotResponse | null): PublishError {
    const code = body?.error_code ?? status;
    const description = body?.description ?? `HTTP ${status}`;

    if (code === 429) {
        const retryAfter = body?.parameters?.retry_after;
        return new PublishError('rate_limited', description, {
            retryAfterMs: retryAfter !== undefined ? retryAfter * 1000 : undefined,
        });
    }
    if (code === 400 || code === 401 || code === 403 || code === 404) {
        return new PublishError('invalid', description);
    }
    return new PublishError('network', description);
}

export class TelegramSink implements PublishSink {
    private readonly baseUrl: string;
    private readonly fetchImpl: FetchLike;

    constructor(private readonly options: TelegramSinkOptions) {
        this.baseUrl = options.baseUrl ?? 'https://api.telegram.org';
        this.fetchImpl = options.fetch ?? fetch;
    }

    async send(channelId: string, content: PostContent, signal: AbortSignal): Promise<PublishReceipt> {
        const withPhoto = content.media !== undefined && content.text.length <= CAPTION_LIMIT;
        if (content.media && !withPhoto) {
            log.warn('Text too long for a caption — sending without the image', { length: content.text.length });
        }

        const method = withPhoto ? 'sendPhoto' : 'sendMessage';
        const payload = withPhoto && content.media
            ? { chat_id: channelId, photo: content.media.url, caption: content.text }
            : { chat_id: channelId, text: content.text, link_preview_options: { is_disabled: true } };

        let response: Response;
        try {
            response = await this.fetchImpl(`${this.baseUrl}/bot${this.options.botToken}/${method}`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(payload),
                signal,
            });
        } catch (error) {
            throw new PublishError('network', `Telegram request failed: ${errorMessage(error)}`, { cause: error });
        }

        const parsed = botResponseSchema.safeParse(await response.json().catch(() => null));
        const body = parsed.success ? parsed.data : null;

        if (!response.ok || !body?.ok || !body.result) {
            const error = toPublishError(response.status, body);
            log.warn(`Telegram ${method} failed`, { status: response.status, kind: error.kind, description: error.message });
            throw error;
        }

        return { messageId: String(body.result.message_id) };
    }
}

/**
 * Stand-in used while POSTING_ENABLED is off: logs what would be posted.
 */
export class DryRunSink implements PublishSink {
    private sent = 0;

    async send(channelId: string, content: PostContent): Promise<PublishReceipt> {
        this.sent++;
        log.info(`[DRY RUN] Would post to ${channelId}`, { length: content.text.length, preview: content.text.slice(0, 200) });
        return { messageId: `dry-run-${this.sent}` };
    }
}
