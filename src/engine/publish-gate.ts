import { createLogger } from '../logger.js';
import { PublishError, classifyError, errorMessage } from '../errors.js';
import { defaultSleep, withRetry, withTimeout } from '../retry.js';
import type { PostContent, PublishResult, PublishSink } from '../types.js';

// ============================================================================
// Herald — Publish Gate
// The only path to the channel. One send in flight at a time, in call order.
// ============================================================================

const log = createLogger('Gate');

export interface PublishGateOptions {
    channelId: string;
    /** Retries after the first attempt for transient failures */
    maxRetries: number;
    baseDelayMs: number;
    /** Bound on a single send attempt */
    timeoutMs: number;
    maxDelayMs?: number;
    sleep?: (ms: number) => Promise<void>;
}

export class PublishGate {
    private tail: Promise<unknown> = Promise.resolve();

    constructor(
        private readonly sink: PublishSink,
        private readonly options: PublishGateOptions,
    ) {}

    /**
     * Queue a post behind any in-flight send. Resolves with the outcome; never rejects.
     */
    publish(content: PostContent, label: string): Promise<PublishResult> {
        const result = this.tail.then(() => this.send(content, label));
        this.tail = result;
        return result;
    }

    private async send(content: PostContent, label: string): Promise<PublishResult> {
        const { channelId, maxRetries, baseDelayMs, timeoutMs, maxDelayMs, sleep = defaultSleep } = this.options;
        let attempts = 0;

        try {
            const receipt = await withRetry(
                attempt => {
                    attempts = attempt;
                    return withTimeout(signal => this.sink.send(channelId, content, signal), timeoutMs, `publish ${label}`);
                },
                {
                    maxAttempts: maxRetries + 1,
                    baseDelayMs,
                    maxDelayMs,
                    label: `publish ${label}`,
                    retryAfterMs: error => (error instanceof PublishError ? error.retryAfterMs : undefined),
                    sleep,
                },
            );
            log.info(`Published ${label}`, { messageId: receipt.messageId, attempts, length: content.text.length });
            return { status: 'published', messageId: receipt.messageId, attempts };
        } catch (error) {
            const permanent = classifyError(error) === 'permanent';
            const reason = errorMessage(error);
            log.error(`Failed to publish ${label}`, { reason, permanent, attempts });
            return { status: 'failed', reason, permanent, attempts };
        }
    }
}
