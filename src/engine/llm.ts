import Anthropic from '@anthropic-ai/sdk';
import { createLogger } from '../logger.js';
import { GenerationError, errorMessage } from '../errors.js';
import type { GenerationRequest, TextGenerator } from '../types.js';

// ============================================================================
// Herald — LLM Client
// Handles all communication with Claude API
// ============================================================================

const log = createLogger('LLM');

export interface AnthropicGeneratorOptions {
    apiKey: string;
    model: string;
    maxTokens: number;
    /** Temperature (0-1, higher = more creative) */
    temperature: number;
}

/** Client-side rejections that a retry will not fix */
const REJECTED_STATUSES = new Set([400, 401, 403, 404, 413, 422]);

/**
 * Map an SDK failure onto the generation error kinds. Anything unrecognised
 * is reported as a timeout so it stays retryable.
 */
export function toGenerationError(error: unknown): GenerationError {
    if (error instanceof GenerationError) return error;
    if (error instanceof Anthropic.RateLimitError) {
        return new GenerationError('quota', `Rate limited: ${error.message}`, { cause: error });
    }
    if (error instanceof Anthropic.APIError && error.status !== undefined && REJECTED_STATUSES.has(error.status)) {
        return new GenerationError('rejected', `Request rejected (${error.status}): ${error.message}`, { cause: error });
    }
    return new GenerationError('timeout', errorMessage(error), { cause: error });
}

export class AnthropicGenerator implements TextGenerator {
    private readonly client: Anthropic;

    constructor(private readonly options: AnthropicGeneratorOptions) {
        // Retries belong to the scheduler's backoff loop
        this.client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
    }

    async generate(request: GenerationRequest, signal: AbortSignal): Promise<string> {
        const { model, maxTokens, temperature } = this.options;
        log.debug('Generating content', { promptLength: request.prompt.length, maxTokens, temperature });

        try {
            const response = await this.client.messages.create({
                model,
                max_tokens: maxTokens,
                temperature,
                // The persona is identical on every call, so it is cached
                system: [{
                    type: 'text',
                    text: request.system,
                    cache_control: { type: 'ephemeral' },
                }],
                messages: [{ role: 'user', content: request.prompt }],
            }, { signal });

            const content = response.content
                .map(block => (block.type === 'text' ? block.text : ''))
                .join('')
                .trim();

            log.info('Generated content', {
                tokens: `${response.usage.input_tokens}in/${response.usage.output_tokens}out`,
                contentLength: content.length,
            });
            return content;
        } catch (error) {
            throw toGenerationError(error);
        }
    }
}
