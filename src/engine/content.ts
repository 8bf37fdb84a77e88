import { createLogger } from '../logger.js';
import { SynthesisError, errorMessage } from '../errors.js';
import { withTimeout } from '../retry.js';
import { renderTemplate, type PromptTemplates } from '../personality/prompts.js';
import { sanitizeUserInput } from './sanitize-input.js';
import { cleanReaction, determineTone, formatOpinion, type OpinionLexicon } from './opinion.js';
import type { DigestSlot, GenerationRequest, NewsItem, PriceQuote, TextGenerator } from '../types.js';

// ============================================================================
// Herald — Content Synthesizer
// Turns a news item or a price snapshot into finished post text through the
// generation backend, under a fixed persona template
// ============================================================================

const log = createLogger('Content');

export type SynthesisRequest =
    | { kind: 'news'; item: NewsItem }
    | { kind: 'digest'; slot: DigestSlot; quote: PriceQuote; summary: string };

export interface SynthesizerOptions {
    /** Longer payloads are truncated before generation */
    maxInputChars: number;
    /** Longer completions are cut at a word boundary */
    maxOutputChars: number;
    timeoutMs: number;
    /** Channel handles a post must never mention */
    sourceChannels?: readonly string[];
    /** Secret values that must never reach the channel */
    secrets?: readonly string[];
    /** When set, news posts get a one-line reaction footer */
    opinion?: OpinionLexicon;
}

/** Variable names that should never show up in a post */
const DANGER_PATTERNS = [
    'ANTHROPIC_API_KEY', 'TELEGRAM_BOT_TOKEN', 'sk-ant-',
];

export class ContentSynthesizer {
    constructor(
        private readonly generator: TextGenerator,
        private readonly templates: PromptTemplates,
        private readonly options: SynthesizerOptions,
    ) {}

    buildPrompt(request: SynthesisRequest): GenerationRequest {
        const payload = request.kind === 'news' ? request.item.rawText : request.summary;
        const { text, truncated } = sanitizeUserInput(payload, this.options.maxInputChars);

        if (!text) {
            throw new SynthesisError(`Empty ${request.kind} payload`, { retryable: false });
        }
        if (truncated) {
            log.debug('Payload truncated before generation', { kind: request.kind, originalLength: payload.length });
        }

        const prompt = request.kind === 'news'
            ? renderTemplate(this.templates.news, { news: text })
            : renderTemplate(this.templates.digest, { asset: request.quote.symbol, slot: request.slot, summary: text });

        return { system: this.templates.persona, prompt };
    }

    async synthesize(request: SynthesisRequest): Promise<string> {
        const generation = this.buildPrompt(request);

        let raw: string;
        try {
            raw = await withTimeout(
                signal => this.generator.generate(generation, signal),
                this.options.timeoutMs,
                'generation',
            );
        } catch (error) {
            throw new SynthesisError(`Generation failed: ${errorMessage(error)}`, { cause: error });
        }

        const leaked = findSecret(raw, this.options.secrets ?? []);
        if (leaked) {
            log.error('BLOCKED: completion contains sensitive data pattern', { pattern: leaked.slice(0, 12) });
            throw new SynthesisError('Completion contains sensitive data', { retryable: false });
        }

        const text = truncatePost(
            sanitizeContent(raw, { sourceChannels: this.options.sourceChannels }),
            this.options.maxOutputChars,
        );
        if (!text) {
            throw new SynthesisError('Generation returned empty text', { retryable: true });
        }

        log.debug('Synthesized post', { kind: request.kind, length: text.length });
        return text;
    }

    /**
     * Append `🤡 - reaction` or `🔥 - reaction` under a finished post. A failed
     * or unusable generation falls back to the lexicon's stock phrase, so this
     * never rejects.
     */
    async addOpinion(post: string): Promise<string> {
        const lexicon = this.options.opinion;
        if (!lexicon) return post;

        const tone = determineTone(post, lexicon);
        let reaction: string | null = null;
        try {
            const raw = await withTimeout(
                signal => this.generator.generate({
                    system: this.templates.persona,
                    prompt: renderTemplate(this.templates.opinion, { post, tone }),
                }, signal),
                this.options.timeoutMs,
                'opinion',
            );
            if (findSecret(raw, this.options.secrets ?? [])) {
                log.error('BLOCKED: reaction contains sensitive data pattern');
            } else {
                reaction = cleanReaction(raw, tone, lexicon);
            }
        } catch (error) {
            log.warn('Reaction generation failed — using the stock phrase', { error: errorMessage(error) });
        }

        return `${post}\n\n${formatOpinion(tone, reaction ?? lexicon.fallback[tone])}`;
    }
}

function findSecret(text: string, secrets: readonly string[]): string | null {
    for (const pattern of DANGER_PATTERNS) {
        if (text.includes(pattern)) return pattern;
    }
    for (const secret of secrets) {
        if (secret.length >= 8 && text.includes(secret)) return secret;
    }
    return null;
}

function escapeRegExp(s: string): string {
    return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Sanitize LLM output — strip preamble, quotes, Markdown and source mentions.
 */
export function sanitizeContent(raw: string, options?: { sourceChannels?: readonly string[] }): string {
    let text = raw.trim();

    // Remove surrounding quotes (LLM sometimes wraps in quotes)
    const quotePairs: Array<[string, string]> = [['"', '"'], ["'", "'"], ['«', '»'], ['“', '”']];
    for (const [open, close] of quotePairs) {
        if (text.length >= 2 && text.startsWith(open) && text.endsWith(close)) {
            text = text.slice(1, -1).trim();
            break;
        }
    }

    // Order matters: combined patterns first, then individual components
    const preambles = [
        /^Sure[!,.]?\s*Here(?:'s| is)\s+(?:a |the |my |your )?(?:post|message|content)[:\s]*\n*/i,
        /^Sure[!,.]?\s*(?:Here(?:'s| is))?\s*/i,
        /^Here(?:'s| is) (?:a |the |my |your )?(?:post|message|content)[:\s]*\n*/i,
        /^(?:Post|Message):\s*\n*/i,
        /^Вот (?:пост|сообщение)[:\s]*\n*/i,
        /^(?:Пост):\s*\n*/i,
    ];
    for (const pattern of preambles) {
        text = text.replace(pattern, '');
    }

    // Residual preamble fragments
    text = text.replace(/^[:\s\-–—]+/, '').trim();

    // Markdown: links become "label url", markers and headings go away
    text = text
        .replace(/\[([^\]]+)\]\(([^)]+)\)/g, '$1 $2')
        .replace(/^#{1,6}\s+/gm, '')
        .replace(/\*\*|__|[*`<>[\]]/g, '');

    for (const channel of options?.sourceChannels ?? []) {
        const handle = escapeRegExp(channel.replace(/^@/, ''));
        text = text
            .replace(new RegExp(`(?:https?://)?t\\.me/${handle}\\S*`, 'gi'), '')
            .replace(new RegExp(`@${handle}\\b`, 'gi'), '');
    }

    return text
        .split('\n')
        .map(line => line.replace(/[ \t]{2,}/g, ' ').trim())
        .join('\n')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}

/**
 * Cut text to `maxChars`, preferring a word boundary, marking the cut with an ellipsis.
 */
export function truncatePost(text: string, maxChars: number): string {
    if (text.length <= maxChars) return text;
    const cut = text.slice(0, maxChars - 1);
    const lastSpace = cut.lastIndexOf(' ');
    const body = lastSpace > maxChars * 0.5 ? cut.slice(0, lastSpace) : cut;
    return `${body.trimEnd()}…`;
}
