import { createLogger } from '../logger.js';
import { DigestError, errorMessage } from '../errors.js';
import { withTimeout } from '../retry.js';
import type { ContentSynthesizer } from './content.js';
import type { DigestSlot, PriceQuote, PriceSource } from '../types.js';

// ============================================================================
// Herald — Price Digest Builder
// Morning/evening market summaries for the tracked asset
// ============================================================================

const log = createLogger('Digest');

export interface DigestFormatOptions {
    priceDecimals: number;
    changeDecimals: number;
}

export interface DigestBuilderOptions extends DigestFormatOptions {
    assetSymbol: string;
    timeoutMs: number;
    /** When set, a persona reaction is appended under the figures */
    commentary?: ContentSynthesizer;
}

const slotHeadings: Record<DigestSlot, { emoji: string; label: string }> = {
    morning: { emoji: '🌅', label: 'morning' },
    evening: { emoji: '🌙', label: 'evening' },
};

export function computeChangePercent(current: number, reference: number): number {
    return ((current - reference) / reference) * 100;
}

export function formatSignedPercent(value: number, decimals: number): string {
    const fixed = value.toFixed(decimals);
    // -0.00 reads as a drop; show it as flat
    if (Number(fixed) === 0) return `+${(0).toFixed(decimals)}%`;
    return value > 0 ? `+${fixed}%` : `${fixed}%`;
}

export function formatDigest(slot: DigestSlot, quote: PriceQuote, options: DigestFormatOptions): string {
    const { emoji, label } = slotHeadings[slot];
    const change = computeChangePercent(quote.current, quote.reference);
    const lines = [
        `${emoji} ${quote.symbol} ${label} digest`,
        `${quote.symbol} at $${quote.current.toFixed(options.priceDecimals)} (${formatSignedPercent(change, options.changeDecimals)} 24h)`,
    ];
    if (quote.secondary) {
        lines.push(`≈ ${quote.secondary.value.toFixed(2)} ${quote.secondary.currency.toUpperCase()}`);
    }
    return lines.join('\n');
}

function isValidPrice(value: number): boolean {
    return Number.isFinite(value) && value > 0;
}

export class DigestBuilder {
    constructor(
        private readonly prices: PriceSource,
        private readonly options: DigestBuilderOptions,
    ) {}

    /**
     * Fetch, validate and format one digest. Never retries; the scheduler owns that.
     */
    async buildDigest(slot: DigestSlot): Promise<string> {
        const { assetSymbol, timeoutMs } = this.options;

        let quote: PriceQuote;
        try {
            quote = await withTimeout(signal => this.prices.getPrice(assetSymbol, signal), timeoutMs, 'price fetch');
        } catch (error) {
            throw new DigestError('fetch_failed', `Price fetch for ${assetSymbol} failed: ${errorMessage(error)}`, { cause: error });
        }

        if (!isValidPrice(quote.current) || !isValidPrice(quote.reference)) {
            throw new DigestError('malformed', `Malformed price data for ${assetSymbol}: current=${quote.current}, reference=${quote.reference}`);
        }

        const summary = formatDigest(slot, quote, this.options);
        if (!this.options.commentary) return summary;

        try {
            const reaction = await this.options.commentary.synthesize({ kind: 'digest', slot, quote, summary });
            return `${summary}\n\n${reaction}`;
        } catch (error) {
            log.warn('Digest commentary failed — publishing figures only', { slot, error: errorMessage(error) });
            return summary;
        }
    }
}
