import { z } from 'zod';
import { createLogger } from '../logger.js';
import { PriceFetchError, errorMessage } from '../errors.js';
import type { PriceQuote, PriceSource } from '../types.js';

// ============================================================================
// Herald — Market Data
// Spot price and 24h reference from CoinGecko (free, no API key required)
// ============================================================================

const log = createLogger('MarketData');

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface CoinGeckoOptions {
    apiUrl: string;
    /** Ticker symbol → CoinGecko coin id, e.g. TON → the-open-network */
    coinIds: Readonly<Record<string, string>>;
    /** Extra fiat shown under the USD figure, e.g. "rub" */
    secondaryCurrency?: string;
    fetch?: FetchLike;
}

const coinEntrySchema = z.object({
    usd: z.number(),
    usd_24h_change: z.number().nullable().optional(),
    last_updated_at: z.number().optional(),
}).catchall(z.number().nullable());

const simplePriceSchema = z.record(coinEntrySchema);

/**
 * Price 24h ago, recovered from the current price and the reported change.
 */
export function referenceFromChange(current: number, changePercent: number): number {
    return current / (1 + changePercent / 100);
}

export class CoinGeckoPriceSource implements PriceSource {
    private readonly fetchImpl: FetchLike;

    constructor(private readonly options: CoinGeckoOptions) {
        this.fetchImpl = options.fetch ?? fetch;
    }

    async getPrice(symbol: string, signal: AbortSignal): Promise<PriceQuote> {
        const coinId = this.options.coinIds[symbol.toUpperCase()];
        if (!coinId) {
            throw new PriceFetchError(`No CoinGecko id configured for ${symbol}`, { retryable: false });
        }

        const secondary = this.options.secondaryCurrency?.toLowerCase();
        const currencies = secondary && secondary !== 'usd' ? `usd,${secondary}` : 'usd';
        const url = `${this.options.apiUrl.replace(/\/+$/, '')}/simple/price?ids=${encodeURIComponent(coinId)}`
            + `&vs_currencies=${currencies}&include_24hr_change=true&include_last_updated_at=true`;

        let response: Response;
        try {
            response = await this.fetchImpl(url, { signal, headers: { accept: 'application/json' } });
        } catch (error) {
            throw new PriceFetchError(`CoinGecko request failed: ${errorMessage(error)}`, { cause: error });
        }

        if (!response.ok) {
            log.warn('CoinGecko API failed', { status: response.status });
            const retryable = response.status === 429 || response.status >= 500;
            throw new PriceFetchError(`CoinGecko HTTP ${response.status}`, { retryable });
        }

        const parsed = simplePriceSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new PriceFetchError(`Unexpected CoinGecko payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
                retryable: false,
            });
        }

        const entry = parsed.data[coinId];
        if (!entry) {
            throw new PriceFetchError(`CoinGecko has no price for ${coinId}`, { retryable: false });
        }

        const change = entry.usd_24h_change ?? 0;
        if (entry.usd_24h_change == null) {
            log.warn('No 24h change reported — treating price as flat', { coinId });
        }

        const quote: PriceQuote = {
            symbol: symbol.toUpperCase(),
            current: entry.usd,
            reference: referenceFromChange(entry.usd, change),
            asOf: entry.last_updated_at ? new Date(entry.last_updated_at * 1000) : new Date(),
        };

        const secondaryValue = secondary ? entry[secondary] : undefined;
        if (secondary && typeof secondaryValue === 'number') {
            quote.secondary = { currency: secondary, value: secondaryValue };
        }

        log.debug('Fetched price', { symbol: quote.symbol, current: quote.current, change });
        return quote;
    }
}
