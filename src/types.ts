// ============================================================================
// Herald — Domain Types & Capability Contracts
// In-memory contracts between the pipeline and its collaborators
// ============================================================================

export const digestSlots = ['morning', 'evening'] as const;
export type DigestSlot = typeof digestSlots[number];

/** A message as the ingestion source hands it over, before filtering. */
export interface RawMessage {
    sourceId: string;
    rawText: string;
    sourceTimestamp: Date;
}

/** A message that passed the keyword filter. Frozen once built. */
export interface NewsItem extends RawMessage {
    readonly matchedKeywords: ReadonlySet<string>;
}

export type PublicationKind = 'news' | 'digest_morning' | 'digest_evening';
export type PublicationStatus = 'pending' | 'published' | 'failed';

export interface PublicationRecord {
    kind: PublicationKind;
    dedupKey: string;
    status: PublicationStatus;
    claimedAt: Date;
    publishedAt?: Date;
    /** How many times this key has been claimed */
    attempts: number;
    /** Set on release when the last failure should not be retried */
    abandoned?: boolean;
    /** Fingerprint of the published body, when one was recorded */
    contentHash?: string;
}

export interface PostContent {
    text: string;
    /** Sink-level only: the scheduler publishes text */
    media?: { url: string };
}

export interface PublishReceipt {
    messageId: string;
}

export type PublishResult =
    | { status: 'published'; messageId: string; attempts: number }
    | { status: 'failed'; reason: string; permanent: boolean; attempts: number };

export interface PriceQuote {
    symbol: string;
    current: number;
    /** Prior reference price, e.g. 24h ago */
    reference: number;
    asOf: Date;
    secondary?: { currency: string; value: number };
}

export interface GenerationRequest {
    system: string;
    prompt: string;
}

// ---- Capabilities (implemented by adapters, faked in tests) ----

export interface ChannelSource {
    /** Messages strictly newer than `since` (all available when null). May be empty. */
    pull(since: Date | null, signal: AbortSignal): Promise<RawMessage[]>;
}

export interface TextGenerator {
    generate(request: GenerationRequest, signal: AbortSignal): Promise<string>;
}

export interface PriceSource {
    getPrice(symbol: string, signal: AbortSignal): Promise<PriceQuote>;
}

export interface PublishSink {
    send(channelId: string, content: PostContent, signal: AbortSignal): Promise<PublishReceipt>;
}
