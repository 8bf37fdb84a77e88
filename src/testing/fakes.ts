import type { Clock, RandomSource } from '../scheduler/clock.js';
import type {
    ChannelSource,
    GenerationRequest,
    PostContent,
    PriceQuote,
    PriceSource,
    PublishReceipt,
    PublishSink,
    RawMessage,
    TextGenerator,
} from '../types.js';

// ============================================================================
// Herald — Test Doubles
// In-process stand-ins for the clock and every external capability
// ============================================================================

/** Time only moves when someone sleeps or the test advances it. */
export class FakeClock implements Clock {
    readonly sleeps: number[] = [];
    private current: number;

    constructor(start: Date | string) {
        this.current = new Date(start).getTime();
    }

    now(): Date {
        return new Date(this.current);
    }

    async sleep(ms: number, signal?: AbortSignal): Promise<void> {
        this.sleeps.push(ms);
        if (signal?.aborted) return;
        this.current += ms;
    }

    advance(ms: number): void {
        this.current += ms;
    }

    set(instant: Date | string): void {
        this.current = new Date(instant).getTime();
    }
}

/** Always returns the same value; 0.5 means "no jitter". */
export const fixedRandom = (value = 0.5): RandomSource => () => value;

export function rawMessage(id: string, text: string, at: string): RawMessage {
    return { sourceId: id, rawText: text, sourceTimestamp: new Date(at) };
}

/**
 * Serves a fixed message log, honouring the `since` cursor the way a real
 * feed would. Queued failures are thrown before serving.
 */
export class FakeSource implements ChannelSource {
    readonly pulls: Array<Date | null> = [];
    private readonly failures: unknown[] = [];

    constructor(public messages: RawMessage[] = []) {}

    failNext(...errors: unknown[]): this {
        this.failures.push(...errors);
        return this;
    }

    async pull(since: Date | null): Promise<RawMessage[]> {
        this.pulls.push(since);
        const failure = this.failures.shift();
        if (failure !== undefined) throw failure;
        return this.messages.filter(m => since === null || m.sourceTimestamp.getTime() > since.getTime());
    }
}

/**
 * Echoes the prompt by default. `failWhen` lets a test fail specific payloads.
 */
export class FakeGenerator implements TextGenerator {
    readonly requests: GenerationRequest[] = [];
    private readonly queued: Array<string | Error> = [];

    constructor(
        private readonly respond: (request: GenerationRequest) => string = r => `post: ${r.prompt}`,
        private readonly failWhen: (request: GenerationRequest) => Error | null = () => null,
    ) {}

    enqueue(...outcomes: Array<string | Error>): this {
        this.queued.push(...outcomes);
        return this;
    }

    async generate(request: GenerationRequest): Promise<string> {
        this.requests.push(request);
        const next = this.queued.shift();
        if (next instanceof Error) throw next;
        if (next !== undefined) return next;
        const failure = this.failWhen(request);
        if (failure) throw failure;
        return this.respond(request);
    }
}

export class FakePriceSource implements PriceSource {
    readonly requests: string[] = [];
    private readonly queued: Array<PriceQuote | Error> = [];

    constructor(private quote: Omit<PriceQuote, 'symbol'> = { current: 5.2, reference: 5, asOf: new Date('2026-10-18T08:00:00Z') }) {}

    enqueue(...outcomes: Array<PriceQuote | Error>): this {
        this.queued.push(...outcomes);
        return this;
    }

    async getPrice(symbol: string): Promise<PriceQuote> {
        this.requests.push(symbol);
        const next = this.queued.shift();
        if (next instanceof Error) throw next;
        return next ?? { symbol, ...this.quote };
    }
}

/**
 * Records every send. Queued errors are thrown by the next sends, in order.
 */
export class RecordingSink implements PublishSink {
    readonly sent: Array<{ channelId: string; content: PostContent }> = [];
    readonly attempts: PostContent[] = [];
    maxConcurrent = 0;
    private inFlight = 0;
    private readonly failures: Error[] = [];

    constructor(private readonly delay: () => Promise<void> = async () => undefined) {}

    failNext(...errors: Error[]): this {
        this.failures.push(...errors);
        return this;
    }

    async send(channelId: string, content: PostContent): Promise<PublishReceipt> {
        this.attempts.push(content);
        this.inFlight++;
        this.maxConcurrent = Math.max(this.maxConcurrent, this.inFlight);
        try {
            await this.delay();
            const failure = this.failures.shift();
            if (failure) throw failure;
            this.sent.push({ channelId, content });
            return { messageId: String(this.sent.length) };
        } finally {
            this.inFlight--;
        }
    }

    get texts(): string[] {
        return this.sent.map(s => s.content.text);
    }
}
