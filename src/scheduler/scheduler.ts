import { createLogger } from '../logger.js';
import { classifyError, errorMessage, type ErrorClass } from '../errors.js';
import { withTimeout } from '../retry.js';
import { digestSlots, type ChannelSource, type DigestSlot, type NewsItem, type PublicationKind, type RawMessage } from '../types.js';
import { jitterMinutes, localTime, nextInterval, formatTimeOfDay } from './timing.js';
import type { Clock, RandomSource } from './clock.js';
import type { KeywordFilter } from '../engine/filter.js';
import type { Deduplicator } from '../engine/dedup.js';
import type { ContentSynthesizer } from '../engine/content.js';
import type { DigestBuilder } from '../engine/digest.js';
import type { PublishGate } from '../engine/publish-gate.js';

// ============================================================================
// Herald — Scheduler
// Explicit state machine: idle → checking_news | emitting_digest → (backoff) → idle
// ============================================================================

const log = createLogger('Scheduler');

const MINUTES_PER_DAY = 24 * 60;

export type SchedulerPhase = 'idle' | 'checking_news' | 'emitting_digest' | 'backoff';

export interface DigestPlan {
    /** Local date the plan was drawn for */
    date: string;
    /** Jittered due minute of each slot on that date */
    dueMinutes: Readonly<Record<DigestSlot, number>>;
}

export interface ScheduleState {
    readonly phase: SchedulerPhase;
    readonly lastNewsCheck: Date | null;
    readonly lastDigestEmitted: Readonly<Partial<Record<DigestSlot, string>>>;
    readonly nextWakeup: Date;
    readonly digestPlan: DigestPlan | null;
}

export interface SchedulerConfig {
    poll: {
        baseIntervalMs: number;
        jitterMs: number;
        minIntervalMs: number;
        /** How far back the first pull reaches; 0 takes whatever the source has */
        initialLookbackMs: number;
    };
    digest: {
        timeZone: string;
        /** Minute of the local day each slot is scheduled for */
        times: Readonly<Record<DigestSlot, number>>;
        jitterMinutes: number;
        windowMinutes: number;
    };
    backoff: {
        delayMs: number;
        maxRetries: number;
    };
    ingestionTimeoutMs: number;
    /** Claims per news item before a transient failure is given up on */
    maxItemAttempts: number;
    /** Run the keyword filter over generated text before publishing */
    recheckGeneratedRelevance: boolean;
}

export interface SchedulerDeps {
    source: ChannelSource;
    filter: KeywordFilter;
    dedup: Deduplicator;
    synthesizer: ContentSynthesizer;
    digests: DigestBuilder;
    gate: PublishGate;
    clock: Clock;
    rng: RandomSource;
}

/** What a single attempt at an action came to. */
export type ActionOutcome = 'done' | ErrorClass;

type ItemOutcome = 'published' | 'filtered' | 'duplicate' | 'skipped' | 'retry' | 'abandoned';

export interface BatchSummary {
    pulled: number;
    published: number;
    filtered: number;
    duplicate: number;
    failed: number;
    interrupted: boolean;
}

const slotKinds: Record<DigestSlot, PublicationKind> = {
    morning: 'digest_morning',
    evening: 'digest_evening',
};

export function digestKey(date: string, slot: DigestSlot): string {
    return `${date}:${slot}`;
}

export class Scheduler {
    private state: ScheduleState;
    private readonly abort = new AbortController();
    private stopping = false;
    private loop: Promise<void> | null = null;

    constructor(
        private readonly config: SchedulerConfig,
        private readonly deps: SchedulerDeps,
    ) {
        const now = deps.clock.now();
        const { initialLookbackMs } = config.poll;
        this.state = Object.freeze({
            phase: 'idle',
            lastNewsCheck: initialLookbackMs > 0 ? new Date(now.getTime() - initialLookbackMs) : null,
            lastDigestEmitted: Object.freeze({}),
            nextWakeup: now,
            digestPlan: null,
        });
    }

    /** Read-only view of the current schedule. */
    get snapshot(): ScheduleState {
        return this.state;
    }

    get isStopping(): boolean {
        return this.stopping;
    }

    // ---- Decision cycle ----

    /**
     * One wakeup: prune, plan, act (with backoff), schedule the next wakeup.
     */
    async tick(): Promise<ScheduleState> {
        const now = this.deps.clock.now();
        this.deps.dedup.prune(now);
        this.transition({ digestPlan: this.planFor(now) });

        const slot = this.dueSlot(now);
        if (slot) {
            await this.withBackoff(`digest ${slot}`, 'emitting_digest', () => this.emitDigest(slot));
        } else {
            await this.withBackoff('news check', 'checking_news', async () => (await this.checkNews()).outcome);
        }

        this.transition({ phase: 'idle', nextWakeup: this.computeNextWakeup(this.deps.clock.now()) });
        log.debug('Next wakeup scheduled', { at: this.state.nextWakeup.toISOString() });
        return this.state;
    }

    /**
     * Pull everything since the cursor and run each item through
     * filter → claim → synthesize → publish, in source-timestamp order.
     */
    async checkNews(): Promise<{ outcome: ActionOutcome; summary: BatchSummary }> {
        const summary: BatchSummary = { pulled: 0, published: 0, filtered: 0, duplicate: 0, failed: 0, interrupted: false };
        const since = this.state.lastNewsCheck;

        let batch: RawMessage[];
        try {
            batch = await withTimeout(
                signal => this.deps.source.pull(since, signal),
                this.config.ingestionTimeoutMs,
                'ingestion pull',
            );
        } catch (error) {
            log.warn('Ingestion pull failed', { error: errorMessage(error) });
            return { outcome: classifyError(error), summary };
        }

        const ordered = [...batch].sort((a, b) => a.sourceTimestamp.getTime() - b.sourceTimestamp.getTime());
        summary.pulled = ordered.length;

        let newest = since;
        let holdAt: Date | null = null;

        for (const message of ordered) {
            if (this.stopping) {
                summary.interrupted = true;
                log.info('Shutdown requested — leaving the rest of the batch for next run', {
                    remaining: ordered.length - summary.published - summary.filtered - summary.duplicate - summary.failed,
                });
                break;
            }

            const outcome = await this.processItem(message);
            switch (outcome) {
                case 'published': summary.published++; break;
                case 'filtered': summary.filtered++; break;
                case 'duplicate':
                case 'skipped': summary.duplicate++; break;
                case 'retry':
                case 'abandoned': summary.failed++; break;
            }
            if (outcome === 'retry' && holdAt === null) holdAt = message.sourceTimestamp;
            if (newest === null || message.sourceTimestamp > newest) newest = message.sourceTimestamp;
        }

        // An interrupted batch keeps its cursor so the next run sees it whole
        if (!summary.interrupted) {
            const cursor = holdAt ? new Date(holdAt.getTime() - 1) : newest;
            this.transition({ lastNewsCheck: cursor });
        }

        if (summary.pulled > 0) log.info('News batch processed', { ...summary });
        return { outcome: 'done', summary };
    }

    private async processItem(message: RawMessage): Promise<ItemOutcome> {
        const { filter, dedup, synthesizer, gate } = this.deps;
        const key = message.sourceId;

        const verdict = filter.classify(message.rawText);
        if (!verdict.relevant) {
            log.debug('Filtered out', { key, reason: verdict.reason });
            return 'filtered';
        }

        const previous = dedup.get(key);
        if (previous?.status === 'failed' && (previous.abandoned || previous.attempts >= this.config.maxItemAttempts)) {
            return 'skipped';
        }
        if (!dedup.claim(key, 'news')) return 'duplicate';

        const item: NewsItem = Object.freeze({
            sourceId: message.sourceId,
            rawText: message.rawText,
            sourceTimestamp: message.sourceTimestamp,
            matchedKeywords: new Set(verdict.matched),
        });

        let text: string;
        try {
            text = await synthesizer.synthesize({ kind: 'news', item });
        } catch (error) {
            log.warn('Synthesis failed', { key, error: errorMessage(error) });
            return this.failItem(key, classifyError(error) === 'permanent');
        }

        if (this.config.recheckGeneratedRelevance && !filter.isRelevant(text)) {
            log.warn('Generated post lost the topic — dropping it', { key, preview: text.slice(0, 120) });
            return this.failItem(key, true);
        }

        // Two sources retelling one story can produce the same post
        if (dedup.hasPublishedContent(text)) {
            log.info('Same post already went out — skipping', { key, preview: text.slice(0, 80) });
            dedup.release(key, { abandon: true });
            return 'duplicate';
        }

        const post = await synthesizer.addOpinion(text);
        const result = await gate.publish({ text: post }, `news ${key}`);
        if (result.status === 'published') {
            dedup.markPublished(key, text);
            return 'published';
        }
        return this.failItem(key, result.permanent);
    }

    private failItem(key: string, permanent: boolean): ItemOutcome {
        const exhausted = this.deps.dedup.attempts(key) >= this.config.maxItemAttempts;
        const abandon = permanent || exhausted;
        this.deps.dedup.release(key, { abandon });
        if (abandon) {
            log.warn('Giving up on item', { key, permanent, attempts: this.deps.dedup.attempts(key) });
            return 'abandoned';
        }
        return 'retry';
    }

    /**
     * Publish today's digest for `slot` unless it already went out.
     */
    async emitDigest(slot: DigestSlot): Promise<ActionOutcome> {
        const { dedup, digests, gate, clock } = this.deps;
        const today = localTime(clock.now(), this.config.digest.timeZone).date;

        if (this.state.lastDigestEmitted[slot] === today) {
            log.debug('Digest already emitted today', { slot, date: today });
            return 'done';
        }

        const key = digestKey(today, slot);
        if (this.isAbandoned(today, slot)) {
            log.debug('Digest abandoned for today', { key });
            return 'done';
        }
        if (!dedup.claim(key, slotKinds[slot])) {
            log.debug('Digest already claimed', { key });
            return 'done';
        }

        let text: string;
        try {
            text = await digests.buildDigest(slot);
        } catch (error) {
            const outcome = classifyError(error);
            dedup.release(key, { abandon: outcome === 'permanent' });
            log.warn(`Digest build failed (${outcome})`, { key, error: errorMessage(error) });
            return outcome;
        }

        const result = await gate.publish({ text }, `digest ${key}`);
        if (result.status === 'failed') {
            dedup.release(key, { abandon: result.permanent });
            return result.permanent ? 'permanent' : 'transient';
        }

        dedup.markPublished(key);
        this.transition({ lastDigestEmitted: Object.freeze({ ...this.state.lastDigestEmitted, [slot]: today }) });
        return 'done';
    }

    /**
     * Run an action; on a transient outcome wait the fixed backoff delay and
     * retry it, a bounded number of times. Permanent outcomes end the cycle.
     */
    private async withBackoff(label: string, phase: SchedulerPhase, action: () => Promise<ActionOutcome>): Promise<ActionOutcome> {
        const { delayMs, maxRetries } = this.config.backoff;
        if (this.stopping) return 'done';

        this.transition({ phase });
        let outcome = await action();

        for (let retry = 1; outcome === 'transient' && retry <= maxRetries; retry++) {
            this.transition({ phase: 'backoff' });
            log.info(`${label}: transient failure, retry ${retry}/${maxRetries} in ${delayMs}ms`);
            await this.deps.clock.sleep(delayMs, this.abort.signal);
            if (this.stopping) return outcome;

            this.transition({ phase });
            outcome = await action();
        }

        if (outcome === 'transient') {
            log.error(`${label}: giving up for this cycle after ${maxRetries} retries`);
        } else if (outcome === 'permanent') {
            log.warn(`${label}: permanent failure — skipping this cycle`);
        }
        return outcome;
    }

    // ---- Timing ----

    private planFor(now: Date): DigestPlan {
        const { timeZone, times, jitterMinutes: band } = this.config.digest;
        const { date } = localTime(now, timeZone);
        const current = this.state.digestPlan;
        if (current?.date === date) return current;

        const dueMinutes: Record<DigestSlot, number> = { morning: 0, evening: 0 };
        for (const slot of digestSlots) {
            const planned = times[slot] + jitterMinutes(band, this.deps.rng);
            dueMinutes[slot] = Math.min(MINUTES_PER_DAY - 1, Math.max(0, planned));
        }
        const plan = Object.freeze({ date, dueMinutes: Object.freeze(dueMinutes) });
        log.debug('Digest plan for the day', {
            date,
            morning: formatTimeOfDay(dueMinutes.morning),
            evening: formatTimeOfDay(dueMinutes.evening),
        });
        return plan;
    }

    /** A permanent failure takes the slot out of today's plan. */
    private isAbandoned(date: string, slot: DigestSlot): boolean {
        return this.deps.dedup.get(digestKey(date, slot))?.abandoned === true;
    }

    /** The first slot whose window is open and that has not gone out or been abandoned today. */
    private dueSlot(now: Date): DigestSlot | null {
        const plan = this.state.digestPlan;
        if (!plan) return null;
        const { minuteOfDay } = localTime(now, this.config.digest.timeZone);

        for (const slot of digestSlots) {
            if (this.state.lastDigestEmitted[slot] === plan.date || this.isAbandoned(plan.date, slot)) continue;
            const due = plan.dueMinutes[slot];
            if (minuteOfDay >= due && minuteOfDay < due + this.config.digest.windowMinutes) return slot;
        }
        return null;
    }

    /** Earliest instant a pending slot of today's plan becomes (or already is) due. */
    private nextDigestDue(now: Date): Date | null {
        const plan = this.state.digestPlan;
        if (!plan) return null;
        const local = localTime(now, this.config.digest.timeZone);
        if (local.date !== plan.date) return null;

        let earliest: Date | null = null;
        for (const slot of digestSlots) {
            if (this.state.lastDigestEmitted[slot] === plan.date || this.isAbandoned(plan.date, slot)) continue;
            const due = plan.dueMinutes[slot];
            if (local.minuteOfDay >= due + this.config.digest.windowMinutes) continue;
            const waitMs = Math.max(0, due * 60 - local.secondOfDay) * 1000;
            const at = new Date(now.getTime() + waitMs);
            if (!earliest || at < earliest) earliest = at;
        }
        return earliest;
    }

    /**
     * `now + base ± jitter`, never sooner than the minimum interval, pulled in
     * to the next pending digest when that comes first.
     */
    computeNextWakeup(now: Date): Date {
        const { baseIntervalMs, jitterMs, minIntervalMs } = this.config.poll;
        const earliest = now.getTime() + minIntervalMs;
        let wake = Math.max(earliest, now.getTime() + nextInterval(baseIntervalMs, jitterMs, this.deps.rng));

        const digestAt = this.nextDigestDue(now);
        if (digestAt && digestAt.getTime() < wake) wake = Math.max(earliest, digestAt.getTime());
        return new Date(wake);
    }

    // ---- Lifecycle ----

    /** Start the loop; calling again returns the same loop. */
    run(): Promise<void> {
        this.loop ??= this.runLoop();
        return this.loop;
    }

    /**
     * Stop after the in-flight item. Resolves once the loop has exited.
     */
    async shutdown(): Promise<void> {
        if (!this.stopping) {
            this.stopping = true;
            log.info('Shutdown requested');
            this.abort.abort();
        }
        await this.loop;
    }

    private async runLoop(): Promise<void> {
        log.info('Scheduler started', { firstWakeup: this.state.nextWakeup.toISOString() });
        while (!this.stopping) {
            const waitMs = this.state.nextWakeup.getTime() - this.deps.clock.now().getTime();
            if (waitMs > 0) await this.deps.clock.sleep(waitMs, this.abort.signal);
            if (this.stopping) break;

            try {
                await this.tick();
            } catch (error) {
                log.error('Tick failed unexpectedly', { error: errorMessage(error) });
                this.transition({ phase: 'idle', nextWakeup: this.computeNextWakeup(this.deps.clock.now()) });
            }
        }
        this.transition({ phase: 'idle' });
        log.info('Scheduler stopped');
    }

    private transition(patch: Partial<ScheduleState>): void {
        const previous = this.state.phase;
        this.state = Object.freeze({ ...this.state, ...patch });
        if (patch.phase && patch.phase !== previous) {
            log.debug(`${previous} → ${patch.phase}`);
        }
    }
}
