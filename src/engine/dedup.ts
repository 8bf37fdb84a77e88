import { createHash } from 'node:crypto';
import { createLogger } from '../logger.js';
import type { PublicationKind, PublicationRecord } from '../types.js';

// ============================================================================
// Herald — Deduplicator
// In-memory claim table: one publication per dedup key per process lifetime
// ============================================================================

const log = createLogger('Dedup');

export const DEFAULT_RETENTION_MS = 7 * 24 * 60 * 60 * 1000;

/**
 * Fingerprint of a post body, insensitive to case and whitespace.
 */
export function contentHash(text: string): string {
    const normalized = text.trim().toLowerCase().split(/\s+/).join(' ');
    return createHash('sha256').update(normalized).digest('hex').slice(0, 16);
}

export class Deduplicator {
    private readonly records = new Map<string, PublicationRecord>();
    /** Content hash → dedup key of the record that published it */
    private readonly published = new Map<string, string>();

    constructor(
        private readonly retentionMs: number = DEFAULT_RETENTION_MS,
        private readonly now: () => Date = () => new Date(),
    ) {}

    /**
     * Atomic check-and-set. Succeeds when the key is unknown or its last
     * attempt failed; a pending or published key cannot be claimed again.
     */
    claim(dedupKey: string, kind: PublicationKind): boolean {
        const existing = this.records.get(dedupKey);
        if (existing && existing.status !== 'failed') return false;

        this.records.set(dedupKey, {
            kind,
            dedupKey,
            status: 'pending',
            claimedAt: this.now(),
            attempts: (existing?.attempts ?? 0) + 1,
        });
        return true;
    }

    /**
     * Revert a pending claim so a later cycle may retry the key. With `abandon`
     * the record stays claimable but is flagged so callers can skip it.
     */
    release(dedupKey: string, options?: { abandon?: boolean }): void {
        const record = this.records.get(dedupKey);
        if (!record || record.status !== 'pending') return;
        record.status = 'failed';
        record.abandoned = options?.abandon ?? false;
    }

    /**
     * Settle a pending claim. With `content`, its hash is remembered so the
     * same post under another key can be caught by `hasPublishedContent`.
     */
    markPublished(dedupKey: string, content?: string): void {
        const record = this.records.get(dedupKey);
        if (!record || record.status !== 'pending') {
            log.warn('markPublished on a key that is not pending', { dedupKey, status: record?.status ?? 'missing' });
            return;
        }
        record.status = 'published';
        record.publishedAt = this.now();
        if (content !== undefined) {
            record.contentHash = contentHash(content);
            this.published.set(record.contentHash, dedupKey);
        }
    }

    hasPublishedContent(content: string): boolean {
        return this.published.has(contentHash(content));
    }

    get(dedupKey: string): Readonly<PublicationRecord> | undefined {
        return this.records.get(dedupKey);
    }

    attempts(dedupKey: string): number {
        return this.records.get(dedupKey)?.attempts ?? 0;
    }

    get size(): number {
        return this.records.size;
    }

    /**
     * Evict records older than the retention window. Pending records are kept:
     * their owner still has to settle them.
     */
    prune(now: Date = this.now()): number {
        const cutoff = now.getTime() - this.retentionMs;
        let evicted = 0;
        for (const [key, record] of this.records) {
            if (record.status === 'pending') continue;
            const touchedAt = (record.publishedAt ?? record.claimedAt).getTime();
            if (touchedAt < cutoff) {
                this.records.delete(key);
                if (record.contentHash) this.published.delete(record.contentHash);
                evicted++;
            }
        }
        if (evicted > 0) log.debug(`Pruned ${evicted} publication record(s)`, { remaining: this.records.size });
        return evicted;
    }
}
