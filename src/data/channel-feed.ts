import Parser from 'rss-parser';
import { createLogger } from '../logger.js';
import { IngestionError, errorMessage } from '../errors.js';
import type { FetchLike } from './market.js';
import type { ChannelSource, RawMessage } from '../types.js';

// ============================================================================
// Herald — Channel Feeds
// Pulls monitored Telegram channels through their RSS mirrors
// ============================================================================

const log = createLogger('ChannelFeed');

export interface ChannelFeedOptions {
    /** Channel handles without the leading @ */
    channels: readonly string[];
    /** Feed URL with a `{channel}` placeholder */
    feedUrlTemplate: string;
    fetch?: FetchLike;
}

interface FeedItem {
    guid?: string;
    link?: string;
    title?: string;
    content?: string;
    contentSnippet?: string;
    isoDate?: string;
    pubDate?: string;
}

function stripHtml(html: string): string {
    return html.replace(/<br\s*\/?>/gi, '\n').replace(/<[^>]+>/g, '').trim();
}

/**
 * `channel:<message id>` when the reference ends in a numeric post id
 * (t.me/channel/123), otherwise `channel:<reference>`.
 */
export function messageKey(channel: string, item: Pick<FeedItem, 'guid' | 'link'>): string | null {
    const ref = item.guid || item.link;
    if (!ref) return null;
    const postId = /\/(\d+)\/?$/.exec(ref)?.[1];
    return `${channel}:${postId ?? ref}`;
}

export function toRawMessage(channel: string, item: FeedItem): RawMessage | null {
    const sourceId = messageKey(channel, item);
    const stamp = item.isoDate ?? item.pubDate;
    const sourceTimestamp = stamp ? new Date(stamp) : null;
    const rawText = item.contentSnippet?.trim() || (item.content ? stripHtml(item.content) : '') || item.title?.trim() || '';

    if (!sourceId || !sourceTimestamp || Number.isNaN(sourceTimestamp.getTime())) return null;
    return { sourceId, rawText, sourceTimestamp };
}

export class RssChannelSource implements ChannelSource {
    private readonly parser = new Parser();
    private readonly fetchImpl: FetchLike;

    constructor(private readonly options: ChannelFeedOptions) {
        this.fetchImpl = options.fetch ?? fetch;
    }

    feedUrl(channel: string): string {
        return this.options.feedUrlTemplate.replace('{channel}', encodeURIComponent(channel));
    }

    /**
     * Every channel must answer; one failing feed fails the pull so the
     * shared cursor never moves past messages it has not seen.
     */
    async pull(since: Date | null, signal: AbortSignal): Promise<RawMessage[]> {
        const batches = await Promise.all(this.options.channels.map(channel => this.pullChannel(channel, signal)));
        const messages = batches
            .flat()
            .filter(m => since === null || m.sourceTimestamp.getTime() > since.getTime())
            .sort((a, b) => a.sourceTimestamp.getTime() - b.sourceTimestamp.getTime());

        log.debug('Pulled channel feeds', { channels: this.options.channels.length, fresh: messages.length });
        return messages;
    }

    private async pullChannel(channel: string, signal: AbortSignal): Promise<RawMessage[]> {
        const url = this.feedUrl(channel);

        let xml: string;
        try {
            const response = await this.fetchImpl(url, { signal });
            if (!response.ok) throw new Error(`HTTP ${response.status}`);
            xml = await response.text();
        } catch (error) {
            throw new IngestionError(`Feed for @${channel} failed: ${errorMessage(error)}`, { cause: error });
        }

        let items: FeedItem[];
        try {
            items = (await this.parser.parseString(xml)).items;
        } catch (error) {
            throw new IngestionError(`Feed for @${channel} is not valid RSS: ${errorMessage(error)}`, { cause: error });
        }

        const messages: RawMessage[] = [];
        for (const item of items) {
            const message = toRawMessage(channel, item);
            if (message) messages.push(message);
            else log.debug('Skipping feed item without id or date', { channel, title: item.title?.slice(0, 60) });
        }
        return messages;
    }
}
