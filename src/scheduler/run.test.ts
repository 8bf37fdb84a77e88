import { describe, it, expect } from 'vitest';
import { buildPipeline, run, type SchedulerHandle } from './run.js';
import { loadConfig } from '../config.js';
import { FakeClock, FakeGenerator, FakePriceSource, RecordingSink, fixedRandom, rawMessage } from '../testing/fakes.js';
import type { ChannelSource } from '../types.js';

const config = loadConfig({
    ANTHROPIC_API_KEY: 'test-key',
    TELEGRAM_BOT_TOKEN: 'test-token',
    TELEGRAM_CHANNEL_ID: '@test_channel',
    SOURCE_CHANNELS: 'markettwits',
});

describe('run', () => {
    it('wires the default keyword and prompt files into a working loop', async () => {
        let handle: SchedulerHandle | undefined;
        let stopped: Promise<void> | undefined;
        const source: ChannelSource = {
            pull: async since => {
                stopped ??= handle?.shutdown();
                return [rawMessage('markettwits:1', 'Биткоин обновил максимум', '2026-10-18T06:00:00Z')]
                    .filter(m => since === null || m.sourceTimestamp > since);
            },
        };
        const sink = new RecordingSink();
        const generator = new FakeGenerator(r => (r.prompt.includes('Биткоин обновил максимум')
            ? 'Биткоин снова вырос, хомяки в шоке'
            : 'закупился на хаях'));

        // 09:30 in Moscow, between the digest slots
        handle = run(config, {
            source,
            generator,
            prices: new FakePriceSource(),
            sink,
            clock: new FakeClock('2026-10-18T06:30:00Z'),
            rng: fixedRandom(0.5),
        });
        await handle.done;
        await stopped;

        expect(sink.sent).toEqual([{
            channelId: '@test_channel',
            content: { text: 'Биткоин снова вырос, хомяки в шоке\n\n🔥 - закупился на хаях' },
        }]);
        expect(generator.requests[0]?.prompt).toContain('Биткоин обновил максимум');
        expect(handle.snapshot().lastNewsCheck).toEqual(new Date('2026-10-18T06:00:00Z'));
    });

    it('builds a filter from the bundled keywords', () => {
        const { filter } = buildPipeline(config, {
            source: { pull: async () => [] },
            generator: new FakeGenerator(),
            prices: new FakePriceSource(),
            sink: new RecordingSink(),
        });
        expect(filter.isRelevant('TON price surges')).toBe(true);
        expect(filter.isRelevant('weather today')).toBe(false);
    });
});
