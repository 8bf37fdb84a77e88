import { createLogger } from '../logger.js';
import { KeywordFilter, loadKeywordFile } from '../engine/filter.js';
import { Deduplicator } from '../engine/dedup.js';
import { ContentSynthesizer } from '../engine/content.js';
import { loadOpinionLexicon } from '../engine/opinion.js';
import { DigestBuilder } from '../engine/digest.js';
import { PublishGate } from '../engine/publish-gate.js';
import { loadPromptTemplates } from '../personality/prompts.js';
import { Scheduler, type ScheduleState } from './scheduler.js';
import { systemClock, type Clock, type RandomSource } from './clock.js';
import type { AppConfig } from '../config.js';
import type { ChannelSource, PriceSource, PublishSink, TextGenerator } from '../types.js';

// ============================================================================
// Herald — Pipeline Wiring
// Builds the six components from config and starts the scheduler loop
// ============================================================================

const log = createLogger('Run');

export interface Capabilities {
    source: ChannelSource;
    generator: TextGenerator;
    prices: PriceSource;
    sink: PublishSink;
    clock?: Clock;
    rng?: RandomSource;
}

export interface Pipeline {
    filter: KeywordFilter;
    dedup: Deduplicator;
    synthesizer: ContentSynthesizer;
    digests: DigestBuilder;
    gate: PublishGate;
    scheduler: Scheduler;
}

export interface SchedulerHandle {
    /** Settles when the loop has exited */
    done: Promise<void>;
    shutdown(): Promise<void>;
    snapshot(): ScheduleState;
}

export function buildPipeline(config: AppConfig, capabilities: Capabilities): Pipeline {
    const clock = capabilities.clock ?? systemClock;
    const rng = capabilities.rng ?? Math.random;

    const keywords = loadKeywordFile(config.keywords.path);
    const filter = new KeywordFilter({
        groups: keywords.groups,
        blocked: keywords.blocked,
        guards: keywords.guards,
        emptyPolicy: config.keywords.emptyPolicy ?? keywords.emptyPolicy,
    });

    const dedup = new Deduplicator(config.dedupRetentionMs, () => clock.now());

    const synthesizer = new ContentSynthesizer(capabilities.generator, loadPromptTemplates(config.promptsDir), {
        ...config.synthesis,
        sourceChannels: config.sources.channels,
        secrets: [config.anthropic.apiKey, config.telegram.botToken],
        opinion: config.opinion.enabled ? loadOpinionLexicon(config.opinion.tonePath) : undefined,
    });

    const digests = new DigestBuilder(capabilities.prices, {
        assetSymbol: config.digest.assetSymbol,
        timeoutMs: config.digest.timeoutMs,
        priceDecimals: config.digest.priceDecimals,
        changeDecimals: config.digest.changeDecimals,
        commentary: config.digest.commentary ? synthesizer : undefined,
    });

    const gate = new PublishGate(capabilities.sink, {
        channelId: config.telegram.channelId,
        ...config.publish,
        sleep: ms => clock.sleep(ms),
    });

    const scheduler = new Scheduler(config.scheduler, {
        source: capabilities.source,
        filter,
        dedup,
        synthesizer,
        digests,
        gate,
        clock,
        rng,
    });

    log.debug('Pipeline built', { keywordGroups: filter.groupNames, channels: config.sources.channels });
    return { filter, dedup, synthesizer, digests, gate, scheduler };
}

/**
 * Start the scheduler loop. It runs until `shutdown()` is called.
 */
export function run(config: AppConfig, capabilities: Capabilities): SchedulerHandle {
    const { scheduler } = buildPipeline(config, capabilities);
    const done = scheduler.run();
    return {
        done,
        shutdown: () => scheduler.shutdown(),
        snapshot: () => scheduler.snapshot,
    };
}
