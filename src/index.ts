#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig, type AppConfig } from './config.js';
import { setLogLevel, createLogger } from './logger.js';
import { ConfigError, errorMessage } from './errors.js';
import { AnthropicGenerator } from './engine/llm.js';
import { CoinGeckoPriceSource } from './data/market.js';
import { RssChannelSource } from './data/channel-feed.js';
import { DryRunSink, TelegramSink } from './platforms/telegram.js';
import { buildPipeline, run, type Capabilities } from './scheduler/run.js';
import { digestSlots, type DigestSlot } from './types.js';

// ============================================================================
// Herald — Entry Point
// Autonomous publisher for a crypto news channel
// ============================================================================

const log = createLogger('Herald');

function readConfig(): AppConfig {
    try {
        return loadConfig();
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error('❌ Invalid environment configuration:');
            for (const issue of error.issues) {
                console.error(`  → ${issue}`);
            }
            process.exit(1);
        }
        throw error;
    }
}

function buildCapabilities(config: AppConfig): Capabilities {
    return {
        source: new RssChannelSource({
            channels: config.sources.channels,
            feedUrlTemplate: config.sources.feedUrlTemplate,
        }),
        generator: new AnthropicGenerator(config.anthropic),
        prices: new CoinGeckoPriceSource({
            apiUrl: config.digest.priceApiUrl,
            coinIds: { [config.digest.assetSymbol.toUpperCase()]: config.digest.coingeckoId },
            secondaryCurrency: config.digest.secondaryCurrency,
        }),
        sink: config.postingEnabled ? new TelegramSink({ botToken: config.telegram.botToken }) : new DryRunSink(),
    };
}

function isDigestSlot(value: string | undefined): value is DigestSlot {
    return digestSlots.some(slot => slot === value);
}

function printPost(title: string, text: string) {
    console.log('\n' + '═'.repeat(60));
    console.log(title);
    console.log('═'.repeat(60));
    console.log(text);
    console.log('═'.repeat(60) + '\n');
}

async function main() {
    const config = readConfig();
    setLogLevel(config.logLevel);

    console.log(`
  ╔═══════════════════════════════════════╗
  ║   Channel Herald                      ║
  ║   News and digests for ${config.telegram.channelId.padEnd(15).slice(0, 15)}║
  ╚═══════════════════════════════════════╝
  `);

    log.info('=== Capability Check ===');
    log.info(`  Sources:        ${config.sources.channels.map(c => `@${c}`).join(', ')}`);
    log.info(`  Anthropic LLM:  [OK] ${config.anthropic.model}`);
    log.info(`  Price data:     ${config.digest.assetSymbol} via ${config.digest.priceApiUrl}`);
    log.info(`  Digests:        ${config.scheduler.digest.timeZone}, commentary ${config.digest.commentary ? 'on' : 'off'}`);
    log.info(`  Posting Mode:   ${config.postingEnabled ? '[LIVE]' : '[DRY RUN]'} → ${config.telegram.channelId}`);
    log.info('========================');

    const capabilities = buildCapabilities(config);
    const args = process.argv.slice(2);

    if (args[0] === 'test') {
        // Test mode: classify a text, rewrite it, print it (no posting)
        const text = args.slice(1).join(' ').trim();
        if (!text) {
            console.error('Usage: herald test "<news text>"');
            process.exit(1);
        }
        const { filter, synthesizer } = buildPipeline(config, capabilities);
        const verdict = filter.classify(text);
        console.log(`Relevant: ${verdict.relevant} (${verdict.reason})${verdict.matched.length ? ` — ${verdict.matched.join(', ')}` : ''}`);

        const post = await synthesizer.synthesize({
            kind: 'news',
            item: Object.freeze({
                sourceId: 'cli:test',
                rawText: text,
                sourceTimestamp: new Date(),
                matchedKeywords: new Set(verdict.matched),
            }),
        });
        printPost('Generated post', await synthesizer.addOpinion(post));
        process.exit(0);
    }

    if (args[0] === 'digest') {
        // Build one digest and print it (no posting)
        const slot = args[1];
        if (!isDigestSlot(slot)) {
            console.error(`Usage: herald digest <${digestSlots.join('|')}>`);
            process.exit(1);
        }
        const { digests } = buildPipeline(config, capabilities);
        printPost(`${slot} digest`, await digests.buildDigest(slot));
        process.exit(0);
    }

    if (args[0] === 'once') {
        // Run a single decision cycle, then exit
        const { scheduler } = buildPipeline(config, capabilities);
        const state = await scheduler.tick();
        log.info('Cycle complete', { lastNewsCheck: state.lastNewsCheck?.toISOString() ?? null });
        process.exit(0);
    }

    // Default: start the scheduler
    const handle = run(config, capabilities);

    // Graceful shutdown: finish the in-flight item, then exit
    const shutdown = (signal: string) => {
        log.info(`Received ${signal} — shutting down after the current item...`);
        handle.shutdown().then(
            () => process.exit(0),
            (error: unknown) => {
                log.error('Shutdown failed', { error: errorMessage(error) });
                process.exit(1);
            },
        );
    };

    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    log.info('Herald is running. Press Ctrl+C to stop.');
    await handle.done;
}

// === Global Error Handlers ===
process.on('unhandledRejection', (reason) => {
    const log = createLogger('Process');
    log.error('Unhandled promise rejection', { reason: String(reason) });
});

process.on('uncaughtException', (error) => {
    const log = createLogger('Process');
    log.error('FATAL: Uncaught exception — process will exit', {
        error: error.message,
        stack: error.stack?.slice(0, 500),
    });
    process.exit(1);
});

main().catch((error: unknown) => {
    console.error('Fatal error:', errorMessage(error));
    process.exit(1);
});
