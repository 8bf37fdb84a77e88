import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { cleanReaction, determineTone, formatOpinion, loadOpinionLexicon } from './opinion.js';
import { ConfigError } from '../errors.js';

// ============================================================================
// Opinion Footer — Unit Tests
// ============================================================================

const lexicon = loadOpinionLexicon();

describe('determineTone', () => {
    it('reads growth as positive', () => {
        expect(determineTone('Toncoin вырос на 12% за сутки', lexicon)).toBe('positive');
    });

    it('reads a crash as negative', () => {
        expect(determineTone('Биржа слила депозиты, очередной скам', lexicon)).toBe('negative');
    });

    it('breaks ties toward negative', () => {
        expect(determineTone('Durov posted an update', lexicon)).toBe('negative');
    });
});

describe('cleanReaction', () => {
    it('strips emoji, quotes and trailing punctuation', () => {
        expect(cleanReaction('🤡 «скам как всегда!»', 'negative', lexicon)).toBe('скам как всегда');
    });

    it('drops leading dashes', () => {
        expect(cleanReaction('— комиссии съели', 'negative', lexicon)).toBe('комиссии съели');
    });

    it('caps the phrase length', () => {
        expect(cleanReaction('раз два три четыре пять шесть семь восемь девять', 'positive', lexicon))
            .toBe('раз два три четыре пять шесть семь');
    });

    it('returns null when nothing is left', () => {
        expect(cleanReaction(' 🔥 ... ', 'positive', lexicon)).toBeNull();
    });

    it('swaps in the stock phrase for forbidden words', () => {
        expect(cleanReaction('мефедрон в блокчейне', 'negative', lexicon)).toBe('крипта скам');
    });
});

describe('formatOpinion', () => {
    it('puts the tone emoji before the phrase', () => {
        expect(formatOpinion('positive', 'закупился')).toBe('🔥 - закупился');
    });
});

describe('loadOpinionLexicon', () => {
    it('rejects a file without fallback phrases', () => {
        const dir = mkdtempSync(join(tmpdir(), 'herald-tone-'));
        const path = join(dir, 'tone.json');
        writeFileSync(path, JSON.stringify({ negative: ['скам'], positive: ['рост'] }));
        expect(() => loadOpinionLexicon(path)).toThrow(ConfigError);
    });
});
