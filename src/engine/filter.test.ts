import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { KeywordFilter, isServiceMessage, loadKeywordFile } from './filter.js';
import { ConfigError } from '../errors.js';

// ============================================================================
// Keyword Filter — Unit Tests
// ============================================================================

describe('KeywordFilter.isRelevant', () => {
    const filter = new KeywordFilter({ groups: { crypto: ['ton', 'bitcoin'] }, emptyPolicy: 'reject_all' });

    it('accepts text with a group hit regardless of case', () => {
        expect(filter.isRelevant('TON price surges')).toBe(true);
    });

    it('rejects off-topic text', () => {
        expect(filter.isRelevant('weather today')).toBe(false);
    });

    it('rejects empty and whitespace-only text', () => {
        expect(filter.isRelevant('')).toBe(false);
        expect(filter.isRelevant('   \n\t')).toBe(false);
    });

    it('only matches terms at the start of a word', () => {
        expect(filter.isRelevant('Snow in Washington')).toBe(false);
    });

    it('pins terms marked with $ to whole words', () => {
        const tickers = new KeywordFilter({ groups: { crypto: ['ton$'] }, emptyPolicy: 'reject_all' });
        expect(tickers.classify('TON, again')).toMatchObject({ relevant: true, matched: ['ton'] });
        expect(tickers.isRelevant('Weather tonight: a tonne of snow')).toBe(false);
        expect(filter.isRelevant('Weather tonight')).toBe(true);
    });

    it('matches stems as word prefixes', () => {
        const stems = new KeywordFilter({ groups: { crypto: ['крипт'] }, emptyPolicy: 'reject_all' });
        expect(stems.isRelevant('Криптовалюта снова растёт')).toBe(true);
    });
});

describe('KeywordFilter.classify', () => {
    it('reports matched terms and contributing groups', () => {
        const filter = new KeywordFilter({
            groups: { crypto: ['ton', 'bitcoin'], metals: ['gold'] },
            emptyPolicy: 'reject_all',
        });
        expect(filter.classify('TON and Bitcoin rally')).toEqual({
            relevant: true,
            reason: 'matched',
            groups: ['crypto'],
            matched: ['ton', 'bitcoin'],
        });
    });

    it('applies the accept_all policy when no groups exist', () => {
        const filter = new KeywordFilter({ groups: {}, emptyPolicy: 'accept_all' });
        expect(filter.classify('anything at all')).toMatchObject({ relevant: true, reason: 'no_groups' });
        expect(filter.isRelevant('')).toBe(false);
    });

    it('applies the reject_all policy when no groups exist', () => {
        const filter = new KeywordFilter({ groups: { empty: [] }, emptyPolicy: 'reject_all' });
        expect(filter.classify('bitcoin')).toMatchObject({ relevant: false, reason: 'no_groups' });
    });

    it('rejects blocked terms even with group hits', () => {
        const filter = new KeywordFilter({
            groups: { crypto: ['bitcoin'] },
            blocked: ['ukrain'],
            emptyPolicy: 'reject_all',
        });
        expect(filter.classify('Bitcoin donations to Ukraine')).toMatchObject({ relevant: false, reason: 'blocked' });
    });

    it('counts only strict groups once a guard marker hits', () => {
        const filter = new KeywordFilter({
            groups: { crypto: ['bitcoin'], currency: ['dollar'] },
            guards: [{ name: 'politics', markers: ['president'], strictGroups: ['crypto'] }],
            emptyPolicy: 'reject_all',
        });
        expect(filter.classify('President comments on the dollar')).toMatchObject({ relevant: false, reason: 'guarded' });
        expect(filter.classify('President buys bitcoin')).toEqual({
            relevant: true,
            reason: 'matched',
            groups: ['crypto'],
            matched: ['bitcoin'],
        });
        expect(filter.classify('The dollar weakens')).toMatchObject({ relevant: true, groups: ['currency'] });
    });

    it('rejects service messages', () => {
        const filter = new KeywordFilter({ groups: { crypto: ['ton'] }, emptyPolicy: 'accept_all' });
        expect(filter.classify('https://t.me/ton_news')).toMatchObject({ relevant: false, reason: 'service' });
    });
});

describe('isServiceMessage', () => {
    it('flags bare short links and download prompts', () => {
        expect(isServiceMessage('https://example.com/post/1')).toBe(true);
        expect(isServiceMessage('Download our app now')).toBe(true);
    });

    it('keeps links with commentary', () => {
        expect(isServiceMessage('TON hits a new high https://example.com/post/1')).toBe(false);
    });
});

describe('default keyword file', () => {
    const filter = new KeywordFilter(loadKeywordFile());

    it('accepts crypto news in both languages', () => {
        expect(filter.isRelevant('Toncoin обновил максимум')).toBe(true);
        expect(filter.isRelevant('Bitcoin ETF inflows hit a record')).toBe(true);
    });

    it('rejects unrelated news', () => {
        expect(filter.isRelevant('Погода в Москве: снег и ветер')).toBe(false);
        expect(filter.isRelevant('Weather tonight: heavy rain')).toBe(false);
        expect(filter.isRelevant('Тонкий лёд на реке, дожди до пятницы')).toBe(false);
    });

    it('rejects blocked topics', () => {
        expect(filter.classify('Зеленский и биткоин')).toMatchObject({ relevant: false, reason: 'blocked' });
    });

    it('keeps politics out unless a crypto term is present', () => {
        expect(filter.classify('Президент обсудил курс рубля')).toMatchObject({ relevant: false, reason: 'guarded' });
        expect(filter.classify('Президент обсудил налог на биткоин')).toMatchObject({ relevant: true });
    });
});

describe('loadKeywordFile', () => {
    it('throws a ConfigError on a malformed file', () => {
        const dir = mkdtempSync(join(tmpdir(), 'herald-keywords-'));
        const path = join(dir, 'keywords.json');
        writeFileSync(path, JSON.stringify({ groups: { crypto: 'bitcoin' } }));
        expect(() => loadKeywordFile(path)).toThrow(ConfigError);
    });

    it('throws a ConfigError when the file is missing', () => {
        expect(() => loadKeywordFile('/nonexistent/keywords.json')).toThrow(ConfigError);
    });
});
