import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createLogger } from '../logger.js';
import { ConfigError } from '../errors.js';

// ============================================================================
// Herald — Keyword Filter
// Decides whether a raw channel message is on-topic by matching keyword groups
// ============================================================================

const log = createLogger('Filter');

export const emptyPolicies = ['accept_all', 'reject_all'] as const;
export type EmptyGroupsPolicy = typeof emptyPolicies[number];

/**
 * When any marker hits, only hits from `strictGroups` count toward relevance.
 * Used to keep e.g. geopolitics out unless a hard crypto term is present.
 */
export interface KeywordGuard {
    name: string;
    markers: readonly string[];
    strictGroups: readonly string[];
}

export interface KeywordFilterOptions {
    groups: Readonly<Record<string, readonly string[]>>;
    /** Any hit rejects the text outright */
    blocked?: readonly string[];
    guards?: readonly KeywordGuard[];
    /** What to do when no keyword group is configured at all */
    emptyPolicy: EmptyGroupsPolicy;
}

export type FilterReason = 'matched' | 'no_match' | 'empty' | 'service' | 'blocked' | 'guarded' | 'no_groups';

export interface FilterVerdict {
    relevant: boolean;
    reason: FilterReason;
    /** Groups that contributed at least one counted hit */
    groups: string[];
    /** Counted terms, lower-cased */
    matched: string[];
}

interface CompiledTerm {
    term: string;
    exact: boolean;
    pattern: RegExp;
}

function escapeRegExp(s: string): string {
    return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function normalizeText(text: string): string {
    return text.toLowerCase().replace(/ё/g, 'е').replace(/\s+/g, ' ').trim();
}

/**
 * A term hits when it starts a word: `крипт` matches "криптовалюта",
 * `ton` matches "TON" but not "Washington". A trailing `$` pins the term to
 * whole words, so `ton$` also skips "tonight".
 */
function compileTerm(raw: string): CompiledTerm | null {
    const exact = raw.trimEnd().endsWith('$');
    const term = normalizeText(exact ? raw.trimEnd().slice(0, -1) : raw);
    if (!term) return null;
    const tail = exact ? '(?![\\p{L}\\p{N}_])' : '';
    return { term, exact, pattern: new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(term)}${tail}`, 'u') };
}

function compileTerms(terms: readonly string[]): CompiledTerm[] {
    const seen = new Set<string>();
    const out: CompiledTerm[] = [];
    for (const raw of terms) {
        const compiled = compileTerm(raw);
        if (!compiled) continue;
        const id = compiled.exact ? `${compiled.term}$` : compiled.term;
        if (seen.has(id)) continue;
        seen.add(id);
        out.push(compiled);
    }
    return out;
}

function hits(terms: CompiledTerm[], text: string): string[] {
    return terms.filter(t => t.pattern.test(text)).map(t => t.term);
}

/** Channel housekeeping posts: bare short links, app download prompts. */
export function isServiceMessage(text: string): boolean {
    const trimmed = text.trim();
    if (trimmed.startsWith('Download')) return true;
    return /^https?:\/\/\S+$/i.test(trimmed) && trimmed.length < 100;
}

export class KeywordFilter {
    private readonly groups: Array<{ name: string; terms: CompiledTerm[] }>;
    private readonly blocked: CompiledTerm[];
    private readonly guards: Array<{ name: string; markers: CompiledTerm[]; strictGroups: ReadonlySet<string> }>;
    private readonly emptyPolicy: EmptyGroupsPolicy;

    constructor(options: KeywordFilterOptions) {
        this.groups = Object.entries(options.groups)
            .map(([name, terms]) => ({ name, terms: compileTerms(terms) }))
            .filter(g => g.terms.length > 0);
        this.blocked = compileTerms(options.blocked ?? []);
        this.guards = (options.guards ?? []).map(g => ({
            name: g.name,
            markers: compileTerms(g.markers),
            strictGroups: new Set(g.strictGroups),
        }));
        this.emptyPolicy = options.emptyPolicy;

        if (this.groups.length === 0) {
            log.warn(`No keyword groups configured — policy is ${this.emptyPolicy}`);
        }
    }

    get groupNames(): string[] {
        return this.groups.map(g => g.name);
    }

    isRelevant(text: string): boolean {
        return this.classify(text).relevant;
    }

    classify(text: string): FilterVerdict {
        const normalized = normalizeText(text);
        if (!normalized) return verdict(false, 'empty');
        if (isServiceMessage(text)) return verdict(false, 'service');

        const blockedHits = hits(this.blocked, normalized);
        if (blockedHits.length > 0) {
            log.debug('Rejected: blocked term', { terms: blockedHits, text: text.slice(0, 80) });
            return verdict(false, 'blocked', [], blockedHits);
        }

        if (this.groups.length === 0) {
            return verdict(this.emptyPolicy === 'accept_all', 'no_groups');
        }

        let groupHits = this.groups
            .map(g => ({ name: g.name, matched: hits(g.terms, normalized) }))
            .filter(g => g.matched.length > 0);

        if (groupHits.length === 0) return verdict(false, 'no_match');

        for (const guard of this.guards) {
            if (hits(guard.markers, normalized).length === 0) continue;
            groupHits = groupHits.filter(g => guard.strictGroups.has(g.name));
            if (groupHits.length === 0) {
                log.debug(`Rejected: guard "${guard.name}" without strict terms`, { text: text.slice(0, 80) });
                return verdict(false, 'guarded');
            }
        }

        const matched = [...new Set(groupHits.flatMap(g => g.matched))];
        return verdict(true, 'matched', groupHits.map(g => g.name), matched);
    }
}

function verdict(relevant: boolean, reason: FilterReason, groups: string[] = [], matched: string[] = []): FilterVerdict {
    return { relevant, reason, groups, matched };
}

// ---- Keyword file ----

const termList = z.array(z.string().min(1));

export const keywordFileSchema = z.object({
    emptyPolicy: z.enum(emptyPolicies).default('reject_all'),
    groups: z.record(termList).default({}),
    blocked: termList.default([]),
    guards: z.array(z.object({
        name: z.string().min(1),
        markers: termList,
        strictGroups: z.array(z.string().min(1)).min(1),
    })).default([]),
});

export type KeywordFile = z.infer<typeof keywordFileSchema>;

export const defaultKeywordsPath = fileURLToPath(new URL('../../resources/keywords.json', import.meta.url));

/**
 * Read and validate a keyword file. Malformed files are a startup error.
 */
export function loadKeywordFile(path: string = defaultKeywordsPath): KeywordFile {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf8'));
    } catch (error) {
        throw new ConfigError([`KEYWORDS_PATH: cannot read ${path}: ${String(error)}`]);
    }

    const result = keywordFileSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(result.error.issues.map(i => `keywords.${i.path.join('.')}: ${i.message}`));
    }
    return result.data;
}
