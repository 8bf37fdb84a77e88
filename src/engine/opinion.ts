import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from '../errors.js';

// ============================================================================
// Herald — Opinion Footer
// Tone heuristics and cleanup for the short reaction line under a news post
// ============================================================================

export type Tone = 'negative' | 'positive';

export const toneEmoji: Record<Tone, string> = {
    negative: '🤡',
    positive: '🔥',
};

const termList = z.array(z.string().min(1));

export const opinionLexiconSchema = z.object({
    negative: termList,
    positive: termList,
    /** A reaction containing any of these is replaced by the fallback */
    forbidden: termList.default([]),
    fallback: z.object({ negative: z.string().min(1), positive: z.string().min(1) }),
    maxWords: z.number().int().positive().default(7),
});

export type OpinionLexicon = z.infer<typeof opinionLexiconSchema>;

export const defaultTonePath = fileURLToPath(new URL('../../resources/tone.json', import.meta.url));

export function loadOpinionLexicon(path: string = defaultTonePath): OpinionLexicon {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf8'));
    } catch (error) {
        throw new ConfigError([`tone: cannot read ${path}: ${String(error)}`]);
    }

    const result = opinionLexiconSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(result.error.issues.map(i => `tone.${i.path.join('.')}: ${i.message}`));
    }
    return result.data;
}

function countHits(text: string, terms: readonly string[]): number {
    return terms.filter(term => text.includes(term.toLowerCase())).length;
}

/**
 * Substring vote between the two word lists. Ties go negative: the channel
 * leans sarcastic.
 */
export function determineTone(text: string, lexicon: OpinionLexicon): Tone {
    const lower = text.toLowerCase();
    return countHits(lower, lexicon.negative) >= countHits(lower, lexicon.positive) ? 'negative' : 'positive';
}

/**
 * Reduce a generated reaction to a bare phrase: no quotes, emoji, closing
 * punctuation or leading dashes, at most `maxWords` words. Returns null
 * when nothing usable is left.
 */
export function cleanReaction(raw: string, tone: Tone, lexicon: OpinionLexicon): string | null {
    let text = raw
        .replace(/\p{Extended_Pictographic}\uFE0F?/gu, '')
        .trim()
        .replace(/^["'«“]+|["'»”]+$/g, '')
        .trim()
        .replace(/[.,!?;:]+$/, '')
        .replace(/^[-–—•]+/, '')
        .trim();

    const words = text.split(/\s+/).filter(Boolean);
    if (words.length === 0) return null;
    text = words.slice(0, lexicon.maxWords).join(' ').replace(/[.,!?;:]+$/, '');

    const lower = text.toLowerCase();
    if (lexicon.forbidden.some(term => lower.includes(term.toLowerCase()))) {
        return lexicon.fallback[tone];
    }
    return text;
}

export function formatOpinion(tone: Tone, reaction: string): string {
    return `${toneEmoji[tone]} - ${reaction}`;
}
