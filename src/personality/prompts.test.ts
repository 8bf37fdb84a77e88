import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadPromptTemplates, renderTemplate } from './prompts.js';
import { ConfigError } from '../errors.js';

describe('loadPromptTemplates', () => {
    it('loads the bundled templates', () => {
        const templates = loadPromptTemplates();
        expect(templates.persona.length).toBeGreaterThan(0);
        expect(templates.news).toContain('{{news}}');
        expect(templates.digest).toContain('{{summary}}');
        expect(templates.opinion).toContain('{{post}}');
    });

    it('reports missing and empty files', () => {
        const dir = mkdtempSync(join(tmpdir(), 'herald-prompts-'));
        writeFileSync(join(dir, 'persona.md'), 'You are a channel author.');
        writeFileSync(join(dir, 'news.md'), '   \n');

        let issues: string[] = [];
        try {
            loadPromptTemplates(dir);
        } catch (error) {
            if (error instanceof ConfigError) issues = error.issues;
        }

        expect(issues).toHaveLength(3);
        expect(issues[0]).toBe(`PROMPTS_DIR: ${join(dir, 'news.md')} is empty`);
        expect(issues[1]).toContain(`PROMPTS_DIR: cannot read ${join(dir, 'digest.md')}`);
        expect(issues[2]).toContain(`PROMPTS_DIR: cannot read ${join(dir, 'opinion.md')}`);
    });
});

describe('renderTemplate', () => {
    it('fills known placeholders and blanks unknown ones', () => {
        expect(renderTemplate('{{ asset }} at {{price}}{{missing}}', { asset: 'TON', price: '$5' })).toBe('TON at $5');
    });
});
