import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError } from '../errors.js';

// ============================================================================
// Herald — Prompt Templates
// Persona and per-kind instructions live in plain files, not in code
// ============================================================================

export interface PromptTemplates {
    /** System prompt: who is speaking and the style contract */
    persona: string;
    /** User prompt for news posts; `{{news}}` is replaced with the excerpt */
    news: string;
    /** User prompt for digest commentary; `{{asset}}`, `{{slot}}`, `{{summary}}` */
    digest: string;
    /** User prompt for the reaction line; `{{post}}`, `{{tone}}` */
    opinion: string;
}

export const defaultPromptsDir = fileURLToPath(new URL('../../resources/prompts', import.meta.url));

const templateFiles: Record<keyof PromptTemplates, string> = {
    persona: 'persona.md',
    news: 'news.md',
    digest: 'digest.md',
    opinion: 'opinion.md',
};

export function loadPromptTemplates(dir: string = defaultPromptsDir): PromptTemplates {
    const issues: string[] = [];
    const read = (key: keyof PromptTemplates): string => {
        const path = join(dir, templateFiles[key]);
        try {
            const text = readFileSync(path, 'utf8').trim();
            if (!text) issues.push(`PROMPTS_DIR: ${path} is empty`);
            return text;
        } catch (error) {
            issues.push(`PROMPTS_DIR: cannot read ${path}: ${String(error)}`);
            return '';
        }
    };

    const templates = {
        persona: read('persona'),
        news: read('news'),
        digest: read('digest'),
        opinion: read('opinion'),
    };
    if (issues.length > 0) throw new ConfigError(issues);
    return templates;
}

/**
 * Replace `{{name}}` placeholders. Unknown placeholders become empty strings.
 */
export function renderTemplate(template: string, vars: Record<string, string>): string {
    return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (_, name: string) => vars[name] ?? '');
}
