// ============================================================================
// Herald — Input Sanitization
// Strips prompt injection patterns from channel text before it reaches a prompt
// ============================================================================

/** Known injection patterns to strip from third-party text */
const INJECTION_PATTERNS = [
    /ignore\s+(all\s+)?(previous|prior|above)\s+instructions?/gi,
    /disregard\s+(all\s+)?(previous|prior|above)/gi,
    /forget\s+(all\s+)?previous/gi,
    /you\s+are\s+now\s+a?\s*/gi,
    /act\s+as\s+(if\s+)?you\s+are/gi,
    /pretend\s+(to\s+be|you\s+are)/gi,
    /system\s*prompt/gi,
    /reveal\s+(your\s+)?(system|instructions|prompt)/gi,
    /repeat\s+(your\s+)?instructions/gi,
    /игнорируй\s+(все\s+)?(предыдущие\s+)?инструкци\p{L}*/giu,
    /забудь\s+(все\s+)?предыдущ\p{L}*/giu,
];

export interface SanitizedInput {
    text: string;
    truncated: boolean;
}

/**
 * Strip known prompt injection patterns and bound the length.
 *
 * @param maxLength Longer input is cut at the last whitespace before the limit
 */
export function sanitizeUserInput(text: string, maxLength = 2000): SanitizedInput {
    let cleaned = text;
    for (const pattern of INJECTION_PATTERNS) {
        cleaned = cleaned.replace(pattern, '[filtered]');
    }
    cleaned = cleaned.trim();

    if (cleaned.length <= maxLength) return { text: cleaned, truncated: false };

    const cut = cleaned.slice(0, maxLength);
    const lastSpace = cut.lastIndexOf(' ');
    return {
        text: (lastSpace > maxLength * 0.5 ? cut.slice(0, lastSpace) : cut).trimEnd(),
        truncated: true,
    };
}
