// ============================================================================
// Herald — Error Taxonomy
// Every failure is either transient (retry later) or permanent (abandon the
// item). Anything a collaborator leaves unclassified counts as transient.
// ============================================================================

export type ErrorClass = 'transient' | 'permanent';

export class HeraldError extends Error {
    readonly retryable: boolean;

    constructor(message: string, retryable: boolean, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.retryable = retryable;
    }
}

export class TransientError extends HeraldError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, true, options);
    }
}

export class PermanentError extends HeraldError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, false, options);
    }
}

// ---- Capability errors ----

export class IngestionError extends TransientError {}

export type GenerationErrorKind = 'quota' | 'timeout' | 'rejected';

export class GenerationError extends HeraldError {
    readonly kind: GenerationErrorKind;

    constructor(kind: GenerationErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, kind !== 'rejected', options);
        this.kind = kind;
    }
}

export class PriceFetchError extends HeraldError {
    constructor(message: string, options?: { cause?: unknown; retryable?: boolean }) {
        super(message, options?.retryable ?? true, options);
    }
}

export type PublishErrorKind = 'rate_limited' | 'network' | 'invalid';

export class PublishError extends HeraldError {
    readonly kind: PublishErrorKind;
    /** Server-provided hint for how long to wait before the next attempt */
    readonly retryAfterMs?: number;

    constructor(kind: PublishErrorKind, message: string, options?: { cause?: unknown; retryAfterMs?: number }) {
        super(message, kind !== 'invalid', options);
        this.kind = kind;
        this.retryAfterMs = options?.retryAfterMs;
    }
}

// ---- Core errors ----

export class TimeoutError extends TransientError {
    readonly timeoutMs: number;

    constructor(label: string, timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.timeoutMs = timeoutMs;
    }
}

/** Synthesis failures inherit the classification of what caused them. */
export class SynthesisError extends HeraldError {
    constructor(message: string, options?: { cause?: unknown; retryable?: boolean }) {
        super(message, options?.retryable ?? classifyError(options?.cause) === 'transient', options);
    }
}

export type DigestErrorReason = 'fetch_failed' | 'malformed';

export class DigestError extends HeraldError {
    readonly reason: DigestErrorReason;

    constructor(reason: DigestErrorReason, message: string, options?: { cause?: unknown }) {
        super(message, reason === 'fetch_failed' && classifyError(options?.cause) === 'transient', options);
        this.reason = reason;
    }
}

export class ConfigError extends PermanentError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.issues = issues;
    }
}

// ---- Helpers ----

export function classifyError(error: unknown): ErrorClass {
    if (error instanceof HeraldError) {
        return error.retryable ? 'transient' : 'permanent';
    }
    return 'transient';
}

export function isTransient(error: unknown): boolean {
    return classifyError(error) === 'transient';
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
