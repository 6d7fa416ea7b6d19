/**
 * Error taxonomy for the importer.
 *
 * A missing rule match and a detected duplicate are NOT errors: they are
 * ordinary outcomes carried in the data (confidence "manual", state
 * "skipped_duplicate").
 */

/**
 * Malformed rule rejected at creation or edit time.
 */
export class ValidationError extends Error {
    readonly errors: string[];

    constructor(errors: string[]) {
        super(`Invalid rule: ${errors.join('; ')}`);
        this.name = 'ValidationError';
        this.errors = errors;
    }
}

/**
 * Corrupted or unknown rule data found while loading a rule set.
 * The rule is skipped; the batch continues.
 */
export class ConfigurationError extends Error {
    readonly ruleId?: string;

    constructor(message: string, ruleId?: string) {
        super(ruleId ? `Rule ${ruleId}: ${message}` : message);
        this.name = 'ConfigurationError';
        this.ruleId = ruleId;
    }
}

export class RuleNotFoundError extends Error {
    readonly ruleId: string;

    constructor(ruleId: string) {
        super(`Rule not found: ${ruleId}`);
        this.name = 'RuleNotFoundError';
        this.ruleId = ruleId;
    }
}

export type SubmissionErrorKind =
    | 'network'
    | 'timeout'
    | 'rate_limit'
    | 'server'
    | 'auth'
    | 'config'
    | 'validation';

const TRANSIENT_KINDS: ReadonlySet<SubmissionErrorKind> = new Set(['network', 'timeout', 'rate_limit', 'server']);

/**
 * Failure talking to the budgeting service.
 * Transient kinds are retried; auth/config/validation are surfaced at once.
 */
export class SubmissionError extends Error {
    readonly kind: SubmissionErrorKind;
    readonly status?: number;

    constructor(kind: SubmissionErrorKind, message: string, status?: number) {
        super(message);
        this.name = 'SubmissionError';
        this.kind = kind;
        this.status = status;
    }

    get transient(): boolean {
        return TRANSIENT_KINDS.has(this.kind);
    }
}

/**
 * A second submission of a batch was started while the first is running.
 */
export class BatchInFlightError extends Error {
    constructor() {
        super('This batch is already being submitted');
        this.name = 'BatchInFlightError';
    }
}
