/**
 * Constants for Budget Import.
 */

/**
 * Import ID format.
 * The budgeting service accepts dedup tokens of at most 36 characters:
 * "BI:" + 32 hex chars = 35.
 */
export const IMPORT_ID = {
    PREFIX: 'BI:',
    HASH_LENGTH: 32,
} as const;

/**
 * Rule ID format: "R" + zero-padded sequence, so ascending string order
 * matches creation order for the first 9999 rules.
 */
export const RULE_ID = {
    PREFIX: 'R',
    PAD: 4,
} as const;

/**
 * Money units.
 * Amounts are integer minor units (cents) everywhere in the core.
 * The service counts in milliunits.
 */
export const MONEY = {
    MINOR_UNITS_PER_MAJOR: 100,
    MILLIUNITS_PER_MINOR: 10,
} as const;

/**
 * Submission defaults, overridable through config/budget.json.
 */
export const SUBMISSION_DEFAULTS = {
    API_BASE_URL: 'https://api.ynab.com/v1',
    CHUNK_SIZE: 50,
    MAX_RETRIES: 3,
    RETRY_BASE_MS: 500,
    TIMEOUT_MS: 30_000,
    MEMO_MAX_LENGTH: 200,
} as const;

/**
 * Rule suggestion thresholds.
 */
export const SUGGESTION_DEFAULTS = {
    THRESHOLD_PERCENT: 98,
    MIN_TRANSACTIONS: 3,
    SUGGESTED_PRIORITY: 10,
    MAX_SAMPLES: 5,
    LOOKBACK_DAYS: 180,
} as const;

/**
 * Reasons attached to transactions that end in a non-submitted state.
 */
export const SKIP_REASONS = {
    ALREADY_IMPORTED: 'already_imported',
    DUPLICATE_IN_BATCH: 'duplicate_in_batch',
} as const;

/**
 * Environment variable holding the budgeting service token.
 */
export const API_TOKEN_ENV = 'BUDGET_API_TOKEN';
