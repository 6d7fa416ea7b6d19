/**
 * Zod schemas for Budget Import data structures.
 *
 * IMPORTANT: Amounts are signed integer minor units (cents). Decimal strings
 * only exist at the edges (loader, CLI flags) and are converted there.
 */

import { z } from 'zod';
import { IMPORT_ID, SUBMISSION_DEFAULTS } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Signed integer amount in minor units. Never a float.
 */
const minorUnits = z.number().int('Amount must be an integer number of minor units');

/**
 * Import ID: "BI:" + 32 hex chars.
 */
const importId = z.string().regex(
    new RegExp(`^${IMPORT_ID.PREFIX}[0-9a-f]{${IMPORT_ID.HASH_LENGTH}}$`),
    `Must be ${IMPORT_ID.PREFIX} followed by ${IMPORT_ID.HASH_LENGTH} hex chars`
);

// ============================================================================
// Transaction Schemas
// ============================================================================

/**
 * Normalized record produced by a bank export parser.
 */
export const TransactionRecordSchema = z.object({
    date: isoDateString,
    payee: z.string(),
    memo: z.string().nullable(),
    amount: minorUnits,
    account_ref: z.string().min(1),
});

export type TransactionRecord = z.infer<typeof TransactionRecordSchema>;

/**
 * Output of a bank export parser.
 */
export const ParseResultSchema = z.object({
    records: z.array(TransactionRecordSchema),
    warnings: z.array(z.string()),
    skippedRows: z.number().int().min(0),
});

export type ParseResult = z.infer<typeof ParseResultSchema>;

export const ConfidenceSchema = z.enum(['auto', 'manual']);

export type Confidence = z.infer<typeof ConfidenceSchema>;

/**
 * Per-transaction lifecycle.
 * parsed → categorized → (review_pending → resolved)? → deduplicated
 *        → submitted | rejected | skipped_duplicate
 */
export const TransactionStateSchema = z.enum([
    'parsed',
    'categorized',
    'review_pending',
    'resolved',
    'deduplicated',
    'submitted',
    'rejected',
    'skipped_duplicate',
]);

export type TransactionState = z.infer<typeof TransactionStateSchema>;

/**
 * Record plus the fields the importer derives.
 */
export const ImportTransactionSchema = TransactionRecordSchema.extend({
    import_id: importId,
    category: z.string().min(1).nullable(),
    category_name: z.string().optional(),
    confidence: ConfidenceSchema,
    matched_rule_id: z.string().nullable(),
    state: TransactionStateSchema,
    reason: z.string().optional(),
});

export type ImportTransaction = z.infer<typeof ImportTransactionSchema>;

// ============================================================================
// Rule Schemas
// ============================================================================

const nonEmptyParam = z.string().min(1, 'Condition value cannot be empty');

export const PayeeExactConditionSchema = z.object({
    kind: z.literal('payee_exact'),
    value: nonEmptyParam,
});

export const PayeeContainsConditionSchema = z.object({
    kind: z.literal('payee_contains'),
    value: nonEmptyParam,
});

export const PayeeRegexConditionSchema = z.object({
    kind: z.literal('payee_regex'),
    pattern: nonEmptyParam,
});

export const MemoContainsConditionSchema = z.object({
    kind: z.literal('memo_contains'),
    value: nonEmptyParam,
});

export const AmountExactConditionSchema = z.object({
    kind: z.literal('amount_exact'),
    amount: minorUnits,
});

export const AmountRangeConditionSchema = z.object({
    kind: z.literal('amount_range'),
    min: minorUnits,
    max: minorUnits,
});

/**
 * One typed predicate of a rule.
 * Unknown kinds fail here, which rule loading reports as a configuration error.
 */
export const ConditionSchema = z.discriminatedUnion('kind', [
    PayeeExactConditionSchema,
    PayeeContainsConditionSchema,
    PayeeRegexConditionSchema,
    MemoContainsConditionSchema,
    AmountExactConditionSchema,
    AmountRangeConditionSchema,
]);

export type Condition = z.infer<typeof ConditionSchema>;
export type ConditionKind = Condition['kind'];

/**
 * Stored categorization rule.
 */
export const RuleSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    conditions: z.array(ConditionSchema),
    category: z.string().min(1),
    category_name: z.string().optional(),
    priority: z.number().int().default(0),
    enabled: z.boolean().default(true),
    created_at: z.string().optional(),
    updated_at: z.string().optional(),
});

export type Rule = z.infer<typeof RuleSchema>;

/**
 * Rule as submitted for creation: the store assigns id and timestamps.
 */
export const RuleInputSchema = RuleSchema.omit({ id: true, created_at: true, updated_at: true });

export type RuleInput = z.input<typeof RuleInputSchema>;

/**
 * Partial edit of an existing rule. The id never changes.
 */
export const RulePatchSchema = RuleInputSchema.partial();

export type RulePatch = z.input<typeof RulePatchSchema>;

/**
 * Rule validation result.
 */
export const RuleValidationResultSchema = z.object({
    valid: z.boolean(),
    errors: z.array(z.string()),
    warnings: z.array(z.string()),
});

export type RuleValidationResult = z.infer<typeof RuleValidationResultSchema>;

// ============================================================================
// Categorization Schemas
// ============================================================================

/**
 * What categorize() returns. All null when no rule matched.
 */
export const CategorizationResultSchema = z.object({
    category: z.string().nullable(),
    category_name: z.string().optional(),
    matched_rule_id: z.string().nullable(),
});

export type CategorizationResult = z.infer<typeof CategorizationResultSchema>;

// ============================================================================
// Batch Schemas
// ============================================================================

export const BatchStatsSchema = z.object({
    total: z.number().int().min(0),
    invalid: z.number().int().min(0),
    auto: z.number().int().min(0),
    manual: z.number().int().min(0),
    skipped_duplicates: z.number().int().min(0),
});

export type BatchStats = z.infer<typeof BatchStatsSchema>;

/**
 * Output of prepareBatch(): one upload session's transactions, partitioned.
 */
export const BatchResultSchema = z.object({
    rule_set_version: z.string(),
    ready: z.array(ImportTransactionSchema),
    needs_review: z.array(ImportTransactionSchema),
    skipped: z.array(ImportTransactionSchema),
    warnings: z.array(z.string()),
    stats: BatchStatsSchema,
});

export type BatchResult = z.infer<typeof BatchResultSchema>;

/**
 * Saved session (outputs/<session>/batch.json): the batch plus where it came from.
 */
export const SessionFileSchema = z.object({
    session: z.string().min(1),
    source_file: z.string(),
    source_hash: z.string(),
    parser: z.string(),
    created_at: z.string(),
    batch: BatchResultSchema,
});

export type SessionFile = z.infer<typeof SessionFileSchema>;

/**
 * A human's answer for one needs-review transaction.
 */
export const ReviewResolutionSchema = z.object({
    import_id: importId,
    category: z.string().min(1),
    category_name: z.string().optional(),
});

export type ReviewResolution = z.infer<typeof ReviewResolutionSchema>;

/**
 * Category the reviewer may pick from.
 */
export const CategoryOptionSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    group_name: z.string().optional(),
});

export type CategoryOption = z.infer<typeof CategoryOptionSchema>;

// ============================================================================
// Submission Schemas
// ============================================================================

/**
 * Request payload for one transaction, as handed to the budget client.
 */
export const SubmissionPayloadSchema = z.object({
    account_ref: z.string().min(1),
    date: isoDateString,
    amount: minorUnits,
    payee: z.string(),
    memo: z.string().nullable(),
    category: z.string().min(1),
    import_id: importId,
});

export type SubmissionPayload = z.infer<typeof SubmissionPayloadSchema>;

export const SubmissionStatusSchema = z.enum(['created', 'duplicate', 'error']);

export type SubmissionStatus = z.infer<typeof SubmissionStatusSchema>;

/**
 * Per-item response from the budget client.
 */
export const SubmissionResponseItemSchema = z.object({
    import_id: z.string(),
    status: SubmissionStatusSchema,
    reason: z.string().optional(),
});

export type SubmissionResponseItem = z.infer<typeof SubmissionResponseItemSchema>;

/**
 * Final per-transaction outcome of a submission run.
 */
export const SubmissionOutcomeSchema = z.object({
    import_id: z.string(),
    payee: z.string(),
    date: isoDateString,
    amount: minorUnits,
    state: z.enum(['submitted', 'rejected', 'skipped_duplicate']),
    status: z.enum(['created', 'duplicate', 'error', 'skipped']),
    reason: z.string().optional(),
    attempts: z.number().int().min(0),
});

export type SubmissionOutcome = z.infer<typeof SubmissionOutcomeSchema>;

export const SubmissionResultSchema = z.object({
    accepted: z.array(SubmissionOutcomeSchema),
    rejected: z.array(SubmissionOutcomeSchema),
    skipped: z.array(SubmissionOutcomeSchema),
    warnings: z.array(z.string()),
});

export type SubmissionResult = z.infer<typeof SubmissionResultSchema>;

// ============================================================================
// Import History Schema
// ============================================================================

export const ImportRecordSchema = z.object({
    date: isoDateString,
    amount: minorUnits,
    payee: z.string(),
    account_ref: z.string(),
    status: z.enum(['created', 'duplicate']),
    recorded_at: z.string(),
});

export type ImportRecord = z.infer<typeof ImportRecordSchema>;

/**
 * Keys already submitted to the service, kept across runs.
 */
export const ImportHistorySchema = z.object({
    version: z.literal(1),
    imported: z.record(z.string(), ImportRecordSchema),
});

export type ImportHistory = z.infer<typeof ImportHistorySchema>;

// ============================================================================
// Rule Suggestion Schemas
// ============================================================================

/**
 * Categorized transaction as read back from the budgeting service.
 */
export const HistoricalTransactionSchema = z.object({
    date: isoDateString,
    payee: z.string(),
    amount: minorUnits,
    category: z.string().nullable(),
    category_name: z.string().nullable(),
});

export type HistoricalTransaction = z.infer<typeof HistoricalTransactionSchema>;

export const RuleSuggestionSchema = z.object({
    payee: z.string(),
    category: z.string(),
    category_name: z.string(),
    direction: z.enum(['incoming', 'outgoing']),
    confidence: z.number().min(0).max(100),
    transaction_count: z.number().int().min(0),
    total_for_payee: z.number().int().min(0),
    samples: z.array(HistoricalTransactionSchema),
});

export type RuleSuggestion = z.infer<typeof RuleSuggestionSchema>;

// ============================================================================
// Configuration Schema
// ============================================================================

/**
 * config/budget.json. The API token is read from the environment, not here.
 */
export const BudgetConfigSchema = z.object({
    api_base_url: z.string().url().default(SUBMISSION_DEFAULTS.API_BASE_URL),
    budget_id: z.string().min(1),
    accounts: z.record(z.string(), z.string().min(1)).default({}),
    chunk_size: z.number().int().min(1).max(1000).default(SUBMISSION_DEFAULTS.CHUNK_SIZE),
    max_retries: z.number().int().min(0).max(10).default(SUBMISSION_DEFAULTS.MAX_RETRIES),
    retry_base_ms: z.number().int().min(0).default(SUBMISSION_DEFAULTS.RETRY_BASE_MS),
    timeout_ms: z.number().int().min(1).default(SUBMISSION_DEFAULTS.TIMEOUT_MS),
    memo_max_length: z.number().int().min(0).default(SUBMISSION_DEFAULTS.MEMO_MAX_LENGTH),
});

export type BudgetConfig = z.infer<typeof BudgetConfigSchema>;
