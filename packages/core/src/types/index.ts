/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    TransactionRecord,
    ParseResult,
    Confidence,
    TransactionState,
    ImportTransaction,
    Condition,
    ConditionKind,
    Rule,
    RuleInput,
    RulePatch,
    RuleValidationResult,
    CategorizationResult,
    BatchStats,
    BatchResult,
    ReviewResolution,
    CategoryOption,
    SubmissionPayload,
    SubmissionResponseItem,
    SubmissionOutcome,
    SubmissionResult,
    HistoricalTransaction,
    RuleSuggestion,
} from '@budget-import/shared';

export {
    TransactionRecordSchema,
    ImportTransactionSchema,
    ConditionSchema,
    RuleSchema,
    RuleInputSchema,
    RulePatchSchema,
    ReviewResolutionSchema,
    SubmissionResponseItemSchema,
    IMPORT_ID,
    RULE_ID,
    MONEY,
    SUBMISSION_DEFAULTS,
    SUGGESTION_DEFAULTS,
    SKIP_REASONS,
} from '@budget-import/shared';
