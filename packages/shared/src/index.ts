// Schemas
export {
    TransactionRecordSchema,
    ParseResultSchema,
    ConfidenceSchema,
    TransactionStateSchema,
    ImportTransactionSchema,
    ConditionSchema,
    RuleSchema,
    RuleInputSchema,
    RulePatchSchema,
    RuleValidationResultSchema,
    CategorizationResultSchema,
    BatchStatsSchema,
    BatchResultSchema,
    SessionFileSchema,
    ReviewResolutionSchema,
    CategoryOptionSchema,
    SubmissionPayloadSchema,
    SubmissionStatusSchema,
    SubmissionResponseItemSchema,
    SubmissionOutcomeSchema,
    SubmissionResultSchema,
    ImportRecordSchema,
    ImportHistorySchema,
    HistoricalTransactionSchema,
    RuleSuggestionSchema,
    BudgetConfigSchema,
} from './schemas.js';

// Types
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
    SessionFile,
    ReviewResolution,
    CategoryOption,
    SubmissionPayload,
    SubmissionStatus,
    SubmissionResponseItem,
    SubmissionOutcome,
    SubmissionResult,
    ImportRecord,
    ImportHistory,
    HistoricalTransaction,
    RuleSuggestion,
    BudgetConfig,
} from './schemas.js';

// Constants
export {
    IMPORT_ID,
    RULE_ID,
    MONEY,
    SUBMISSION_DEFAULTS,
    SUGGESTION_DEFAULTS,
    SKIP_REASONS,
    API_TOKEN_ENV,
} from './constants.js';
