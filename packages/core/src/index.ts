// Types (re-exported from shared)
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
} from './types/index.js';

// Errors
export {
    ValidationError,
    ConfigurationError,
    RuleNotFoundError,
    SubmissionError,
    BatchInFlightError,
} from './errors.js';
export type { SubmissionErrorKind } from './errors.js';

// Parsers
export { detectParser, extractAccountRef, getSupportedParsers, parseOpBank, parseRecords } from './parser/index.js';
export type { ParserFn, ParserDetectionResult } from './parser/index.js';

// Utils
export { parseAmount, formatMinorUnits, formatIsoDate, stripBom } from './utils/index.js';
export type { ParserInput, DecimalStyle } from './utils/index.js';

// Categorizer
export { categorize, categorizeAll, compileCondition, matchesCondition, matchesAll, isValidPattern } from './categorizer/index.js';
export type { MatchResult, CompiledCondition, CompiledRule, CategorizationStats } from './categorizer/index.js';

// Rules
export {
    compareRules,
    sortRulesByPriority,
    listEnabledRulesByPriorityDesc,
    validateRule,
    assertValidRule,
    InMemoryRuleStore,
    nextRuleId,
    buildRule,
    applyRulePatch,
    loadRuleSnapshot,
    createRuleSnapshot,
    emptyRuleSnapshot,
} from './rules/index.js';
export type { RuleStore, Clock, RuleSnapshot, RuleSnapshotLoadResult } from './rules/index.js';

// Dedup
export { computeImportId, findImportIdCollisions } from './dedup/index.js';

// Importer
export {
    prepareBatch,
    toImportTransaction,
    buildReviewQueue,
    applyReviewResolutions,
    submitBatch,
    buildPayload,
    collectImportedIds,
    TRANSITIONS,
    TERMINAL_STATES,
    canTransition,
    isTerminal,
    transitionState,
} from './importer/index.js';
export type { ReviewItem, ReviewApplyResult, BudgetClient, SubmitOptions } from './importer/index.js';

// Suggestions
export { analyzeHistory, excludeExistingSuggestions, directionOf, suggestRuleForTransaction, ruleFromSuggestion } from './suggest/index.js';
export type { AnalyzeOptions } from './suggest/index.js';
