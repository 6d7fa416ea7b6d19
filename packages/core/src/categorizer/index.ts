/**
 * Categorizer module: rule-based transaction categorization.
 */

export { categorize, categorizeAll } from './categorize.js';
export { compileCondition, matchesCondition, matchesAll, isValidPattern, foldCase } from './match.js';
export type { MatchResult, CompiledCondition, CompiledRule, CategorizationStats } from './types.js';
