export { analyzeHistory, excludeExistingSuggestions, directionOf } from './analyze.js';
export type { AnalyzeOptions } from './analyze.js';
export { suggestRuleForTransaction, ruleFromSuggestion } from './suggest-rule.js';
