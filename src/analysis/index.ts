export * from './types.js';
export {
    CLAUSE_CATEGORIES,
    CLAUSE_RULES,
    evaluateClause,
    type ClauseCategory,
    type ClauseContext,
    type ClauseRule,
    type ClauseVerdict,
    type RuleOutcome,
} from './clauseRules.js';
export {
    aggregateRisk,
    rankClauses,
    rankSections,
    riskWeight,
    type AggregateOptions,
} from './riskAggregator.js';
export { assembleReport, type ReportParts } from './reportAssembler.js';
