export * from './analysis/index.js';
export { chunkFile, chunkText } from './ingestion/chunker.js';
export { retrieveRelevantSection, scoreSection, type RetrievalResult } from './ingestion/retrieval.js';
export {
    AppError,
    ConfigError,
    InputError,
    NotFoundError,
    PolicyGenerationError,
    RateLimitError,
    isAppError,
    type ErrorResponse,
} from './lib/errors.js';
export { loadConfig, type AppConfig } from './lib/config.js';
export { createPolicyGenerator, type PolicyGenerator, type GeneratorSelection } from './policy/generator.js';
export { DeterministicGenerator, buildDeterministicPolicy } from './policy/deterministicGenerator.js';
export { AssistedGenerator, extractJsonObject, type AssistedGeneratorOptions } from './policy/assistedGenerator.js';
export {
    GeneratedPolicySchema,
    GeneratedRuleSchema,
    PolicyListSchema,
    PolicyRuleSchema,
    type GeneratedPolicy,
    type GeneratedRule,
    type PolicyRule,
} from './policy/schema.js';
export {
    appendGeneratedRules,
    loadPolicies,
    parsePolicyList,
    savePolicyDocument,
    toPolicyRules,
} from './services/policy.service.js';
export { analyzeDocument, analyzeSections, saveReport } from './services/analysis.service.js';
export { buildApp, type BuildAppOptions } from './app.js';
