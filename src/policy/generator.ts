import type { Section } from '../analysis/types.js';
import type { AppConfig } from '../lib/config.js';
import { AssistedGenerator } from './assistedGenerator.js';
import { DeterministicGenerator } from './deterministicGenerator.js';
import type { GeneratedPolicy } from './schema.js';

export interface PolicyGenerator {
    readonly name: string;
    generate(sections: readonly Section[], sourceDocument: string): Promise<GeneratedPolicy>;
}

export interface GeneratorSelection {
    /** Overrides `config.policyGenerator` when set. */
    useModel?: boolean;
}

export function createPolicyGenerator(
    config: AppConfig,
    selection: GeneratorSelection = {},
): PolicyGenerator {
    const useModel = selection.useModel ?? config.policyGenerator === 'assisted';
    if (!useModel) {
        return new DeterministicGenerator();
    }

    return new AssistedGenerator({
        apiKey: config.groqApiKey,
        model: config.groqPolicyModel,
        timeoutMs: config.policyModelTimeoutMs,
    });
}
