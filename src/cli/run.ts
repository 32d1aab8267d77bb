import { access } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { parseArgs } from 'node:util';
import { chunkFile } from '../ingestion/chunker.js';
import { loadConfig, type AppConfig } from '../lib/config.js';
import { InputError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { createPolicyGenerator } from '../policy/generator.js';
import { analyzeSections, saveReport } from '../services/analysis.service.js';
import { appendGeneratedRules, loadPolicies, savePolicyDocument } from '../services/policy.service.js';
import { formatReport } from './display.js';

const log = createLogger('cli');

export const DEFAULT_INPUT = 'sample_contracts/sample_contract_long.txt';
export const FALLBACK_INPUT = 'sample_contracts/sample_contract.txt';

const USAGE = `Usage: clause-risk [options]

  -i, --input <file>         Contract to analyze (default: ${DEFAULT_INPUT})
  -p, --policies <file>      Policy file (default: POLICY_FILE)
  -o, --output <dir>         Report directory (default: REPORT_DIR)
  -g, --generate-policies    Generate a policy document instead of analyzing
  -a, --append-policies      With -g, append the generated rules to the policy file
      --use-model            With -g, use the remote model (falls back to heuristics)
  -h, --help                 Show this help`;

export interface CliDeps {
    config?: AppConfig;
    /** Receives user-facing output; defaults to stdout. */
    print?: (text: string) => void;
}

interface CliArgs {
    input: string;
    policies: string;
    output: string;
    generate: boolean;
    append: boolean;
    useModel: boolean;
    help: boolean;
}

function parseCliArgs(argv: readonly string[], config: AppConfig): CliArgs {
    try {
        const { values } = parseArgs({
            args: [...argv],
            options: {
                input: { type: 'string', short: 'i' },
                policies: { type: 'string', short: 'p' },
                output: { type: 'string', short: 'o' },
                'generate-policies': { type: 'boolean', short: 'g' },
                'append-policies': { type: 'boolean', short: 'a' },
                'use-model': { type: 'boolean' },
                help: { type: 'boolean', short: 'h' },
            },
            strict: true,
            allowPositionals: false,
        });

        return {
            input: values.input ?? DEFAULT_INPUT,
            policies: values.policies ?? config.policyFile,
            output: values.output ?? config.reportDir,
            generate: values['generate-policies'] ?? false,
            append: values['append-policies'] ?? false,
            useModel: values['use-model'] ?? false,
            help: values.help ?? false,
        };
    } catch (err) {
        throw new InputError(err instanceof Error ? err.message : 'Invalid arguments', undefined, { cause: err });
    }
}

async function exists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
}

/**
 * Run the command line tool and resolve with its exit code.
 * Errors are logged and reported, never thrown.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
    const print = deps.print ?? ((text: string) => void process.stdout.write(`${text}\n`));

    try {
        const config = deps.config ?? loadConfig();
        const args = parseCliArgs(argv, config);

        if (args.help) {
            print(USAGE);
            return 0;
        }

        let input = args.input;
        if (!(await exists(input))) {
            log.warn({ input, fallback: FALLBACK_INPUT }, 'Input file not found, using the sample contract');
            print(`Input file not found: ${input}. Falling back to ${FALLBACK_INPUT}`);
            input = FALLBACK_INPUT;
        }

        const sections = await chunkFile(input);

        if (args.generate) {
            const generator = createPolicyGenerator(config, { useModel: args.useModel || undefined });
            const policy = await generator.generate(sections, basename(input));

            const savePath = join(args.output, `generated_policy_${basename(input)}.json`);
            await savePolicyDocument(policy, savePath);
            print(`Generated policy saved to: ${savePath}`);
            print('Review the generated rules before relying on them.');

            if (args.append) {
                const combined = await appendGeneratedRules(policy, args.policies);
                print(`Appended ${policy.rules.length} rule(s) to ${args.policies} (${combined.length} total).`);
            }
            return 0;
        }

        const policies = await loadPolicies(args.policies);
        const report = analyzeSections(sections, policies);
        const reportPath = await saveReport(report, args.output);

        print(formatReport(report));
        print(`\nDetailed per-section scores saved to ${reportPath}`);
        return 0;
    } catch (err) {
        log.error({ err }, 'Command failed');
        print(`Error: ${err instanceof Error ? err.message : String(err)}`);
        return 1;
    }
}
