import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { InputError, NotFoundError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { PolicyListSchema, type GeneratedPolicy, type PolicyRule } from '../policy/schema.js';

const log = createLogger('service.policy');

// ─── Helpers ─────────────────────────────────────────────────

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function writeJson(path: string, value: unknown): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
}

// ─── Parse / Load ────────────────────────────────────────────

/**
 * Validate an already-decoded policy list, filling defaults for missing
 * `risk_level_if_violated` and `importance`.
 *
 * @throws InputError with per-field issues when the list is malformed
 */
export function parsePolicyList(raw: unknown): PolicyRule[] {
    const parsed = PolicyListSchema.safeParse(raw);
    if (!parsed.success) {
        throw InputError.fromZod('Policy list is malformed', parsed.error);
    }
    return parsed.data;
}

/**
 * @throws NotFoundError when the file does not exist
 * @throws InputError when it is not valid JSON or not a valid policy list
 */
export async function loadPolicies(filePath: string): Promise<PolicyRule[]> {
    let content: string;
    try {
        content = await readFile(filePath, 'utf-8');
    } catch (err) {
        if (isMissingFile(err)) {
            throw new NotFoundError('Policy file', filePath);
        }
        throw new InputError(`Could not read policy file '${filePath}'`, undefined, { cause: err });
    }

    let decoded: unknown;
    try {
        decoded = JSON.parse(content);
    } catch (err) {
        throw new InputError(`Policy file '${filePath}' is not valid JSON`, undefined, { cause: err });
    }

    const policies = parsePolicyList(decoded);
    log.debug({ filePath, ruleCount: policies.length }, 'Policies loaded');
    return policies;
}

// ─── Generated Policies ──────────────────────────────────────

export async function savePolicyDocument(doc: GeneratedPolicy, filePath: string): Promise<void> {
    await writeJson(filePath, doc);
    log.info({ filePath, policyId: doc.policy_id, ruleCount: doc.rules.length }, 'Policy document saved');
}

export function toPolicyRules(doc: GeneratedPolicy): PolicyRule[] {
    return doc.rules.map((rule) => ({
        clause_name: rule.clause_name,
        policy_rule: rule.policy_rule,
        risk_level_if_violated: rule.severity,
        importance: rule.importance,
    }));
}

/**
 * Append the generated rules to the policy file and return the combined list.
 * A missing file starts from an empty list; an unreadable or malformed one
 * is an error, so existing rules are never overwritten.
 */
export async function appendGeneratedRules(doc: GeneratedPolicy, filePath: string): Promise<PolicyRule[]> {
    let existing: PolicyRule[];
    try {
        existing = await loadPolicies(filePath);
    } catch (err) {
        if (!(err instanceof NotFoundError)) throw err;
        existing = [];
    }

    const combined = [...existing, ...toPolicyRules(doc)];
    await writeJson(filePath, combined);

    log.info(
        { filePath, appended: doc.rules.length, ruleCount: combined.length },
        'Generated rules appended to policy file',
    );
    return combined;
}
