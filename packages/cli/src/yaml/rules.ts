import { parseDocument, isMap, isScalar, isSeq, YAMLSeq } from 'yaml';
import type { Document } from 'yaml';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
    ConfigurationError,
    RuleNotFoundError,
    applyRulePatch,
    buildRule,
    listEnabledRulesByPriorityDesc,
    nextRuleId,
    sortRulesByPriority,
    type Clock,
    type Rule,
    type RuleInput,
    type RulePatch,
    type RuleStore,
} from '@budget-import/core';
import { RuleSchema } from '@budget-import/shared';
import { extractRuleEntries } from '../workspace/config.js';

const NEW_FILE = '# Categorization rules\n# Higher priority wins; ties go to the lower id.\nrules:\n';

/**
 * Rule store backed by config/rules.yaml.
 *
 * Writes go through the YAML document model so comments and the order of
 * untouched entries survive a create, update or delete.
 */
export class YamlRuleStore implements RuleStore {
    private readonly filePath: string;
    private readonly clock: Clock;

    constructor(filePath: string, clock: Clock = () => new Date()) {
        this.filePath = filePath;
        this.clock = clock;
    }

    /**
     * @throws ConfigurationError if any stored entry is malformed
     */
    async list(): Promise<Rule[]> {
        const { entries } = await this.load();
        return sortRulesByPriority(this.validate(entries));
    }

    async get(id: string): Promise<Rule | null> {
        const rules = await this.list();
        return rules.find(r => r.id === id) ?? null;
    }

    async create(input: RuleInput): Promise<Rule> {
        const { doc, entries } = await this.load();
        const rules = this.validate(entries);
        const rule = buildRule(input, nextRuleId(rules), this.clock());

        rulesSequence(doc, this.filePath).add(doc.createNode(rule));
        await this.save(doc);
        return rule;
    }

    async update(id: string, patch: RulePatch): Promise<Rule> {
        const { doc, entries } = await this.load();
        const rules = this.validate(entries);
        const index = rules.findIndex(r => r.id === id);
        if (index === -1) {
            throw new RuleNotFoundError(id);
        }
        const updated = applyRulePatch(rules[index], patch, this.clock());

        rulesSequence(doc, this.filePath).set(index, doc.createNode(updated));
        await this.save(doc);
        return updated;
    }

    async delete(id: string): Promise<void> {
        const { doc, entries } = await this.load();
        const index = this.validate(entries).findIndex(r => r.id === id);
        if (index === -1) {
            throw new RuleNotFoundError(id);
        }

        rulesSequence(doc, this.filePath).delete(index);
        await this.save(doc);
    }

    async listEnabledRulesByPriorityDesc(): Promise<Rule[]> {
        const { entries } = await this.load();
        return listEnabledRulesByPriorityDesc(this.validate(entries));
    }

    private async load(): Promise<{ doc: Document.Parsed; entries: unknown[] }> {
        let content: string;
        try {
            content = await readFile(this.filePath, 'utf8');
        } catch (err) {
            if (isNotFound(err)) {
                content = NEW_FILE;
            } else {
                throw err;
            }
        }

        const doc = parseDocument(content);
        if (doc.errors.length > 0) {
            throw new Error(`Invalid YAML in ${this.filePath}: ${doc.errors[0].message}`);
        }
        return { doc, entries: extractRuleEntries(doc.toJS(), this.filePath) };
    }

    /**
     * Stored order is kept (indexes line up with the YAML sequence).
     */
    private validate(entries: readonly unknown[]): Rule[] {
        return entries.map((entry, index) => {
            const parsed = RuleSchema.safeParse(entry);
            if (!parsed.success) {
                const detail = parsed.error.issues
                    .map(issue => `${issue.path.join('.') || 'rule'}: ${issue.message}`)
                    .join('; ');
                throw new ConfigurationError(`entry ${index} in ${this.filePath} is malformed (${detail})`);
            }
            return parsed.data;
        });
    }

    // Written to a temp file first, then renamed into place
    private async save(doc: Document.Parsed): Promise<void> {
        await mkdir(dirname(this.filePath), { recursive: true });
        const tmp = `${this.filePath}.tmp`;
        await writeFile(tmp, doc.toString());
        await rename(tmp, this.filePath);
    }
}

/**
 * The sequence holding the rules: the document root itself, or its
 * "rules" key (created when missing or empty).
 */
function rulesSequence(doc: Document.Parsed, filePath: string): YAMLSeq {
    const root = doc.contents;
    if (isSeq(root)) {
        return root;
    }

    if (isMap(root)) {
        const rules = root.get('rules', true);
        if (isSeq(rules)) {
            return rules;
        }
        if (rules !== undefined && !(isScalar(rules) && rules.value === null)) {
            throw new Error(`Invalid YAML structure in ${filePath}: "rules" must be a list.`);
        }
    } else if (root !== null) {
        throw new Error(`Invalid YAML structure in ${filePath}: expected a list or a "rules" list.`);
    }

    doc.set('rules', new YAMLSeq());
    const created = doc.get('rules', true);
    if (!isSeq(created)) {
        throw new Error(`Could not create a "rules" list in ${filePath}`);
    }
    return created;
}

function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
