#!/usr/bin/env node
/**
 * Budget Import CLI
 *
 * The CLI owns all file and network I/O; the core receives bytes and
 * records and returns results and warnings as data.
 */

import { parseArgs } from 'node:util';
import { importFile } from './commands/import.js';
import { submitSession } from './commands/submit.js';
import { addRule, deleteRule, listRules, setRuleEnabled, updateRule, type RuleFlags } from './commands/rules.js';
import { suggestRules } from './commands/suggest.js';
import { error, log } from './utils/console.js';
import { errorMessage } from './utils/errors.js';

const USAGE = `Budget Import CLI

Usage:
  bimport import <file> [--yes] [--dry-run] [--session <name>] [--workspace <dir>]
  bimport submit <session> [--yes] [--workspace <dir>]
  bimport rules list
  bimport rules add --category <id> [rule flags]
  bimport rules update <rule-id> [rule flags]
  bimport rules delete|enable|disable <rule-id>
  bimport suggest [--since YYYY-MM-DD] [--threshold <percent>] [--min <count>] [--create]

Rule flags:
  --name <text>  --category <id>  --category-name <text>  --priority <n>
  --payee <exact>  --payee-contains <text>  --payee-regex <pattern>  --memo <text>
  --amount=<major units>  --min=<major units>  --max=<major units>  (use "=" for negative amounts)

Example:
  bimport import op_checking_202603.csv
  bimport rules add --category cat-groceries --payee-contains PRISMA --max=-0.01`;

const RULE_OPTIONS = {
    workspace: { type: 'string', short: 'w' },
    name: { type: 'string' },
    category: { type: 'string' },
    'category-name': { type: 'string' },
    priority: { type: 'string' },
    payee: { type: 'string', multiple: true },
    'payee-contains': { type: 'string', multiple: true },
    'payee-regex': { type: 'string', multiple: true },
    memo: { type: 'string', multiple: true },
    amount: { type: 'string' },
    min: { type: 'string' },
    max: { type: 'string' },
} as const;

export async function main(argv: string[]): Promise<void> {
    const [command, ...rest] = argv;

    switch (command) {
        case 'import': {
            const { values, positionals } = parseArgs({
                args: rest,
                allowPositionals: true,
                options: {
                    yes: { type: 'boolean', short: 'y' },
                    'dry-run': { type: 'boolean' },
                    session: { type: 'string' },
                    workspace: { type: 'string', short: 'w' },
                },
            });
            const file = requirePositional(positionals, 'file');
            await importFile(file, {
                yes: values.yes ?? false,
                dryRun: values['dry-run'] ?? false,
                session: values.session,
                workspace: values.workspace,
            });
            return;
        }

        case 'submit': {
            const { values, positionals } = parseArgs({
                args: rest,
                allowPositionals: true,
                options: {
                    yes: { type: 'boolean', short: 'y' },
                    workspace: { type: 'string', short: 'w' },
                },
            });
            const session = requirePositional(positionals, 'session');
            await submitSession(session, { yes: values.yes ?? false, workspace: values.workspace });
            return;
        }

        case 'rules':
            await runRulesCommand(rest);
            return;

        case 'suggest': {
            const { values } = parseArgs({
                args: rest,
                options: {
                    since: { type: 'string' },
                    threshold: { type: 'string' },
                    min: { type: 'string' },
                    create: { type: 'boolean' },
                    workspace: { type: 'string', short: 'w' },
                },
            });
            await suggestRules({
                since: values.since,
                threshold: numberFlag('--threshold', values.threshold),
                min: numberFlag('--min', values.min),
                create: values.create ?? false,
                workspace: values.workspace,
            });
            return;
        }

        case undefined:
        case 'help':
        case '--help':
        case '-h':
            log(USAGE);
            return;

        default:
            throw new Error(`Unknown command "${command}". Run "bimport help" for usage.`);
    }
}

async function runRulesCommand(args: string[]): Promise<void> {
    const [action = 'list', ...rest] = args;
    const { values, positionals } = parseArgs({ args: rest, allowPositionals: true, options: RULE_OPTIONS });
    const options = { workspace: values.workspace };
    const flags: RuleFlags = {
        name: values.name,
        category: values.category,
        categoryName: values['category-name'],
        priority: values.priority,
        payee: values.payee,
        payeeContains: values['payee-contains'],
        payeeRegex: values['payee-regex'],
        memo: values.memo,
        amount: values.amount,
        min: values.min,
        max: values.max,
    };

    switch (action) {
        case 'list':
            return listRules(options);
        case 'add':
            return addRule(flags, options);
        case 'update':
            return updateRule(requirePositional(positionals, 'rule-id'), flags, options);
        case 'delete':
            return deleteRule(requirePositional(positionals, 'rule-id'), options);
        case 'enable':
            return setRuleEnabled(requirePositional(positionals, 'rule-id'), true, options);
        case 'disable':
            return setRuleEnabled(requirePositional(positionals, 'rule-id'), false, options);
        default:
            throw new Error(`Unknown rules action "${action}". Use list, add, update, delete, enable or disable.`);
    }
}

function requirePositional(positionals: string[], name: string): string {
    const value = positionals[0];
    if (!value) {
        throw new Error(`Missing <${name}> argument. Run "bimport help" for usage.`);
    }
    return value;
}

function numberFlag(flag: string, value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const n = Number(value);
    if (!Number.isFinite(n) || n < 0) {
        throw new Error(`${flag} must be a non-negative number, got "${value}"`);
    }
    return n;
}

main(process.argv.slice(2)).catch((err: unknown) => {
    error(errorMessage(err));
    process.exit(1);
});
