// src/config.ts
// Environment-variable overrides for commander options.
// Every option `--some-flag` can also be set through `SOME_FLAG`; the command line wins.

import { InvalidArgumentError, program } from 'commander';
import type { Command, Option } from 'commander';
import { errorMessage, parseSwitch } from './utils';

/** Raised when flags cannot be configured; `causes` lists every failing flag. */
export class ConfigError extends Error {
    constructor(message: string, readonly causes: readonly string[] = []) {
        super(message);
        this.name = 'ConfigError';
    }
}

const USAGE_NOTE = 'Also set by environment variable';

const parsed = new WeakSet<Command>();

/** Environment variable for a flag: `set-flag` → `SET_FLAG`. */
export function envName(flag: string): string {
    return flag.replace(/-/g, '_').toUpperCase();
}

/**
 * Whether `command` was parsed before. commander keeps no parsed flag, so this sees
 * parses done through `parseFlags` and direct `parse` calls that were given arguments;
 * a direct `parse` of an empty argument list goes unnoticed.
 */
function alreadyParsed(command: Command): boolean {
    if (parsed.has(command)) return true;
    return 'rawArgs' in command && Array.isArray(command.rawArgs) && command.rawArgs.length > 0;
}

/** Mention the environment variable in the option's help text (once). */
function updateUsage(option: Option, variable: string): void {
    const note = `${USAGE_NOTE} ${variable}`;
    if (option.description.endsWith(note)) return;
    option.description = option.description ? `${option.description}\n${note}` : note;
}

/**
 * Coerce an environment value the way the command line would.
 * Throws `InvalidArgumentError` for values the option does not accept.
 */
function coerce(option: Option, raw: string, previous: unknown): unknown {
    if (!option.required && !option.optional) {
        const on = parseSwitch(raw);
        if (on === undefined) throw new InvalidArgumentError('Not a boolean.');
        return option.negate ? !on : on;
    }
    if (option.argChoices && !option.argChoices.includes(raw)) {
        throw new InvalidArgumentError(`Allowed choices are ${option.argChoices.join(', ')}.`);
    }
    if (option.parseArg) return option.parseArg(raw, previous);
    return option.variadic ? [raw] : raw;
}

/**
 * Parse `args` (without the node binary and script) into `command`, after applying
 * environment overrides for every option.
 * Must be called once, after all options are defined and before they are read;
 * a command that was already parsed is refused (see `alreadyParsed`).
 * No override is applied unless all of them are valid.
 */
export function parseFlags(
    args: string[],
    command: Command,
    env: Record<string, string | undefined> = process.env,
): Command {
    if (alreadyParsed(command)) {
        throw new ConfigError('flags were already parsed');
    }

    const causes: string[] = [];
    const values: Array<[key: string, value: unknown]> = [];
    for (const option of command.options) {
        const name = option.name();
        const variable = envName(name);
        updateUsage(option, variable);

        const raw = env[variable];
        if (raw === undefined) continue;
        const key = option.attributeName();
        try {
            values.push([key, coerce(option, raw, command.getOptionValue(key))]);
        } catch (err) {
            causes.push(`could not set ${name} to ${raw}: ${errorMessage(err)}`);
        }
    }
    if (causes.length > 0) {
        throw new ConfigError(`parsing flags: ${causes.join('; ')}`, causes);
    }

    for (const [key, value] of values) command.setOptionValueWithSource(key, value, 'env');
    parsed.add(command);
    return command.parse(args, { from: 'user' });
}

/** Parse `process.argv` into commander's global `program`, with environment overrides. */
export function parse(env: Record<string, string | undefined> = process.env): Command {
    return parseFlags(process.argv.slice(2), program, env);
}
