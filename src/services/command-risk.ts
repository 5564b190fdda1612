import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { COMMAND_RISK_LEVELS, type CommandRiskLevel, type CommandValidation } from '../types/shell.js';

export const MAX_COMMAND_LENGTH = 10_000;

const RISK_DATA_URL = new URL('../../data/command-risk.json', import.meta.url);

const CommandRiskTableSchema = z.object({
    safe: z.array(z.string()),
    read: z.array(z.string()),
    write: z.array(z.string()),
    destructive: z.array(z.string()),
    privileged: z.array(z.string()),
});

type CommandRiskTable = Record<CommandRiskLevel, ReadonlySet<string>>;

let cachedTable: CommandRiskTable | null = null;

function riskTable(): CommandRiskTable {
    if (cachedTable) return cachedTable;
    const parsed = CommandRiskTableSchema.parse(JSON.parse(readFileSync(RISK_DATA_URL, 'utf8')));
    cachedTable = {
        safe: new Set(parsed.safe),
        read: new Set(parsed.read),
        write: new Set(parsed.write),
        destructive: new Set(parsed.destructive),
        privileged: new Set(parsed.privileged),
    };
    return cachedTable;
}

const WRITE_INDICATORS = ['>>', '>', '| tee'];

// Longer operators first so `&&` is reported before `&`. A line break
// separates commands just like `;`.
const SHELL_OPERATORS = [';', '&&', '||', '|', '`', '$(', '${', '>>', '>', '<<', '<', '&', '\n', '\r'];

/** Argument separators within a single command line. */
export const ARGUMENT_SEPARATOR = /[ \t]+/;

export function riskRank(level: CommandRiskLevel): number {
    return COMMAND_RISK_LEVELS.indexOf(level);
}

/** True only for safe and read commands. */
export function shouldSandbox(level: CommandRiskLevel): boolean {
    return level === 'safe' || level === 'read';
}

/** Privileged commands never run, approved or not. */
export function isAllowed(level: CommandRiskLevel): boolean {
    return level !== 'privileged';
}

/** Strip a path prefix: `/usr/bin/rm` → `rm`. */
export function baseName(executable: string): string {
    const slash = executable.lastIndexOf('/');
    return slash === -1 ? executable : executable.slice(slash + 1);
}

/** First token of the command's first line, reduced to its base name. */
export function extractExecutable(command: string): string {
    const [firstLine = ''] = command.trim().split(/[\r\n]/, 1);
    const [first = ''] = firstLine.trim().split(ARGUMENT_SEPARATOR, 1);
    return baseName(first);
}

export function executableRisk(executable: string): CommandRiskLevel | undefined {
    const table = riskTable();
    for (const level of ['privileged', 'destructive', 'write', 'read', 'safe'] as const) {
        if (table[level].has(executable)) return level;
    }
    return undefined;
}

/**
 * Classify by executable name: privileged, destructive and write sets first,
 * then output redirection (which makes any command a write), then read and
 * safe. Unknown executables are treated as read.
 */
export function classifyCommand(command: string): CommandRiskLevel {
    const executable = extractExecutable(command);
    const known = executableRisk(executable);

    if (known === 'privileged' || known === 'destructive' || known === 'write') {
        return known;
    }
    if (WRITE_INDICATORS.some((indicator) => command.includes(indicator))) {
        return 'write';
    }
    return known ?? 'read';
}

export function shellOperatorsIn(command: string): string[] {
    const found: string[] = [];
    let remaining = command;
    for (const operator of SHELL_OPERATORS) {
        if (remaining.includes(operator)) {
            found.push(operator);
            remaining = remaining.split(operator).join(' ');
        }
    }
    return found;
}

export function containsShellOperators(command: string): boolean {
    return shellOperatorsIn(command).length > 0;
}

export function validateCommand(command: string): CommandValidation {
    const issues: string[] = [];
    const trimmed = command.trim();
    const riskLevel = classifyCommand(trimmed);

    if (trimmed.length === 0) {
        issues.push('Command is empty.');
    }
    if (command.includes('\0')) {
        issues.push('Command contains a null byte.');
    }
    if (command.length > MAX_COMMAND_LENGTH) {
        issues.push(`Command exceeds the maximum length of ${MAX_COMMAND_LENGTH} characters.`);
    }
    if (!isAllowed(riskLevel)) {
        issues.push(`'${extractExecutable(trimmed)}' is a privileged command and is never executed.`);
    }

    return {
        isValid: issues.length === 0,
        issues,
        hasShellOperators: containsShellOperators(command),
        riskLevel,
    };
}

/** Destructive, privileged, or chained commands always need a fresh human decision. */
export function requiresExplicitApproval(command: string): boolean {
    const level = classifyCommand(command);
    return level === 'destructive' || level === 'privileged' || containsShellOperators(command);
}

/**
 * Pattern remembered when a user approves a command for the session.
 * Destructive and privileged commands are pinned to the exact string; other
 * commands widen to `<exe> *`, keeping a leading flag for write commands.
 */
export function extractApprovalPattern(command: string): string {
    const trimmed = command.trim();
    const level = classifyCommand(trimmed);
    if (level === 'destructive' || level === 'privileged') {
        return trimmed;
    }

    const executable = extractExecutable(trimmed);
    const [, firstArgument] = trimmed.split(ARGUMENT_SEPARATOR, 2);
    if (level === 'write' && firstArgument !== undefined && firstArgument.startsWith('-')) {
        return `${executable} ${firstArgument} *`;
    }
    return `${executable} *`;
}
