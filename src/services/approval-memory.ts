import { randomUUID } from 'node:crypto';
import { ARGUMENT_SEPARATOR, baseName, containsShellOperators, executableRisk, extractExecutable } from './command-risk.js';

export interface ApprovalMemorySnapshot {
    sessionId: string;
    createdAt: string;
    approvedTools: string[];
    shellPatterns: string[];
}

const WILDCARD_SUFFIX = ' *';

/**
 * Session-scoped approvals: tool names the user allowed for the session and
 * shell command patterns (`<exe> *`, `<exe> <flag> *`, or an exact command).
 *
 * Lookup rules for shell commands:
 * - privileged executables are never approved;
 * - destructive executables only match an exact stored command;
 * - anything else matches an exact command or a wildcard for the same
 *   executable, provided the command has no shell operators.
 */
export class SessionApprovalMemory {
    readonly sessionId: string;
    readonly createdAt: string;
    readonly #approvedTools = new Set<string>();
    readonly #shellPatterns = new Set<string>();

    constructor(sessionId: string = randomUUID()) {
        this.sessionId = sessionId;
        this.createdAt = new Date().toISOString();
    }

    approveTool(toolName: string): void {
        this.#approvedTools.add(toolName);
    }

    isToolApproved(toolName: string): boolean {
        return this.#approvedTools.has(toolName);
    }

    rememberShellPattern(pattern: string): void {
        const trimmed = pattern.trim();
        if (trimmed.length > 0) {
            this.#shellPatterns.add(trimmed);
        }
    }

    isShellCommandApproved(command: string): boolean {
        const trimmed = command.trim();
        if (trimmed.length === 0) return false;

        const risk = executableRisk(extractExecutable(trimmed));
        if (risk === 'privileged') return false;
        if (risk === 'destructive') return this.#shellPatterns.has(trimmed);

        if (this.#shellPatterns.has(trimmed)) return true;
        if (containsShellOperators(trimmed)) return false;

        const tokens = trimmed.split(ARGUMENT_SEPARATOR);
        for (const pattern of this.#shellPatterns) {
            if (wildcardCovers(pattern, tokens)) return true;
        }
        return false;
    }

    get approvedToolCount(): number {
        return this.#approvedTools.size;
    }

    get shellPatternCount(): number {
        return this.#shellPatterns.size;
    }

    clear(): void {
        this.#approvedTools.clear();
        this.#shellPatterns.clear();
    }

    snapshot(): ApprovalMemorySnapshot {
        return {
            sessionId: this.sessionId,
            createdAt: this.createdAt,
            approvedTools: [...this.#approvedTools],
            shellPatterns: [...this.#shellPatterns],
        };
    }
}

/**
 * `df *` covers `df`, `df -h`, `df -k /`; `chmod -R *` covers `chmod -R 755 dir`.
 * The executable is compared by base name, the remaining tokens literally.
 */
function wildcardCovers(pattern: string, commandTokens: string[]): boolean {
    if (!pattern.endsWith(WILDCARD_SUFFIX)) return false;

    const prefix = pattern.slice(0, -WILDCARD_SUFFIX.length).trim().split(ARGUMENT_SEPARATOR);
    const [patternExecutable = '', ...patternArgs] = prefix;
    const [commandExecutable = '', ...commandArgs] = commandTokens;
    if (patternExecutable.length === 0) return false;
    if (baseName(patternExecutable) !== baseName(commandExecutable)) return false;

    return patternArgs.every((arg, index) => commandArgs[index] === arg);
}
