import type { CommandRiskLevel } from '../types/shell.js';
import { SHELL_CONNECTOR_ID, SHELL_TOOL_NAME } from '../types/shell.js';
import type { ToolCall } from '../types/tools.js';
import { logThought } from '../utils/logger.js';
import type { SessionApprovalMemory } from './approval-memory.js';
import { classifyCommand, extractApprovalPattern, requiresExplicitApproval } from './command-risk.js';

export const DEFAULT_APPROVAL_TIMEOUT_MS = 300_000;

/** What the approval UI is asked to decide for one call. */
export interface ApprovalRequest {
    call: ToolCall;
    /** Present for shell calls. */
    command?: string;
    riskLevel?: CommandRiskLevel;
    /** When true, "allow all once" does not cover this call. */
    requiresExplicitApproval: boolean;
    /** Pattern that would be remembered if the user approves for the session. */
    suggestedPattern?: string;
}

export interface ApprovalDecision {
    callId: string;
    approved: boolean;
    rememberForSession?: boolean;
    reason?: string;
}

export interface ApprovalPromptResponse {
    decisions: ApprovalDecision[];
    /** Approve every pending call that does not require explicit approval. */
    allowAllOnce?: boolean;
}

/** Human-in-the-loop approval surface supplied by the host (a dialog, a chat prompt, ...). */
export interface ApprovalPrompt {
    requestApproval(
        requests: ApprovalRequest[],
        context: { sessionId: string; signal: AbortSignal },
    ): Promise<ApprovalPromptResponse>;
}

export type ApprovalSource = 'memory' | 'user' | 'allow_all_once' | 'timeout' | 'cancelled' | 'no_handler';

export interface ApprovalRecord {
    callId: string;
    toolName: string;
    approved: boolean;
    source: ApprovalSource;
    reason?: string;
    decidedAt: string;
}

export interface ApprovalOutcome {
    approved: ToolCall[];
    denied: Array<{ call: ToolCall; reason: string }>;
    records: ApprovalRecord[];
    allApproved: boolean;
}

export interface ToolApprovalServiceOptions {
    prompt?: ApprovalPrompt;
    /** @default 300000 */
    timeoutMs?: number;
}

export function shellCommandOf(call: ToolCall): string | undefined {
    if (call.connectorId !== SHELL_CONNECTOR_ID || call.originalToolName !== SHELL_TOOL_NAME) {
        return undefined;
    }
    const command = call.arguments.command;
    return typeof command === 'string' ? command : undefined;
}

type PromptResult =
    | { kind: 'answered'; response: ApprovalPromptResponse }
    | { kind: 'timeout' }
    | { kind: 'cancelled' };

/**
 * Decides which requested tool calls may run.
 *
 * Calls covered by the session's remembered approvals pass straight through;
 * the rest go to the host's {@link ApprovalPrompt}. Without a prompt, or when
 * the prompt times out or is cancelled, pending calls are denied.
 */
export class ToolApprovalService {
    readonly #prompt: ApprovalPrompt | undefined;
    readonly #timeoutMs: number;
    readonly #history: Map<string, ApprovalRecord[]> = new Map();

    constructor(options: ToolApprovalServiceOptions = {}) {
        this.#prompt = options.prompt;
        this.#timeoutMs = Math.max(1, options.timeoutMs ?? DEFAULT_APPROVAL_TIMEOUT_MS);
    }

    async requestApproval(
        calls: readonly ToolCall[],
        context: { memory: SessionApprovalMemory; signal?: AbortSignal },
    ): Promise<ApprovalOutcome> {
        const { memory } = context;
        const records: ApprovalRecord[] = [];
        const deniedReasons = new Map<string, string>();
        const pending: ApprovalRequest[] = [];

        const record = (call: ToolCall, approved: boolean, source: ApprovalSource, reason?: string): void => {
            records.push({
                callId: call.id,
                toolName: call.toolName,
                approved,
                source,
                reason,
                decidedAt: new Date().toISOString(),
            });
            if (!approved) deniedReasons.set(call.id, reason ?? 'Denied');
        };

        for (const call of calls) {
            if (this.#coveredByMemory(call, memory)) {
                record(call, true, 'memory');
            } else {
                pending.push(this.#buildRequest(call));
            }
        }

        if (pending.length > 0) {
            await this.#resolvePending(pending, memory, context.signal, record);
        }

        const history = this.#history.get(memory.sessionId) ?? [];
        history.push(...records);
        this.#history.set(memory.sessionId, history);

        const denied = calls
            .filter((call) => deniedReasons.has(call.id))
            .map((call) => ({ call, reason: deniedReasons.get(call.id) ?? 'Denied' }));

        return {
            approved: calls.filter((call) => !deniedReasons.has(call.id)),
            denied,
            records,
            allApproved: denied.length === 0,
        };
    }

    /** Decisions recorded for a session, oldest first. */
    decisionsFor(sessionId: string): ApprovalRecord[] {
        return [...(this.#history.get(sessionId) ?? [])];
    }

    clearSession(sessionId: string): void {
        this.#history.delete(sessionId);
    }

    async #resolvePending(
        pending: ApprovalRequest[],
        memory: SessionApprovalMemory,
        signal: AbortSignal | undefined,
        record: (call: ToolCall, approved: boolean, source: ApprovalSource, reason?: string) => void,
    ): Promise<void> {
        if (!this.#prompt) {
            for (const request of pending) {
                record(request.call, false, 'no_handler', 'No approval handler available');
            }
            return;
        }

        const result = await this.#ask(this.#prompt, pending, memory.sessionId, signal);
        if (result.kind !== 'answered') {
            const reason = result.kind === 'timeout' ? 'Approval timed out' : 'Approval cancelled';
            for (const request of pending) {
                record(request.call, false, result.kind, reason);
            }
            void logThought(`[ToolApprovalService] ${reason} for ${pending.length} call(s) in session '${memory.sessionId}'.`);
            return;
        }

        const { response } = result;
        for (const request of pending) {
            const decision = response.decisions.find((entry) => entry.callId === request.call.id);

            if (response.allowAllOnce && !request.requiresExplicitApproval) {
                record(request.call, true, 'allow_all_once');
                continue;
            }
            if (decision?.approved) {
                record(request.call, true, 'user');
                if (decision.rememberForSession) {
                    this.#remember(request, memory);
                }
                continue;
            }
            record(request.call, false, 'user', decision?.reason ?? (decision ? 'Denied by user' : 'No decision received'));
        }
    }

    #coveredByMemory(call: ToolCall, memory: SessionApprovalMemory): boolean {
        const command = shellCommandOf(call);
        if (command === undefined) {
            return memory.isToolApproved(call.toolName);
        }
        return !requiresExplicitApproval(command) && memory.isShellCommandApproved(command);
    }

    #buildRequest(call: ToolCall): ApprovalRequest {
        const command = shellCommandOf(call);
        if (command === undefined) {
            return { call, requiresExplicitApproval: false };
        }
        return {
            call,
            command,
            riskLevel: classifyCommand(command),
            requiresExplicitApproval: requiresExplicitApproval(command),
            suggestedPattern: extractApprovalPattern(command),
        };
    }

    /** Commands that always need a fresh decision are never remembered. */
    #remember(request: ApprovalRequest, memory: SessionApprovalMemory): void {
        if (request.command === undefined) {
            memory.approveTool(request.call.toolName);
            return;
        }
        if (!request.requiresExplicitApproval) {
            memory.rememberShellPattern(request.suggestedPattern ?? extractApprovalPattern(request.command));
        }
    }

    async #ask(
        prompt: ApprovalPrompt,
        requests: ApprovalRequest[],
        sessionId: string,
        signal: AbortSignal | undefined,
    ): Promise<PromptResult> {
        if (signal?.aborted) return { kind: 'cancelled' };

        const controller = new AbortController();
        const forwardAbort = (): void => controller.abort(signal?.reason);
        signal?.addEventListener('abort', forwardAbort, { once: true });

        let timer: NodeJS.Timeout | undefined;
        try {
            const answered = prompt.requestApproval(requests, { sessionId, signal: controller.signal }).then(
                (response): PromptResult => ({ kind: 'answered', response }),
                (err: unknown): PromptResult => {
                    const message = err instanceof Error ? err.message : String(err);
                    console.error('[ToolApprovalService] Approval prompt failed:', message);
                    return { kind: 'cancelled' };
                },
            );
            const timeout = new Promise<PromptResult>((resolve) => {
                timer = setTimeout(() => resolve({ kind: 'timeout' }), this.#timeoutMs);
            });
            const cancelled = new Promise<PromptResult>((resolve) => {
                controller.signal.addEventListener('abort', () => resolve({ kind: 'cancelled' }), { once: true });
            });

            const result = await Promise.race([answered, timeout, cancelled]);
            if (result.kind === 'timeout') controller.abort();
            return result;
        } finally {
            clearTimeout(timer);
            signal?.removeEventListener('abort', forwardAbort);
        }
    }
}
