import { ProviderRequestError, ToolLoopError } from '../types/errors.js';
import type {
    ChatMessage,
    ProviderGeneration,
    ToolCallingProvider,
} from '../types/providers.js';
import type { ConnectorTool, ToolCall, ToolExecutionRound, ToolResult } from '../types/tools.js';
import type { SessionApprovalMemory } from '../services/approval-memory.js';
import type { ToolApprovalService } from '../services/tool-approval-service.js';
import { logThought } from '../utils/logger.js';
import { buildProviderRequest, withoutEmptyAssistantMessages } from './provider-request.js';
import type { ToolExecutor } from './tool-executor.js';
import { cancelledResult, createToolRound, rejectionResult } from './tool-model.js';
import { parseToolInvocation } from './tool-schema-converter.js';

export const DEFAULT_MAX_TOOL_ROUNDS = 20;

export type ToolLoopState =
    | 'awaiting_generation'
    | 'executing_tools'
    | 'complete'
    | 'round_limit_reached'
    | 'failed'
    | 'cancelled';

export type ToolLoopStopReason = 'completed' | 'hallucinated_tools' | 'denied' | 'round_limit' | 'cancelled';

const ALLOWED_TRANSITIONS: Record<ToolLoopState, readonly ToolLoopState[]> = {
    awaiting_generation: ['executing_tools', 'complete', 'round_limit_reached', 'failed', 'cancelled'],
    executing_tools: ['awaiting_generation', 'complete', 'round_limit_reached', 'failed', 'cancelled'],
    complete: [],
    round_limit_reached: [],
    failed: [],
    cancelled: [],
};

export interface ToolLoopOutcome {
    state: ToolLoopState;
    stopReason: ToolLoopStopReason;
    /** Final assistant text. Empty when cancelled. */
    content: string;
    rounds: ToolExecutionRound[];
    /** Provider requests made, including fallback and summarization requests. */
    generationCount: number;
}

export type ToolLoopEvent =
    | { type: 'state_changed'; from: ToolLoopState; to: ToolLoopState }
    | { type: 'assistant_text'; text: string }
    | { type: 'tool_calls_requested'; calls: ToolCall[]; unresolved: string[] }
    | { type: 'tool_result'; call: ToolCall; result: ToolResult }
    | { type: 'round_completed'; round: ToolExecutionRound; roundNumber: number };

export interface ToolLoopApproval {
    service: ToolApprovalService;
    memory: SessionApprovalMemory;
}

export interface ToolLoopOptions {
    /** @default 20 */
    maxToolRounds?: number;
    /** When absent every resolved call runs without a human decision. */
    approval?: ToolLoopApproval;
    onEvent?: (event: ToolLoopEvent) => void;
}

export interface ToolLoopRunOptions {
    signal?: AbortSignal;
}

interface RunState {
    state: ToolLoopState;
    rounds: ToolExecutionRound[];
    generations: number;
    toolsEnabled: boolean;
}

export function buildHallucinatedToolMessage(toolNames: readonly string[]): string {
    return (
        `You attempted to call tools that do not exist: ${toolNames.join(', ')}. ` +
        'These names do not match any available tool. Do NOT attempt to call tools again. ' +
        "Respond to the user's request directly using your own knowledge."
    );
}

export function buildRoundLimitPrompt(toolCallCount: number, roundCount: number): string {
    return (
        `You have executed ${toolCallCount} tool calls across ${roundCount} rounds. ` +
        'Based ONLY on the tool results you received, provide a response. ' +
        'If the tools returned errors or insufficient data, explain what information is missing. ' +
        'Do NOT make up information.'
    );
}

export function buildDenialMessage(toolNames: readonly string[]): string {
    return `Tool execution was denied for: ${toolNames.join(', ')}. All tool execution stopped.`;
}

/** Provider errors meaning the model cannot take tool declarations at all. */
export function isToolCapabilityError(error: unknown): boolean {
    if (!(error instanceof ProviderRequestError)) return false;
    const message = error.message.toLowerCase();
    const mentionsTools = message.includes('tool') || message.includes('function call');
    const unsupported = message.includes('not support') || message.includes('unsupported') || message.includes('not enabled');
    return mentionsTools && unsupported;
}

/**
 * Provider-agnostic multi-round tool calling.
 *
 * Each round sends the conversation (with earlier rounds attached) to the
 * provider, resolves requested tools against the advertised set, executes
 * them and feeds the results back. The loop ends on a text-only generation,
 * on `maxToolRounds` (followed by one summarization request), when every
 * requested tool is unknown (followed by one tool-free answer), on a denial,
 * or on cancellation.
 */
export class ToolLoop {
    readonly #executor: ToolExecutor;
    readonly #toolSource: () => ConnectorTool[];
    readonly #maxToolRounds: number;
    readonly #approval: ToolLoopApproval | undefined;
    readonly #onEvent: ((event: ToolLoopEvent) => void) | undefined;

    constructor(executor: ToolExecutor, toolSource: () => ConnectorTool[], options: ToolLoopOptions = {}) {
        this.#executor = executor;
        this.#toolSource = toolSource;
        this.#maxToolRounds = Math.max(1, Math.floor(options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS));
        this.#approval = options.approval;
        this.#onEvent = options.onEvent;
    }

    get maxToolRounds(): number {
        return this.#maxToolRounds;
    }

    async run(
        provider: ToolCallingProvider,
        messages: readonly ChatMessage[],
        options: ToolLoopRunOptions = {},
    ): Promise<ToolLoopOutcome> {
        const { signal } = options;
        const run: RunState = { state: 'awaiting_generation', rounds: [], generations: 0, toolsEnabled: true };
        const tools = this.#toolSource();

        try {
            while (run.rounds.length < this.#maxToolRounds) {
                if (signal?.aborted) return this.#cancel(run);

                const generation = await this.#generate(provider, run, this.#conversation(messages, run.rounds), tools, signal);
                if (signal?.aborted) return this.#cancel(run);

                const text = generation.content ?? '';
                if (text.length > 0) this.#emit({ type: 'assistant_text', text });

                if (!run.toolsEnabled || generation.toolInvocations.length === 0) {
                    return this.#finish(run, 'complete', 'completed', text);
                }

                const calls: ToolCall[] = [];
                const unresolved: string[] = [];
                for (const invocation of generation.toolInvocations) {
                    const call = parseToolInvocation(invocation, tools);
                    if (call) {
                        calls.push(call);
                    } else {
                        unresolved.push(invocation.name);
                    }
                }

                if (unresolved.length > 0) {
                    console.warn(`[ToolLoop] Model requested unknown tool(s): ${unresolved.join(', ')}`);
                }

                if (calls.length === 0) {
                    return await this.#answerWithoutTools(provider, run, messages, unresolved, signal);
                }

                this.#transition(run, 'executing_tools');
                this.#emit({ type: 'tool_calls_requested', calls, unresolved });

                if (this.#approval) {
                    const approval = await this.#approval.service.requestApproval(calls, {
                        memory: this.#approval.memory,
                        signal,
                    });
                    if (signal?.aborted) return this.#cancel(run);

                    if (!approval.allApproved) {
                        const reasons = new Map(approval.denied.map((entry) => [entry.call.id, entry.reason]));
                        const results = calls.map((call) => {
                            const reason = reasons.get(call.id);
                            return reason === undefined ? cancelledResult(call) : rejectionResult(call, reason);
                        });
                        this.#recordRound(run, createToolRound(calls, results, text));
                        const deniedNames = approval.denied.map((entry) => entry.call.toolName);
                        return this.#finish(run, 'complete', 'denied', buildDenialMessage(deniedNames));
                    }
                }

                const results = await this.#executor.executeAll(calls, { signal });
                results.forEach((result, index) => this.#emit({ type: 'tool_result', call: calls[index], result }));
                this.#recordRound(run, createToolRound(calls, results, text));

                if (signal?.aborted) return this.#cancel(run);
                this.#transition(run, 'awaiting_generation');
            }

            return await this.#summarizeAtLimit(provider, run, messages, signal);
        } catch (err) {
            if (err instanceof ToolLoopError) throw err;
            if (signal?.aborted) return this.#cancel(run);

            const message = err instanceof Error ? err.message : String(err);
            this.#transition(run, 'failed');
            await logThought(`[ToolLoop] Failed after ${run.rounds.length} round(s): ${message}`);
            throw new ToolLoopError(`Tool loop failed: ${message}`, [...run.rounds], { cause: err });
        }
    }

    // ── Steps ────────────────────────────────────────────────────────────────

    async #generate(
        provider: ToolCallingProvider,
        run: RunState,
        conversation: ChatMessage[],
        tools: readonly ConnectorTool[],
        signal: AbortSignal | undefined,
    ): Promise<ProviderGeneration> {
        const effectiveSignal = signal ?? new AbortController().signal;
        run.generations += 1;

        try {
            return await provider.generate(
                buildProviderRequest(provider.kind, conversation, run.toolsEnabled ? tools : undefined),
                effectiveSignal,
            );
        } catch (err) {
            if (!(run.toolsEnabled && run.rounds.length === 0 && isToolCapabilityError(err))) throw err;

            run.toolsEnabled = false;
            await logThought(`[ToolLoop] Provider '${provider.name}' rejected tool declarations; retrying without tools.`);
            run.generations += 1;
            return provider.generate(buildProviderRequest(provider.kind, conversation, undefined), effectiveSignal);
        }
    }

    async #answerWithoutTools(
        provider: ToolCallingProvider,
        run: RunState,
        messages: readonly ChatMessage[],
        unresolved: string[],
        signal: AbortSignal | undefined,
    ): Promise<ToolLoopOutcome> {
        await logThought(`[ToolLoop] All requested tools unknown (${unresolved.join(', ')}); answering without tools.`);

        const conversation: ChatMessage[] = [
            ...withoutEmptyAssistantMessages(this.#conversation(messages, run.rounds)),
            { role: 'system', content: buildHallucinatedToolMessage(unresolved) },
        ];
        run.toolsEnabled = false;
        const generation = await this.#generate(provider, run, conversation, [], signal);
        if (signal?.aborted) return this.#cancel(run);

        return this.#finish(run, 'complete', 'hallucinated_tools', generation.content ?? '');
    }

    async #summarizeAtLimit(
        provider: ToolCallingProvider,
        run: RunState,
        messages: readonly ChatMessage[],
        signal: AbortSignal | undefined,
    ): Promise<ToolLoopOutcome> {
        const toolCallCount = run.rounds.reduce((count, round) => count + round.toolCalls.length, 0);
        await logThought(
            `[ToolLoop] Round limit ${this.#maxToolRounds} reached after ${toolCallCount} tool call(s); requesting summary.`,
        );

        const conversation: ChatMessage[] = [
            ...withoutEmptyAssistantMessages(this.#conversation(messages, run.rounds)),
            { role: 'user', content: buildRoundLimitPrompt(toolCallCount, run.rounds.length) },
        ];
        run.toolsEnabled = false;
        const generation = await this.#generate(provider, run, conversation, [], signal);
        if (signal?.aborted) return this.#cancel(run);

        return this.#finish(run, 'round_limit_reached', 'round_limit', generation.content ?? '');
    }

    // ── Helpers ──────────────────────────────────────────────────────────────

    #conversation(messages: readonly ChatMessage[], rounds: readonly ToolExecutionRound[]): ChatMessage[] {
        if (rounds.length === 0) return [...messages];
        return [...messages, { role: 'assistant', content: '', toolRounds: [...rounds] }];
    }

    #recordRound(run: RunState, round: ToolExecutionRound): void {
        run.rounds.push(round);
        this.#emit({ type: 'round_completed', round, roundNumber: run.rounds.length });
    }

    #transition(run: RunState, to: ToolLoopState): void {
        const from = run.state;
        if (!ALLOWED_TRANSITIONS[from].includes(to)) {
            throw new ToolLoopError(`Invalid tool loop transition: ${from} -> ${to}`, [...run.rounds]);
        }
        run.state = to;
        this.#emit({ type: 'state_changed', from, to });
    }

    #finish(
        run: RunState,
        state: 'complete' | 'round_limit_reached',
        stopReason: ToolLoopStopReason,
        content: string,
    ): ToolLoopOutcome {
        this.#transition(run, state);
        return { state, stopReason, content, rounds: [...run.rounds], generationCount: run.generations };
    }

    #cancel(run: RunState): ToolLoopOutcome {
        this.#transition(run, 'cancelled');
        void logThought(`[ToolLoop] Cancelled after ${run.rounds.length} round(s).`);
        return {
            state: 'cancelled',
            stopReason: 'cancelled',
            content: '',
            rounds: [...run.rounds],
            generationCount: run.generations,
        };
    }

    #emit(event: ToolLoopEvent): void {
        if (!this.#onEvent) return;
        try {
            this.#onEvent(event);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            console.warn('[ToolLoop] Event handler failed:', message);
        }
    }
}
