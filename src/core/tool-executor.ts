import { ConnectorError, DEFAULT_TOOL_TIMEOUT_MS, type Connector } from '../types/connector.js';
import type { BatchResult, ToolCall, ToolResult } from '../types/tools.js';
import type { ConnectorRegistry } from '../services/connector-registry.js';
import { logToolCall } from '../utils/logger.js';
import { cancelledResult, failureResult, resultTextForLLM, summarizeBatch, toolError } from './tool-model.js';

const MAX_CONCURRENCY = 16;

export interface ToolExecutorOptions {
    /** Per-call timeout. @default 30000 */
    timeoutMs?: number;
    /**
     * Calls in flight during `executeAll`. Results keep input order either way.
     * @default 1
     */
    maxConcurrency?: number;
}

export interface ExecuteOptions {
    signal?: AbortSignal;
    /** Overrides the executor's timeout for this call. */
    timeoutMs?: number;
}

type RaceOutcome =
    | { kind: 'completed'; result: ToolResult }
    | { kind: 'failed'; error: unknown }
    | { kind: 'timeout' }
    | { kind: 'cancelled' };

function formatSeconds(ms: number): string {
    return String(ms / 1000);
}

/**
 * Runs tool calls against registered connectors with a per-call timeout.
 *
 * Every failure mode (unknown connector, disconnected connector, thrown
 * error, timeout, cancellation) comes back as an error outcome on the
 * `ToolResult`; nothing here throws for a single call.
 */
export class ToolExecutor {
    readonly #registry: ConnectorRegistry;
    readonly #timeoutMs: number;
    readonly #maxConcurrency: number;

    constructor(registry: ConnectorRegistry, options: ToolExecutorOptions = {}) {
        this.#registry = registry;
        this.#timeoutMs = Math.max(1, Math.floor(options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS));
        this.#maxConcurrency = Math.min(MAX_CONCURRENCY, Math.max(1, Math.floor(options.maxConcurrency ?? 1)));
    }

    get timeoutMs(): number {
        return this.#timeoutMs;
    }

    async execute(call: ToolCall, options: ExecuteOptions = {}): Promise<ToolResult> {
        const startedAt = Date.now();
        const elapsed = (): number => Date.now() - startedAt;

        if (options.signal?.aborted) {
            return cancelledResult(call);
        }

        const connector = this.#registry.get(call.connectorId);
        if (!connector) {
            return this.#finish(
                call,
                failureResult(call, toolError(`Connector not found: ${call.connectorId}`, { code: 'connector_not_found' }), elapsed()),
            );
        }

        if (connector.state !== 'connected') {
            return this.#finish(
                call,
                failureResult(
                    call,
                    toolError(`Connector '${connector.name}' is not connected`, { code: 'not_connected', isRetryable: true }),
                    elapsed(),
                ),
            );
        }

        const timeoutMs = Math.max(1, options.timeoutMs ?? this.#timeoutMs);
        const outcome = await this.#race(connector, call, timeoutMs, options.signal);

        switch (outcome.kind) {
            case 'completed':
                return this.#finish(call, {
                    ...outcome.result,
                    callId: call.id,
                    toolName: call.toolName,
                    durationMs: elapsed(),
                });
            case 'timeout':
                return this.#finish(
                    call,
                    failureResult(
                        call,
                        toolError(`Tool execution timed out after ${formatSeconds(timeoutMs)}s`, { code: 'timeout', isRetryable: true }),
                        elapsed(),
                    ),
                );
            case 'cancelled':
                return this.#finish(call, { ...cancelledResult(call), durationMs: elapsed() });
            case 'failed': {
                if (options.signal?.aborted) {
                    return this.#finish(call, { ...cancelledResult(call), durationMs: elapsed() });
                }
                const { error } = outcome;
                const message = error instanceof Error ? error.message : String(error);
                const failure = error instanceof ConnectorError
                    ? toolError(message, { code: error.kind, isRetryable: error.isRetryable })
                    : toolError(message, { code: 'execution_failed' });
                return this.#finish(call, failureResult(call, failure, elapsed()));
            }
        }
    }

    /** Execute calls and return results index-for-index with the input. */
    async executeAll(calls: readonly ToolCall[], options: Omit<ExecuteOptions, 'timeoutMs'> = {}): Promise<ToolResult[]> {
        if (calls.length === 0) return [];

        const results = new Array<ToolResult>(calls.length);
        let next = 0;

        const worker = async (): Promise<void> => {
            while (next < calls.length) {
                const index = next;
                next += 1;
                const call = calls[index];
                results[index] = options.signal?.aborted
                    ? cancelledResult(call)
                    : await this.execute(call, options);
            }
        };

        const workers = Math.min(this.#maxConcurrency, calls.length);
        await Promise.all(Array.from({ length: workers }, () => worker()));
        return results;
    }

    async executeBatch(calls: readonly ToolCall[], options: Omit<ExecuteOptions, 'timeoutMs'> = {}): Promise<BatchResult> {
        return summarizeBatch(await this.executeAll(calls, options));
    }

    /**
     * Race the connector against a timer and the caller's signal. The loser
     * is cancelled through the connector's abort signal and the timer is
     * always cleared.
     */
    async #race(
        connector: Connector,
        call: ToolCall,
        timeoutMs: number,
        signal: AbortSignal | undefined,
    ): Promise<RaceOutcome> {
        const controller = new AbortController();
        const forwardAbort = (): void => controller.abort(signal?.reason);
        signal?.addEventListener('abort', forwardAbort, { once: true });

        let timer: NodeJS.Timeout | undefined;
        try {
            const work = connector.executeTool(call, controller.signal).then(
                (result): RaceOutcome => ({ kind: 'completed', result }),
                (error: unknown): RaceOutcome => ({ kind: 'failed', error }),
            );
            const timeout = new Promise<RaceOutcome>((resolve) => {
                timer = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
            });
            const cancelled = new Promise<RaceOutcome>((resolve) => {
                controller.signal.addEventListener('abort', () => resolve({ kind: 'cancelled' }), { once: true });
            });

            const outcome = await Promise.race([work, timeout, cancelled]);
            if (outcome.kind === 'timeout') {
                controller.abort(new Error('timeout'));
            }
            return outcome;
        } finally {
            clearTimeout(timer);
            signal?.removeEventListener('abort', forwardAbort);
        }
    }

    async #finish(call: ToolCall, result: ToolResult): Promise<ToolResult> {
        await logToolCall(call.toolName, call.arguments, resultTextForLLM(result));
        return result;
    }
}
