import { randomUUID } from 'node:crypto';
import type { JsonObject } from '../types/json.js';
import type { JsonSchema } from '../types/json-schema.js';
import type {
    BatchResult,
    ConnectorTool,
    ToolCall,
    ToolContent,
    ToolError,
    ToolExecutionRound,
    ToolResult,
} from '../types/tools.js';

export const DISPLAY_SUMMARY_LIMIT = 200;
export const IMAGE_PLACEHOLDER = '[Image content - see attached image]';
export const EMPTY_SCHEMA: JsonSchema = { type: 'object', properties: {} };

// ── Naming ───────────────────────────────────────────────────────────────────

/** Lowercase a connector name and collapse everything outside `[a-z0-9_]` to `_`. */
export function slugifyConnectorName(connectorName: string): string {
    return connectorName
        .toLowerCase()
        .replace(/[^a-z0-9_]+/g, '_')
        .replace(/^_+|_+$/g, '');
}

export function disambiguatedToolName(connectorName: string, originalName: string): string {
    const prefix = slugifyConnectorName(connectorName);
    return prefix ? `${prefix}_${originalName}` : originalName;
}

export interface ConnectorToolInit {
    originalName: string;
    description?: string;
    inputSchema?: JsonSchema;
    connectorId: string;
    connectorName: string;
}

export function createConnectorTool(init: ConnectorToolInit): ConnectorTool {
    return {
        id: `${init.connectorId}:${init.originalName}`,
        name: disambiguatedToolName(init.connectorName, init.originalName),
        originalName: init.originalName,
        description: init.description,
        inputSchema: init.inputSchema ?? EMPTY_SCHEMA,
        connectorId: init.connectorId,
        connectorName: init.connectorName,
    };
}

// ── Calls ────────────────────────────────────────────────────────────────────

export function createToolCall(tool: ConnectorTool, args: JsonObject, id: string = randomUUID()): ToolCall {
    return {
        id,
        toolName: tool.name,
        connectorId: tool.connectorId,
        originalToolName: tool.originalName,
        arguments: args,
        requestedAt: new Date().toISOString(),
    };
}

/** Dedupe equality: same id, tool and connector. */
export function isSameToolCall(a: ToolCall, b: ToolCall): boolean {
    return a.id === b.id && a.toolName === b.toolName && a.connectorId === b.connectorId;
}

// ── Content ──────────────────────────────────────────────────────────────────

function decodeUtf8(bytes: Uint8Array): string | undefined {
    try {
        return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch {
        return undefined;
    }
}

export function textContent(text: string): ToolContent {
    return { text };
}

export function jsonContent(value: unknown): ToolContent {
    return { json: new TextEncoder().encode(JSON.stringify(value)) };
}

/** Best textual form of a result for the model. Never truncated. */
export function contentForLLM(content: ToolContent): string {
    if (content.text !== undefined) return content.text;
    if (content.json !== undefined) {
        const decoded = decodeUtf8(content.json);
        if (decoded !== undefined) return decoded;
    }
    if (content.image !== undefined) return IMAGE_PLACEHOLDER;
    return '';
}

/** Short form for UI and audit trails. */
export function displaySummary(content: ToolContent): string {
    if (content.text !== undefined) {
        // Code points, not UTF-16 units.
        const characters = Array.from(content.text);
        return characters.length > DISPLAY_SUMMARY_LIMIT
            ? `${characters.slice(0, DISPLAY_SUMMARY_LIMIT).join('')}...`
            : content.text;
    }
    if (content.json !== undefined) return '[JSON data]';
    if (content.image !== undefined) return '[Image]';
    return '[Empty result]';
}

// ── Results ──────────────────────────────────────────────────────────────────

export function toolError(message: string, options: { code?: string; isRetryable?: boolean } = {}): ToolError {
    return { message, code: options.code, isRetryable: options.isRetryable ?? false };
}

export function successResult(call: ToolCall, content: ToolContent, durationMs: number): ToolResult {
    return {
        callId: call.id,
        toolName: call.toolName,
        outcome: { kind: 'success', content },
        durationMs,
        completedAt: new Date().toISOString(),
    };
}

export function failureResult(call: ToolCall, error: ToolError, durationMs: number): ToolResult {
    return {
        callId: call.id,
        toolName: call.toolName,
        outcome: { kind: 'error', error },
        durationMs,
        completedAt: new Date().toISOString(),
    };
}

export function rejectionResult(call: ToolCall, reason: string): ToolResult {
    return failureResult(
        call,
        toolError(`Tool execution was rejected by user: ${reason}`, { code: 'rejected' }),
        0,
    );
}

export function cancelledResult(call: ToolCall): ToolResult {
    return failureResult(call, toolError('Execution cancelled', { code: 'cancelled' }), 0);
}

export function isSuccess(result: ToolResult): boolean {
    return result.outcome.kind === 'success';
}

/** Text handed back to a model for this result: content, or the error message. */
export function resultTextForLLM(result: ToolResult): string {
    return result.outcome.kind === 'success'
        ? contentForLLM(result.outcome.content)
        : result.outcome.error.message;
}

// ── Rounds & batches ────────────────────────────────────────────────────────

/** Empty or missing assistant text is stored as absent. */
export function normalizeAssistantResponse(text: string | null | undefined): string | undefined {
    return text ? text : undefined;
}

export function createToolRound(
    toolCalls: readonly ToolCall[],
    results: readonly ToolResult[],
    assistantResponse?: string | null,
): ToolExecutionRound {
    const normalized = normalizeAssistantResponse(assistantResponse);
    return normalized === undefined
        ? { toolCalls, results }
        : { toolCalls, results, assistantResponse: normalized };
}

export function summarizeBatch(results: readonly ToolResult[]): BatchResult {
    const successes = results.filter(isSuccess);
    const failures = results.filter((result) => !isSuccess(result));
    const totalDurationMs = results.reduce((max, result) => Math.max(max, result.durationMs), 0);

    return {
        results,
        successes,
        failures,
        allSucceeded: failures.length === 0,
        totalDurationMs,
        summary: `${successes.length}/${results.length} succeeded, ${failures.length} failed in ${(totalDurationMs / 1000).toFixed(2)}s`,
    };
}
