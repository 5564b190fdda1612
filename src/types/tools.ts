import type { JsonObject } from './json.js';
import type { JsonSchema } from './json-schema.js';

/** A tool exposed by a connector, addressed by its disambiguated `name`. */
export interface ConnectorTool {
    /** `<connectorId>:<originalName>` */
    readonly id: string;
    /** Disambiguated name advertised to providers, e.g. `github_search`. */
    readonly name: string;
    readonly originalName: string;
    readonly description?: string;
    readonly inputSchema: JsonSchema;
    readonly connectorId: string;
    readonly connectorName: string;
}

/** A resolved request from a model to run one connector tool. */
export interface ToolCall {
    readonly id: string;
    readonly toolName: string;
    readonly connectorId: string;
    readonly originalToolName: string;
    readonly arguments: JsonObject;
    /** ISO timestamp. */
    readonly requestedAt: string;
}

export interface ToolImage {
    readonly data: Uint8Array;
    readonly mimeType: string;
}

export interface ToolContent {
    readonly text?: string;
    /** Raw UTF-8 JSON bytes. */
    readonly json?: Uint8Array;
    readonly image?: ToolImage;
}

export interface ToolError {
    readonly message: string;
    readonly code?: string;
    readonly isRetryable: boolean;
}

export type ToolOutcome =
    | { readonly kind: 'success'; readonly content: ToolContent }
    | { readonly kind: 'error'; readonly error: ToolError };

export interface ToolResult {
    readonly callId: string;
    readonly toolName: string;
    readonly outcome: ToolOutcome;
    readonly durationMs: number;
    /** ISO timestamp. */
    readonly completedAt: string;
}

/** One generation → tools → results cycle. */
export interface ToolExecutionRound {
    readonly toolCalls: readonly ToolCall[];
    readonly results: readonly ToolResult[];
    /** Text the model emitted before requesting tools. Never an empty string. */
    readonly assistantResponse?: string;
}

export interface BatchResult {
    readonly results: readonly ToolResult[];
    readonly successes: readonly ToolResult[];
    readonly failures: readonly ToolResult[];
    readonly allSucceeded: boolean;
    /** Longest individual duration. */
    readonly totalDurationMs: number;
    readonly summary: string;
}
