import type { ConnectorTool, ToolCall, ToolResult } from './tools.js';

/** Connection state for a connector. */
export type ConnectorState = 'disconnected' | 'connecting' | 'connected' | 'error';

export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;
export const DEFAULT_CONNECTION_TIMEOUT_MS = 5_000;

/** A registered backend exposing one or more tools. */
export interface Connector {
    readonly id: string;
    readonly name: string;
    readonly state: ConnectorState;
    readonly lastError: string | null;
    /** Tools discovered on the last successful connect. */
    readonly tools: readonly ConnectorTool[];
    connect(): Promise<void>;
    disconnect(): Promise<void>;
    /**
     * Run one call. Implementations must stop work when `signal` aborts.
     * Tool-level failures are returned as error outcomes; throwing is reserved
     * for connector-level faults.
     */
    executeTool(call: ToolCall, signal: AbortSignal): Promise<ToolResult>;
}

export interface ConnectorSnapshot {
    id: string;
    name: string;
    state: ConnectorState;
    toolCount: number;
    lastError: string | null;
}

export type ConnectorErrorKind =
    | 'not_connected'
    | 'connection_failed'
    | 'execution_failed'
    | 'timeout'
    | 'invalid_configuration'
    | 'authentication_required'
    | 'cancelled';

const RETRYABLE_KINDS: ReadonlySet<ConnectorErrorKind> = new Set(['not_connected', 'connection_failed', 'timeout']);

export class ConnectorError extends Error {
    readonly kind: ConnectorErrorKind;
    readonly isRetryable: boolean;

    constructor(kind: ConnectorErrorKind, message: string, options: { isRetryable?: boolean; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'ConnectorError';
        this.kind = kind;
        this.isRetryable = options.isRetryable ?? RETRYABLE_KINDS.has(kind);
    }
}
