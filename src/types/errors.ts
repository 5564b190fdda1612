import type { ToolExecutionRound } from './tools.js';

/** Stdio transport failure: spawn, broken pipe, unexpected exit or frame decode. */
export class TransportError extends Error {
    readonly code: 'spawn_failed' | 'not_started' | 'already_started' | 'broken_pipe' | 'process_exited' | 'decode_failed';

    constructor(code: TransportError['code'], message: string, options: { cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'TransportError';
        this.code = code;
    }
}

/** A provider's tool invocation payload could not be decoded. */
export class ProviderPayloadError extends Error {
    constructor(message: string, options: { cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'ProviderPayloadError';
    }
}

/** A provider rejected a generation request. */
export class ProviderRequestError extends Error {
    readonly statusCode?: number;

    constructor(message: string, statusCode?: number) {
        super(message);
        this.name = 'ProviderRequestError';
        this.statusCode = statusCode;
    }
}

/** Connector configuration failed validation; nothing was persisted. */
export class ConnectorConfigError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'ConnectorConfigError';
        this.issues = issues;
    }
}

/** The tool loop ended in the `failed` state. */
export class ToolLoopError extends Error {
    readonly rounds: readonly ToolExecutionRound[];

    constructor(message: string, rounds: readonly ToolExecutionRound[], options: { cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'ToolLoopError';
        this.rounds = rounds;
    }
}
