import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { validateServerConfig, type CustomServerConfig } from '../config/connector-config.js';
import { createConnectorTool, failureResult, jsonContent, successResult, toolError } from '../core/tool-model.js';
import { parseJsonSchema } from '../core/json-schema.js';
import { StdioJsonRpcTransport } from '../transport/stdio-transport.js';
import {
    ConnectorError,
    DEFAULT_CONNECTION_TIMEOUT_MS,
    type Connector,
    type ConnectorSnapshot,
    type ConnectorState,
} from '../types/connector.js';
import { isJsonObject } from '../types/json.js';
import type { ConnectorTool, ToolCall, ToolContent, ToolImage, ToolResult } from '../types/tools.js';
import { logThought } from '../utils/logger.js';

const CLIENT_VERSION = '0.1.0';

export interface McpConnectorOptions {
    /** Bound on connect + tool discovery. @default 5000 */
    connectionTimeoutMs?: number;
    /** Passed to the SDK as the per-request timeout for `callTool`. */
    requestTimeoutMs?: number;
    /** HTTP headers that must be set, and not blank, before connecting. */
    requiredHeaders?: readonly string[];
}

/** Map an MCP `tools/call` result onto tool content. Exported for tests. */
export function mapCallToolResult(raw: unknown): { isError: boolean; content: ToolContent } {
    // Pre-2024-11 servers answer with `{ toolResult }`.
    if (typeof raw === 'object' && raw !== null && 'toolResult' in raw && !('content' in raw)) {
        return { isError: false, content: jsonContent(raw.toolResult ?? null) };
    }

    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
        return { isError: false, content: jsonContent(raw ?? null) };
    }

    const texts: string[] = [];
    let image: ToolImage | undefined;

    for (const block of parsed.data.content) {
        switch (block.type) {
            case 'text':
                texts.push(block.text);
                break;
            case 'image':
                image ??= { data: Buffer.from(block.data, 'base64'), mimeType: block.mimeType };
                break;
            case 'resource':
                if ('text' in block.resource && typeof block.resource.text === 'string') {
                    texts.push(block.resource.text);
                }
                break;
            default:
                break;
        }
    }

    const structured: unknown = parsed.data.structuredContent;
    const content: ToolContent = {
        ...(texts.length > 0 ? { text: texts.join('\n') } : {}),
        ...(isJsonObject(structured) ? jsonContent(structured) : {}),
        ...(image ? { image } : {}),
    };
    return { isError: parsed.data.isError === true, content };
}

/**
 * A user-configured MCP server, reached over stdio or streamable HTTP.
 *
 * - Validates the server definition before touching the network.
 * - Discovers tools on connect and exposes them as `ConnectorTool`s.
 * - Executes calls through the SDK client, forwarding the abort signal.
 */
export class McpConnector implements Connector {
    readonly #config: CustomServerConfig;
    readonly #connectionTimeoutMs: number;
    readonly #requestTimeoutMs: number | undefined;
    readonly #requiredHeaders: readonly string[];
    #client: Client | null = null;
    #state: ConnectorState = 'disconnected';
    #lastError: string | null = null;
    #tools: ConnectorTool[] = [];

    constructor(config: CustomServerConfig, options: McpConnectorOptions = {}) {
        this.#config = config;
        this.#connectionTimeoutMs = Math.max(1, options.connectionTimeoutMs ?? DEFAULT_CONNECTION_TIMEOUT_MS);
        this.#requestTimeoutMs = options.requestTimeoutMs;
        this.#requiredHeaders = options.requiredHeaders ?? [];
    }

    get id(): string {
        return this.#config.id;
    }

    get name(): string {
        return this.#config.name;
    }

    get config(): CustomServerConfig {
        return this.#config;
    }

    get state(): ConnectorState {
        return this.#state;
    }

    get lastError(): string | null {
        return this.#lastError;
    }

    get tools(): readonly ConnectorTool[] {
        return this.#tools;
    }

    snapshot(): ConnectorSnapshot {
        return {
            id: this.id,
            name: this.name,
            state: this.#state,
            toolCount: this.#tools.length,
            lastError: this.#lastError,
        };
    }

    /** Connect and discover tools. Leaves the connector in `error` and throws on failure. */
    async connect(): Promise<void> {
        if (this.#state === 'connected' || this.#state === 'connecting') return;

        const issues = validateServerConfig(this.#config);
        if (issues.length > 0) {
            this.#fail(issues.join(' '));
            throw new ConnectorError('invalid_configuration', `Invalid configuration for '${this.name}': ${issues.join(' ')}`);
        }

        const missing = this.#missingHeaders();
        if (missing.length > 0) {
            this.#fail('Authentication required');
            throw new ConnectorError(
                'authentication_required',
                `Authentication required for '${this.name}': missing ${missing.join(', ')} header.`,
            );
        }

        this.#state = 'connecting';
        this.#lastError = null;
        await logThought(`[McpConnector] Connecting to '${this.name}' (${this.#describeTransport()}).`);

        const client = new Client({ name: `tool-relay-${this.id}`, version: CLIENT_VERSION });
        this.#client = client;

        let timer: NodeJS.Timeout | undefined;
        try {
            const timeout = new Promise<never>((_, reject) => {
                timer = setTimeout(
                    () => reject(new ConnectorError('timeout', `Connection to '${this.name}' timed out after ${this.#connectionTimeoutMs}ms`)),
                    this.#connectionTimeoutMs,
                );
            });
            const tools = await Promise.race([this.#handshake(client), timeout]);

            client.onclose = () => this.#handleClose(client);
            client.onerror = (error) => {
                void logThought(`[McpConnector] Transport error on '${this.name}': ${error.message}`);
            };

            this.#tools = tools;
            this.#state = 'connected';
            await logThought(`[McpConnector] Connected to '${this.name}': ${tools.length} tool(s) available.`);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            this.#client = null;
            this.#fail(message);
            await client.close().catch((closeError: unknown) => {
                const detail = closeError instanceof Error ? closeError.message : String(closeError);
                console.warn(`[McpConnector] Cleanup after failed connect to '${this.name}' failed:`, detail);
            });
            console.error(`[McpConnector] Failed to connect to '${this.name}':`, message);
            throw err instanceof ConnectorError
                ? err
                : new ConnectorError('connection_failed', `Failed to connect to '${this.name}': ${message}`, { cause: err });
        } finally {
            clearTimeout(timer);
        }
    }

    async disconnect(): Promise<void> {
        const client = this.#client;
        this.#client = null;
        this.#tools = [];
        this.#state = 'disconnected';

        if (client) {
            try {
                await client.close();
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                console.warn(`[McpConnector] Error while closing '${this.name}':`, message);
            }
        }
        await logThought(`[McpConnector] Disconnected from '${this.name}'.`);
    }

    async executeTool(call: ToolCall, signal: AbortSignal): Promise<ToolResult> {
        const client = this.#client;
        if (!client || this.#state !== 'connected') {
            throw new ConnectorError('not_connected', `Connector '${this.name}' is not connected`);
        }

        const startedAt = Date.now();
        let raw: unknown;
        try {
            raw = await client.callTool(
                { name: call.originalToolName, arguments: call.arguments },
                undefined,
                { signal, timeout: this.#requestTimeoutMs },
            );
        } catch (err) {
            if (signal.aborted) {
                throw new ConnectorError('cancelled', 'Execution cancelled', { cause: err });
            }
            const message = err instanceof Error ? err.message : String(err);
            throw new ConnectorError('execution_failed', message, { cause: err });
        }

        const durationMs = Date.now() - startedAt;
        const { isError, content } = mapCallToolResult(raw);
        if (isError) {
            return failureResult(call, toolError(content.text || 'Tool execution failed', { code: 'tool_error' }), durationMs);
        }
        return successResult(call, content, durationMs);
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #handshake(client: Client): Promise<ConnectorTool[]> {
        await client.connect(this.#createTransport());
        const response = await client.listTools();
        return response.tools.map((tool) =>
            createConnectorTool({
                originalName: tool.name,
                description: tool.description,
                inputSchema: parseJsonSchema(tool.inputSchema),
                connectorId: this.id,
                connectorName: this.name,
            }),
        );
    }

    #createTransport(): Transport {
        const { transport } = this.#config;
        if ('stdio' in transport) {
            return new StdioJsonRpcTransport({
                command: transport.stdio.command,
                args: transport.stdio.args,
                env: transport.stdio.env,
                label: this.name,
            });
        }
        return new StreamableHTTPClientTransport(new URL(transport.http.url), {
            requestInit: { headers: transport.http.headers },
        });
    }

    #missingHeaders(): string[] {
        const { transport } = this.#config;
        if (!('http' in transport)) return [];
        const { headers } = transport.http;
        return this.#requiredHeaders.filter((header) => (headers[header] ?? '').trim().length === 0);
    }

    #describeTransport(): string {
        const { transport } = this.#config;
        return 'stdio' in transport
            ? [transport.stdio.command, ...transport.stdio.args].join(' ')
            : transport.http.url;
    }

    /** Server went away without a disconnect() call. */
    #handleClose(client: Client): void {
        if (this.#client !== client) return;
        this.#client = null;
        this.#tools = [];
        this.#fail('Connection closed by server');
        void logThought(`[McpConnector] '${this.name}' closed the connection.`);
    }

    #fail(message: string): void {
        this.#state = 'error';
        this.#lastError = message;
    }
}
