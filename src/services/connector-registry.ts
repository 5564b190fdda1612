import type { Connector, ConnectorSnapshot } from '../types/connector.js';
import type { ConnectorTool } from '../types/tools.js';
import { logThought } from '../utils/logger.js';

/**
 * Catalog of connectors available to the executor and the tool loop.
 *
 * Constructed once by the host and passed to the collaborators that need it.
 *
 * Usage:
 * ```ts
 * const registry = new ConnectorRegistry();
 * registry.register(new ShellConnector());
 * const executor = new ToolExecutor(registry);
 * const tools = registry.availableTools();
 * ```
 */
export class ConnectorRegistry {
    readonly #connectors: Map<string, Connector> = new Map();

    /** Register a connector. Replaces any connector with the same id. */
    register(connector: Connector): void {
        this.#connectors.set(connector.id, connector);
        void logThought(`[ConnectorRegistry] Registered connector '${connector.id}' (${connector.name}).`);
    }

    /** Remove a connector by id. Returns true if it was registered. */
    unregister(connectorId: string): boolean {
        return this.#connectors.delete(connectorId);
    }

    get(connectorId: string): Connector | undefined {
        return this.#connectors.get(connectorId);
    }

    has(connectorId: string): boolean {
        return this.#connectors.has(connectorId);
    }

    list(): Connector[] {
        return [...this.#connectors.values()];
    }

    get size(): number {
        return this.#connectors.size;
    }

    /** Tools of every connected connector, in registration order. */
    availableTools(): ConnectorTool[] {
        return this.list()
            .filter((connector) => connector.state === 'connected')
            .flatMap((connector) => connector.tools);
    }

    /** Resolve a disambiguated tool name among the available tools. */
    findTool(name: string): ConnectorTool | undefined {
        return this.availableTools().find((tool) => tool.name === name);
    }

    snapshots(): ConnectorSnapshot[] {
        return this.list().map((connector) => ({
            id: connector.id,
            name: connector.name,
            state: connector.state,
            toolCount: connector.tools.length,
            lastError: connector.lastError,
        }));
    }
}
