import {
    BUILT_IN_SERVERS,
    builtInServerConfig,
    isBuiltInServerEnabled,
    requiredHeadersFor,
} from '../config/built-in-connectors.js';
import type { CustomServerConfig } from '../config/connector-config.js';
import { ShellConnector, type ShellConnectorOptions } from '../skills/shell.js';
import type { Connector, ConnectorSnapshot } from '../types/connector.js';
import { SHELL_CONNECTOR_ID } from '../types/shell.js';
import { logThought } from '../utils/logger.js';
import type { ConnectorConfigStore } from './connector-config-store.js';
import type { ConnectorRegistry } from './connector-registry.js';
import { McpConnector, type McpConnectorOptions } from './mcp-connector.js';

export interface ConnectorManagerOptions {
    mcp?: McpConnectorOptions;
    shell?: ShellConnectorOptions;
    /** Override how MCP servers, built-in or custom, become connectors. */
    createMcpConnector?: (config: CustomServerConfig, options: McpConnectorOptions) => Connector;
}

interface DesiredServer {
    config: CustomServerConfig;
    options: McpConnectorOptions;
}

/**
 * Keeps the {@link ConnectorRegistry} in sync with the persisted connector
 * configuration.
 *
 * Failed connections are isolated: one server's failure doesn't block the
 * others and never rejects `connectAll`.
 *
 * Usage:
 * ```ts
 * const manager = new ConnectorManager(registry, new ConnectorConfigStore());
 * await manager.load();
 * await manager.connectAll();
 *
 * // After the user edits a server:
 * await manager.reload();
 * ```
 */
export class ConnectorManager {
    readonly #registry: ConnectorRegistry;
    readonly #store: ConnectorConfigStore;
    readonly #options: ConnectorManagerOptions;
    readonly #managed: Map<string, Connector> = new Map();
    /** Config each MCP connector was built from, to detect edits on reload. */
    readonly #sources: Map<string, string> = new Map();

    constructor(registry: ConnectorRegistry, store: ConnectorConfigStore, options: ConnectorManagerOptions = {}) {
        this.#registry = registry;
        this.#store = store;
        this.#options = options;
    }

    /** Register the enabled built-ins and custom servers. Returns the ids now managed. */
    async load(): Promise<string[]> {
        if (await this.#store.isBuiltInEnabled(SHELL_CONNECTOR_ID)) {
            if (!this.#managed.has(SHELL_CONNECTOR_ID)) {
                this.#add(new ShellConnector(this.#options.shell));
            }
        }

        for (const [id, server] of await this.#desiredServers()) {
            if (this.#managed.has(id)) continue;
            this.#add(this.#createMcp(server));
            this.#sources.set(id, JSON.stringify(server.config));
        }

        const ids = [...this.#managed.keys()];
        await logThought(`[ConnectorManager] Loaded ${ids.length} connector(s) from ${this.#store.filePath}.`);
        return ids;
    }

    /** Connect every managed connector that is not already connected. */
    async connectAll(): Promise<void> {
        const pending = [...this.#managed.values()].filter((connector) => connector.state !== 'connected');
        await Promise.allSettled(
            pending.map((connector) =>
                connector.connect().catch((err: unknown) => {
                    const message = err instanceof Error ? err.message : String(err);
                    console.error(`[ConnectorManager] Failed to connect '${connector.id}':`, message);
                }),
            ),
        );

        const snapshots = this.snapshots();
        const connected = snapshots.filter((snapshot) => snapshot.state === 'connected').length;
        await logThought(`[ConnectorManager] Connection complete: ${connected}/${snapshots.length} connectors connected.`);
    }

    async connect(connectorId: string): Promise<void> {
        const connector = this.#managed.get(connectorId);
        if (!connector) {
            throw new Error(`[ConnectorManager] Connector '${connectorId}' is not configured.`);
        }
        await connector.connect();
    }

    async disconnect(connectorId: string): Promise<void> {
        await this.#managed.get(connectorId)?.disconnect();
    }

    async disconnectAll(): Promise<void> {
        await Promise.allSettled([...this.#managed.values()].map((connector) => connector.disconnect()));
        await logThought('[ConnectorManager] All connectors disconnected.');
    }

    /**
     * Re-read the configuration: connectors that were removed, disabled or
     * edited are disconnected and unregistered; new and edited ones are
     * registered and connected.
     */
    async reload(): Promise<void> {
        const wanted = await this.#desiredServers();
        const shellEnabled = await this.#store.isBuiltInEnabled(SHELL_CONNECTOR_ID);

        const stale = [...this.#managed.keys()].filter((id) => {
            if (id === SHELL_CONNECTOR_ID) return !shellEnabled;
            const server = wanted.get(id);
            return !server || this.#sources.get(id) !== JSON.stringify(server.config);
        });

        for (const id of stale) {
            await this.#remove(id);
        }

        await this.load();
        await this.connectAll();
    }

    snapshots(): ConnectorSnapshot[] {
        return [...this.#managed.values()].map((connector) => ({
            id: connector.id,
            name: connector.name,
            state: connector.state,
            toolCount: connector.tools.length,
            lastError: connector.lastError,
        }));
    }

    getConnector(connectorId: string): Connector | undefined {
        return this.#managed.get(connectorId);
    }

    /** Enabled hosted built-ins, then enabled custom servers, keyed by id. */
    async #desiredServers(): Promise<Map<string, DesiredServer>> {
        const desired = new Map<string, DesiredServer>();

        for (const definition of BUILT_IN_SERVERS) {
            const builtIn = await this.#store.builtInConfig(definition.id);
            if (!isBuiltInServerEnabled(definition, builtIn)) continue;
            desired.set(definition.id, {
                config: builtInServerConfig(definition, builtIn),
                options: { ...this.#options.mcp, requiredHeaders: requiredHeadersFor(definition) },
            });
        }

        for (const server of await this.#store.enabledCustomServers()) {
            if (desired.has(server.id) || server.id === SHELL_CONNECTOR_ID) {
                console.warn(`[ConnectorManager] Duplicate connector id '${server.id}', skipping.`);
                continue;
            }
            desired.set(server.id, { config: server, options: { ...this.#options.mcp } });
        }
        return desired;
    }

    #createMcp(server: DesiredServer): Connector {
        return this.#options.createMcpConnector?.(server.config, server.options)
            ?? new McpConnector(server.config, server.options);
    }

    #add(connector: Connector): void {
        this.#managed.set(connector.id, connector);
        this.#registry.register(connector);
    }

    async #remove(connectorId: string): Promise<void> {
        const connector = this.#managed.get(connectorId);
        if (!connector) return;

        try {
            await connector.disconnect();
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            console.warn(`[ConnectorManager] Error disconnecting '${connectorId}':`, message);
        }
        this.#managed.delete(connectorId);
        this.#sources.delete(connectorId);
        this.#registry.unregister(connectorId);
    }
}
