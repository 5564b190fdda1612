import * as fs from 'node:fs/promises';
import { existsSync } from 'node:fs';
import * as path from 'node:path';
import {
    CONNECTOR_CONFIG_VERSION,
    ConnectorConfigFileSchema,
    emptyConnectorConfig,
    validateServerConfig,
    type BuiltInConnectorConfig,
    type ConnectorConfigFile,
    type CustomServerConfig,
} from '../config/connector-config.js';
import { connectorConfigPath, defaultRuntimeConfig } from '../config/runtime-config.js';
import { ConnectorConfigError } from '../types/errors.js';
import { logThought } from '../utils/logger.js';

const BACKUP_SUFFIX = '.backup';

/** Upgrade an older document to the current version. Version 1 is the first format. */
function migrate(config: ConnectorConfigFile): ConnectorConfigFile {
    if (config.version >= CONNECTOR_CONFIG_VERSION) return config;
    return { ...config, version: CONNECTOR_CONFIG_VERSION };
}

/**
 * Reads and writes `connectors.json`.
 *
 * Every mutation is load → change → save, so the file on disk is the only
 * state and concurrent stores on the same path see each other's writes.
 */
export class ConnectorConfigStore {
    readonly #filePath: string;
    readonly #now: () => Date;

    constructor(filePath?: string, options: { now?: () => Date } = {}) {
        this.#filePath = path.resolve(filePath ?? connectorConfigPath(defaultRuntimeConfig()));
        this.#now = options.now ?? (() => new Date());
    }

    get filePath(): string {
        return this.#filePath;
    }

    get backupPath(): string {
        return `${this.#filePath}${BACKUP_SUFFIX}`;
    }

    exists(): boolean {
        return existsSync(this.#filePath);
    }

    async load(): Promise<ConnectorConfigFile> {
        let raw: string;
        try {
            raw = await fs.readFile(this.#filePath, 'utf-8');
        } catch (error) {
            const fsError = error as NodeJS.ErrnoException;
            if (fsError.code === 'ENOENT') return emptyConnectorConfig();
            throw new Error(`Failed to read connector config at ${this.#filePath}: ${fsError.message}`);
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new Error(`Failed to parse connector config at ${this.#filePath}: ${message}`);
        }

        const parsed = ConnectorConfigFileSchema.safeParse(json);
        if (!parsed.success) {
            const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
            throw new ConnectorConfigError(`Invalid connector config at ${this.#filePath}`, issues);
        }
        return migrate(parsed.data);
    }

    async save(config: ConnectorConfigFile): Promise<void> {
        await fs.mkdir(path.dirname(this.#filePath), { recursive: true });
        const tempPath = `${this.#filePath}.${Date.now()}.tmp`;
        try {
            await fs.writeFile(tempPath, JSON.stringify(config, null, 2), { encoding: 'utf-8', mode: 0o600 });
            await fs.rename(tempPath, this.#filePath);
        } catch (error) {
            const fsError = error as NodeJS.ErrnoException;
            await fs.rm(tempPath, { force: true });
            throw new Error(`Failed to save connector config to ${this.#filePath}: ${fsError.message}`);
        }
    }

    // ── Custom servers ───────────────────────────────────────────────────────

    /** Validate and persist a server. An entry with the same id is replaced. */
    async addCustomServer(server: CustomServerConfig): Promise<void> {
        this.#assertValid(server);
        const config = await this.load();
        config.custom = [...config.custom.filter((entry) => entry.id !== server.id), server];
        await this.save(config);
        void logThought(`[ConnectorConfigStore] Added custom server '${server.name}' (${server.id}).`);
    }

    /** Replace an existing server and bump its `modifiedAt`. Returns false for an unknown id. */
    async updateCustomServer(server: CustomServerConfig): Promise<boolean> {
        this.#assertValid(server);
        const config = await this.load();
        const index = config.custom.findIndex((entry) => entry.id === server.id);
        if (index === -1) return false;

        config.custom[index] = { ...server, modifiedAt: this.#now().toISOString() };
        await this.save(config);
        return true;
    }

    async removeCustomServer(id: string): Promise<boolean> {
        const config = await this.load();
        const remaining = config.custom.filter((entry) => entry.id !== id);
        if (remaining.length === config.custom.length) return false;

        config.custom = remaining;
        await this.save(config);
        void logThought(`[ConnectorConfigStore] Removed custom server '${id}'.`);
        return true;
    }

    async setCustomServerEnabled(id: string, enabled: boolean): Promise<boolean> {
        const server = await this.customServer(id);
        if (!server) return false;
        return this.updateCustomServer({ ...server, enabled });
    }

    async customServer(id: string): Promise<CustomServerConfig | undefined> {
        return (await this.load()).custom.find((entry) => entry.id === id);
    }

    async customServers(): Promise<CustomServerConfig[]> {
        return (await this.load()).custom;
    }

    async enabledCustomServers(): Promise<CustomServerConfig[]> {
        return (await this.customServers()).filter((entry) => entry.enabled);
    }

    // ── Built-in connectors ──────────────────────────────────────────────────

    async builtInConfig(id: string): Promise<BuiltInConnectorConfig | undefined> {
        return (await this.load()).builtIn[id];
    }

    async setBuiltInConfig(id: string, builtIn: BuiltInConnectorConfig): Promise<void> {
        const config = await this.load();
        config.builtIn = { ...config.builtIn, [id]: builtIn };
        await this.save(config);
    }

    /** Built-ins without an entry are enabled. */
    async isBuiltInEnabled(id: string): Promise<boolean> {
        return (await this.builtInConfig(id))?.enabled ?? true;
    }

    async setBuiltInEnabled(id: string, enabled: boolean): Promise<void> {
        const current = await this.builtInConfig(id);
        await this.setBuiltInConfig(id, { ...current, enabled });
    }

    // ── Backup ───────────────────────────────────────────────────────────────

    /** Copy the current file to the `.backup` sibling. Returns false when there is nothing to copy. */
    async backup(): Promise<boolean> {
        if (!this.exists()) return false;
        await fs.copyFile(this.#filePath, this.backupPath);
        return true;
    }

    /** Restore from the `.backup` sibling after checking that it parses. */
    async restoreFromBackup(): Promise<boolean> {
        if (!existsSync(this.backupPath)) return false;

        const parsed = ConnectorConfigFileSchema.safeParse(JSON.parse(await fs.readFile(this.backupPath, 'utf-8')));
        if (!parsed.success) {
            throw new ConnectorConfigError(
                `Backup at ${this.backupPath} is not a valid connector config`,
                parsed.error.issues.map((issue) => issue.message),
            );
        }
        await this.save(migrate(parsed.data));
        void logThought(`[ConnectorConfigStore] Restored connector config from ${this.backupPath}.`);
        return true;
    }

    #assertValid(server: CustomServerConfig): void {
        const issues = validateServerConfig(server);
        if (issues.length > 0) {
            throw new ConnectorConfigError(`Invalid server '${server.name}'`, issues);
        }
    }
}
