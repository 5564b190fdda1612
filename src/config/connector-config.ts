import { randomUUID } from 'node:crypto';
import { z } from 'zod';

export const CONNECTOR_CONFIG_VERSION = 1;
export const MAX_SERVER_NAME_LENGTH = 100;

export const StdioTransportSchema = z.object({
    command: z.string(),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).default({}),
});

export const HttpTransportSchema = z.object({
    url: z.string(),
    headers: z.record(z.string()).default({}),
});

/** Persisted as a single-key object: `{ "stdio": {...} }` or `{ "http": {...} }`. */
export const TransportConfigSchema = z.union([
    z.object({ stdio: StdioTransportSchema }).strict(),
    z.object({ http: HttpTransportSchema }).strict(),
]);

export const CustomServerTypeSchema = z.enum(['stdio', 'http']);

export const CustomServerConfigSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    type: CustomServerTypeSchema,
    enabled: z.boolean().default(true),
    transport: TransportConfigSchema,
    createdAt: z.string(),
    modifiedAt: z.string(),
});

export const BuiltInConnectorConfigSchema = z.object({
    enabled: z.boolean(),
    settings: z.record(z.string()).optional(),
});

export const ConnectorConfigFileSchema = z.object({
    version: z.number().int().nonnegative().default(CONNECTOR_CONFIG_VERSION),
    builtIn: z.record(BuiltInConnectorConfigSchema).default({}),
    custom: z.array(CustomServerConfigSchema).default([]),
});

export type StdioTransportConfig = z.infer<typeof StdioTransportSchema>;
export type HttpTransportConfig = z.infer<typeof HttpTransportSchema>;
export type TransportConfig = z.infer<typeof TransportConfigSchema>;
export type CustomServerType = z.infer<typeof CustomServerTypeSchema>;
export type CustomServerConfig = z.infer<typeof CustomServerConfigSchema>;
export type BuiltInConnectorConfig = z.infer<typeof BuiltInConnectorConfigSchema>;
export type ConnectorConfigFile = z.infer<typeof ConnectorConfigFileSchema>;

export function emptyConnectorConfig(): ConnectorConfigFile {
    return { version: CONNECTOR_CONFIG_VERSION, builtIn: {}, custom: [] };
}

export function transportType(transport: TransportConfig): CustomServerType {
    return 'stdio' in transport ? 'stdio' : 'http';
}

/** Human-readable problems with a server definition; empty when valid. */
export function validateServerConfig(config: CustomServerConfig): string[] {
    const issues: string[] = [];
    const name = config.name.trim();

    if (name.length === 0) {
        issues.push('Server name is required.');
    } else if (name.length > MAX_SERVER_NAME_LENGTH) {
        issues.push(`Server name must be at most ${MAX_SERVER_NAME_LENGTH} characters.`);
    }

    if (transportType(config.transport) !== config.type) {
        issues.push(`Transport does not match server type '${config.type}'.`);
    }

    if ('stdio' in config.transport) {
        if (config.transport.stdio.command.trim().length === 0) {
            issues.push('Command is required for stdio servers.');
        }
    } else {
        issues.push(...validateHttpUrl(config.transport.http.url));
    }

    return issues;
}

export function validateHttpUrl(raw: string): string[] {
    let url: URL;
    try {
        url = new URL(raw.trim());
    } catch {
        return [`URL '${raw}' is not valid.`];
    }

    const issues: string[] = [];
    if (url.protocol !== 'https:') {
        issues.push('HTTP servers must use HTTPS.');
    }
    if (url.hostname.length === 0) {
        issues.push('URL must include a host.');
    }
    return issues;
}

export interface StdioServerInit {
    name: string;
    command: string;
    args?: string[];
    env?: Record<string, string>;
    enabled?: boolean;
}

export interface HttpServerInit {
    name: string;
    url: string;
    headers?: Record<string, string>;
    enabled?: boolean;
}

export function createStdioServerConfig(init: StdioServerInit, now: Date = new Date()): CustomServerConfig {
    const timestamp = now.toISOString();
    return {
        id: randomUUID(),
        name: init.name,
        type: 'stdio',
        enabled: init.enabled ?? true,
        transport: { stdio: { command: init.command, args: init.args ?? [], env: init.env ?? {} } },
        createdAt: timestamp,
        modifiedAt: timestamp,
    };
}

export function createHttpServerConfig(init: HttpServerInit, now: Date = new Date()): CustomServerConfig {
    const timestamp = now.toISOString();
    return {
        id: randomUUID(),
        name: init.name,
        type: 'http',
        enabled: init.enabled ?? true,
        transport: { http: { url: init.url, headers: init.headers ?? {} } },
        createdAt: timestamp,
        modifiedAt: timestamp,
    };
}
