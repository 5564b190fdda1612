import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONNECTION_TIMEOUT_MS, DEFAULT_TOOL_TIMEOUT_MS } from '../types/connector.js';
import { DEFAULT_MAX_TOOL_ROUNDS } from '../core/tool-loop.js';
import { DEFAULT_APPROVAL_TIMEOUT_MS } from '../services/tool-approval-service.js';

export const RUNTIME_CONFIG_FILE = 'tool-relay.json';
export const CONNECTOR_CONFIG_FILE = 'connectors.json';

const RuntimeConfigSchema = z.object({
    toolTimeoutMs: z.number().int().positive(),
    maxToolRounds: z.number().int().positive(),
    approvalTimeoutMs: z.number().int().positive(),
    connectionTimeoutMs: z.number().int().positive(),
    configDir: z.string().min(1),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

const ENV_OVERRIDES: ReadonlyArray<{ key: string; field: 'toolTimeoutMs' | 'maxToolRounds' | 'approvalTimeoutMs' }> = [
    { key: 'TOOL_RELAY_TOOL_TIMEOUT_MS', field: 'toolTimeoutMs' },
    { key: 'TOOL_RELAY_MAX_TOOL_ROUNDS', field: 'maxToolRounds' },
    { key: 'TOOL_RELAY_APPROVAL_TIMEOUT_MS', field: 'approvalTimeoutMs' },
];

export function defaultConfigDir(): string {
    return path.join(os.homedir(), '.config', 'tool-relay');
}

export function defaultRuntimeConfig(): RuntimeConfig {
    return {
        toolTimeoutMs: DEFAULT_TOOL_TIMEOUT_MS,
        maxToolRounds: DEFAULT_MAX_TOOL_ROUNDS,
        approvalTimeoutMs: DEFAULT_APPROVAL_TIMEOUT_MS,
        connectionTimeoutMs: DEFAULT_CONNECTION_TIMEOUT_MS,
        configDir: defaultConfigDir(),
    };
}

export function getRuntimeConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.TOOL_RELAY_CONFIG_PATH) {
        return path.resolve(process.env.TOOL_RELAY_CONFIG_PATH);
    }
    return path.join(defaultConfigDir(), RUNTIME_CONFIG_FILE);
}

export function connectorConfigPath(config: RuntimeConfig): string {
    return path.join(config.configDir, CONNECTOR_CONFIG_FILE);
}

function applyEnvOverrides(config: RuntimeConfig): RuntimeConfig {
    const merged = { ...config };
    for (const { key, field } of ENV_OVERRIDES) {
        const raw = process.env[key]?.trim();
        if (!raw) continue;
        const value = Number(raw);
        if (!Number.isInteger(value) || value <= 0) {
            throw new Error(`Environment variable ${key} must be a positive integer, got '${raw}'.`);
        }
        merged[field] = value;
    }
    return merged;
}

/**
 * Load runtime settings: defaults, then `tool-relay.json` (if present), then
 * environment overrides. A missing file is not an error.
 */
export async function readRuntimeConfig(overridePath?: string): Promise<RuntimeConfig> {
    const targetPath = getRuntimeConfigPath(overridePath);
    let fromFile: unknown = {};

    try {
        fromFile = JSON.parse(await fs.readFile(targetPath, 'utf-8'));
    } catch (error) {
        const fsError = error as NodeJS.ErrnoException;
        if (fsError.code !== 'ENOENT') {
            throw new Error(`Failed to parse config file at ${targetPath}: ${fsError.message}`);
        }
    }

    const partial = RuntimeConfigSchema.partial().safeParse(fromFile);
    if (!partial.success) {
        const detail = partial.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new Error(`Invalid config file at ${targetPath}: ${detail}`);
    }

    const defaults = defaultRuntimeConfig();
    const fileValues = partial.data;
    const merged = applyEnvOverrides({
        toolTimeoutMs: fileValues.toolTimeoutMs ?? defaults.toolTimeoutMs,
        maxToolRounds: fileValues.maxToolRounds ?? defaults.maxToolRounds,
        approvalTimeoutMs: fileValues.approvalTimeoutMs ?? defaults.approvalTimeoutMs,
        connectionTimeoutMs: fileValues.connectionTimeoutMs ?? defaults.connectionTimeoutMs,
        configDir: fileValues.configDir ?? defaults.configDir,
    });
    return RuntimeConfigSchema.parse({ ...merged, configDir: path.resolve(merged.configDir) });
}
