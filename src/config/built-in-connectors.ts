import type { BuiltInConnectorConfig, CustomServerConfig } from './connector-config.js';

export const WEB_FETCH_CONNECTOR_ID = 'webfetch';
export const GITHUB_CONNECTOR_ID = 'github';

/** Built-in settings key holding the GitHub personal access token. */
export const GITHUB_TOKEN_SETTING = 'token';

export const AUTHORIZATION_HEADER = 'Authorization';

/** Fixed so an unchanged preset compares equal across reloads. */
const PRESET_TIMESTAMP = new Date(0).toISOString();

/** A hosted MCP server shipped with the relay, reached over streamable HTTP. */
export interface BuiltInServerDefinition {
    id: string;
    name: string;
    url: string;
    /** Used when the connector file has no entry for this id. */
    enabledByDefault: boolean;
    /** Settings key sent as `Authorization: Bearer <value>`. */
    tokenSetting?: string;
}

export const BUILT_IN_SERVERS: readonly BuiltInServerDefinition[] = [
    {
        id: WEB_FETCH_CONNECTOR_ID,
        name: 'Web Fetch',
        url: 'https://remote.mcpservers.org/fetch/mcp',
        enabledByDefault: false,
    },
    {
        id: GITHUB_CONNECTOR_ID,
        name: 'GitHub',
        url: 'https://api.githubcopilot.com/mcp/',
        enabledByDefault: false,
        tokenSetting: GITHUB_TOKEN_SETTING,
    },
];

export function isBuiltInServerEnabled(definition: BuiltInServerDefinition, builtIn: BuiltInConnectorConfig | undefined): boolean {
    return builtIn?.enabled ?? definition.enabledByDefault;
}

/**
 * The server definition a built-in connects with. A token missing from the
 * settings leaves the headers empty; the connector refuses to connect without it.
 */
export function builtInServerConfig(
    definition: BuiltInServerDefinition,
    builtIn: BuiltInConnectorConfig | undefined,
): CustomServerConfig {
    const headers: Record<string, string> = {};
    if (definition.tokenSetting !== undefined) {
        const token = builtIn?.settings?.[definition.tokenSetting]?.trim() ?? '';
        if (token.length > 0) {
            headers[AUTHORIZATION_HEADER] = `Bearer ${token}`;
        }
    }

    return {
        id: definition.id,
        name: definition.name,
        type: 'http',
        enabled: isBuiltInServerEnabled(definition, builtIn),
        transport: { http: { url: definition.url, headers } },
        createdAt: PRESET_TIMESTAMP,
        modifiedAt: PRESET_TIMESTAMP,
    };
}

/** Headers the connector must carry before it may connect. */
export function requiredHeadersFor(definition: BuiltInServerDefinition): string[] {
    return definition.tokenSetting !== undefined ? [AUTHORIZATION_HEADER] : [];
}
