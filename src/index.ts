export * from './types/json.js';
export * from './types/json-schema.js';
export * from './types/tools.js';
export * from './types/providers.js';
export * from './types/connector.js';
export * from './types/errors.js';
export * from './types/shell.js';

export * from './core/tool-model.js';
export * from './core/json-schema.js';
export * from './core/tool-schema-converter.js';
export * from './core/provider-request.js';
export * from './core/tool-executor.js';
export * from './core/tool-loop.js';

export * from './transport/line-framer.js';
export * from './transport/stdio-transport.js';

export * from './services/command-risk.js';
export * from './services/approval-memory.js';
export * from './services/tool-approval-service.js';
export * from './services/connector-registry.js';
export * from './services/connector-config-store.js';
export * from './services/mcp-connector.js';
export * from './services/connector-manager.js';
export * from './skills/shell.js';

export * from './config/connector-config.js';
export * from './config/built-in-connectors.js';
export * from './config/runtime-config.js';

export { logThought, logToolCall, logSystemCommand, scrubSensitiveText } from './utils/logger.js';
