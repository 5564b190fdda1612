import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

import { createConnectorTool, successResult, textContent } from '../../src/core/tool-model.js';
import { ConnectorRegistry } from '../../src/services/connector-registry.js';
import type { Connector, ConnectorState } from '../../src/types/connector.js';
import type { ConnectorTool, ToolCall, ToolResult } from '../../src/types/tools.js';

function buildConnector(id: string, name: string, toolNames: string[], state: ConnectorState = 'connected'): Connector {
  const tools: ConnectorTool[] = toolNames.map((originalName) =>
    createConnectorTool({ originalName, connectorId: id, connectorName: name }),
  );
  return {
    id,
    name,
    state,
    lastError: state === 'error' ? 'boom' : null,
    tools,
    connect: vi.fn().mockResolvedValue(undefined),
    disconnect: vi.fn().mockResolvedValue(undefined),
    executeTool: async (call: ToolCall): Promise<ToolResult> => successResult(call, textContent('ok'), 0),
  };
}

describe('ConnectorRegistry', () => {
  let registry: ConnectorRegistry;

  beforeEach(() => {
    registry = new ConnectorRegistry();
  });

  it('registers, looks up and unregisters connectors', () => {
    registry.register(buildConnector('files', 'Files', ['read']));

    expect(registry.has('files')).toBe(true);
    expect(registry.get('files')?.name).toBe('Files');
    expect(registry.size).toBe(1);

    expect(registry.unregister('files')).toBe(true);
    expect(registry.unregister('files')).toBe(false);
    expect(registry.get('files')).toBeUndefined();
  });

  it('replaces a connector registered under the same id', () => {
    registry.register(buildConnector('files', 'Files', ['read']));
    registry.register(buildConnector('files', 'Files v2', ['read', 'write']));

    expect(registry.size).toBe(1);
    expect(registry.get('files')?.name).toBe('Files v2');
  });

  it('advertises tools of connected connectors only, in registration order', () => {
    registry.register(buildConnector('files', 'Files', ['read', 'write']));
    registry.register(buildConnector('web', 'Web', ['fetch'], 'error'));
    registry.register(buildConnector('notes', 'My Notes', ['search']));

    expect(registry.availableTools().map((tool) => tool.name)).toEqual([
      'files_read',
      'files_write',
      'my_notes_search',
    ]);
    expect(registry.findTool('my_notes_search')?.connectorId).toBe('notes');
    expect(registry.findTool('web_fetch')).toBeUndefined();
  });

  it('reports a snapshot per connector', () => {
    registry.register(buildConnector('web', 'Web', ['fetch'], 'error'));

    expect(registry.snapshots()).toEqual([
      { id: 'web', name: 'Web', state: 'error', toolCount: 1, lastError: 'boom' },
    ]);
  });
});
