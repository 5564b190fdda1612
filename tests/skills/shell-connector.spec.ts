import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
  logSystemCommand: vi.fn().mockResolvedValue(undefined),
  scrubSensitiveText: vi.fn((text: string) => text),
}));

import { createConnectorTool, createToolCall } from '../../src/core/tool-model.js';
import {
  ShellConnector,
  type ShellRunRequest,
  type ShellRunResult,
  type ShellRunner,
} from '../../src/skills/shell.js';
import { ConnectorError } from '../../src/types/connector.js';
import type { JsonObject } from '../../src/types/json.js';
import type { ToolCall } from '../../src/types/tools.js';
import { logSystemCommand } from '../../src/utils/logger.js';

class FakeRunner implements ShellRunner {
  readonly requests: ShellRunRequest[] = [];
  result: ShellRunResult = { stdout: '', stderr: '', exitCode: 0, sandboxed: false };

  async run(request: ShellRunRequest): Promise<ShellRunResult> {
    this.requests.push(request);
    return this.result;
  }
}

/** 1000ms, then 2500ms, then 4000ms... so every call measures 1.5s. */
function steppingClock(): () => number {
  let current = -500;
  return () => {
    current += 1500;
    return current;
  };
}

describe('ShellConnector', () => {
  let runner: FakeRunner;
  let connector: ShellConnector;
  let signal: AbortSignal;

  const execute = (args: JsonObject): Promise<unknown> => {
    const call: ToolCall = createToolCall(connector.tools[0], args, 'call-1');
    return connector.executeTool(call, signal);
  };

  beforeEach(async () => {
    vi.clearAllMocks();
    runner = new FakeRunner();
    connector = new ShellConnector({ runner, now: steppingClock() });
    signal = new AbortController().signal;
    await connector.connect();
  });

  it('exposes a single execute tool once connected', () => {
    expect(connector.state).toBe('connected');
    expect(connector.tools.map((tool) => tool.name)).toEqual(['system_commands_execute']);
    expect(connector.tools[0].inputSchema.required).toEqual(['command']);
  });

  it('refuses calls while disconnected', async () => {
    const tool = connector.tools[0];
    await connector.disconnect();

    expect(connector.tools).toEqual([]);
    await expect(connector.executeTool(createToolCall(tool, { command: 'ls' }, 'c1'), signal))
      .rejects.toBeInstanceOf(ConnectorError);
  });

  it('runs read commands sandboxed and reports metadata', async () => {
    runner.result = { stdout: 'a.txt\nb.txt\n', stderr: '', exitCode: 0, sandboxed: true };

    const result = await execute({ command: '  ls -la ', working_directory: '/tmp' });

    expect(runner.requests).toEqual([
      { command: 'ls -la', cwd: '/tmp', sandbox: true, timeoutMs: 120_000, signal },
    ]);
    expect(result).toMatchObject({
      callId: 'call-1',
      toolName: 'system_commands_execute',
      durationMs: 1500,
      outcome: {
        kind: 'success',
        content: { text: 'a.txt\nb.txt\n\n---\nExit code: 0 | Duration: 1.50s | Sandboxed: yes' },
      },
    });
    expect(logSystemCommand).toHaveBeenCalledWith('ls -la', 'a.txt\nb.txt', 0);
  });

  it('does not sandbox write commands', async () => {
    await execute({ command: 'mkdir out' });
    expect(runner.requests[0].sandbox).toBe(false);
  });

  it('blocks privileged commands before they reach the runner', async () => {
    const result = await execute({ command: 'sudo reboot' });

    expect(runner.requests).toEqual([]);
    expect(result).toMatchObject({
      outcome: {
        kind: 'error',
        error: { message: "'sudo' is a privileged command and is never executed.", code: 'command_blocked' },
      },
    });
    expect(logSystemCommand).toHaveBeenCalledWith(
      'sudo reboot',
      "Blocked: 'sudo' is a privileged command and is never executed.",
      126,
    );
  });

  it('reports a non-zero exit as a failure carrying the output', async () => {
    runner.result = { stdout: '', stderr: 'ls: missing: No such file or directory\n', exitCode: 1, sandboxed: false };

    const result = await execute({ command: 'ls missing' });

    expect(result).toMatchObject({
      outcome: {
        kind: 'error',
        error: {
          message: 'ls: missing: No such file or directory\n\n---\nExit code: 1 | Duration: 1.50s | Sandboxed: no',
          code: 'non_zero_exit',
        },
      },
    });
  });

  it('substitutes a placeholder for empty output', async () => {
    const result = await execute({ command: 'true' });

    expect(result).toMatchObject({
      outcome: { kind: 'success', content: { text: '(no output)\n\n---\nExit code: 0 | Duration: 1.50s | Sandboxed: no' } },
    });
  });

  it('truncates long output', async () => {
    runner.result = { stdout: 'x'.repeat(9_000), stderr: '', exitCode: 0, sandboxed: false };

    await execute({ command: 'cat big.log' });

    expect(logSystemCommand).toHaveBeenCalledWith('cat big.log', `${'x'.repeat(8_000)}\n...[truncated]`, 0);
  });

  it('rejects malformed arguments', async () => {
    expect(await execute({})).toMatchObject({
      outcome: { kind: 'error', error: { message: "Missing or invalid 'command' argument", code: 'invalid_arguments' } },
    });
    expect(await execute({ command: 'ls', working_directory: 5 })).toMatchObject({
      outcome: { kind: 'error', error: { message: "Invalid 'working_directory' argument", code: 'invalid_arguments' } },
    });
    expect(runner.requests).toEqual([]);
  });

  it('reports unknown tools', async () => {
    const other = createConnectorTool({ originalName: 'other', connectorId: 'shell', connectorName: 'System Commands' });

    const result = await connector.executeTool(createToolCall(other, {}, 'c1'), signal);

    expect(result.outcome).toEqual({
      kind: 'error',
      error: { message: 'Unknown tool: other', code: 'tool_not_found', isRetryable: false },
    });
  });

  it('caps the timeout handed to the runner', async () => {
    const capped = new ShellConnector({ runner, timeoutMs: 999_999 });
    const short = new ShellConnector({ runner, timeoutMs: 500 });
    await capped.connect();
    await short.connect();

    await capped.executeTool(createToolCall(capped.tools[0], { command: 'pwd' }, 'c1'), signal);
    await short.executeTool(createToolCall(short.tools[0], { command: 'pwd' }, 'c2'), signal);

    expect(runner.requests.map((request) => request.timeoutMs)).toEqual([120_000, 500]);
  });
});
