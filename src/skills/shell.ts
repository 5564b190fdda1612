import { execFile } from 'node:child_process';
import { existsSync } from 'node:fs';
import { ConnectorError, type Connector, type ConnectorState } from '../types/connector.js';
import { SHELL_CONNECTOR_ID, SHELL_CONNECTOR_NAME, SHELL_TOOL_NAME } from '../types/shell.js';
import type { ConnectorTool, ToolCall, ToolResult } from '../types/tools.js';
import { createConnectorTool, failureResult, successResult, textContent, toolError } from '../core/tool-model.js';
import { shouldSandbox, validateCommand } from '../services/command-risk.js';
import { logSystemCommand, logThought, scrubSensitiveText } from '../utils/logger.js';

const MAX_TIMEOUT_MS = 120_000;
const MAX_OUTPUT_LENGTH = 8_000;
const SANDBOX_EXEC = '/usr/bin/sandbox-exec';
const READ_ONLY_PROFILE = '(version 1)(allow default)(deny file-write*)(allow file-write* (literal "/dev/null"))';

export interface ShellRunRequest {
  command: string;
  cwd?: string;
  /** Ask the runner to confine the command to read-only access. */
  sandbox: boolean;
  timeoutMs: number;
  signal: AbortSignal;
}

export interface ShellRunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  /** Whether the command actually ran confined. */
  sandboxed: boolean;
}

export interface ShellRunner {
  run(request: ShellRunRequest): Promise<ShellRunResult>;
}

function truncateOutput(output: string): string {
  if (output.length <= MAX_OUTPUT_LENGTH) {
    return output;
  }

  return `${output.slice(0, MAX_OUTPUT_LENGTH)}\n...[truncated]`;
}

/**
 * Runs commands through `/bin/sh -c`. Sandboxing uses `sandbox-exec` with a
 * read-only profile where it exists (macOS); elsewhere the command runs
 * unconfined and reports `sandboxed: false`.
 */
export class ProcessShellRunner implements ShellRunner {
  run(request: ShellRunRequest): Promise<ShellRunResult> {
    const sandboxed = request.sandbox && process.platform === 'darwin' && existsSync(SANDBOX_EXEC);
    const [file, args]: [string, string[]] = sandboxed
      ? [SANDBOX_EXEC, ['-p', READ_ONLY_PROFILE, '/bin/sh', '-c', request.command]]
      : ['/bin/sh', ['-c', request.command]];

    return new Promise((resolve, reject) => {
      execFile(
        file,
        args,
        {
          cwd: request.cwd,
          timeout: request.timeoutMs,
          signal: request.signal,
          encoding: 'utf8',
          maxBuffer: 1024 * 1024,
          windowsHide: true,
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ stdout: String(stdout), stderr: String(stderr), exitCode: 0, sandboxed });
            return;
          }
          if (request.signal.aborted) {
            reject(new ConnectorError('cancelled', 'Command cancelled', { cause: error }));
            return;
          }
          if (typeof error.code !== 'number' && !error.killed) {
            // Spawn failure (missing cwd, missing shell): no exit code to report.
            reject(new ConnectorError('execution_failed', error.message, { cause: error }));
            return;
          }
          resolve({
            stdout: String(stdout),
            stderr: String(stderr) || error.message,
            exitCode: typeof error.code === 'number' ? error.code : 124,
            sandboxed,
          });
        },
      );
    });
  }
}

export interface ShellConnectorOptions {
  runner?: ShellRunner;
  /** Upper bound for a single command. @default 120000 */
  timeoutMs?: number;
  /** Millisecond clock used for the reported duration. */
  now?: () => number;
}

/**
 * Built-in connector exposing one tool, `execute`, that runs a shell command.
 *
 * Commands are validated and classified first. Privileged commands are
 * refused and never reach the runner; safe and read commands ask the runner
 * for a sandbox.
 */
export class ShellConnector implements Connector {
  readonly id = SHELL_CONNECTOR_ID;
  readonly name = SHELL_CONNECTOR_NAME;

  readonly #runner: ShellRunner;
  readonly #timeoutMs: number;
  readonly #now: () => number;
  #state: ConnectorState = 'disconnected';
  #tools: ConnectorTool[] = [];

  constructor(options: ShellConnectorOptions = {}) {
    this.#runner = options.runner ?? new ProcessShellRunner();
    this.#timeoutMs = Math.min(MAX_TIMEOUT_MS, Math.max(1, options.timeoutMs ?? MAX_TIMEOUT_MS));
    this.#now = options.now ?? Date.now;
  }

  get state(): ConnectorState {
    return this.#state;
  }

  get lastError(): string | null {
    return null;
  }

  get tools(): readonly ConnectorTool[] {
    return this.#tools;
  }

  async connect(): Promise<void> {
    this.#tools = [
      createConnectorTool({
        originalName: SHELL_TOOL_NAME,
        description:
          'Execute a shell command. Safe and read-only commands run sandboxed where supported. '
          + 'Useful for system information (df, uptime, uname) and file inspection (ls, cat). '
          + 'Privileged commands (sudo) are blocked.',
        inputSchema: {
          type: 'object',
          properties: {
            command: {
              type: 'string',
              description: "The shell command to execute (e.g., 'df -h', 'ls -la', 'uptime')",
            },
            working_directory: {
              type: 'string',
              description: 'Directory to run the command in',
            },
          },
          required: ['command'],
        },
        connectorId: this.id,
        connectorName: this.name,
      }),
    ];
    this.#state = 'connected';
    await logThought(`[ShellConnector] Connected with ${this.#tools.length} tool(s).`);
  }

  async disconnect(): Promise<void> {
    this.#tools = [];
    this.#state = 'disconnected';
    await logThought('[ShellConnector] Disconnected.');
  }

  async executeTool(call: ToolCall, signal: AbortSignal): Promise<ToolResult> {
    if (this.#state !== 'connected') {
      throw new ConnectorError('not_connected', `Connector '${this.name}' is not connected`);
    }

    const startedAt = this.#now();
    const elapsed = (): number => this.#now() - startedAt;

    if (call.originalToolName !== SHELL_TOOL_NAME) {
      return failureResult(call, toolError(`Unknown tool: ${call.originalToolName}`, { code: 'tool_not_found' }), 0);
    }

    const { command, working_directory: cwd } = call.arguments;
    if (typeof command !== 'string') {
      return failureResult(call, toolError("Missing or invalid 'command' argument", { code: 'invalid_arguments' }), 0);
    }
    if (cwd !== undefined && typeof cwd !== 'string') {
      return failureResult(call, toolError("Invalid 'working_directory' argument", { code: 'invalid_arguments' }), 0);
    }

    const validation = validateCommand(command);
    if (!validation.isValid) {
      const message = validation.issues.join(' ');
      await logSystemCommand(command, `Blocked: ${message}`, 126);
      return failureResult(call, toolError(message, { code: 'command_blocked' }), elapsed());
    }

    const result = await this.#runner.run({
      command: command.trim(),
      cwd,
      sandbox: shouldSandbox(validation.riskLevel),
      timeoutMs: this.#timeoutMs,
      signal,
    });
    const durationMs = elapsed();

    const combined = truncateOutput(scrubSensitiveText(`${result.stdout}${result.stderr}`.trim()));
    const output = combined || '(no output)';
    const metadata = [
      `Exit code: ${result.exitCode}`,
      `Duration: ${(durationMs / 1000).toFixed(2)}s`,
      `Sandboxed: ${result.sandboxed ? 'yes' : 'no'}`,
    ].join(' | ');
    const text = `${output}\n\n---\n${metadata}`;

    await logSystemCommand(command.trim(), output, result.exitCode);

    if (result.exitCode !== 0) {
      return failureResult(call, toolError(text, { code: 'non_zero_exit' }), durationMs);
    }
    return successResult(call, textContent(text), durationMs);
  }
}
