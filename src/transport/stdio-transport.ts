import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { JSONRPCMessageSchema, type JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import { TransportError } from '../types/errors.js';
import { logThought } from '../utils/logger.js';
import { JsonLineFramer } from './line-framer.js';

export interface StdioServerParameters {
    command: string;
    args?: string[];
    /** Merged over the parent environment. */
    env?: Record<string, string>;
    cwd?: string;
    /** Label used in log lines, defaults to the command. */
    label?: string;
}

/**
 * MCP client transport over a child process's stdio.
 *
 * Unlike a plain line reader, stdout is passed through {@link JsonLineFramer}
 * so banners and status text that servers print to stdout never reach the
 * JSON-RPC decoder. A line that looks like JSON but fails to decode is a
 * protocol error: `onerror` fires and the transport closes.
 */
export class StdioJsonRpcTransport implements Transport {
    readonly #params: StdioServerParameters;
    readonly #framer = new JsonLineFramer();
    #process: ChildProcessWithoutNullStreams | null = null;
    #started = false;
    #closed = false;

    onclose?: Transport['onclose'];
    onerror?: Transport['onerror'];
    onmessage?: Transport['onmessage'];

    constructor(params: StdioServerParameters) {
        this.#params = params;
    }

    get #label(): string {
        return this.#params.label ?? this.#params.command;
    }

    get pid(): number | undefined {
        return this.#process?.pid;
    }

    start(): Promise<void> {
        if (this.#started) {
            return Promise.reject(new TransportError('already_started', `Transport for '${this.#label}' already started.`));
        }
        this.#started = true;

        return new Promise<void>((resolve, reject) => {
            let spawned = false;
            let child: ChildProcessWithoutNullStreams;
            try {
                child = spawn(this.#params.command, this.#params.args ?? [], {
                    cwd: this.#params.cwd,
                    env: { ...process.env, ...this.#params.env },
                    windowsHide: true,
                });
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                reject(new TransportError('spawn_failed', `Failed to spawn '${this.#label}': ${message}`, { cause: err }));
                return;
            }

            this.#process = child;

            child.once('spawn', () => {
                spawned = true;
                resolve();
            });

            child.on('error', (err) => {
                if (!spawned) {
                    this.#process = null;
                    this.#closed = true;
                    reject(new TransportError('spawn_failed', `Failed to spawn '${this.#label}': ${err.message}`, { cause: err }));
                    return;
                }
                this.onerror?.(new TransportError('broken_pipe', `Server '${this.#label}' failed: ${err.message}`, { cause: err }));
            });

            child.on('exit', (code, signal) => this.#handleExit(code, signal));

            child.stdout.on('data', (chunk: Buffer) => this.#handleStdout(chunk));
            child.stderr.on('data', (chunk: Buffer) => this.#handleStderr(chunk));
            child.stdin.on('error', (err) => {
                this.onerror?.(new TransportError('broken_pipe', `Write to '${this.#label}' failed: ${err.message}`, { cause: err }));
            });
        });
    }

    send(message: JSONRPCMessage): Promise<void> {
        const child = this.#process;
        if (!child || this.#closed) {
            return Promise.reject(new TransportError('not_started', `Transport for '${this.#label}' is not running.`));
        }

        return new Promise<void>((resolve, reject) => {
            child.stdin.write(`${JSON.stringify(message)}\n`, (err) => {
                if (err) {
                    reject(new TransportError('broken_pipe', `Write to '${this.#label}' failed: ${err.message}`, { cause: err }));
                    return;
                }
                resolve();
            });
        });
    }

    async close(): Promise<void> {
        if (this.#closed) return;

        const child = this.#process;
        this.#process = null;
        this.#framer.discard();

        if (child) {
            child.stdin.end();
            child.kill();
        }
        this.#emitClose();
    }

    #handleStdout(chunk: Buffer): void {
        if (this.#closed) return;

        for (const line of this.#framer.push(chunk)) {
            let decoded: JSONRPCMessage[];
            try {
                decoded = this.#decode(line);
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                this.onerror?.(
                    new TransportError('decode_failed', `Invalid JSON-RPC frame from '${this.#label}': ${message}`, { cause: err }),
                );
                void this.close();
                return;
            }

            for (const message of decoded) {
                this.onmessage?.(message);
            }
        }
    }

    #decode(line: string): JSONRPCMessage[] {
        const parsed: unknown = JSON.parse(line);
        const frames = Array.isArray(parsed) ? parsed : [parsed];
        return frames.map((frame) => JSONRPCMessageSchema.parse(frame));
    }

    #handleStderr(chunk: Buffer): void {
        const text = chunk.toString('utf8').trim();
        if (text.length === 0) return;
        void logThought(`[StdioJsonRpcTransport] ${this.#label} stderr: ${text}`);
    }

    #handleExit(code: number | null, signal: NodeJS.Signals | null): void {
        const discarded = this.#framer.discard();
        if (this.#closed) return;

        this.#process = null;
        if (discarded > 0) {
            void logThought(`[StdioJsonRpcTransport] Discarded ${discarded} partial byte(s) from '${this.#label}' at exit.`);
        }

        const reason = signal ? `signal ${signal}` : `code ${code ?? 'unknown'}`;
        this.onerror?.(new TransportError('process_exited', `Server '${this.#label}' exited with ${reason}.`));
        this.#emitClose();
    }

    #emitClose(): void {
        if (this.#closed) return;
        this.#closed = true;
        this.onclose?.();
    }
}
