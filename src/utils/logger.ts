import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const REDACTED = '[REDACTED]';
const SENSITIVE_ENV_NAME = /(KEY|TOKEN|SECRET|PASSWORD|PASSWD|CREDENTIAL)/i;
const MIN_SECRET_LENGTH = 8;
const MAX_LOGGED_OUTPUT = 2_000;

const KEY_VALUE_PATTERN =
    /\b([A-Za-z0-9_-]*(?:api[_-]?key|token|secret|password|passwd|authorization)[A-Za-z0-9_-]*)(\s*[=:]\s*)("?)([^\s"',;]+)\3/gi;
const JSON_PAIR_PATTERN =
    /("[A-Za-z0-9_-]*(?:api[_-]?key|token|secret|password|passwd|authorization)[A-Za-z0-9_-]*"\s*:\s*)"[^"]*"/gi;
const BEARER_PATTERN = /\b(Bearer)\s+[A-Za-z0-9._~+/=-]+/g;

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function sensitiveEnvValues(): string[] {
    const values: string[] = [];
    for (const [name, value] of Object.entries(process.env)) {
        if (!value || value.length < MIN_SECRET_LENGTH) continue;
        if (SENSITIVE_ENV_NAME.test(name)) {
            values.push(value);
        }
    }
    // Longest first so overlapping secrets are fully replaced.
    return values.sort((a, b) => b.length - a.length);
}

/**
 * Redact secrets from free-form text before it reaches a log sink.
 *
 * Covers values of secret-looking environment variables wherever they appear,
 * `key=value` / `"key": "value"` pairs with secret-looking keys, and bearer tokens.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;

    for (const secret of sensitiveEnvValues()) {
        scrubbed = scrubbed.replace(new RegExp(escapeRegExp(secret), 'g'), REDACTED);
    }

    return scrubbed
        .replace(JSON_PAIR_PATTERN, `$1"${REDACTED}"`)
        .replace(KEY_VALUE_PATTERN, (_match, key: string, separator: string) => `${key}${separator}${REDACTED}`)
        .replace(BEARER_PATTERN, `$1 ${REDACTED}`);
}

/** Directory for daily log files, or null when file logging is off. */
export function getLogDirectory(): string | null {
    const configured = process.env.TOOL_RELAY_LOG_DIR?.trim();
    return configured ? path.resolve(configured) : null;
}

function dailyLogPath(directory: string, now: Date): string {
    return path.join(directory, `${now.toISOString().slice(0, 10)}.md`);
}

function truncate(text: string): string {
    return text.length > MAX_LOGGED_OUTPUT ? `${text.slice(0, MAX_LOGGED_OUTPUT)}...[truncated]` : text;
}

async function writeEntry(entry: string): Promise<void> {
    const scrubbed = scrubSensitiveText(entry);

    if (process.env.TOOL_RELAY_DEBUG) {
        console.debug(scrubbed);
    }

    const directory = getLogDirectory();
    if (!directory) return;

    const now = new Date();
    try {
        await mkdir(directory, { recursive: true });
        await appendFile(dailyLogPath(directory, now), `- ${now.toISOString()} ${scrubbed}\n`, 'utf8');
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error('[Logger] Failed to write log entry:', message);
    }
}

/** Record an internal reasoning/lifecycle note. */
export async function logThought(message: string): Promise<void> {
    await writeEntry(`**thought** ${message}`);
}

/** Record a tool invocation with its arguments and (truncated) output. */
export async function logToolCall(
    toolName: string,
    args: unknown,
    output: string,
): Promise<void> {
    let renderedArgs: string;
    try {
        renderedArgs = JSON.stringify(args) ?? 'undefined';
    } catch {
        renderedArgs = String(args);
    }
    await writeEntry(`**tool** \`${toolName}\` args=${renderedArgs} output=${truncate(output)}`);
}

/** Record a shell command execution. */
export async function logSystemCommand(
    command: string,
    output: string,
    exitCode: number,
): Promise<void> {
    await writeEntry(`**command** \`${command}\` exit=${exitCode} output=${truncate(output)}`);
}
