const NEWLINE = 0x0a;
const SPACE = 0x20;
const TAB = 0x09;
const CARRIAGE_RETURN = 0x0d;
const OPEN_BRACE = 0x7b;
const OPEN_BRACKET = 0x5b;

/**
 * True when the line looks like a JSON-RPC frame: its first byte after
 * spaces, tabs and carriage returns is `{` or `[`. A UTF-8 BOM is not
 * whitespace, so BOM-prefixed lines are rejected.
 */
export function isProtocolLine(line: Uint8Array): boolean {
    for (const byte of line) {
        if (byte === SPACE || byte === TAB || byte === CARRIAGE_RETURN) continue;
        return byte === OPEN_BRACE || byte === OPEN_BRACKET;
    }
    return false;
}

/**
 * Incremental newline framer for a child process's stdout.
 *
 * Chunks are appended to an internal buffer; every complete line is either
 * emitted (protocol data) or dropped (log noise). Bytes after the last newline
 * stay buffered until more data arrives.
 */
export class JsonLineFramer {
    #buffer: Buffer = Buffer.alloc(0);
    #dropped = 0;

    /** Append a chunk and return the protocol lines it completed, in order. */
    push(chunk: Uint8Array): string[] {
        this.#buffer = this.#buffer.length === 0
            ? Buffer.from(chunk)
            : Buffer.concat([this.#buffer, chunk]);

        const lines: string[] = [];
        let newlineIndex = this.#buffer.indexOf(NEWLINE);
        while (newlineIndex !== -1) {
            const line = this.#buffer.subarray(0, newlineIndex);
            if (isProtocolLine(line)) {
                lines.push(line.toString('utf8'));
            } else {
                this.#dropped += 1;
            }
            this.#buffer = this.#buffer.subarray(newlineIndex + 1);
            newlineIndex = this.#buffer.indexOf(NEWLINE);
        }
        return lines;
    }

    /** Bytes waiting for a newline. */
    get pendingBytes(): number {
        return this.#buffer.length;
    }

    /** Number of non-protocol lines dropped so far. */
    get droppedLines(): number {
        return this.#dropped;
    }

    /** Throw away any partial line; returns how many bytes were discarded. */
    discard(): number {
        const discarded = this.#buffer.length;
        this.#buffer = Buffer.alloc(0);
        return discarded;
    }
}
