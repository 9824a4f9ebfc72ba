/**
 * Synchronous Line Reader
 *
 * Reads newline-terminated lines from a file descriptor, buffering what
 * follows the newline for the next call. The REPL and `input()` share one
 * reader over stdin, so neither loses lines the other has read ahead.
 */

import * as fs from 'node:fs';

const CHUNK_SIZE = 4096;

/** Wait between reads while non-blocking input has no data */
const POLL_INTERVAL_MS = 10;

function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

function sleep(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

export class LineReader {
  private pending: Buffer = Buffer.alloc(0);
  private ended = false;

  constructor(
    private readonly fd: number = 0,
    private readonly writePrompt: (prompt: string) => void = (prompt) => {
      process.stdout.write(prompt);
    }
  ) {}

  /**
   * Write the prompt, then return the next line without its newline.
   * Returns null at end of input.
   */
  readLine(prompt: string): string | null {
    if (prompt !== '') {
      this.writePrompt(prompt);
    }

    for (;;) {
      const newline = this.pending.indexOf(0x0a);
      if (newline !== -1) {
        const line = this.pending.subarray(0, newline).toString('utf-8');
        this.pending = this.pending.subarray(newline + 1);
        return line;
      }
      if (this.ended) {
        if (this.pending.length === 0) return null;
        const rest = this.pending.toString('utf-8');
        this.pending = Buffer.alloc(0);
        return rest;
      }
      this.fill();
    }
  }

  private fill(): void {
    const chunk = Buffer.alloc(CHUNK_SIZE);
    let read: number;
    try {
      read = fs.readSync(this.fd, chunk, 0, CHUNK_SIZE, null);
    } catch (err) {
      if (hasErrorCode(err, 'EAGAIN')) {
        sleep(POLL_INTERVAL_MS);
        return;
      }
      if (hasErrorCode(err, 'EOF')) {
        this.ended = true;
        return;
      }
      throw err;
    }

    if (read === 0) {
      this.ended = true;
      return;
    }
    this.pending = Buffer.concat([this.pending, chunk.subarray(0, read)]);
  }
}

let stdinReader: LineReader | undefined;

/** The process-wide reader over stdin */
export function getStdinReader(): LineReader {
  if (!stdinReader) {
    stdinReader = new LineReader();
  }
  return stdinReader;
}
