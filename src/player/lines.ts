/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * lines.ts: Byte line splitting and the async line queue fed by player output.
 */
import type { Nullable } from "../types/index.js";

/* Players write to stdout and stderr in arbitrary chunks, and mplayer and mpv redraw their status line with carriage returns rather than newlines. We therefore
 * split on either \n or \r, keep the bytes undecoded (the classifier decides how to decode each line), and drop the empty lines that a \r\n pair produces.
 *
 * Each pipe gets its own splitter, so a partial line on stdout never gets glued to a partial line on stderr. Both feed one LineQueue, which the session reads as
 * an AsyncIterable in arrival order.
 */

// Longest partial line kept in memory. A player that never writes a line terminator cannot grow the buffer past this; the excess is emitted as a line.
const MAX_PARTIAL_LINE = 65536;

/**
 * Moves a cut position back to the start of a UTF-8 character, so a capped line never ends in the middle of a multi-byte sequence.
 * @param data - The bytes being cut.
 * @param position - The preferred cut position.
 * @returns The position, moved back over at most three continuation bytes. Data that is not UTF-8 is cut at the preferred position.
 */
export function utf8Boundary(data: Buffer, position: number): number {

  let cut = position;

  // Continuation bytes look like 10xxxxxx.
  while((cut > 0) && ((position - cut) < 3) && (((data[cut] ?? 0) & 0xc0) === 0x80)) {

    cut--;
  }

  return ((cut === 0) || (((data[cut] ?? 0) & 0xc0) === 0x80)) ? position : cut;
}

/**
 * Splits a byte stream into lines. Feed it chunks with push() and call end() when the stream closes.
 */
export class LineSplitter {

  private partial: Buffer = Buffer.alloc(0);
  private readonly onLine: (line: Buffer) => void;

  constructor(onLine: (line: Buffer) => void) {

    this.onLine = onLine;
  }

  /**
   * Consumes a chunk, emitting every line it completes.
   * @param chunk - Bytes read from the stream.
   */
  public push(chunk: Buffer): void {

    let data = (this.partial.length > 0) ? Buffer.concat([ this.partial, chunk ]) : chunk;
    let start = 0;

    for(let index = 0; index < data.length; index++) {

      const byte = data[index];

      // 0x0a is \n, 0x0d is \r.
      if((byte === 0x0a) || (byte === 0x0d)) {

        this.emit(data.subarray(start, index));
        start = index + 1;
      }
    }

    data = data.subarray(start);

    while(data.length > MAX_PARTIAL_LINE) {

      const cut = utf8Boundary(data, MAX_PARTIAL_LINE);

      this.emit(data.subarray(0, cut));
      data = data.subarray(cut);
    }

    // Copy so the retained remainder does not pin the whole chunk in memory.
    this.partial = Buffer.from(data);
  }

  /**
   * Emits whatever is left as a final line.
   */
  public end(): void {

    this.emit(this.partial);
    this.partial = Buffer.alloc(0);
  }

  private emit(line: Buffer): void {

    if(line.length > 0) {

      this.onLine(line);
    }
  }
}

/**
 * Splits a complete block of bytes into lines. Convenience for tests and small inputs.
 * @param data - The bytes to split.
 * @returns The non-empty lines, without terminators.
 */
export function splitLines(data: Buffer | string): Buffer[] {

  const lines: Buffer[] = [];
  const splitter = new LineSplitter((line) => lines.push(line));

  splitter.push(Buffer.isBuffer(data) ? data : Buffer.from(data, "utf-8"));
  splitter.end();

  return lines;
}

/**
 * An unbounded single-consumer queue of lines that is also an AsyncIterable. Producers call push() and, once, end(). The consumer iterates; returning from the
 * iteration early (break, or the iterator's return()) closes the queue and discards anything still buffered.
 */
export class LineQueue implements AsyncIterable<Buffer> {

  private readonly buffered: Buffer[] = [];
  private closed = false;
  private waiter: Nullable<(result: IteratorResult<Buffer>) => void> = null;

  /**
   * Adds a line. Lines pushed after end() are ignored.
   * @param line - The line.
   */
  public push(line: Buffer): void {

    if(this.closed) {

      return;
    }

    if(this.waiter) {

      const resolve = this.waiter;

      this.waiter = null;
      resolve({ done: false, value: line });

      return;
    }

    this.buffered.push(line);
  }

  /**
   * Marks the end of input. Buffered lines are still delivered before the iteration finishes.
   */
  public end(): void {

    this.closed = true;

    if(this.waiter && (this.buffered.length === 0)) {

      const resolve = this.waiter;

      this.waiter = null;
      resolve({ done: true, value: undefined });
    }
  }

  /**
   * Whether end() has been called.
   */
  public get ended(): boolean {

    return this.closed;
  }

  /**
   * Number of lines waiting to be read.
   */
  public get pending(): number {

    return this.buffered.length;
  }

  public [Symbol.asyncIterator](): AsyncIterator<Buffer> {

    return {

      next: async (): Promise<IteratorResult<Buffer>> => {

        const line = this.buffered.shift();

        if(line) {

          return { done: false, value: line };
        }

        if(this.closed) {

          return { done: true, value: undefined };
        }

        return new Promise<IteratorResult<Buffer>>((resolve) => {

          this.waiter = resolve;
        });
      },

      return: async (): Promise<IteratorResult<Buffer>> => {

        this.buffered.length = 0;
        this.end();

        return { done: true, value: undefined };
      }
    };
  }
}
