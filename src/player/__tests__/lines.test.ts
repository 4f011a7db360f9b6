/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * lines.test.ts: Tests for line splitting and the line queue.
 */
import { LineQueue, LineSplitter, splitLines, utf8Boundary } from "../lines.js";

const text = (lines: Buffer[]): string[] => lines.map((line) => line.toString("utf-8"));

describe("splitLines", () => {

  it("splits on newlines and carriage returns, dropping empty lines", () => {

    expect(text(splitLines("Name: Lush\r\nGenre: Ambient\n\nA: 0.1\rA: 0.2\rlast"))).toEqual([ "Name: Lush", "Genre: Ambient", "A: 0.1", "A: 0.2", "last" ]);
  });

  it("keeps bytes undecoded", () => {

    const [line] = splitLines(Buffer.from([ 0x41, 0xff, 0x0a ]));

    expect(line).toEqual(Buffer.from([ 0x41, 0xff ]));
  });
});

describe("LineSplitter", () => {

  it("joins lines split across chunks", () => {

    const lines: Buffer[] = [];
    const splitter = new LineSplitter((line) => lines.push(line));

    splitter.push(Buffer.from("ICY Info: Stream"));
    splitter.push(Buffer.from("Title='A - One';\nBit"));

    expect(text(lines)).toEqual(["ICY Info: StreamTitle='A - One';"]);

    splitter.push(Buffer.from("rate: 128kbit/s"));
    splitter.end();

    expect(text(lines)).toEqual([ "ICY Info: StreamTitle='A - One';", "Bitrate: 128kbit/s" ]);
  });

  it("caps unterminated lines", () => {

    const lines: Buffer[] = [];
    const splitter = new LineSplitter((line) => lines.push(line));

    splitter.push(Buffer.alloc(65536 + 10, 0x61));
    splitter.end();

    expect(lines.map((line) => line.length)).toEqual([ 65536, 10 ]);
  });

  it("caps unterminated lines on a character boundary", () => {

    const lines: Buffer[] = [];
    const splitter = new LineSplitter((line) => lines.push(line));

    splitter.push(Buffer.concat([ Buffer.alloc(65535, 0x61), Buffer.from("\u00e9bc") ]));
    splitter.end();

    expect(lines.map((line) => line.length)).toEqual([ 65535, 4 ]);
    expect(lines[1]?.toString("utf-8")).toBe("\u00e9bc");
  });
});

describe("utf8Boundary", () => {

  it("steps back over continuation bytes", () => {

    const data = Buffer.concat([ Buffer.from("ab"), Buffer.from("\u{1F600}"), Buffer.from("z") ]);

    expect(utf8Boundary(data, 2)).toBe(2);
    expect(utf8Boundary(data, 3)).toBe(2);
    expect(utf8Boundary(data, 5)).toBe(2);
    expect(utf8Boundary(data, 6)).toBe(6);
  });

  it("keeps the position for bytes that are not UTF-8", () => {

    expect(utf8Boundary(Buffer.from([ 0x80, 0x80, 0x80, 0x80, 0x80 ]), 4)).toBe(4);
  });
});

describe("LineQueue", () => {

  it("delivers buffered lines before ending", async () => {

    const queue = new LineQueue();
    const received: string[] = [];

    queue.push(Buffer.from("one"));
    queue.push(Buffer.from("two"));
    queue.end();

    expect(queue.ended).toBe(true);
    expect(queue.pending).toBe(2);

    for await (const line of queue) {

      received.push(line.toString());
    }

    expect(received).toEqual([ "one", "two" ]);
  });

  it("resolves a waiting reader on push and on end", async () => {

    const queue = new LineQueue();
    const iterator = queue[Symbol.asyncIterator]();
    const first = iterator.next();

    queue.push(Buffer.from("late"));

    expect(await first).toEqual({ done: false, value: Buffer.from("late") });

    const second = iterator.next();

    queue.end();

    expect(await second).toEqual({ done: true, value: undefined });
  });

  it("discards buffered lines when the reader returns early", async () => {

    const queue = new LineQueue();

    queue.push(Buffer.from("one"));
    queue.push(Buffer.from("two"));

    for await (const line of queue) {

      expect(line.toString()).toBe("one");

      break;
    }

    queue.push(Buffer.from("ignored"));

    expect(queue.ended).toBe(true);
    expect(queue.pending).toBe(0);
  });
});
