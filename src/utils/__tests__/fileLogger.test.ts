/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.test.ts: Tests for the buffered log file.
 */
import { LOG, setConsoleLogging, setDebugLogging } from "../logger.js";
import { initializeFileLogger, shutdownFileLogger, writeLogEntry } from "../fileLogger.js";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const STAMP = "\\[\\d{4}/\\d{2}/\\d{2} \\d{2}:\\d{2}:\\d{2}\\.\\d{3}\\]";

describe("file logger", () => {

  let dir: string;
  let logPath: string;

  beforeEach(async () => {

    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "icytune-log-"));
    logPath = path.join(dir, "logs", "icytune.log");
    setConsoleLogging(false);
  });

  afterEach(async () => {

    shutdownFileLogger();
    setDebugLogging(false);
    await fs.promises.rm(dir, { force: true, recursive: true });
  });

  it("drops entries until it is initialized", async () => {

    writeLogEntry("info", "too early");

    await initializeFileLogger(logPath, 1048576);
    shutdownFileLogger();

    expect(await fs.promises.readFile(logPath, "utf-8")).toBe("");
  });

  it("writes timestamped entries with level tags on shutdown", async () => {

    await initializeFileLogger(logPath, 1048576);
    setDebugLogging(true);

    LOG.info("Playing %s.", "Lush");
    writeLogEntry("warn", "Disk is slow.");
    LOG.debug("session", "Header complete.");
    shutdownFileLogger();

    const lines = (await fs.promises.readFile(logPath, "utf-8")).split("\n");

    expect(lines).toHaveLength(4);
    expect(lines[0]).toMatch(new RegExp([ "^", STAMP, " Playing Lush\\.$" ].join("")));
    expect(lines[1]).toMatch(new RegExp([ "^", STAMP, " \\[WARN\\] Disk is slow\\.$" ].join("")));
    expect(lines[2]).toMatch(new RegExp([ "^", STAMP, " \\x1b\\[36m\\[DEBUG:session\\] Header complete\\.\\x1b\\[0m$" ].join("")));
    expect(lines[3]).toBe("");
  });

  it("leaves debug messages out when their category is off", async () => {

    await initializeFileLogger(logPath, 1048576);

    LOG.debug("session", "Hidden.");
    shutdownFileLogger();

    expect(await fs.promises.readFile(logPath, "utf-8")).toBe("");
  });
});
