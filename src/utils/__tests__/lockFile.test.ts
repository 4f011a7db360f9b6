/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * lockFile.test.ts: Tests for the single-instance lock.
 */
import { acquireLock, isProcessAlive, releaseLock } from "../lockFile.js";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

// Far above any real PID, so no process has it.
const DEAD_PID = 2147483646;

describe("lock file", () => {

  let dir: string;
  let lockPath: string;

  beforeEach(async () => {

    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "icytune-lock-"));
    lockPath = path.join(dir, "run", "icytune.lock");
  });

  afterEach(async () => {

    await fs.promises.rm(dir, { force: true, recursive: true });
  });

  it("probes processes", () => {

    expect(isProcessAlive(process.pid)).toBe(true);
    expect(isProcessAlive(DEAD_PID)).toBe(false);
  });

  it("writes the PID and removes it on release", async () => {

    await acquireLock(lockPath);

    expect(await fs.promises.readFile(lockPath, "utf-8")).toBe(String(process.pid));

    await releaseLock(lockPath);

    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it("refuses a lock held by a live process", async () => {

    await acquireLock(lockPath, process.ppid);

    await expect(acquireLock(lockPath)).rejects.toThrow("icytune is already running (pid " + String(process.ppid) + ").");
  });

  it("replaces stale and unreadable locks", async () => {

    await acquireLock(lockPath, DEAD_PID);
    await acquireLock(lockPath);

    expect(await fs.promises.readFile(lockPath, "utf-8")).toBe(String(process.pid));

    await fs.promises.writeFile(lockPath, "garbage", "utf-8");
    await acquireLock(lockPath);

    expect(await fs.promises.readFile(lockPath, "utf-8")).toBe(String(process.pid));
  });

  it("leaves a lock held by another process on release", async () => {

    await acquireLock(lockPath, DEAD_PID);
    await releaseLock(lockPath);

    expect(await fs.promises.readFile(lockPath, "utf-8")).toBe(String(DEAD_PID));
  });
});
