/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * lockFile.ts: Single-instance lock file for icytune.
 */
import { formatError, hasErrorCode } from "./errors.js";
import { LOG } from "./logger.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/* Two players fighting over the audio device and the track log is never what the user wants, so playback holds a lock file containing its PID. The file is
 * created exclusively; when it already exists we read the PID and probe it with signal 0. A lock whose process is gone, or whose content is not a PID, is stale
 * and replaced.
 */

/**
 * Checks whether a process with the given PID is alive.
 * @param pid - The process ID.
 * @returns True if the process exists (even when owned by another user).
 */
export function isProcessAlive(pid: number): boolean {

  try {

    process.kill(pid, 0);

    return true;
  } catch(error) {

    // EPERM means the process exists but belongs to someone else.
    return hasErrorCode(error, "EPERM");
  }
}

/**
 * Reads the PID stored in a lock file.
 * @param lockPath - Path to the lock file.
 * @returns The PID, or null when the file is missing or does not hold a positive integer.
 */
async function readLockPid(lockPath: string): Promise<number | null> {

  try {

    const content = (await fsPromises.readFile(lockPath, "utf-8")).trim();

    return /^\d+$/.test(content) && (Number(content) > 0) ? Number(content) : null;
  } catch(error) {

    if(!hasErrorCode(error, "ENOENT")) {

      LOG.debug("session", "Unable to read lock file %s: %s.", lockPath, formatError(error));
    }

    return null;
  }
}

/**
 * Acquires the single-instance lock.
 * @param lockPath - Path to the lock file.
 * @param pid - The PID to record. Defaults to the current process.
 * @throws If another live process holds the lock, or the file cannot be created.
 */
export async function acquireLock(lockPath: string, pid: number = process.pid): Promise<void> {

  await fsPromises.mkdir(path.dirname(lockPath), { recursive: true });

  // Two attempts: the second follows removal of a stale lock.
  for(let attempt = 0; attempt < 2; attempt++) {

    try {

      await fsPromises.writeFile(lockPath, String(pid), { encoding: "utf-8", flag: "wx" });

      return;
    } catch(error) {

      if(!hasErrorCode(error, "EEXIST")) {

        throw error;
      }
    }

    const holder = await readLockPid(lockPath);

    if((holder !== null) && (holder !== pid) && isProcessAlive(holder)) {

      throw new Error([ "icytune is already running (pid ", String(holder), ")." ].join(""));
    }

    LOG.debug("session", "Replacing stale lock file %s (pid %s).", lockPath, holder ?? "unknown");

    await fsPromises.rm(lockPath, { force: true });
  }

  throw new Error([ "Unable to acquire the lock file ", lockPath, "." ].join(""));
}

/**
 * Releases the lock if it is still held by the given PID. Never throws.
 * @param lockPath - Path to the lock file.
 * @param pid - The PID that acquired the lock. Defaults to the current process.
 */
export async function releaseLock(lockPath: string, pid: number = process.pid): Promise<void> {

  if((await readLockPid(lockPath)) !== pid) {

    return;
  }

  try {

    await fsPromises.rm(lockPath, { force: true });
  } catch(error) {

    LOG.warn("Unable to remove lock file %s: %s.", lockPath, formatError(error));
  }
}
