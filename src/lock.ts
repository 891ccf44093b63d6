import { randomUUID } from "node:crypto";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import * as lockfile from "proper-lockfile";
import { LockReentrancyError, LockTimeoutError, describeError } from "./errors.js";
import type { NbLogger } from "./logger.js";
import type { LockHandle } from "./types.js";

export interface LockManagerOptions {
  lockPath: string;
  timeoutMs: number;
  pollIntervalMs: number;
  /** A lock whose heartbeat is older than this is taken over. */
  staleMs?: number;
  logger?: NbLogger;
}

interface LockRecord {
  pid: number;
  token: string;
  acquiredAt: number;
}

const DEFAULT_STALE_MS = 10_000;

/**
 * Host-wide mutex on a proper-lockfile lock directory. The holder refreshes
 * the directory's mtime while it runs, so the lock of a session that died goes
 * stale and is taken over; a live holder is never preempted. The owner record
 * beside the lock is informational only.
 */
export class LockManager {
  private readonly lockPath: string;
  private readonly ownerPath: string;
  private readonly staleMs: number;
  private readonly releases = new Map<string, () => Promise<void>>();
  private held: LockHandle | null = null;

  constructor(private readonly options: LockManagerOptions) {
    this.lockPath = resolve(options.lockPath);
    this.ownerPath = `${this.lockPath}.owner`;
    this.staleMs = options.staleMs ?? DEFAULT_STALE_MS;
  }

  async acquire(timeoutMs = this.options.timeoutMs, signal?: AbortSignal): Promise<LockHandle> {
    if (this.held && !this.held.released) {
      throw new LockReentrancyError(this.lockPath);
    }
    signal?.throwIfAborted();

    await mkdir(dirname(this.lockPath), { recursive: true });
    const startedAt = Date.now();

    while (true) {
      signal?.throwIfAborted();

      const handle = await this.tryLock(timeoutMs);
      if (handle) {
        this.held = handle;
        this.options.logger?.debug(`Acquired ${this.lockPath} after ${handle.acquiredAt - startedAt}ms`);
        return handle;
      }

      const holder = await this.readOwner();
      const elapsed = Date.now() - startedAt;
      if (elapsed >= timeoutMs) {
        throw new LockTimeoutError(this.lockPath, timeoutMs, holder?.pid);
      }

      const who = holder ? ` (pid ${holder.pid})` : "";
      this.options.logger?.info(`Another session${who} is running, waiting... (${Math.floor(elapsed / 1000)}s)`);
      await sleep(Math.min(this.options.pollIntervalMs, timeoutMs - elapsed), undefined, { signal });
    }
  }

  /**
   * Safe to call more than once, and after a failed acquire.
   */
  async release(handle: LockHandle | null | undefined): Promise<void> {
    if (!handle || handle.released) {
      return;
    }
    handle.released = true;
    if (this.held === handle) {
      this.held = null;
    }

    const unlock = this.releases.get(handle.token);
    this.releases.delete(handle.token);
    if (!unlock) {
      return;
    }

    const owner = await this.readOwner();
    if (owner?.token === handle.token) {
      await rm(this.ownerPath, { force: true });
    }
    try {
      await unlock();
      this.options.logger?.debug(`Released ${handle.lockPath}`);
    } catch (error) {
      this.options.logger?.warn(`Lock ${handle.lockPath} was already lost: ${describeError(error)}`);
    }
  }

  isHeld(): boolean {
    return this.held !== null && !this.held.released;
  }

  private async tryLock(timeoutMs: number): Promise<LockHandle | null> {
    const token = randomUUID();
    let unlock: () => Promise<void>;
    try {
      unlock = await lockfile.lock(this.lockPath, {
        lockfilePath: this.lockPath,
        realpath: false,
        stale: this.staleMs,
        retries: 0,
        onCompromised: (error) => {
          this.options.logger?.error(`Lock ${this.lockPath} was compromised: ${error.message}`);
        }
      });
    } catch (error) {
      if (isErrnoCode(error, "ELOCKED")) {
        return null;
      }
      throw error;
    }

    const handle: LockHandle = {
      lockPath: this.lockPath,
      token,
      pid: process.pid,
      acquiredAt: Date.now(),
      timeoutMs,
      released: false
    };
    this.releases.set(token, unlock);
    const record: LockRecord = { pid: handle.pid, token, acquiredAt: handle.acquiredAt };
    await writeFile(this.ownerPath, JSON.stringify(record), "utf8");
    return handle;
  }

  private async readOwner(): Promise<LockRecord | null> {
    const raw = await readFile(this.ownerPath, "utf8").catch(() => undefined);
    return raw === undefined ? null : parseLockRecord(raw);
  }
}

/**
 * Runs `operation` inside the host-wide critical section and releases on every
 * exit path.
 */
export async function withHostLock<T>(
  manager: LockManager,
  operation: (handle: LockHandle) => Promise<T>,
  options: { timeoutMs?: number; signal?: AbortSignal } = {}
): Promise<T> {
  const handle = await manager.acquire(options.timeoutMs, options.signal);
  try {
    return await operation(handle);
  } finally {
    await manager.release(handle);
  }
}

export function parseLockRecord(raw: string): LockRecord | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "pid" in parsed &&
      "token" in parsed &&
      "acquiredAt" in parsed &&
      typeof parsed.pid === "number" &&
      typeof parsed.token === "string" &&
      typeof parsed.acquiredAt === "number"
    ) {
      return { pid: parsed.pid, token: parsed.token, acquiredAt: parsed.acquiredAt };
    }
    return null;
  } catch {
    return null;
  }
}

function isErrnoCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}
