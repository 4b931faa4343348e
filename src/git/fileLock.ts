import fs from "fs/promises";
import { randomUUID } from "crypto";
import { z } from "zod";
import { LockTimeoutError, isErrnoException } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { sleep } from "../util/retry.js";

export const LOCK_FILE_NAME = "git-file-bridge.lock";

const DEFAULT_STALE_MS = 5 * 60 * 1000;
const DEFAULT_POLL_MS = 50;
/** A lock file with unreadable content younger than this may still be mid-write. */
const CORRUPT_GRACE_MS = 2000;

const lockInfoSchema = z.object({
  pid: z.number(),
  lockId: z.string(),
  timestamp: z.number(),
});

type LockInfo = z.infer<typeof lockInfoSchema>;

export interface LockGuard {
  readonly lockId: string;
  readonly acquiredAt: number;
  release(): Promise<void>;
}

export type FileLockOptions = {
  /** A lock file whose mtime is older than this is considered abandoned. */
  staleMs?: number;
  pollIntervalMs?: number;
  /** How often a holder touches the lock file; defaults to a third of staleMs. */
  heartbeatMs?: number;
  logger?: Logger;
};

function parseLockInfo(content: string): LockInfo | null {
  try {
    const parsed = lockInfoSchema.safeParse(JSON.parse(content));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function processAlive(pid: number) {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    return isErrnoException(e) && e.code === "EPERM";
  }
}

async function waitFor(promise: Promise<void>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), Math.max(0, ms));
  });
  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Exclusive lock backed by a file created with O_EXCL, so separate processes
 * exclude each other. Callers within one instance queue up in FIFO order
 * before contending for the file. A holder touches the file every
 * `heartbeatMs`; only a file left untouched for `staleMs`, or one whose
 * owning pid is gone, is ever broken.
 */
export class FileLock {
  private queue: Promise<void> = Promise.resolve();
  private readonly staleMs: number;
  private readonly pollIntervalMs: number;
  private readonly heartbeatMs: number;
  private readonly log: Logger;

  constructor(
    public readonly lockPath: string,
    options: FileLockOptions = {},
  ) {
    this.staleMs = options.staleMs ?? DEFAULT_STALE_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_MS;
    this.heartbeatMs = options.heartbeatMs ?? Math.max(10, Math.floor(this.staleMs / 3));
    this.log = options.logger ?? defaultLogger;
  }

  async acquire(timeoutMs: number): Promise<LockGuard> {
    const deadline = Date.now() + timeoutMs;

    let finishTurn: () => void = () => {};
    const turn = new Promise<void>((resolve) => {
      finishTurn = resolve;
    });
    const previous = this.queue;
    this.queue = previous.then(() => turn);

    try {
      if (!(await waitFor(previous, deadline - Date.now()))) {
        throw new LockTimeoutError(this.lockPath, timeoutMs);
      }
      const lockId = randomUUID();
      await this.acquireFile(lockId, deadline, timeoutMs);
      const acquiredAt = Date.now();
      this.log.debug("lock acquired", { lockPath: this.lockPath, lockId: lockId.slice(0, 8) });

      const heartbeat = this.startHeartbeat(lockId);
      let released = false;
      return {
        lockId,
        acquiredAt,
        release: async () => {
          if (released) return;
          released = true;
          clearInterval(heartbeat);
          try {
            await this.releaseFile(lockId);
          } finally {
            finishTurn();
            this.log.debug("lock released", { lockPath: this.lockPath, lockId: lockId.slice(0, 8) });
          }
        },
      };
    } catch (e) {
      finishTurn();
      throw e;
    }
  }

  /** Holds the lock for the duration of `fn`, releasing it on every exit path. */
  async withLock<T>(timeoutMs: number, fn: (guard: LockGuard) => Promise<T>): Promise<T> {
    const guard = await this.acquire(timeoutMs);
    try {
      return await fn(guard);
    } finally {
      await guard.release();
    }
  }

  private async acquireFile(lockId: string, deadline: number, timeoutMs: number) {
    for (;;) {
      if (await this.tryCreate(lockId)) return;
      if (await this.breakIfStale()) continue;

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new LockTimeoutError(this.lockPath, timeoutMs);
      }
      const jitter = Math.floor(Math.random() * this.pollIntervalMs);
      await sleep(Math.min(this.pollIntervalMs + jitter, remaining));
    }
  }

  private async tryCreate(lockId: string): Promise<boolean> {
    const info: LockInfo = { pid: process.pid, lockId, timestamp: Date.now() };
    try {
      await fs.writeFile(this.lockPath, JSON.stringify(info), { flag: "wx" });
    } catch (e) {
      if (isErrnoException(e) && e.code === "EEXIST") return false;
      throw e;
    }
    // Another holder may have broken a stale lock and recreated it between our
    // writes; only the id read back counts.
    try {
      const current = parseLockInfo(await fs.readFile(this.lockPath, "utf8"));
      return current?.lockId === lockId;
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") return false;
      throw e;
    }
  }

  private startHeartbeat(lockId: string) {
    const timer = setInterval(() => {
      const now = new Date();
      void fs.utimes(this.lockPath, now, now).catch((e: unknown) => {
        this.log.warn("lock heartbeat failed", { lockPath: this.lockPath, lockId: lockId.slice(0, 8), error: e });
      });
    }, this.heartbeatMs);
    timer.unref();
    return timer;
  }

  private async breakIfStale(): Promise<boolean> {
    let content: string;
    let mtimeMs: number;
    try {
      content = await fs.readFile(this.lockPath, "utf8");
      mtimeMs = (await fs.stat(this.lockPath)).mtimeMs;
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") return true;
      throw e;
    }

    const age = Date.now() - mtimeMs;
    const info = parseLockInfo(content);
    let reason: string;
    if (!info) {
      if (age < CORRUPT_GRACE_MS) return false;
      reason = "corrupted lock file";
    } else if (age > this.staleMs) {
      reason = `stale lock (no heartbeat for ${Math.round(age / 1000)}s, pid ${info.pid})`;
    } else if (info.pid !== process.pid && !processAlive(info.pid)) {
      reason = `orphan lock (pid ${info.pid} no longer exists)`;
    } else {
      return false;
    }
    return this.claimAndRemove(content, reason);
  }

  /**
   * Moves the lock file aside before deleting it, so only the exact file that
   * was judged abandoned is removed. A file that changed hands in between is
   * linked back into place.
   */
  private async claimAndRemove(inspected: string, reason: string): Promise<boolean> {
    const claimed = `${this.lockPath}.${randomUUID()}.broken`;
    try {
      await fs.rename(this.lockPath, claimed);
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") return true;
      throw e;
    }

    const current = await fs.readFile(claimed, "utf8");
    if (current === inspected) {
      this.log.warn(`breaking ${reason}`, { lockPath: this.lockPath });
      await fs.unlink(claimed);
      return true;
    }

    try {
      await fs.link(claimed, this.lockPath);
    } catch (e) {
      if (!isErrnoException(e) || e.code !== "EEXIST") throw e;
      this.log.error("lock file replaced while restoring a live lock", { lockPath: this.lockPath });
    }
    await fs.unlink(claimed);
    return false;
  }

  private async releaseFile(lockId: string) {
    try {
      const current = parseLockInfo(await fs.readFile(this.lockPath, "utf8"));
      if (current?.lockId !== lockId) {
        this.log.warn("lock file no longer ours at release", { lockPath: this.lockPath });
        return;
      }
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") return;
      throw e;
    }
    await this.unlinkQuietly();
  }

  private async unlinkQuietly() {
    try {
      await fs.unlink(this.lockPath);
    } catch (e) {
      if (!isErrnoException(e) || e.code !== "ENOENT") throw e;
    }
  }
}
