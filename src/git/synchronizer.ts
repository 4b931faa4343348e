import fs from "fs/promises";
import path from "path";
import type { UpstreamReference } from "../config.js";
import {
  GitCommandError,
  IntegrationError,
  LockTimeoutError,
  PublishError,
  errorMessage,
} from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { DEFAULT_GIT_TIMEOUT_MS, runGit, type GitRunner } from "./core.js";
import { withAskPass, type CredentialProvider } from "./credentials.js";
import { FileLock, LOCK_FILE_NAME, type LockGuard } from "./fileLock.js";

export type SyncState =
  | "idle"
  | "lock_acquiring"
  | "staging"
  | "committing"
  | "integrating"
  | "publishing";

export type PublishResult =
  | { status: "published"; commit: string; branch: string }
  | { status: "no_changes" };

export type SynchronizerOptions = {
  repoRoot: string;
  upstream: UpstreamReference;
  credentials?: CredentialProvider;
  git?: GitRunner;
  lock?: FileLock;
  lockTimeoutMs?: number;
  lockStaleMs?: number;
  commandTimeoutMs?: number;
  identity?: { name: string; email: string };
  logger?: Logger;
};

export function lockPathFor(repoRoot: string) {
  return path.join(repoRoot, ".git", LOCK_FILE_NAME);
}

/** Failures the outer publish retry should try again. */
export function isTransientSyncError(error: unknown): boolean {
  return (
    error instanceof LockTimeoutError ||
    error instanceof PublishError ||
    error instanceof GitCommandError
  );
}

export function sanitizeCommitMessage(message: string) {
  return message.replace(/\s+/g, " ").trim() || "git-file-bridge: update";
}

type PendingChanges = { dirty: boolean; unpublished: number };

/**
 * Publishes whatever the working copy holds: one commit per cycle, rebased onto
 * upstream when possible, then pushed. Cycles never overlap, within or across
 * processes, because each runs under the repository lock.
 */
export class RepositorySynchronizer {
  private currentState: SyncState = "idle";
  private identityConfigured = false;
  private readonly git: GitRunner;
  private readonly lock: FileLock;
  private readonly log: Logger;
  private readonly lockTimeoutMs: number;
  private readonly commandTimeoutMs: number;

  constructor(private readonly options: SynchronizerOptions) {
    this.git = options.git ?? runGit;
    this.log = options.logger ?? defaultLogger;
    this.lock =
      options.lock ??
      new FileLock(lockPathFor(options.repoRoot), {
        staleMs: options.lockStaleMs,
        logger: this.log,
      });
    this.lockTimeoutMs = options.lockTimeoutMs ?? 30000;
    this.commandTimeoutMs = options.commandTimeoutMs ?? DEFAULT_GIT_TIMEOUT_MS;
  }

  get state(): SyncState {
    return this.currentState;
  }

  async publish(message: string): Promise<PublishResult> {
    const branch = this.options.upstream.branch;
    this.transition("lock_acquiring");
    let guard: LockGuard;
    try {
      guard = await this.lock.acquire(this.lockTimeoutMs);
    } catch (e) {
      this.transition("idle");
      if (e instanceof LockTimeoutError) {
        this.log.warn("publish could not acquire lock", { repoRoot: this.options.repoRoot, timeoutMs: this.lockTimeoutMs });
        throw e;
      }
      throw new PublishError(`Repository lock unavailable: ${errorMessage(e)}`, { cause: e });
    }

    try {
      this.transition("staging");
      const pending = await this.pendingChanges(branch);
      if (!pending.dirty && pending.unpublished === 0) {
        this.log.info("No changes to commit", { repoRoot: this.options.repoRoot });
        return { status: "no_changes" };
      }

      if (pending.dirty) {
        this.transition("committing");
        await this.commit(message);
      } else {
        this.log.info("publishing previously committed changes", {
          repoRoot: this.options.repoRoot,
          commits: pending.unpublished,
        });
      }

      this.transition("integrating");
      await this.integrate(branch);

      this.transition("publishing");
      await this.push(branch);

      const commit = (await this.run(["rev-parse", "HEAD"])).stdout.trim();
      this.log.info("Committed and pushed", { message: sanitizeCommitMessage(message), commit, branch });
      return { status: "published", commit, branch };
    } catch (e) {
      if (e instanceof PublishError) throw e;
      this.log.error("publish cycle failed", { repoRoot: this.options.repoRoot, state: this.currentState, error: e });
      throw new PublishError(`Publish failed while ${this.currentState}: ${errorMessage(e)}`, { cause: e });
    } finally {
      await guard.release();
      this.transition("idle");
    }
  }

  private transition(next: SyncState) {
    this.log.trace("synchronizer state", { from: this.currentState, to: next });
    this.currentState = next;
  }

  private run(args: string[], env?: Record<string, string>) {
    return this.git(args, {
      cwd: this.options.repoRoot,
      timeoutMs: this.commandTimeoutMs,
      env,
    });
  }

  private runRemote(args: string[]) {
    return withAskPass(this.options.credentials, (env) => this.run(args, env));
  }

  private async pendingChanges(branch: string): Promise<PendingChanges> {
    const status = await this.run(["status", "--porcelain"]);
    const dirty = status.stdout.trim().length > 0;

    let unpublished = 0;
    try {
      await this.run(["rev-parse", "--verify", "--quiet", "HEAD"]);
    } catch {
      return { dirty, unpublished };
    }
    try {
      await this.run(["rev-parse", "--verify", "--quiet", `refs/remotes/origin/${branch}`]);
      const ahead = await this.run(["rev-list", "--count", `refs/remotes/origin/${branch}..HEAD`]);
      unpublished = Number(ahead.stdout.trim()) || 0;
    } catch {
      // Nothing of this branch is known upstream yet.
      const all = await this.run(["rev-list", "--count", "HEAD"]);
      unpublished = Number(all.stdout.trim()) || 0;
    }
    return { dirty, unpublished };
  }

  private async ensureIdentity() {
    if (this.identityConfigured || !this.options.identity) return;
    try {
      await this.run(["config", "user.name", this.options.identity.name]);
      await this.run(["config", "user.email", this.options.identity.email]);
      this.identityConfigured = true;
    } catch (e) {
      this.log.warn("git identity setup failed", { repoRoot: this.options.repoRoot, error: e });
    }
  }

  private async commit(message: string) {
    await this.ensureIdentity();
    await this.run(["add", "-A"]);
    await this.run(["commit", "--no-verify", "-m", sanitizeCommitMessage(message)]);
  }

  /**
   * A failed rebase is not fatal: the local commit stays, and the push that
   * follows either succeeds or fails on its own terms.
   */
  private async integrate(branch: string) {
    try {
      await this.runRemote(["pull", "--rebase", "--autostash", "origin", branch]);
    } catch (e) {
      const failure = new IntegrationError(`Pull failed, continuing with push: ${errorMessage(e)}`, { cause: e });
      this.log.warn(failure.message, { repoRoot: this.options.repoRoot, branch, error: e });
      await this.abortRebase();
    }
  }

  private async abortRebase() {
    const gitDir = path.join(this.options.repoRoot, ".git");
    const inProgress = await Promise.all(
      ["rebase-merge", "rebase-apply"].map((d) =>
        fs.stat(path.join(gitDir, d)).then(() => true, () => false),
      ),
    );
    if (!inProgress.some(Boolean)) return;
    try {
      await this.run(["rebase", "--abort"]);
      this.log.info("aborted conflicting rebase", { repoRoot: this.options.repoRoot });
    } catch (e) {
      this.log.error("git rebase --abort failed", { repoRoot: this.options.repoRoot, error: e });
      throw e;
    }
  }

  private async push(branch: string) {
    try {
      await this.runRemote(["push", "origin", `HEAD:${branch}`]);
    } catch (e) {
      this.log.error("git push failed", { repoRoot: this.options.repoRoot, branch, error: e });
      throw new PublishError(`Push to origin/${branch} failed: ${errorMessage(e)}`, { cause: e });
    }
  }
}
