import type { Dirent } from "fs";
import fs from "fs/promises";
import path from "path";
import type { BridgeConfig } from "../config.js";
import {
  ForbiddenError,
  GitCommandError,
  errorMessage,
  isErrnoException,
} from "../errors.js";
import {
  createMutationExecutor,
  type MutationExecutor,
} from "../fileops/mutationExecutor.js";
import type { BootstrapReport } from "../git/bootstrap.js";
import { createGitRunner, runGit, type GitRunner } from "../git/core.js";
import { staticCredentials, withAskPass, type CredentialProvider } from "../git/credentials.js";
import {
  RepositorySynchronizer,
  isTransientSyncError,
  type PublishResult,
} from "../git/synchronizer.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { createPathValidator, type PathValidator } from "../paths/pathValidator.js";
import { withRetry, type RetryOptions } from "../util/retry.js";

export interface Publisher {
  publish(message: string): Promise<PublishResult>;
}

export type PublishOutcome = PublishResult["status"];

export type FileBridgeOptions = {
  repoRoot: string;
  safeMode: boolean;
  publisher: Publisher;
  retry?: Omit<RetryOptions, "shouldRetry" | "onRetry" | "sleep">;
  sleep?: (ms: number) => Promise<void>;
  validate?: PathValidator;
  executor?: MutationExecutor;
  git?: GitRunner;
  credentials?: CredentialProvider;
  remoteProbeTimeoutMs?: number;
  bootstrap?: BootstrapReport;
  logger?: Logger;
};

export type HealthReport = {
  status: "ok" | "warning" | "error";
  repo: string;
  safe_mode: boolean;
  bootstrap: BootstrapReport["status"] | "unknown";
  bootstrap_error?: string;
  message?: string;
  git_status?: "clean" | "dirty";
  remote?: "connected" | "disconnected" | "timeout";
  git_error?: string;
};

export type VerifyResult = {
  exists: boolean;
  path: string;
  size?: number;
  modified?: number;
};

async function listFiles(root: string, rel = ""): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(path.join(root, rel), { withFileTypes: true });
  } catch (e) {
    if (rel === "" && isErrnoException(e) && e.code === "ENOENT") return [];
    throw e;
  }
  const files: string[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    const child = rel ? `${rel}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listFiles(root, child)));
    } else if (entry.isFile()) {
      files.push(child);
    }
  }
  return files;
}

/**
 * What the HTTP layer talks to. Each mutation is validated, applied to the
 * working copy and then published, retrying transient publish failures.
 */
export class FileBridge {
  readonly repoRoot: string;
  readonly safeMode: boolean;
  private readonly validate: PathValidator;
  private readonly executor: MutationExecutor;
  private readonly git: GitRunner;
  private readonly log: Logger;

  constructor(private readonly options: FileBridgeOptions) {
    this.repoRoot = options.repoRoot;
    this.safeMode = options.safeMode;
    this.log = options.logger ?? defaultLogger;
    this.validate = options.validate ?? createPathValidator(options.repoRoot);
    this.executor =
      options.executor ??
      createMutationExecutor({ safeMode: options.safeMode, logger: this.log });
    this.git = options.git ?? runGit;
  }

  static fromConfig(
    config: BridgeConfig,
    bootstrap?: BootstrapReport,
    logger?: Logger,
    git: GitRunner = createGitRunner({ sshKeyPath: config.git.sshKeyPath }),
  ) {
    const credentials = staticCredentials(config.token);
    const publisher = new RepositorySynchronizer({
      git,
      repoRoot: config.repoRoot,
      upstream: config.upstream,
      credentials,
      lockTimeoutMs: config.lock.timeoutMs,
      lockStaleMs: config.lock.staleMs,
      commandTimeoutMs: config.git.commandTimeoutMs,
      identity: { name: config.git.userName, email: config.git.userEmail },
      logger,
    });
    return new FileBridge({
      repoRoot: config.repoRoot,
      safeMode: config.safeMode,
      publisher,
      retry: config.retry,
      git,
      credentials,
      remoteProbeTimeoutMs: config.git.remoteProbeTimeoutMs,
      bootstrap,
      logger,
    });
  }

  async upload(rawPath: string, content: string | Buffer) {
    const target = await this.validate(rawPath);
    await this.executor.write(target, content);
    const outcome = await this.publish(`Upload ${rawPath}`);
    return { path: rawPath, outcome };
  }

  async move(rawSrc: string, rawDst: string) {
    const src = await this.validate(rawSrc);
    const dst = await this.validate(rawDst);
    await this.executor.move(src, dst);
    const outcome = await this.publish(`Move ${rawSrc} to ${rawDst}`);
    return { from: rawSrc, to: rawDst, outcome };
  }

  async remove(rawPath: string) {
    if (this.safeMode) {
      throw new ForbiddenError("Deletion disabled (safe mode)");
    }
    const target = await this.validate(rawPath);
    await this.executor.remove(target);
    const outcome = await this.publish(`Delete ${rawPath}`);
    return { path: rawPath, outcome };
  }

  async tree() {
    const files = (await listFiles(this.repoRoot)).sort();
    return { files, count: files.length };
  }

  async verify(rawPath: string): Promise<VerifyResult> {
    const target = await this.validate(rawPath);
    try {
      const st = await fs.stat(target.absolute);
      return {
        exists: true,
        path: target.relative,
        size: st.size,
        modified: st.mtimeMs / 1000,
      };
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") {
        return { exists: false, path: target.relative };
      }
      throw e;
    }
  }

  async health(): Promise<HealthReport> {
    const report: HealthReport = {
      status: "ok",
      repo: this.repoRoot,
      safe_mode: this.safeMode,
      bootstrap: this.options.bootstrap?.status ?? "unknown",
    };
    if (this.options.bootstrap?.error) {
      report.status = "warning";
      report.bootstrap_error = this.options.bootstrap.error;
    }

    try {
      await fs.access(this.repoRoot);
    } catch {
      report.status = "error";
      report.message = "Repo not found";
      return report;
    }

    try {
      const st = await this.git(["status", "--porcelain"], { cwd: this.repoRoot });
      report.git_status = st.stdout.trim() ? "dirty" : "clean";
    } catch (e) {
      report.status = "error";
      report.message = "git status failed";
      report.git_error = errorMessage(e);
      return report;
    }

    try {
      await withAskPass(this.options.credentials, (env) =>
        this.git(["ls-remote", "origin"], {
          cwd: this.repoRoot,
          env,
          timeoutMs: this.options.remoteProbeTimeoutMs ?? 10000,
        }),
      );
      report.remote = "connected";
    } catch (e) {
      report.status = "warning";
      if (e instanceof GitCommandError && e.timedOut) {
        report.remote = "timeout";
      } else {
        report.remote = "disconnected";
        report.git_error = errorMessage(e);
      }
    }
    return report;
  }

  private async publish(message: string): Promise<PublishOutcome> {
    const maxAttempts = this.options.retry?.maxAttempts ?? 3;
    const result = await withRetry(() => this.options.publisher.publish(message), {
      ...this.options.retry,
      maxAttempts,
      sleep: this.options.sleep,
      shouldRetry: isTransientSyncError,
      onRetry: (error, attempt, delayMs) => {
        this.log.error(`Attempt ${attempt + 1}/${maxAttempts} failed`, {
          message,
          retryInMs: delayMs,
          error,
        });
      },
    });
    return result.status;
  }
}
