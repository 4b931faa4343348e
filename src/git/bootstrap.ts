import fs from "fs/promises";
import path from "path";
import type { UpstreamReference } from "../config.js";
import { BootstrapError, errorMessage } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { runGit, type GitRunner } from "./core.js";
import { withAskPass, type CredentialProvider } from "./credentials.js";
import { maskRemote } from "./remoteUtils.js";

export type BootstrapReport = {
  status: "ready" | "degraded";
  cloned: boolean;
  error?: string;
};

export type BootstrapOptions = {
  root: string;
  upstream: UpstreamReference;
  credentials?: CredentialProvider;
  git?: GitRunner;
  logger?: Logger;
  cloneTimeoutMs?: number;
  commandTimeoutMs?: number;
};

async function directoryExists(p: string) {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Makes sure `root` is a working copy of the upstream branch: clones it when
 * absent, checks the branch out and fast-forwards it. Never throws; a failure
 * leaves the service running against whatever local state exists.
 */
export async function ensureRepository(options: BootstrapOptions): Promise<BootstrapReport> {
  const { root, upstream } = options;
  const git = options.git ?? runGit;
  const log = options.logger ?? defaultLogger;
  const remote = maskRemote(upstream.url);
  const timeoutMs = options.commandTimeoutMs;
  const remoteGit = (args: string[], cwd: string, timeout = timeoutMs) =>
    withAskPass(options.credentials, (env) => git(args, { cwd, env, timeoutMs: timeout }));

  let cloned = false;
  try {
    if (!(await directoryExists(root))) {
      if (!upstream.url) {
        throw new BootstrapError(`No upstream configured and ${root} does not exist`);
      }
      await fs.mkdir(path.dirname(root), { recursive: true });
      log.info("Cloning repository...", { remote, root });
      await remoteGit(["clone", upstream.url, root], path.dirname(root), options.cloneTimeoutMs ?? 60000);
      cloned = true;
      log.info("Repository cloned successfully", { remote, root });
    } else if (!(await directoryExists(path.join(root, ".git")))) {
      throw new BootstrapError(`Cannot reuse ${root}: path exists but is not a git repo`);
    } else if (upstream.url) {
      try {
        await git(["remote", "set-url", "origin", remote], { cwd: root, timeoutMs });
      } catch (e) {
        log.debug("Failed to set remote origin URL", { root, error: errorMessage(e) });
      }
    }

    await remoteGit(["fetch", "origin"], root);
    let remoteBranch = true;
    try {
      await git(["rev-parse", "--verify", "--quiet", `refs/remotes/origin/${upstream.branch}`], { cwd: root, timeoutMs });
    } catch {
      remoteBranch = false;
    }

    try {
      await git(["checkout", upstream.branch], { cwd: root, timeoutMs });
    } catch {
      const base = remoteBranch ? [`origin/${upstream.branch}`] : [];
      await git(["checkout", "-B", upstream.branch, ...base], { cwd: root, timeoutMs });
    }

    if (remoteBranch) {
      await remoteGit(["pull", "--ff-only", "origin", upstream.branch], root);
    } else {
      log.debug("Skipping pull for branch missing upstream", { root, branch: upstream.branch });
    }

    log.info(`Repository is ready on ${upstream.branch} branch`, { root });
    return { status: "ready", cloned };
  } catch (e) {
    const failure = e instanceof BootstrapError
      ? e
      : new BootstrapError(`Repository bootstrap failed: ${errorMessage(e)}`, { cause: e });
    log.warn(failure.message, { root, remote, error: e });
    return { status: "degraded", cloned, error: failure.message };
  }
}
