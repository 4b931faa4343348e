import { execFile } from "child_process";
import { GitCommandError } from "../errors.js";

export type GitRunOptions = {
  cwd?: string;
  timeoutMs?: number;
  /** Extra variables merged over the base git environment. */
  env?: Record<string, string>;
};

export type GitOutput = { stdout: string; stderr: string };

export type GitRunner = (
  args: string[],
  options?: GitRunOptions,
) => Promise<GitOutput>;

export const DEFAULT_GIT_TIMEOUT_MS = 30000;

export function gitEnv(
  sshKeyPath?: string,
  extra: Record<string, string> = {},
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...process.env };
  env.GIT_TERMINAL_PROMPT = "0";
  if (sshKeyPath) {
    env.GIT_SSH_COMMAND = `ssh -i "${sshKeyPath}" -o IdentitiesOnly=yes`;
  }
  return { ...env, ...extra };
}

function exitCodeOf(error: Error & { code?: unknown }): number | null {
  return typeof error.code === "number" ? error.code : null;
}

/** Runs `git` directly (no shell) and rejects with a GitCommandError. */
export function createGitRunner(defaults: { sshKeyPath?: string } = {}): GitRunner {
  return (args, options = {}) =>
    new Promise((resolve, reject) => {
      execFile(
        "git",
        args,
        {
          cwd: options.cwd,
          env: gitEnv(defaults.sshKeyPath, options.env),
          timeout: options.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS,
          maxBuffer: 16 * 1024 * 1024,
        },
        (error, stdout, stderr) => {
          if (error) {
            const timedOut = error.killed === true && error.signal === "SIGTERM";
            reject(
              new GitCommandError(args, exitCodeOf(error), String(stderr), timedOut),
            );
            return;
          }
          resolve({ stdout: String(stdout), stderr: String(stderr) });
        },
      );
    });
}

export const runGit: GitRunner = createGitRunner();
