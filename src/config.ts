import path from "path";
import { loadActiveProfile, type Profile } from "./profiles.js";

export type Env = Record<string, string | undefined>;

export type LogSettings = {
  level: string;
  file: string;
  console: boolean;
};

export type UpstreamReference = {
  url: string;
  branch: string;
};

export type BridgeConfig = {
  profilesDir: string;
  profile: Profile | null;
  profileName: string;
  profileError?: string;
  repoRoot: string;
  upstream: UpstreamReference;
  token: string;
  safeMode: boolean;
  lock: {
    timeoutMs: number;
    staleMs: number;
  };
  git: {
    commandTimeoutMs: number;
    remoteProbeTimeoutMs: number;
    userName: string;
    userEmail: string;
    sshKeyPath: string;
  };
  retry: {
    maxAttempts: number;
    initialDelayMs: number;
    backoffMultiplier: number;
  };
  http: {
    host: string;
    port: number;
    bodyLimit: number;
    log: boolean;
  };
  log: LogSettings;
};

/** LOCK_STALE_MS is raised to at least this many git command timeouts. */
export const MIN_STALE_COMMAND_FACTOR = 2;

export function expandHome(p: string, env: Env = process.env): string {
  return p.replace(/^~(?=$|\/|\\)/, env.HOME || env.USERPROFILE || "~");
}

export function bool(v: string | undefined, def = false) {
  if (v === undefined || !v.trim().length) return def;
  return ["1", "true", "yes", "on"].includes(v.trim().toLowerCase());
}

function positiveInt(value: string | undefined, fallback: number) {
  if (!value) return fallback;
  const num = Number(value);
  if (!Number.isFinite(num) || num <= 0) return fallback;
  return Math.floor(num);
}

/**
 * Accepts `250ms`, `30s`, `5m`, `1h`. A bare number above 1000 is taken as
 * milliseconds, otherwise as seconds.
 */
export function parseDurationMs(value: string | undefined, fallbackMs: number) {
  if (!value) return fallbackMs;
  let s = value.toString().trim();
  if (!s.length) return fallbackMs;

  if (
    (s.startsWith("'") && s.endsWith("'")) ||
    (s.startsWith('"') && s.endsWith('"'))
  )
    s = s.slice(1, -1).trim();

  const m = s.match(/^([0-9]+(?:\.[0-9]+)?)\s*(ms|s|m|min|h)?$/i);
  if (!m) return fallbackMs;
  const num = Number(m[1]);
  if (!Number.isFinite(num) || num <= 0) return fallbackMs;
  const unit = (m[2] || "").toLowerCase();
  if (unit === "ms") return Math.floor(num);
  if (unit === "s") return Math.floor(num * 1000);
  if (unit === "m" || unit === "min") return Math.floor(num * 60 * 1000);
  if (unit === "h") return Math.floor(num * 60 * 60 * 1000);

  if (num > 1000) return Math.floor(num);
  return Math.floor(num * 1000);
}

export function defaultRemoteUrl(repo: string) {
  return `https://github.com/${repo.replace(/^\/+|\/+$/g, "")}.git`;
}

export function logSettingsFromEnv(env: Env = process.env): LogSettings {
  const file = env.LOG_FILE && env.LOG_FILE.trim().length
    ? path.resolve(expandHome(env.LOG_FILE.trim(), env))
    : "";
  return {
    level: (env.LOG_LEVEL || "info").toLowerCase(),
    file,
    console: bool(env.LOG_CONSOLE, true),
  };
}

/**
 * Builds the configuration once at startup. A missing or broken profile does
 * not throw: the error is kept on `profileError` and defaults apply, so the
 * service can still start and report itself as degraded.
 */
export function loadConfig(
  env: Env = process.env,
  cwd: string = process.cwd(),
): BridgeConfig {
  const profilesDir = path.resolve(
    cwd,
    expandHome(env.PROFILES_DIR || "profiles", env),
  );
  const loaded = loadActiveProfile(profilesDir);
  const profile = loaded.profile;

  const repo = profile?.repo ?? "";
  const localFolder = profile?.local_folder ?? "local_repo";
  const remoteUrl =
    profile?.remote_url ?? (repo ? defaultRemoteUrl(repo) : "");

  const commandTimeoutMs = parseDurationMs(env.GIT_COMMAND_TIMEOUT_MS, 30000);
  // A live holder must never look abandoned while one git command runs.
  const staleMs = Math.max(
    parseDurationMs(env.LOCK_STALE_MS, 5 * 60 * 1000),
    MIN_STALE_COMMAND_FACTOR * commandTimeoutMs,
  );

  return {
    profilesDir,
    profile,
    profileName: profile?.name ?? "unknown",
    profileError: loaded.error,
    repoRoot: path.resolve(cwd, expandHome(localFolder, env)),
    upstream: {
      url: remoteUrl,
      branch: profile?.branch ?? "main",
    },
    token: profile?.token || env.GITHUB_TOKEN || "",
    safeMode: bool(env.BRIDGE_SAFE_MODE, profile?.safe_mode ?? true),
    lock: {
      timeoutMs: parseDurationMs(env.LOCK_TIMEOUT_MS, 30000),
      staleMs,
    },
    git: {
      commandTimeoutMs,
      remoteProbeTimeoutMs: parseDurationMs(
        env.GIT_REMOTE_PROBE_TIMEOUT_MS,
        10000,
      ),
      userName: (env.GIT_USER_NAME || "git-file-bridge").trim(),
      userEmail: (env.GIT_USER_EMAIL || "git-file-bridge@localhost").trim(),
      sshKeyPath: env.GIT_SSH_KEY_PATH
        ? path.resolve(expandHome(env.GIT_SSH_KEY_PATH, env))
        : "",
    },
    retry: {
      maxAttempts: positiveInt(env.PUBLISH_MAX_ATTEMPTS, 3),
      initialDelayMs: parseDurationMs(env.PUBLISH_BACKOFF_MS, 1000),
      backoffMultiplier: 2,
    },
    http: {
      host: env.HOST || "0.0.0.0",
      port: positiveInt(env.PORT, 8080),
      bodyLimit: positiveInt(env.MAX_UPLOAD_BYTES, 25 * 1024 * 1024),
      log: bool(env.HTTP_LOG, true),
    },
    log: logSettingsFromEnv(env),
  };
}
