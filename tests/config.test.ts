import { describe, it, expect, beforeEach } from "vitest";
import fs from "fs/promises";
import path from "path";
import os from "os";
import {
  bool,
  defaultRemoteUrl,
  expandHome,
  loadConfig,
  logSettingsFromEnv,
  parseDurationMs,
} from "../src/config.js";

describe("parseDurationMs", () => {
  it.each([
    ["250ms", 250],
    ["30s", 30000],
    ["5m", 300000],
    ["2min", 120000],
    ["1h", 3600000],
    ["1500", 1500],
    ["2", 2000],
    ["'45s'", 45000],
  ])("parses %s", (input, expected) => {
    expect(parseDurationMs(input, 1)).toBe(expected);
  });

  it.each([[undefined], [""], ["soon"], ["-5s"], ["0"]])("falls back for %j", (input) => {
    expect(parseDurationMs(input, 777)).toBe(777);
  });
});

describe("config helpers", () => {
  it("reads boolean flags", () => {
    expect(bool("YES")).toBe(true);
    expect(bool("0", true)).toBe(false);
    expect(bool(undefined, true)).toBe(true);
    expect(bool("  ", false)).toBe(false);
  });

  it("expands a leading tilde only", () => {
    expect(expandHome("~/repos", { HOME: "/home/ops" })).toBe("/home/ops/repos");
    expect(expandHome("a/~b", { HOME: "/home/ops" })).toBe("a/~b");
  });

  it("derives the GitHub remote from owner/name", () => {
    expect(defaultRemoteUrl("acme/notes")).toBe("https://github.com/acme/notes.git");
    expect(defaultRemoteUrl("/acme/notes/")).toBe("https://github.com/acme/notes.git");
  });

  it("logs to the console only unless a file is named", () => {
    expect(logSettingsFromEnv({})).toEqual({ level: "info", file: "", console: true });
    expect(logSettingsFromEnv({ LOG_LEVEL: "DEBUG", LOG_FILE: "/var/log/bridge.log", LOG_CONSOLE: "off" })).toEqual({
      level: "debug",
      file: "/var/log/bridge.log",
      console: false,
    });
  });
});

describe("loadConfig", () => {
  let cwd: string;
  let profilesDir: string;

  const writeActive = (profile: unknown) =>
    fs.writeFile(path.join(profilesDir, "active.json"), JSON.stringify(profile));

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(process.env.GFB_TEST_BASE || os.tmpdir(), "cfg-"));
    profilesDir = path.join(cwd, "profiles");
    await fs.mkdir(profilesDir);
  });

  it("starts with defaults and a profile error when no profile is active", () => {
    const config = loadConfig({}, cwd);

    expect(config.profile).toBeNull();
    expect(config.profileError).toBe(`Missing profile: ${path.join(profilesDir, "active.json")}`);
    expect(config.profileName).toBe("unknown");
    expect(config.repoRoot).toBe(path.join(cwd, "local_repo"));
    expect(config.upstream).toEqual({ url: "", branch: "main" });
    expect(config.safeMode).toBe(true);
    expect(config.lock).toEqual({ timeoutMs: 30000, staleMs: 300000 });
    expect(config.retry).toEqual({ maxAttempts: 3, initialDelayMs: 1000, backoffMultiplier: 2 });
    expect(config.http.port).toBe(8080);
    expect(config.git.remoteProbeTimeoutMs).toBe(10000);
  });

  it("reads repository settings from the active profile", async () => {
    await writeActive({
      name: "work",
      repo: "acme/notes",
      token: "test-token",
      local_folder: "checkouts/notes",
      safe_mode: false,
    });

    const config = loadConfig({}, cwd);

    expect(config.profileError).toBeUndefined();
    expect(config.profileName).toBe("work");
    expect(config.repoRoot).toBe(path.join(cwd, "checkouts", "notes"));
    expect(config.upstream).toEqual({ url: "https://github.com/acme/notes.git", branch: "main" });
    expect(config.token).toBe("test-token");
    expect(config.safeMode).toBe(false);
  });

  it("lets the environment override safe mode and timings", async () => {
    await writeActive({
      repo: "acme/notes",
      token: "",
      local_folder: "/srv/notes",
      branch: "publish",
      remote_url: "/srv/git/notes.git",
    });

    const config = loadConfig(
      {
        BRIDGE_SAFE_MODE: "0",
        GITHUB_TOKEN: "env-token",
        LOCK_TIMEOUT_MS: "200ms",
        PUBLISH_MAX_ATTEMPTS: "5",
        PORT: "9090",
      },
      cwd,
    );

    expect(config.repoRoot).toBe("/srv/notes");
    expect(config.upstream).toEqual({ url: "/srv/git/notes.git", branch: "publish" });
    expect(config.token).toBe("env-token");
    expect(config.safeMode).toBe(false);
    expect(config.lock.timeoutMs).toBe(200);
    expect(config.retry.maxAttempts).toBe(5);
    expect(config.http.port).toBe(9090);
  });

  it("keeps the lock stale threshold above the git command timeout", () => {
    const config = loadConfig({ LOCK_STALE_MS: "10s", GIT_COMMAND_TIMEOUT_MS: "45s" }, cwd);
    expect(config.git.commandTimeoutMs).toBe(45000);
    expect(config.lock.staleMs).toBe(90000);

    const roomy = loadConfig({ LOCK_STALE_MS: "10m" }, cwd);
    expect(roomy.lock.staleMs).toBe(600000);
  });

  it("names the missing keys of an incomplete profile", async () => {
    await writeActive({ repo: "acme/notes" });

    const config = loadConfig({}, cwd);

    expect(config.profile).toBeNull();
    expect(config.profileError).toBe("Profile invalid or missing keys: token, local_folder");
  });

  it("reports unreadable profile JSON", async () => {
    await fs.writeFile(path.join(profilesDir, "active.json"), "{ nope");

    const config = loadConfig({}, cwd);

    expect(config.profileError).toMatch(/^Invalid JSON in profile: /);
  });
});
