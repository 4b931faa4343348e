#!/usr/bin/env node
import "dotenv/config";
import { FileBridge } from "./bridge/FileBridge.js";
import { loadConfig } from "./config.js";
import { ensureRepository } from "./git/bootstrap.js";
import { createGitRunner } from "./git/core.js";
import { staticCredentials } from "./git/credentials.js";
import { maskRemote } from "./git/remoteUtils.js";
import { logger } from "./logger.js";
import { buildServer } from "./server/app.js";

async function main() {
  const config = loadConfig();
  if (config.profileError) {
    logger.error(`Could not load active profile: ${config.profileError}`, {
      profilesDir: config.profilesDir,
    });
  }

  logger.info("git-file-bridge starting...", {
    repository: maskRemote(config.upstream.url),
    branch: config.upstream.branch,
    localFolder: config.repoRoot,
    safeMode: config.safeMode,
    profile: config.profileName,
  });

  const git = createGitRunner({ sshKeyPath: config.git.sshKeyPath });
  const bootstrap = await ensureRepository({
    root: config.repoRoot,
    upstream: config.upstream,
    credentials: staticCredentials(config.token),
    git,
    commandTimeoutMs: config.git.commandTimeoutMs,
  });

  const bridge = FileBridge.fromConfig(config, bootstrap, logger, git);
  const app = buildServer({
    bridge,
    profilesDir: config.profilesDir,
    activeProfile: config.profileName,
    bodyLimit: config.http.bodyLimit,
    logRequests: config.http.log,
  });

  await app.listen({ port: config.http.port, host: config.http.host });
  logger.info(`git-file-bridge listening on http://localhost:${config.http.port}`);

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    app.close().then(
      () => {
        logger.info("Server closed successfully");
        process.exit(0);
      },
      (err: unknown) => {
        logger.error("Error during shutdown", { error: err });
        process.exit(1);
      },
    );
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  logger.error("Failed to start git-file-bridge", { error: err });
  process.exit(1);
});
