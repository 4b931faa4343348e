import Fastify from "fastify";
import type { FileBridge } from "../bridge/FileBridge.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { registerFileRoutes } from "./routes/files.js";
import { registerProfileRoutes } from "./routes/profiles.js";
import { registerStatusRoutes } from "./routes/status.js";

export type ServerOptions = {
  bridge: FileBridge;
  profilesDir: string;
  activeProfile: string;
  bodyLimit?: number;
  logRequests?: boolean;
  logger?: Logger;
};

export function buildServer(options: ServerOptions) {
  const log = options.logger ?? defaultLogger;
  const fastify = Fastify({
    logger: options.logRequests ?? false,
    bodyLimit: options.bodyLimit ?? 25 * 1024 * 1024,
  });

  registerStatusRoutes(fastify, options.bridge, options.activeProfile, log);
  registerFileRoutes(fastify, options.bridge, log);
  registerProfileRoutes(fastify, options.profilesDir, log);

  return fastify;
}
