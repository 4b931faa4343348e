import type { FastifyInstance } from "fastify";
import type { FileBridge } from "../../bridge/FileBridge.js";
import type { Logger } from "../../logger.js";
import { sendError } from "../http.js";

export const SERVICE_NAME = "git-file-bridge";
export const SERVICE_VERSION = "2.0.0";

export const ENDPOINTS = [
  "/upload",
  "/move",
  "/delete",
  "/tree",
  "/profiles",
  "/health",
  "/verify_upload",
];

export function registerStatusRoutes(
  fastify: FastifyInstance,
  bridge: FileBridge,
  activeProfile: string,
  log: Logger,
) {
  fastify.get("/", async (_request, reply) => {
    return reply.send({
      status: `${SERVICE_NAME} is live`,
      version: SERVICE_VERSION,
      endpoints: ENDPOINTS,
      active_profile: activeProfile,
    });
  });

  fastify.get("/health", async (_request, reply) => {
    try {
      const report = await bridge.health();
      return reply.code(report.status === "ok" ? 200 : 500).send(report);
    } catch (error) {
      return sendError(reply, error, log, "health");
    }
  });
}
