import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { Logger } from "../../logger.js";
import { activateProfile, listProfiles } from "../../profiles.js";
import { parseBody, sendError } from "../http.js";

const activateSchema = z.object({
  name: z.string().min(1),
});

export function registerProfileRoutes(fastify: FastifyInstance, profilesDir: string, log: Logger) {
  fastify.get("/profiles", async (_request, reply) => {
    try {
      return reply.send({ profiles: await listProfiles(profilesDir) });
    } catch (error) {
      return sendError(reply, error, log, "profiles");
    }
  });

  /**
   * POST /profiles/activate
   * Switch the active profile; the running service keeps its configuration
   * until restarted
   */
  fastify.post("/profiles/activate", async (request, reply) => {
    const body = parseBody(activateSchema, request.body, ["name"]);
    if (!body.ok) return reply.code(400).send({ error: body.error });

    try {
      const { name } = await activateProfile(profilesDir, body.data.name);
      log.info("profile activated", { name });
      return reply.send({ status: "success", name, message: "Restart required" });
    } catch (error) {
      return sendError(reply, error, log, "profiles/activate");
    }
  });
}
