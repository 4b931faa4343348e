import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { FileBridge } from "../../bridge/FileBridge.js";
import type { Logger } from "../../logger.js";
import { parseBody, sendError } from "../http.js";

const uploadSchema = z.object({
  path: z.string(),
  content: z.string(),
  encoding: z.enum(["utf8", "base64"]).optional(),
});

const moveSchema = z.object({
  src: z.string(),
  dst: z.string(),
});

const pathSchema = z.object({
  path: z.string(),
});

export function registerFileRoutes(fastify: FastifyInstance, bridge: FileBridge, log: Logger) {
  /**
   * POST /upload
   * Write a file and publish it
   */
  fastify.post("/upload", async (request, reply) => {
    const body = parseBody(uploadSchema, request.body, ["path", "content"]);
    if (!body.ok) return reply.code(400).send({ error: body.error });

    const { path, content, encoding } = body.data;
    try {
      const payload = encoding === "base64" ? Buffer.from(content, "base64") : content;
      const result = await bridge.upload(path, payload);
      return reply.send({ status: "success", ...result });
    } catch (error) {
      return sendError(reply, error, log, "upload");
    }
  });

  /**
   * POST /move
   * Rename a file within the repository and publish the move
   */
  fastify.post("/move", async (request, reply) => {
    const body = parseBody(moveSchema, request.body, ["src", "dst"]);
    if (!body.ok) return reply.code(400).send({ error: body.error });

    try {
      const result = await bridge.move(body.data.src, body.data.dst);
      return reply.send({ status: "success", ...result });
    } catch (error) {
      return sendError(reply, error, log, "move");
    }
  });

  /**
   * POST /delete
   * Remove a file and publish the deletion (refused in safe mode)
   */
  fastify.post("/delete", async (request, reply) => {
    const body = parseBody(pathSchema, request.body, ["path"]);
    if (!body.ok) return reply.code(400).send({ error: body.error });

    try {
      const result = await bridge.remove(body.data.path);
      return reply.send({ status: "success", ...result });
    } catch (error) {
      return sendError(reply, error, log, "delete");
    }
  });

  fastify.get("/tree", async (_request, reply) => {
    try {
      return reply.send(await bridge.tree());
    } catch (error) {
      return sendError(reply, error, log, "tree");
    }
  });

  fastify.post("/verify_upload", async (request, reply) => {
    const body = parseBody(pathSchema, request.body, ["path"]);
    if (!body.ok) return reply.code(400).send({ error: body.error });

    try {
      return reply.send(await bridge.verify(body.data.path));
    } catch (error) {
      return sendError(reply, error, log, "verify_upload");
    }
  });
}
