import type { FastifyReply } from "fastify";
import type { z } from "zod";
import { BridgeError, GitCommandError } from "../errors.js";
import type { Logger } from "../logger.js";

/**
 * Parses a JSON body against `schema`; any shape problem is reported as the
 * list of required fields, which is all callers need to fix the request.
 */
export function parseBody<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
  required: string[],
): { ok: true; data: z.infer<S> } | { ok: false; error: string } {
  const parsed = schema.safeParse(body ?? {});
  if (parsed.success) return { ok: true, data: parsed.data };
  return { ok: false, error: `Missing required: ${required.join(", ")}` };
}

export function sendError(reply: FastifyReply, error: unknown, log: Logger, route: string) {
  if (error instanceof BridgeError) {
    if (error.status >= 500) log.error(`${route} failed`, { error });
    return reply.code(error.status).send({ error: error.message });
  }
  if (error instanceof GitCommandError) {
    log.error(`Git error in ${route}`, { error });
    return reply.code(500).send({ error: `Git operation failed: ${error.stderr.trim()}` });
  }
  log.error(`Unexpected error in ${route}`, { error });
  return reply.code(500).send({ error: "Internal server error" });
}
