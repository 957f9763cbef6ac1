import type { FastifyReply, FastifyRequest } from "fastify";
import { randomUUID } from "crypto";

/**
 * Correlation IDs. Fastify takes the ID from the X-Request-ID header
 * (see `requestIdHeader`) and falls back to `generateRequestId`; the
 * hook below echoes it on every response alongside the envelope's requestId.
 */
export function generateRequestId(): string {
  return randomUUID();
}

export async function echoRequestId(request: FastifyRequest, reply: FastifyReply): Promise<void> {
  reply.header("x-request-id", request.id);
}
