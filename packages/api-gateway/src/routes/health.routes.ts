import type { FastifyInstance } from "fastify";
import { DEFAULT_ABBREVIATIONS } from "@glossa/gloss";
import { getConfig } from "../config/index.js";

export async function healthRoutes(fastify: FastifyInstance): Promise<void> {

  /** GET /health — liveness (always 200 if the process is running) */
  fastify.get("/health", async (_request, reply) => {
    return reply.send({
      status: "ok",
      uptime: Math.floor(process.uptime()),
      ts: new Date().toISOString(),
    });
  });

  /** GET /health/ready — readiness; the table and defaults load at startup, so this reports them */
  fastify.get("/health/ready", async (_request, reply) => {
    const config = getConfig();
    return reply.send({
      status: "ok",
      abbreviations: Object.keys(DEFAULT_ABBREVIATIONS).length,
      maxLineLength: config.maxLineLength,
      rateLimit: `${config.rateLimitMax} req / ${config.rateLimitWindowMs / 1000}s`,
    });
  });
}
