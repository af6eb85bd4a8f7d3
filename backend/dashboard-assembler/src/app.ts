import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { loadServerConfig, type AssemblerConfig, type ServerConfig } from "./config.js";
import { dashboardPlugin } from "./index.js";
import { templateStatus } from "./template/fragments.js";

export type BuildAppOptions = {
  assembler: AssemblerConfig;
  server?: ServerConfig;
  logger?: boolean;
};

export async function buildApp(opts: BuildAppOptions): Promise<FastifyInstance> {
  const server = opts.server ?? loadServerConfig();
  const fastify = Fastify({
    logger: opts.logger ?? true,
    bodyLimit: server.bodyLimitBytes,
  });

  await fastify.register(cors, {
    origin: server.corsOrigin,
    methods: ["GET", "POST"],
  });

  fastify.setErrorHandler((err, req, reply) => {
    // Body parser failures (bad JSON, oversized body) carry a 4xx status
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: err.message });
    }
    req.log.error(err);
    return reply.status(500).send({ error: "Internal server error" });
  });

  fastify.get("/health", async () => {
    return {
      ok: true,
      assets: templateStatus(opts.assembler),
    };
  });

  await fastify.register(dashboardPlugin, { config: opts.assembler });

  return fastify;
}
