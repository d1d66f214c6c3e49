import Fastify, { type FastifyInstance } from "fastify";
import { serviceRoutes, type ServiceRoutesOptions } from "./routes/index.js";

export interface BuildServerOptions extends ServiceRoutesOptions {
  logger?: boolean;
}

/**
 * Create the HTTP server without starting it
 */
export function buildServer(options: BuildServerOptions): FastifyInstance {
  const fastify = Fastify({
    logger: options.logger ?? true,
  });

  // Health check endpoint
  fastify.get("/health", async () => {
    return { status: "ok" };
  });

  fastify.register(serviceRoutes, {
    getReconciler: options.getReconciler,
    reconcileTimeoutMs: options.reconcileTimeoutMs,
  });

  return fastify;
}
