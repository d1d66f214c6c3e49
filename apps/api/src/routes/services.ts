import type { FastifyInstance } from "fastify";
import { servicesRepo } from "../db/index.js";
import { CreateServiceSchema, ListServicesQuerySchema } from "./schemas.js";
import { replyWithIpamError } from "./errors.js";
import type { LoadBalancerReconciler } from "../services/load-balancer-reconciler.js";

type ServiceParams = { Params: { namespace: string; name: string } };
type NamespaceParams = { Params: { namespace: string } };

export interface ServiceRoutesOptions {
  /** Resolved per request so a configuration reload takes effect */
  getReconciler: () => LoadBalancerReconciler;
  reconcileTimeoutMs: () => number;
}

export async function serviceRoutes(fastify: FastifyInstance, options: ServiceRoutesOptions) {
  // List services in a namespace
  fastify.get<NamespaceParams>("/namespaces/:namespace/services", async (request, reply) => {
    const parseResult = ListServicesQuerySchema.safeParse(request.query);
    if (!parseResult.success) {
      reply.status(400);
      return { error: "Invalid query parameters", details: parseResult.error.issues };
    }

    try {
      const services = servicesRepo.listServices(request.params.namespace, parseResult.data.labelSelector);
      return { services };
    } catch (err) {
      // Malformed selector
      reply.status(400);
      return { error: err instanceof Error ? err.message : String(err) };
    }
  });

  // Register a service record
  fastify.post<NamespaceParams>("/namespaces/:namespace/services", async (request, reply) => {
    const parseResult = CreateServiceSchema.safeParse(request.body);
    if (!parseResult.success) {
      reply.status(400);
      return { error: "Invalid request body", details: parseResult.error.issues };
    }

    try {
      const service = servicesRepo.createService({
        namespace: request.params.namespace,
        ...parseResult.data,
      });
      reply.status(201);
      return { service };
    } catch (err) {
      return replyWithIpamError(reply, err);
    }
  });

  // Get a specific service
  fastify.get<ServiceParams>("/namespaces/:namespace/services/:name", async (request, reply) => {
    const service = servicesRepo.getServiceByName(request.params.namespace, request.params.name);
    if (!service) {
      reply.status(404);
      return { error: "Service not found" };
    }
    return { service };
  });

  // Ensure the service has a load balancer address
  fastify.put<ServiceParams>("/namespaces/:namespace/services/:name/load-balancer", async (request, reply) => {
    const service = servicesRepo.getServiceByName(request.params.namespace, request.params.name);
    if (!service) {
      reply.status(404);
      return { error: "Service not found" };
    }

    try {
      const signal = AbortSignal.timeout(options.reconcileTimeoutMs());
      const outcome = await options.getReconciler().ensureLoadBalancer(service, signal);
      return { outcome };
    } catch (err) {
      return replyWithIpamError(reply, err);
    }
  });

  // Get the load balancer of a service
  fastify.get<ServiceParams>("/namespaces/:namespace/services/:name/load-balancer", async (request, reply) => {
    const service = servicesRepo.getServiceByName(request.params.namespace, request.params.name);
    if (!service) {
      reply.status(404);
      return { error: "Service not found" };
    }
    return { loadBalancer: options.getReconciler().getLoadBalancer(service) };
  });

  // Delete a service
  fastify.delete<ServiceParams>("/namespaces/:namespace/services/:name", async (request, reply) => {
    const service = servicesRepo.getServiceByName(request.params.namespace, request.params.name);
    if (!service) {
      reply.status(404);
      return { error: "Service not found" };
    }

    await options.getReconciler().ensureLoadBalancerDeleted(service);
    servicesRepo.deleteService(service.namespace, service.name);

    return reply.status(204).send();
  });

  // Show the pool governing a namespace
  fastify.get<NamespaceParams>("/namespaces/:namespace/pool", async (request, reply) => {
    try {
      const pool = await options.getReconciler().describePool(request.params.namespace);
      return { pool };
    } catch (err) {
      return replyWithIpamError(reply, err);
    }
  });
}
