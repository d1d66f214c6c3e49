import "dotenv/config";
import { initializeDatabase, closeDatabase } from "./db/index.js";
import { createSqliteConfigDocumentStore, createSqliteServiceStore } from "./db/stores.js";
import { getIpamConfig, reloadIpamConfig, type IpamConfig } from "./config/ipam.js";
import { LoadBalancerReconciler } from "./services/load-balancer-reconciler.js";
import { buildServer } from "./app.js";

function createReconciler(config: IpamConfig): LoadBalancerReconciler {
  return new LoadBalancerReconciler(
    {
      services: createSqliteServiceStore(),
      configs: createSqliteConfigDocumentStore(config.seedPools),
    },
    {
      allocatorId: config.allocatorId,
      configDocument: config.configDocument,
      retry: config.retry,
      serializeByNamespace: config.serializeByNamespace,
    }
  );
}

let reconciler = createReconciler(getIpamConfig());

const fastify = buildServer({
  getReconciler: () => reconciler,
  reconcileTimeoutMs: () => getIpamConfig().reconcileTimeoutMs,
});

const port = parseInt(process.env.PORT ?? "3000", 10);
const host = process.env.HOST ?? "0.0.0.0";

async function start() {
  try {
    // Initialize database
    initializeDatabase();

    const config = getIpamConfig();
    console.log(
      `Allocator [${config.allocatorId}] using configuration document [${config.configDocument.namespace}/${config.configDocument.name}]`
    );

    // Handle SIGHUP for config reload
    process.on("SIGHUP", () => {
      console.log("Received SIGHUP, reloading configuration...");
      reloadIpamConfig();
      reconciler = createReconciler(getIpamConfig());
    });

    // Graceful shutdown
    const shutdown = async () => {
      console.log("Shutting down...");
      await fastify.close();
      closeDatabase();
      process.exit(0);
    };

    process.on("SIGTERM", () => void shutdown());
    process.on("SIGINT", () => void shutdown());

    await fastify.listen({ port, host });
    console.log(`API server listening on ${host}:${port}`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

void start();
