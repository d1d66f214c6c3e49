import { servicesRepo, configDocumentsRepo } from "./index.js";
import { ServiceNotFoundError } from "../services/errors.js";
import type { ConfigDocumentStore, ServiceStore } from "../services/stores.js";

/**
 * Service store backed by the services table
 */
export function createSqliteServiceStore(): ServiceStore {
  return {
    async list(namespace, labelSelector) {
      return servicesRepo.listServices(namespace, labelSelector);
    },
    async get(namespace, name) {
      const service = servicesRepo.getServiceByName(namespace, name);
      if (!service) {
        throw new ServiceNotFoundError(namespace, name);
      }
      return service;
    },
    async update(service) {
      return servicesRepo.updateService(service);
    },
  };
}

/**
 * Configuration store backed by the config_documents table.
 * Documents created through it start out with the seed pools.
 */
export function createSqliteConfigDocumentStore(seedPools: Record<string, string> = {}): ConfigDocumentStore {
  return {
    async getDocument(name, namespace) {
      return configDocumentsRepo.getConfigDocument(name, namespace);
    },
    async createDocument(name, namespace) {
      return configDocumentsRepo.ensureConfigDocument(name, namespace, seedPools);
    },
  };
}
