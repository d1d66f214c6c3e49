import type { ConfigurationSnapshot, ServiceRequest } from "@lb-ipam/shared";

/**
 * Object store holding service records
 */
export interface ServiceStore {
  list(namespace: string, labelSelector: string): Promise<ServiceRequest[]>;
  /** Rejects with ServiceNotFoundError when the record does not exist */
  get(namespace: string, name: string): Promise<ServiceRequest>;
  /** Rejects with VersionConflictError when the record changed since it was read */
  update(service: ServiceRequest): Promise<ServiceRequest>;
}

/**
 * Store holding keyed configuration documents
 */
export interface ConfigDocumentStore {
  getDocument(name: string, namespace: string): Promise<ConfigurationSnapshot | null>;
  /** Idempotent: returns the existing document when there is one */
  createDocument(name: string, namespace: string): Promise<ConfigurationSnapshot>;
}
