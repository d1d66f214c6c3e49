import { randomUUID } from "node:crypto";
import { getDatabase } from "../schema.js";
import { ServiceExistsError, ServiceNotFoundError, VersionConflictError } from "../../services/errors.js";
import { matchesLabels, parseLabelSelector } from "../../utils/labels.js";
import type { CreateServiceInput, LoadBalancerStatus, ServiceRequest } from "@lb-ipam/shared";

interface ServiceRow {
  uid: string;
  namespace: string;
  name: string;
  labels: string;
  assigned_address: string;
  status: string;
  resource_version: number;
  created_at: string;
  updated_at: string;
}

function rowToService(row: ServiceRow): ServiceRequest {
  return {
    uid: row.uid,
    namespace: row.namespace,
    name: row.name,
    labels: JSON.parse(row.labels) as Record<string, string>,
    assignedAddress: row.assigned_address,
    status: JSON.parse(row.status) as LoadBalancerStatus,
    resourceVersion: row.resource_version,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Register a new service record
 */
export function createService(input: CreateServiceInput): ServiceRequest {
  if (getServiceByName(input.namespace, input.name)) {
    throw new ServiceExistsError(input.namespace, input.name);
  }

  const db = getDatabase();
  const uid = randomUUID();
  const now = new Date().toISOString();
  const labels = input.labels ?? {};
  const status: LoadBalancerStatus = { ingress: [] };
  const assignedAddress = input.assignedAddress ?? "";

  const stmt = db.prepare(`
    INSERT INTO services (uid, namespace, name, labels, assigned_address, status, resource_version, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, 1, ?, ?)
  `);

  stmt.run(uid, input.namespace, input.name, JSON.stringify(labels), assignedAddress, JSON.stringify(status), now, now);

  return {
    uid,
    namespace: input.namespace,
    name: input.name,
    labels,
    assignedAddress,
    status,
    resourceVersion: 1,
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Get a service by namespace and name
 */
export function getServiceByName(namespace: string, name: string): ServiceRequest | null {
  const db = getDatabase();
  const stmt = db.prepare("SELECT * FROM services WHERE namespace = ? AND name = ?");
  const row = stmt.get(namespace, name) as ServiceRow | undefined;
  return row ? rowToService(row) : null;
}

/**
 * List the services in a namespace, optionally filtered by a label selector
 */
export function listServices(namespace: string, labelSelector?: string): ServiceRequest[] {
  const db = getDatabase();
  const stmt = db.prepare("SELECT * FROM services WHERE namespace = ? ORDER BY created_at, name");
  const rows = stmt.all(namespace) as ServiceRow[];
  const services = rows.map(rowToService);

  if (!labelSelector) {
    return services;
  }
  const selector = parseLabelSelector(labelSelector);
  return services.filter((s) => matchesLabels(s.labels, selector));
}

/**
 * Write labels, assigned address and status back to a service.
 *
 * The write only lands if the stored resource version still equals the
 * version on the given record; otherwise a VersionConflictError is thrown
 * and nothing changes.
 */
export function updateService(service: ServiceRequest): ServiceRequest {
  const db = getDatabase();
  const now = new Date().toISOString();

  const stmt = db.prepare(`
    UPDATE services
    SET labels = ?, assigned_address = ?, status = ?, resource_version = resource_version + 1, updated_at = ?
    WHERE namespace = ? AND name = ? AND resource_version = ?
  `);

  const result = stmt.run(
    JSON.stringify(service.labels),
    service.assignedAddress,
    JSON.stringify(service.status),
    now,
    service.namespace,
    service.name,
    service.resourceVersion
  );

  if (result.changes === 0) {
    if (!getServiceByName(service.namespace, service.name)) {
      throw new ServiceNotFoundError(service.namespace, service.name);
    }
    throw new VersionConflictError(service.namespace, service.name, service.resourceVersion);
  }

  const updated = getServiceByName(service.namespace, service.name);
  if (!updated) {
    throw new ServiceNotFoundError(service.namespace, service.name);
  }
  return updated;
}

/**
 * Delete a service
 */
export function deleteService(namespace: string, name: string): boolean {
  const db = getDatabase();
  const stmt = db.prepare("DELETE FROM services WHERE namespace = ? AND name = ?");
  const result = stmt.run(namespace, name);
  return result.changes > 0;
}
