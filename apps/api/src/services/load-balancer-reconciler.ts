import {
  IMPLEMENTATION_LABEL,
  IPAM_ADDRESS_LABEL,
  type ClaimSet,
  type ConfigurationSnapshot,
  type LoadBalancerLookup,
  type PoolDescription,
  type ReconcileOutcome,
  type ReconcileState,
  type ServiceRequest,
} from "@lb-ipam/shared";
import { resolvePool } from "./pool-resolver.js";
import {
  allocateAddress,
  countClaimsInPool,
  describePoolDefinition,
  peekNextAddress,
  poolCapacity,
} from "./address-allocator.js";
import { retryOnConflict, RetryExhaustedError, DEFAULT_RETRY_POLICY, type RetryPolicy } from "./retry.js";
import { KeyedQueue } from "./keyed-queue.js";
import { PersistenceError, PoolNotFoundError, ReconcileAbortedError } from "./errors.js";
import type { ConfigDocumentStore, ServiceStore } from "./stores.js";

export interface ReconcilerOptions {
  /** Value of the implementation label on services this allocator owns */
  allocatorId: string;
  configDocument: { name: string; namespace: string };
  retry?: RetryPolicy;
  /** Run reconciliations of the same namespace one at a time */
  serializeByNamespace?: boolean;
}

export interface ReconcilerDeps {
  services: ServiceStore;
  configs: ConfigDocumentStore;
}

const MAX_LOAD_BALANCER_NAME_LENGTH = 32;

/**
 * Assigns load balancer addresses to services.
 *
 * Each reconciliation reads the current claims and pool configuration,
 * picks the lowest free address and writes it onto the service with an
 * optimistic-concurrency retry. A service that already has an address is
 * left alone.
 */
export class LoadBalancerReconciler {
  private services: ServiceStore;
  private configs: ConfigDocumentStore;
  private options: Required<ReconcilerOptions>;
  private queue = new KeyedQueue();

  constructor(deps: ReconcilerDeps, options: ReconcilerOptions) {
    this.services = deps.services;
    this.configs = deps.configs;
    this.options = {
      retry: DEFAULT_RETRY_POLICY,
      serializeByNamespace: true,
      ...options,
    };
  }

  get ownershipSelector(): string {
    return `${IMPLEMENTATION_LABEL}=${this.options.allocatorId}`;
  }

  /**
   * Make sure the service has a load balancer address, allocating one if needed
   */
  async ensureLoadBalancer(service: ServiceRequest, signal?: AbortSignal): Promise<ReconcileOutcome> {
    console.log(`syncing service '${service.name}' (${service.uid})`);

    if (service.assignedAddress !== "") {
      return { state: "Bound", address: service.assignedAddress, status: service.status, allocated: false };
    }

    if (!this.options.serializeByNamespace) {
      return this.syncLoadBalancer(service, signal);
    }
    return this.queue.run(service.namespace, () => this.syncLoadBalancer(service, signal));
  }

  async updateLoadBalancer(service: ServiceRequest, signal?: AbortSignal): Promise<void> {
    await this.ensureLoadBalancer(service, signal);
  }

  /**
   * Deletion releases nothing: the address stops being claimed once the
   * service no longer shows up in the listing.
   */
  async ensureLoadBalancerDeleted(service: ServiceRequest): Promise<void> {
    console.log(`deleting service '${service.name}' (${service.uid})`);
  }

  getLoadBalancer(service: ServiceRequest): LoadBalancerLookup {
    const name = this.getLoadBalancerName(service);
    if (service.labels[IMPLEMENTATION_LABEL] === this.options.allocatorId) {
      return { name, exists: true, status: service.status };
    }
    return { name, exists: false };
  }

  getLoadBalancerName(service: ServiceRequest): string {
    return `a${service.uid.replace(/-/g, "")}`.slice(0, MAX_LOAD_BALANCER_NAME_LENGTH);
  }

  /**
   * Report the pool governing a namespace and how much of it is claimed
   */
  async describePool(namespace: string): Promise<PoolDescription> {
    const claims = await this.collectClaims(namespace);
    const snapshot = await this.loadConfiguration();

    const resolved = resolvePool(namespace, snapshot);
    if (!resolved) {
      throw new PoolNotFoundError(namespace);
    }

    return {
      namespace,
      key: resolved.key,
      pool: resolved.pool,
      capacity: poolCapacity(resolved.pool),
      claimed: countClaimsInPool(resolved.pool, claims),
      nextAvailable: peekNextAddress(resolved.pool, claims),
    };
  }

  private async syncLoadBalancer(service: ServiceRequest, signal?: AbortSignal): Promise<ReconcileOutcome> {
    let state: ReconcileState = "Unbound";

    try {
      signal?.throwIfAborted();

      state = "Resolving";
      // The record may have been bound while this attempt waited in the queue
      const current = await this.services.get(service.namespace, service.name);
      if (current.assignedAddress !== "") {
        console.log(`Service [${service.name}] is already bound to [${current.assignedAddress}]`);
        return { state: "Bound", address: current.assignedAddress, status: current.status, allocated: false };
      }

      const claims = await this.collectClaims(service.namespace);
      const snapshot = await this.loadConfiguration();

      state = "Allocating";
      const resolved = resolvePool(service.namespace, snapshot);
      if (!resolved) {
        throw new PoolNotFoundError(service.namespace);
      }
      const address = allocateAddress(resolved.pool, claims);
      console.log(
        `Allocated [${address}] from pool [${resolved.key}] (${describePoolDefinition(resolved.pool)}) for service [${service.name}]`
      );

      state = "Persisting";
      const bound = await this.persistAddress(service, address, signal);
      if (bound.assignedAddress !== address) {
        console.log(`Service [${service.name}] was bound to [${bound.assignedAddress}] concurrently, keeping it`);
        return { state: "Bound", address: bound.assignedAddress, status: bound.status, allocated: false };
      }

      return { state: "Bound", address, status: bound.status, allocated: true };
    } catch (err) {
      console.error(`Failed to reconcile service [${service.namespace}/${service.name}] while ${state}:`, err);

      if (signal?.aborted && err === signal.reason) {
        throw new ReconcileAbortedError(service.namespace, service.name, signal.reason);
      }
      throw err;
    }
  }

  /**
   * Addresses claimed by every service this allocator owns in the namespace
   */
  private async collectClaims(namespace: string): Promise<ClaimSet> {
    const owned = await this.services.list(namespace, this.ownershipSelector);
    const claims = new Set<string>();
    for (const svc of owned) {
      const address = svc.labels[IPAM_ADDRESS_LABEL];
      if (address) {
        claims.add(address);
      }
    }
    return claims;
  }

  private async loadConfiguration(): Promise<ConfigurationSnapshot> {
    const { name, namespace } = this.options.configDocument;

    const existing = await this.configs.getDocument(name, namespace);
    if (existing) {
      return existing;
    }

    console.error(`Unable to retrieve ipam config from configuration document [${name}] in ${namespace}, creating it`);
    return this.configs.createDocument(name, namespace);
  }

  /**
   * Write the address onto the latest version of the service. If another
   * writer bound the service in the meantime, its record is returned as-is.
   */
  private async persistAddress(service: ServiceRequest, address: string, signal?: AbortSignal): Promise<ServiceRequest> {
    try {
      return await retryOnConflict(
        this.options.retry,
        async () => {
          const recent = await this.services.get(service.namespace, service.name);
          if (recent.assignedAddress !== "") {
            return recent;
          }

          console.log(`Updating service [${service.name}], with load balancer IPAM address [${address}]`);

          return this.services.update({
            ...recent,
            labels: {
              ...recent.labels,
              [IMPLEMENTATION_LABEL]: this.options.allocatorId,
              [IPAM_ADDRESS_LABEL]: address,
            },
            assignedAddress: address,
          });
        },
        signal
      );
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new PersistenceError(
          `error updating Service Spec [${service.name}] : ${err.message}`,
          err.cause
        );
      }
      throw err;
    }
  }
}
