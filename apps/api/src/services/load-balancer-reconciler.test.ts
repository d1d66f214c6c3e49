import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { LoadBalancerReconciler, type ReconcilerDeps, type ReconcilerOptions } from "./load-balancer-reconciler.js";
import {
  InvalidPoolError,
  PersistenceError,
  PoolExhaustedError,
  PoolNotFoundError,
  ReconcileAbortedError,
  VersionConflictError,
} from "./errors.js";
import { initializeDatabase, closeDatabase, servicesRepo, configDocumentsRepo } from "../db/index.js";
import { createSqliteConfigDocumentStore, createSqliteServiceStore } from "../db/stores.js";
import type { ServiceRequest } from "@lb-ipam/shared";

const CONFIG_NAME = "lb-ipam";
const CONFIG_NAMESPACE = "ipam-system";

function makeReconciler(deps: Partial<ReconcilerDeps> = {}, options: Partial<ReconcilerOptions> = {}) {
  return new LoadBalancerReconciler(
    {
      services: deps.services ?? createSqliteServiceStore(),
      configs: deps.configs ?? createSqliteConfigDocumentStore(),
    },
    {
      allocatorId: "lb-ipam",
      configDocument: { name: CONFIG_NAME, namespace: CONFIG_NAMESPACE },
      retry: { steps: 3, durationMs: 0, factor: 1, jitter: 0 },
      ...options,
    }
  );
}

function seedPools(data: Record<string, string>): void {
  configDocumentsRepo.ensureConfigDocument(CONFIG_NAME, CONFIG_NAMESPACE, data);
}

function stored(namespace: string, name: string): ServiceRequest | null {
  return servicesRepo.getServiceByName(namespace, name);
}

describe("LoadBalancerReconciler", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    initializeDatabase(":memory:");
  });

  afterEach(() => {
    closeDatabase();
    vi.restoreAllMocks();
  });

  describe("ensureLoadBalancer", () => {
    it("binds the lowest host address of the namespace CIDR", async () => {
      seedPools({ "cidr-default": "192.168.1.0/30" });
      const service = servicesRepo.createService({ namespace: "default", name: "web" });

      const outcome = await makeReconciler().ensureLoadBalancer(service);

      expect(outcome).toEqual({
        state: "Bound",
        address: "192.168.1.1",
        status: { ingress: [] },
        allocated: true,
      });
      const bound = stored("default", "web");
      expect(bound?.assignedAddress).toBe("192.168.1.1");
      expect(bound?.labels).toEqual({ implementation: "lb-ipam", "ipam-address": "192.168.1.1" });
      expect(bound?.resourceVersion).toBe(2);
    });

    it("keeps labels the service already had", async () => {
      seedPools({ "cidr-default": "192.168.1.0/30" });
      const service = servicesRepo.createService({ namespace: "default", name: "web", labels: { team: "edge" } });

      await makeReconciler().ensureLoadBalancer(service);

      expect(stored("default", "web")?.labels).toEqual({
        team: "edge",
        implementation: "lb-ipam",
        "ipam-address": "192.168.1.1",
      });
    });

    it("hands out addresses in order until the pool is exhausted", async () => {
      seedPools({ "cidr-default": "192.168.1.0/30" });
      const reconciler = makeReconciler();
      const first = servicesRepo.createService({ namespace: "default", name: "first" });
      const second = servicesRepo.createService({ namespace: "default", name: "second" });
      const third = servicesRepo.createService({ namespace: "default", name: "third" });

      expect((await reconciler.ensureLoadBalancer(first)).address).toBe("192.168.1.1");
      expect((await reconciler.ensureLoadBalancer(second)).address).toBe("192.168.1.2");
      await expect(reconciler.ensureLoadBalancer(third)).rejects.toThrow(PoolExhaustedError);

      const unbound = stored("default", "third");
      expect(unbound?.assignedAddress).toBe("");
      expect(unbound?.labels).toEqual({});
      expect(unbound?.resourceVersion).toBe(1);
    });

    it("does nothing for a service that already has an address", async () => {
      const services = createSqliteServiceStore();
      const list = vi.spyOn(services, "list");
      const update = vi.spyOn(services, "update");
      const service = servicesRepo.createService({
        namespace: "default",
        name: "web",
        assignedAddress: "10.1.1.1",
      });

      const outcome = await makeReconciler({ services }).ensureLoadBalancer(service);

      expect(outcome).toEqual({ state: "Bound", address: "10.1.1.1", status: { ingress: [] }, allocated: false });
      expect(list).not.toHaveBeenCalled();
      expect(update).not.toHaveBeenCalled();
      expect(stored("default", "web")?.resourceVersion).toBe(1);
    });

    it("only counts claims of services it owns", async () => {
      seedPools({ "cidr-default": "192.168.1.0/29" });
      servicesRepo.createService({
        namespace: "default",
        name: "foreign",
        labels: { implementation: "other", "ipam-address": "192.168.1.1" },
      });
      servicesRepo.createService({
        namespace: "default",
        name: "owned",
        labels: { implementation: "lb-ipam", "ipam-address": "192.168.1.2" },
      });
      const service = servicesRepo.createService({ namespace: "default", name: "web" });

      const outcome = await makeReconciler().ensureLoadBalancer(service);

      expect(outcome.address).toBe("192.168.1.1");
    });

    it("only counts claims in the same namespace", async () => {
      seedPools({ "cidr-global": "192.168.1.0/29" });
      servicesRepo.createService({
        namespace: "other",
        name: "web",
        labels: { implementation: "lb-ipam", "ipam-address": "192.168.1.1" },
      });
      const service = servicesRepo.createService({ namespace: "default", name: "web" });

      const outcome = await makeReconciler().ensureLoadBalancer(service);

      expect(outcome.address).toBe("192.168.1.1");
    });

    it("reuses the address of a deleted service", async () => {
      seedPools({ "cidr-default": "192.168.1.0/29" });
      const reconciler = makeReconciler();
      const web = servicesRepo.createService({ namespace: "default", name: "web" });
      await reconciler.ensureLoadBalancer(web);

      const bound = stored("default", "web");
      expect(bound).not.toBeNull();
      if (bound) {
        await reconciler.ensureLoadBalancerDeleted(bound);
      }
      servicesRepo.deleteService("default", "web");

      const api = servicesRepo.createService({ namespace: "default", name: "api" });
      expect((await reconciler.ensureLoadBalancer(api)).address).toBe("192.168.1.1");
    });

    it("fails without binding when no pool is configured", async () => {
      seedPools({ "cidr-other": "10.0.0.0/24" });
      const service = servicesRepo.createService({ namespace: "default", name: "web" });

      await expect(makeReconciler().ensureLoadBalancer(service)).rejects.toThrow(PoolNotFoundError);
      expect(stored("default", "web")?.assignedAddress).toBe("");
    });

    it("fails without binding when the pool is malformed", async () => {
      seedPools({ "cidr-global": "10.0.0.0/33" });
      const service = servicesRepo.createService({ namespace: "default", name: "web" });

      await expect(makeReconciler().ensureLoadBalancer(service)).rejects.toThrow(InvalidPoolError);
      expect(stored("default", "web")?.assignedAddress).toBe("");
    });

    it("creates the configuration document when it is missing", async () => {
      const service = servicesRepo.createService({ namespace: "default", name: "web" });
      const configs = createSqliteConfigDocumentStore({ "range-global": "10.0.0.10-10.0.0.20" });

      const outcome = await makeReconciler({ configs }).ensureLoadBalancer(service);

      expect(outcome.address).toBe("10.0.0.10");
      expect(configDocumentsRepo.getConfigDocument(CONFIG_NAME, CONFIG_NAMESPACE)).toEqual({
        "range-global": "10.0.0.10-10.0.0.20",
      });
    });

    it("creates an empty document and reports no pool when there is nothing to seed", async () => {
      const service = servicesRepo.createService({ namespace: "default", name: "web" });

      await expect(makeReconciler().ensureLoadBalancer(service)).rejects.toThrow(PoolNotFoundError);
      expect(configDocumentsRepo.getConfigDocument(CONFIG_NAME, CONFIG_NAMESPACE)).toEqual({});
    });
  });

  describe("persisting", () => {
    beforeEach(() => {
      seedPools({ "cidr-default": "192.168.1.0/29" });
    });

    it("re-reads and retries after a conflicting write", async () => {
      const services = createSqliteServiceStore();
      const realUpdate = services.update.bind(services);
      let competingWrites = 0;
      const update = vi.spyOn(services, "update").mockImplementation(async (svc) => {
        if (competingWrites === 0) {
          competingWrites++;
          // Another writer touches the service between our read and write
          const current = servicesRepo.getServiceByName(svc.namespace, svc.name);
          if (current) {
            servicesRepo.updateService({ ...current, labels: { ...current.labels, team: "edge" } });
          }
        }
        return realUpdate(svc);
      });
      const get = vi.spyOn(services, "get");
      const service = servicesRepo.createService({ namespace: "default", name: "web" });

      const outcome = await makeReconciler({ services }).ensureLoadBalancer(service);

      expect(outcome.address).toBe("192.168.1.1");
      expect(update).toHaveBeenCalledTimes(2);
      // Once on entry, then once per persist attempt
      expect(get).toHaveBeenCalledTimes(3);

      const bound = stored("default", "web");
      expect(bound?.assignedAddress).toBe("192.168.1.1");
      expect(bound?.labels).toEqual({ team: "edge", implementation: "lb-ipam", "ipam-address": "192.168.1.1" });
      expect(bound?.resourceVersion).toBe(3);
      expect(servicesRepo.listServices("default", "implementation=lb-ipam")).toHaveLength(1);
    });

    it("surfaces a persistence failure once the retry budget is spent", async () => {
      const services = createSqliteServiceStore();
      const update = vi.spyOn(services, "update").mockImplementation(async (svc) => {
        throw new VersionConflictError(svc.namespace, svc.name, svc.resourceVersion);
      });
      const service = servicesRepo.createService({ namespace: "default", name: "web" });

      const error = await makeReconciler({ services })
        .ensureLoadBalancer(service)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(PersistenceError);
      expect(error instanceof PersistenceError && error.cause).toBeInstanceOf(VersionConflictError);
      expect(update).toHaveBeenCalledTimes(3);
      expect(stored("default", "web")?.assignedAddress).toBe("");
    });

    it("propagates store errors without retrying", async () => {
      const services = createSqliteServiceStore();
      const update = vi.spyOn(services, "update").mockRejectedValue(new Error("connection refused"));
      const service = servicesRepo.createService({ namespace: "default", name: "web" });

      await expect(makeReconciler({ services }).ensureLoadBalancer(service)).rejects.toThrow("connection refused");
      expect(update).toHaveBeenCalledTimes(1);
    });

    it("propagates listing errors", async () => {
      const services = createSqliteServiceStore();
      vi.spyOn(services, "list").mockRejectedValue(new Error("store offline"));
      const service = servicesRepo.createService({ namespace: "default", name: "web" });

      await expect(makeReconciler({ services }).ensureLoadBalancer(service)).rejects.toThrow("store offline");
    });

    it("keeps an address bound by a concurrent reconciliation of the same service", async () => {
      const reconciler = makeReconciler();
      const service = servicesRepo.createService({ namespace: "default", name: "web" });

      const [first, second] = await Promise.all([
        reconciler.ensureLoadBalancer(service),
        reconciler.ensureLoadBalancer(service),
      ]);

      expect(first).toMatchObject({ address: "192.168.1.1", allocated: true });
      expect(second).toMatchObject({ address: "192.168.1.1", allocated: false });
      expect(stored("default", "web")?.resourceVersion).toBe(2);
    });
  });

  describe("queued reconciliations", () => {
    it("does not allocate again for a service bound while it waited", async () => {
      seedPools({ "cidr-default": "192.168.1.0/30" });
      const reconciler = makeReconciler();
      const first = servicesRepo.createService({ namespace: "default", name: "first" });
      await reconciler.ensureLoadBalancer(first);
      const web = servicesRepo.createService({ namespace: "default", name: "web" });

      // Both events carry the unbound record; only .2 is left in the pool
      const results = await Promise.allSettled([
        reconciler.ensureLoadBalancer(web),
        reconciler.ensureLoadBalancer(web),
      ]);

      expect(results.map((r) => r.status)).toEqual(["fulfilled", "fulfilled"]);
      const outcomes = results.map((r) => (r.status === "fulfilled" ? r.value : null));
      expect(outcomes[0]).toMatchObject({ address: "192.168.1.2", allocated: true });
      expect(outcomes[1]).toMatchObject({ address: "192.168.1.2", allocated: false });
      expect(stored("default", "web")?.resourceVersion).toBe(2);
    });
  });

  describe("cancellation", () => {
    beforeEach(() => {
      seedPools({ "cidr-default": "192.168.1.0/29" });
    });

    it("does not start when already cancelled", async () => {
      const services = createSqliteServiceStore();
      const list = vi.spyOn(services, "list");
      const controller = new AbortController();
      controller.abort();
      const service = servicesRepo.createService({ namespace: "default", name: "web" });

      await expect(makeReconciler({ services }).ensureLoadBalancer(service, controller.signal)).rejects.toThrow(
        ReconcileAbortedError
      );
      expect(list).not.toHaveBeenCalled();
    });

    it("keeps pool errors that happen after cancellation", async () => {
      seedPools({ "cidr-default": "192.168.1.0/29" });
      const services = createSqliteServiceStore();
      const controller = new AbortController();
      const configs = createSqliteConfigDocumentStore();
      vi.spyOn(configs, "getDocument").mockImplementation(async () => {
        controller.abort();
        return {};
      });
      const service = servicesRepo.createService({ namespace: "other", name: "web" });

      await expect(
        makeReconciler({ services, configs }).ensureLoadBalancer(service, controller.signal)
      ).rejects.toThrow(PoolNotFoundError);
    });

    it("abandons the retry loop without writing", async () => {
      const services = createSqliteServiceStore();
      const controller = new AbortController();
      const update = vi.spyOn(services, "update").mockImplementation(async (svc) => {
        controller.abort();
        throw new VersionConflictError(svc.namespace, svc.name, svc.resourceVersion);
      });
      const service = servicesRepo.createService({ namespace: "default", name: "web" });
      const reconciler = makeReconciler(
        { services },
        { retry: { steps: 5, durationMs: 60_000, factor: 1, jitter: 0 } }
      );

      await expect(reconciler.ensureLoadBalancer(service, controller.signal)).rejects.toThrow(ReconcileAbortedError);
      expect(update).toHaveBeenCalledTimes(1);

      const unbound = stored("default", "web");
      expect(unbound?.assignedAddress).toBe("");
      expect(unbound?.resourceVersion).toBe(1);
    });
  });

  describe("concurrency", () => {
    beforeEach(() => {
      seedPools({ "cidr-default": "192.168.1.0/29" });
    });

    it("gives concurrent services in one namespace distinct addresses", async () => {
      const reconciler = makeReconciler();
      const web = servicesRepo.createService({ namespace: "default", name: "web" });
      const api = servicesRepo.createService({ namespace: "default", name: "api" });

      const outcomes = await Promise.all([reconciler.ensureLoadBalancer(web), reconciler.ensureLoadBalancer(api)]);

      expect(outcomes.map((o) => o.address)).toEqual(["192.168.1.1", "192.168.1.2"]);
    });

    it("can hand out one address twice when namespace serialization is off", async () => {
      const reconciler = makeReconciler({}, { serializeByNamespace: false });
      const web = servicesRepo.createService({ namespace: "default", name: "web" });
      const api = servicesRepo.createService({ namespace: "default", name: "api" });

      const outcomes = await Promise.all([reconciler.ensureLoadBalancer(web), reconciler.ensureLoadBalancer(api)]);

      expect(outcomes.map((o) => o.address)).toEqual(["192.168.1.1", "192.168.1.1"]);
    });
  });

  describe("load balancer lookups", () => {
    const service: ServiceRequest = {
      uid: "123e4567-e89b-12d3-a456-426614174000",
      namespace: "default",
      name: "web",
      labels: { implementation: "lb-ipam", "ipam-address": "10.0.0.1" },
      assignedAddress: "10.0.0.1",
      status: { ingress: [{ ip: "10.0.0.1" }] },
      resourceVersion: 2,
      createdAt: "2026-01-01T00:00:00.000Z",
      updatedAt: "2026-01-01T00:00:00.000Z",
    };

    it("derives the load balancer name from the uid", () => {
      expect(makeReconciler().getLoadBalancerName(service)).toBe("a123e4567e89b12d3a45642661417400");
    });

    it("reports services it owns", () => {
      expect(makeReconciler().getLoadBalancer(service)).toEqual({
        name: "a123e4567e89b12d3a45642661417400",
        exists: true,
        status: { ingress: [{ ip: "10.0.0.1" }] },
      });
    });

    it("does not report services owned by another allocator", () => {
      const foreign = { ...service, labels: { implementation: "other" } };
      expect(makeReconciler().getLoadBalancer(foreign)).toEqual({
        name: "a123e4567e89b12d3a45642661417400",
        exists: false,
      });
    });

    it("only logs on deletion", async () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const services = createSqliteServiceStore();
      const update = vi.spyOn(services, "update");

      await makeReconciler({ services }).ensureLoadBalancerDeleted(service);

      expect(log).toHaveBeenCalledWith("deleting service 'web' (123e4567-e89b-12d3-a456-426614174000)");
      expect(update).not.toHaveBeenCalled();
    });
  });

  describe("describePool", () => {
    it("reports capacity, claims and the next free address", async () => {
      seedPools({ "cidr-default": "192.168.1.0/29" });
      servicesRepo.createService({
        namespace: "default",
        name: "web",
        labels: { implementation: "lb-ipam", "ipam-address": "192.168.1.1" },
        assignedAddress: "192.168.1.1",
      });

      await expect(makeReconciler().describePool("default")).resolves.toEqual({
        namespace: "default",
        key: "cidr-default",
        pool: { kind: "cidr", cidr: "192.168.1.0/29" },
        capacity: 6,
        claimed: 1,
        nextAvailable: "192.168.1.2",
      });
    });

    it("fails when no pool governs the namespace", async () => {
      seedPools({});
      await expect(makeReconciler().describePool("default")).rejects.toThrow(PoolNotFoundError);
    });
  });
});
