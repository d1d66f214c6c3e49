import type {
  LoadBalancerLookup,
  PoolDescription,
  ReconcileOutcome,
  ServiceRequest,
} from "@lb-ipam/shared";

export interface ApiClientConfig {
  baseUrl: string;
  fetch?: typeof fetch;
}

export interface CreateServiceInput {
  name: string;
  labels?: Record<string, string>;
  assignedAddress?: string;
}

export class ApiError extends Error {
  readonly status: number;
  readonly code?: string;

  constructor(message: string, status: number, code?: string) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.code = code;
  }
}

function servicePath(namespace: string, name?: string): string {
  const base = `/namespaces/${encodeURIComponent(namespace)}/services`;
  return name === undefined ? base : `${base}/${encodeURIComponent(name)}`;
}

export class ApiClient {
  private baseUrl: string;
  private fetchImpl: typeof fetch;

  constructor(config: ApiClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.fetchImpl = config.fetch ?? globalThis.fetch.bind(globalThis);
  }

  private async send(method: string, path: string, body?: unknown): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = {};
    if (body) {
      headers["Content-Type"] = "application/json";
    }

    const response = await this.fetchImpl(url, {
      method,
      headers,
      body: body ? JSON.stringify(body) : undefined,
    });

    if (!response.ok) {
      const errorBody = await response.json().catch(() => ({ error: response.statusText })) as { error?: string; code?: string };
      throw new ApiError(errorBody.error || `API error: ${response.status}`, response.status, errorBody.code);
    }

    return response;
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const response = await this.send(method, path, body);
    return response.json() as Promise<T>;
  }

  // Services
  async listServices(namespace: string, labelSelector?: string): Promise<ServiceRequest[]> {
    const query = labelSelector ? `?labelSelector=${encodeURIComponent(labelSelector)}` : "";
    const result = await this.request<{ services: ServiceRequest[] }>("GET", `${servicePath(namespace)}${query}`);
    return result.services;
  }

  async getService(namespace: string, name: string): Promise<ServiceRequest | null> {
    try {
      const result = await this.request<{ service: ServiceRequest }>("GET", servicePath(namespace, name));
      return result.service;
    } catch (error) {
      if (error instanceof ApiError && error.status === 404) {
        return null;
      }
      throw error;
    }
  }

  async createService(namespace: string, input: CreateServiceInput): Promise<ServiceRequest> {
    const result = await this.request<{ service: ServiceRequest }>("POST", servicePath(namespace), input);
    return result.service;
  }

  async deleteService(namespace: string, name: string): Promise<void> {
    await this.send("DELETE", servicePath(namespace, name));
  }

  // Load balancers
  async ensureLoadBalancer(namespace: string, name: string): Promise<ReconcileOutcome> {
    const result = await this.request<{ outcome: ReconcileOutcome }>(
      "PUT",
      `${servicePath(namespace, name)}/load-balancer`
    );
    return result.outcome;
  }

  async getLoadBalancer(namespace: string, name: string): Promise<LoadBalancerLookup> {
    const result = await this.request<{ loadBalancer: LoadBalancerLookup }>(
      "GET",
      `${servicePath(namespace, name)}/load-balancer`
    );
    return result.loadBalancer;
  }

  // Pools
  async describePool(namespace: string): Promise<PoolDescription> {
    const result = await this.request<{ pool: PoolDescription }>(
      "GET",
      `/namespaces/${encodeURIComponent(namespace)}/pool`
    );
    return result.pool;
  }

  // Health
  async health(): Promise<{ status: string }> {
    return this.request<{ status: string }>("GET", "/health");
  }
}

let client: ApiClient | null = null;

export function getApiClient(): ApiClient {
  if (!client) {
    const baseUrl = process.env.API_URL || "http://localhost:3000";
    client = new ApiClient({ baseUrl });
  }
  return client;
}
