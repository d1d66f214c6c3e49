/**
 * Label marking a service as managed by an allocator
 */
export const IMPLEMENTATION_LABEL = "implementation";

/**
 * Label recording the address claimed by a service
 */
export const IPAM_ADDRESS_LABEL = "ipam-address";

export interface LoadBalancerIngress {
  ip?: string;
  hostname?: string;
}

/**
 * Load balancer status as reported back to the host runtime
 */
export interface LoadBalancerStatus {
  ingress: LoadBalancerIngress[];
}

/**
 * A load-balancer service record held by the request store
 */
export interface ServiceRequest {
  uid: string;
  namespace: string;
  name: string;
  labels: Record<string, string>;
  /** Empty until an address has been bound */
  assignedAddress: string;
  status: LoadBalancerStatus;
  /** Incremented by every committed write */
  resourceVersion: number;
  createdAt: string;
  updatedAt: string;
}

/**
 * Input for registering a service record
 */
export interface CreateServiceInput {
  namespace: string;
  name: string;
  labels?: Record<string, string>;
  assignedAddress?: string;
}

export type ReconcileState =
  | "Unbound"
  | "Resolving"
  | "Allocating"
  | "Persisting"
  | "Bound"
  | "Failed";

/**
 * Result of a successful reconciliation
 */
export interface ReconcileOutcome {
  state: "Bound";
  address: string;
  status: LoadBalancerStatus;
  /** False when the service was already bound and nothing was written */
  allocated: boolean;
}

export interface LoadBalancerLookup {
  name: string;
  exists: boolean;
  status?: LoadBalancerStatus;
}
