export type IpamErrorCode =
  | "POOL_NOT_FOUND"
  | "INVALID_POOL"
  | "POOL_EXHAUSTED"
  | "VERSION_CONFLICT"
  | "PERSISTENCE_FAILED"
  | "SERVICE_NOT_FOUND"
  | "SERVICE_EXISTS"
  | "RECONCILE_ABORTED";

export class IpamError extends Error {
  readonly code: IpamErrorCode;

  constructor(code: IpamErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IpamError";
    this.code = code;
  }
}

export class PoolNotFoundError extends IpamError {
  constructor(namespace: string) {
    super(
      "POOL_NOT_FOUND",
      `no IP address pool is configured for namespace [${namespace}]: checked cidr-${namespace}, cidr-global, range-${namespace} and range-global`
    );
    this.name = "PoolNotFoundError";
  }
}

export class InvalidPoolError extends IpamError {
  constructor(message: string) {
    super("INVALID_POOL", message);
    this.name = "InvalidPoolError";
  }
}

export class PoolExhaustedError extends IpamError {
  constructor(pool: string) {
    super("POOL_EXHAUSTED", `no addresses available in pool [${pool}]`);
    this.name = "PoolExhaustedError";
  }
}

export class VersionConflictError extends IpamError {
  constructor(namespace: string, name: string, expectedVersion: number) {
    super(
      "VERSION_CONFLICT",
      `service [${namespace}/${name}] was modified since version ${expectedVersion}`
    );
    this.name = "VersionConflictError";
  }
}

export class PersistenceError extends IpamError {
  constructor(message: string, cause?: unknown) {
    super("PERSISTENCE_FAILED", message, { cause });
    this.name = "PersistenceError";
  }
}

export class ServiceNotFoundError extends IpamError {
  constructor(namespace: string, name: string) {
    super("SERVICE_NOT_FOUND", `service [${namespace}/${name}] not found`);
    this.name = "ServiceNotFoundError";
  }
}

export class ServiceExistsError extends IpamError {
  constructor(namespace: string, name: string) {
    super("SERVICE_EXISTS", `service [${namespace}/${name}] already exists`);
    this.name = "ServiceExistsError";
  }
}

export class ReconcileAbortedError extends IpamError {
  constructor(namespace: string, name: string, cause?: unknown) {
    super("RECONCILE_ABORTED", `reconciliation of service [${namespace}/${name}] was cancelled`, { cause });
    this.name = "ReconcileAbortedError";
  }
}

export function isIpamError(err: unknown): err is IpamError {
  return err instanceof IpamError;
}
