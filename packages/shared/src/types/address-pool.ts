/**
 * An address pool, either a CIDR block or an inclusive start-end range
 */
export type PoolDefinition =
  | { kind: "cidr"; cidr: string }
  | { kind: "range"; start: string; end: string };

export type PoolKind = PoolDefinition["kind"];

/**
 * Pool definitions keyed by `cidr-<namespace>`, `cidr-global`,
 * `range-<namespace>` or `range-global`
 */
export type ConfigurationSnapshot = Readonly<Record<string, string>>;

/**
 * Addresses already claimed by other services in a namespace
 */
export type ClaimSet = ReadonlySet<string>;

/**
 * A pool together with the configuration key it was found under
 */
export interface ResolvedPool {
  key: string;
  pool: PoolDefinition;
}

/**
 * Pool utilization for a namespace
 */
export interface PoolDescription {
  namespace: string;
  key: string;
  pool: PoolDefinition;
  capacity: number;
  claimed: number;
  nextAvailable: string | null;
}
