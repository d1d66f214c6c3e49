import type { ClaimSet, PoolDefinition } from "@lb-ipam/shared";
import { InvalidPoolError, PoolExhaustedError } from "./errors.js";
import { formatIPv4, parseIPv4, parseIPv4Cidr } from "../utils/ipv4.js";

/**
 * Inclusive bounds of the usable addresses in a pool
 */
interface UsableSpan {
  first: number;
  last: number;
}

function cidrSpan(cidr: string): UsableSpan {
  const block = parseIPv4Cidr(cidr);
  if (!block) {
    throw new InvalidPoolError(`unable to parse CIDR block [${cidr}]`);
  }

  // /31 and /32 have no network or broadcast address
  if (block.prefix >= 31) {
    return { first: block.network, last: block.broadcast };
  }

  const span = { first: block.network + 1, last: block.broadcast - 1 };
  if (span.first > span.last) {
    throw new InvalidPoolError(`CIDR block [${cidr}] has no usable host addresses`);
  }
  return span;
}

function rangeSpan(start: string, end: string): UsableSpan {
  const first = parseIPv4(start);
  if (first === null) {
    throw new InvalidPoolError(`unable to parse range start address [${start}]`);
  }
  const last = parseIPv4(end);
  if (last === null) {
    throw new InvalidPoolError(`unable to parse range end address [${end}]`);
  }
  if (first > last) {
    throw new InvalidPoolError(`range start [${start}] is after range end [${end}]`);
  }
  return { first, last };
}

function poolSpan(pool: PoolDefinition): UsableSpan {
  switch (pool.kind) {
    case "cidr":
      return cidrSpan(pool.cidr);
    case "range":
      return rangeSpan(pool.start, pool.end);
  }
}

export function describePoolDefinition(pool: PoolDefinition): string {
  switch (pool.kind) {
    case "cidr":
      return pool.cidr;
    case "range":
      return `${pool.start}-${pool.end}`;
  }
}

/**
 * Claimed addresses as numbers. Values that are not IPv4 addresses,
 * such as an empty label, never match a candidate and are dropped.
 */
function claimedValues(claims: ClaimSet): Set<number> {
  const values = new Set<number>();
  for (const claim of claims) {
    const value = parseIPv4(claim);
    if (value !== null) {
      values.add(value);
    }
  }
  return values;
}

/**
 * Find the lowest address in the span that is not claimed.
 * Each step past a candidate consumes one claim, so the scan is bounded
 * by the size of the claim set rather than the size of the pool.
 */
function firstFree(span: UsableSpan, claimed: Set<number>): number | null {
  let candidate = span.first;
  while (candidate <= span.last && claimed.has(candidate)) {
    candidate++;
  }
  return candidate <= span.last ? candidate : null;
}

function allocateFromSpan(span: UsableSpan, claims: ClaimSet, label: string): string {
  const address = firstFree(span, claimedValues(claims));
  if (address === null) {
    throw new PoolExhaustedError(label);
  }
  return formatIPv4(address);
}

/**
 * Return the first unclaimed host address of a CIDR block,
 * excluding the network and broadcast addresses
 */
export function allocateFromCidr(cidr: string, claims: ClaimSet): string {
  return allocateFromSpan(cidrSpan(cidr), claims, cidr);
}

/**
 * Return the first unclaimed address between start and end inclusive
 */
export function allocateFromRange(start: string, end: string, claims: ClaimSet): string {
  return allocateFromSpan(rangeSpan(start, end), claims, `${start}-${end}`);
}

/**
 * Allocate the lowest free address of a pool.
 * The result depends only on the pool and the claim set.
 */
export function allocateAddress(pool: PoolDefinition, claims: ClaimSet): string {
  switch (pool.kind) {
    case "cidr":
      return allocateFromCidr(pool.cidr, claims);
    case "range":
      return allocateFromRange(pool.start, pool.end, claims);
  }
}

/**
 * Number of usable addresses in a pool
 */
export function poolCapacity(pool: PoolDefinition): number {
  const span = poolSpan(pool);
  return span.last - span.first + 1;
}

/**
 * Count the claims that fall inside a pool's usable addresses
 */
export function countClaimsInPool(pool: PoolDefinition, claims: ClaimSet): number {
  const span = poolSpan(pool);
  let count = 0;
  for (const value of claimedValues(claims)) {
    if (value >= span.first && value <= span.last) {
      count++;
    }
  }
  return count;
}

/**
 * Lowest free address of a pool, or null when the pool is exhausted
 */
export function peekNextAddress(pool: PoolDefinition, claims: ClaimSet): string | null {
  const address = firstFree(poolSpan(pool), claimedValues(claims));
  return address === null ? null : formatIPv4(address);
}
