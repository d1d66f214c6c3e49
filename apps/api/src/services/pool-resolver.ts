import type { ConfigurationSnapshot, PoolDefinition, PoolKind, ResolvedPool } from "@lb-ipam/shared";

export const GLOBAL_POOL_SCOPE = "global";

export function poolKey(kind: PoolKind, scope: string): string {
  return `${kind}-${scope}`;
}

/**
 * Parse a configuration entry into a pool definition.
 * Range entries are written "<start>-<end>"; a missing bound is left
 * empty and rejected by the allocator.
 */
export function parsePoolEntry(kind: PoolKind, text: string): PoolDefinition {
  if (kind === "cidr") {
    return { kind: "cidr", cidr: text.trim() };
  }

  const separator = text.indexOf("-");
  if (separator === -1) {
    return { kind: "range", start: text.trim(), end: "" };
  }
  return {
    kind: "range",
    start: text.slice(0, separator).trim(),
    end: text.slice(separator + 1).trim(),
  };
}

/**
 * Find the pool governing a namespace.
 *
 * Lookup order is cidr-<namespace>, cidr-global, range-<namespace>,
 * range-global; the first key present wins. CIDR configuration always
 * takes precedence over range configuration.
 */
export function resolvePool(namespace: string, snapshot: ConfigurationSnapshot): ResolvedPool | null {
  const kinds: PoolKind[] = ["cidr", "range"];
  const scopes = namespace === GLOBAL_POOL_SCOPE ? [GLOBAL_POOL_SCOPE] : [namespace, GLOBAL_POOL_SCOPE];

  for (const kind of kinds) {
    for (const scope of scopes) {
      const key = poolKey(kind, scope);
      const entry = Object.hasOwn(snapshot, key) ? snapshot[key] : undefined;

      if (entry === undefined) {
        if (scope === GLOBAL_POOL_SCOPE) {
          console.log(`no global ${kind} config exists [${key}]`);
        } else {
          console.log(`no ${kind} config for namespace [${namespace}] exists in key [${key}]`);
        }
        continue;
      }

      console.log(`Taking address from [${key}] pool`);
      return { key, pool: parsePoolEntry(kind, entry) };
    }
  }

  return null;
}
