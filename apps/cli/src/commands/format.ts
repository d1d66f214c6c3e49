import chalk from "chalk";
import { IMPLEMENTATION_LABEL, type PoolDescription, type ServiceRequest } from "@lb-ipam/shared";

export function formatAddress(service: ServiceRequest): string {
  if (service.assignedAddress === "") {
    return chalk.gray("◌ unbound");
  }
  return chalk.green(`● ${service.assignedAddress}`);
}

export function formatService(service: ServiceRequest, verbose = false): string[] {
  const lines = [
    `${chalk.bold(service.name)} ${chalk.gray(`(${service.uid})`)}`,
    `  Namespace: ${service.namespace}`,
    `  Address:   ${formatAddress(service)}`,
  ];

  const owner = service.labels[IMPLEMENTATION_LABEL];
  if (owner) {
    lines.push(`  Managed:   ${owner}`);
  }

  if (verbose) {
    lines.push(`  Version:   ${service.resourceVersion}`);
    lines.push(`  Created:   ${service.createdAt}`);
    const labels = Object.entries(service.labels);
    if (labels.length > 0) {
      lines.push("  Labels:");
      for (const [key, value] of labels) {
        lines.push(`    ${key}=${value}`);
      }
    }
  }

  return lines;
}

export function formatPool(pool: PoolDescription): string[] {
  const definition =
    pool.pool.kind === "cidr" ? pool.pool.cidr : `${pool.pool.start}-${pool.pool.end}`;

  return [
    `${chalk.bold(pool.key)} ${chalk.gray(`(${pool.pool.kind})`)}`,
    `  Pool:      ${definition}`,
    `  Capacity:  ${pool.capacity}`,
    `  Claimed:   ${pool.claimed}`,
    `  Next:      ${pool.nextAvailable ?? chalk.red("exhausted")}`,
  ];
}
