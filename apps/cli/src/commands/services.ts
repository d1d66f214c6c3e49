import { Command } from "commander";
import chalk from "chalk";
import { getApiClient } from "../api/client.js";
import { formatService } from "./format.js";

function printLines(lines: string[]): void {
  console.log();
  for (const line of lines) {
    console.log(line);
  }
}

function fail(error: unknown): never {
  console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
  process.exit(1);
}

export function registerServicesCommand(program: Command): void {
  const services = program
    .command("services")
    .alias("svc")
    .description("Manage load balancer services");

  // List services
  services
    .command("list <namespace>")
    .alias("ls")
    .description("List services in a namespace")
    .option("-l, --selector <selector>", "Label selector, e.g. implementation=lb-ipam")
    .option("-v, --verbose", "Show detailed information")
    .action(async (namespace: string, options: { selector?: string; verbose?: boolean }) => {
      try {
        const api = getApiClient();
        const serviceList = await api.listServices(namespace, options.selector);

        if (serviceList.length === 0) {
          console.log(chalk.yellow("No services found"));
          return;
        }

        console.log(chalk.bold(`\nServices (${serviceList.length}):`));
        for (const service of serviceList) {
          printLines(formatService(service, options.verbose));
        }
        console.log();
      } catch (error) {
        fail(error);
      }
    });

  // Get service info
  services
    .command("info <namespace> <name>")
    .description("Get detailed service information")
    .action(async (namespace: string, name: string) => {
      try {
        const api = getApiClient();
        const service = await api.getService(namespace, name);

        if (!service) {
          console.error(chalk.red(`Service not found: ${namespace}/${name}`));
          process.exit(1);
        }

        printLines(formatService(service, true));
        const loadBalancer = await api.getLoadBalancer(namespace, name);
        console.log(`  LB name:   ${loadBalancer.name}${loadBalancer.exists ? "" : chalk.gray(" (not managed)")}`);
        console.log();
      } catch (error) {
        fail(error);
      }
    });

  // Register service
  services
    .command("create <namespace> <name>")
    .description("Register a load balancer service")
    .option("-r, --reconcile", "Allocate an address right away")
    .action(async (namespace: string, name: string, options: { reconcile?: boolean }) => {
      try {
        const api = getApiClient();
        const service = await api.createService(namespace, { name });
        console.log(chalk.green("\n✓ Service created"));
        printLines(formatService(service));

        if (options.reconcile) {
          const outcome = await api.ensureLoadBalancer(namespace, name);
          console.log(chalk.green(`\n✓ Bound to ${outcome.address}`));
        }
        console.log();
      } catch (error) {
        fail(error);
      }
    });

  // Reconcile service
  services
    .command("reconcile <namespace> <name>")
    .alias("ensure")
    .description("Ensure a service has a load balancer address")
    .action(async (namespace: string, name: string) => {
      try {
        const api = getApiClient();
        const outcome = await api.ensureLoadBalancer(namespace, name);

        if (outcome.allocated) {
          console.log(chalk.green(`✓ Allocated ${outcome.address} to ${namespace}/${name}`));
        } else {
          console.log(chalk.blue(`Already bound to ${outcome.address}`));
        }
      } catch (error) {
        fail(error);
      }
    });

  // Delete service
  services
    .command("delete <namespace> <name>")
    .alias("rm")
    .description("Delete a service, releasing its address")
    .action(async (namespace: string, name: string) => {
      try {
        const api = getApiClient();
        await api.deleteService(namespace, name);
        console.log(chalk.green(`✓ Deleted ${namespace}/${name}`));
      } catch (error) {
        fail(error);
      }
    });
}
