import { Command } from "commander";
import chalk from "chalk";
import { getApiClient } from "../api/client.js";
import { formatPool } from "./format.js";

export function registerPoolsCommand(program: Command): void {
  const pools = program.command("pools").description("Inspect address pools");

  pools
    .command("show <namespace>")
    .description("Show the pool that governs a namespace")
    .action(async (namespace: string) => {
      try {
        const api = getApiClient();
        const pool = await api.describePool(namespace);

        console.log();
        for (const line of formatPool(pool)) {
          console.log(line);
        }
        console.log();
      } catch (error) {
        console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
