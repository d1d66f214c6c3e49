#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import chalk from "chalk";
import { getApiClient } from "./api/client.js";
import { registerServicesCommand } from "./commands/services.js";
import { registerPoolsCommand } from "./commands/pools.js";

const program = new Command();

program
  .name("lbctl")
  .description("CLI for load balancer address allocation")
  .version("0.1.0")
  .option("--api-url <url>", "API URL", process.env.API_URL || "http://localhost:3000");

// Health check command
program
  .command("health")
  .description("Check API health")
  .action(async () => {
    try {
      const api = getApiClient();
      const result = await api.health();
      console.log(chalk.green("✓ API is healthy"));
      console.log(chalk.gray(`  Status: ${result.status}`));
    } catch (error) {
      console.error(chalk.red("✖ API is not reachable"));
      console.error(chalk.gray(`  ${error instanceof Error ? error.message : error}`));
      process.exit(1);
    }
  });

// Register command groups
registerServicesCommand(program);
registerPoolsCommand(program);

// Parse and handle global options
program.hook("preAction", (thisCommand) => {
  const opts = thisCommand.opts<{ apiUrl?: string }>();
  if (opts.apiUrl) {
    process.env.API_URL = opts.apiUrl;
  }
});

// Error handling
program.exitOverride((err) => {
  if (err.code === "commander.helpDisplayed" || err.code === "commander.version") {
    process.exit(0);
  }
  process.exit(1);
});

void program.parseAsync();
