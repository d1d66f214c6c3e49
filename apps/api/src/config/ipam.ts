import { readFileSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
const CONFIG_FILE = join(__dirname, "../../../../config/ipam.yaml");

const PoolKeySchema = z.string().regex(/^(cidr|range)-[a-z0-9]([-a-z0-9]*[a-z0-9])?$/, {
  message: "Pool keys must be cidr-<namespace> or range-<namespace>",
});

const RetrySchema = z.object({
  steps: z.number().int().min(1).default(5),
  durationMs: z.number().int().min(0).default(10),
  factor: z.number().min(1).default(1.0),
  jitter: z.number().min(0).default(0.1),
});

const IpamConfigSchema = z.object({
  allocatorId: z.string().min(1).default("lb-ipam"),
  configDocument: z
    .object({
      name: z.string().min(1).default("lb-ipam"),
      namespace: z.string().min(1).default("ipam-system"),
    })
    .default({}),
  retry: RetrySchema.default({}),
  serializeByNamespace: z.boolean().default(true),
  reconcileTimeoutMs: z.number().int().positive().default(30000),
  /** Written into the configuration document when it is first created */
  seedPools: z.record(PoolKeySchema, z.string().min(1)).default({}),
});

export type IpamConfig = z.infer<typeof IpamConfigSchema>;

type Env = Record<string, string | undefined>;

function envInt(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value === "") {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function readConfigFile(configFile: string): unknown {
  if (!existsSync(configFile)) {
    return {};
  }

  try {
    const content = readFileSync(configFile, "utf-8");
    // An empty file loads as undefined
    return yaml.load(content) ?? {};
  } catch (error) {
    console.warn(`Failed to load ${configFile}, using environment config:`, error);
  }
  return {};
}

/**
 * Build the IPAM configuration from the YAML file and the environment.
 * Environment variables take precedence over the file.
 */
export function loadIpamConfig(configFile: string = CONFIG_FILE, env: Env = process.env): IpamConfig {
  const fileResult = IpamConfigSchema.safeParse(readConfigFile(configFile));
  if (!fileResult.success) {
    console.warn(`Invalid ${configFile}, using defaults:`, fileResult.error.issues);
  }
  const config = fileResult.success ? fileResult.data : IpamConfigSchema.parse({});

  if (env.IPAM_ALLOCATOR_ID) {
    config.allocatorId = env.IPAM_ALLOCATOR_ID;
  }
  if (env.IPAM_CONFIG_NAME) {
    config.configDocument.name = env.IPAM_CONFIG_NAME;
  }
  if (env.IPAM_CONFIG_NAMESPACE) {
    config.configDocument.namespace = env.IPAM_CONFIG_NAMESPACE;
  }

  const steps = envInt(env, "IPAM_RETRY_STEPS");
  if (steps !== undefined && steps >= 1) {
    config.retry.steps = steps;
  }
  const durationMs = envInt(env, "IPAM_RETRY_DURATION_MS");
  if (durationMs !== undefined && durationMs >= 0) {
    config.retry.durationMs = durationMs;
  }
  const timeoutMs = envInt(env, "IPAM_RECONCILE_TIMEOUT_MS");
  if (timeoutMs !== undefined && timeoutMs > 0) {
    config.reconcileTimeoutMs = timeoutMs;
  }

  if (env.IPAM_SERIALIZE_BY_NAMESPACE !== undefined) {
    config.serializeByNamespace = env.IPAM_SERIALIZE_BY_NAMESPACE !== "false";
  }

  return config;
}

let cachedConfig: IpamConfig | null = null;

/**
 * Get the IPAM configuration
 */
export function getIpamConfig(): IpamConfig {
  if (!cachedConfig) {
    cachedConfig = loadIpamConfig();
    console.log("Loaded IPAM configuration");
  }
  return cachedConfig;
}

/**
 * Reload IPAM configuration from disk
 */
export function reloadIpamConfig(): void {
  cachedConfig = loadIpamConfig();
}
