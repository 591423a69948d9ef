import { readFileSync, existsSync } from "node:fs";
import { join, dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import { z } from "zod";
import { ipToInt, isValidIpv4 } from "../services/address.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const DEFAULT_CONFIG_PATH = join(__dirname, "../../../../config/hunter.yaml");

const Ipv4Schema = z.string().refine(isValidIpv4, { message: "Invalid IPv4 address" });

const AddressRangeSchema = z
  .object({
    start: Ipv4Schema,
    end: Ipv4Schema,
  })
  .refine((range) => (ipToInt(range.start) ?? 0) <= (ipToInt(range.end) ?? 0), {
    message: "Range start must not be greater than range end",
  });

const HuntSchema = z.object({
  maxConcurrent: z.number().int().positive(),
  maxAttempts: z.number().int().positive(),
  spawnIntervalMs: z.number().int().min(0),
  /** Seconds between port polls */
  pollInterval: z.number().positive(),
  /** Seconds a single port may wait for an address */
  ipWaitTimeout: z.number().positive(),
  /** Seconds for the whole hunt, 0 disables the deadline */
  huntTimeout: z.number().min(0),
  /** Pause between detach and delete during teardown */
  settleDelayMs: z.number().int().min(0),
});

const RetrySchema = z.object({
  maxRetries: z.number().int().min(0),
  backoffFactorMs: z.number().int().min(0),
  maxBackoffMs: z.number().int().min(0),
});

const HunterConfigSchema = z.object({
  cloud: z.object({
    authToken: z.string().min(1, "CLOUD_AUTH_TOKEN is not set"),
    projectId: z.string().optional(),
    networkUrl: z.string().url("NETWORK_API_URL must be a URL"),
    computeUrl: z.string().url("COMPUTE_API_URL must be a URL"),
    /** Seconds per request */
    requestTimeout: z.number().positive(),
  }),
  instanceId: z.string().min(1, "VM_ID is not set"),
  networkId: z.string().min(1, "EXTERNAL_NETWORK_ID is not set"),
  protectedAddress: Ipv4Schema,
  ranges: z.array(AddressRangeSchema).min(1),
  hunt: HuntSchema,
  retry: RetrySchema,
  telegram: z.object({
    botToken: z.string().optional(),
    chatId: z.string().optional(),
  }),
  log: z.object({
    level: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]),
    file: z.string().optional(),
  }),
});

/** Sections of the YAML file that override the environment */
const FileConfigSchema = z.object({
  ranges: z.array(AddressRangeSchema).min(1).optional(),
  hunt: HuntSchema.partial().optional(),
  retry: RetrySchema.partial().optional(),
});

export type HunterConfig = z.infer<typeof HunterConfigSchema>;

type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

function numberFrom(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  return Number(value);
}

function optional(value: string | undefined): string | undefined {
  return value && value.trim() !== "" ? value.trim() : undefined;
}

function readFileConfig(path: string): z.infer<typeof FileConfigSchema> {
  const content = readFileSync(path, "utf-8");
  const parsed = FileConfigSchema.safeParse(yaml.load(content) ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${path}: ${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Build the configuration from environment variables and the optional YAML file.
 * Throws ConfigError listing every problem found.
 */
export function loadHunterConfig(env: Env = process.env): HunterConfig {
  const raw = {
    cloud: {
      authToken: env.CLOUD_AUTH_TOKEN ?? "",
      projectId: optional(env.CLOUD_PROJECT_ID),
      networkUrl: env.NETWORK_API_URL ?? "",
      computeUrl: env.COMPUTE_API_URL ?? "",
      requestTimeout: numberFrom(env.REQUEST_TIMEOUT, 30),
    },
    instanceId: env.VM_ID ?? "",
    networkId: env.EXTERNAL_NETWORK_ID ?? "ext-net",
    protectedAddress: env.SAFE_IP ?? "",
    ranges: [
      {
        start: env.IP_RANGE_1_START ?? "95.163.248.10",
        end: env.IP_RANGE_1_END ?? "95.163.251.250",
      },
      {
        start: env.IP_RANGE_2_START ?? "217.16.24.1",
        end: env.IP_RANGE_2_END ?? "217.16.27.253",
      },
    ],
    hunt: {
      maxConcurrent: numberFrom(env.MAX_CONCURRENT_PORTS, 5),
      maxAttempts: numberFrom(env.MAX_ATTEMPTS, 100),
      spawnIntervalMs: numberFrom(env.SPAWN_INTERVAL_MS, 1000),
      pollInterval: numberFrom(env.CHECK_INTERVAL, 2),
      ipWaitTimeout: numberFrom(env.IP_WAIT_TIMEOUT, 40),
      huntTimeout: numberFrom(env.HUNT_TIMEOUT, 0),
      settleDelayMs: numberFrom(env.SETTLE_DELAY_MS, 1000),
    },
    retry: {
      maxRetries: numberFrom(env.MAX_RETRIES, 3),
      backoffFactorMs: numberFrom(env.RETRY_BACKOFF_MS, 300),
      maxBackoffMs: numberFrom(env.RETRY_MAX_BACKOFF_MS, 10000),
    },
    telegram: {
      botToken: optional(env.TELEGRAM_BOT_TOKEN),
      chatId: optional(env.TELEGRAM_CHAT_ID),
    },
    log: {
      level: env.LOG_LEVEL?.toLowerCase() ?? "info",
      file: optional(env.LOG_FILE),
    },
  };

  // An explicit HUNTER_CONFIG must exist; the default file is optional
  const configPath = env.HUNTER_CONFIG ? resolve(env.HUNTER_CONFIG) : DEFAULT_CONFIG_PATH;
  if (env.HUNTER_CONFIG && !existsSync(configPath)) {
    throw new ConfigError([`HUNTER_CONFIG file not found: ${configPath}`]);
  }

  if (existsSync(configPath)) {
    const fileConfig = readFileConfig(configPath);
    if (fileConfig.ranges) {
      raw.ranges = fileConfig.ranges;
    }
    Object.assign(raw.hunt, fileConfig.hunt);
    Object.assign(raw.retry, fileConfig.retry);
  }

  const parsed = HunterConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  return parsed.data;
}

let cachedConfig: HunterConfig | null = null;

/**
 * Get the hunter configuration
 */
export function getHunterConfig(): HunterConfig {
  if (!cachedConfig) {
    cachedConfig = loadHunterConfig();
  }
  return cachedConfig;
}

/**
 * Mask a secret for display, keeping only its first characters
 */
export function maskSecret(secret: string, visible = 4): string {
  if (secret.length <= visible) {
    return "*".repeat(secret.length);
  }
  return `${secret.slice(0, visible)}${"*".repeat(8)}`;
}
