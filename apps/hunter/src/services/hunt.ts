import type { HuntOutcome, HuntResult, ReconcileReport } from "@port-hunter/shared";
import type { HunterConfig } from "../config/hunter.js";
import type { Logger } from "../logger.js";
import { formatHuntNotification, type Notifier } from "./notifications.js";
import { OpenStackClient, type CloudClient } from "./openstack.js";
import { PortHunter, type PortHunterOptions } from "./port-hunter.js";
import { reconcileOrphans } from "./reconciler.js";
import type { StopSignal } from "./stop-signal.js";

export const ExitCode = {
  Matched: 0,
  Failed: 1,
  InvalidConfig: 2,
  Interrupted: 130,
} as const;

export function exitCodeFor(outcome: HuntOutcome): number {
  switch (outcome) {
    case "matched":
      return ExitCode.Matched;
    case "shutdown":
      return ExitCode.Interrupted;
    case "exhausted":
    case "deadline":
      return ExitCode.Failed;
  }
}

/**
 * Build a client for the configured cloud. Each caller gets its own instance.
 */
export function createCloudClient(config: HunterConfig, logger: Logger): OpenStackClient {
  return new OpenStackClient({
    networkUrl: config.cloud.networkUrl,
    computeUrl: config.cloud.computeUrl,
    authToken: config.cloud.authToken,
    projectId: config.cloud.projectId,
    requestTimeoutMs: config.cloud.requestTimeout * 1000,
    retry: config.retry,
    logger,
  });
}

export function hunterOptionsFromConfig(config: HunterConfig): PortHunterOptions {
  return {
    maxConcurrent: config.hunt.maxConcurrent,
    maxAttempts: config.hunt.maxAttempts,
    spawnIntervalMs: config.hunt.spawnIntervalMs,
    pollIntervalMs: config.hunt.pollInterval * 1000,
    pollTimeoutMs: config.hunt.ipWaitTimeout * 1000,
    settleDelayMs: config.hunt.settleDelayMs,
    huntTimeoutMs: config.hunt.huntTimeout * 1000,
  };
}

export interface HuntRunOptions {
  config: HunterConfig;
  /** Client shared by the port lifecycles */
  cloud: CloudClient;
  /** Separate client for the startup reconciliation pass */
  reconcileCloud: CloudClient;
  notifier: Notifier;
  stop: StopSignal;
  logger: Logger;
  skipCleanup?: boolean;
  overrides?: PortHunterOptions;
}

export interface HuntRun {
  reconcile: ReconcileReport | null;
  result: HuntResult;
  exitCode: number;
}

/**
 * Clean up orphans, hunt for a port in range, and report the outcome
 */
export async function runHunt(options: HuntRunOptions): Promise<HuntRun> {
  const { config, stop, logger, notifier } = options;

  let reconcile: ReconcileReport | null = null;
  if (options.skipCleanup) {
    logger.info("Skipping orphan cleanup");
  } else {
    reconcile = await reconcileOrphans({
      cloud: options.reconcileCloud,
      instanceId: config.instanceId,
      protectedAddress: config.protectedAddress,
      settleDelayMs: config.hunt.settleDelayMs,
      logger,
    });
  }

  const hunter = new PortHunter(
    {
      cloud: options.cloud,
      instanceId: config.instanceId,
      networkId: config.networkId,
      protectedAddress: config.protectedAddress,
      ranges: config.ranges,
    },
    stop,
    logger,
    { ...hunterOptionsFromConfig(config), ...options.overrides }
  );

  const result = await hunter.run();

  const message = formatHuntNotification(result);
  if (message) {
    await notifier.send(message);
  }

  return { reconcile, result, exitCode: exitCodeFor(result.outcome) };
}
