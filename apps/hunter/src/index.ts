#!/usr/bin/env node
import "dotenv/config";
import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import type { HuntResult, ReconcileReport } from "@port-hunter/shared";
import { ConfigError, getHunterConfig, maskSecret, type HunterConfig } from "./config/hunter.js";
import { createLogger, type Logger } from "./logger.js";
import { formatRange } from "./services/address.js";
import { ExitCode, createCloudClient, runHunt } from "./services/hunt.js";
import { createNotifier } from "./services/notifications.js";
import type { PortHunterOptions } from "./services/port-hunter.js";
import { reconcileOrphans } from "./services/reconciler.js";
import { StopSignal } from "./services/stop-signal.js";
import { describePort } from "./utils/format.js";

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/**
 * Load configuration or exit with the configuration error code
 */
function loadConfigOrExit(): HunterConfig {
  try {
    return getHunterConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red("✖ Invalid configuration:"));
      for (const issue of error.issues) {
        console.error(chalk.gray(`  - ${issue}`));
      }
      process.exit(ExitCode.InvalidConfig);
    }
    throw error;
  }
}

function printReconcileReport(report: ReconcileReport): void {
  const verb = report.dryRun ? "Would remove" : "Removed";
  const removable = report.actions.filter((action) => action.kind === "delete" || action.kind === "detach-and-delete");

  console.log(chalk.bold(`\nOrphan cleanup (${report.scanned} ports scanned):`));
  console.log(`  ${verb}:   ${report.dryRun ? removable.length : report.deleted.length}`);
  console.log(`  Protected: ${report.protected.length}`);
  console.log(`  Foreign:   ${report.foreign.length}`);

  if (report.dryRun) {
    for (const action of removable) {
      console.log(chalk.gray(`    ${action.portId} ${action.addresses.join(", ") || "(no address)"} [${action.kind}]`));
    }
  }

  for (const failure of report.failures) {
    console.log(chalk.red(`  ✖ ${failure.operation} ${failure.portId}: ${failure.error}`));
  }
}

function printHuntResult(result: HuntResult): void {
  console.log();
  switch (result.outcome) {
    case "matched":
      for (const port of result.retained) {
        console.log(chalk.green(`✓ Found IP ${port.address}`), chalk.gray(`(port ${port.portId}, range ${formatRange(port.range)})`));
      }
      if (result.retained.length > 1) {
        console.log(chalk.yellow(`⚠ ${result.retained.length} ports matched concurrently; all of them are still attached`));
      }
      break;
    case "shutdown":
      console.log(chalk.yellow("○ Hunt interrupted, candidate ports cleaned up"));
      break;
    case "deadline":
      console.log(chalk.red("✖ Hunt deadline reached without a matching IP"));
      break;
    case "exhausted":
      console.log(chalk.red(`✖ No matching IP after ${result.launched} attempts`));
      break;
  }
  console.log(
    chalk.gray(
      `  Attempts: ${result.launched}, deleted: ${result.deleted}, failed: ${result.failed}, ` +
        `duration: ${Math.round(result.durationMs / 1000)}s`
    )
  );
}

/**
 * Route SIGINT/SIGTERM into the stop signal so every port is still cleaned up
 */
function handleShutdownSignals(stop: StopSignal, logger: Logger): void {
  const onSignal = (signal: NodeJS.Signals) => {
    if (stop.shutdownRequested) {
      logger.warn({ signal }, "Cleanup in progress, please wait");
      return;
    }
    logger.warn({ signal }, "Shutdown requested, cleaning up ports...");
    stop.requestShutdown();
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

const program = new Command();

program
  .name("port-hunter")
  .description("Hunt for a network port whose IP lands in a configured range")
  .version("0.1.0");

program
  .command("hunt", { isDefault: true })
  .description("Clean up orphaned ports, then create ports until one gets an IP in range")
  .option("-c, --max-concurrent <n>", "Ports in flight at once", positiveInt)
  .option("-n, --max-attempts <n>", "Ports to try before giving up", positiveInt)
  .option("--skip-cleanup", "Do not remove orphaned ports before hunting")
  .action(async (options: { maxConcurrent?: number; maxAttempts?: number; skipCleanup?: boolean }) => {
    const config = loadConfigOrExit();
    const logger = createLogger(config.log);
    const stop = new StopSignal();
    handleShutdownSignals(stop, logger);

    const overrides: PortHunterOptions = {};
    if (options.maxConcurrent !== undefined) {
      overrides.maxConcurrent = options.maxConcurrent;
    }
    if (options.maxAttempts !== undefined) {
      overrides.maxAttempts = options.maxAttempts;
    }

    logger.info(
      { instanceId: config.instanceId, networkId: config.networkId, ranges: config.ranges.map(formatRange) },
      "Port hunter starting"
    );

    const run = await runHunt({
      config,
      cloud: createCloudClient(config, logger),
      reconcileCloud: createCloudClient(config, logger),
      notifier: createNotifier(config.telegram, logger),
      stop,
      logger,
      skipCleanup: options.skipCleanup,
      overrides,
    });

    if (run.reconcile) {
      printReconcileReport(run.reconcile);
    }
    printHuntResult(run.result);
    process.exitCode = run.exitCode;
  });

program
  .command("cleanup")
  .description("Remove orphaned ports left over from earlier runs")
  .option("--dry-run", "Only show what would be removed")
  .action(async (options: { dryRun?: boolean }) => {
    const config = loadConfigOrExit();
    const logger = createLogger(config.log);

    const report = await reconcileOrphans({
      cloud: createCloudClient(config, logger),
      instanceId: config.instanceId,
      protectedAddress: config.protectedAddress,
      settleDelayMs: config.hunt.settleDelayMs,
      dryRun: options.dryRun ?? false,
      logger,
    });

    printReconcileReport(report);
    if (report.failures.length > 0) {
      process.exitCode = ExitCode.Failed;
    }
  });

program
  .command("check")
  .description("Show the configuration and verify the cloud API is reachable")
  .action(async () => {
    const config = loadConfigOrExit();
    const logger = createLogger(config.log);

    console.log(chalk.bold("\nConfiguration:"));
    console.log(`  Token:      ${maskSecret(config.cloud.authToken)}`);
    console.log(`  Network API: ${config.cloud.networkUrl}`);
    console.log(`  Compute API: ${config.cloud.computeUrl}`);
    console.log(`  Instance:   ${config.instanceId}`);
    console.log(`  Network:    ${config.networkId}`);
    console.log(`  Safe IP:    ${config.protectedAddress}`);
    console.log(`  Ranges:     ${config.ranges.map(formatRange).join(", ")}`);
    console.log(`  Telegram:   ${config.telegram.botToken && config.telegram.chatId ? "enabled" : "disabled"}`);

    const ports = await createCloudClient(config, logger).listPorts();
    const onInstance = ports.filter((port) => port.deviceId === config.instanceId);
    const safePort = ports.find((port) => port.addresses.includes(config.protectedAddress));

    console.log(chalk.green(`\n✓ Network API reachable, ${ports.length} port(s) visible`));
    console.log(`  Attached to instance: ${onInstance.length}`);
    for (const port of onInstance) {
      console.log(chalk.gray(`    ${describePort(port)}`));
    }
    if (safePort) {
      console.log(`  Safe IP port:         ${safePort.id}`);
    } else {
      console.log(chalk.yellow(`  ⚠ No port carries the safe IP ${config.protectedAddress}`));
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red("✖ Fatal error:"), error instanceof Error ? error.message : error);
  process.exit(ExitCode.Failed);
});
