import type { Port, ReconcileAction, ReconcileReport } from "@port-hunter/shared";
import type { Logger } from "../logger.js";
import { sleep } from "../utils/sleep.js";
import type { CloudClient } from "./openstack.js";

export interface ReconcileTarget {
  instanceId: string;
  protectedAddress: string;
}

export interface ReconcileOptions extends ReconcileTarget {
  cloud: CloudClient;
  logger: Logger;
  /** Pause between detach and delete */
  settleDelayMs?: number;
  dryRun?: boolean;
}

/**
 * Decide what to do with each port left over from earlier runs
 */
export function planReconcile(ports: readonly Port[], target: ReconcileTarget): ReconcileAction[] {
  return ports.map((port): ReconcileAction => {
    const base = { portId: port.id, deviceId: port.deviceId, addresses: port.addresses };

    if (port.addresses.includes(target.protectedAddress)) {
      return { ...base, kind: "protect" };
    }
    if (!port.deviceId) {
      return { ...base, kind: "delete" };
    }
    if (port.deviceId === target.instanceId) {
      return { ...base, kind: "detach-and-delete" };
    }
    return { ...base, kind: "foreign" };
  });
}

/**
 * Remove orphaned ports before a hunt starts.
 *
 * Unattached ports and ports attached to the target instance are removed;
 * the protected port and ports on other instances are left alone. A failed
 * detach or delete is recorded and the pass moves on to the next port.
 * Listing failures propagate.
 */
export async function reconcileOrphans(options: ReconcileOptions): Promise<ReconcileReport> {
  const { cloud, instanceId, settleDelayMs = 1000, dryRun = false } = options;
  const logger = options.logger.child({ component: "reconciler" });

  const ports = await cloud.listPorts();
  const actions = planReconcile(ports, options);

  const report: ReconcileReport = {
    scanned: ports.length,
    protected: [],
    deleted: [],
    foreign: [],
    failures: [],
    dryRun,
    actions,
  };

  logger.info({ ports: ports.length, dryRun }, "Reconciling orphaned ports");

  for (const action of actions) {
    const { portId } = action;

    switch (action.kind) {
      case "protect":
        logger.info({ portId, addresses: action.addresses }, "Port carries the protected address, skipping");
        report.protected.push(portId);
        continue;
      case "foreign":
        logger.debug({ portId, deviceId: action.deviceId }, "Port attached to another device, skipping");
        report.foreign.push(portId);
        continue;
    }

    if (dryRun) {
      logger.info({ portId, action: action.kind }, "Would remove port");
      continue;
    }

    if (action.kind === "detach-and-delete") {
      try {
        await cloud.detachPort(instanceId, portId);
        logger.info({ portId }, "Port detached");
      } catch (error) {
        logger.warn({ err: error, portId }, "Failed to detach port");
        report.failures.push({ portId, operation: "detach", error: errorMessage(error) });
      }
      await sleep(settleDelayMs);
    }

    try {
      await cloud.deletePort(portId);
      logger.info({ portId }, "Port deleted");
      report.deleted.push(portId);
    } catch (error) {
      logger.error({ err: error, portId }, "Failed to delete port");
      report.failures.push({ portId, operation: "delete", error: errorMessage(error) });
    }
  }

  logger.info(
    { deleted: report.deleted.length, protected: report.protected.length, failures: report.failures.length },
    "Reconciliation finished"
  );

  return report;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
