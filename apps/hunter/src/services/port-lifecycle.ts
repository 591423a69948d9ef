import {
  PortState,
  type AddressRange,
  type AttemptEndReason,
  type AttemptResult,
  type Port,
  type TerminalPortState,
} from "@port-hunter/shared";
import type { Logger } from "../logger.js";
import { sleep } from "../utils/sleep.js";
import { findMatchingRange, formatRange } from "./address.js";
import type { CloudClient } from "./openstack.js";
import type { StopSignal } from "./stop-signal.js";

export interface PortLifecycleOptions {
  attempt: number;
  cloud: CloudClient;
  instanceId: string;
  networkId: string;
  protectedAddress: string;
  ranges: readonly AddressRange[];
  stop: StopSignal;
  logger: Logger;
  pollIntervalMs: number;
  /** How long this port may wait for an address */
  pollTimeoutMs: number;
  /** Pause between detach and delete */
  settleDelayMs: number;
}

type PollOutcome =
  | { kind: "matched"; address: string; range: AddressRange }
  | { kind: "unmatched"; address: string }
  | { kind: "timeout" }
  | { kind: "stopped" }
  | { kind: "attach-failed" };

/**
 * Drives one candidate port through create, attach, poll and classify, then
 * either keeps it (match) or tears it down. `run()` never throws.
 */
export class PortLifecycle {
  private options: PortLifecycleOptions;
  private logger: Logger;
  private history: PortState[] = [];
  private portId: string | null = null;
  private address: string | null = null;
  private startedAt = 0;

  constructor(options: PortLifecycleOptions) {
    this.options = options;
    this.logger = options.logger.child({ attempt: options.attempt });
  }

  get state(): PortState | null {
    return this.history[this.history.length - 1] ?? null;
  }

  async run(): Promise<AttemptResult> {
    const { cloud, networkId, stop } = this.options;
    this.startedAt = Date.now();

    if (stop.stopped) {
      return this.finish(PortState.Failed, "stopped");
    }

    let port: Port;
    try {
      port = await cloud.createPort(networkId);
    } catch (error) {
      this.logger.error({ err: error }, "Failed to create port");
      return this.finish(PortState.Failed, "create-failed");
    }

    this.portId = port.id;
    this.logger = this.logger.child({ portId: port.id });
    this.transition(PortState.Created);
    this.logger.info("Port created");

    let reason: AttemptEndReason;
    try {
      const outcome = await this.attachAndPoll(port.id);
      if (outcome.kind === "matched") {
        return this.retain(port.id, outcome.address, outcome.range);
      }
      reason = outcome.kind;
    } catch (error) {
      this.logger.error({ err: error }, "Unexpected error during port lifecycle");
      reason = "error";
    }

    return this.teardown(port.id, reason);
  }

  private async attachAndPoll(portId: string): Promise<PollOutcome> {
    const { cloud, instanceId, ranges, stop, pollIntervalMs, pollTimeoutMs } = this.options;

    if (stop.stopped) {
      return { kind: "stopped" };
    }

    try {
      await cloud.attachPort(instanceId, portId);
    } catch (error) {
      this.logger.error({ err: error }, "Failed to attach port");
      return { kind: "attach-failed" };
    }
    this.transition(PortState.Attached);
    this.logger.info({ instanceId }, "Port attached");

    this.transition(PortState.Polling);
    const deadline = Date.now() + pollTimeoutMs;

    for (;;) {
      if (stop.stopped) {
        this.logger.info({ reason: stop.reason }, "Stop signal observed, abandoning port");
        return { kind: "stopped" };
      }

      let address: string | undefined;
      try {
        const current = await cloud.getPort(portId);
        address = current.addresses[0];
      } catch (error) {
        this.logger.warn({ err: error }, "Failed to read port, will poll again");
      }

      if (address) {
        this.address = address;
        const range = findMatchingRange(address, ranges);
        if (range) {
          return { kind: "matched", address, range };
        }
        this.logger.info({ address }, "Address outside configured ranges");
        this.transition(PortState.Unmatched);
        return { kind: "unmatched", address };
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        this.logger.warn({ timeoutMs: pollTimeoutMs }, "No address assigned before deadline");
        this.transition(PortState.TimedOut);
        return { kind: "timeout" };
      }

      await sleep(Math.min(pollIntervalMs, remaining), stop.signal);
    }
  }

  private retain(portId: string, address: string, range: AddressRange): AttemptResult {
    const claimed = this.options.stop.claim(portId);
    this.transition(PortState.Matched);

    if (claimed) {
      this.logger.info({ address, range: formatRange(range) }, "Found address in range, keeping port");
    } else {
      // Two ports matched before either saw the other's claim; both stay attached
      this.logger.warn(
        { address, range: formatRange(range), winner: this.options.stop.winningPortId },
        "Found address in range after another port claimed the hunt, keeping this port as well"
      );
    }

    return this.finish(PortState.Matched, "matched", range, claimed);
  }

  private async teardown(portId: string, reason: AttemptEndReason): Promise<AttemptResult> {
    const { cloud, instanceId, protectedAddress, settleDelayMs } = this.options;
    this.transition(PortState.Deleting);

    if (this.address === protectedAddress) {
      this.logger.error({ address: this.address }, "Port carries the protected address, leaving it untouched");
      return this.finish(PortState.Skipped, reason);
    }

    try {
      await cloud.detachPort(instanceId, portId);
    } catch (error) {
      this.logger.warn({ err: error }, "Failed to detach port");
    }

    await sleep(settleDelayMs);

    try {
      await cloud.deletePort(portId);
      this.logger.info({ reason }, "Port deleted");
    } catch (error) {
      this.logger.error({ err: error }, "Failed to delete port");
    }

    return this.finish(PortState.Deleted, reason);
  }

  private transition(state: PortState): void {
    this.history.push(state);
    this.logger.debug({ state }, "Port state changed");
  }

  private finish(
    state: TerminalPortState,
    reason: AttemptEndReason,
    range: AddressRange | null = null,
    claimed = false
  ): AttemptResult {
    if (this.state !== state) {
      this.transition(state);
    }

    return {
      attempt: this.options.attempt,
      state,
      reason,
      portId: this.portId,
      address: this.address,
      range,
      claimed,
      history: [...this.history],
      durationMs: Date.now() - this.startedAt,
    };
  }
}
