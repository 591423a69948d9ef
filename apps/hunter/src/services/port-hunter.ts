import { setMaxListeners } from "node:events";
import {
  PortState,
  type AddressRange,
  type AttemptResult,
  type HuntOutcome,
  type HuntResult,
  type RetainedPort,
} from "@port-hunter/shared";
import type { Logger } from "../logger.js";
import { sleep } from "../utils/sleep.js";
import type { CloudClient } from "./openstack.js";
import { PortLifecycle } from "./port-lifecycle.js";
import { Semaphore } from "./semaphore.js";
import type { StopSignal } from "./stop-signal.js";

export interface PortHunterOptions {
  maxConcurrent?: number;
  maxAttempts?: number;
  spawnIntervalMs?: number;
  pollIntervalMs?: number;
  pollTimeoutMs?: number;
  settleDelayMs?: number;
  /** Stop the whole hunt after this long, 0 disables */
  huntTimeoutMs?: number;
}

export interface HuntTarget {
  cloud: CloudClient;
  instanceId: string;
  networkId: string;
  protectedAddress: string;
  ranges: readonly AddressRange[];
}

const DEFAULT_OPTIONS: Required<PortHunterOptions> = {
  maxConcurrent: 5,
  maxAttempts: 100,
  spawnIntervalMs: 1000,
  pollIntervalMs: 2000,
  pollTimeoutMs: 40000,
  settleDelayMs: 1000,
  huntTimeoutMs: 0,
};

export interface PortHunterStatus {
  running: boolean;
  launched: number;
  inFlight: number;
  completed: number;
  peakInFlight: number;
  maxConcurrent: number;
}

/**
 * Launches port lifecycles with bounded concurrency until one of them finds an
 * address in range, the attempt budget runs out, or the stop signal fires.
 */
export class PortHunter {
  private options: Required<PortHunterOptions>;
  private target: HuntTarget;
  private stop: StopSignal;
  private logger: Logger;
  private semaphore: Semaphore;
  private running = false;
  private launched = 0;
  private peakInFlight = 0;
  private active = new Map<number, Promise<void>>();
  private results: AttemptResult[] = [];

  constructor(target: HuntTarget, stop: StopSignal, logger: Logger, options: PortHunterOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.target = target;
    this.stop = stop;
    this.logger = logger.child({ component: "hunter" });
    this.semaphore = new Semaphore(this.options.maxConcurrent);
    // Every sleeping lifecycle plus the spawn loop listens on the shared signal
    setMaxListeners(this.options.maxConcurrent + 2, stop.signal);
  }

  /**
   * Run the hunt. Resolves once every launched lifecycle has finished.
   */
  async run(): Promise<HuntResult> {
    if (this.running) {
      throw new Error("Port hunt is already running");
    }

    this.running = true;
    const startedAt = Date.now();
    const { maxAttempts, maxConcurrent, spawnIntervalMs, huntTimeoutMs } = this.options;

    const deadlineTimer =
      huntTimeoutMs > 0
        ? setTimeout(() => {
            this.logger.warn({ huntTimeoutMs }, "Hunt deadline reached");
            this.stop.expire();
          }, huntTimeoutMs)
        : null;

    this.logger.info({ maxConcurrent, maxAttempts }, "Port hunt started");

    try {
      while (!this.stop.stopped && this.launched < maxAttempts) {
        const acquired = await this.semaphore.acquire(this.stop.signal);
        if (!acquired) {
          break;
        }
        if (this.stop.stopped) {
          this.semaphore.release();
          break;
        }

        this.launch(++this.launched);

        if (this.launched < maxAttempts) {
          await sleep(spawnIntervalMs, this.stop.signal);
        }
      }

      if (this.active.size > 0) {
        this.logger.info({ inFlight: this.active.size }, "Waiting for in-flight ports to finish");
        await Promise.all(this.active.values());
      }
    } finally {
      if (deadlineTimer) {
        clearTimeout(deadlineTimer);
      }
      this.running = false;
    }

    const result = this.summarize(Date.now() - startedAt);
    this.logger.info(
      { outcome: result.outcome, launched: result.launched, deleted: result.deleted, failed: result.failed },
      "Port hunt finished"
    );
    return result;
  }

  getStatus(): PortHunterStatus {
    return {
      running: this.running,
      launched: this.launched,
      inFlight: this.active.size,
      completed: this.results.length,
      peakInFlight: this.peakInFlight,
      maxConcurrent: this.options.maxConcurrent,
    };
  }

  private launch(attempt: number): void {
    const lifecycle = new PortLifecycle({
      ...this.target,
      attempt,
      stop: this.stop,
      logger: this.logger,
      pollIntervalMs: this.options.pollIntervalMs,
      pollTimeoutMs: this.options.pollTimeoutMs,
      settleDelayMs: this.options.settleDelayMs,
    });

    const task = lifecycle
      .run()
      .then((result) => {
        this.results.push(result);
      })
      .catch((error: unknown) => {
        // run() handles its own failures; this only guards the permit
        this.logger.error({ err: error, attempt }, "Port lifecycle crashed");
      })
      .finally(() => {
        this.active.delete(attempt);
        this.semaphore.release();
      });

    this.active.set(attempt, task);
    this.peakInFlight = Math.max(this.peakInFlight, this.active.size);
  }

  private summarize(durationMs: number): HuntResult {
    const attempts = [...this.results].sort((a, b) => a.attempt - b.attempt);
    const retained: RetainedPort[] = [];

    for (const result of attempts) {
      if (result.state === PortState.Matched && result.portId && result.address && result.range) {
        retained.push({
          attempt: result.attempt,
          portId: result.portId,
          address: result.address,
          range: result.range,
          claimed: result.claimed,
        });
      }
    }

    if (retained.length > 1) {
      this.logger.warn(
        { ports: retained.map((port) => port.portId) },
        "More than one port matched concurrently; all of them were kept"
      );
    }

    return {
      outcome: this.outcome(retained),
      winner: retained.find((port) => port.claimed) ?? null,
      retained,
      launched: this.launched,
      deleted: attempts.filter((result) => result.state === PortState.Deleted).length,
      failed: attempts.filter((result) => result.state === PortState.Failed).length,
      attempts,
      durationMs,
    };
  }

  private outcome(retained: RetainedPort[]): HuntOutcome {
    if (retained.length > 0) {
      return "matched";
    }
    switch (this.stop.reason) {
      case "shutdown":
        return "shutdown";
      case "deadline":
        return "deadline";
      default:
        return "exhausted";
    }
  }
}
