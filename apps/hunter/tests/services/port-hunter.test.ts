import { describe, expect, it } from "vitest";
import { PortState } from "@port-hunter/shared";
import { ExitCode, exitCodeFor } from "../../src/services/hunt.js";
import { PortHunter, type PortHunterOptions } from "../../src/services/port-hunter.js";
import { StopSignal } from "../../src/services/stop-signal.js";
import { FakeCloud, type FakeCloudOptions } from "../helpers/fake-cloud.js";
import { INSTANCE_ID, NETWORK_ID, RANGE, SAFE_IP, logger } from "../helpers/fixtures.js";

const IN_RANGE = "10.0.0.15";
const OUT_OF_RANGE = "10.0.0.99";

function setup(cloudOptions: FakeCloudOptions, options: PortHunterOptions) {
  const cloud = new FakeCloud(cloudOptions);
  const stop = new StopSignal();
  const hunter = new PortHunter(
    { cloud, instanceId: INSTANCE_ID, networkId: NETWORK_ID, protectedAddress: SAFE_IP, ranges: [RANGE] },
    stop,
    logger,
    {
      spawnIntervalMs: 0,
      pollIntervalMs: 1,
      pollTimeoutMs: 500,
      settleDelayMs: 0,
      ...options,
    }
  );
  return { cloud, stop, hunter };
}

describe("PortHunter", () => {
  it("never has more ports in flight than allowed", async () => {
    const { cloud, hunter } = setup(
      { plan: () => ({ address: OUT_OF_RANGE, afterPolls: 1 }), latencyMs: 2 },
      { maxConcurrent: 3, maxAttempts: 10 }
    );

    const result = await hunter.run();

    expect(result.outcome).toBe("exhausted");
    expect(result.launched).toBe(10);
    expect(result.deleted).toBe(10);
    expect(result.winner).toBeNull();
    expect(cloud.maxLive).toBeLessThanOrEqual(3);
    expect(hunter.getStatus().peakInFlight).toBeLessThanOrEqual(3);
    expect(cloud.ports.size).toBe(0);
    expect(exitCodeFor(result.outcome)).toBe(ExitCode.Failed);
  });

  it("stops launching once a port matches", async () => {
    const { cloud, hunter } = setup(
      { plan: (index) => ({ address: index === 4 ? IN_RANGE : OUT_OF_RANGE, afterPolls: 1 }) },
      { maxConcurrent: 1, maxAttempts: 10 }
    );

    const result = await hunter.run();

    expect(result.outcome).toBe("matched");
    expect(result.launched).toBe(4);
    expect(result.deleted).toBe(3);
    expect(result.winner).toEqual({ attempt: 4, portId: "port-4", address: IN_RANGE, range: RANGE, claimed: true });
    expect(cloud.count("createPort")).toBe(4);
    expect([...cloud.ports.keys()]).toEqual(["port-4"]);
    expect(exitCodeFor(result.outcome)).toBe(ExitCode.Matched);
  });

  it("tears down the ports still polling when another one wins", async () => {
    const { cloud, hunter } = setup(
      { plan: (index) => (index === 1 ? { address: IN_RANGE, afterPolls: 3 } : null) },
      { maxConcurrent: 4, maxAttempts: 4, pollIntervalMs: 5, pollTimeoutMs: 5000 }
    );

    const result = await hunter.run();

    expect(result.outcome).toBe("matched");
    expect(result.winner?.portId).toBe("port-1");
    expect(result.attempts.map((attempt) => attempt.reason)).toEqual(["matched", "stopped", "stopped", "stopped"]);
    expect(result.attempts.slice(1).every((attempt) => attempt.state === PortState.Deleted)).toBe(true);
    expect([...cloud.ports.keys()]).toEqual(["port-1"]);
  });

  it("keeps every port that matched at the same time", async () => {
    const { cloud, hunter } = setup(
      { plan: () => ({ address: IN_RANGE, afterPolls: 1 }) },
      { maxConcurrent: 2, maxAttempts: 2 }
    );

    const result = await hunter.run();

    expect(result.outcome).toBe("matched");
    expect(result.retained.map((port) => [port.portId, port.claimed])).toEqual([
      ["port-1", true],
      ["port-2", false],
    ]);
    expect(result.winner?.portId).toBe("port-1");
    expect(cloud.count("deletePort")).toBe(0);
    expect(cloud.ports.size).toBe(2);
  });

  it("cleans up every port on shutdown", async () => {
    const { cloud, stop, hunter } = setup(
      {},
      { maxConcurrent: 2, maxAttempts: 50, spawnIntervalMs: 5, pollIntervalMs: 5, pollTimeoutMs: 5000 }
    );

    setTimeout(() => stop.requestShutdown(), 30);
    const result = await hunter.run();

    expect(result.outcome).toBe("shutdown");
    expect(result.launched).toBeLessThan(50);
    expect(result.retained).toEqual([]);
    expect(cloud.ports.size).toBe(0);
    expect(exitCodeFor(result.outcome)).toBe(ExitCode.Interrupted);
  });

  it("gives up when the hunt deadline passes", async () => {
    const { cloud, stop, hunter } = setup(
      {},
      { maxConcurrent: 2, maxAttempts: 50, spawnIntervalMs: 5, pollIntervalMs: 5, pollTimeoutMs: 5000, huntTimeoutMs: 20 }
    );

    const result = await hunter.run();

    expect(result.outcome).toBe("deadline");
    expect(stop.reason).toBe("deadline");
    expect(cloud.ports.size).toBe(0);
  });

  it("moves on after ports that could not be created", async () => {
    const { hunter } = setup(
      {
        failCreate: (index) => index <= 2,
        plan: (index) => (index === 3 ? { address: IN_RANGE, afterPolls: 1 } : null),
      },
      { maxConcurrent: 1, maxAttempts: 5 }
    );

    const result = await hunter.run();

    expect(result.outcome).toBe("matched");
    expect(result.failed).toBe(2);
    expect(result.winner?.portId).toBe("port-3");
  });

  it("refuses to run twice at once", async () => {
    const { hunter } = setup({ plan: () => ({ address: IN_RANGE, afterPolls: 1 }) }, { maxConcurrent: 1, maxAttempts: 1 });

    const first = hunter.run();
    await expect(hunter.run()).rejects.toThrow("Port hunt is already running");
    await first;

    expect(hunter.getStatus()).toEqual({
      running: false,
      launched: 1,
      inFlight: 0,
      completed: 1,
      peakInFlight: 1,
      maxConcurrent: 1,
    });
  });

  it("lets many ports wait on the stop signal without a listener warning", async () => {
    const warnings: string[] = [];
    const onWarning = (warning: Error) => {
      warnings.push(warning.name);
    };
    process.on("warning", onWarning);

    try {
      const { hunter } = setup({}, { maxConcurrent: 20, maxAttempts: 20, pollIntervalMs: 5, pollTimeoutMs: 50 });
      const result = await hunter.run();
      await new Promise((resolve) => setImmediate(resolve));

      expect(result.outcome).toBe("exhausted");
      expect(hunter.getStatus().peakInFlight).toBe(20);
    } finally {
      process.off("warning", onWarning);
    }

    expect(warnings).not.toContain("MaxListenersExceededWarning");
  });
});
