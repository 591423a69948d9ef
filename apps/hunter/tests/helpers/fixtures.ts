import { pino } from "pino";
import type { AddressRange } from "@port-hunter/shared";
import type { HunterConfig } from "../../src/config/hunter.js";
import type { Notifier } from "../../src/services/notifications.js";

export const logger = pino({ level: "silent" });

export const RANGE: AddressRange = { start: "10.0.0.10", end: "10.0.0.20" };
export const SAFE_IP = "10.0.0.2";
export const INSTANCE_ID = "vm-1";
export const NETWORK_ID = "net-1";

export function testConfig(overrides: Partial<HunterConfig["hunt"]> = {}): HunterConfig {
  return {
    cloud: {
      authToken: "test-token",
      networkUrl: "https://network.test",
      computeUrl: "https://compute.test",
      requestTimeout: 5,
    },
    instanceId: INSTANCE_ID,
    networkId: NETWORK_ID,
    protectedAddress: SAFE_IP,
    ranges: [RANGE],
    hunt: {
      maxConcurrent: 2,
      maxAttempts: 5,
      spawnIntervalMs: 0,
      pollInterval: 0.001,
      ipWaitTimeout: 0.2,
      huntTimeout: 0,
      settleDelayMs: 0,
      ...overrides,
    },
    retry: { maxRetries: 0, backoffFactorMs: 0, maxBackoffMs: 0 },
    telegram: {},
    log: { level: "info" },
  };
}

export class RecordingNotifier implements Notifier {
  messages: string[] = [];

  async send(text: string): Promise<void> {
    this.messages.push(text);
  }
}
