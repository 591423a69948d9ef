/**
 * A network port as reported by the network API
 */
export interface Port {
  id: string;
  networkId: string;
  /** Instance the port is attached to, null when unattached */
  deviceId: string | null;
  deviceOwner?: string;
  status?: string;
  /** Fixed IPs in provider order; only the first one is meaningful */
  addresses: string[];
}

/**
 * Lifecycle of a single candidate port
 */
export enum PortState {
  Created = "created",
  Attached = "attached",
  Polling = "polling",
  Matched = "matched",
  Unmatched = "unmatched",
  TimedOut = "timed_out",
  Deleting = "deleting",
  Deleted = "deleted",
  /** Nothing was created, nothing to clean up */
  Failed = "failed",
  /** Teardown refused because the port carries the protected address */
  Skipped = "skipped",
}

export type TerminalPortState =
  | PortState.Matched
  | PortState.Deleted
  | PortState.Failed
  | PortState.Skipped;
