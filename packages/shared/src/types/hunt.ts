import type { PortState, TerminalPortState } from "./port.js";

/**
 * Inclusive range of IPv4 addresses
 */
export interface AddressRange {
  start: string;
  end: string;
}

export type AttemptEndReason =
  | "matched"
  | "unmatched"
  | "timeout"
  | "stopped"
  | "create-failed"
  | "attach-failed"
  | "error";

/**
 * Outcome of one port lifecycle run
 */
export interface AttemptResult {
  attempt: number;
  state: TerminalPortState;
  reason: AttemptEndReason;
  portId: string | null;
  address: string | null;
  range: AddressRange | null;
  /** True when this attempt won the stop signal */
  claimed: boolean;
  history: PortState[];
  durationMs: number;
}

export type HuntOutcome = "matched" | "exhausted" | "shutdown" | "deadline";

export interface RetainedPort {
  attempt: number;
  portId: string;
  address: string;
  range: AddressRange;
  claimed: boolean;
}

export interface HuntResult {
  outcome: HuntOutcome;
  winner: RetainedPort | null;
  /** Every matched port; more than one only when two attempts raced */
  retained: RetainedPort[];
  launched: number;
  deleted: number;
  failed: number;
  attempts: AttemptResult[];
  durationMs: number;
}
