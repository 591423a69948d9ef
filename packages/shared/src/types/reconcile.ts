export type ReconcileActionKind = "protect" | "delete" | "detach-and-delete" | "foreign";

export interface ReconcileAction {
  kind: ReconcileActionKind;
  portId: string;
  deviceId: string | null;
  addresses: string[];
}

export interface ReconcileFailure {
  portId: string;
  operation: "detach" | "delete";
  error: string;
}

/**
 * Summary of one orphan reconciliation pass
 */
export interface ReconcileReport {
  scanned: number;
  protected: string[];
  deleted: string[];
  foreign: string[];
  failures: ReconcileFailure[];
  dryRun: boolean;
  actions: ReconcileAction[];
}
