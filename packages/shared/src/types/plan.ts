import type { ResourceKind } from "./state.js";
import type { TopLevelPhase } from "./manifest.js";

export type WorkAction = "create" | "update" | "skip";

export interface WorkItem {
  service: string;
  kind: ResourceKind;
  action: WorkAction;
  phase: TopLevelPhase;
  layer: number;
  fingerprint: string;
}

export interface OrphanedRecord {
  service: string;
  kind: ResourceKind;
}

export interface PlanSummary {
  services: number;
  create: number;
  update: number;
  skip: number;
  unchanged: number;
}

export interface Plan {
  items: WorkItem[];
  orphans: OrphanedRecord[];
  summary: PlanSummary;
}

export interface PlanOptions {
  only?: string[];
  skip?: string[];
  force?: string[];
}

export type ItemState =
  | "pending"
  | "applying"
  | "succeeded"
  | "failed"
  | "fatally_failed"
  | "skipped"
  | "blocked"
  | "cancelled";

export interface ItemReport {
  item: WorkItem;
  state: ItemState;
  attempts: number;
  error?: string;
  cause?: string;
}

export interface PhaseReport {
  phase: TopLevelPhase;
  state: "succeeded" | "halted" | "blocked" | "cancelled" | "empty";
  items: number;
}

export type ApplyOutcome = "succeeded" | "failed" | "partial" | "cancelled";

export interface ApplyReport {
  outcome: ApplyOutcome;
  items: ItemReport[];
  phases: PhaseReport[];
}
