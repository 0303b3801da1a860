import { StateTransitionError } from "./errors.js";
import type { PhaseResult } from "../types/phase.js";
import type { OverallStatus } from "../types/run.js";

/** Orchestrator states in the order a clean run visits them. */
export const PIPELINE_STATES = [
  "idle",
  "resolving_identity",
  "provisioning",
  "running_phases",
  "tearing_down",
  "finalizing",
  "completed",
  "aborted",
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  idle: ["resolving_identity"],
  // identity failure: nothing started, nothing to tear down
  resolving_identity: ["provisioning", "aborted"],
  // provisioning failure: the supervisor already cleaned up
  provisioning: ["running_phases", "aborted"],
  running_phases: ["tearing_down"],
  tearing_down: ["finalizing"],
  finalizing: ["completed", "aborted"],
  completed: [],
  aborted: [],
};

export function isPipelineState(value: string): value is PipelineState {
  return (PIPELINE_STATES as readonly string[]).includes(value);
}

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Pure function: validate and return the next state. */
export function nextState(from: PipelineState, to: PipelineState): PipelineState {
  if (!canTransition(from, to)) throw new StateTransitionError(from, to);
  return to;
}

export function isTerminal(state: PipelineState): boolean {
  return TRANSITIONS[state].length === 0;
}

/**
 * Fold phase results into the run's status. Skipped phases do not count as
 * failures by themselves; an abort overrides everything.
 */
export function aggregateStatus(results: readonly PhaseResult[], aborted: boolean): OverallStatus {
  if (aborted) return "aborted";
  return results.some((r) => r.exitStatus === "failure") ? "partial_failure" : "success";
}
