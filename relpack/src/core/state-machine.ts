/**
 * Build pipeline stages, in order. The pipeline never branches back.
 */
export const ALL_STAGES = [
  "resolve_root",
  "resolve_identity",
  "validate_inputs",
  "clean_previous_build",
  "invoke_build_tool",
  "invoke_packager",
] as const;

export type OrchestratorStage = (typeof ALL_STAGES)[number];

/**
 * Terminal and error states.
 */
export type OrchestratorStatus = OrchestratorStage | "done" | `failed_${OrchestratorStage}`;

export type TransitionEvent = "success" | "failure";

export const INITIAL_STATUS: OrchestratorStatus = ALL_STAGES[0];

/**
 * Pure function: given current stage + event, return next state.
 */
export function nextState(current: OrchestratorStage, event: TransitionEvent): OrchestratorStatus {
  if (event === "failure") return `failed_${current}`;
  const idx = ALL_STAGES.indexOf(current);
  if (idx >= ALL_STAGES.length - 1) return "done";
  return ALL_STAGES[idx + 1];
}
