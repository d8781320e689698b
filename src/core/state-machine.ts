/**
 * Pipeline stage state machine.
 *
 * Enforces the stage order a single asset run may follow.
 */
import { InvalidStageTransitionError } from "./exceptions.js";
import { AssetStatus, PipelineStage } from "./types.js";

export const VALID_STAGE_TRANSITIONS: Record<PipelineStage, PipelineStage[]> = {
  [PipelineStage.Discovered]: [PipelineStage.Validating],
  [PipelineStage.Validating]: [
    PipelineStage.Skipped,
    PipelineStage.Failed,
    PipelineStage.Hashing,
  ],
  [PipelineStage.Hashing]: [PipelineStage.MetadataExtraction, PipelineStage.Failed],
  [PipelineStage.MetadataExtraction]: [PipelineStage.Completed, PipelineStage.Failed],
  [PipelineStage.Completed]: [],
  [PipelineStage.Failed]: [],
  [PipelineStage.Skipped]: [],
};

export interface TransitionResult {
  success: boolean;
  newStage?: PipelineStage;
  error?: InvalidStageTransitionError;
}

export function transitionStage(
  current: PipelineStage,
  target: PipelineStage,
): TransitionResult {
  if (!VALID_STAGE_TRANSITIONS[current].includes(target)) {
    return {
      success: false,
      error: new InvalidStageTransitionError(current, target),
    };
  }
  return { success: true, newStage: target };
}

export function isTerminalStage(stage: PipelineStage): boolean {
  return (
    stage === PipelineStage.Completed ||
    stage === PipelineStage.Failed ||
    stage === PipelineStage.Skipped
  );
}

/** Catalog status a run carries while in `stage`. */
export function statusForStage(stage: PipelineStage): AssetStatus {
  switch (stage) {
    case PipelineStage.Discovered:
      return AssetStatus.Pending;
    case PipelineStage.Completed:
      return AssetStatus.Completed;
    case PipelineStage.Failed:
      return AssetStatus.Failed;
    case PipelineStage.Skipped:
      return AssetStatus.Skipped;
    default:
      return AssetStatus.Processing;
  }
}
