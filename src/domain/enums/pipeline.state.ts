export const PipelineStates = [
  "START",
  "TRANSCRIBED",
  "SUMMARIZED",
  "FILLED",
  "DONE",
  "FAILED",
] as const;

export type PipelineState = typeof PipelineStates[number];

// States a step can fail while trying to reach
export type PipelineStage = Extract<PipelineState, "TRANSCRIBED" | "SUMMARIZED" | "FILLED">;
