import { AppError } from "@trackprint/shared";

import type { HiddenStates, ReducePolicy } from "../../types/processing";

export const EMBEDDING_WIDTH = 1024;

export type ReduceOptions<R extends ReducePolicy = ReducePolicy> = {
  /** negative counts from the end; -1 is the last layer */
  layer?: number;
  reduce?: R;
};

function invalid(message: string, details?: Record<string, unknown>) {
  return new AppError({ code: "EMBEDDING_MODEL_ERROR", message, retryable: false, details });
}

/** resolved index of the layer `layer` points at */
export function layerIndex(layers: number, layer: number) {
  const idx = layer < 0 ? layers + layer : layer;
  if (!Number.isInteger(layer) || idx < 0 || idx >= layers) {
    throw invalid(`Layer ${layer} out of range for ${layers} layers`, { layer, layers });
  }
  return idx;
}

function selectLayer(stack: HiddenStates, layer: number): number[][] {
  if (stack.length === 0) throw invalid("Model returned no hidden-state layers");

  const steps = stack[layerIndex(stack.length, layer)] ?? [];
  if (steps.length === 0) throw invalid("Selected layer has no time steps", { layer });

  const width = steps[0]?.length ?? 0;
  if (width === 0) throw invalid("Selected layer has zero feature width", { layer });
  steps.forEach((step, t) => {
    if (step.length !== width) throw invalid(`Time step ${t} has width ${step.length}, expected ${width}`, { layer });
  });
  return steps;
}

function meanOverTime(steps: number[][]): number[] {
  const width = steps[0]?.length ?? 0;
  const out = new Array<number>(width).fill(0);
  for (const step of steps) {
    for (let i = 0; i < width; i++) out[i] = (out[i] ?? 0) + (step[i] ?? 0);
  }
  return out.map((v) => v / steps.length);
}

function maxOverTime(steps: number[][]): number[] {
  const width = steps[0]?.length ?? 0;
  const out = new Array<number>(width).fill(-Infinity);
  for (const step of steps) {
    for (let i = 0; i < width; i++) out[i] = Math.max(out[i] ?? -Infinity, step[i] ?? -Infinity);
  }
  return out;
}

/**
 * Picks one layer of the model output and collapses its time axis. Pure: the
 * input stack is never modified, and `none` returns a copy of the sequence.
 */
export function reduceHiddenStates(stack: HiddenStates, opts?: ReduceOptions<"mean" | "max">): number[];
export function reduceHiddenStates(stack: HiddenStates, opts: ReduceOptions<"none">): number[][];
export function reduceHiddenStates(stack: HiddenStates, opts: ReduceOptions = {}): number[] | number[][] {
  const steps = selectLayer(stack, opts.layer ?? -1);

  switch (opts.reduce ?? "mean") {
    case "mean":
      return meanOverTime(steps);
    case "max":
      return maxOverTime(steps);
    case "none":
      return steps.map((s) => [...s]);
  }
}

/** [layers, time steps, width] of the raw output, for the artifact */
export function hiddenStateShape(stack: HiddenStates): [number, number, number] {
  const last = stack[stack.length - 1] ?? [];
  return [stack.length, last.length, last[0]?.length ?? 0];
}
