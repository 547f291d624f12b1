export type TensorLayout = "channelFirst" | "channelLast";

/**
 * Immutable description of a loaded model's input contract. A handle is
 * never edited in place; a swap replaces it wholesale.
 */
export interface ModelHandle {
  readonly version: string;
  readonly modelPath: string;
  readonly inputName: string;
  readonly outputName: string;
  readonly tensorLayout: TensorLayout;
  // [batch, channels, height, width] or [batch, height, width, channels]
  readonly expectedShape: readonly number[];
}

export interface ModelTensor {
  readonly data: Float32Array;
  readonly dims: readonly number[];
}

export const DEFAULT_INPUT_SHAPE: readonly number[] = [1, 3, 224, 224];

/**
 * Matches declared dimensions to channel/size positions. Symbolic or
 * unknown dimensions (<= 0) are resolved from the fallback size.
 * Non-image inputs (any rank other than 4) keep their shape as declared.
 */
export function inferLayout(dims: readonly number[]): { layout: TensorLayout; shape: number[] } {
  if (dims.length !== 4) {
    return { layout: "channelLast", shape: dims.map((d) => (d > 0 ? d : 1)) };
  }

  const [, d1, d2, d3] = dims;
  const channelsFirst = d1 === 3 || d1 === 1;
  const channelsLast = !channelsFirst && (d3 === 3 || d3 === 1);
  const size = (value: number) => (value > 0 ? value : 224);

  if (channelsLast) {
    return { layout: "channelLast", shape: [1, size(d1), size(d2), d3] };
  }
  return { layout: "channelFirst", shape: [1, channelsFirst ? d1 : 3, size(d2), size(d3)] };
}

export function spatialSize(handle: Pick<ModelHandle, "tensorLayout" | "expectedShape">): {
  height: number;
  width: number;
} {
  const shape = handle.expectedShape;
  return handle.tensorLayout === "channelFirst"
    ? { height: shape[2], width: shape[3] }
    : { height: shape[1], width: shape[2] };
}

export function softmax(scores: ArrayLike<number>): number[] {
  if (scores.length === 0) return [];
  let max = -Infinity;
  for (let i = 0; i < scores.length; i++) max = Math.max(max, scores[i]);
  const exps: number[] = [];
  let sum = 0;
  for (let i = 0; i < scores.length; i++) {
    const e = Math.exp(scores[i] - max);
    exps.push(e);
    sum += e;
  }
  return exps.map((e) => e / sum);
}
