/**
 * ONNX Runtime model loader.
 *
 * The runtime is imported lazily so processes that never load a model
 * (mock mode, tests) skip its wasm start-up cost.
 */

import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import type { Logger } from "pino";
import { InferenceFailedError } from "../domain/errors";
import { DEFAULT_INPUT_SHAPE, inferLayout, type ModelHandle, type ModelTensor } from "./modelHandle";

type OrtModule = typeof import("onnxruntime-web");

let ort: OrtModule | null = null;

async function initOnnxRuntime(): Promise<OrtModule> {
  if (!ort) {
    ort = await import("onnxruntime-web");
    ort.env.wasm.numThreads = 1;
  }
  return ort;
}

export interface LoadedModel {
  readonly handle: ModelHandle;
  run(tensor: ModelTensor): Promise<Float32Array>;
  release(): Promise<void>;
}

export interface LoadOptions {
  // Shape used when neither a sidecar nor the caller declares one
  defaultShape?: readonly number[];
  // model_info.json describes the image model; other models skip it
  readSidecar?: boolean;
}

export interface ModelLoader {
  load(modelPath: string, version: string, options?: LoadOptions): Promise<LoadedModel>;
}

const modelInfoSchema = z.object({
  input_shape: z.array(z.number().int()).optional(),
  input_size: z.tuple([z.number().int().positive(), z.number().int().positive()]).optional(),
  channels_first: z.boolean().optional(),
});

export type ModelInfo = z.infer<typeof modelInfoSchema>;

/** Reads the optional model_info.json sidecar next to the model file. */
export async function readModelInfo(modelPath: string): Promise<ModelInfo | null> {
  const infoPath = path.join(path.dirname(modelPath), "model_info.json");
  let raw: string;
  try {
    raw = await fs.readFile(infoPath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
  return modelInfoSchema.parse(JSON.parse(raw));
}

/** Shape of the session's first input as the runtime reports it. */
export type InputMetadata =
  | { readonly isTensor: false }
  | { readonly isTensor: true; readonly shape: ReadonlyArray<number | string> };

/**
 * Dimensions the model file itself declares. Symbolic dimensions (a named
 * batch axis, say) come back as -1 and are resolved by inferLayout.
 */
export function metadataDims(metadata: InputMetadata | undefined): readonly number[] | null {
  if (!metadata?.isTensor || metadata.shape.length === 0) return null;
  return metadata.shape.map((dim) => (typeof dim === "number" ? dim : -1));
}

/** Sidecar first, then the model's own metadata, then the fallback. */
export function declaredDims(info: ModelInfo | null, fallback: readonly number[]): readonly number[] {
  if (info?.input_shape) return info.input_shape;
  if (info?.input_size) {
    const [height, width] = info.input_size;
    return info.channels_first === false ? [1, height, width, 3] : [1, 3, height, width];
  }
  return fallback;
}

export class OnnxModelLoader implements ModelLoader {
  constructor(private readonly logger: Logger) {}

  async load(modelPath: string, version: string, options: LoadOptions = {}): Promise<LoadedModel> {
    const runtime = await initOnnxRuntime();
    const startTime = Date.now();

    const bytes = await fs.readFile(modelPath);
    const session = await runtime.InferenceSession.create(new Uint8Array(bytes), {
      executionProviders: ["wasm"],
      graphOptimizationLevel: "extended",
    });

    const inputName = session.inputNames[0];
    const outputName = session.outputNames[0];
    if (!inputName || !outputName) {
      await session.release();
      throw new InferenceFailedError(`Model ${modelPath} declares no input or output tensor`);
    }

    const info = options.readSidecar === false ? null : await readModelInfo(modelPath);
    const sessionDims = metadataDims(session.inputMetadata[0]);
    const { layout, shape } = inferLayout(
      declaredDims(info, sessionDims ?? options.defaultShape ?? DEFAULT_INPUT_SHAPE),
    );

    const handle: ModelHandle = Object.freeze({
      version,
      modelPath,
      inputName,
      outputName,
      tensorLayout: layout,
      expectedShape: Object.freeze(shape),
    });

    this.logger.info(
      { modelPath, version, inputName, outputName, layout, shape, sessionDims, loadMs: Date.now() - startTime },
      "ONNX model loaded",
    );

    return {
      handle,
      run: async (tensor: ModelTensor) => {
        const feeds = {
          [handle.inputName]: new runtime.Tensor("float32", tensor.data, [...tensor.dims]),
        };
        const results = await session.run(feeds);
        const output = results[handle.outputName];
        if (!output) {
          throw new InferenceFailedError(`Model ${version} returned no ${handle.outputName} tensor`);
        }
        const data = output.data;
        if (!(data instanceof Float32Array)) {
          throw new InferenceFailedError(`Model ${version} returned ${output.type} output, expected float32`);
        }
        return data;
      },
      release: () => session.release(),
    };
  }
}
