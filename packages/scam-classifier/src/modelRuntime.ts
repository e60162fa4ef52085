import * as tf from '@tensorflow/tfjs';
import { z } from 'zod';
import { siblingArtifact, type ArtifactStore } from './artifactStore';
import { ModelArtifactError, UnsupportedModelFormatError, errorFrom } from './errors';

export type TensorEncoding = 'int32' | 'float32';

/**
 * A loaded sequence classifier. Implementations own native or tensor
 * memory until `dispose()` is called.
 */
export interface SequenceModel {
  /** Declared dtype of the first input tensor, e.g. `int32`. */
  readonly inputDType: string;
  /** Fixed sequence length declared by the model, if any. */
  readonly inputLength: number | null;
  readonly format: string;
  run(values: Int32Array | Float32Array, encoding: TensorEncoding): number;
  dispose(): void;
}

export type ModelLoader = (store: ArtifactStore, fileName: string) => Promise<SequenceModel>;

const weightEntrySchema = z.object({
  name: z.string(),
  shape: z.array(z.number().int().nonnegative()),
  dtype: z.enum(['float32', 'int32', 'bool', 'string', 'complex64']),
  group: z.enum(['model', 'optimizer']).optional(),
  quantization: z
    .object({
      scale: z.number().optional(),
      min: z.number().optional(),
      dtype: z.enum(['uint16', 'uint8', 'float16']),
      original_dtype: z.enum(['float32', 'int32']).optional()
    })
    .optional()
});

const modelJsonSchema = z.object({
  format: z.string().optional(),
  generatedBy: z.string().optional(),
  convertedBy: z.string().nullable().optional(),
  modelTopology: z.record(z.unknown()),
  weightsManifest: z.array(z.object({ paths: z.array(z.string()), weights: z.array(weightEntrySchema) })).default([]),
  userDefinedMetadata: z.record(z.unknown()).optional()
});

type ModelJson = z.infer<typeof modelJsonSchema>;

type PredictOutput = tf.Tensor | tf.Tensor[] | tf.NamedTensorMap;

type LoadedGraph = {
  format: 'layers-model' | 'graph-model';
  input: { dtype: string; shape: ReadonlyArray<number | null> | undefined };
  predict: (input: tf.Tensor) => PredictOutput;
  dispose: () => void;
};

let cpuBackend: Promise<boolean> | null = null;

function ensureCpuBackend(): Promise<boolean> {
  if (!cpuBackend) {
    cpuBackend = tf.setBackend('cpu');
  }
  return cpuBackend;
}

function parseModelJson(raw: string, fileName: string): ModelJson {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ModelArtifactError(`model.json is not valid JSON: ${errorFrom(err).message}`, fileName);
  }
  const parsed = modelJsonSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'invalid structure';
    throw new ModelArtifactError(`Malformed model.json (${where})`, fileName);
  }
  return parsed.data;
}

async function readWeights(store: ArtifactStore, fileName: string, manifest: ModelJson['weightsManifest']): Promise<ArrayBuffer> {
  const shards: Uint8Array[] = [];
  for (const group of manifest) {
    for (const shardPath of group.paths) {
      shards.push(await store.readBinary(siblingArtifact(fileName, shardPath)));
    }
  }
  const total = shards.reduce((sum, shard) => sum + shard.byteLength, 0);
  const joined = new ArrayBuffer(total);
  const view = new Uint8Array(joined);
  let offset = 0;
  for (const shard of shards) {
    view.set(shard, offset);
    offset += shard.byteLength;
  }
  return joined;
}

async function loadGraph(json: ModelJson, artifacts: tf.io.ModelArtifacts, fileName: string): Promise<LoadedGraph> {
  const handler = tf.io.fromMemory(artifacts);
  if (json.format === 'graph-model') {
    const model = await tf.loadGraphModel(handler);
    const info = model.inputs[0];
    if (!info) throw new ModelArtifactError('Graph model declares no inputs', fileName);
    return {
      format: 'graph-model',
      input: { dtype: info.dtype, shape: info.shape },
      predict: (input) => model.predict(input),
      dispose: () => model.dispose()
    };
  }
  const model = await tf.loadLayersModel(handler);
  const symbolic = model.inputs[0];
  if (!symbolic) throw new ModelArtifactError('Layers model declares no inputs', fileName);
  return {
    format: 'layers-model',
    input: { dtype: symbolic.dtype, shape: symbolic.shape },
    predict: (input) => model.predict(input),
    dispose: () => {
      model.dispose();
    }
  };
}

function firstTensor(output: PredictOutput, fileName: string): tf.Tensor {
  if (output instanceof tf.Tensor) return output;
  const candidates = Array.isArray(output) ? output : Object.values(output);
  const first = candidates[0];
  if (!first) throw new ModelArtifactError('Model produced no output tensor', fileName);
  return first;
}

function declaredLength(shape: ReadonlyArray<number | null> | undefined): number | null {
  const length = shape?.[1];
  return typeof length === 'number' && length > 0 ? length : null;
}

/**
 * Loads a TensorFlow.js export (`model.json` plus weight shards stored next
 * to it). Both `layers-model` and `graph-model` formats are accepted.
 */
export const loadTfjsModel: ModelLoader = async (store, fileName) => {
  if (fileName.toLowerCase().endsWith('.tflite')) {
    throw new UnsupportedModelFormatError(fileName, 'tflite');
  }
  const json = parseModelJson(await store.readText(fileName), fileName);
  if (json.format !== undefined && json.format !== 'layers-model' && json.format !== 'graph-model') {
    throw new UnsupportedModelFormatError(fileName, json.format);
  }

  const weightData = await readWeights(store, fileName, json.weightsManifest);
  const artifacts: tf.io.ModelArtifacts = {
    modelTopology: json.modelTopology,
    format: json.format,
    generatedBy: json.generatedBy,
    convertedBy: json.convertedBy,
    userDefinedMetadata: json.userDefinedMetadata,
    weightSpecs: json.weightsManifest.flatMap((group) => group.weights),
    weightData
  };

  await ensureCpuBackend();
  const graph = await loadGraph(json, artifacts, fileName);

  return {
    inputDType: graph.input.dtype,
    inputLength: declaredLength(graph.input.shape),
    format: graph.format,
    run(values, encoding) {
      return tf.tidy(() => {
        const input = tf.tensor2d(values, [1, values.length], encoding);
        const scores = firstTensor(graph.predict(input), fileName).dataSync();
        if (scores.length === 0) throw new ModelArtifactError('Model produced an empty output tensor', fileName);
        return scores[0];
      });
    },
    dispose() {
      graph.dispose();
    }
  };
};
