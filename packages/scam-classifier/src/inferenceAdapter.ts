import type { ScopedLogger } from '@riskscan/logger';
import type { InferenceFailure, InferenceFailureReason, InferenceOutcome, InputEncoding } from '@riskscan/shared';
import { clamp01 } from '@riskscan/util';
import type { ArtifactStore } from './artifactStore';
import { errorFrom } from './errors';
import { modelLoads } from './metrics';
import { loadTfjsModel, type ModelLoader, type SequenceModel } from './modelRuntime';

export type AdapterOptions = {
  store: ArtifactStore;
  modelFileName: string;
  maxSeqLen: number;
  loader?: ModelLoader;
  logger?: ScopedLogger;
};

type AdapterState =
  | { status: 'ready'; model: SequenceModel; encoding: InputEncoding }
  | { status: 'unavailable'; error: Error }
  | { status: 'closed' };

export function resolveInputEncoding(dtype: string): InputEncoding {
  switch (dtype) {
    case 'int32':
      return 'int32';
    case 'float32':
    case 'float16':
      return 'float32';
    default:
      return 'unsupported';
  }
}

function failure(reason: InferenceFailureReason, error?: Error): InferenceFailure {
  return error ? { ok: false, score: 0, reason, error } : { ok: false, score: 0, reason };
}

/**
 * Owns the loaded model for the lifetime of a classifier. Load and run
 * failures are reported as failure outcomes with a score of 0.
 */
export class InferenceAdapter {
  private state: AdapterState;

  private constructor(state: AdapterState, private readonly logger?: ScopedLogger) {
    this.state = state;
  }

  static async open(options: AdapterOptions): Promise<InferenceAdapter> {
    const { store, modelFileName, maxSeqLen, logger } = options;
    const loader = options.loader ?? loadTfjsModel;
    try {
      const model = await loader(store, modelFileName);
      const encoding = resolveInputEncoding(model.inputDType);
      modelLoads.inc({ status: 'ok' });
      logger?.info(
        { artifact: store.describe(modelFileName), format: model.format, inputDType: model.inputDType, encoding },
        'model loaded'
      );
      if (encoding === 'unsupported') {
        logger?.info({ inputDType: model.inputDType }, 'model input type is not int32 or float; predictions will score 0');
      }
      if (model.inputLength !== null && model.inputLength !== maxSeqLen) {
        logger?.warn({ inputLength: model.inputLength, maxSeqLen }, 'model input length differs from maxSeqLen');
      }
      return new InferenceAdapter({ status: 'ready', model, encoding }, logger);
    } catch (err) {
      const error = errorFrom(err);
      modelLoads.inc({ status: 'failed' });
      logger?.error({ err: error, artifact: modelFileName }, 'failed to load model; predictions will score 0');
      return new InferenceAdapter({ status: 'unavailable', error }, logger);
    }
  }

  get encoding(): InputEncoding | null {
    return this.state.status === 'ready' ? this.state.encoding : null;
  }

  get loadError(): Error | null {
    return this.state.status === 'unavailable' ? this.state.error : null;
  }

  get closed(): boolean {
    return this.state.status === 'closed';
  }

  infer(sequence: Int32Array): InferenceOutcome {
    const state = this.state;
    if (state.status === 'closed') return failure('closed');
    if (state.status === 'unavailable') return failure('model_unavailable', state.error);

    if (state.encoding === 'unsupported') {
      this.logger?.debug({ inputDType: state.model.inputDType }, 'unsupported model input type; skipping inference');
      return failure('unsupported_input');
    }

    let raw: number;
    try {
      raw = state.encoding === 'int32' ? state.model.run(sequence, 'int32') : state.model.run(Float32Array.from(sequence), 'float32');
    } catch (err) {
      const error = errorFrom(err);
      this.logger?.error({ err: error }, 'model inference failed');
      return failure('inference_failed', error);
    }

    if (!Number.isFinite(raw)) {
      this.logger?.error({ raw }, 'model produced a non-finite score');
      return failure('invalid_output', new Error(`Non-finite model output: ${raw}`));
    }
    return { ok: true, score: clamp01(raw), raw };
  }

  close(): void {
    const state = this.state;
    this.state = { status: 'closed' };
    if (state.status !== 'ready') return;
    try {
      state.model.dispose();
    } catch (err) {
      this.logger?.warn({ err: errorFrom(err) }, 'failed to dispose model');
    }
  }
}
