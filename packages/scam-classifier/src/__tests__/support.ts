import type { ArtifactStore } from '../artifactStore';
import type { ModelLoader, SequenceModel, TensorEncoding } from '../modelRuntime';

export class MemoryArtifactStore implements ArtifactStore {
  private readonly files = new Map<string, string | Uint8Array>();

  constructor(files: Record<string, string | Uint8Array> = {}) {
    for (const [name, content] of Object.entries(files)) {
      this.files.set(name, content);
    }
  }

  put(name: string, content: string | Uint8Array): this {
    this.files.set(name, content);
    return this;
  }

  describe(name: string): string {
    return `memory://${name}`;
  }

  async readText(name: string): Promise<string> {
    const content = this.lookup(name);
    return typeof content === 'string' ? content : new TextDecoder().decode(content);
  }

  async readBinary(name: string): Promise<Uint8Array> {
    const content = this.lookup(name);
    return typeof content === 'string' ? new TextEncoder().encode(content) : content;
  }

  private lookup(name: string): string | Uint8Array {
    const content = this.files.get(name);
    if (content === undefined) {
      throw new Error(`ENOENT: ${name}`);
    }
    return content;
  }
}

export type ModelCall = { values: Int32Array | Float32Array; encoding: TensorEncoding };

export type FakeModel = SequenceModel & { calls: ModelCall[]; disposed: number };

export type FakeModelOptions = {
  inputDType?: string;
  inputLength?: number | null;
  output?: number | ((values: Int32Array | Float32Array) => number);
  runError?: Error;
  disposeError?: Error;
};

export function fakeModel(options: FakeModelOptions = {}): FakeModel {
  const { output = 0.5 } = options;
  const model: FakeModel = {
    inputDType: options.inputDType ?? 'int32',
    inputLength: options.inputLength ?? null,
    format: 'fake',
    calls: [],
    disposed: 0,
    run(values, encoding) {
      model.calls.push({ values, encoding });
      if (options.runError) throw options.runError;
      return typeof output === 'function' ? output(values) : output;
    },
    dispose() {
      model.disposed += 1;
      if (options.disposeError) throw options.disposeError;
    }
  };
  return model;
}

export function loaderFor(model: SequenceModel): ModelLoader {
  return async () => model;
}

export function failingLoader(error: Error): ModelLoader {
  return async () => {
    throw error;
  };
}
