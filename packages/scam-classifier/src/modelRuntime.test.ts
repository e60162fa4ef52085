import * as tf from '@tensorflow/tfjs';
import { beforeAll, describe, expect, it } from 'vitest';
import { MemoryArtifactStore } from './__tests__/support';
import { ModelArtifactError, UnsupportedModelFormatError } from './errors';
import { loadTfjsModel } from './modelRuntime';
import { RiskClassifier } from './riskClassifier';

const SEQ_LEN = 6;

function joinWeights(data: tf.io.ModelArtifacts['weightData']): Uint8Array {
  const buffers = data === undefined ? [] : Array.isArray(data) ? data : [data];
  const total = buffers.reduce((sum, buffer) => sum + buffer.byteLength, 0);
  const joined = new Uint8Array(total);
  let offset = 0;
  for (const buffer of buffers) {
    joined.set(new Uint8Array(buffer), offset);
    offset += buffer.byteLength;
  }
  return joined;
}

async function exportModel(store: MemoryArtifactStore, dir: string): Promise<void> {
  const model = tf.sequential({
    layers: [
      tf.layers.embedding({ inputDim: 20, outputDim: 4, inputShape: [SEQ_LEN] }),
      tf.layers.lstm({ units: 3 }),
      tf.layers.dense({ units: 1, activation: 'sigmoid' })
    ]
  });
  await model.save(
    tf.io.withSaveHandler(async (artifacts) => {
      store.put(
        `${dir}/model.json`,
        JSON.stringify({
          format: artifacts.format,
          generatedBy: artifacts.generatedBy,
          convertedBy: null,
          modelTopology: artifacts.modelTopology,
          weightsManifest: [{ paths: ['group1-shard1of1.bin'], weights: artifacts.weightSpecs ?? [] }]
        })
      );
      store.put(`${dir}/group1-shard1of1.bin`, joinWeights(artifacts.weightData));
      return { modelArtifactsInfo: tf.io.getModelArtifactsInfoForJSON(artifacts) };
    })
  );
  model.dispose();
}

describe('loadTfjsModel', () => {
  const store = new MemoryArtifactStore();

  beforeAll(async () => {
    await tf.setBackend('cpu');
    await exportModel(store, 'scam_lstm');
  });

  it('reads the input signature of a layers model', async () => {
    const model = await loadTfjsModel(store, 'scam_lstm/model.json');
    expect(model.format).toBe('layers-model');
    expect(model.inputDType).toBe('float32');
    expect(model.inputLength).toBe(SEQ_LEN);
    model.dispose();
  });

  it('produces a deterministic probability without leaking tensors', async () => {
    const model = await loadTfjsModel(store, 'scam_lstm/model.json');
    const input = Float32Array.from([1, 1, 1, 5, 1, 0]);
    const first = model.run(input, 'float32');
    const before = tf.memory().numTensors;
    const second = model.run(input, 'float32');
    model.run(input, 'float32');
    expect(tf.memory().numTensors).toBe(before);
    expect(first).toBeGreaterThan(0);
    expect(first).toBeLessThan(1);
    expect(second).toBe(first);
    model.dispose();
    expect(tf.memory().numTensors).toBeLessThan(before);
  });

  it('scores through the classifier facade', async () => {
    const artifacts = new MemoryArtifactStore({ 'tokenizer.json': '{"word_index":{"otp":5,"bank":8}}' });
    await exportModel(artifacts, 'scam_lstm_fp16');
    const classifier = await RiskClassifier.create({ store: artifacts, maxSeqLen: SEQ_LEN });
    expect(classifier.inputEncoding).toBe('float32');
    expect(classifier.modelError).toBeNull();
    const score = classifier.predict('Your bank OTP expires today');
    expect(score).toBeGreaterThan(0);
    expect(score).toBeLessThan(1);
    expect(classifier.predict('Your bank OTP expires today')).toBe(score);
    classifier.close();
  });

  it('rejects tflite flatbuffers', async () => {
    await expect(loadTfjsModel(store, 'scam_lstm_fp16.tflite')).rejects.toBeInstanceOf(UnsupportedModelFormatError);
  });

  it('rejects unknown export formats', async () => {
    store.put('saved/model.json', JSON.stringify({ format: 'tf-saved-model', modelTopology: {} }));
    await expect(loadTfjsModel(store, 'saved/model.json')).rejects.toThrow(
      'Unsupported model format "tf-saved-model" for saved/model.json'
    );
  });

  it('rejects a model.json without a topology', async () => {
    store.put('broken/model.json', JSON.stringify({ format: 'layers-model' }));
    const loading = loadTfjsModel(store, 'broken/model.json');
    await expect(loading).rejects.toBeInstanceOf(ModelArtifactError);
    await expect(loading).rejects.toThrow('Malformed model.json (modelTopology: Required)');
  });

  it('rejects a model.json that is not JSON', async () => {
    store.put('garbled/model.json', '{"format": ');
    const loading = loadTfjsModel(store, 'garbled/model.json');
    await expect(loading).rejects.toBeInstanceOf(ModelArtifactError);
    await expect(loading).rejects.toThrow(/^model\.json is not valid JSON: /);
  });

  it('fails when a weight shard is missing', async () => {
    store.put(
      'partial/model.json',
      JSON.stringify({
        format: 'layers-model',
        modelTopology: {},
        weightsManifest: [{ paths: ['group1-shard1of1.bin'], weights: [] }]
      })
    );
    await expect(loadTfjsModel(store, 'partial/model.json')).rejects.toThrow('ENOENT: partial/group1-shard1of1.bin');
  });
});
