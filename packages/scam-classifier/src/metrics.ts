import type { Counter, Gauge, Histogram } from '@riskscan/metrics';
import { registerCounter, registerGauge, registerHistogram } from '@riskscan/metrics';

export const predictionsTotal: Counter<string> = registerCounter({
  name: 'scam_classifier_predictions_total',
  help: 'Risk predictions by outcome (ok or failure reason)',
  labelNames: ['outcome']
});

export const inferenceDuration: Histogram<string> = registerHistogram({
  name: 'scam_classifier_inference_ms',
  help: 'Encode plus inference time per prediction in milliseconds',
  buckets: [0.5, 1, 2, 5, 10, 25, 50, 100, 250]
});

export const vocabularyEntries: Gauge<string> = registerGauge({
  name: 'scam_classifier_vocabulary_size',
  help: 'Entries in the most recently loaded vocabulary'
});

export const modelLoads: Counter<string> = registerCounter({
  name: 'scam_classifier_model_loads_total',
  help: 'Model load attempts',
  labelNames: ['status']
});
