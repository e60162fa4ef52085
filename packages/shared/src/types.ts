export type InputEncoding = 'int32' | 'float32' | 'unsupported';

export type InferenceFailureReason =
  | 'model_unavailable'
  | 'unsupported_input'
  | 'inference_failed'
  | 'invalid_output'
  | 'closed';

export type InferenceSuccess = {
  ok: true;
  score: number;
  raw: number; // model output before clamping
};

export type InferenceFailure = {
  ok: false;
  score: 0;
  reason: InferenceFailureReason;
  error?: Error;
};

export type InferenceOutcome = InferenceSuccess | InferenceFailure;

export type VocabularyStrategy =
  | 'word_index'
  | 'index_word'
  | 'keras_word_index'
  | 'keras_index_word'
  | 'top_level'
  | 'empty';

export interface RiskAssessment {
  score: number;
  outcome: InferenceOutcome;
  tokens: string[];
  sequence: Int32Array;
  oovCount: number;
  inferenceMs: number;
}
