export { DirectoryArtifactStore, type ArtifactStore } from './artifactStore';
export {
  ArtifactPathError,
  ClassifierConfigError,
  ModelArtifactError,
  UnsupportedModelFormatError,
  errorFrom
} from './errors';
export { InferenceAdapter, resolveInputEncoding, type AdapterOptions } from './inferenceAdapter';
export { loadTfjsModel, type ModelLoader, type SequenceModel, type TensorEncoding } from './modelRuntime';
export { TEXT_FILTERS, normalizeText, tokenizeText } from './normalizer';
export {
  RiskClassifier,
  createRiskClassifierFromConfig,
  withRiskClassifier,
  type RiskClassifierOptions
} from './riskClassifier';
export { encodeText, encodeTokens, lookupIndex, type EncoderSettings } from './sequenceEncoder';
export {
  checkTokenizerCompatibility,
  loadVocabulary,
  parseIndex,
  readVocabulary,
  type TokenizerMetadata,
  type Vocabulary,
  type VocabularyLoadResult
} from './vocabulary';
export type { InferenceOutcome, InputEncoding, RiskAssessment } from '@riskscan/shared';
