export type {
  InferenceFailure,
  InferenceFailureReason,
  InferenceOutcome,
  InferenceSuccess,
  InputEncoding,
  RiskAssessment,
  VocabularyStrategy
} from './types';
