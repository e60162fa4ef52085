import type { ClassifierSettings } from '@riskscan/config';
import { tokenizeText } from './normalizer';
import type { Vocabulary } from './vocabulary';

export type EncoderSettings = Pick<ClassifierSettings, 'maxSeqLen' | 'oovIndex' | 'vocabSize' | 'padding'>;

export function lookupIndex(token: string, vocabulary: Vocabulary, settings: EncoderSettings): number {
  const index = vocabulary.get(token) ?? settings.oovIndex;
  // num_words keeps only the most frequent words
  return index >= settings.vocabSize ? settings.oovIndex : index;
}

export function encodeTokens(tokens: readonly string[], vocabulary: Vocabulary, settings: EncoderSettings): Int32Array {
  const { maxSeqLen } = settings;
  const padded = new Int32Array(maxSeqLen);
  const kept = Math.min(tokens.length, maxSeqLen);
  const offset = settings.padding === 'post' ? 0 : maxSeqLen - kept;
  for (let i = 0; i < kept; i += 1) {
    padded[offset + i] = lookupIndex(tokens[i], vocabulary, settings);
  }
  return padded;
}

/** Text -> fixed-length index sequence, as the Keras tokenizer and `pad_sequences` produced it at training time. */
export function encodeText(text: string, vocabulary: Vocabulary, settings: EncoderSettings): Int32Array {
  return encodeTokens(tokenizeText(text), vocabulary, settings);
}
