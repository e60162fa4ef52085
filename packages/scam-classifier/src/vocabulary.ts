import type { ScopedLogger } from '@riskscan/logger';
import type { VocabularyStrategy } from '@riskscan/shared';
import { isPlainObject, type PlainObject } from '@riskscan/util';
import type { ArtifactStore } from './artifactStore';
import { errorFrom } from './errors';
import { TEXT_FILTERS } from './normalizer';

export type Vocabulary = ReadonlyMap<string, number>;

/** Settings recorded by a Keras `Tokenizer.to_json()` export. */
export interface TokenizerMetadata {
  numWords?: number | null;
  oovToken?: string | null;
  lower?: boolean;
  filters?: string;
  split?: string;
  charLevel?: boolean;
}

export interface VocabularyLoadResult {
  vocabulary: Vocabulary;
  strategy: VocabularyStrategy;
  metadata: TokenizerMetadata;
  /** Entries that were present but had no usable index. */
  skipped: number;
  error?: Error;
}

const INTEGER_TEXT = /^[+-]?\d+$/;

export function parseIndex(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!INTEGER_TEXT.test(trimmed)) return null;
    const parsed = Number.parseInt(trimmed, 10);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

type Collected = { vocabulary: Map<string, number>; skipped: number };

function collectWordIndex(source: PlainObject): Collected {
  const vocabulary = new Map<string, number>();
  let skipped = 0;
  for (const [word, raw] of Object.entries(source)) {
    const index = parseIndex(raw);
    if (index === null || index < 1) {
      skipped += 1;
      continue;
    }
    vocabulary.set(word, index);
  }
  return { vocabulary, skipped };
}

function collectIndexWord(source: PlainObject): Collected {
  const vocabulary = new Map<string, number>();
  let skipped = 0;
  for (const [key, raw] of Object.entries(source)) {
    const index = parseIndex(key);
    const word = typeof raw === 'string' ? raw : typeof raw === 'number' ? String(raw) : null;
    if (index === null || index < 1 || word === null) {
      skipped += 1;
      continue;
    }
    vocabulary.set(word, index);
  }
  return { vocabulary, skipped };
}

// Keras stores the mappings inside `config` as JSON-encoded strings.
function embeddedObject(value: unknown): PlainObject | null {
  if (isPlainObject(value)) return value;
  if (typeof value !== 'string') return null;
  const parsed: unknown = JSON.parse(value);
  return isPlainObject(parsed) ? parsed : null;
}

function readMetadata(config: PlainObject): TokenizerMetadata {
  const metadata: TokenizerMetadata = {};
  const numWords = config.num_words;
  if (numWords === null || typeof numWords === 'number') metadata.numWords = numWords;
  const oovToken = config.oov_token;
  if (oovToken === null || typeof oovToken === 'string') metadata.oovToken = oovToken;
  if (typeof config.lower === 'boolean') metadata.lower = config.lower;
  if (typeof config.filters === 'string') metadata.filters = config.filters;
  if (typeof config.split === 'string') metadata.split = config.split;
  if (typeof config.char_level === 'boolean') metadata.charLevel = config.char_level;
  return metadata;
}

function emptyResult(error?: Error, metadata: TokenizerMetadata = {}): VocabularyLoadResult {
  return { vocabulary: new Map(), strategy: 'empty', metadata, skipped: 0, error };
}

function fromRoot(root: PlainObject): VocabularyLoadResult {
  if ('word_index' in root) {
    const source = root.word_index;
    if (!isPlainObject(source)) return emptyResult(new Error('word_index is not an object'));
    return { ...collectWordIndex(source), strategy: 'word_index', metadata: {} };
  }

  if ('index_word' in root) {
    const source = root.index_word;
    if (!isPlainObject(source)) return emptyResult(new Error('index_word is not an object'));
    return { ...collectIndexWord(source), strategy: 'index_word', metadata: {} };
  }

  const config = root.config;
  if (isPlainObject(config) && ('word_index' in config || 'index_word' in config)) {
    const metadata = readMetadata(config);
    if ('word_index' in config) {
      const source = embeddedObject(config.word_index);
      if (!source) return emptyResult(new Error('config.word_index is not an object'), metadata);
      return { ...collectWordIndex(source), strategy: 'keras_word_index', metadata };
    }
    const source = embeddedObject(config.index_word);
    if (!source) return emptyResult(new Error('config.index_word is not an object'), metadata);
    return { ...collectIndexWord(source), strategy: 'keras_index_word', metadata };
  }

  const vocabulary = new Map<string, number>();
  for (const [key, raw] of Object.entries(root)) {
    const index = parseIndex(raw);
    if (index !== null && index >= 1) vocabulary.set(key, index);
  }
  if (vocabulary.size === 0) return emptyResult();
  return { vocabulary, strategy: 'top_level', metadata: {}, skipped: 0 };
}

/**
 * Parses an exported tokenizer definition into a word -> index map.
 *
 * The first mapping field found decides the strategy: `word_index`, then
 * `index_word`, then the Keras `{ class_name, config }` envelope, then any
 * top-level integer fields. Malformed input yields an empty vocabulary with
 * `error` set; this function never throws.
 */
export function loadVocabulary(source: string): VocabularyLoadResult {
  try {
    const root: unknown = JSON.parse(source);
    if (!isPlainObject(root)) {
      return emptyResult(new Error('tokenizer artifact is not a JSON object'));
    }
    return fromRoot(root);
  } catch (err) {
    return emptyResult(errorFrom(err));
  }
}

export async function readVocabulary(
  store: ArtifactStore,
  fileName: string,
  logger?: ScopedLogger
): Promise<VocabularyLoadResult> {
  let raw: string;
  try {
    raw = await store.readText(fileName);
  } catch (err) {
    const error = errorFrom(err);
    logger?.warn({ err: error, artifact: fileName }, 'tokenizer artifact unreadable; every token will be out of vocabulary');
    return emptyResult(error);
  }
  const result = loadVocabulary(raw);
  if (result.error) {
    logger?.warn({ err: result.error, artifact: fileName }, 'tokenizer artifact malformed; every token will be out of vocabulary');
  } else if (result.vocabulary.size === 0) {
    logger?.warn({ artifact: fileName, strategy: result.strategy }, 'tokenizer artifact has no usable entries');
  } else {
    logger?.info(
      { artifact: fileName, strategy: result.strategy, size: result.vocabulary.size, skipped: result.skipped },
      'vocabulary loaded'
    );
  }
  return result;
}

export function checkTokenizerCompatibility(
  result: VocabularyLoadResult,
  settings: { vocabSize: number; oovIndex: number }
): string[] {
  const { metadata, vocabulary } = result;
  const issues: string[] = [];
  if (typeof metadata.numWords === 'number' && metadata.numWords !== settings.vocabSize) {
    issues.push(`tokenizer num_words=${metadata.numWords} but vocabSize=${settings.vocabSize}`);
  }
  if (metadata.lower === false) {
    issues.push('tokenizer was fitted without lowercasing');
  }
  if (metadata.filters !== undefined && metadata.filters !== TEXT_FILTERS) {
    issues.push('tokenizer filters differ from the built-in filter set');
  }
  if (metadata.split !== undefined && metadata.split !== ' ') {
    issues.push(`tokenizer split=${JSON.stringify(metadata.split)} but text is split on spaces`);
  }
  if (metadata.charLevel === true) {
    issues.push('tokenizer is character level');
  }
  if (typeof metadata.oovToken === 'string') {
    const mapped = vocabulary.get(metadata.oovToken);
    if (mapped !== undefined && mapped !== settings.oovIndex) {
      issues.push(`oov token ${JSON.stringify(metadata.oovToken)} maps to ${mapped} but oovIndex=${settings.oovIndex}`);
    }
  }
  return issues;
}
