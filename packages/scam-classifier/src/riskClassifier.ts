import {
  classifierSettingsSchema,
  loadConfig,
  type ClassifierSettings,
  type ClassifierSettingsInput,
  type RiskscanConfig
} from '@riskscan/config';
import { createLogger, type ScopedLogger } from '@riskscan/logger';
import type { InputEncoding, RiskAssessment, VocabularyStrategy } from '@riskscan/shared';
import { elapsedMs } from '@riskscan/util';
import { DirectoryArtifactStore, type ArtifactStore } from './artifactStore';
import { ClassifierConfigError } from './errors';
import { InferenceAdapter } from './inferenceAdapter';
import { inferenceDuration, predictionsTotal, vocabularyEntries } from './metrics';
import type { ModelLoader } from './modelRuntime';
import { tokenizeText } from './normalizer';
import { encodeTokens, lookupIndex } from './sequenceEncoder';
import { checkTokenizerCompatibility, readVocabulary, type Vocabulary, type VocabularyLoadResult } from './vocabulary';

export type RiskClassifierOptions = ClassifierSettingsInput & {
  /** Where artifacts are read from; takes precedence over `assetsDir`. */
  store?: ArtifactStore;
  assetsDir?: string;
  loader?: ModelLoader;
  logger?: ScopedLogger;
};

function resolveSettings(input: ClassifierSettingsInput): Readonly<ClassifierSettings> {
  const parsed = classifierSettingsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ClassifierConfigError(`Invalid classifier settings: ${issues.join('; ')}`, issues);
  }
  return Object.freeze(parsed.data);
}

/**
 * Scores free-form messages for scam risk.
 *
 * The vocabulary and model are loaded once by {@link RiskClassifier.create}
 * and shared read-only by every call. `predict` never throws: artifact and
 * runtime problems produce a score of 0, and {@link RiskClassifier.assess}
 * exposes the outcome so callers can tell a failure from a low score.
 */
export class RiskClassifier {
  private closeLogged = false;

  private constructor(
    readonly settings: Readonly<ClassifierSettings>,
    private readonly vocab: VocabularyLoadResult,
    private readonly adapter: InferenceAdapter,
    private readonly logger: ScopedLogger
  ) {}

  static async create(options: RiskClassifierOptions): Promise<RiskClassifier> {
    const { store, assetsDir, loader, logger: providedLogger, ...settingsInput } = options;
    const settings = resolveSettings(settingsInput);
    const artifactStore = store ?? (assetsDir ? new DirectoryArtifactStore(assetsDir) : null);
    if (!artifactStore) {
      throw new ClassifierConfigError('Either store or assetsDir must be provided');
    }
    const logger = providedLogger ?? createLogger('scam-classifier');

    const [vocab, adapter] = await Promise.all([
      readVocabulary(artifactStore, settings.tokenizerFileName, logger),
      InferenceAdapter.open({
        store: artifactStore,
        modelFileName: settings.modelFileName,
        maxSeqLen: settings.maxSeqLen,
        loader,
        logger
      })
    ]);

    for (const issue of checkTokenizerCompatibility(vocab, settings)) {
      logger.warn({ issue }, 'tokenizer export does not match runtime preprocessing');
    }
    vocabularyEntries.set(vocab.vocabulary.size);

    return new RiskClassifier(settings, vocab, adapter, logger);
  }

  get vocabulary(): Vocabulary {
    return this.vocab.vocabulary;
  }

  get vocabularySize(): number {
    return this.vocab.vocabulary.size;
  }

  get vocabularyStrategy(): VocabularyStrategy {
    return this.vocab.strategy;
  }

  get inputEncoding(): InputEncoding | null {
    return this.adapter.encoding;
  }

  get modelError(): Error | null {
    return this.adapter.loadError;
  }

  get closed(): boolean {
    return this.adapter.closed;
  }

  encode(text: string): Int32Array {
    return encodeTokens(tokenizeText(text), this.vocab.vocabulary, this.settings);
  }

  assess(text: string): RiskAssessment {
    const started = process.hrtime.bigint();
    const tokens = tokenizeText(typeof text === 'string' ? text : '');
    const sequence = encodeTokens(tokens, this.vocab.vocabulary, this.settings);

    if (this.adapter.closed && !this.closeLogged) {
      this.closeLogged = true;
      this.logger.warn('predict called after close; scoring 0');
    }
    const outcome = this.adapter.infer(sequence);
    const inferenceMs = elapsedMs(started);

    predictionsTotal.inc({ outcome: outcome.ok ? 'ok' : outcome.reason });
    inferenceDuration.observe(inferenceMs);

    const { oovIndex } = this.settings;
    const oovCount = tokens.filter((token) => lookupIndex(token, this.vocab.vocabulary, this.settings) === oovIndex).length;

    return { score: outcome.score, outcome, tokens, sequence, oovCount, inferenceMs };
  }

  /** Risk score in [0, 1]. */
  predict(text: string): number {
    return this.assess(text).score;
  }

  close(): void {
    if (this.adapter.closed) return;
    this.adapter.close();
    this.logger.debug('classifier closed');
  }
}

export async function withRiskClassifier<T>(
  options: RiskClassifierOptions,
  fn: (classifier: RiskClassifier) => Promise<T> | T
): Promise<T> {
  const classifier = await RiskClassifier.create(options);
  try {
    return await fn(classifier);
  } finally {
    classifier.close();
  }
}

export function createRiskClassifierFromConfig(
  config: RiskscanConfig = loadConfig(),
  overrides: Partial<RiskClassifierOptions> = {}
): Promise<RiskClassifier> {
  return RiskClassifier.create({ ...config.classifier, ...overrides });
}
