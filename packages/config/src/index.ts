import fs from 'fs';
import path from 'path';
import YAML from 'yaml';
import { deepMerge, isPlainObject, type PlainObject } from '@riskscan/util';
import { configSchema, type RiskscanConfig } from './schema';

export {
  classifierConfigSchema,
  classifierSettingsSchema,
  configSchema,
  logLevelSchema,
  paddingSideSchema
} from './schema';
export type {
  ClassifierConfig,
  ClassifierSettings,
  ClassifierSettingsInput,
  LogLevel,
  PaddingSide,
  RiskscanConfig
} from './schema';

let cachedConfig: RiskscanConfig | null = null;

const DEFAULT_CONFIG_PATH = path.resolve(process.cwd(), 'config', 'default.yaml');

type EnvCaster = (value: string) => unknown;

type EnvMapping = [path: string, envKey: string, caster: EnvCaster];

const asString: EnvCaster = (v) => v;
const asNumber: EnvCaster = (v) => Number(v);

const envMap: EnvMapping[] = [
  ['logging.level', 'LOG_LEVEL', asString],
  ['classifier.assetsDir', 'CLASSIFIER_ASSETS_DIR', asString],
  ['classifier.modelFileName', 'CLASSIFIER_MODEL_FILE', asString],
  ['classifier.tokenizerFileName', 'CLASSIFIER_TOKENIZER_FILE', asString],
  ['classifier.maxSeqLen', 'CLASSIFIER_MAX_SEQ_LEN', asNumber],
  ['classifier.padding', 'CLASSIFIER_PADDING', (v) => v.trim().toLowerCase()],
  ['classifier.oovIndex', 'CLASSIFIER_OOV_INDEX', asNumber],
  ['classifier.vocabSize', 'CLASSIFIER_VOCAB_SIZE', asNumber]
];

function setPath(target: PlainObject, dottedKey: string, value: unknown): void {
  const segments = dottedKey.split('.');
  const last = segments.pop();
  if (last === undefined) return;
  let cursor = target;
  for (const segment of segments) {
    const next = cursor[segment];
    if (isPlainObject(next)) {
      cursor = next;
    } else {
      const created: PlainObject = {};
      cursor[segment] = created;
      cursor = created;
    }
  }
  cursor[last] = value;
}

function loadFileConfig(customPath?: string): PlainObject {
  const pathToUse = customPath ?? process.env.RISKSCAN_CONFIG ?? DEFAULT_CONFIG_PATH;
  if (!fs.existsSync(pathToUse)) {
    if (pathToUse !== DEFAULT_CONFIG_PATH) {
      throw new Error(`Config file not found at ${pathToUse}`);
    }
    return {};
  }
  const raw = fs.readFileSync(pathToUse, 'utf-8');
  const parsed: unknown = YAML.parse(raw);
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file at ${pathToUse} must contain a mapping`);
  }
  return parsed;
}

function envOverrides(): PlainObject {
  const overrides: PlainObject = {};
  for (const [pathKey, envKey, caster] of envMap) {
    const envVal = process.env[envKey];
    if (envVal !== undefined && envVal !== '') {
      setPath(overrides, pathKey, caster(envVal));
    }
  }
  return overrides;
}

export function loadConfig(options?: { forceReload?: boolean; configPath?: string }): RiskscanConfig {
  if (!options?.forceReload && cachedConfig) {
    return cachedConfig;
  }
  const fileConfig = loadFileConfig(options?.configPath);
  const merged = deepMerge(fileConfig, envOverrides());
  const parsed = configSchema.parse(merged);
  cachedConfig = parsed;
  return parsed;
}

export function getConfig(): RiskscanConfig {
  if (!cachedConfig) {
    return loadConfig();
  }
  return cachedConfig;
}
