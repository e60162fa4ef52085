import { z } from 'zod';

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const paddingSideSchema = z.enum(['post', 'pre']);

export const classifierSettingsSchema = z.object({
  modelFileName: z.string().min(1).default('scam_lstm_fp16/model.json'),
  tokenizerFileName: z.string().min(1).default('tokenizer.json'),
  maxSeqLen: z.number().int().positive().default(40),
  padding: paddingSideSchema.default('post'),
  oovIndex: z.number().int().nonnegative().default(1),
  vocabSize: z.number().int().positive().default(12_000)
});

export const classifierConfigSchema = classifierSettingsSchema.extend({
  assetsDir: z.string().min(1).default('./assets')
});

export const configSchema = z.object({
  logging: z
    .object({
      level: logLevelSchema.default('info')
    })
    .default({ level: 'info' }),
  classifier: classifierConfigSchema.default({})
});

export type LogLevel = z.infer<typeof logLevelSchema>;
export type PaddingSide = z.infer<typeof paddingSideSchema>;
export type ClassifierSettings = z.infer<typeof classifierSettingsSchema>;
export type ClassifierSettingsInput = z.input<typeof classifierSettingsSchema>;
export type ClassifierConfig = z.infer<typeof classifierConfigSchema>;
export type RiskscanConfig = z.infer<typeof configSchema>;
