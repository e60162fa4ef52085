#!/usr/bin/env tsx
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadConfig } from '@riskscan/config';
import { createRiskClassifierFromConfig } from '@riskscan/scam-classifier';

const SAMPLES = [
  'URGENT: your bank account is locked, send the OTP to verify now',
  'are we still on for lunch tomorrow?'
];

const argv = yargs(hideBin(process.argv))
  .usage('$0 [text..]')
  .option('config', { type: 'string', describe: 'YAML config file (defaults to RISKSCAN_CONFIG or config/default.yaml)' })
  .option('assets', { type: 'string', describe: 'Override classifier.assetsDir' })
  .option('max-seq-len', { type: 'number', describe: 'Override classifier.maxSeqLen' })
  .strict()
  .parseSync();

async function main(): Promise<void> {
  const config = loadConfig({ forceReload: true, configPath: argv.config });
  const classifier = await createRiskClassifierFromConfig(config, {
    ...(argv.assets ? { assetsDir: argv.assets } : {}),
    ...(argv.maxSeqLen !== undefined ? { maxSeqLen: argv.maxSeqLen } : {})
  });
  try {
    console.log(
      `scam-classifier-smoke: assets=${argv.assets ?? config.classifier.assetsDir} vocab=${classifier.vocabularySize} strategy=${classifier.vocabularyStrategy} input=${classifier.inputEncoding ?? 'unavailable'}`
    );
    const texts = argv._.length > 0 ? argv._.map(String) : SAMPLES;
    for (const text of texts) {
      const { score, outcome, oovCount, inferenceMs } = classifier.assess(text);
      const status = outcome.ok ? 'ok' : outcome.reason;
      console.log(`score=${score.toFixed(3)} status=${status} oov=${oovCount} ms=${inferenceMs.toFixed(1)} text=${JSON.stringify(text)}`);
    }
  } finally {
    classifier.close();
  }
}

main().catch((err: unknown) => {
  console.error(`scam-classifier-smoke: error ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
