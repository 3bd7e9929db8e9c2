#!/usr/bin/env node
import path from 'node:path';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { ChatCompletionClassifier } from './clients/chatClassifier.js';
import { loadEnv, resolveModerationConfig, type ModerationConfig } from './config.js';
import { detectFormat } from './input/loader.js';
import { runPipeline } from './pipeline.js';
import { createLogger } from './utils/logger.js';

dotenv.config();

interface RawOptions {
  output_dir: string;
  batchSize?: string;
  model?: string;
  endpoint?: string;
  delay?: string;
  retries?: string;
  timeout?: string;
}

const program = new Command();
program
  .name('moderate-comments')
  .description('Classify comments for offensiveness with an LLM and export a CSV, a text report and a pie chart.')
  .argument('<input_file>', 'Input file path (.csv or .json).')
  .option('-o, --output_dir <dir>', 'Output directory path.', '.')
  .option('--batch-size <number>', 'Comments per model call (default 10).')
  .option('--model <id>', 'Model identifier (default from MODERATION_MODEL or nvidia/llama-3.1-nemotron-nano-8b-v1:free).')
  .option('--endpoint <url>', 'OpenAI-compatible API base or chat/completions URL (default OpenRouter).')
  .option('--delay <ms>', 'Pause after each batch in ms (default 2000).')
  .option('--retries <number>', 'Retries per batch on connection errors, 429 and 5xx (default 0).')
  .option('--timeout <ms>', 'Per-request timeout in ms (default: SDK timeout).')
  .action(async (inputFile: string, rawOptions: RawOptions) => {
    await handleModerate(inputFile, rawOptions);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});

async function handleModerate(inputFile: string, rawOptions: RawOptions) {
  const env = loadEnv();
  detectFormat(inputFile);
  const config = buildConfig(rawOptions, env.MODERATION_MODEL, env.MODERATION_ENDPOINT);

  const classifier = new ChatCompletionClassifier({
    apiKey: env.OPENROUTER_API_KEY,
    model: config.model,
    endpoint: config.endpoint,
    maxRetries: config.maxRetries,
    retryBackoffMs: config.retryBackoffMs,
    requestTimeoutMs: config.requestTimeoutMs,
    logger: createLogger('classifier', config.model),
  });

  const result = await runPipeline({
    inputFile: path.resolve(inputFile),
    outputDir: path.resolve(rawOptions.output_dir),
    config,
    classifier,
  });

  console.log(
    `Done: ${result.report.offensive}/${result.report.total} comments flagged as offensive across ${result.run.batches} batches.`,
  );
}

function buildConfig(raw: RawOptions, envModel: string | undefined, envEndpoint: string | undefined): ModerationConfig {
  const timeout = parseOptionalInteger(raw.timeout, 'timeout', 1);
  return resolveModerationConfig({
    batchSize: parseOptionalInteger(raw.batchSize, 'batch-size', 1),
    model: raw.model?.trim() || envModel,
    endpoint: raw.endpoint?.trim() || envEndpoint,
    interBatchDelayMs: parseOptionalInteger(raw.delay, 'delay', 0),
    maxRetries: parseOptionalInteger(raw.retries, 'retries', 0),
    ...(timeout !== undefined ? { requestTimeoutMs: timeout } : {}),
  });
}

function parseOptionalInteger(value: string | undefined, flagName: string, minimum: 0 | 1): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < minimum) {
    throw new Error(
      minimum === 0
        ? `Option --${flagName} must be zero or a positive number.`
        : `Option --${flagName} must be a positive number.`,
    );
  }
  return Math.floor(parsed);
}
