#!/usr/bin/env node
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { Command } from 'commander';
import dotenv from 'dotenv';
import pLimit from 'p-limit';
import { loadConfig, type ConfigOverrides, type RelayConfig } from './config/config.js';
import { CsvStreamWriter, type CsvRow } from './csv/writer.js';
import { RelayError, describeError } from './errors.js';
import { jot, parseJson } from './jot.js';
import { createRelay, type Relay } from './relay.js';
import { SegmentRetriever } from './retrieval/segmentRetriever.js';
import { isQueryMode, QUERY_MODES, type QueryMode, type TextSegment } from './types/index.js';
import { createLogger } from './utils/logger.js';

dotenv.config();

const program = new Command();
program
  .name('docqa-relay')
  .description('Ask questions about processed documents through a cached, retrying, time-bounded LLM relay.');

configureCommonOptions(
  program
    .command('ask')
    .description('Answer one question.')
    .argument('<question...>', 'Question text.'),
)
  .option('-m, --mode <mode>', `Pin the query mode (${QUERY_MODES.join(', ')}).`)
  .option('--corpus-version <token>', 'Corpus version to key the cache on (defaults to the context checksum).')
  .action(async (words: string[], rawOptions: AskCommandOptions) => {
    await handleAsk(words.join(' '), rawOptions);
  });

configureCommonOptions(
  program
    .command('batch')
    .description('Answer every question in a JSON file and write the results to CSV.'),
)
  .requiredOption('-q, --questions <path>', 'JSON array of question strings.')
  .option('-o, --output <path>', 'CSV file to write.')
  .option('--concurrency <number>', 'Questions answered at once (default MAX_CONCURRENT_FILES or 2).')
  .action(async (rawOptions: BatchCommandOptions) => {
    await handleBatch(rawOptions);
  });

program
  .command('embed')
  .description('Embed texts and report the vector count and size.')
  .argument('<texts...>', 'Texts to embed.')
  .option('--timeout <seconds>', 'Deadline for the whole request.')
  .option('--ephemeral-cache', 'Keep the cache in memory for this run only.')
  .action(async (texts: string[], rawOptions: RawCommonOptions) => {
    await handleEmbed(texts, rawOptions);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof RelayError ? describeError(error) : error);
  process.exitCode = 1;
});

interface RawCommonOptions {
  context?: string;
  timeout?: string;
  ephemeralCache?: boolean;
}

interface AskCommandOptions extends RawCommonOptions {
  mode?: string;
  corpusVersion?: string;
}

interface BatchCommandOptions extends RawCommonOptions {
  questions: string;
  output?: string;
  concurrency?: string;
}

function configureCommonOptions(command: Command): Command {
  return command
    .option('-c, --context <path>', 'JSON array of text segments produced by the layout pipeline.')
    .option('--timeout <seconds>', 'User-visible deadline per question (default QUERY_TIMEOUT_SECONDS or 60).')
    .option('--ephemeral-cache', 'Keep the cache in memory for this run only.');
}

async function handleAsk(question: string, rawOptions: AskCommandOptions) {
  const mode = parseMode(rawOptions.mode);
  const config = loadConfig(process.env, overridesFrom(rawOptions));
  const retriever = await loadRetriever(rawOptions.context);
  const relay = buildRelay(config, rawOptions, retriever);

  const result = await relay.dispatcher.dispatch({
    rawText: question,
    mode,
    corpusVersion: rawOptions.corpusVersion ?? retriever?.version ?? 'none',
  });

  console.log(result.text);
  console.log(`\n[${result.mode} | ${result.source} | ${result.elapsedMs}ms]`);
}

async function handleBatch(rawOptions: BatchCommandOptions) {
  const config = loadConfig(process.env, overridesFrom(rawOptions));
  const questions = await readQuestions(path.resolve(rawOptions.questions));
  const retriever = await loadRetriever(rawOptions.context);
  const relay = buildRelay(config, rawOptions, retriever);
  const corpusVersion = retriever?.version ?? 'none';

  const isoStamp = new Date().toISOString().replace(/[:]/g, '-');
  const outputPath = path.resolve(rawOptions.output ?? path.join('output', `${isoStamp}_answers.csv`));
  const writer = await CsvStreamWriter.create(outputPath);
  const limit = pLimit(config.maxConcurrentDocuments);
  let failures = 0;

  console.log(`Answering ${questions.length} questions (${config.maxConcurrentDocuments} at a time)...`);
  const rows = await Promise.all(
    questions.map((question, index) =>
      limit(async (): Promise<CsvRow> => {
        try {
          const result = await relay.dispatcher.dispatch({ rawText: question, corpusVersion });
          return {
            index,
            question,
            mode: result.mode,
            source: result.source,
            elapsed_ms: result.elapsedMs,
            status: 'ok',
            answer: result.text,
            error_kind: '',
            error_message: '',
          };
        } catch (error) {
          failures += 1;
          return {
            index,
            question,
            mode: '',
            source: '',
            elapsed_ms: 0,
            status: 'error',
            answer: '',
            error_kind: error instanceof RelayError ? error.kind : 'unexpected',
            error_message: error instanceof Error ? error.message : String(error),
          };
        }
      }),
    ),
  );

  for (const row of rows) {
    await writer.writeRow(row);
  }
  await writer.close();
  console.log(`Wrote ${rows.length} rows to ${writer.path} (${failures} failed).`);
  if (failures > 0) {
    process.exitCode = 1;
  }
}

async function handleEmbed(texts: string[], rawOptions: RawCommonOptions) {
  const config = loadConfig(process.env, overridesFrom(rawOptions));
  const relay = buildRelay(config, rawOptions, undefined);
  const vectors = await relay.embedder.embed(texts);
  console.log(`Embedded ${vectors.length} texts into ${vectors[0]?.length ?? 0}-dimensional vectors.`);
}

function buildRelay(config: RelayConfig, options: RawCommonOptions, retriever: SegmentRetriever | undefined): Relay {
  return createRelay(config, {
    ephemeralCache: options.ephemeralCache ?? false,
    retriever,
    logger: createLogger('relay'),
    warn: createLogger('relay', { level: 'warn' }),
  });
}

function overridesFrom(options: RawCommonOptions & { concurrency?: string }): ConfigOverrides {
  return {
    timeoutSeconds: options.timeout,
    concurrency: options.concurrency,
  };
}

function parseMode(value: string | undefined): QueryMode | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (!isQueryMode(normalized)) {
    throw new Error(`Option --mode must be one of ${QUERY_MODES.join(', ')}.`);
  }
  return normalized;
}

const segmentsSchema = jot.array(
  jot.object({
    id: jot.string({ nonEmpty: true }),
    text: jot.string(),
    page: jot.optional(jot.number({ integer: true })),
    source: jot.optional(jot.string()),
  }),
);

const questionsSchema = jot.array(jot.string({ nonEmpty: true }));

async function loadRetriever(contextPath: string | undefined): Promise<SegmentRetriever | undefined> {
  if (!contextPath) {
    return undefined;
  }
  const resolved = path.resolve(contextPath);
  const segments: TextSegment[] = parseJson(segmentsSchema, await readText(resolved, 'Context'), 'segments');
  console.log(`Loaded ${segments.length} segments from ${resolved}`);
  return new SegmentRetriever(segments);
}

async function readQuestions(filePath: string): Promise<string[]> {
  return parseJson(questionsSchema, await readText(filePath, 'Questions'), 'questions');
}

async function readText(filePath: string, label: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      throw new Error(`${label} file not found at ${filePath}`);
    }
    throw error;
  }
}
