#!/usr/bin/env node
/**
 * Document Organizer CLI
 *
 * Discovers documents under --source, classifies each against the category
 * configuration, places them under --dest/<category>/ and writes the
 * classification report.
 *
 * Exit codes: 0 run completed (even with failed documents), 1 fatal
 * configuration or startup error, 2 usage error.
 */

import fs from 'fs';
import path from 'path';
import {
  ConfigurationError,
  SemanticClassifier,
  TextCache,
  config,
  enableDefaultMetrics,
  formatSummary,
  getMetrics,
  isConfigurationError,
  loadCategorySet,
  logger,
  newRunId,
  registerExtractor,
  getRegisteredExtensions,
  runWithContextAsync,
  writeReport,
  type ClassificationReport,
  type EmbeddingProvider,
} from '@docsort/shared';
import { materializeDecisions, runBatch } from './lib/batch';
import { USAGE, isUsageError, parseCliArgs, type CliOptions } from './lib/cli-args';
import { discoverDocuments } from './lib/discovery';
import { createEmbeddingProvider } from './lib/embeddings';
import { FolderMaterializer } from './lib/materializer';
import { PdfExtractor } from './lib/pdf';
import { PlainTextExtractor } from './lib/plain-text';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

export interface RunOptions extends CliOptions {
  /** Overrides the provider built from configuration; null disables semantic scoring */
  embeddingProvider?: EmbeddingProvider | null;
}

export function registerDefaultExtractors(cache: TextCache = new TextCache()): void {
  const limits = {
    timeoutMs: config.extractionTimeoutMs,
    maxFileBytes: config.extractionMaxFileBytes,
    cache,
  };
  registerExtractor(new PdfExtractor({ ...limits, maxPages: config.extractionMaxPages }));
  registerExtractor(new PlainTextExtractor(limits));
}

function assertDirectory(dir: string, flag: string): void {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new ConfigurationError(`${flag} is not a directory: ${dir}`);
  }
}

/**
 * One complete run. Throws ConfigurationError before any document is
 * processed when the run cannot start.
 */
export async function runOrganizer(options: RunOptions): Promise<ClassificationReport> {
  assertDirectory(options.source, '--source');
  const categorySet = loadCategorySet(options.configPath);

  registerDefaultExtractors();
  const extensions = config.supportedExtensions.filter((ext) => getRegisteredExtensions().includes(ext));

  let provider: EmbeddingProvider | null = null;
  if (options.semantic) {
    provider = options.embeddingProvider !== undefined ? options.embeddingProvider : createEmbeddingProvider();
    if (!provider) {
      logger.warn('No embedding provider configured (OPENAI_API_KEY unset); semantic scoring will be skipped');
    }
  }
  const semanticScorer = provider
    ? new SemanticClassifier(categorySet, provider, { timeoutMs: config.embeddingTimeoutMs })
    : null;

  const runId = newRunId();
  return runWithContextAsync({ correlationId: runId, stage: 'batch' }, async () => {
    logger.info('Run started', {
      source: options.source,
      destination: options.destination,
      config: options.configPath,
      mode: options.mode,
      dry_run: options.dryRun,
      semantic: semanticScorer !== null,
    });

    const files = await discoverDocuments(options.source, {
      extensions,
      exclude: [options.destination],
    });

    const result = await runBatch({
      files,
      sourceRoot: options.source,
      categorySet,
      semanticScorer,
      concurrency: options.concurrency,
      runId,
    });

    const materializer = new FolderMaterializer({
      destinationRoot: options.destination,
      mode: options.mode,
      dryRun: options.dryRun,
    });
    await materializeDecisions(result, materializer);

    const report = result.builder.build();
    await writeReport(report, options.reportPath);

    if (options.metricsFile) {
      await fs.promises.mkdir(path.dirname(options.metricsFile), { recursive: true });
      await fs.promises.writeFile(options.metricsFile, await getMetrics(), 'utf-8');
    }

    logger.info('Run complete', { ...report.summary, report: options.reportPath });
    return report;
  });
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (!isUsageError(error)) throw error;
    console.error(`${error.message}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  if (options.help) {
    console.log(USAGE);
    return EXIT_OK;
  }

  if (options.metricsFile) {
    enableDefaultMetrics();
  }

  try {
    const report = await runOrganizer(options);
    console.log(formatSummary(report));
    return EXIT_OK;
  } catch (error) {
    if (isConfigurationError(error)) {
      logger.error('Configuration error', error);
      console.error(error.message);
    } else {
      logger.error('Run failed', error);
    }
    return EXIT_FATAL;
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('Unexpected failure', error);
      process.exitCode = EXIT_FATAL;
    });
}
