#!/usr/bin/env node
/**
 * buybox-analyzer <ASIN...> [--file path] [--out report.csv] [--concurrency n] [--test-connection]
 *
 * Reads ASINs from the arguments and/or a file (one per line, or comma
 * separated), analyzes them, and writes the CSV report. Progress goes to
 * stderr. Ctrl-C cancels the identifiers that have not started yet and
 * still writes the report.
 */

import { readFile } from 'fs/promises';
import { cfg } from './config.js';
import { parseIdentifiers } from './lib/asin.js';
import { createBuyBoxAnalyzer, type BuyBoxAnalyzer } from './lib/analyzer.js';
import { summarizeResults } from './lib/batch-orchestrator.js';
import { errorMessage } from './lib/errors.js';
import { createRunLogger, type Logger } from './lib/logger.js';
import type { SpApiClient } from './lib/sp-api-client.js';
import { createCsvFileWriter, type ReportWriter } from './lib/report.js';

export interface CliArgs {
  asins: string[];
  file?: string;
  out: string;
  concurrency?: number;
  testConnection: boolean;
}

export function parseCliArgs(args: readonly string[]): CliArgs {
  const parsed: CliArgs = { asins: [], out: 'buybox_report.csv', testConnection: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = () => {
      const next = args[++i];
      if (next === undefined || next.startsWith('--')) throw new Error(`${arg} needs a value`);
      return next;
    };

    switch (arg) {
      case '--file':
        parsed.file = value();
        break;
      case '--out':
        parsed.out = value();
        break;
      case '--concurrency': {
        const n = Number(value());
        if (!Number.isInteger(n) || n < 1) throw new Error('--concurrency must be a positive integer');
        parsed.concurrency = n;
        break;
      }
      case '--test-connection':
        parsed.testConnection = true;
        break;
      default:
        if (arg.startsWith('--')) throw new Error(`Unknown option: ${arg}`);
        parsed.asins.push(arg);
    }
  }

  return parsed;
}

export interface CliDeps {
  analyzer: Pick<BuyBoxAnalyzer, 'analyze'> & { client: Pick<SpApiClient, 'testConnection'> };
  logger: Logger;
  writer?: (outPath: string) => ReportWriter;
  readText?: (filePath: string) => Promise<string>;
  stderr?: (line: string) => void;
  signal?: AbortSignal;
}

/** Runs one CLI invocation; resolves to the process exit code. */
export async function runCli(args: CliArgs, deps: CliDeps): Promise<number> {
  const stderr = deps.stderr ?? ((line: string) => process.stderr.write(line + '\n'));
  const { analyzer, logger } = deps;

  if (args.testConnection) {
    const ok = await analyzer.client.testConnection(deps.signal);
    stderr(ok ? 'SP-API connection OK' : 'SP-API connection failed');
    return ok ? 0 : 1;
  }

  let text = args.asins.join('\n');
  if (args.file) {
    const readText = deps.readText ?? ((p: string) => readFile(p, 'utf8'));
    text += '\n' + (await readText(args.file));
  }

  const { valid, invalid } = parseIdentifiers(text, { dedupe: true });
  if (invalid.length) {
    stderr(`Skipping ${invalid.length} invalid ASIN(s): ${invalid.join(', ')}`);
    logger.warn('Invalid ASINs skipped', { invalid });
  }
  if (valid.length === 0) {
    stderr('No valid ASINs to analyze');
    return 1;
  }

  const results = await analyzer.analyze(valid, {
    signal: deps.signal,
    concurrency: args.concurrency,
    logger,
    onProgress: (completed, total, latest) => {
      const status = latest.failure
        ? `failed (${latest.failure.kind})`
        : latest.winningOffer
          ? `winner ${latest.winningOffer.sellerId}`
          : 'no offers';
      stderr(`[${completed}/${total}] ${latest.productId}: ${status}`);
    },
  });

  const writer = (deps.writer ?? createCsvFileWriter)(args.out);
  await writer.write(results);

  const summary = summarizeResults(results);
  stderr(`Analyzed ${summary.total} ASIN(s): ${summary.succeeded} succeeded, ${summary.failed} failed. Report: ${args.out}`);
  return summary.failed > 0 ? 2 : 0;
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const runId = new Date().toISOString().replace(/[:.]/g, '-');
  const logger = createRunLogger(runId, { dir: cfg.log.dir, level: cfg.log.level, console: false });
  const analyzer = createBuyBoxAnalyzer(cfg, { logger });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    process.stderr.write('Cancelling; identifiers already in flight will finish\n');
    controller.abort();
  });

  try {
    process.exitCode = await runCli(args, { analyzer, logger, signal: controller.signal });
  } finally {
    await logger.flush();
  }
}

if (require.main === module) {
  main().catch((e) => {
    console.error(errorMessage(e));
    process.exit(1);
  });
}
