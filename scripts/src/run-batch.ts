#!/usr/bin/env tsx
/**
 * Run Batch Script
 *
 * Runs one execution of the retry job: the next slice of the work ledger is
 * extracted, outcomes are appended to the result store and the checkpoint
 * advances. Running it again resumes where the last execution stopped.
 *
 * Usage:
 *   npm run run-batch -w @retry-runner/scripts -- [options]
 *
 * Options:
 *   --max-items=N         Items attempted per execution (default: MAX_ITEMS_PER_RUN or 100)
 *   --flush-every=N       Outcomes buffered before a flush (default: FLUSH_EVERY or 5)
 *   --delay-ms=N          Delay between attempts (default: INTER_ITEM_DELAY_MS or 1000)
 *   --timeout-ms=N        Per-item extraction timeout (default: EXTRACTION_TIMEOUT_MS or 90000)
 *   --loop[=N]            Chain executions in-process until done (at most N runs)
 *   --lease               Hold the writer lease for the duration of the run
 *   --trigger-output=PATH Append has_more_work and counts to PATH (e.g. $GITHUB_OUTPUT)
 *   --verbose             Show detailed logging
 *   --quiet               Minimal output (errors only)
 *   --log-format=FMT      Log format: text, json, compact, pretty (default: pretty)
 *
 * Environment variables: see `loadRunnerConfig` (LEDGER_FILE, DATA_DIR, ...)
 *
 * Examples:
 *   npm run run-batch -w @retry-runner/scripts -- --max-items=20 --verbose
 *   npm run run-batch -w @retry-runner/scripts -- --lease --trigger-output="$GITHUB_OUTPUT"
 *   npm run run-batch -w @retry-runner/scripts -- --loop=5 --delay-ms=500
 */

import {
  // Configuration
  loadRunnerConfig,
  validateRunnerEnv,
  type RunnerConfig,
  // Ledger and stores
  loadWorkLedger,
  FileCheckpointStore,
  FileResultStore,
  FileLease,
  withLease,
  // Extraction
  PageExtractor,
  createPlaywrightSessionFactory,
  // Orchestrator and trigger
  BatchOrchestrator,
  type RunReport,
  isRunAbortedError,
  runChain,
  writeTriggerOutputs,
  // Logging
  Logger,
  createLogger,
  LogLevel,
  type LogFormat,
  parseLogFormat,
  formatDuration,
} from '@retry-runner/lib';

// ============================================================================
// Types
// ============================================================================

interface ParsedArgs {
  maxItems?: number;
  flushEvery?: number;
  delayMs?: number;
  timeoutMs?: number;
  /** Maximum chained runs; undefined runs once */
  loop?: number;
  lease: boolean;
  triggerOutput?: string;
  verbose: boolean;
  quiet: boolean;
  logFormat?: LogFormat;
}

const DEFAULT_LOOP_RUNS = 1000;

// ============================================================================
// Argument Parsing
// ============================================================================

function parseArgs(): ParsedArgs {
  const args = process.argv.slice(2);

  const result: ParsedArgs = {
    lease: false,
    verbose: false,
    quiet: false,
  };

  for (const arg of args) {
    if (arg === '--lease') {
      result.lease = true;
    } else if (arg === '--verbose') {
      result.verbose = true;
    } else if (arg === '--quiet') {
      result.quiet = true;
    } else if (arg === '--loop') {
      result.loop = DEFAULT_LOOP_RUNS;
    } else if (arg.startsWith('--loop=')) {
      result.loop = parseInt(arg.slice(7), 10);
    } else if (arg.startsWith('--max-items=')) {
      result.maxItems = parseInt(arg.slice(12), 10);
    } else if (arg.startsWith('--flush-every=')) {
      result.flushEvery = parseInt(arg.slice(14), 10);
    } else if (arg.startsWith('--delay-ms=')) {
      result.delayMs = parseInt(arg.slice(11), 10);
    } else if (arg.startsWith('--timeout-ms=')) {
      result.timeoutMs = parseInt(arg.slice(13), 10);
    } else if (arg.startsWith('--trigger-output=')) {
      result.triggerOutput = arg.slice(17);
    } else if (arg.startsWith('--log-format=')) {
      result.logFormat = parseLogFormat(arg.slice(13));
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    }
  }

  return result;
}

function printHelp(): void {
  console.log(`
Run Batch - one resumable execution of the retry job

Usage:
  npm run run-batch -w @retry-runner/scripts -- [options]

Options:
  --max-items=N          Items attempted per execution (default: 100)
  --flush-every=N        Outcomes buffered before a flush (default: 5)
  --delay-ms=N           Delay between attempts in ms (default: 1000)
  --timeout-ms=N         Per-item extraction timeout in ms (default: 90000)
  --loop[=N]             Chain executions in-process until done (at most N)
  --lease                Hold the writer lease while running
  --trigger-output=PATH  Append step outputs for a CI scheduler
  --verbose              Show detailed logging
  --quiet                Minimal output (errors only)
  --log-format=FMT       text, json, compact or pretty (default: pretty)
  --help, -h             Show this help message
`);
}

// ============================================================================
// Logger Setup
// ============================================================================

function createRunLogger(args: ParsedArgs, config: RunnerConfig): Logger {
  let level: LogLevel = config.logLevel;
  if (args.verbose) level = LogLevel.DEBUG;
  if (args.quiet) level = LogLevel.ERROR;

  return createLogger('run-batch', {
    level,
    format: args.logFormat ?? config.logFormat,
    timestamps: true,
    colors: true,
  });
}

function printReport(report: RunReport, logger: Logger): void {
  logger.info('Execution summary', {
    slice: report.slice ? `${report.slice.start}..${report.slice.end}` : 'none',
    attempted: report.attempted,
    succeeded: report.succeeded,
    failed: report.failed,
    skipped: report.skipped,
    flushes: report.flushes,
    lastIndex: report.lastIndex,
    hasMoreWork: report.hasMoreWork,
    duration: formatDuration(report.durationMs),
  });
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const args = parseArgs();
  const config = loadRunnerConfig();
  const logger = createRunLogger(args, config);

  const envCheck = validateRunnerEnv();
  for (const warning of envCheck.warnings) {
    logger.warn(warning);
  }
  if (!envCheck.isValid) {
    for (const error of envCheck.errors) {
      logger.error(error);
    }
    process.exit(1);
  }

  try {
    const ledger = await loadWorkLedger(config.ledgerFile);
    logger.info(`Loaded ${ledger.size} identifiers`, { ledgerFile: config.ledgerFile });

    const checkpoints = new FileCheckpointStore(config.checkpointFile);
    const results = new FileResultStore(config.resultsFile);

    const extraction = new PageExtractor(
      createPlaywrightSessionFactory({ executablePath: config.browserPath }),
      { logger: logger.child('extract') }
    );
    const orchestrator = new BatchOrchestrator(extraction, {
      logger: logger.child('orchestrator'),
    });

    const runConfig = {
      maxItemsPerRun: args.maxItems ?? config.maxItemsPerRun,
      flushEvery: args.flushEvery ?? config.flushEvery,
      interItemDelayMs: args.delayMs ?? config.interItemDelayMs,
      extractionTimeoutMs: args.timeoutMs ?? config.extractionTimeoutMs,
    };

    const work = async (): Promise<RunReport> => {
      if (args.loop === undefined) {
        return orchestrator.runOnce(ledger, checkpoints, results, runConfig);
      }

      const chain = await runChain(
        () => orchestrator.runOnce(ledger, checkpoints, results, runConfig),
        { maxRuns: args.loop, logger: logger.child('trigger') }
      );
      logger.info(`Chain ${chain.finished ? 'finished' : 'stopped at run limit'}`, {
        runs: chain.runs,
      });
      const last = chain.reports[chain.reports.length - 1];
      if (!last) {
        throw new Error('Run chain produced no report');
      }
      return last;
    };

    const report = args.lease
      ? await withLease(new FileLease(config.leaseFile, { ttlMs: config.leaseTtlMs }), work)
      : await work();

    printReport(report, logger);

    if (args.triggerOutput) {
      await writeTriggerOutputs(args.triggerOutput, report);
      logger.debug('Trigger outputs written', { path: args.triggerOutput });
    }

    if (report.hasMoreWork) {
      logger.info('More work remains; trigger another execution');
    } else {
      logger.info('All items processed');
    }
  } catch (error) {
    if (isRunAbortedError(error)) {
      logger.error('Run aborted', error, {
        code: error.code,
        lastDurableIndex: error.lastDurableIndex,
      });
    } else {
      logger.error('Fatal error', error);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
