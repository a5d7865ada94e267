/**
 * Run Trigger
 *
 * Chaining executions until the ledger is exhausted. The orchestrator only
 * reports `hasMoreWork`; something outside it has to start the next run.
 * Two ways are offered here: an in-process loop, and step outputs a CI
 * scheduler reads to dispatch the next job.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { Logger, createSilentLogger } from '../logging/index.js';
import type { RunReport } from '../orchestrator/index.js';

export type TriggerAction = 'chain' | 'stop';

export interface TriggerDecision {
  action: TriggerAction;
  reason: string;
}

export function decideNextRun(report: RunReport): TriggerDecision {
  if (report.slice === null) {
    return { action: 'stop', reason: 'ledger exhausted before this run' };
  }
  if (!report.hasMoreWork) {
    return { action: 'stop', reason: `last slice ended at index ${report.lastIndex}` };
  }
  return {
    action: 'chain',
    reason: `${report.ledgerSize - (report.lastIndex + 1)} item(s) remain after index ${report.lastIndex}`,
  };
}

// ============================================================================
// In-process chain
// ============================================================================

export const RunChainOptionsSchema = z.object({
  /** Safety bound on executions started by one chain */
  maxRuns: z.number().int().min(1).default(1000),
});
export type RunChainOptions = z.input<typeof RunChainOptionsSchema> & { logger?: Logger };

export interface RunChainResult {
  runs: number;
  reports: RunReport[];
  /** True when the last run reported no more work */
  finished: boolean;
}

/**
 * Call `executeRun` until a run reports no more work or `maxRuns` is hit.
 * A thrown run error stops the chain and propagates.
 */
export async function runChain(
  executeRun: (runNumber: number) => Promise<RunReport>,
  options: RunChainOptions = {}
): Promise<RunChainResult> {
  const { maxRuns } = RunChainOptionsSchema.parse({ maxRuns: options.maxRuns });
  const logger = options.logger ?? createSilentLogger();
  const reports: RunReport[] = [];

  while (reports.length < maxRuns) {
    const runNumber = reports.length + 1;
    logger.info(`Starting run ${runNumber}`);
    const report = await executeRun(runNumber);
    reports.push(report);

    const decision = decideNextRun(report);
    logger.info(`Run ${runNumber} done: ${decision.action}`, { reason: decision.reason });
    if (decision.action === 'stop') {
      return { runs: reports.length, reports, finished: true };
    }
  }

  logger.warn('Run limit reached with work remaining', { maxRuns });
  return { runs: reports.length, reports, finished: false };
}

// ============================================================================
// Step outputs
// ============================================================================

export function formatTriggerOutputs(report: RunReport): string {
  const lines = [
    `has_more_work=${report.hasMoreWork}`,
    `attempted=${report.attempted}`,
    `succeeded=${report.succeeded}`,
    `failed=${report.failed}`,
    `last_index=${report.lastIndex}`,
  ];
  return lines.join('\n') + '\n';
}

/**
 * Append `key=value` lines to a step-output file (e.g. `$GITHUB_OUTPUT`)
 */
export async function writeTriggerOutputs(filePath: string, report: RunReport): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await appendFile(filePath, formatTriggerOutputs(report), 'utf-8');
}
