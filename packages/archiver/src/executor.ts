import { errorMessage, silentLogger, type Logger } from '@dashboard-git/core';
import type { DashboardClient, OperationTable } from '@dashboard-git/dashboard-client';

import type { ArchiveContext } from './context.js';
import type { SettingsWriter, WriteOutcome } from './persistence.js';
import type { PlannedCall } from './planner.js';

/**
 * Runs `fn` over `items` with at most `concurrency` calls in flight. A
 * rejected call is handed to `onError` and the pool moves on.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, idx: number) => Promise<void>,
  onError: (err: unknown, item: T) => void
): Promise<void> {
  let next = 0;
  const size = Math.max(1, Math.min(concurrency, items.length));
  const workers = Array.from({ length: size }, async () => {
    while (next < items.length) {
      const idx = next;
      next += 1;
      const item = items[idx];
      if (item === undefined) break;
      try {
        await fn(item, idx);
      } catch (err) {
        onError(err, item);
      }
    }
  });
  await Promise.all(workers);
}

export interface PhaseStats {
  planned: number;
  succeeded: number;
  failed: number;
  outcomes: Record<WriteOutcome, number>;
}

export function emptyStats(): PhaseStats {
  return { planned: 0, succeeded: 0, failed: 0, outcomes: { written: 0, empty: 0, default: 0, unassigned: 0 } };
}

export function addStats(total: PhaseStats, phase: PhaseStats): PhaseStats {
  return {
    planned: total.planned + phase.planned,
    succeeded: total.succeeded + phase.succeeded,
    failed: total.failed + phase.failed,
    outcomes: {
      written: total.outcomes.written + phase.outcomes.written,
      empty: total.outcomes.empty + phase.outcomes.empty,
      default: total.outcomes.default + phase.outcomes.default,
      unassigned: total.outcomes.unassigned + phase.outcomes.unassigned,
    },
  };
}

export interface ExecuteOptions {
  client: DashboardClient;
  operations: OperationTable;
  context: ArchiveContext;
  writer: SettingsWriter;
  concurrency: number;
  logger?: Logger;
}

/**
 * Issues one phase's calls. Failures are logged with the call's identifier
 * and dropped; everything that succeeded is written before this resolves.
 */
export async function executeCalls(calls: readonly PlannedCall[], opts: ExecuteOptions): Promise<PhaseStats> {
  const logger = opts.logger ?? silentLogger;
  const stats = emptyStats();
  stats.planned = calls.length;

  await runPool(
    calls,
    opts.concurrency,
    async (call) => {
      const invoker = opts.operations.get(call.operationId);
      if (!invoker) throw new Error(`${call.operationId} is not in the live API`);

      const response = await invoker.invoke(opts.client, call.target, call.query);
      const outcome = await opts.writer.write(call.fileName, response, call.directory);
      opts.context.completedOperations.add(call.operationId);
      opts.context.capture(call.operationId, response);

      stats.succeeded += 1;
      stats.outcomes[outcome] += 1;
      logger.debug(`${call.operationId} ${call.identifier}: ${outcome}`);
    },
    (err, call) => {
      stats.failed += 1;
      logger.error(`Error with ${call.identifier} (${call.operationId}): ${errorMessage(err)}`);
    }
  );

  return stats;
}
