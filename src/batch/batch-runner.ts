/**
 * Batch Runner
 *
 * Runs the quality gate over many documents with bounded concurrency. Each
 * document gets its own controller, so runs share no state.
 */

import type { QualityGateConfig } from '../config/gate-config';
import { serializeError, type SerializedError } from '../errors/gate-error';
import type { Document } from '../models/document';
import type { LoopResult, TerminalReason } from '../models/loop';
import type { QualityGateController } from '../quality-gate/quality-gate-controller';

export type ControllerFactory = (document: Document, index: number) => QualityGateController;

export interface BatchOptions {
  /** Documents in flight at once; defaults to 2 */
  concurrency?: number;
  config?: Partial<QualityGateConfig>;
  /** Shared by every run; each stops between iterations once aborted */
  signal?: AbortSignal;
  onItemComplete?: (item: BatchItemResult) => void;
}

export interface BatchItemResult {
  index: number;
  documentId: string;
  terminalReason: TerminalReason;
  result?: LoopResult;
  /** Set when run() threw (invalid input) or ended in error */
  error?: SerializedError;
}

export interface BatchSummary {
  total: number;
  passed: number;
  exhausted: number;
  error: number;
  cancelled: number;
}

export interface BatchResult {
  /** In input order */
  items: BatchItemResult[];
  summary: BatchSummary;
}

export function summarize(items: readonly BatchItemResult[]): BatchSummary {
  const summary: BatchSummary = { total: items.length, passed: 0, exhausted: 0, error: 0, cancelled: 0 };
  for (const item of items) {
    summary[item.terminalReason] += 1;
  }
  return summary;
}

export async function runBatch(
  documents: readonly Document[],
  createController: ControllerFactory,
  options: BatchOptions = {}
): Promise<BatchResult> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 2));
  const items: BatchItemResult[] = new Array(documents.length);
  let next = 0;

  const runOne = async (index: number): Promise<BatchItemResult> => {
    const document = documents[index];
    try {
      const result = await createController(document, index).run(document, options.config, {
        signal: options.signal,
      });
      return {
        index,
        documentId: document.id,
        terminalReason: result.terminalReason,
        result,
        error: result.error,
      };
    } catch (error) {
      return { index, documentId: document.id, terminalReason: 'error', error: serializeError(error) };
    }
  };

  const worker = async (): Promise<void> => {
    while (next < documents.length) {
      const index = next++;
      const item = await runOne(index);
      items[index] = item;
      options.onItemComplete?.(item);
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(concurrency, documents.length); i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  return { items, summary: summarize(items) };
}
