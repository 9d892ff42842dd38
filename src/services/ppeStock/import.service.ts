import { v4 as uuidv4 } from 'uuid';
import type { PpeImportConfig } from '../../config/ppeImport';
import { parseCsvLine, splitCsvLines } from '../../lib/csv';
import { getErrorCode, getErrorMessage } from '../../lib/errors';
import { consoleSink, type LogSink } from '../../lib/logger';
import { TimeoutError, withTimeout } from '../../lib/timeouts';
import { emitPpeImportEvent, PPE_IMPORT_EVENT } from '../../observability/ppeImport.events';
import {
  buildReferenceIndex,
  evaluateImportRow,
  resolveImportColumns,
  type ImportColumns,
  type ReferenceIndex
} from './importRows';
import {
  systemClock,
  type Clock,
  type ImportOutcome,
  type ImportPhase,
  type ImportRow,
  type ImportRun,
  type PpeStockStore,
  type RowError,
  type RowSkipReason,
  type StockReceiptRecord
} from './types';

export type ImportStockReceiptsInput = {
  csvText: string;
  userId: string;
  fileName?: string | null;
};

export type ImportStockReceiptsOptions = {
  includeRowErrors?: boolean;
  clock?: Clock;
  log?: LogSink;
  onPhase?: (phase: ImportPhase) => void;
  generateId?: () => string;
};

type PreparedImport = {
  columns: ImportColumns;
  rows: ImportRow[];
  references: ReferenceIndex;
};

async function prepareImport(
  store: PpeStockStore,
  csvText: string,
  bytes: number,
  config: PpeImportConfig,
  enter: (phase: ImportPhase) => void
): Promise<PreparedImport> {
  enter('parsing_header');
  if (bytes > config.maxBytes) {
    throw new Error('PPE_IMPORT_FILE_TOO_LARGE');
  }
  const lines = splitCsvLines(csvText);
  if (lines.length === 0) {
    throw new Error('PPE_IMPORT_EMPTY');
  }
  const [headerLine, ...dataLines] = lines;
  if (dataLines.length > config.maxRows) {
    throw new Error('PPE_IMPORT_ROW_LIMIT');
  }
  const columns = resolveImportColumns(parseCsvLine(headerLine.text), config.itemLabel);
  const rows = dataLines.map((line) => ({ rawFields: parseCsvLine(line.text), lineNumber: line.lineNumber }));

  // One catalog snapshot per import; every row resolves against it.
  const [items, sizes] = await Promise.all([store.listActiveItems(), store.listActiveSizes()]);
  return { columns, rows, references: buildReferenceIndex(items, sizes) };
}

/**
 * Waits for one insert to settle. Past `timeoutMs` the row is reported as
 * slow but still awaited, so writes never overlap and the row counts by how
 * the insert actually ended.
 */
async function persistRow(
  insert: Promise<void>,
  timeoutMs: number,
  lineNumber: number,
  onSlow: (message: string) => void
): Promise<void> {
  try {
    await withTimeout(insert, timeoutMs, `stock receipt insert (line ${lineNumber})`);
  } catch (error) {
    if (!(error instanceof TimeoutError)) throw error;
    onSlow(error.message);
    await insert;
  }
}

/**
 * Imports stock receipts from CSV text.
 *
 * Header problems, an empty or oversized file abort before any row is read.
 * After that every row is handled on its own: a row that fails to resolve,
 * validate or persist is counted as skipped and the batch carries on. Rows
 * are written one at a time in file order; nothing already written is rolled
 * back.
 */
export async function importStockReceipts(
  store: PpeStockStore,
  input: ImportStockReceiptsInput,
  config: PpeImportConfig,
  options: ImportStockReceiptsOptions = {}
): Promise<ImportOutcome> {
  const clock = options.clock ?? systemClock;
  const sink = options.log ?? consoleSink;
  const runId = (options.generateId ?? uuidv4)();
  const fileName = input.fileName ?? null;
  const startedAt = clock();
  const bytes = Buffer.byteLength(input.csvText, 'utf8');

  const enter = (phase: ImportPhase) => {
    options.onPhase?.(phase);
    emitPpeImportEvent(sink, PPE_IMPORT_EVENT.PHASE, { runId, phase });
  };

  const recordRun = async (run: Omit<ImportRun, 'id' | 'fileName' | 'createdBy' | 'startedAt' | 'finishedAt'>) => {
    try {
      await store.recordImportRun({
        ...run,
        id: runId,
        fileName,
        createdBy: input.userId,
        startedAt,
        finishedAt: clock()
      });
      return true;
    } catch (error) {
      emitPpeImportEvent(sink, PPE_IMPORT_EVENT.RUN_RECORD_FAILED, { runId, message: getErrorMessage(error) });
      return false;
    }
  };

  emitPpeImportEvent(sink, PPE_IMPORT_EVENT.STARTED, { runId, fileName, bytes });

  const { columns, rows, references } = await prepareImport(store, input.csvText, bytes, config, enter).catch(
    async (error: unknown) => {
      enter('failed');
      const errorCode = getErrorCode(error);
      emitPpeImportEvent(sink, PPE_IMPORT_EVENT.FAILED, { runId, errorCode, message: getErrorMessage(error) });
      await recordRun({ status: 'failed', importedCount: 0, skippedCount: 0, rowErrors: [], errorCode });
      throw error;
    }
  );

  enter('processing_rows');
  const now = clock();
  const records: StockReceiptRecord[] = [];
  const rowErrors: RowError[] = [];
  let skippedCount = 0;

  const skip = (lineNumber: number, reason: RowSkipReason, detail?: string) => {
    skippedCount += 1;
    if (rowErrors.length < config.maxRowErrors) {
      rowErrors.push({ lineNumber, reason });
    }
    emitPpeImportEvent(sink, PPE_IMPORT_EVENT.ROW_SKIPPED, { runId, lineNumber, reason, detail });
  };

  for (const row of rows) {
    const evaluation = evaluateImportRow(row, {
      columns,
      index: references,
      submittedBy: input.userId,
      now
    });
    if (!evaluation.ok) {
      skip(row.lineNumber, evaluation.reason);
      continue;
    }

    try {
      await persistRow(store.insertStockReceipt(evaluation.record), config.rowTimeoutMs, row.lineNumber, (message) =>
        emitPpeImportEvent(sink, PPE_IMPORT_EVENT.ROW_SLOW, { runId, lineNumber: row.lineNumber, message })
      );
      records.push(evaluation.record);
    } catch (error) {
      skip(row.lineNumber, 'PERSIST_FAILED', getErrorMessage(error));
    }
  }

  enter('completed');
  const importedCount = records.length;
  const recorded = await recordRun({
    status: 'completed',
    importedCount,
    skippedCount,
    rowErrors,
    errorCode: null
  });
  emitPpeImportEvent(sink, PPE_IMPORT_EVENT.COMPLETED, {
    runId,
    importedCount,
    skippedCount,
    durationMs: clock().getTime() - startedAt.getTime()
  });

  const outcome: ImportOutcome = {
    runId: recorded ? runId : null,
    importedCount,
    skippedCount,
    records
  };
  if (options.includeRowErrors) {
    outcome.rowErrors = rowErrors;
  }
  return outcome;
}

export function formatImportSummary(outcome: Pick<ImportOutcome, 'importedCount' | 'skippedCount'>): string {
  const skipped = outcome.skippedCount > 0 ? `; ${outcome.skippedCount} skipped` : '';
  return `Imported ${outcome.importedCount} row(s)${skipped}`;
}
