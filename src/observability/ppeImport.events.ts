import { buildLogEntry, type LogLevel, type LogSink } from '../lib/logger';
import type { ImportPhase, RowSkipReason } from '../services/ppeStock/types';

export const PPE_IMPORT_EVENT = {
  STARTED: 'PPE_IMPORT_STARTED',
  PHASE: 'PPE_IMPORT_PHASE',
  ROW_SKIPPED: 'PPE_IMPORT_ROW_SKIPPED',
  ROW_SLOW: 'PPE_IMPORT_ROW_SLOW',
  COMPLETED: 'PPE_IMPORT_COMPLETED',
  FAILED: 'PPE_IMPORT_FAILED',
  RUN_RECORD_FAILED: 'PPE_IMPORT_RUN_RECORD_FAILED'
} as const;

export type PpeImportEventName = (typeof PPE_IMPORT_EVENT)[keyof typeof PPE_IMPORT_EVENT];

export type PpeImportStartedPayload = {
  runId: string;
  fileName: string | null;
  bytes: number;
};

export type PpeImportPhasePayload = {
  runId: string;
  phase: ImportPhase;
};

export type PpeImportRowSkippedPayload = {
  runId: string;
  lineNumber: number;
  reason: RowSkipReason;
  detail?: string;
};

export type PpeImportRowSlowPayload = {
  runId: string;
  lineNumber: number;
  message: string;
};

export type PpeImportCompletedPayload = {
  runId: string;
  importedCount: number;
  skippedCount: number;
  durationMs: number;
};

export type PpeImportFailedPayload = {
  runId: string;
  errorCode: string;
  message: string;
};

export type PpeImportRunRecordFailedPayload = {
  runId: string;
  message: string;
};

type PpeImportEventPayloads = {
  [PPE_IMPORT_EVENT.STARTED]: PpeImportStartedPayload;
  [PPE_IMPORT_EVENT.PHASE]: PpeImportPhasePayload;
  [PPE_IMPORT_EVENT.ROW_SKIPPED]: PpeImportRowSkippedPayload;
  [PPE_IMPORT_EVENT.ROW_SLOW]: PpeImportRowSlowPayload;
  [PPE_IMPORT_EVENT.COMPLETED]: PpeImportCompletedPayload;
  [PPE_IMPORT_EVENT.FAILED]: PpeImportFailedPayload;
  [PPE_IMPORT_EVENT.RUN_RECORD_FAILED]: PpeImportRunRecordFailedPayload;
};

const EVENT_LEVELS: Record<PpeImportEventName, LogLevel> = {
  [PPE_IMPORT_EVENT.STARTED]: 'info',
  [PPE_IMPORT_EVENT.PHASE]: 'info',
  [PPE_IMPORT_EVENT.ROW_SKIPPED]: 'warn',
  [PPE_IMPORT_EVENT.ROW_SLOW]: 'warn',
  [PPE_IMPORT_EVENT.COMPLETED]: 'info',
  [PPE_IMPORT_EVENT.FAILED]: 'error',
  [PPE_IMPORT_EVENT.RUN_RECORD_FAILED]: 'error'
};

export function emitPpeImportEvent<E extends PpeImportEventName>(
  sink: LogSink,
  event: E,
  payload: PpeImportEventPayloads[E]
) {
  sink(buildLogEntry(EVENT_LEVELS[event], event, payload));
}
