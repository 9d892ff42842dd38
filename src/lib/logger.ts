import { getRequestContext } from './requestContext';

export type LogLevel = 'info' | 'warn' | 'error';

export type LogEntry = {
  level: LogLevel;
  event: string;
  requestId?: string;
  userId?: string | null;
  timestamp: string;
  [key: string]: unknown;
};

export type LogSink = (entry: LogEntry) => void;

export const consoleSink: LogSink = (entry) => {
  const line = JSON.stringify(entry);
  if (entry.level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
};

export function buildLogEntry(level: LogLevel, event: string, fields: Record<string, unknown> = {}): LogEntry {
  const context = getRequestContext();
  return {
    ...fields,
    level,
    event,
    requestId: context?.requestId,
    userId: context?.userId ?? undefined,
    timestamp: new Date().toISOString()
  };
}

export function logEvent(
  level: LogLevel,
  event: string,
  fields: Record<string, unknown> = {},
  sink: LogSink = consoleSink
) {
  sink(buildLogEntry(level, event, fields));
}
