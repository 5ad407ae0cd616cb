import pino from 'pino';
import { getConfig } from '../config.js';

let logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (logger) return logger;

  const config = getConfig();

  logger = pino({
    name: 'metabase-kpi-pipeline',
    level: config.LOG_LEVEL,
    transport:
      process.env.NODE_ENV !== 'production'
        ? {
            target: 'pino/file',
            options: { destination: 2 }, // stderr
          }
        : undefined,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });

  return logger;
}

export interface RunLogEntry {
  event: 'table.processed' | 'table.skipped' | 'kpi.validated' | 'kpi.registered' | 'run.completed';
  table?: string;
  kpi?: string;
  status?: string;
  error?: {
    code: string;
    message: string;
  };
  duration_ms?: number;
  counts?: Record<string, number>;
}

export function runLog(entry: RunLogEntry): void {
  const log = getLogger();
  log.info({ run: true, ...entry }, `[RUN] ${entry.event}`);
}
