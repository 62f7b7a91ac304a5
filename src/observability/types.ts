// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  /** Module emitting the entry (e.g. 'migrations', 'beat'). */
  component: string;
  jobId?: string;
  task?: string;
  [key: string]: unknown;
}
