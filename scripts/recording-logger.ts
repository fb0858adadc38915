import type { Logger } from '../src/shared/logger';

export interface LoggedEntry {
  level: 'trace' | 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context: Record<string, unknown>;
}

/** Logger that keeps every entry, child context merged in, for assertions. */
export function createRecordingLogger(entries: LoggedEntry[] = [], base: Record<string, unknown> = {}): Logger & { entries: LoggedEntry[] } {
  const record = (level: LoggedEntry['level']) => (message: string, context?: Record<string, unknown>) => {
    entries.push({ level, message, context: { ...base, ...context } });
  };

  return {
    entries,
    child: (context) => createRecordingLogger(entries, { ...base, ...context }),
    trace: record('trace'),
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error')
  };
}
