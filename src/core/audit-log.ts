/**
 * =============================================================================
 * Audit Log - Global logging utility
 * Replaces console.log and console.error throughout the application
 *
 * Metadata keys that may carry secrets or user content are redacted before
 * an entry is written.
 * =============================================================================
 */

export interface AuditLogEntry {
  timestamp: string;
  code: string;
  meta: Record<string, unknown>;
}

export interface AuditLog {
  record: (code: string, meta: Record<string, unknown>) => void;
  trace: (msg: string) => void;
}

export interface AuditLogOptions {
  /** Receives one JSON line per recorded error. Defaults to stderr. */
  errorSink?: (line: string) => void;
  /** Receives trace lines. Defaults to stdout. */
  traceSink?: (line: string) => void;
  /** Trace output is off in production unless forced. */
  traceEnabled?: () => boolean;
}

const REDACTED_KEYS = new Set(['token', 'fileRef', 'fileRefs', 'files', 'text']);

function redact(meta: Record<string, unknown>): Record<string, unknown> {
  const safe: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    safe[key] = REDACTED_KEYS.has(key) ? '[redacted]' : value;
  }
  return safe;
}

/**
 * Creates an audit log writing to the given sinks
 */
export function createAuditLog(options: AuditLogOptions = {}): AuditLog {
  const {
    errorSink = (line: string) => process.stderr.write(line),
    traceSink = (line: string) => process.stdout.write(line),
    traceEnabled = () => process.env.NODE_ENV !== 'production',
  } = options;

  const record = (code: string, meta: Record<string, unknown>): void => {
    const entry: AuditLogEntry = {
      timestamp: new Date().toISOString(),
      code,
      meta: redact(meta),
    };
    errorSink(JSON.stringify(entry) + '\n');
  };

  const trace = (msg: string): void => {
    if (traceEnabled()) {
      traceSink(`[TRACE] ${new Date().toISOString()} ${msg}\n`);
    }
  };

  return { record, trace };
}

/**
 * Global audit log instance
 */
export const auditLog = createAuditLog();
