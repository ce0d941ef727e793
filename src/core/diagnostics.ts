/** Severity classes used by notation-loading diagnostics. */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/** Optional source location attached to a diagnostic record. */
export interface DiagnosticSource {
  line: number;
  column: number;
}

/**
 * Non-fatal finding collected while a notation file is loaded.
 * Fatal problems are thrown as `NotationLoadError` instead.
 */
export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  source?: DiagnosticSource;
  xmlPath?: string;
}

/** Render one diagnostic as a single log-friendly line. */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const location = diagnostic.source ? ` (${diagnostic.source.line}:${diagnostic.source.column})` : '';
  const path = diagnostic.xmlPath ? ` at ${diagnostic.xmlPath}` : '';
  return `[${diagnostic.code}] ${diagnostic.message}${path}${location}`;
}
