export interface SourceLocation {
  source?: string | undefined;
  row?: number | undefined;
  lineText?: string | undefined;
}

export class RisError extends Error {
  source?: string | undefined;
  row?: number | undefined;
  lineText?: string | undefined;

  constructor(message: string, location: SourceLocation = {}) {
    const formatted = formatRisErrorMessage(message, location);
    super(formatted);
    this.name = 'RisError';
    this.source = location.source;
    this.row = location.row;
    this.lineText = location.lineText;
  }
}

/**
 * Malformed input. Always carries the 1-based row and the offending line.
 */
export class ParseError extends RisError {
  declare row: number;
  declare lineText: string;

  constructor(message: string, location: SourceLocation & { row: number; lineText: string }) {
    super(message, location);
    this.name = 'ParseError';
  }
}

/**
 * Invalid parser or writer options: a mapping that cannot be inverted, a
 * mapping without a required tag, or options that fail validation.
 */
export class ConfigurationError extends RisError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export type ExportWarningReason = 'unmapped' | 'multiple-values';

/**
 * Raised by the writer for a record field it cannot write in full. Delivered
 * to the `onWarning` callback, never thrown.
 */
export interface ExportWarning {
  kind: 'export';
  reason: ExportWarningReason;
  label: string;
  message: string;
  recordIndex: number;
}

export function createExportWarning(reason: ExportWarningReason, label: string, recordIndex: number): ExportWarning {
  const message = reason === 'unmapped'
    ? `label \`${label}\` not exported`
    : `label \`${label}\` has several values for a single-value tag; only the first was exported`;
  return { kind: 'export', reason, label, message, recordIndex };
}

function formatRisErrorMessage(message: string, location: SourceLocation): string {
  const parts: string[] = [];
  if (location.source) {
    parts.push(location.source);
  }
  if (typeof location.row === 'number') {
    parts.push(`${location.row}`);
  }
  const locationPrefix = parts.length > 0 ? `${parts.join(':')} - ` : '';
  const lineText = location.lineText ? location.lineText.replace(/\r?\n$/, '') : undefined;
  const decorated = `${locationPrefix}${message}`;
  if (lineText) {
    return `${decorated}\n    ${lineText}`;
  }
  return decorated;
}
