/**
 * RIS Writer - renders records back into tagged text
 *
 * Main entry points: dump(records, path) and dumps(records)
 */

import * as fs from 'fs';
import { ExportWarning, createExportWarning } from './errors';
import { createLogger } from './logger';
import { ResolvedWriterConfig, resolveWriterOptions } from './options';
import { RisFieldValue, RisRecord, WriterOptions } from './types';
import { isUnknownTags } from './values';

const log = createLogger({ component: 'writer' });

function logWarning(warning: ExportWarning): void {
  log.warn({ label: warning.label, record: warning.recordIndex, reason: warning.reason }, warning.message);
}

export class RisWriter {
  private readonly config: ResolvedWriterConfig;
  private readonly warn: (warning: ExportWarning) => void;

  constructor(options: WriterOptions = {}) {
    this.config = resolveWriterOptions(options);
    this.warn = this.config.onWarning ?? logWarning;
  }

  public static format(records: Iterable<RisRecord>, options?: WriterOptions): string {
    const writer = new RisWriter(options);
    return writer.format(records);
  }

  public static writeFile(records: Iterable<RisRecord>, filePath: string, options?: WriterOptions): void {
    const writer = new RisWriter(options);
    writer.writeFile(records, filePath);
  }

  /** The whole document, every line terminated by the configured newline. */
  public format(records: Iterable<RisRecord>): string {
    const lines = [...this.lines(records), ''];
    return lines.join(this.config.newline);
  }

  public writeFile(records: Iterable<RisRecord>, filePath: string): void {
    fs.writeFileSync(filePath, this.format(records), { encoding: this.config.encoding });
  }

  /** Output lines without terminators, produced lazily. */
  public *lines(records: Iterable<RisRecord>): Generator<string> {
    const { format } = this.config;
    yield* format.preamble;

    let index = 0;
    for (const record of records) {
      if (index > 0) {
        yield '';
      }
      yield* this.formatRecord(record, index);
      index += 1;
    }

    yield* format.trailer;
  }

  private *formatRecord(record: RisRecord, index: number): Generator<string> {
    const { format, header } = this.config;

    const counter = header ? format.recordHeader(index + 1) : null;
    if (counter !== null) {
      yield counter;
    }
    yield format.formatLine(format.startTag, this.referenceType(record));

    for (const [label, value] of Object.entries(record)) {
      yield* this.formatField(label, value, index);
    }

    if (format.endTag !== null) {
      yield format.formatLine(format.endTag);
    }
  }

  private *formatField(label: string, value: RisRecord[string], index: number): Generator<string> {
    const { format, reverseMapping, unknownField } = this.config;

    if (label === unknownField) {
      if (this.config.skipUnknownTags) {
        return;
      }
      if (isUnknownTags(value)) {
        for (const [tag, values] of Object.entries(value)) {
          for (const item of values) {
            yield format.formatLine(tag, item);
          }
        }
        return;
      }
    }

    const tag = reverseMapping.get(label) ?? reverseMapping.get(label.toLowerCase());
    if (tag === undefined || isUnknownTags(value)) {
      this.warn(createExportWarning('unmapped', label, index));
      return;
    }
    if (this.config.ignore.has(tag)) {
      return;
    }

    yield* this.formatValue(tag, label, value, index);
  }

  private *formatValue(tag: string, label: string, value: RisFieldValue, index: number): Generator<string> {
    const { format, delimiters, listTags, enforceListTags } = this.config;

    if (!Array.isArray(value)) {
      yield format.formatLine(tag, value);
      return;
    }

    const delimiter = delimiters.get(tag);
    if (delimiter !== undefined) {
      yield format.formatLine(tag, value.join(delimiter));
      return;
    }

    if (listTags.has(tag)) {
      let first = true;
      for (const item of value) {
        yield (first ? null : format.formatContinuation(item)) ?? format.formatLine(tag, item);
        first = false;
      }
      return;
    }

    if (!enforceListTags) {
      for (const item of value) {
        yield format.formatLine(tag, item);
      }
      return;
    }

    const [first] = value;
    if (first !== undefined) {
      yield format.formatLine(tag, first);
    }
    if (value.length > 1) {
      this.warn(createExportWarning('multiple-values', label, index));
    }
  }

  private referenceType(record: RisRecord): string {
    const value = record[this.config.startField];
    if (typeof value === 'string') {
      return value;
    }
    if (Array.isArray(value) && value[0] !== undefined) {
      return value[0];
    }
    return this.config.defaultReferenceType;
  }
}

// ============================================================================
// Public API
// ============================================================================

export function dump(records: Iterable<RisRecord>, filePath: string, options?: WriterOptions): void {
  RisWriter.writeFile(records, filePath, options);
}

export function dumps(records: Iterable<RisRecord>, options?: WriterOptions): string {
  return RisWriter.format(records, options);
}
