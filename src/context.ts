/**
 * ParseContext - state of one parse call: the open record and the tag that
 * continuation lines extend
 */

import { ResolvedParserConfig } from './options';
import { SourceLine } from './source';
import { UNKNOWN_TAG } from './tags';
import { RisRecord } from './types';
import {
  addScalarValue,
  addUnknownValue,
  appendListValue,
  extendScalarValue,
  splitDelimited,
  splitSemicolonList,
  toList,
} from './values';

export type LastTag =
  | { kind: 'field'; tag: string; field: string }
  | { kind: 'unknown'; tag: string; field: string }
  | { kind: 'skipped'; tag: string };

export class ParseContext {
  private readonly config: ResolvedParserConfig;
  private current: RisRecord | null = null;
  private openedAt: SourceLine | null = null;
  private lastTag: LastTag | null = null;

  constructor(config: ResolvedParserConfig) {
    this.config = config;
  }

  get inRecord(): boolean {
    return this.current !== null;
  }

  // the start tag is added right after open(), so this is false only for a
  // record opened without one
  get hasLastTag(): boolean {
    return this.lastTag !== null;
  }

  // line holding the start tag of the open record
  get openingLine(): SourceLine | null {
    return this.openedAt;
  }

  open(line: SourceLine): void {
    this.current = {};
    this.openedAt = line;
    this.lastTag = null;
  }

  /**
   * Finalizes and returns the open record, leaving the context outside any
   * record.
   */
  close(): RisRecord {
    const record = this.current ?? {};
    for (const field of this.config.urlFields) {
      splitSemicolonList(record, field);
    }
    this.current = null;
    this.openedAt = null;
    this.lastTag = null;
    return record;
  }

  addTag(tag: string, content: string): void {
    const record = this.requireRecord();
    const field = this.config.mapping.get(tag);
    // a literal UK tag in the input is kept with the other unmapped tags
    if (field === undefined || tag === UNKNOWN_TAG) {
      this.addUnknownTag(tag, content);
      return;
    }
    this.lastTag = { kind: 'field', tag, field };

    const delimiter = this.config.delimiters.get(tag);
    const value = delimiter === undefined ? content : splitDelimited(content, delimiter);
    if (this.config.listTags.has(tag)) {
      appendListValue(record, field, toList(value));
    } else {
      addScalarValue(record, field, value, !this.config.enforceListTags);
    }
  }

  addUnknownTag(tag: string, content: string): void {
    const record = this.requireRecord();
    const field = this.config.unknownField;
    if (field === null) {
      this.skipTag(tag);
      return;
    }
    this.lastTag = { kind: 'unknown', tag, field };
    addUnknownValue(record, field, tag, content);
  }

  // later continuation lines belong to this tag and are dropped with it
  skipTag(tag: string): void {
    if (this.current !== null) {
      this.lastTag = { kind: 'skipped', tag };
    }
  }

  /**
   * Adds a continuation line to the most recently written tag. List and
   * unknown tags gain a new element; scalar tags are joined with a space.
   */
  continueLastTag(content: string): void {
    const record = this.requireRecord();
    const last = this.lastTag;
    if (last === null || last.kind === 'skipped') {
      return;
    }
    if (last.kind === 'unknown') {
      addUnknownValue(record, last.field, last.tag, content);
      return;
    }

    const delimiter = this.config.delimiters.get(last.tag);
    const parts = delimiter === undefined ? null : splitDelimited(content, delimiter);
    if (this.config.listTags.has(last.tag)) {
      appendListValue(record, last.field, parts ?? [content]);
    } else {
      extendScalarValue(record, last.field, content, parts);
    }
  }

  private requireRecord(): RisRecord {
    if (this.current === null) {
      throw new Error('No record is open');
    }
    return this.current;
  }
}
