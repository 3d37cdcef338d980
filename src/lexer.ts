/**
 * Line formats - classify, split and render the tag lines of each dialect
 */

import { DialectName } from './types';

export interface TagLine {
  kind: 'tag';
  tag: string;
  content: string;
}

export interface ContinuationLine {
  kind: 'continuation';
  content: string;
}

export type ClassifiedLine = TagLine | ContinuationLine;

/**
 * Everything the parser and writer need to know about one dialect. Formats
 * are stateless and shared.
 */
export interface LineFormat {
  readonly name: DialectName;
  readonly startTag: string;
  // null for dialects whose records end at the next start tag
  readonly endTag: string | null;
  readonly defaultIgnore: readonly string[];
  readonly defaultReferenceType: string;
  // document-level lines written before the first and after the last record
  readonly preamble: readonly string[];
  readonly trailer: readonly string[];

  isTag(line: string): boolean;
  extract(line: string): { tag: string; content: string };
  classify(line: string): ClassifiedLine;
  // only consulted for lines outside a record
  isHeader(line: string): boolean;
  formatLine(tag: string, value?: string): string;
  // line carrying a further value of the previous tag, or null when every value repeats the tag
  formatContinuation(value: string): string | null;
  recordHeader(count: number): string | null;
}

interface LineFormatDefinition {
  name: DialectName;
  startTag: string;
  endTag: string | null;
  pattern: RegExp;
  tagWidth: number;
  contentOffset: number;
  defaultIgnore?: readonly string[];
  defaultReferenceType: string;
  preamble?: readonly string[];
  trailer?: readonly string[];
  isHeader(line: string): boolean;
  formatLine(tag: string, value: string): string;
  formatContinuation?(value: string): string;
  recordHeader?(count: number): string;
}

class TaggedLineFormat implements LineFormat {
  readonly name: DialectName;
  readonly startTag: string;
  readonly endTag: string | null;
  readonly defaultIgnore: readonly string[];
  readonly defaultReferenceType: string;
  readonly preamble: readonly string[];
  readonly trailer: readonly string[];
  private readonly definition: LineFormatDefinition;

  constructor(definition: LineFormatDefinition) {
    this.definition = definition;
    this.name = definition.name;
    this.startTag = definition.startTag;
    this.endTag = definition.endTag;
    this.defaultIgnore = definition.defaultIgnore ?? [];
    this.defaultReferenceType = definition.defaultReferenceType;
    this.preamble = definition.preamble ?? [];
    this.trailer = definition.trailer ?? [];
  }

  isTag(line: string): boolean {
    return this.definition.pattern.test(line);
  }

  extract(line: string): { tag: string; content: string } {
    return {
      tag: line.slice(0, this.definition.tagWidth).trimEnd(),
      content: line.slice(this.definition.contentOffset).trim(),
    };
  }

  classify(line: string): ClassifiedLine {
    if (this.isTag(line)) {
      return { kind: 'tag', ...this.extract(line) };
    }
    return { kind: 'continuation', content: line.trim() };
  }

  isHeader(line: string): boolean {
    return this.definition.isHeader(line);
  }

  formatLine(tag: string, value = ''): string {
    return this.definition.formatLine(tag, value);
  }

  formatContinuation(value: string): string | null {
    return this.definition.formatContinuation ? this.definition.formatContinuation(value) : null;
  }

  recordHeader(count: number): string | null {
    return this.definition.recordHeader ? this.definition.recordHeader(count) : null;
  }
}

const RIS_COUNTER_REGEX = /^[0-9]+./;

/** `TY  - JOUR`, records closed by `ER  - `, optionally numbered `1.` */
export const RIS_FORMAT: LineFormat = new TaggedLineFormat({
  name: 'ris',
  startTag: 'TY',
  endTag: 'ER',
  pattern: /^[A-Z][A-Z0-9] {2}- |^ER {2}-\s*$/,
  tagWidth: 2,
  contentOffset: 6,
  defaultReferenceType: 'JOUR',
  isHeader: (line) => RIS_COUNTER_REGEX.test(line),
  formatLine: (tag, value) => `${tag}  - ${value}`,
  recordHeader: (count) => `${count}.`,
});

/**
 * Web of Science export: `PT J`, records closed by a bare `ER`, values
 * continued on indented lines. Anything else outside a record is file noise.
 */
export const WOK_FORMAT: LineFormat = new TaggedLineFormat({
  name: 'wok',
  startTag: 'PT',
  endTag: 'ER',
  pattern: /^[A-Z][A-Z0-9](?: |$)/,
  tagWidth: 2,
  contentOffset: 3,
  defaultIgnore: ['FN', 'VR', 'EF'],
  defaultReferenceType: 'J',
  preamble: ['FN Clarivate Analytics Web of Science', 'VR 1.0'],
  trailer: ['', 'EF'],
  isHeader: () => true,
  formatLine: (tag, value) => (value ? `${tag} ${value}` : tag),
  formatContinuation: (value) => `   ${value}`,
});

/**
 * MEDLINE/PubMed export: four-column tag field with the dash at offset 4.
 * There is no end tag; each `PMID` line starts a new record.
 */
export const PUBMED_FORMAT: LineFormat = new TaggedLineFormat({
  name: 'pubmed',
  startTag: 'PMID',
  endTag: null,
  pattern: /^[A-Z][A-Z0-9 ]{3}-(?: |$)/,
  tagWidth: 4,
  contentOffset: 6,
  defaultReferenceType: '',
  isHeader: () => false,
  formatLine: (tag, value) => `${tag.padEnd(4)}- ${value}`,
});

const LINE_FORMATS: Record<DialectName, LineFormat> = {
  ris: RIS_FORMAT,
  wok: WOK_FORMAT,
  pubmed: PUBMED_FORMAT,
};

export function getLineFormat(dialect: DialectName): LineFormat {
  return LINE_FORMATS[dialect];
}
