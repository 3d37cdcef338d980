/**
 * Type definitions for the RIS reader and writer
 */

import type { ExportWarning } from './errors';

// Supported line dialects
export type DialectName = 'ris' | 'wok' | 'pubmed';

// Tag code -> field name, e.g. { AU: 'authors' }
export type TagMapping = Record<string, string>;

// Tag code -> literal separator used to split or join a single line
export type DelimiterMapping = Record<string, string>;

// Unmapped tag code -> every value seen for it, in input order
export type UnknownTags = Record<string, string[]>;

export type RisFieldValue = string | string[];

export type RisValue = RisFieldValue | UnknownTags;

/**
 * One reference. Keys keep the order in which fields were first written, and
 * the writer emits them in that order.
 */
export type RisRecord = Record<string, RisValue>;

// What to do when the input ends inside a record of a dialect that has an end tag
export type IncompleteRecordPolicy = 'discard' | 'error';

export interface ParserOptions {
  dialect?: DialectName | undefined;
  mapping?: TagMapping | undefined;
  listTags?: readonly string[] | undefined;
  delimiterTagsMapping?: DelimiterMapping | undefined;
  ignore?: readonly string[] | undefined;
  skipMissingTags?: boolean | undefined;
  skipUnknownTags?: boolean | undefined;
  enforceListTags?: boolean | undefined;
  incompleteRecord?: IncompleteRecordPolicy | undefined;
  urlFields?: readonly string[] | undefined;
  encoding?: BufferEncoding | undefined;
}

export interface WriterOptions {
  dialect?: DialectName | undefined;
  mapping?: TagMapping | undefined;
  listTags?: readonly string[] | undefined;
  delimiterTagsMapping?: DelimiterMapping | undefined;
  ignore?: readonly string[] | undefined;
  skipUnknownTags?: boolean | undefined;
  enforceListTags?: boolean | undefined;
  newline?: string | undefined;
  defaultReferenceType?: string | undefined;
  header?: boolean | undefined;
  encoding?: BufferEncoding | undefined;
  onWarning?: ((warning: ExportWarning) => void) | undefined;
}
