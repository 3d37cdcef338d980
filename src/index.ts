/**
 * risport
 * Reader and writer for RIS, Web of Science and PubMed tagged bibliography files
 */

export { RisParser, load, loads } from './parser';
export type { ParseStep } from './parser';
export { RisWriter, dump, dumps } from './writer';
export { RisError, ParseError, ConfigurationError, createExportWarning } from './errors';
export type { ExportWarning, ExportWarningReason, SourceLocation } from './errors';
export { RIS_FORMAT, WOK_FORMAT, PUBMED_FORMAT, getLineFormat } from './lexer';
export type { LineFormat, ClassifiedLine, TagLine, ContinuationLine } from './lexer';
export {
  UNKNOWN_TAG,
  TAG_KEY_MAPPING,
  LIST_TYPE_TAGS,
  DELIMITED_TAG_MAPPING,
  WOK_TAG_KEY_MAPPING,
  WOK_LIST_TYPE_TAGS,
  PUBMED_TAG_KEY_MAPPING,
  PUBMED_LIST_TYPE_TAGS,
  TYPE_OF_REFERENCE_MAPPING,
  defaultTagsFor,
} from './tags';
export { invertMapping, convertReferenceTypes } from './utils';
export type { ConvertReferenceTypesOptions } from './utils';
export type {
  DialectName,
  TagMapping,
  DelimiterMapping,
  UnknownTags,
  RisFieldValue,
  RisValue,
  RisRecord,
  IncompleteRecordPolicy,
  ParserOptions,
  WriterOptions,
} from './types';

// Default export for convenience
export { loads as default } from './parser';
