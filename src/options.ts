import { z } from 'zod';
import { ConfigurationError } from './errors';
import { LineFormat, getLineFormat } from './lexer';
import { UNKNOWN_TAG, defaultTagsFor } from './tags';
import type { ExportWarning } from './errors';
import type { IncompleteRecordPolicy, ParserOptions, WriterOptions } from './types';
import { invertMapping } from './utils';

const tagCode = z.string().min(1).max(4);
const fieldName = z.string().min(1);

const dialectEnum = z.enum(['ris', 'wok', 'pubmed']);

const encoding = z.custom<BufferEncoding>(
  (value) => typeof value === 'string' && Buffer.isEncoding(value),
  { message: 'Unknown text encoding' },
);

const sharedShape = {
  dialect: dialectEnum.optional(),
  mapping: z.record(tagCode, fieldName).optional(),
  listTags: z.array(tagCode).optional(),
  delimiterTagsMapping: z.record(tagCode, z.string().min(1)).optional(),
  ignore: z.array(tagCode).optional(),
  skipUnknownTags: z.boolean().optional(),
  enforceListTags: z.boolean().optional(),
  encoding: encoding.optional(),
};

export const parserOptionsSchema = z
  .object({
    ...sharedShape,
    skipMissingTags: z.boolean().optional(),
    incompleteRecord: z.enum(['discard', 'error']).optional(),
    urlFields: z.array(fieldName).optional(),
  })
  .strict();

export const writerOptionsSchema = z
  .object({
    ...sharedShape,
    newline: z.string().min(1).optional(),
    defaultReferenceType: z.string().optional(),
    header: z.boolean().optional(),
    onWarning: z
      .custom<(warning: ExportWarning) => void>((value) => typeof value === 'function', {
        message: 'Expected a function',
      })
      .optional(),
  })
  .strict();

export interface ResolvedParserConfig {
  format: LineFormat;
  mapping: ReadonlyMap<string, string>;
  listTags: ReadonlySet<string>;
  delimiters: ReadonlyMap<string, string>;
  ignore: ReadonlySet<string>;
  // null when unknown tags are dropped
  unknownField: string | null;
  skipMissingTags: boolean;
  enforceListTags: boolean;
  incompleteRecord: IncompleteRecordPolicy;
  urlFields: readonly string[];
  encoding: BufferEncoding;
}

export interface ResolvedWriterConfig {
  format: LineFormat;
  // field name -> tag code
  reverseMapping: ReadonlyMap<string, string>;
  startField: string;
  listTags: ReadonlySet<string>;
  delimiters: ReadonlyMap<string, string>;
  // tags never written from record fields; the start and end tags are always included
  ignore: ReadonlySet<string>;
  unknownField: string | undefined;
  skipUnknownTags: boolean;
  enforceListTags: boolean;
  newline: string;
  defaultReferenceType: string;
  header: boolean;
  encoding: BufferEncoding;
  onWarning: ((warning: ExportWarning) => void) | null;
}

function validateOptions(schema: z.ZodTypeAny, options: unknown, label: string): void {
  const result = schema.safeParse(options);
  if (result.success) {
    return;
  }
  const issues = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  throw new ConfigurationError(`Invalid ${label} options`, issues);
}

function requireStartTag(mapping: ReadonlyMap<string, string>, format: LineFormat): string {
  const startField = mapping.get(format.startTag);
  if (startField === undefined) {
    throw new ConfigurationError(`Mapping has no field for the ${format.name} start tag ${format.startTag}`);
  }
  return startField;
}

export function resolveParserOptions(options: ParserOptions = {}): ResolvedParserConfig {
  validateOptions(parserOptionsSchema, options, 'parser');

  const format = getLineFormat(options.dialect ?? 'ris');
  const defaults = defaultTagsFor(format.name);
  const mapping = new Map(Object.entries(options.mapping ?? defaults.mapping));
  requireStartTag(mapping, format);

  let unknownField: string | null = null;
  if (!options.skipUnknownTags) {
    const field = mapping.get(UNKNOWN_TAG);
    if (field === undefined) {
      throw new ConfigurationError(
        `Mapping has no field for ${UNKNOWN_TAG}; set skipUnknownTags to drop unmapped tags instead`,
      );
    }
    unknownField = field;
  }

  const config: ResolvedParserConfig = {
    format,
    mapping,
    listTags: new Set(options.listTags ?? defaults.listTags),
    delimiters: new Map(Object.entries(options.delimiterTagsMapping ?? defaults.delimiters)),
    ignore: new Set(options.ignore ?? format.defaultIgnore),
    unknownField,
    skipMissingTags: options.skipMissingTags ?? false,
    enforceListTags: options.enforceListTags ?? true,
    incompleteRecord: options.incompleteRecord ?? 'discard',
    urlFields: options.urlFields ?? ['urls'],
    encoding: options.encoding ?? 'utf-8',
  };
  return Object.freeze(config);
}

export function resolveWriterOptions(options: WriterOptions = {}): ResolvedWriterConfig {
  validateOptions(writerOptionsSchema, options, 'writer');

  const format = getLineFormat(options.dialect ?? 'ris');
  const defaults = defaultTagsFor(format.name);
  const mapping = options.mapping ?? defaults.mapping;
  const reverseMapping = new Map(Object.entries(invertMapping(mapping)));
  const startField = requireStartTag(new Map(Object.entries(mapping)), format);

  const ignore = new Set(options.ignore ?? format.defaultIgnore);
  ignore.add(format.startTag);
  if (format.endTag !== null) {
    ignore.add(format.endTag);
  }

  const config: ResolvedWriterConfig = {
    format,
    reverseMapping,
    startField,
    listTags: new Set(options.listTags ?? defaults.listTags),
    delimiters: new Map(Object.entries(options.delimiterTagsMapping ?? defaults.delimiters)),
    ignore,
    unknownField: mapping[UNKNOWN_TAG],
    skipUnknownTags: options.skipUnknownTags ?? false,
    enforceListTags: options.enforceListTags ?? true,
    newline: options.newline ?? '\n',
    defaultReferenceType: options.defaultReferenceType ?? format.defaultReferenceType,
    header: options.header ?? true,
    encoding: options.encoding ?? 'utf-8',
    onWarning: options.onWarning ?? null,
  };
  return Object.freeze(config);
}
