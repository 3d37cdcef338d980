/**
 * RIS Parser - turns tagged bibliography text into records
 *
 * Main entry points: load(path) and loads(content)
 */

import * as fs from 'fs';
import { ParseContext } from './context';
import { ParseError } from './errors';
import { TagLine } from './lexer';
import { ResolvedParserConfig, resolveParserOptions } from './options';
import { SourceLine, coerceContentToLines, numberLines } from './source';
import { ParserOptions, RisRecord } from './types';

// ============================================================================
// Line steps
// ============================================================================

/** Outcome of feeding one line to the state machine. */
export type ParseStep =
  | { kind: 'emit'; record: RisRecord }
  | { kind: 'skip' }
  | { kind: 'error'; error: ParseError };

const SKIP: ParseStep = { kind: 'skip' };

function emit(record: RisRecord): ParseStep {
  return { kind: 'emit', record };
}

function fail(message: string, line: SourceLine): ParseStep {
  return { kind: 'error', error: createParseError(message, line) };
}

function createParseError(message: string, line: SourceLine): ParseError {
  return new ParseError(message, { source: line.source, row: line.row, lineText: line.text });
}

// ============================================================================
// RisParser
// ============================================================================

/**
 * Reads one dialect with a fixed configuration. Parse state lives in a
 * ParseContext created per call, so an instance can be reused.
 */
export class RisParser {
  private readonly config: ResolvedParserConfig;

  constructor(options: ParserOptions = {}) {
    this.config = resolveParserOptions(options);
  }

  public static parse(content: string, options?: ParserOptions): RisRecord[] {
    const parser = new RisParser(options);
    return parser.parse(content);
  }

  public static parseFile(filePath: string, options?: ParserOptions): RisRecord[] {
    const parser = new RisParser(options);
    return parser.parseFile(filePath);
  }

  public parse(content: string, source?: string): RisRecord[] {
    return [...this.iterate(content, source)];
  }

  public parseFile(filePath: string): RisRecord[] {
    const content = fs.readFileSync(filePath, { encoding: this.config.encoding });
    return this.parse(content, filePath);
  }

  /**
   * Yields records one at a time. A ParseError is thrown at the offending
   * line; records yielded before it stay valid.
   */
  public iterate(content: string, source?: string): Generator<RisRecord> {
    return this.processLines(coerceContentToLines(content, source));
  }

  /** Parses lines supplied one by one, e.g. from a line reader. */
  public parseLines(lines: Iterable<string>, source?: string): Generator<RisRecord> {
    return this.processLines(numberLines(lines, source));
  }

  private *processLines(lines: Iterable<SourceLine>): Generator<RisRecord> {
    const context = new ParseContext(this.config);

    for (const line of lines) {
      const step = this.step(context, line);
      if (step.kind === 'emit') {
        yield step.record;
      } else if (step.kind === 'error') {
        throw step.error;
      }
    }

    const last = this.finish(context);
    if (last !== null) {
      yield last;
    }
  }

  private step(context: ParseContext, line: SourceLine): ParseStep {
    if (line.isBlank()) {
      return SKIP;
    }
    const classified = this.config.format.classify(line.text);
    if (classified.kind === 'tag') {
      return this.stepTag(context, line, classified);
    }
    return this.stepContinuation(context, line, classified.content);
  }

  private stepTag(context: ParseContext, line: SourceLine, { tag, content }: TagLine): ParseStep {
    const { format, ignore } = this.config;

    if (ignore.has(tag)) {
      context.skipTag(tag);
      return SKIP;
    }

    if (tag === format.endTag) {
      return context.inRecord ? emit(context.close()) : SKIP;
    }

    if (tag === format.startTag) {
      if (!context.inRecord) {
        context.open(line);
        context.addTag(tag, content);
        return SKIP;
      }
      if (format.endTag !== null) {
        return fail('Missing end of record tag', line);
      }
      const previous = context.close();
      context.open(line);
      context.addTag(tag, content);
      return emit(previous);
    }

    if (!context.inRecord) {
      return format.isHeader(line.text) ? SKIP : fail('Invalid start tag', line);
    }

    context.addTag(tag, content);
    return SKIP;
  }

  private stepContinuation(context: ParseContext, line: SourceLine, content: string): ParseStep {
    if (this.config.skipMissingTags) {
      return SKIP;
    }
    if (context.inRecord) {
      if (!context.hasLastTag) {
        return fail('Expected tag', line);
      }
      context.continueLastTag(content);
      return SKIP;
    }
    return this.config.format.isHeader(line.text) ? SKIP : fail('Expected start tag', line);
  }

  /**
   * Handles end of input. Without an end tag the open record is complete;
   * otherwise it is discarded or reported, as configured.
   */
  private finish(context: ParseContext): RisRecord | null {
    const opening = context.openingLine;
    if (!context.inRecord || opening === null) {
      return null;
    }
    if (this.config.format.endTag === null) {
      return context.close();
    }
    if (this.config.incompleteRecord === 'error') {
      throw createParseError('Missing end of record tag before end of input', opening);
    }
    context.close();
    return null;
  }
}

// ============================================================================
// Public API
// ============================================================================

export function load(filePath: string, options?: ParserOptions): RisRecord[] {
  return RisParser.parseFile(filePath, options);
}

export function loads(content: string, options?: ParserOptions): RisRecord[] {
  return RisParser.parse(content, options);
}
