const BYTE_ORDER_MARK = /^\uFEFF+/;

export interface SourceLineInit {
  row?: number | undefined;
  source?: string | undefined;
}

export class SourceLine {
  readonly text: string;
  readonly row: number;
  readonly source?: string | undefined;

  constructor(text: string, init: SourceLineInit = {}) {
    this.text = text.replace(/\r?\n$/, '').replace(/\r$/, '');
    this.row = init.row ?? 1;
    this.source = init.source;
  }

  isBlank(): boolean {
    return this.text.trim() === '';
  }

  toString(): string {
    return this.text;
  }
}

export function stripByteOrderMark(text: string): string {
  return text.replace(BYTE_ORDER_MARK, '');
}

export function coerceContentToLines(content: string, source?: string): SourceLine[] {
  if (!content) {
    return [];
  }
  return [...numberLines(content.replace(/\r\n/g, '\n').split('\n'), source)];
}

/**
 * Numbers an arbitrary line sequence lazily. Only the first line is checked
 * for a byte-order mark.
 */
export function* numberLines(lines: Iterable<string>, source?: string): Generator<SourceLine> {
  let row = 1;
  for (const text of lines) {
    const cleaned = row === 1 ? stripByteOrderMark(text) : text;
    yield new SourceLine(cleaned, { row, source });
    row += 1;
  }
}
