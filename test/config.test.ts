import {
  ConfigurationError,
  ParseError,
  ParserOptions,
  PUBMED_FORMAT,
  RIS_FORMAT,
  RisParser,
  RisWriter,
  WOK_FORMAT,
  WriterOptions,
  getLineFormat,
} from '../src/index';

function catchConfigurationError(run: () => unknown): ConfigurationError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ConfigurationError');
}

describe('Line formats', () => {
  test('should classify RIS lines', () => {
    expect(RIS_FORMAT.classify('AU  - Doe, J')).toEqual({ kind: 'tag', tag: 'AU', content: 'Doe, J' });
    expect(RIS_FORMAT.classify('ER  -')).toEqual({ kind: 'tag', tag: 'ER', content: '' });
    expect(RIS_FORMAT.classify('continued text ')).toEqual({ kind: 'continuation', content: 'continued text' });
    expect(RIS_FORMAT.classify('au  - lower case')).toEqual({ kind: 'continuation', content: 'au  - lower case' });
    expect(RIS_FORMAT.classify('AU - one space')).toEqual({ kind: 'continuation', content: 'AU - one space' });
  });

  test('should recognise RIS counters as header noise', () => {
    expect(RIS_FORMAT.isHeader('42.')).toBe(true);
    expect(RIS_FORMAT.isHeader('Doe')).toBe(false);
  });

  test('should classify Web of Science lines', () => {
    expect(WOK_FORMAT.classify('PT J')).toEqual({ kind: 'tag', tag: 'PT', content: 'J' });
    expect(WOK_FORMAT.classify('ER')).toEqual({ kind: 'tag', tag: 'ER', content: '' });
    expect(WOK_FORMAT.classify('   Tanaka, K')).toEqual({ kind: 'continuation', content: 'Tanaka, K' });
    expect(WOK_FORMAT.isHeader('anything')).toBe(true);
  });

  test('should classify PubMed lines', () => {
    expect(PUBMED_FORMAT.classify('STAT- MEDLINE')).toEqual({ kind: 'tag', tag: 'STAT', content: 'MEDLINE' });
    expect(PUBMED_FORMAT.classify('FAU - Novak, Jana')).toEqual({ kind: 'tag', tag: 'FAU', content: 'Novak, Jana' });
    expect(PUBMED_FORMAT.classify('      wrapped')).toEqual({ kind: 'continuation', content: 'wrapped' });
    expect(PUBMED_FORMAT.endTag).toBeNull();
  });

  test('should format lines per dialect', () => {
    expect(RIS_FORMAT.formatLine('ER')).toBe('ER  - ');
    expect(RIS_FORMAT.recordHeader(3)).toBe('3.');
    expect(WOK_FORMAT.formatLine('ER')).toBe('ER');
    expect(WOK_FORMAT.formatLine('AU', 'Silva, R')).toBe('AU Silva, R');
    expect(WOK_FORMAT.recordHeader(1)).toBeNull();
    expect(PUBMED_FORMAT.formatLine('AU', 'Quill P')).toBe('AU  - Quill P');
    expect(PUBMED_FORMAT.formatLine('PMID', '1')).toBe('PMID- 1');
  });

  test('should indent continuation values only for Web of Science', () => {
    expect(WOK_FORMAT.formatContinuation('Tanaka, K')).toBe('   Tanaka, K');
    expect(RIS_FORMAT.formatContinuation('Kim, Jun')).toBeNull();
    expect(PUBMED_FORMAT.formatContinuation('Quill P')).toBeNull();
  });

  test('should look formats up by dialect name', () => {
    expect(getLineFormat('ris')).toBe(RIS_FORMAT);
    expect(getLineFormat('wok')).toBe(WOK_FORMAT);
    expect(getLineFormat('pubmed')).toBe(PUBMED_FORMAT);
  });
});

describe('Configuration', () => {
  test('should reject a mapping that cannot be inverted', () => {
    const error = catchConfigurationError(
      () => new RisWriter({ mapping: { TY: 'type_of_reference', T1: 'title', TI: 'title' } }),
    );

    expect(error.message).toBe('Mapping cannot be inverted; some values were not unique: title (T1, TI)');
  });

  test('should require the start tag in the mapping', () => {
    expect(() => new RisParser({ mapping: { TI: 'title', UK: 'unknown_tag' } })).toThrow(
      'Mapping has no field for the ris start tag TY',
    );
    expect(() => new RisWriter({ dialect: 'pubmed', mapping: { TI: 'title' } })).toThrow(ConfigurationError);
  });

  test('should require a field for unknown tags unless they are skipped', () => {
    expect(() => new RisParser({ mapping: { TY: 'type' } })).toThrow(ConfigurationError);
    expect(() => new RisParser({ mapping: { TY: 'type' }, skipUnknownTags: true })).not.toThrow();
  });

  test('should drop unknown tags when the mapping has no container for them', () => {
    const parser = new RisParser({ mapping: { TY: 'type' }, skipUnknownTags: true });

    expect(parser.parse('TY  - JOUR\nTI  - dropped\nmore\nER  - \n')).toEqual([{ type: 'JOUR' }]);
  });

  test('should list every invalid parser option', () => {
    const options: ParserOptions = JSON.parse('{"dialect":"bibtex","skipMissingTags":"yes"}');

    const error = catchConfigurationError(() => new RisParser(options));

    expect(error.issues).toHaveLength(2);
    expect(error.issues[0]).toMatch(/^dialect: /);
    expect(error.issues[1]).toMatch(/^skipMissingTags: /);
  });

  test('should reject unknown writer options', () => {
    const options: WriterOptions = JSON.parse('{"newLine":"\\n"}');

    const error = catchConfigurationError(() => new RisWriter(options));

    expect(error.message).toMatch(/^Invalid writer options: Unrecognized key/);
  });

  test('should reject an unknown encoding', () => {
    const options: ParserOptions = JSON.parse('{"encoding":"klingon"}');

    expect(() => new RisParser(options)).toThrow('encoding: Unknown text encoding');
  });

  test('should format located errors', () => {
    const error = new ParseError('Expected tag', { source: 'refs.ris', row: 4, lineText: 'oops' });

    expect(error.message).toBe('refs.ris:4 - Expected tag\n    oops');
    expect(error.name).toBe('ParseError');
  });
});
