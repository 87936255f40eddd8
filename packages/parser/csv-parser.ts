/**
 * CSV Parser using Chevrotain
 *
 * Tokenizes and parses the comma-separated grid source format into a
 * header plus string records. Column meaning (row, col, code, name,
 * metadata) is decided by the grid loader, not here.
 */

import {
  createToken,
  Lexer,
  CstParser,
  type CstNode,
  type ILexingError,
  type IRecognitionException,
  type IToken,
} from 'chevrotain';
import { GridFormatError } from '../grid/errors.js';

// ---
// TOKEN DEFINITIONS
// ---

// Quoted fields may contain commas, newlines and doubled quotes ("")
const QuotedField = createToken({
  name: 'QuotedField',
  pattern: /"(?:[^"]|"")*"/,
  line_breaks: true,
});

const BareField = createToken({ name: 'BareField', pattern: /[^,"\r\n]+/ });
const Comma = createToken({ name: 'Comma', pattern: /,/ });
const Newline = createToken({ name: 'Newline', pattern: /\r?\n/, line_breaks: true });

const allTokens = [QuotedField, BareField, Comma, Newline];

const CSVLexer = new Lexer(allTokens);

// ---
// PARSER
// ---

class CSVParser extends CstParser {
  constructor() {
    super(allTokens);
    this.performSelfAnalysis();
  }

  // Main entry point: records separated by newlines
  public csvFile = this.RULE('csvFile', () => {
    this.SUBRULE(this.record);
    this.MANY(() => {
      this.CONSUME(Newline);
      this.SUBRULE2(this.record);
    });
  });

  // A record always yields one field node per comma + 1, so empty fields
  // keep their column position
  private record = this.RULE('record', () => {
    this.SUBRULE(this.field);
    this.MANY(() => {
      this.CONSUME(Comma);
      this.SUBRULE2(this.field);
    });
  });

  private field = this.RULE('field', () => {
    this.OPTION(() => {
      this.OR([
        { ALT: () => this.CONSUME(QuotedField) },
        { ALT: () => this.CONSUME(BareField) },
      ]);
    });
  });
}

const parserInstance = new CSVParser();

// ---
// CST → RECORDS VISITOR
// ---

interface CsvFileContext {
  record: CstNode[];
  Newline?: IToken[];
}

interface RecordContext {
  field: CstNode[];
  Comma?: IToken[];
}

interface FieldContext {
  QuotedField?: IToken[];
  BareField?: IToken[];
}

interface VisitedRecord {
  fields: string[];
  line: number | null;
}

const BaseCSVVisitor = parserInstance.getBaseCstVisitorConstructor();

class CSVToRecordsVisitor extends BaseCSVVisitor {
  constructor() {
    super();
    this.validateVisitor();
  }

  csvFile(ctx: CsvFileContext): VisitedRecord[] {
    return ctx.record.map(node => this.visit(node));
  }

  record(ctx: RecordContext): VisitedRecord {
    const tokens: FieldValue[] = ctx.field.map(node => this.visit(node));
    const line = tokens.find(t => t.line !== null)?.line ?? null;
    return { fields: tokens.map(t => t.value), line };
  }

  field(ctx: FieldContext): FieldValue {
    if (ctx.QuotedField) {
      const token = ctx.QuotedField[0];
      // Remove quotes, unescape doubled quotes
      return { value: token.image.slice(1, -1).replace(/""/g, '"'), line: token.startLine ?? null };
    }
    if (ctx.BareField) {
      const token = ctx.BareField[0];
      return { value: token.image.trim(), line: token.startLine ?? null };
    }
    return { value: '', line: null };
  }
}

interface FieldValue {
  value: string;
  line: number | null;
}

const visitorInstance = new CSVToRecordsVisitor();

// ---
// PUBLIC API
// ---

export interface CSVRecord {
  /** Field values, in column order */
  readonly fields: string[];
  /** 1-based source line of the record's first non-empty field */
  readonly line: number | null;
}

export interface CSVTable {
  readonly header: string[];
  readonly records: CSVRecord[];
}

export interface CSVParseResult {
  table: CSVTable | null;
  lexErrors: ILexingError[];
  parseErrors: IRecognitionException[];
}

function isBlank(record: VisitedRecord): boolean {
  return record.fields.length === 1 && record.fields[0] === '';
}

function toTable(records: VisitedRecord[]): CSVTable {
  const rows = records.filter(r => !isBlank(r));
  const [header, ...rest] = rows;
  return {
    header: header ? header.fields : [],
    records: rest.map(r => ({ fields: r.fields, line: r.line })),
  };
}

/**
 * Parse CSV text into a header and records.
 * Throws GridFormatError on lexer or parser errors.
 */
export function parseCSV(input: string): CSVTable {
  const lexResult = CSVLexer.tokenize(input);
  if (lexResult.errors.length > 0) {
    throw new GridFormatError(
      `CSV lexer errors: ${lexResult.errors.map(e => `line ${e.line ?? '?'}: ${e.message}`).join(', ')}`
    );
  }

  parserInstance.input = lexResult.tokens;
  const cst = parserInstance.csvFile();

  if (parserInstance.errors.length > 0) {
    throw new GridFormatError(
      `CSV parser errors: ${parserInstance.errors.map(e => e.message).join(', ')}`
    );
  }

  return toTable(visitorInstance.visit(cst));
}

/**
 * Parse with full result including errors (for reporting several at once)
 */
export function parseCSVWithErrors(input: string): CSVParseResult {
  const lexResult = CSVLexer.tokenize(input);

  parserInstance.input = lexResult.tokens;
  const cst = parserInstance.csvFile();

  let table: CSVTable | null = null;
  if (parserInstance.errors.length === 0 && lexResult.errors.length === 0) {
    table = toTable(visitorInstance.visit(cst));
  }

  return {
    table,
    lexErrors: lexResult.errors,
    parseErrors: parserInstance.errors,
  };
}

// Export for testing/debugging
export { CSVLexer, CSVParser, CSVToRecordsVisitor };
