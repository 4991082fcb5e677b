// Types for the parsed document tree

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface TextInline {
  type: 'text';
  value: string;
  bold: boolean;
  italic: boolean;
  code: boolean;
  strike: boolean;
}

export interface LinkInline {
  type: 'link';
  content: Inline[];
  target: string;
}

export interface FootnoteRefInline {
  type: 'footnote_ref';
  label: string;
}

export interface MathInline {
  type: 'math';
  source: string;
  /** Written between `$$` rather than `$`. */
  display: boolean;
}

export interface LineBreakInline {
  type: 'line_break';
}

export type Inline = TextInline | LinkInline | FootnoteRefInline | MathInline | LineBreakInline;

export interface HeadingBlock {
  type: 'heading';
  level: HeadingLevel;
  content: Inline[];
}

export interface ParagraphBlock {
  type: 'paragraph';
  content: Inline[];
}

export interface ListItem {
  blocks: Block[];
}

export interface ListBlock {
  type: 'list';
  ordered: boolean;
  items: ListItem[];
  nestingLevel: number;     // structural depth, 0 for a top-level list
}

/** A table cell is its inline content; every row holds exactly `columnCount` cells. */
export type TableCell = Inline[];

export interface TableBlock {
  type: 'table';
  rows: TableCell[][];
  columnCount: number;
  hasHeaderRow: boolean;
}

export interface CodeBlock {
  type: 'code_block';
  language?: string;
  text: string;
}

export interface MathBlock {
  type: 'math_block';
  source: string;
}

export interface BlockquoteBlock {
  type: 'blockquote';
  blocks: Block[];
}

export interface HorizontalRuleBlock {
  type: 'hr';
}

export type Block =
  | HeadingBlock
  | ParagraphBlock
  | ListBlock
  | TableBlock
  | CodeBlock
  | MathBlock
  | BlockquoteBlock
  | HorizontalRuleBlock;

export interface FootnoteDefinition {
  label: string;
  blocks: Block[];
}

export interface MdDocument {
  blocks: Block[];
  /** Footnote definitions keyed by label; never part of `blocks`. */
  footnotes: Map<string, FootnoteDefinition>;
}

export function textInline(value: string, marks: Partial<Omit<TextInline, 'type' | 'value'>> = {}): TextInline {
  return {
    type: 'text',
    value,
    bold: marks.bold ?? false,
    italic: marks.italic ?? false,
    code: marks.code ?? false,
    strike: marks.strike ?? false,
  };
}

/** Plain text of an inline sequence, as a reader would see it. */
export function inlineText(content: Inline[]): string {
  let text = '';
  for (const inline of content) {
    switch (inline.type) {
      case 'text': text += inline.value; break;
      case 'link': text += inlineText(inline.content); break;
      case 'footnote_ref': break;
      case 'math': text += inline.source; break;
      case 'line_break': text += ' '; break;
    }
  }
  return text;
}

// Warnings

export type WarningCode =
  | 'unterminated-emphasis'
  | 'unterminated-code-span'
  | 'malformed-link'
  | 'unsafe-link'
  | 'unterminated-math'
  | 'unsupported-math'
  | 'unresolved-footnote'
  | 'unreferenced-footnote'
  | 'duplicate-footnote'
  | 'ragged-table-row'
  | 'heading-level-clamped'
  | 'list-depth-clamped'
  | 'unterminated-code-fence'
  | 'unrecognized-block'
  | 'nesting-depth-clamped'
  | 'invalid-character';

export interface ConversionWarning {
  code: WarningCode;
  message: string;
  line?: number;            // 1-based source line
}

/**
 * Ordered accumulator for non-fatal degradations. One log is threaded through
 * parsing, allocation and rendering of a single conversion.
 */
export class WarningLog {
  private readonly entries: ConversionWarning[] = [];

  add(code: WarningCode, message: string, line?: number): void {
    this.entries.push(line === undefined ? { code, message } : { code, message, line });
  }

  get warnings(): readonly ConversionWarning[] {
    return this.entries;
  }

  count(code: WarningCode): number {
    return this.entries.filter(w => w.code === code).length;
  }
}

export function formatWarning(warning: ConversionWarning): string {
  return warning.line === undefined ? warning.message : `line ${warning.line}: ${warning.message}`;
}
