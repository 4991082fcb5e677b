import {
  Block,
  FootnoteDefinition,
  HeadingLevel,
  Inline,
  ListBlock,
  ListItem,
  MdDocument,
  TableBlock,
  TableCell,
  WarningLog,
  textInline,
} from './document-model';
import { lexInline } from './inline-lexer';

interface SourceLine {
  text: string;
  line: number;             // 1-based line in the original input
}

interface ParseContext {
  warnings: WarningLog;
  footnotes: Map<string, FootnoteDefinition>;
}

interface ParserOptions {
  listDepth: number;
  /** Blockquotes, list items and footnote bodies enclosing these lines. */
  containerDepth: number;
  /** Footnote definitions are only recognized at the top level. */
  topLevel: boolean;
}

interface ListMarker {
  indent: number;
  ordered: boolean;
  contentIndent: number;
  content: string;
}

const FENCE_RE = /^( {0,3})(`{3,}|~{3,})[ \t]*([^`\s]*)[^`]*$/;
const CLOSING_FENCE_RE = /^ {0,3}(`{3,}|~{3,})[ \t]*$/;
const HEADING_RE = /^ {0,3}(#+)(?:[ \t]+(.*?))?[ \t]*$/;
const HR_RE = /^ {0,3}([-*_])(?:[ \t]*\1){2,}[ \t]*$/;
const HTML_RE = /^ {0,3}<(?:\/?[A-Za-z][A-Za-z0-9-]*(?:[\s/>]|$)|!--)/;
const BLOCKQUOTE_RE = /^ {0,3}> ?/;
const LIST_RE = /^( *)([-*+]|\d{1,9}[.)])( +|$)(.*)$/;
const FOOTNOTE_DEF_RE = /^ {0,3}\[\^([^\]\s]+)\]:[ \t]?(.*)$/;
const TABLE_SEPARATOR_RE = /^ *\|? *:?-+:? *(?:\| *:?-+:? *)*\|? *$/;
const MATH_FENCE = '$$';
const SINGLE_LINE_MATH_RE = /^ {0,3}\$\$(.+)\$\$[ \t]*$/;

// Container markers nested deeper than this are kept as paragraph text.
export const MAX_CONTAINER_DEPTH = 32;

const HEADING_LEVELS: readonly HeadingLevel[] = [1, 2, 3, 4, 5, 6];
export const MAX_HEADING_LEVEL = HEADING_LEVELS.length;

function isBlank(text: string): boolean {
  return /^\s*$/.test(text);
}

function indentOf(text: string): number {
  const match = /^ */.exec(text);
  return match ? match[0].length : 0;
}

function dedent(text: string, columns: number): string {
  return text.slice(Math.min(indentOf(text), columns));
}

function expandTabs(text: string): string {
  if (!text.includes('\t')) return text;
  let out = '';
  for (const ch of text) {
    out += ch === '\t' ? ' '.repeat(4 - (out.length % 4)) : ch;
  }
  return out;
}

function matchListMarker(text: string): ListMarker | undefined {
  if (HR_RE.test(text)) return undefined;
  const match = LIST_RE.exec(text);
  if (!match) return undefined;
  const indent = match[1].length;
  const marker = match[2];
  const spacing = match[3].length;
  const content = match[4];
  const gap = spacing === 0 || spacing > 4 ? 1 : spacing;
  return {
    indent,
    ordered: /\d/.test(marker),
    contentIndent: indent + marker.length + gap,
    content: content.trim() ? content.trimEnd() : '',
  };
}

function hasUnescapedPipe(text: string): boolean {
  return /(^|[^\\])\|/.test(text);
}

/** Split a table row into raw cell sources, honoring `\|` escapes. */
export function splitTableRow(text: string): string[] {
  let row = text.trim();
  if (row.startsWith('|')) row = row.slice(1);
  if (row.endsWith('|') && !row.endsWith('\\|')) row = row.slice(0, -1);
  const cells: string[] = [];
  let current = '';
  for (let i = 0; i < row.length; i++) {
    const ch = row[i];
    if (ch === '\\' && row[i + 1] === '|') {
      current += '\\|';
      i++;
    } else if (ch === '|') {
      cells.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }
  cells.push(current.trim());
  return cells;
}

class BlockParser {
  private pos = 0;

  constructor(
    private readonly lines: SourceLine[],
    private readonly ctx: ParseContext,
    private readonly options: ParserOptions,
  ) {}

  parse(): Block[] {
    const blocks: Block[] = [];
    while (this.pos < this.lines.length) {
      const { text } = this.lines[this.pos];
      if (isBlank(text)) {
        this.pos++;
        continue;
      }
      const block = this.parseBlock();
      if (block) blocks.push(block);
    }
    return blocks;
  }

  private get warnings(): WarningLog {
    return this.ctx.warnings;
  }

  private get canNest(): boolean {
    return this.options.containerDepth < MAX_CONTAINER_DEPTH;
  }

  private childOptions(listDepth: number): ParserOptions {
    return { listDepth, containerDepth: this.options.containerDepth + 1, topLevel: false };
  }

  /** Parse the block starting at the current line; returns undefined for footnote definitions. */
  private parseBlock(): Block | undefined {
    const current = this.lines[this.pos];
    const text = current.text;

    const fence = FENCE_RE.exec(text);
    if (fence) return this.parseFencedCode(fence[1].length, fence[2], fence[3]);

    if (text.trim() === MATH_FENCE || SINGLE_LINE_MATH_RE.test(text)) return this.parseMathBlock();

    const heading = HEADING_RE.exec(text);
    if (heading) {
      this.pos++;
      return this.makeHeading(heading[1].length, heading[2] ?? '', current.line);
    }

    if (HR_RE.test(text)) {
      this.pos++;
      return { type: 'hr' };
    }

    if (HTML_RE.test(text)) {
      this.pos++;
      this.warnings.add('unrecognized-block', `Unsupported markup "${text.trim()}" kept as literal text`, current.line);
      return { type: 'paragraph', content: [textInline(text.trim())] };
    }

    const quoted = BLOCKQUOTE_RE.test(text);
    const marker = quoted ? undefined : matchListMarker(text);
    if (quoted || marker) {
      if (!this.canNest) {
        this.warnings.add(
          'nesting-depth-clamped',
          `Blocks nested more than ${MAX_CONTAINER_DEPTH} levels deep kept as literal text`,
          current.line
        );
        return this.parseParagraph();
      }
      return marker ? this.parseList(marker) : this.parseBlockquote();
    }

    if (this.options.topLevel) {
      const footnote = FOOTNOTE_DEF_RE.exec(text);
      if (footnote) {
        this.parseFootnoteDefinition(footnote[1], footnote[2]);
        return undefined;
      }
    }

    if (this.isTableStart(this.pos)) return this.parseTable();

    return this.parseParagraph();
  }

  /** Whether `text` would start a new block rather than continue a paragraph. */
  private interruptsParagraph(index: number): boolean {
    const text = this.lines[index].text;
    return isBlank(text)
      || FENCE_RE.test(text)
      || text.trim() === MATH_FENCE
      || SINGLE_LINE_MATH_RE.test(text)
      || HEADING_RE.test(text)
      || HR_RE.test(text)
      || HTML_RE.test(text)
      || (this.canNest && (BLOCKQUOTE_RE.test(text) || matchListMarker(text) !== undefined))
      || (this.options.topLevel && FOOTNOTE_DEF_RE.test(text))
      || this.isTableStart(index);
  }

  private isTableStart(index: number): boolean {
    const header = this.lines[index];
    const separator = this.lines[index + 1];
    if (!header || !separator) return false;
    return hasUnescapedPipe(header.text)
      && separator.text.includes('|')
      && separator.text.includes('-')
      && TABLE_SEPARATOR_RE.test(separator.text);
  }

  private makeHeading(hashes: number, raw: string, line: number): Block {
    if (hashes > MAX_HEADING_LEVEL) {
      this.warnings.add('heading-level-clamped', `Heading level ${hashes} clamped to ${MAX_HEADING_LEVEL}`, line);
    }
    const level = HEADING_LEVELS[Math.min(hashes, MAX_HEADING_LEVEL) - 1];
    const source = /^#+$/.test(raw) ? '' : raw.replace(/[ \t]+#+$/, '');
    return { type: 'heading', level, content: lexInline(source, this.warnings, line).content };
  }

  private parseFencedCode(fenceIndent: number, fence: string, info: string): Block {
    const open = this.lines[this.pos];
    this.pos++;
    const body: string[] = [];
    let closed = false;
    while (this.pos < this.lines.length) {
      const { text } = this.lines[this.pos];
      this.pos++;
      const closing = CLOSING_FENCE_RE.exec(text);
      if (closing && closing[1][0] === fence[0] && closing[1].length >= fence.length) {
        closed = true;
        break;
      }
      body.push(dedent(text, fenceIndent));
    }
    if (!closed) {
      this.warnings.add('unterminated-code-fence', `Code block opened with ${fence} is never closed; closed at end of input`, open.line);
    }
    return info
      ? { type: 'code_block', language: info, text: body.join('\n') }
      : { type: 'code_block', text: body.join('\n') };
  }

  private parseMathBlock(): Block {
    const open = this.lines[this.pos];
    this.pos++;
    const single = SINGLE_LINE_MATH_RE.exec(open.text);
    if (single) return { type: 'math_block', source: single[1].trim() };

    const body: string[] = [];
    let closed = false;
    while (this.pos < this.lines.length) {
      const { text } = this.lines[this.pos];
      this.pos++;
      if (text.trim() === MATH_FENCE) {
        closed = true;
        break;
      }
      body.push(text.trim());
    }
    if (!closed) {
      this.warnings.add('unterminated-math', 'Display math opened with $$ is never closed; closed at end of input', open.line);
    }
    return { type: 'math_block', source: body.join(' ').trim() };
  }

  private parseBlockquote(): Block {
    const inner: SourceLine[] = [];
    let lastWasText = false;
    while (this.pos < this.lines.length) {
      const current = this.lines[this.pos];
      const prefix = BLOCKQUOTE_RE.exec(current.text);
      if (prefix) {
        const stripped = current.text.slice(prefix[0].length);
        inner.push({ text: stripped, line: current.line });
        lastWasText = !isBlank(stripped);
        this.pos++;
      } else if (lastWasText && !this.interruptsParagraph(this.pos)) {
        inner.push({ text: current.text.trim(), line: current.line });
        this.pos++;
      } else {
        break;
      }
    }
    const blocks = new BlockParser(inner, this.ctx, this.childOptions(this.options.listDepth)).parse();
    return { type: 'blockquote', blocks };
  }

  private parseList(first: ListMarker): ListBlock {
    const items: ListItem[] = [];
    let marker: ListMarker | undefined = first;

    while (marker && marker.ordered === first.ordered && marker.indent <= first.indent) {
      const { lines: itemLines, endedByBlank } = this.collectListItem(marker);
      const blocks = new BlockParser(itemLines, this.ctx, this.childOptions(this.options.listDepth + 1)).parse();
      items.push({ blocks });
      if (endedByBlank || this.pos >= this.lines.length) break;
      marker = matchListMarker(this.lines[this.pos].text);
    }

    return { type: 'list', ordered: first.ordered, items, nestingLevel: this.options.listDepth };
  }

  private collectListItem(marker: ListMarker): { lines: SourceLine[]; endedByBlank: boolean } {
    const start = this.lines[this.pos];
    const itemLines: SourceLine[] = [{ text: marker.content, line: start.line }];
    this.pos++;

    while (this.pos < this.lines.length) {
      const current = this.lines[this.pos];
      if (isBlank(current.text)) {
        let next = this.pos;
        while (next < this.lines.length && isBlank(this.lines[next].text)) next++;
        if (next < this.lines.length && indentOf(this.lines[next].text) > marker.indent) {
          for (let k = this.pos; k < next; k++) itemLines.push({ text: '', line: this.lines[k].line });
          this.pos = next;
          continue;
        }
        // A blank line followed by a line not indented deeper closes the item and the run.
        this.pos = next;
        return { lines: itemLines, endedByBlank: true };
      }

      if (indentOf(current.text) > marker.indent) {
        itemLines.push({ text: dedent(current.text, marker.contentIndent), line: current.line });
        this.pos++;
        continue;
      }

      const previous = itemLines[itemLines.length - 1];
      if (!isBlank(previous.text) && !this.interruptsParagraph(this.pos)) {
        itemLines.push({ text: current.text.trim(), line: current.line });
        this.pos++;
        continue;
      }
      break;
    }
    return { lines: itemLines, endedByBlank: false };
  }

  private parseFootnoteDefinition(label: string, firstLine: string): void {
    const start = this.lines[this.pos];
    const defLines: SourceLine[] = [{ text: firstLine, line: start.line }];
    this.pos++;

    while (this.pos < this.lines.length) {
      const current = this.lines[this.pos];
      if (isBlank(current.text)) {
        let next = this.pos;
        while (next < this.lines.length && isBlank(this.lines[next].text)) next++;
        if (next < this.lines.length && indentOf(this.lines[next].text) > 0) {
          for (let k = this.pos; k < next; k++) defLines.push({ text: '', line: this.lines[k].line });
          this.pos = next;
          continue;
        }
        break;
      }
      if (indentOf(current.text) > 0) {
        defLines.push({ text: dedent(current.text, 4), line: current.line });
        this.pos++;
        continue;
      }
      const previous = defLines[defLines.length - 1];
      if (!isBlank(previous.text) && !this.interruptsParagraph(this.pos)) {
        defLines.push({ text: current.text, line: current.line });
        this.pos++;
        continue;
      }
      break;
    }

    const blocks = new BlockParser(defLines, this.ctx, this.childOptions(0)).parse();
    if (this.ctx.footnotes.has(label)) {
      this.warnings.add('duplicate-footnote', `Footnote [^${label}] is defined more than once; the later definition wins`, start.line);
      this.ctx.footnotes.delete(label);
    }
    this.ctx.footnotes.set(label, { label, blocks });
  }

  private parseTable(): TableBlock {
    const headerLine = this.lines[this.pos];
    const rows: { cells: string[]; line: number }[] = [{ cells: splitTableRow(headerLine.text), line: headerLine.line }];
    this.pos += 2; // header and separator

    while (this.pos < this.lines.length) {
      const current = this.lines[this.pos];
      if (isBlank(current.text) || !hasUnescapedPipe(current.text)) break;
      rows.push({ cells: splitTableRow(current.text), line: current.line });
      this.pos++;
    }

    const columnCount = Math.max(...rows.map(r => r.cells.length));
    const cellRows: TableCell[][] = rows.map(row => {
      const cells = row.cells.map(cell => lexInline(cell, this.warnings, row.line).content);
      if (cells.length < columnCount) {
        this.warnings.add('ragged-table-row', `Table row has ${cells.length} of ${columnCount} cells; padded with empty cells`, row.line);
        while (cells.length < columnCount) cells.push([]);
      }
      return cells;
    });

    return { type: 'table', rows: cellRows, columnCount, hasHeaderRow: true };
  }

  private parseParagraph(): Block {
    const collected: SourceLine[] = [this.lines[this.pos]];
    this.pos++;
    while (this.pos < this.lines.length && !this.interruptsParagraph(this.pos)) {
      collected.push(this.lines[this.pos]);
      this.pos++;
    }

    const content: Inline[] = [];
    collected.forEach((source, idx) => {
      let text = source.text.trim();
      if (idx < collected.length - 1) text = text.replace(/\\$/, '');
      if (idx > 0) content.push({ type: 'line_break' });
      content.push(...lexInline(text, this.warnings, source.line).content);
    });
    return { type: 'paragraph', content };
  }
}

/**
 * Parse a markdown document into a block tree plus its footnote table.
 * Never throws: anything unrecognized becomes paragraph text with a warning.
 * `firstLine` is the source line number of the first line of `markdown`.
 */
export function parseMarkdown(markdown: string, warnings: WarningLog, firstLine = 1): MdDocument {
  const lines = markdown
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((text, idx) => ({ text: expandTabs(text), line: idx + firstLine }));
  const ctx: ParseContext = { warnings, footnotes: new Map() };
  const blocks = new BlockParser(lines, ctx, { listDepth: 0, containerDepth: 0, topLevel: true }).parse();
  return { blocks, footnotes: ctx.footnotes };
}
