import MarkdownIt from 'markdown-it';
import { Inline, TextInline, WarningLog, textInline } from './document-model';

// Link targets go through markdown-it's own normalizer and validator so that
// the same targets are accepted or rejected as in a markdown-it render.
const linkPolicy = new MarkdownIt();

export interface InlineLexResult {
  content: Inline[];
  /** Footnote labels referenced by this text, in order of appearance. */
  footnoteLabels: string[];
}

type DelimChar = '*' | '_' | '~';

interface DelimPiece {
  kind: 'delim';
  char: DelimChar;
  length: number;
  matched: boolean;
  pos: number;
}

type Piece =
  | { kind: 'text'; value: string; code?: boolean; italic?: boolean }
  | DelimPiece
  | { kind: 'node'; inline: Inline };

const ASCII_PUNCT = /[!-/:-@[-`{-~]/;
const WORD_CHAR = /[\p{L}\p{N}_]/u;
const FOOTNOTE_REF_RE = /^\[\^([^\]\s]+)\]/;
const CURRENCY_RE = /^\$\d[\d,.]*(?:\s|$)/;
const HTML_BREAK_RE = /^<br\s*\/?>/i;

function isWhitespace(ch: string | undefined): boolean {
  return ch === undefined || /\s/.test(ch);
}

function isAlnum(ch: string | undefined): boolean {
  return ch !== undefined && /[\p{L}\p{N}]/u.test(ch);
}

/** Index of the `]` closing the `[` at `open`, honoring escapes and nesting. */
function findClosingBracket(src: string, open: number): number {
  let depth = 0;
  for (let i = open; i < src.length; i++) {
    const ch = src[i];
    if (ch === '\\') { i++; continue; }
    if (ch === '[') depth++;
    else if (ch === ']') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** Index of the `)` closing the `(` at `open`, allowing balanced parentheses inside. */
function findClosingParen(src: string, open: number): number {
  let depth = 0;
  for (let i = open; i < src.length; i++) {
    const ch = src[i];
    if (ch === '\\') { i++; continue; }
    if (ch === '(') depth++;
    else if (ch === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** Strip angle brackets and an optional quoted title from a raw link destination. */
function parseLinkDestination(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.startsWith('<')) {
    const close = trimmed.indexOf('>');
    if (close !== -1) return trimmed.slice(1, close);
  }
  const space = trimmed.search(/\s/);
  return space === -1 ? trimmed : trimmed.slice(0, space);
}

function findClosingDollar(src: string, from: number, double: boolean): number {
  for (let i = from; i < src.length; i++) {
    if (src[i] === '\\') { i++; continue; }
    if (src[i] !== '$') continue;
    if (!double) return i;
    if (src[i + 1] === '$') return i;
  }
  return -1;
}

function findClosingBackticks(src: string, from: number, length: number): number {
  let i = from;
  while (i < src.length) {
    if (src[i] !== '`') { i++; continue; }
    let j = i;
    while (j < src.length && src[j] === '`') j++;
    if (j - i === length) return i;
    i = j;
  }
  return -1;
}

class InlineLexer {
  private readonly pieces: Piece[] = [];
  private readonly openers: DelimPiece[] = [];
  private readonly footnoteLabels: string[] = [];
  private buffer = '';

  constructor(
    private readonly src: string,
    private readonly warnings: WarningLog,
    private readonly line: number | undefined,
    private readonly allowLinks: boolean,
  ) {}

  lex(): InlineLexResult {
    const src = this.src;
    let i = 0;
    while (i < src.length) {
      const ch = src[i];
      if (ch === '\\' && i + 1 < src.length && ASCII_PUNCT.test(src[i + 1])) {
        this.buffer += src[i + 1];
        i += 2;
      } else if (ch === '`') {
        i = this.lexCodeSpan(i);
      } else if (ch === '!' && src[i + 1] === '[' && this.allowLinks) {
        i = this.lexImage(i);
      } else if (ch === '[') {
        i = src[i + 1] === '^' ? this.lexFootnoteRef(i) : this.lexLink(i);
      } else if (ch === '$') {
        i = this.lexMath(i);
      } else if (ch === '*' || ch === '_' || ch === '~') {
        i = this.lexDelimiterRun(i, ch);
      } else if (ch === '<' && HTML_BREAK_RE.test(src.slice(i))) {
        const match = HTML_BREAK_RE.exec(src.slice(i));
        this.pushNode({ type: 'line_break' });
        i += match ? match[0].length : 1;
      } else {
        this.buffer += ch;
        i++;
      }
    }
    this.flushText();
    return { content: this.emit(), footnoteLabels: this.footnoteLabels };
  }

  private flushText(): void {
    if (this.buffer) {
      this.pieces.push({ kind: 'text', value: this.buffer });
      this.buffer = '';
    }
  }

  private pushNode(inline: Inline): void {
    this.flushText();
    this.pieces.push({ kind: 'node', inline });
  }

  private lexCodeSpan(start: number): number {
    const src = this.src;
    let runEnd = start;
    while (runEnd < src.length && src[runEnd] === '`') runEnd++;
    const length = runEnd - start;
    const close = findClosingBackticks(src, runEnd, length);
    if (close === -1) {
      this.warnings.add('unterminated-code-span', `Unterminated code span "${src.slice(start)}" treated as literal text`, this.line);
      this.buffer += src.slice(start, runEnd);
      return runEnd;
    }
    let code = src.slice(runEnd, close);
    if (code.length > 2 && code.startsWith(' ') && code.endsWith(' ') && code.trim()) {
      code = code.slice(1, -1);
    }
    this.flushText();
    this.pieces.push({ kind: 'text', value: code, code: true });
    return close + length;
  }

  private lexImage(start: number): number {
    const src = this.src;
    const close = findClosingBracket(src, start + 1);
    if (close === -1 || src[close + 1] !== '(') {
      this.buffer += '!';
      return start + 1;
    }
    const parenClose = findClosingParen(src, close + 1);
    if (parenClose === -1) {
      this.buffer += '!';
      return start + 1;
    }
    const alt = src.slice(start + 2, close) || 'image';
    this.flushText();
    this.pieces.push({ kind: 'text', value: `[Image: ${alt}]`, italic: true });
    return parenClose + 1;
  }

  private lexFootnoteRef(start: number): number {
    const match = FOOTNOTE_REF_RE.exec(this.src.slice(start));
    if (!match) {
      this.buffer += '[';
      return start + 1;
    }
    this.footnoteLabels.push(match[1]);
    this.pushNode({ type: 'footnote_ref', label: match[1] });
    return start + match[0].length;
  }

  private lexLink(start: number): number {
    const src = this.src;
    if (!this.allowLinks) {
      this.buffer += '[';
      return start + 1;
    }
    const close = findClosingBracket(src, start);
    if (close === -1 || src[close + 1] !== '(') {
      this.buffer += '[';
      return start + 1;
    }
    const parenClose = findClosingParen(src, close + 1);
    if (parenClose === -1) {
      this.warnings.add('malformed-link', `Link "${src.slice(start)}" has no closing parenthesis; treated as literal text`, this.line);
      this.buffer += '[';
      return start + 1;
    }

    const inner = new InlineLexer(src.slice(start + 1, close), this.warnings, this.line, false).lex();
    this.footnoteLabels.push(...inner.footnoteLabels);
    const target = parseLinkDestination(src.slice(close + 2, parenClose));

    if (!target) {
      this.warnings.add('malformed-link', `Link "${src.slice(start, parenClose + 1)}" has an empty target; rendered as text`, this.line);
      this.pushContent(inner.content);
      return parenClose + 1;
    }
    const href = linkPolicy.normalizeLink(target);
    if (!linkPolicy.validateLink(href)) {
      this.warnings.add('unsafe-link', `Link target "${target}" is not allowed; rendered as text`, this.line);
      this.pushContent(inner.content);
      return parenClose + 1;
    }
    this.pushNode({ type: 'link', content: inner.content, target: href });
    return parenClose + 1;
  }

  private pushContent(content: Inline[]): void {
    for (const inline of content) this.pushNode(inline);
  }

  private lexMath(start: number): number {
    const src = this.src;
    const prev = start > 0 ? src[start - 1] : undefined;
    if (prev !== undefined && WORD_CHAR.test(prev)) {
      this.buffer += '$';
      return start + 1;
    }
    const double = src[start + 1] === '$';
    const open = double ? 2 : 1;
    if (!double && CURRENCY_RE.test(src.slice(start))) {
      this.buffer += '$';
      return start + 1;
    }
    if (isWhitespace(src[start + open])) {
      this.buffer += src.slice(start, start + open);
      return start + open;
    }
    const close = findClosingDollar(src, start + open, double);
    if (close === -1) {
      this.warnings.add('unterminated-math', `Unterminated inline math "${src.slice(start)}" treated as literal text`, this.line);
      this.buffer += src.slice(start, start + open);
      return start + open;
    }
    this.pushNode({ type: 'math', source: src.slice(start + open, close), display: double });
    return close + open;
  }

  private lexDelimiterRun(start: number, ch: DelimChar): number {
    const src = this.src;
    let end = start;
    while (end < src.length && src[end] === ch) end++;
    let remaining = end - start;

    if (ch === '~') {
      if (remaining < 2) {
        this.buffer += '~';
        return end;
      }
      remaining = 2;
      end = start + 2;
    }

    const prev = start > 0 ? src[start - 1] : undefined;
    const next = src[end];
    let canOpen = !isWhitespace(next);
    let canClose = prev !== undefined && !isWhitespace(prev);
    if (ch === '_') {
      canOpen = canOpen && !isAlnum(prev);
      canClose = canClose && !isAlnum(next);
    }

    let pos = start;
    while (remaining > 0) {
      const opener = canClose ? this.topOpener(ch) : undefined;
      if (opener && opener.length <= remaining) {
        this.closeOpener(opener);
        this.flushText();
        this.pieces.push({ kind: 'delim', char: ch, length: opener.length, matched: true, pos });
        remaining -= opener.length;
        pos += opener.length;
      } else if (canOpen) {
        this.flushText();
        const chunks = remaining === 3 ? [2, 1] : this.splitRun(remaining);
        for (const length of chunks) {
          const piece: DelimPiece = { kind: 'delim', char: ch, length, matched: false, pos };
          this.pieces.push(piece);
          this.openers.push(piece);
          pos += length;
        }
        remaining = 0;
      } else {
        this.buffer += ch.repeat(remaining);
        remaining = 0;
      }
    }
    return end;
  }

  private splitRun(length: number): number[] {
    const chunks: number[] = [];
    let left = length;
    while (left > 0) {
      const chunk = left >= 2 ? 2 : 1;
      chunks.push(chunk);
      left -= chunk;
    }
    return chunks;
  }

  private topOpener(ch: DelimChar): DelimPiece | undefined {
    for (let k = this.openers.length - 1; k >= 0; k--) {
      if (this.openers[k].char === ch) return this.openers[k];
    }
    return undefined;
  }

  /** Match `opener`; openers stacked above it can no longer close and stay literal. */
  private closeOpener(opener: DelimPiece): void {
    const idx = this.openers.lastIndexOf(opener);
    opener.matched = true;
    this.openers.length = idx;
  }

  private emit(): Inline[] {
    const out: Inline[] = [];
    let bold = false;
    let italic = false;
    let strike = false;

    const pushText = (value: string, extra: { code?: boolean; italic?: boolean }) => {
      if (!value) return;
      const run = textInline(value, { bold, italic: italic || !!extra.italic, strike, code: !!extra.code });
      const last = out[out.length - 1];
      if (last?.type === 'text' && sameMarks(last, run)) {
        last.value += value;
      } else {
        out.push(run);
      }
    };

    for (const piece of this.pieces) {
      if (piece.kind === 'text') {
        pushText(piece.value, piece);
      } else if (piece.kind === 'delim') {
        if (!piece.matched) {
          const marker = piece.char.repeat(piece.length);
          this.warnings.add('unterminated-emphasis', `Unterminated "${marker}" marker treated as literal text`, this.line);
          pushText(marker, {});
        } else if (piece.char === '~') {
          strike = !strike;
        } else if (piece.length === 2) {
          bold = !bold;
        } else {
          italic = !italic;
        }
      } else if (piece.inline.type === 'link') {
        out.push({ ...piece.inline, content: piece.inline.content.map(inner => applyMarks(inner, bold, italic, strike)) });
      } else {
        out.push(piece.inline);
      }
    }
    return out;
  }
}

function sameMarks(a: TextInline, b: TextInline): boolean {
  return a.bold === b.bold && a.italic === b.italic && a.code === b.code && a.strike === b.strike;
}

function applyMarks(inline: Inline, bold: boolean, italic: boolean, strike: boolean): Inline {
  if (inline.type !== 'text') return inline;
  return { ...inline, bold: inline.bold || bold, italic: inline.italic || italic, strike: inline.strike || strike };
}

/**
 * Tokenize one logical line into inline nodes. Never throws: malformed
 * constructs come back as literal text with a warning in `warnings`.
 */
export function lexInline(text: string, warnings: WarningLog, line?: number): InlineLexResult {
  return new InlineLexer(text, warnings, line, true).lex();
}
