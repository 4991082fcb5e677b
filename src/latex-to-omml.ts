// src/latex-to-omml.ts — LaTeX math subset to Office Math (OMML)
//
// - Script binding: ^/_ applies to the nearest preceding atom, not the whole expression;
//   scripts directly after an n-ary operator become its limits.
// - Anything outside the supported subset fails the whole expression; callers
//   degrade to literal text instead of emitting a partial equation.

import { escapeXml } from './xml-text';

// ---------------------------------------------------------------------------
// Symbol tables
// ---------------------------------------------------------------------------

const SYMBOLS: Map<string, string> = new Map([
  // Greek lowercase
  ['\\alpha', 'α'], ['\\beta', 'β'], ['\\gamma', 'γ'], ['\\delta', 'δ'],
  ['\\epsilon', 'ε'], ['\\varepsilon', 'ε'], ['\\zeta', 'ζ'], ['\\eta', 'η'],
  ['\\theta', 'θ'], ['\\vartheta', 'ϑ'], ['\\iota', 'ι'], ['\\kappa', 'κ'],
  ['\\lambda', 'λ'], ['\\mu', 'μ'], ['\\nu', 'ν'], ['\\xi', 'ξ'], ['\\pi', 'π'],
  ['\\rho', 'ρ'], ['\\sigma', 'σ'], ['\\tau', 'τ'], ['\\upsilon', 'υ'],
  ['\\phi', 'φ'], ['\\varphi', 'φ'], ['\\chi', 'χ'], ['\\psi', 'ψ'], ['\\omega', 'ω'],
  // Greek uppercase
  ['\\Gamma', 'Γ'], ['\\Delta', 'Δ'], ['\\Theta', 'Θ'], ['\\Lambda', 'Λ'],
  ['\\Xi', 'Ξ'], ['\\Pi', 'Π'], ['\\Sigma', 'Σ'], ['\\Upsilon', 'Υ'],
  ['\\Phi', 'Φ'], ['\\Psi', 'Ψ'], ['\\Omega', 'Ω'],
  // Operators and relations
  ['\\times', '×'], ['\\div', '÷'], ['\\pm', '±'], ['\\mp', '∓'],
  ['\\leq', '≤'], ['\\le', '≤'], ['\\geq', '≥'], ['\\ge', '≥'], ['\\neq', '≠'],
  ['\\approx', '≈'], ['\\equiv', '≡'], ['\\sim', '∼'], ['\\propto', '∝'],
  ['\\infty', '∞'], ['\\partial', '∂'], ['\\nabla', '∇'],
  ['\\in', '∈'], ['\\notin', '∉'], ['\\subset', '⊂'], ['\\supset', '⊃'],
  ['\\subseteq', '⊆'], ['\\supseteq', '⊇'], ['\\emptyset', '∅'],
  ['\\cup', '∪'], ['\\cap', '∩'], ['\\to', '→'], ['\\rightarrow', '→'],
  ['\\leftarrow', '←'], ['\\Rightarrow', '⇒'], ['\\Leftarrow', '⇐'],
  ['\\leftrightarrow', '↔'], ['\\Leftrightarrow', '⇔'], ['\\mapsto', '↦'],
  ['\\forall', '∀'], ['\\exists', '∃'], ['\\neg', '¬'],
  ['\\land', '∧'], ['\\lor', '∨'], ['\\oplus', '⊕'], ['\\otimes', '⊗'],
  ['\\cdot', '·'], ['\\ldots', '…'], ['\\cdots', '⋯'], ['\\dots', '…'],
  // Escaped characters and spacing
  ['\\{', '{'], ['\\}', '}'], ['\\%', '%'], ['\\$', '$'], ['\\_', '_'],
  ['\\&', '&'], ['\\#', '#'], ['\\,', ' '], ['\\;', ' '],
  ['\\:', ' '], ['\\ ', ' '], ['\\quad', ' '], ['\\qquad', '  '],
]);

const ACCENTS: Map<string, string> = new Map([
  ['\\hat', '̂'],
  ['\\bar', '̅'],
  ['\\dot', '̇'],
  ['\\ddot', '̈'],
  ['\\check', '̌'],
  ['\\tilde', '̃'],
  ['\\vec', '⃗'],
]);

const NARY_OPERATORS: Map<string, string> = new Map([
  ['\\sum', '∑'],
  ['\\prod', '∏'],
  ['\\int', '∫'],
  ['\\iint', '∬'],
  ['\\iiint', '∭'],
  ['\\oint', '∮'],
  ['\\bigcup', '⋃'],
  ['\\bigcap', '⋂'],
]);

const NAMED_FUNCTIONS = new Set([
  'sin', 'cos', 'tan', 'cot', 'sec', 'csc',
  'arcsin', 'arccos', 'arctan',
  'sinh', 'cosh', 'tanh', 'coth',
  'log', 'ln', 'lg', 'exp', 'lim', 'max', 'min',
  'sup', 'inf', 'det', 'dim', 'gcd', 'deg',
  'arg', 'hom', 'ker', 'Pr',
]);

const DELIMITER_COMMANDS: Map<string, string> = new Map([
  ['\\{', '{'], ['\\}', '}'], ['\\|', '‖'], ['\\langle', '⟨'], ['\\rangle', '⟩'],
  ['\\lfloor', '⌊'], ['\\rfloor', '⌋'], ['\\lceil', '⌈'], ['\\rceil', '⌉'],
]);

// ---------------------------------------------------------------------------
// Math tree
// ---------------------------------------------------------------------------

export type MathNode =
  | { kind: 'run'; text: string; upright?: boolean }
  | { kind: 'frac'; num: MathNode[]; den: MathNode[] }
  | { kind: 'sup'; base: MathNode[]; sup: MathNode[] }
  | { kind: 'sub'; base: MathNode[]; sub: MathNode[] }
  | { kind: 'subsup'; base: MathNode[]; sub: MathNode[]; sup: MathNode[] }
  | { kind: 'rad'; degree?: MathNode[]; body: MathNode[] }
  | { kind: 'func'; name: string; arg: MathNode[] }
  | { kind: 'nary'; chr: string; limits: boolean; sub?: MathNode[]; sup?: MathNode[]; body: MathNode[] }
  | { kind: 'delim'; open: string; close: string; body: MathNode[] }
  | { kind: 'acc'; chr: string; body: MathNode[] }
  | { kind: 'matrix'; rows: MathNode[][][] };

export type MathTranscodeResult =
  | { ok: true; nodes: MathNode[] }
  | { ok: false; reason: string };

class UnsupportedMath extends Error {}

// ---------------------------------------------------------------------------
// Tokenizer
// ---------------------------------------------------------------------------

interface Token {
  type: 'command' | 'lbrace' | 'rbrace' | 'caret' | 'underscore' | 'ampersand' | 'char';
  value: string;
}

function tokenize(latex: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < latex.length) {
    const ch = latex[i];
    if (ch === '\\') {
      if (i + 1 >= latex.length) throw new UnsupportedMath('trailing backslash');
      let j = i + 1;
      if (/[a-zA-Z]/.test(latex[j])) {
        while (j < latex.length && /[a-zA-Z]/.test(latex[j])) j++;
      } else {
        j++;
      }
      tokens.push({ type: 'command', value: latex.slice(i, j) });
      i = j;
      continue;
    }
    if (/\s/.test(ch)) { i++; continue; }
    if (ch === '%') {
      // comment to end of line
      while (i < latex.length && latex[i] !== '\n') i++;
      continue;
    }
    switch (ch) {
      case '{': tokens.push({ type: 'lbrace', value: ch }); break;
      case '}': tokens.push({ type: 'rbrace', value: ch }); break;
      case '^': tokens.push({ type: 'caret', value: ch }); break;
      case '_': tokens.push({ type: 'underscore', value: ch }); break;
      case '&': tokens.push({ type: 'ampersand', value: ch }); break;
      default: tokens.push({ type: 'char', value: ch }); break;
    }
    i++;
  }
  return tokens;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

type Terminator = (token: Token) => boolean;

// Limit on open parseSequence/parseAtom frames; deeper input fails the transcode.
export const MAX_MATH_DEPTH = 128;

class MathParser {
  private pos = 0;
  private depth = 0;

  constructor(private readonly tokens: Token[]) {}

  parseAll(): MathNode[] {
    const nodes = this.parseSequence(() => false);
    if (this.peek()) throw new UnsupportedMath(`unexpected "${this.peek()?.value}"`);
    return nodes;
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private next(): Token {
    const token = this.tokens[this.pos++];
    if (!token) throw new UnsupportedMath('expression ends too early');
    return token;
  }

  private isCommand(token: Token | undefined, value: string): boolean {
    return token?.type === 'command' && token.value === value;
  }

  /** Atoms up to (not including) a closing brace or a token accepted by `stop`. */
  private parseSequence(stop: Terminator): MathNode[] {
    return this.nested(() => this.parseAtoms(stop));
  }

  private parseAtoms(stop: Terminator): MathNode[] {
    const atoms: MathNode[] = [];
    for (let token = this.peek(); token && token.type !== 'rbrace' && !stop(token); token = this.peek()) {
      if (token.type === 'caret' || token.type === 'underscore') {
        const base = atoms.pop();
        if (!base) throw new UnsupportedMath(`"${token.value}" without a base`);
        atoms.push(this.parseScripts([base]));
      } else if (token.type === 'ampersand') {
        throw new UnsupportedMath('"&" outside a matrix');
      } else {
        atoms.push(...this.parseAtom());
      }
    }
    return atoms;
  }

  /** A braced group or a single atom, as used for command arguments and scripts. */
  private parseArgument(): MathNode[] {
    const token = this.peek();
    if (!token) throw new UnsupportedMath('missing argument');
    if (token.type === 'lbrace') {
      this.next();
      const body = this.parseSequence(() => false);
      if (this.peek()?.type !== 'rbrace') throw new UnsupportedMath('unbalanced "{"');
      this.next();
      return body;
    }
    if (token.type === 'rbrace' || token.type === 'caret' || token.type === 'underscore' || token.type === 'ampersand') {
      throw new UnsupportedMath(`unexpected "${token.value}"`);
    }
    return this.parseAtom();
  }

  private parseAtom(): MathNode[] {
    return this.nested(() => this.parseToken(this.next()));
  }

  private nested<T>(parse: () => T): T {
    if (this.depth >= MAX_MATH_DEPTH) throw new UnsupportedMath('nested too deeply');
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  private parseToken(token: Token): MathNode[] {
    switch (token.type) {
      case 'char':
        return [{ kind: 'run', text: token.value }];
      case 'lbrace': {
        this.pos--;
        return this.parseArgument();
      }
      case 'command':
        return [this.parseCommand(token.value)];
      default:
        throw new UnsupportedMath(`unexpected "${token.value}"`);
    }
  }

  private parseScripts(base: MathNode[]): MathNode {
    let sub: MathNode[] | undefined;
    let sup: MathNode[] | undefined;
    for (let token = this.peek(); token && (token.type === 'caret' || token.type === 'underscore'); token = this.peek()) {
      this.next();
      const script = this.parseArgument();
      if (token.type === 'caret') {
        if (sup) throw new UnsupportedMath('double superscript');
        sup = script;
      } else {
        if (sub) throw new UnsupportedMath('double subscript');
        sub = script;
      }
    }
    if (sub && sup) return { kind: 'subsup', base, sub, sup };
    if (sup) return { kind: 'sup', base, sup };
    if (sub) return { kind: 'sub', base, sub };
    throw new UnsupportedMath('script operator without script');
  }

  private parseCommand(cmd: string): MathNode {
    const symbol = SYMBOLS.get(cmd);
    if (symbol !== undefined) return { kind: 'run', text: symbol };

    const nary = NARY_OPERATORS.get(cmd);
    if (nary) return this.parseNary(nary);

    const accent = ACCENTS.get(cmd);
    if (accent) return { kind: 'acc', chr: accent, body: this.parseArgument() };

    const name = cmd.slice(1);
    if (NAMED_FUNCTIONS.has(name)) return { kind: 'func', name, arg: this.parseFunctionArgument() };

    switch (cmd) {
      case '\\frac':
      case '\\dfrac':
      case '\\tfrac': {
        const num = this.parseArgument();
        const den = this.parseArgument();
        return { kind: 'frac', num, den };
      }
      case '\\sqrt':
        return this.parseRadical();
      case '\\left':
        return this.parseDelimited();
      case '\\begin':
        return this.parseEnvironment();
      case '\\mathrm':
      case '\\text':
      case '\\textrm':
        return { kind: 'run', text: plainText(this.parseArgument()), upright: true };
      case '\\operatorname':
        return { kind: 'func', name: plainText(this.parseArgument()), arg: this.parseFunctionArgument() };
      default:
        throw new UnsupportedMath(`unsupported command ${cmd}`);
    }
  }

  /** Function arguments may be omitted (`\sin x`), in which case the next atom is used. */
  private parseFunctionArgument(): MathNode[] {
    const token = this.peek();
    if (!token || token.type === 'rbrace' || token.type === 'ampersand') return [];
    if (token.type === 'caret' || token.type === 'underscore') return [];
    return this.parseArgument();
  }

  private parseRadical(): MathNode {
    if (this.peek()?.type === 'char' && this.peek()?.value === '[') {
      this.next();
      const degree = this.parseSequence(token => token.type === 'char' && token.value === ']');
      const close = this.peek();
      if (!(close?.type === 'char' && close.value === ']')) throw new UnsupportedMath('unclosed \\sqrt degree');
      this.next();
      return { kind: 'rad', degree, body: this.parseArgument() };
    }
    return { kind: 'rad', body: this.parseArgument() };
  }

  private parseNary(chr: string): MathNode {
    let limits = false;
    if (this.isCommand(this.peek(), '\\limits')) {
      this.next();
      limits = true;
    }
    let sub: MathNode[] | undefined;
    let sup: MathNode[] | undefined;
    for (let token = this.peek(); token && (token.type === 'caret' || token.type === 'underscore'); token = this.peek()) {
      this.next();
      if (token.type === 'underscore') sub = this.parseArgument();
      else sup = this.parseArgument();
    }
    const token = this.peek();
    let body: MathNode[] = [];
    if (token && token.type !== 'rbrace' && token.type !== 'ampersand') {
      body = this.parseArgument();
      if (this.peek()?.type === 'caret' || this.peek()?.type === 'underscore') {
        body = [this.parseScripts(body)];
      }
    }
    return { kind: 'nary', chr, limits, sub, sup, body };
  }

  private readDelimiter(): string {
    const token = this.next();
    if (token.type === 'char') return token.value === '.' ? '' : token.value;
    if (token.type === 'command') {
      const delim = DELIMITER_COMMANDS.get(token.value);
      if (delim !== undefined) return delim;
    }
    throw new UnsupportedMath(`unsupported delimiter "${token.value}"`);
  }

  private parseDelimited(): MathNode {
    const open = this.readDelimiter();
    const body = this.parseSequence(token => this.isCommand(token, '\\right'));
    if (!this.isCommand(this.peek(), '\\right')) throw new UnsupportedMath('\\left without \\right');
    this.next();
    const close = this.readDelimiter();
    return { kind: 'delim', open, close, body };
  }

  private parseEnvironment(): MathNode {
    const name = plainText(this.parseArgument());
    const delimiters: Record<string, [string, string]> = {
      matrix: ['', ''],
      pmatrix: ['(', ')'],
      bmatrix: ['[', ']'],
      vmatrix: ['|', '|'],
    };
    const pair = delimiters[name];
    if (!pair) throw new UnsupportedMath(`unsupported environment ${name}`);

    const rows: MathNode[][][] = [];
    let cells: MathNode[][] = [];
    for (;;) {
      const cell = this.parseSequence(token =>
        token.type === 'ampersand' || this.isCommand(token, '\\\\') || this.isCommand(token, '\\end'));
      cells.push(cell);
      const token = this.next();
      if (token.type === 'ampersand') continue;
      if (this.isCommand(token, '\\\\')) {
        rows.push(cells);
        cells = [];
        continue;
      }
      if (this.isCommand(token, '\\end')) {
        const endName = plainText(this.parseArgument());
        if (endName !== name) throw new UnsupportedMath(`\\begin{${name}} closed by \\end{${endName}}`);
        if (cells.length > 1 || cells[0].length > 0) rows.push(cells);
        break;
      }
      throw new UnsupportedMath(`unexpected "${token.value}" in ${name}`);
    }

    const matrix: MathNode = { kind: 'matrix', rows };
    return pair[0] || pair[1] ? { kind: 'delim', open: pair[0], close: pair[1], body: [matrix] } : matrix;
  }
}

function plainText(nodes: MathNode[]): string {
  return nodes.map(node => (node.kind === 'run' ? node.text : '')).join('');
}

// ---------------------------------------------------------------------------
// OMML serialization
// ---------------------------------------------------------------------------

function serializeRun(text: string, upright?: boolean): string {
  const rPr = upright ? '<m:rPr><m:sty m:val="p"/></m:rPr>' : '';
  return '<m:r>' + rPr + '<m:t xml:space="preserve">' + escapeXml(text) + '</m:t></m:r>';
}

function chrProperty(tag: string, chr: string): string {
  return '<m:' + tag + ' m:val="' + escapeXml(chr) + '"/>';
}

/** Serialize a math tree to OMML content (without the enclosing m:oMath). */
export function serializeMath(nodes: MathNode[]): string {
  return nodes.map(serializeNode).join('');
}

function serializeNode(node: MathNode): string {
  switch (node.kind) {
    case 'run':
      return serializeRun(node.text, node.upright);
    case 'frac':
      return '<m:f><m:num>' + serializeMath(node.num) + '</m:num><m:den>' + serializeMath(node.den) + '</m:den></m:f>';
    case 'sup':
      return '<m:sSup><m:e>' + serializeMath(node.base) + '</m:e><m:sup>' + serializeMath(node.sup) + '</m:sup></m:sSup>';
    case 'sub':
      return '<m:sSub><m:e>' + serializeMath(node.base) + '</m:e><m:sub>' + serializeMath(node.sub) + '</m:sub></m:sSub>';
    case 'subsup':
      return '<m:sSubSup><m:e>' + serializeMath(node.base) + '</m:e><m:sub>' + serializeMath(node.sub) + '</m:sub><m:sup>' + serializeMath(node.sup) + '</m:sup></m:sSubSup>';
    case 'rad':
      return node.degree
        ? '<m:rad><m:deg>' + serializeMath(node.degree) + '</m:deg><m:e>' + serializeMath(node.body) + '</m:e></m:rad>'
        : '<m:rad><m:radPr><m:degHide m:val="1"/></m:radPr><m:deg/><m:e>' + serializeMath(node.body) + '</m:e></m:rad>';
    case 'func':
      return '<m:func><m:fName>' + serializeRun(node.name, true) + '</m:fName><m:e>' + serializeMath(node.arg) + '</m:e></m:func>';
    case 'nary': {
      let props = chrProperty('chr', node.chr);
      if (node.limits) props += '<m:limLoc m:val="undOvr"/>';
      if (!node.sub) props += '<m:subHide m:val="1"/>';
      if (!node.sup) props += '<m:supHide m:val="1"/>';
      return '<m:nary><m:naryPr>' + props + '</m:naryPr>'
        + '<m:sub>' + serializeMath(node.sub ?? []) + '</m:sub>'
        + '<m:sup>' + serializeMath(node.sup ?? []) + '</m:sup>'
        + '<m:e>' + serializeMath(node.body) + '</m:e></m:nary>';
    }
    case 'delim':
      return '<m:d><m:dPr>' + chrProperty('begChr', node.open) + chrProperty('endChr', node.close) + '</m:dPr><m:e>' + serializeMath(node.body) + '</m:e></m:d>';
    case 'acc':
      return '<m:acc><m:accPr>' + chrProperty('chr', node.chr) + '</m:accPr><m:e>' + serializeMath(node.body) + '</m:e></m:acc>';
    case 'matrix':
      return '<m:m>' + node.rows.map(row => '<m:mr>' + row.map(cell => '<m:e>' + serializeMath(cell) + '</m:e>').join('') + '</m:mr>').join('') + '</m:m>';
  }
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

/** Parse a LaTeX math expression into a math tree. Never throws. */
export function transcodeMath(latex: string): MathTranscodeResult {
  try {
    return { ok: true, nodes: new MathParser(tokenize(latex)).parseAll() };
  } catch (error) {
    if (error instanceof UnsupportedMath) return { ok: false, reason: error.message };
    throw error;
  }
}

/** Convert a LaTeX math string to OMML content, or undefined when it is outside the supported subset. */
export function latexToOmml(latex: string): string | undefined {
  const result = transcodeMath(latex);
  return result.ok ? serializeMath(result.nodes) : undefined;
}
