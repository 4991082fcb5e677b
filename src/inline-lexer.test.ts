import { describe, test, expect } from '@jest/globals';
import { WarningLog, textInline } from './document-model';
import { lexInline } from './inline-lexer';

function lex(text: string) {
  const warnings = new WarningLog();
  const result = lexInline(text, warnings, 7);
  return { ...result, warnings: warnings.warnings };
}

describe('lexInline', () => {
  test('plain text is a single run', () => {
    const { content, warnings } = lex('just text');
    expect(content).toEqual([textInline('just text')]);
    expect(warnings).toEqual([]);
  });

  test('emphasis and strong emphasis', () => {
    const { content } = lex('*a* and **b**');
    expect(content).toEqual([
      textInline('a', { italic: true }),
      textInline(' and '),
      textInline('b', { bold: true }),
    ]);
  });

  test('triple delimiters open bold and italic together', () => {
    const { content } = lex('***both***');
    expect(content).toEqual([textInline('both', { bold: true, italic: true })]);
  });

  test('strikethrough', () => {
    expect(lex('~~gone~~ kept').content).toEqual([
      textInline('gone', { strike: true }),
      textInline(' kept'),
    ]);
  });

  test('underscores inside words stay literal', () => {
    const { content, warnings } = lex('snake_case_name');
    expect(content).toEqual([textInline('snake_case_name')]);
    expect(warnings).toEqual([]);
  });

  test('unterminated emphasis degrades to literal text with one warning', () => {
    const { content, warnings } = lex('**bold');
    expect(content).toEqual([textInline('**bold')]);
    expect(warnings).toEqual([
      { code: 'unterminated-emphasis', message: 'Unterminated "**" marker treated as literal text', line: 7 },
    ]);
  });

  test('code spans keep their content verbatim', () => {
    expect(lex('use `a*b` here').content).toEqual([
      textInline('use '),
      textInline('a*b', { code: true }),
      textInline(' here'),
    ]);
  });

  test('unterminated code span', () => {
    const { content, warnings } = lex('x `y');
    expect(content).toEqual([textInline('x `y')]);
    expect(warnings.map(w => w.code)).toEqual(['unterminated-code-span']);
  });

  test('backslash escapes punctuation', () => {
    expect(lex('\\*not\\*').content).toEqual([textInline('*not*')]);
  });

  test('links carry their normalized target', () => {
    const { content } = lex('[site](https://example.com)');
    expect(content).toEqual([
      { type: 'link', content: [textInline('site')], target: 'https://example.com' },
    ]);
  });

  test('emphasis around a link applies to the link text', () => {
    const { content } = lex('**[site](https://example.com)**');
    expect(content).toEqual([
      { type: 'link', content: [textInline('site', { bold: true })], target: 'https://example.com' },
    ]);
  });

  test('unsafe link targets render as text', () => {
    const { content, warnings } = lex('[x](javascript:alert(1))');
    expect(content).toEqual([textInline('x')]);
    expect(warnings.map(w => w.code)).toEqual(['unsafe-link']);
  });

  test('link without closing parenthesis is literal', () => {
    const { content, warnings } = lex('[x](http://a');
    expect(content).toEqual([textInline('[x](http://a')]);
    expect(warnings.map(w => w.code)).toEqual(['malformed-link']);
  });

  test('footnote references', () => {
    const { content, footnoteLabels } = lex('See[^1].');
    expect(content).toEqual([
      textInline('See'),
      { type: 'footnote_ref', label: '1' },
      textInline('.'),
    ]);
    expect(footnoteLabels).toEqual(['1']);
  });

  test('inline math', () => {
    expect(lex('Area $x^2$ here').content).toEqual([
      textInline('Area '),
      { type: 'math', source: 'x^2', display: false },
      textInline(' here'),
    ]);
  });

  test('inline math between double dollars', () => {
    expect(lex('Area $$x^2$$ here').content).toEqual([
      textInline('Area '),
      { type: 'math', source: 'x^2', display: true },
      textInline(' here'),
    ]);
  });

  test('currency amounts are not math', () => {
    const { content, warnings } = lex('costs $5 today');
    expect(content).toEqual([textInline('costs $5 today')]);
    expect(warnings).toEqual([]);
  });

  test('unterminated inline math yields exactly one warning', () => {
    const { content, warnings } = lex('a $x + y');
    expect(content).toEqual([textInline('a $x + y')]);
    expect(warnings).toEqual([
      { code: 'unterminated-math', message: 'Unterminated inline math "$x + y" treated as literal text', line: 7 },
    ]);
  });

  test('images become an italic placeholder', () => {
    expect(lex('![logo](a.png)').content).toEqual([textInline('[Image: logo]', { italic: true })]);
  });

  test('html line breaks', () => {
    expect(lex('a<br>b').content).toEqual([textInline('a'), { type: 'line_break' }, textInline('b')]);
  });
});
