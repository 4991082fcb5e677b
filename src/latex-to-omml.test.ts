// src/latex-to-omml.test.ts

import { describe, test, expect } from '@jest/globals';
import * as fc from 'fast-check';
import { latexToOmml, serializeMath, transcodeMath } from './latex-to-omml';

const r = (text: string) => '<m:r><m:t xml:space="preserve">' + text + '</m:t></m:r>';
const upright = (text: string) => '<m:r><m:rPr><m:sty m:val="p"/></m:rPr><m:t xml:space="preserve">' + text + '</m:t></m:r>';

describe('transcodeMath', () => {
  test('empty input has no nodes', () => {
    expect(transcodeMath('')).toEqual({ ok: true, nodes: [] });
    expect(latexToOmml('   ')).toBe('');
  });

  test('whitespace between atoms is dropped', () => {
    expect(transcodeMath('a + b')).toEqual({
      ok: true,
      nodes: [
        { kind: 'run', text: 'a' },
        { kind: 'run', text: '+' },
        { kind: 'run', text: 'b' },
      ],
    });
  });

  test('scripts bind to the nearest preceding atom', () => {
    expect(transcodeMath('a+b^2')).toEqual({
      ok: true,
      nodes: [
        { kind: 'run', text: 'a' },
        { kind: 'run', text: '+' },
        { kind: 'sup', base: [{ kind: 'run', text: 'b' }], sup: [{ kind: 'run', text: '2' }] },
      ],
    });
  });

  test('subscript and superscript together', () => {
    const result = transcodeMath('x_i^{n}');
    expect(result).toEqual({
      ok: true,
      nodes: [{
        kind: 'subsup',
        base: [{ kind: 'run', text: 'x' }],
        sub: [{ kind: 'run', text: 'i' }],
        sup: [{ kind: 'run', text: 'n' }],
      }],
    });
  });

  test('n-ary operators take their scripts as limits', () => {
    expect(transcodeMath('\\sum_{i=1}^{n} i')).toEqual({
      ok: true,
      nodes: [{
        kind: 'nary',
        chr: '∑',
        limits: false,
        sub: [{ kind: 'run', text: 'i' }, { kind: 'run', text: '=' }, { kind: 'run', text: '1' }],
        sup: [{ kind: 'run', text: 'n' }],
        body: [{ kind: 'run', text: 'i' }],
      }],
    });
  });

  test('unknown commands fail the whole expression', () => {
    expect(transcodeMath('x + \\foo{y}')).toEqual({ ok: false, reason: 'unsupported command \\foo' });
  });

  test('unbalanced braces fail', () => {
    expect(transcodeMath('{x').ok).toBe(false);
    expect(transcodeMath('x}').ok).toBe(false);
  });

  test('unknown environments fail', () => {
    expect(transcodeMath('\\begin{align}x\\end{align}')).toEqual({ ok: false, reason: 'unsupported environment align' });
  });

  test('\\left without \\right fails', () => {
    expect(transcodeMath('\\left( x').ok).toBe(false);
  });

  test('deeply nested groups fail instead of overflowing the stack', () => {
    expect(transcodeMath('{'.repeat(6000) + 'x' + '}'.repeat(6000))).toEqual({ ok: false, reason: 'nested too deeply' });
    expect(transcodeMath('x^{'.repeat(3000) + 'y' + '}'.repeat(3000))).toEqual({ ok: false, reason: 'nested too deeply' });
    expect(transcodeMath('\\sqrt'.repeat(3000) + 'x')).toEqual({ ok: false, reason: 'nested too deeply' });
  });

  test('moderate nesting is still supported', () => {
    expect(latexToOmml('{'.repeat(20) + 'x' + '}'.repeat(20))).toBe(r('x'));
  });

  test('never throws on arbitrary input', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 30 }), (latex) => {
        const result = transcodeMath(latex);
        expect(typeof result.ok).toBe('boolean');
      }),
      { numRuns: 200 }
    );
  });
});

describe('latexToOmml', () => {
  test('Greek letters and operators', () => {
    expect(latexToOmml('\\alpha \\times \\beta')).toBe(r('α') + r('×') + r('β'));
  });

  test('fractions', () => {
    expect(latexToOmml('\\frac{a}{b}')).toBe('<m:f><m:num>' + r('a') + '</m:num><m:den>' + r('b') + '</m:den></m:f>');
  });

  test('square roots with and without a degree', () => {
    expect(latexToOmml('\\sqrt{x}')).toBe('<m:rad><m:radPr><m:degHide m:val="1"/></m:radPr><m:deg/><m:e>' + r('x') + '</m:e></m:rad>');
    expect(latexToOmml('\\sqrt[3]{x}')).toBe('<m:rad><m:deg>' + r('3') + '</m:deg><m:e>' + r('x') + '</m:e></m:rad>');
  });

  test('named functions are upright', () => {
    expect(latexToOmml('\\sin x')).toBe('<m:func><m:fName>' + upright('sin') + '</m:fName><m:e>' + r('x') + '</m:e></m:func>');
  });

  test('delimiters', () => {
    expect(latexToOmml('\\left( x \\right)')).toBe(
      '<m:d><m:dPr><m:begChr m:val="("/><m:endChr m:val=")"/></m:dPr><m:e>' + r('x') + '</m:e></m:d>'
    );
  });

  test('accents', () => {
    expect(latexToOmml('\\hat{x}')).toBe('<m:acc><m:accPr><m:chr m:val="̂"/></m:accPr><m:e>' + r('x') + '</m:e></m:acc>');
  });

  test('matrices', () => {
    expect(latexToOmml('\\begin{matrix}a & b \\\\ c & d\\end{matrix}')).toBe(
      '<m:m><m:mr><m:e>' + r('a') + '</m:e><m:e>' + r('b') + '</m:e></m:mr>'
      + '<m:mr><m:e>' + r('c') + '</m:e><m:e>' + r('d') + '</m:e></m:mr></m:m>'
    );
  });

  test('\\mathrm text is upright', () => {
    expect(latexToOmml('\\mathrm{kg}')).toBe(upright('kg'));
  });

  test('XML special characters are escaped', () => {
    expect(latexToOmml('a<b')).toBe(r('a') + r('&lt;') + r('b'));
  });

  test('unsupported input gives undefined', () => {
    expect(latexToOmml('\\unknown')).toBeUndefined();
  });
});

describe('serializeMath', () => {
  test('n-ary without limits hides both scripts', () => {
    expect(serializeMath([{ kind: 'nary', chr: '∫', limits: false, body: [{ kind: 'run', text: 'f' }] }])).toBe(
      '<m:nary><m:naryPr><m:chr m:val="∫"/><m:subHide m:val="1"/><m:supHide m:val="1"/></m:naryPr>'
      + '<m:sub></m:sub><m:sup></m:sup><m:e>' + r('f') + '</m:e></m:nary>'
    );
  });
});
