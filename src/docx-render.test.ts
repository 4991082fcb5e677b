import { describe, test, expect } from '@jest/globals';
import { generateRPr, generateRun, renderDocumentParts } from './docx-render';
import { attrValues, parseAndPlan, userFootnoteIds } from './test-helpers';

function render(markdown: string) {
  const { doc, plan, warnings } = parseAndPlan(markdown);
  const parts = renderDocumentParts(doc, plan, warnings);
  return { ...parts, warnings };
}

/** The body of word/document.xml between <w:body> and the section properties. */
function body(documentXml: string): string {
  const start = documentXml.indexOf('<w:body>\n') + '<w:body>\n'.length;
  return documentXml.slice(start, documentXml.indexOf('<w:sectPr>'));
}

describe('generateRPr', () => {
  test('orders character properties and omits empty sets', () => {
    expect(generateRPr({ bold: true, italic: true, strike: true, code: false, hyperlink: false }))
      .toBe('<w:rPr><w:b/><w:i/><w:strike/></w:rPr>');
    expect(generateRPr({ bold: false, italic: false, strike: false, code: false, hyperlink: false })).toBe('');
  });

  test('code style wins over hyperlink style', () => {
    expect(generateRPr({ bold: false, italic: false, strike: false, code: true, hyperlink: true }))
      .toBe('<w:rPr><w:rStyle w:val="CodeChar"/></w:rPr>');
  });
});

describe('generateRun', () => {
  test('escapes text and preserves spaces', () => {
    expect(generateRun('a < b & c', '')).toBe('<w:r><w:t xml:space="preserve">a &lt; b &amp; c</w:t></w:r>');
  });
});

describe('renderDocumentParts', () => {
  test('headings and paragraphs', () => {
    const { documentXml } = render('# Title\n\nHello **world**.');
    expect(body(documentXml)).toBe(
      '<w:p><w:pPr><w:pStyle w:val="Heading1"/></w:pPr>' + generateRun('Title', '') + '</w:p>\n'
      + '<w:p>' + generateRun('Hello ', '') + generateRun('world', '<w:rPr><w:b/></w:rPr>') + generateRun('.', '') + '</w:p>\n'
    );
  });

  test('list paragraphs carry their run number and level', () => {
    const { documentXml } = render('- a\n  - b\n\n1. c');
    expect(attrValues(documentXml, 'w:numId', 'w:val')).toEqual(['1', '2', '3']);
    expect(attrValues(documentXml, 'w:ilvl', 'w:val')).toEqual(['0', '1', '0']);
  });

  test('later paragraphs of a list item are indented to the item text', () => {
    const { documentXml } = render('- first\n\n  second');
    expect(body(documentXml)).toBe(
      '<w:p><w:pPr><w:numPr><w:ilvl w:val="0"/><w:numId w:val="1"/></w:numPr></w:pPr>' + generateRun('first', '') + '</w:p>\n'
      + '<w:p><w:pPr><w:ind w:left="720"/></w:pPr>' + generateRun('second', '') + '</w:p>\n'
    );
  });

  test('blockquotes use the Quote style indented per level', () => {
    const { documentXml } = render('> > deep');
    expect(body(documentXml)).toBe(
      '<w:p><w:pPr><w:pStyle w:val="Quote"/><w:ind w:left="1440"/></w:pPr>' + generateRun('deep', '') + '</w:p>\n'
    );
  });

  test('code blocks are one paragraph with explicit breaks', () => {
    const { documentXml } = render('```\nline 1\nline 2\n```');
    expect(body(documentXml)).toBe(
      '<w:p><w:pPr><w:pStyle w:val="CodeBlock"/></w:pPr>'
      + generateRun('line 1', '') + '<w:r><w:br/></w:r>' + generateRun('line 2', '')
      + '</w:p>\n'
    );
  });

  test('horizontal rules are bordered paragraphs', () => {
    const { documentXml } = render('---');
    expect(body(documentXml)).toBe(
      '<w:p><w:pPr><w:pBdr><w:bottom w:val="single" w:sz="6" w:space="1" w:color="auto"/></w:pBdr></w:pPr></w:p>\n'
    );
  });

  test('tables have a full grid, a bold header row and a trailing spacer', () => {
    const { documentXml } = render('| h1 | h2 |\n|---|---|\n| only |');
    expect(attrValues(documentXml, 'w:gridCol', 'w:w')).toEqual([]);
    expect(documentXml.match(/<w:gridCol\/>/g)).toHaveLength(2);
    expect(documentXml.match(/<w:tc>/g)).toHaveLength(4);
    expect(documentXml).toContain('<w:tr><w:trPr><w:tblHeader/></w:trPr>');
    expect(documentXml).toContain(generateRun('h1', '<w:rPr><w:b/></w:rPr>'));
    expect(documentXml).toContain('</w:tbl>\n<w:p></w:p>\n');
  });

  test('every link occurrence gets its own relationship', () => {
    const { documentXml, documentRels } = render('[a](https://example.com) and [b](https://example.com)');
    expect(attrValues(documentXml, 'w:hyperlink', 'r:id')).toEqual(['rId1', 'rId2']);
    expect(documentRels.relationships.map(rel => [rel.id, rel.target, rel.external])).toEqual([
      ['rId1', 'https://example.com', true],
      ['rId2', 'https://example.com', true],
    ]);
    expect(documentXml).toContain(generateRun('a', '<w:rPr><w:rStyle w:val="Hyperlink"/></w:rPr>'));
  });

  test('footnotes render references, separators and marks', () => {
    const { documentXml, footnotesXml } = render('See note.[^1]\n\n[^1]: Detail.');
    expect(documentXml).toContain('<w:r><w:rPr><w:rStyle w:val="FootnoteReference"/></w:rPr><w:footnoteReference w:id="1"/></w:r>');
    expect(attrValues(footnotesXml, 'w:footnote', 'w:id')).toEqual(['-1', '0', '1']);
    expect(footnotesXml).toContain(
      '<w:footnote w:id="1"><w:p><w:pPr><w:pStyle w:val="FootnoteText"/></w:pPr>'
      + '<w:r><w:rPr><w:rStyle w:val="FootnoteReference"/></w:rPr><w:footnoteRef/></w:r>' + generateRun(' ', '')
      + generateRun('Detail.', '') + '</w:p>\n</w:footnote>'
    );
  });

  test('links inside footnotes belong to the footnotes part', () => {
    const { documentRels, footnotesRels, footnotesXml } = render('Ref[^n]\n\n[^n]: [site](https://example.org)');
    expect(documentRels.size).toBe(0);
    expect(footnotesRels.relationships.map(rel => rel.id)).toEqual(['rId1']);
    expect(attrValues(footnotesXml, 'w:hyperlink', 'r:id')).toEqual(['rId1']);
  });

  test('unresolved footnote references stay literal', () => {
    const { documentXml, footnotesXml } = render('Text[^nope]');
    expect(documentXml).toContain(generateRun('[^nope]', ''));
    expect(userFootnoteIds(footnotesXml)).toEqual([]);
  });

  test('inline math becomes OMML', () => {
    const { documentXml, warnings } = render('Area $x^2$');
    expect(documentXml).toContain('<m:oMath><m:sSup>');
    expect(warnings.warnings).toEqual([]);
  });

  test('unsupported math falls back to monospaced text', () => {
    const { documentXml, warnings } = render('Bad $\\foo$ math');
    expect(documentXml).toContain(generateRun('$\\foo$', '<w:rPr><w:rStyle w:val="CodeChar"/></w:rPr>'));
    expect(warnings.warnings).toEqual([
      { code: 'unsupported-math', message: 'Unsupported math "\\foo" (unsupported command \\foo) rendered as literal text' },
    ]);
  });

  test('unsupported math between double dollars keeps its delimiters', () => {
    const { documentXml, warnings } = render('See $$\\foo$$ here');
    expect(documentXml).toContain(generateRun('$$\\foo$$', '<w:rPr><w:rStyle w:val="CodeChar"/></w:rPr>'));
    expect(warnings.warnings.map(w => w.code)).toEqual(['unsupported-math']);
  });

  test('display math is an equation paragraph', () => {
    const { documentXml } = render('$$\\frac{1}{2}$$');
    expect(body(documentXml)).toContain('<w:p><m:oMathPara><m:oMath><m:f>');
  });
});
