import { describe, test, expect } from '@jest/globals';
import { INVALID_XML_CHARS, escapeXml, stripInvalidXmlChars } from './xml-text';

describe('stripInvalidXmlChars', () => {
  test('drops control characters but keeps tab, newline and carriage return', () => {
    expect(stripInvalidXmlChars('a\u0000b\u000bc\u000cd\u001fe\t\n\r')).toBe('abcde\t\n\r');
  });

  test('drops the two noncharacters at the end of the BMP', () => {
    expect(stripInvalidXmlChars('x\uFFFEy\uFFFFz')).toBe('xyz');
  });
});

describe('escapeXml', () => {
  test('escapes markup and removes what XML cannot carry', () => {
    const escaped = escapeXml('Page one\u000c<two> & "three"\u0001');
    expect(escaped).toBe('Page one&lt;two&gt; &amp; &quot;three&quot;');
    expect(INVALID_XML_CHARS.test(escaped)).toBe(false);
  });
});
