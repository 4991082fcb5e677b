// Text that goes into package parts.

// Characters XML 1.0 cannot carry, even escaped.
export const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/;

const INVALID_XML_CHARS_ALL = new RegExp(INVALID_XML_CHARS.source, 'g');

export function stripInvalidXmlChars(text: string): string {
  return text.replace(INVALID_XML_CHARS_ALL, '');
}

/** Escape markup characters and drop anything XML 1.0 cannot hold. */
export function escapeXml(text: string): string {
  return stripInvalidXmlChars(text)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
