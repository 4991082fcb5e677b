export type Metadata = Record<string, string>;

export interface FrontmatterResult {
  metadata: Metadata;
  body: string;
  /** Source line number of the first body line. */
  bodyLine: number;
}

// Front matter spellings of the core property names.
const KEY_ALIASES: Record<string, string> = {
  'creator': 'author',
  'last-modified-by': 'lastModifiedBy',
  'lastmodifiedby': 'lastModifiedBy',
  'tags': 'keywords',
};

/** Parse a value that may be a YAML inline array `[v1, v2, ...]` or bare comma-separated values. */
export function parseInlineArray(value: string): string[] {
  let inner = value;
  if (inner.startsWith('[') && inner.endsWith(']')) inner = inner.slice(1, -1);
  if (!inner.includes(',')) return [inner.trim()].filter(s => s.length > 0);
  return inner.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

export function normalizeMetadataKey(key: string): string {
  return KEY_ALIASES[key.toLowerCase()] ?? key;
}

/**
 * Split YAML-style front matter (delimited by `---`) from the markdown body.
 * Only flat `key: value` lines are understood; anything else in the block is ignored.
 */
export function parseFrontmatter(markdown: string): FrontmatterResult {
  const text = markdown.replace(/\r\n?/g, '\n');
  if (!text.startsWith('---\n')) {
    return { metadata: {}, body: markdown, bodyLine: 1 };
  }

  const endMatch = /\n(?:---|\.\.\.)(?:\n|$)/.exec(text.slice(3));
  if (!endMatch) {
    return { metadata: {}, body: markdown, bodyLine: 1 };
  }
  const endIdx = endMatch.index + 3;
  const yamlBlock = text.slice(4, endIdx);
  const body = text.slice(endIdx + endMatch[0].length);

  const metadata: Metadata = {};
  for (const line of yamlBlock.split('\n')) {
    if (/^\s*#/.test(line)) continue;
    const colonIdx = line.indexOf(':');
    if (colonIdx <= 0) continue;
    const key = normalizeMetadataKey(line.slice(0, colonIdx).trim());
    let value = line.slice(colonIdx + 1).trim().replace(/^["']|["']$/g, '');
    if (!key || !value) continue;
    if (value.startsWith('[') && value.endsWith(']')) value = parseInlineArray(value).join(', ');
    metadata[key] = value;
  }

  const bodyLine = text.slice(0, text.length - body.length).split('\n').length;
  return { metadata, body, bodyLine };
}
