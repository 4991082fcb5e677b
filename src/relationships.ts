// Relationship tables for package parts (word/_rels/*.rels)

import { ConversionError } from './errors';
import { INVALID_XML_CHARS, escapeXml } from './xml-text';

export const REL_TYPES = {
  officeDocument: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument',
  coreProperties: 'http://schemas.openxmlformats.org/package/2006/relationships/metadata/core-properties',
  extendedProperties: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/extended-properties',
  customProperties: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/custom-properties',
  styles: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/styles',
  numbering: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/numbering',
  footnotes: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/footnotes',
  settings: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/settings',
  fontTable: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/fontTable',
  hyperlink: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/hyperlink',
} as const;

export interface Relationship {
  id: string;
  type: string;
  target: string;
  external: boolean;
}

/**
 * Relationships owned by one part. Ids are `rId1`, `rId2`, … in insertion
 * order and never reused.
 */
export class RelationshipTable {
  private readonly entries: Relationship[] = [];

  add(type: string, target: string, external = false): string {
    if (!target || INVALID_XML_CHARS.test(target)) {
      throw new ConversionError(
        'RelationshipAllocationFailed',
        `Cannot allocate a relationship for target "${target}"`,
        { type, target }
      );
    }
    const id = 'rId' + (this.entries.length + 1);
    this.entries.push({ id, type, target, external });
    return id;
  }

  /** A fresh hyperlink relationship; identical targets each get their own id. */
  addHyperlink(target: string): string {
    return this.add(REL_TYPES.hyperlink, target, true);
  }

  get relationships(): readonly Relationship[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  has(id: string): boolean {
    return this.entries.some(rel => rel.id === id);
  }
}

export function relationshipsXml(table: RelationshipTable): string {
  let xml = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';
  xml += '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">\n';
  for (const rel of table.relationships) {
    xml += '<Relationship Id="' + rel.id + '" Type="' + rel.type + '" Target="' + escapeXml(rel.target) + '"'
      + (rel.external ? ' TargetMode="External"' : '') + '/>\n';
  }
  xml += '</Relationships>';
  return xml;
}
