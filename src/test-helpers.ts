import JSZip from 'jszip';
import { WarningLog } from './document-model';
import type { MdDocument } from './document-model';
import { parseMarkdown } from './block-parser';
import { allocateNumbering } from './numbering';
import type { NumberingPlan } from './numbering';
import { findAllDeep, getAttr, parseXml } from './docx-package';

/** Unzip a package into part path → text, in archive order. */
export async function unzipParts(docx: Uint8Array): Promise<Map<string, string>> {
  const zip = await JSZip.loadAsync(docx);
  const parts = new Map<string, string>();
  for (const file of Object.values(zip.files)) {
    if (!file.dir) parts.set(file.name, await file.async('string'));
  }
  return parts;
}

export function requirePart(parts: Map<string, string>, path: string): string {
  const xml = parts.get(path);
  if (xml === undefined) throw new Error(`Missing part ${path}`);
  return xml;
}

/** Values of `attr` on every `tag` element in `xml`, in document order. */
export function attrValues(xml: string, tag: string, attr: string): string[] {
  return findAllDeep(parseXml(xml), tag)
    .map(node => getAttr(node, attr))
    .filter((value): value is string => value !== undefined);
}

/** Footnote ids in a footnotes part, excluding the two separators. */
export function userFootnoteIds(footnotesXml: string): string[] {
  return attrValues(footnotesXml, 'w:footnote', 'w:id').filter(id => Number(id) > 0);
}

export function parseAndPlan(markdown: string): { doc: MdDocument; plan: NumberingPlan; warnings: WarningLog } {
  const warnings = new WarningLog();
  const doc = parseMarkdown(markdown, warnings);
  const plan = allocateNumbering(doc, warnings);
  return { doc, plan, warnings };
}

export const FIXED_TIMESTAMP = new Date('2024-05-01T12:00:00Z');
