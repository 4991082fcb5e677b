import { readFile, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { parseMarkdown } from './block-parser';
import { inlineText, WarningLog } from './document-model';
import type { ConversionWarning, MdDocument } from './document-model';
import { assemblePackage } from './docx-package';
import { renderDocumentParts } from './docx-render';
import { ConversionError, withConversionReason } from './errors';
import { parseFrontmatter } from './frontmatter';
import type { Metadata } from './frontmatter';
import { allocateNumbering, numberingXml } from './numbering';
import { INVALID_XML_CHARS, stripInvalidXmlChars } from './xml-text';

export { ConversionError } from './errors';
export type { ConversionFailureReason } from './errors';
export type { ConversionWarning, WarningCode } from './document-model';
export { formatWarning } from './document-model';

export interface MdToDocxOptions {
  /** Document properties; entries override the document's front matter. */
  metadata?: Metadata;
  /** Creation and modification time recorded in the package. Defaults to now. */
  timestamp?: Date;
}

export interface MdToDocxResult {
  docx: Uint8Array;
  warnings: ConversionWarning[];
}

/** Text of the first top-level H1, if any. */
export function extractTitle(doc: MdDocument): string | undefined {
  for (const block of doc.blocks) {
    if (block.type === 'heading' && block.level === 1) {
      const title = inlineText(block.content).trim();
      if (title) return title;
    }
  }
  return undefined;
}

function removedMessage(count: number): string {
  return `Removed ${count} ${count === 1 ? 'character' : 'characters'} that XML cannot carry`;
}

/** Drop characters no package part can hold, warning once per affected line. */
function removeInvalidXmlChars(markdown: string, warnings: WarningLog): string {
  if (!INVALID_XML_CHARS.test(markdown)) return markdown;
  return markdown
    .split(/\r\n?|\n/)
    .map((text, idx) => {
      const cleaned = stripInvalidXmlChars(text);
      if (cleaned.length < text.length) warnings.add('invalid-character', removedMessage(text.length - cleaned.length), idx + 1);
      return cleaned;
    })
    .join('\n');
}

function removeInvalidMetadataChars(metadata: Metadata, warnings: WarningLog): Metadata {
  const cleaned: Metadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    cleaned[key] = stripInvalidXmlChars(value);
    if (cleaned[key].length < value.length) {
      warnings.add('invalid-character', `${removedMessage(value.length - cleaned[key].length)} from metadata "${key}"`);
    }
  }
  return cleaned;
}

export async function convertMdToDocx(markdown: string, options: MdToDocxOptions = {}): Promise<MdToDocxResult> {
  const warnings = new WarningLog();
  const frontmatter = parseFrontmatter(removeInvalidXmlChars(markdown, warnings));
  const doc = parseMarkdown(frontmatter.body, warnings, frontmatter.bodyLine);

  const metadata = removeInvalidMetadataChars({ ...frontmatter.metadata, ...options.metadata }, warnings);
  if (!metadata.title) {
    const title = extractTitle(doc);
    if (title) metadata.title = title;
  }

  const plan = allocateNumbering(doc, warnings);
  const parts = renderDocumentParts(doc, plan, warnings);
  const docx = await assemblePackage({
    parts,
    numberingXml: numberingXml(plan),
    metadata,
    timestamp: options.timestamp ?? new Date(),
  });

  return { docx, warnings: [...warnings.warnings] };
}

/** Read a markdown file as strict UTF-8; a leading byte order mark is dropped. */
export async function readMarkdownFile(path: string): Promise<string> {
  return withConversionReason(async () => {
    const bytes = await readFile(path);
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  }, 'InputUnreadable', { path });
}

/**
 * Write the archive through a temporary sibling and rename it into place, so
 * the destination holds either the previous file or the complete archive.
 */
export async function writeDocxFile(path: string, docx: Uint8Array): Promise<void> {
  const tempPath = join(dirname(path), '.' + basename(path) + '.' + process.pid + '.tmp');
  try {
    await writeFile(tempPath, docx);
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    const message = error instanceof Error ? error.message : String(error);
    throw new ConversionError('DestinationWriteFailed', `Cannot write ${path}: ${message}`, { path });
  }
}
