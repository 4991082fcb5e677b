// src/docx-package.ts — static parts, metadata, verification and zip output

import JSZip from 'jszip';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ConversionError } from './errors';
import type { RenderedParts } from './docx-render';
import { REL_TYPES, RelationshipTable, relationshipsXml } from './relationships';
import { INVALID_XML_CHARS, escapeXml } from './xml-text';

export interface PackageInput {
  parts: RenderedParts;
  numberingXml: string;
  metadata: Record<string, string>;
  timestamp: Date;
}

/** Part path to XML, in archive order. */
export type PackageParts = Map<string, string>;

// Zip entry dates are constant so identical input yields identical bytes.
const ZIP_ENTRY_DATE = new Date(Date.UTC(1980, 0, 1, 0, 0, 0));

const CONTENT_TYPES: Record<string, string> = {
  '/docProps/core.xml': 'application/vnd.openxmlformats-package.core-properties+xml',
  '/docProps/app.xml': 'application/vnd.openxmlformats-officedocument.extended-properties+xml',
  '/docProps/custom.xml': 'application/vnd.openxmlformats-officedocument.custom-properties+xml',
  '/word/document.xml': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml',
  '/word/styles.xml': 'application/vnd.openxmlformats-officedocument.wordprocessingml.styles+xml',
  '/word/numbering.xml': 'application/vnd.openxmlformats-officedocument.wordprocessingml.numbering+xml',
  '/word/footnotes.xml': 'application/vnd.openxmlformats-officedocument.wordprocessingml.footnotes+xml',
  '/word/settings.xml': 'application/vnd.openxmlformats-officedocument.wordprocessingml.settings+xml',
  '/word/fontTable.xml': 'application/vnd.openxmlformats-officedocument.wordprocessingml.fontTable+xml',
};

/** Metadata keys with a core-properties element; everything else is a custom property. */
const CORE_PROPERTIES: Array<{ element: string; keys: string[] }> = [
  { element: 'dc:title', keys: ['title'] },
  { element: 'dc:subject', keys: ['subject'] },
  { element: 'dc:creator', keys: ['author', 'creator'] },
  { element: 'cp:keywords', keys: ['keywords'] },
  { element: 'dc:description', keys: ['description'] },
  { element: 'cp:category', keys: ['category'] },
  { element: 'cp:lastModifiedBy', keys: ['lastModifiedBy'] },
];

const CORE_KEYS = new Set(CORE_PROPERTIES.flatMap(p => p.keys));

// ---------------------------------------------------------------------------
// Static parts
// ---------------------------------------------------------------------------

function headingStyle(level: number, size: number, before?: number): string {
  return '<w:style w:type="paragraph" w:styleId="Heading' + level + '">\n'
    + '<w:name w:val="heading ' + level + '"/>\n'
    + '<w:basedOn w:val="Normal"/>\n'
    + '<w:next w:val="Normal"/>\n'
    + '<w:pPr><w:keepNext/>' + (before === undefined ? '' : '<w:spacing w:before="' + before + '" w:after="0"/>') + '<w:outlineLvl w:val="' + (level - 1) + '"/></w:pPr>\n'
    + '<w:rPr><w:b/><w:sz w:val="' + size + '"/><w:szCs w:val="' + size + '"/></w:rPr>\n'
    + '</w:style>\n';
}

export function stylesXml(): string {
  return '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n'
    + '<w:styles xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">\n'
    + '<w:style w:type="paragraph" w:default="1" w:styleId="Normal">\n'
    + '<w:name w:val="Normal"/>\n'
    + '<w:pPr><w:spacing w:after="200" w:line="276" w:lineRule="auto"/></w:pPr>\n'
    + '<w:rPr><w:sz w:val="22"/><w:szCs w:val="22"/></w:rPr>\n'
    + '</w:style>\n'
    + headingStyle(1, 32, 240)
    + headingStyle(2, 26, 200)
    + headingStyle(3, 24, 200)
    + headingStyle(4, 22)
    + headingStyle(5, 20)
    + headingStyle(6, 18)
    + '<w:style w:type="character" w:styleId="Hyperlink">\n'
    + '<w:name w:val="Hyperlink"/>\n'
    + '<w:rPr><w:color w:val="0563C1"/><w:u w:val="single"/></w:rPr>\n'
    + '</w:style>\n'
    + '<w:style w:type="paragraph" w:styleId="Quote">\n'
    + '<w:name w:val="Quote"/>\n'
    + '<w:basedOn w:val="Normal"/>\n'
    + '<w:pPr><w:ind w:left="720"/></w:pPr>\n'
    + '<w:rPr><w:i/></w:rPr>\n'
    + '</w:style>\n'
    + '<w:style w:type="character" w:styleId="CodeChar">\n'
    + '<w:name w:val="Code Char"/>\n'
    + '<w:rPr><w:rFonts w:ascii="Courier New" w:hAnsi="Courier New"/></w:rPr>\n'
    + '</w:style>\n'
    + '<w:style w:type="paragraph" w:styleId="CodeBlock">\n'
    + '<w:name w:val="Code Block"/>\n'
    + '<w:basedOn w:val="Normal"/>\n'
    + '<w:pPr><w:shd w:val="clear" w:color="auto" w:fill="E8E8E8"/><w:spacing w:after="0" w:line="240" w:lineRule="auto"/></w:pPr>\n'
    + '<w:rPr><w:rFonts w:ascii="Courier New" w:hAnsi="Courier New"/><w:sz w:val="20"/><w:szCs w:val="20"/></w:rPr>\n'
    + '</w:style>\n'
    + '<w:style w:type="paragraph" w:styleId="FootnoteText">\n'
    + '<w:name w:val="footnote text"/>\n'
    + '<w:basedOn w:val="Normal"/>\n'
    + '<w:pPr><w:spacing w:after="0" w:line="240" w:lineRule="auto"/></w:pPr>\n'
    + '<w:rPr><w:sz w:val="20"/><w:szCs w:val="20"/></w:rPr>\n'
    + '</w:style>\n'
    + '<w:style w:type="character" w:styleId="FootnoteReference">\n'
    + '<w:name w:val="footnote reference"/>\n'
    + '<w:rPr><w:vertAlign w:val="superscript"/></w:rPr>\n'
    + '</w:style>\n'
    + '</w:styles>';
}

export function settingsXml(): string {
  return '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n'
    + '<w:settings xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main" xmlns:m="http://schemas.openxmlformats.org/officeDocument/2006/math">\n'
    + '<w:defaultTabStop w:val="720"/>\n'
    + '<w:characterSpacingControl w:val="doNotCompress"/>\n'
    + '<w:footnotePr><w:footnote w:id="-1"/><w:footnote w:id="0"/></w:footnotePr>\n'
    + '<w:compat>\n'
    + '<w:compatSetting w:name="compatibilityMode" w:uri="http://schemas.microsoft.com/office/word" w:val="15"/>\n'
    + '</w:compat>\n'
    + '<m:mathPr><m:mathFont m:val="Cambria Math"/></m:mathPr>\n'
    + '</w:settings>';
}

export function fontTableXml(): string {
  return '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n'
    + '<w:fonts xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">\n'
    + '<w:font w:name="Calibri"><w:panose1 w:val="020F0502020204030204"/><w:charset w:val="00"/><w:family w:val="swiss"/><w:pitch w:val="variable"/></w:font>\n'
    + '<w:font w:name="Cambria Math"><w:panose1 w:val="02040503050406030204"/><w:charset w:val="00"/><w:family w:val="roman"/><w:pitch w:val="variable"/></w:font>\n'
    + '<w:font w:name="Courier New"><w:panose1 w:val="02070309020205020404"/><w:charset w:val="00"/><w:family w:val="modern"/><w:pitch w:val="fixed"/></w:font>\n'
    + '</w:fonts>';
}

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

function w3cdtf(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function corePropsXml(metadata: Record<string, string>, timestamp: Date): string {
  let xml = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n'
    + '<cp:coreProperties xmlns:cp="http://schemas.openxmlformats.org/package/2006/metadata/core-properties" xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:dcterms="http://purl.org/dc/terms/" xmlns:dcmitype="http://purl.org/dc/dcmitype/" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">\n';
  for (const { element, keys } of CORE_PROPERTIES) {
    const value = keys.map(key => metadata[key]).find(v => v !== undefined && v.trim() !== '');
    if (value !== undefined) xml += '<' + element + '>' + escapeXml(value) + '</' + element + '>\n';
  }
  const stamp = w3cdtf(timestamp);
  xml += '<dcterms:created xsi:type="dcterms:W3CDTF">' + stamp + '</dcterms:created>\n'
    + '<dcterms:modified xsi:type="dcterms:W3CDTF">' + stamp + '</dcterms:modified>\n'
    + '</cp:coreProperties>';
  return xml;
}

export function appPropsXml(): string {
  return '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n'
    + '<Properties xmlns="http://schemas.openxmlformats.org/officeDocument/2006/extended-properties">\n'
    + '<Application>md2docx</Application>\n'
    + '</Properties>';
}

/** Metadata entries without a core-properties element, sorted by name. */
export function customProperties(metadata: Record<string, string>): Array<{ name: string; value: string }> {
  return Object.keys(metadata)
    .filter(key => !CORE_KEYS.has(key))
    .sort()
    .map(name => ({ name, value: metadata[name] }));
}

export function customPropsXml(properties: Array<{ name: string; value: string }>): string {
  let xml = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';
  xml += '<Properties xmlns="http://schemas.openxmlformats.org/officeDocument/2006/custom-properties" xmlns:vt="http://schemas.openxmlformats.org/officeDocument/2006/docPropsVTypes">\n';
  properties.forEach((property, i) => {
    // pids below 2 are reserved
    xml += '<property fmtid="{D5CDD505-2E9C-101B-9397-08002B2CF9AE}" pid="' + (i + 2) + '" name="' + escapeXml(property.name) + '">';
    xml += '<vt:lpwstr>' + escapeXml(property.value) + '</vt:lpwstr>';
    xml += '</property>\n';
  });
  xml += '</Properties>';
  return xml;
}

// ---------------------------------------------------------------------------
// Manifest and relationships
// ---------------------------------------------------------------------------

export function contentTypesXml(partPaths: string[]): string {
  let xml = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';
  xml += '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">\n';
  xml += '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>\n';
  xml += '<Default Extension="xml" ContentType="application/xml"/>\n';
  for (const path of partPaths) {
    const contentType = CONTENT_TYPES['/' + path];
    if (contentType) xml += '<Override PartName="/' + path + '" ContentType="' + contentType + '"/>\n';
  }
  xml += '</Types>';
  return xml;
}

function packageRels(hasCustomProps: boolean): RelationshipTable {
  const rels = new RelationshipTable();
  rels.add(REL_TYPES.officeDocument, 'word/document.xml');
  rels.add(REL_TYPES.coreProperties, 'docProps/core.xml');
  rels.add(REL_TYPES.extendedProperties, 'docProps/app.xml');
  if (hasCustomProps) rels.add(REL_TYPES.customProperties, 'docProps/custom.xml');
  return rels;
}

/** Hyperlinks keep the ids the renderer gave them; internal parts follow. */
function documentRels(hyperlinks: RelationshipTable): RelationshipTable {
  const rels = new RelationshipTable();
  for (const rel of hyperlinks.relationships) rels.add(rel.type, rel.target, rel.external);
  rels.add(REL_TYPES.styles, 'styles.xml');
  rels.add(REL_TYPES.numbering, 'numbering.xml');
  rels.add(REL_TYPES.footnotes, 'footnotes.xml');
  rels.add(REL_TYPES.settings, 'settings.xml');
  rels.add(REL_TYPES.fontTable, 'fontTable.xml');
  return rels;
}

/** Every part of the package, in archive order. */
export function buildPackageParts(input: PackageInput): PackageParts {
  const custom = customProperties(input.metadata);
  const hasCustomProps = custom.length > 0;
  const hasFootnoteRels = input.parts.footnotesRels.size > 0;

  const partPaths = [
    'docProps/core.xml',
    'docProps/app.xml',
    ...(hasCustomProps ? ['docProps/custom.xml'] : []),
    'word/document.xml',
    'word/styles.xml',
    'word/numbering.xml',
    'word/footnotes.xml',
    'word/settings.xml',
    'word/fontTable.xml',
  ];

  const parts: PackageParts = new Map();
  parts.set('[Content_Types].xml', contentTypesXml(partPaths));
  parts.set('_rels/.rels', relationshipsXml(packageRels(hasCustomProps)));
  parts.set('docProps/core.xml', corePropsXml(input.metadata, input.timestamp));
  parts.set('docProps/app.xml', appPropsXml());
  if (hasCustomProps) parts.set('docProps/custom.xml', customPropsXml(custom));
  parts.set('word/document.xml', input.parts.documentXml);
  parts.set('word/_rels/document.xml.rels', relationshipsXml(documentRels(input.parts.documentRels)));
  parts.set('word/styles.xml', stylesXml());
  parts.set('word/numbering.xml', input.numberingXml);
  parts.set('word/footnotes.xml', input.parts.footnotesXml);
  if (hasFootnoteRels) parts.set('word/_rels/footnotes.xml.rels', relationshipsXml(input.parts.footnotesRels));
  parts.set('word/settings.xml', settingsXml());
  parts.set('word/fontTable.xml', fontTableXml());
  return parts;
}

// ---------------------------------------------------------------------------
// Verification
// ---------------------------------------------------------------------------

export type XmlNode = Record<string, unknown>;

const parserOptions = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  preserveOrder: true,
  trimValues: false,
};

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseXml(xml: string): XmlNode[] {
  const parsed: unknown = new XMLParser(parserOptions).parse(xml);
  return Array.isArray(parsed) ? parsed.filter(isXmlNode) : [];
}

/** Elements named `tagName` anywhere below `nodes`, in document order. */
export function findAllDeep(nodes: XmlNode[], tagName: string): XmlNode[] {
  const results: XmlNode[] = [];
  for (const node of nodes) {
    if (node[tagName] !== undefined) results.push(node);
    for (const [key, value] of Object.entries(node)) {
      if (key !== ':@' && Array.isArray(value)) {
        results.push(...findAllDeep(value.filter(isXmlNode), tagName));
      }
    }
  }
  return results;
}

export function getAttr(node: XmlNode, name: string): string | undefined {
  const attrs = node[':@'];
  if (!isXmlNode(attrs)) return undefined;
  const value = attrs['@_' + name];
  return typeof value === 'string' ? value : undefined;
}

/** Values of `attrName` on any element below `nodes`. */
function collectAttribute(nodes: XmlNode[], attrName: string): string[] {
  const values: string[] = [];
  for (const node of nodes) {
    const value = getAttr(node, attrName);
    if (value !== undefined) values.push(value);
    for (const [key, child] of Object.entries(node)) {
      if (key !== ':@' && Array.isArray(child)) values.push(...collectAttribute(child.filter(isXmlNode), attrName));
    }
  }
  return values;
}

function relsPathFor(partPath: string): string {
  const slash = partPath.lastIndexOf('/');
  return partPath.slice(0, slash + 1) + '_rels/' + partPath.slice(slash + 1) + '.rels';
}

/** Resolve a relationship target against the directory of its source part. */
function resolveTarget(sourceDir: string, target: string): string {
  const segments = target.startsWith('/') ? [] : sourceDir.split('/').filter(Boolean);
  for (const segment of target.split('/')) {
    if (segment === '..') segments.pop();
    else if (segment && segment !== '.') segments.push(segment);
  }
  return segments.join('/');
}

function violation(message: string, context: Record<string, unknown>): ConversionError {
  return new ConversionError('PackageInvariantViolation', message, context);
}

/** Check the cross-part invariants of an assembled package; throws on the first violation. */
export function verifyPackage(parts: PackageParts): void {
  for (const [path, xml] of parts) {
    const invalid = INVALID_XML_CHARS.exec(xml);
    if (invalid) {
      const codePoint = 'U+' + invalid[0].charCodeAt(0).toString(16).toUpperCase().padStart(4, '0');
      throw violation(`Part ${path} contains ${codePoint}, which XML 1.0 does not allow`, { part: path, offset: invalid.index });
    }
    const result = XMLValidator.validate(xml);
    if (result !== true) {
      throw violation(`Part ${path} is not well-formed XML: ${result.err.msg}`, { part: path, line: result.err.line });
    }
  }

  // Manifest
  const manifestXml = parts.get('[Content_Types].xml');
  if (manifestXml === undefined) throw violation('Package has no [Content_Types].xml', {});
  const manifest = parseXml(manifestXml);
  const defaults = new Set(findAllDeep(manifest, 'Default').map(node => getAttr(node, 'Extension')?.toLowerCase()));
  const overrides = new Set<string>();
  for (const node of findAllDeep(manifest, 'Override')) {
    const partName = getAttr(node, 'PartName') ?? '';
    if (overrides.has(partName)) throw violation(`Content type for ${partName} is listed twice`, { part: partName });
    overrides.add(partName);
    if (!parts.has(partName.replace(/^\//, ''))) {
      throw violation(`Content type listed for missing part ${partName}`, { part: partName });
    }
  }
  for (const path of parts.keys()) {
    if (path === '[Content_Types].xml') continue;
    const extension = path.slice(path.lastIndexOf('.') + 1).toLowerCase();
    if (!overrides.has('/' + path) && !defaults.has(extension)) {
      throw violation(`Part ${path} has no content type`, { part: path });
    }
  }

  // Relationships
  const sources = ['', ...parts.keys()].filter(path => !path.endsWith('.rels') && path !== '[Content_Types].xml');
  for (const source of sources) {
    const relsPath = source === '' ? '_rels/.rels' : relsPathFor(source);
    const relsXml = parts.get(relsPath);
    const ids = new Set<string>();
    if (relsXml !== undefined) {
      const sourceDir = source.slice(0, source.lastIndexOf('/') + 1);
      for (const rel of findAllDeep(parseXml(relsXml), 'Relationship')) {
        const id = getAttr(rel, 'Id') ?? '';
        if (ids.has(id)) throw violation(`Relationship id ${id} is duplicated in ${relsPath}`, { part: relsPath, id });
        ids.add(id);
        if (getAttr(rel, 'TargetMode') === 'External') continue;
        const target = resolveTarget(sourceDir, getAttr(rel, 'Target') ?? '');
        if (!parts.has(target)) {
          throw violation(`Relationship ${id} in ${relsPath} targets missing part ${target}`, { part: relsPath, id, target });
        }
      }
    }
    if (source === '') continue;
    const sourceXml = parts.get(source);
    if (sourceXml === undefined) continue;
    for (const id of collectAttribute(parseXml(sourceXml), 'r:id')) {
      if (!ids.has(id)) {
        throw violation(`Part ${source} references relationship ${id}, which ${relsPath} does not define`, { part: source, id });
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Archive
// ---------------------------------------------------------------------------

export async function zipParts(parts: PackageParts): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const [path, xml] of parts) {
    zip.file(path, xml, { date: ZIP_ENTRY_DATE, createFolders: false });
  }
  return zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
}

/** Build, verify and zip the package. Nothing is returned for a package that fails verification. */
export async function assemblePackage(input: PackageInput): Promise<Uint8Array> {
  const parts = buildPackageParts(input);
  verifyPackage(parts);
  return zipParts(parts);
}
