// src/docx-render.ts — block tree to word/document.xml and word/footnotes.xml

import type { Block, Inline, ListBlock, MdDocument, TableBlock, WarningLog } from './document-model';
import { transcodeMath, serializeMath } from './latex-to-omml';
import type { NumberingPlan, AllocatedFootnote } from './numbering';
import { RelationshipTable } from './relationships';
import { escapeXml } from './xml-text';

export interface RenderedParts {
  documentXml: string;
  footnotesXml: string;
  /** Hyperlink relationships of word/document.xml; the assembler appends the fixed ones. */
  documentRels: RelationshipTable;
  footnotesRels: RelationshipTable;
}

const PART_NAMESPACES =
  'xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"'
  + ' xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships"'
  + ' xmlns:m="http://schemas.openxmlformats.org/officeDocument/2006/math"';

const INDENT_STEP = 720;
const HANGING_INDENT = 360;

const TABLE_PROPERTIES = '<w:tblPr><w:tblW w:w="0" w:type="auto"/>%IND%'
  + '<w:tblBorders><w:top w:val="single" w:sz="4" w:space="0" w:color="auto"/><w:left w:val="single" w:sz="4" w:space="0" w:color="auto"/><w:bottom w:val="single" w:sz="4" w:space="0" w:color="auto"/><w:right w:val="single" w:sz="4" w:space="0" w:color="auto"/><w:insideH w:val="single" w:sz="4" w:space="0" w:color="auto"/><w:insideV w:val="single" w:sz="4" w:space="0" w:color="auto"/></w:tblBorders>'
  + '<w:tblCellMar><w:top w:w="0" w:type="dxa"/><w:left w:w="108" w:type="dxa"/><w:bottom w:w="0" w:type="dxa"/><w:right w:w="108" w:type="dxa"/></w:tblCellMar>'
  + '%LOOK%</w:tblPr>';

const FOOTNOTE_SEPARATORS =
  '<w:footnote w:type="separator" w:id="-1"><w:p><w:pPr><w:spacing w:after="0" w:line="240" w:lineRule="auto"/></w:pPr><w:r><w:separator/></w:r></w:p></w:footnote>\n'
  + '<w:footnote w:type="continuationSeparator" w:id="0"><w:p><w:pPr><w:spacing w:after="0" w:line="240" w:lineRule="auto"/></w:pPr><w:r><w:continuationSeparator/></w:r></w:p></w:footnote>\n';

interface RunMarks {
  bold: boolean;
  italic: boolean;
  strike: boolean;
  code: boolean;
  hyperlink: boolean;
}

const PLAIN: RunMarks = { bold: false, italic: false, strike: false, code: false, hyperlink: false };

interface BlockContext {
  quoteDepth: number;
  /** Left indent of the enclosing list item's text, in twips. */
  listIndent: number;
  inFootnote: boolean;
}

interface ParagraphProps {
  style?: string;
  numbering?: { numId: number; ilvl: number };
  bottomBorder?: boolean;
  indentLeft?: number;
  hanging?: number;
}

export function generateRPr(marks: RunMarks): string {
  const parts: string[] = [];
  if (marks.code) parts.push('<w:rStyle w:val="CodeChar"/>');
  else if (marks.hyperlink) parts.push('<w:rStyle w:val="Hyperlink"/>');
  if (marks.bold) parts.push('<w:b/>');
  if (marks.italic) parts.push('<w:i/>');
  if (marks.strike) parts.push('<w:strike/>');
  return parts.length > 0 ? '<w:rPr>' + parts.join('') + '</w:rPr>' : '';
}

export function generateRun(text: string, rPr: string): string {
  return '<w:r>' + rPr + '<w:t xml:space="preserve">' + escapeXml(text) + '</w:t></w:r>';
}

function paragraphProperties(props: ParagraphProps): string {
  let pPr = '';
  if (props.style) pPr += '<w:pStyle w:val="' + props.style + '"/>';
  if (props.numbering) {
    pPr += '<w:numPr><w:ilvl w:val="' + props.numbering.ilvl + '"/><w:numId w:val="' + props.numbering.numId + '"/></w:numPr>';
  }
  if (props.bottomBorder) pPr += '<w:pBdr><w:bottom w:val="single" w:sz="6" w:space="1" w:color="auto"/></w:pBdr>';
  if (props.indentLeft) {
    pPr += '<w:ind w:left="' + props.indentLeft + '"' + (props.hanging ? ' w:hanging="' + props.hanging + '"' : '') + '/>';
  }
  return pPr ? '<w:pPr>' + pPr + '</w:pPr>' : '';
}

/**
 * Renders one document. Hyperlinks go into the relationship table of the part
 * currently being written.
 */
class PartRenderer {
  private rels: RelationshipTable;
  private pendingFootnoteMark = false;
  private readonly documentRels = new RelationshipTable();
  private readonly footnotesRels = new RelationshipTable();

  constructor(
    private readonly doc: MdDocument,
    private readonly plan: NumberingPlan,
    private readonly warnings: WarningLog
  ) {
    this.rels = this.documentRels;
  }

  render(): RenderedParts {
    const body = this.renderBlocks(this.doc.blocks, { quoteDepth: 0, listIndent: 0, inFootnote: false });
    const documentXml = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n'
      + '<w:document ' + PART_NAMESPACES + '>\n'
      + '<w:body>\n' + body
      + '<w:sectPr><w:pgSz w:w="12240" w:h="15840"/><w:pgMar w:top="1440" w:right="1440" w:bottom="1440" w:left="1440" w:header="720" w:footer="720" w:gutter="0"/></w:sectPr>\n'
      + '</w:body>\n</w:document>';

    this.rels = this.footnotesRels;
    let footnotes = '';
    for (const footnote of this.plan.footnotes) footnotes += this.renderFootnote(footnote);
    const footnotesXml = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n'
      + '<w:footnotes ' + PART_NAMESPACES + '>\n'
      + FOOTNOTE_SEPARATORS + footnotes
      + '</w:footnotes>';

    return { documentXml, footnotesXml, documentRels: this.documentRels, footnotesRels: this.footnotesRels };
  }

  private renderFootnote(footnote: AllocatedFootnote): string {
    const ctx: BlockContext = { quoteDepth: 0, listIndent: 0, inFootnote: true };
    const blocks = footnote.definition.blocks;
    let xml = '<w:footnote w:id="' + footnote.id + '">';
    if (blocks[0]?.type === 'paragraph') {
      this.pendingFootnoteMark = true;
    } else {
      xml += '<w:p>' + paragraphProperties({ style: 'FootnoteText' }) + this.footnoteMark() + '</w:p>';
    }
    xml += this.renderBlocks(blocks, ctx);
    return xml + '</w:footnote>\n';
  }

  private footnoteMark(): string {
    return '<w:r><w:rPr><w:rStyle w:val="FootnoteReference"/></w:rPr><w:footnoteRef/></w:r>' + generateRun(' ', '');
  }

  private paragraph(props: ParagraphProps, content: string): string {
    let runs = content;
    if (this.pendingFootnoteMark) {
      this.pendingFootnoteMark = false;
      runs = this.footnoteMark() + runs;
    }
    return '<w:p>' + paragraphProperties(props) + runs + '</w:p>\n';
  }

  private bodyParagraphProps(ctx: BlockContext): ParagraphProps {
    const style = ctx.quoteDepth > 0 ? 'Quote' : ctx.inFootnote ? 'FootnoteText' : undefined;
    return { style, indentLeft: ctx.quoteDepth * INDENT_STEP + ctx.listIndent };
  }

  // -------------------------------------------------------------------------
  // Blocks
  // -------------------------------------------------------------------------

  private renderBlocks(blocks: Block[], ctx: BlockContext): string {
    let xml = '';
    for (const block of blocks) xml += this.renderBlock(block, ctx);
    return xml;
  }

  private renderBlock(block: Block, ctx: BlockContext): string {
    switch (block.type) {
      case 'heading':
        return this.paragraph({ style: 'Heading' + block.level }, this.renderInlines(block.content, PLAIN));
      case 'paragraph':
        return this.paragraph(this.bodyParagraphProps(ctx), this.renderInlines(block.content, PLAIN));
      case 'list':
        return this.renderList(block, ctx);
      case 'table':
        return this.renderTable(block, ctx);
      case 'code_block': {
        const runs = block.text.split('\n')
          .map(line => (line ? generateRun(line, '') : ''))
          .join('<w:r><w:br/></w:r>');
        return this.paragraph({ ...this.bodyParagraphProps(ctx), style: 'CodeBlock' }, runs);
      }
      case 'math_block': {
        const result = transcodeMath(block.source);
        if (result.ok) {
          return this.paragraph(this.bodyParagraphProps(ctx),
            '<m:oMathPara><m:oMath>' + serializeMath(result.nodes) + '</m:oMath></m:oMathPara>');
        }
        this.warnings.add('unsupported-math', `Unsupported math "${block.source}" (${result.reason}) rendered as literal text`);
        return this.paragraph({ ...this.bodyParagraphProps(ctx), style: 'CodeBlock' }, generateRun('$$' + block.source + '$$', ''));
      }
      case 'blockquote':
        return this.renderBlocks(block.blocks, { ...ctx, quoteDepth: ctx.quoteDepth + 1 });
      case 'hr':
        return this.paragraph({ bottomBorder: true }, '');
    }
  }

  private renderList(block: ListBlock, ctx: BlockContext): string {
    const numbering = this.plan.lists.get(block);
    if (!numbering) throw new Error('List block is missing from the numbering plan');

    const quoteIndent = ctx.quoteDepth * INDENT_STEP;
    const itemIndent = INDENT_STEP * (numbering.level + 1);
    const numbered: ParagraphProps = {
      style: ctx.quoteDepth > 0 ? 'Quote' : ctx.inFootnote ? 'FootnoteText' : undefined,
      numbering: { numId: numbering.numId, ilvl: numbering.level },
      indentLeft: quoteIndent > 0 ? quoteIndent + itemIndent : undefined,
      hanging: quoteIndent > 0 ? HANGING_INDENT : undefined,
    };
    const itemCtx: BlockContext = { ...ctx, listIndent: itemIndent };

    let xml = '';
    for (const item of block.items) {
      const [first, ...rest] = item.blocks;
      if (first?.type === 'paragraph') {
        xml += this.paragraph(numbered, this.renderInlines(first.content, PLAIN));
        xml += this.renderBlocks(rest, itemCtx);
      } else {
        xml += this.paragraph(numbered, '');
        xml += this.renderBlocks(item.blocks, itemCtx);
      }
    }
    return xml;
  }

  private renderTable(block: TableBlock, ctx: BlockContext): string {
    const indent = ctx.quoteDepth * INDENT_STEP + ctx.listIndent;
    let xml = '<w:tbl>' + TABLE_PROPERTIES
      .replace('%IND%', indent > 0 ? '<w:tblInd w:w="' + indent + '" w:type="dxa"/>' : '')
      .replace('%LOOK%', block.hasHeaderRow ? '<w:tblLook w:firstRow="1"/>' : '');

    xml += '<w:tblGrid>';
    for (let c = 0; c < block.columnCount; c++) xml += '<w:gridCol/>';
    xml += '</w:tblGrid>';

    block.rows.forEach((row, index) => {
      const header = block.hasHeaderRow && index === 0;
      xml += '<w:tr>';
      if (header) xml += '<w:trPr><w:tblHeader/></w:trPr>';
      for (let c = 0; c < block.columnCount; c++) {
        const cell = row[c] ?? [];
        xml += '<w:tc><w:tcPr><w:tcW w:w="0" w:type="auto"/></w:tcPr><w:p>'
          + this.renderInlines(cell, header ? { ...PLAIN, bold: true } : PLAIN)
          + '</w:p></w:tc>';
      }
      xml += '</w:tr>';
    });
    xml += '</w:tbl>\n';

    // Word merges adjacent tables without a paragraph between them.
    return xml + this.paragraph({}, '');
  }

  // -------------------------------------------------------------------------
  // Inlines
  // -------------------------------------------------------------------------

  private renderInlines(content: Inline[], outer: RunMarks): string {
    let xml = '';
    for (const inline of content) {
      switch (inline.type) {
        case 'text': {
          const marks: RunMarks = {
            bold: outer.bold || inline.bold,
            italic: outer.italic || inline.italic,
            strike: outer.strike || inline.strike,
            code: outer.code || inline.code,
            hyperlink: outer.hyperlink,
          };
          xml += generateRun(inline.value, generateRPr(marks));
          break;
        }
        case 'link': {
          const rId = this.rels.addHyperlink(inline.target);
          xml += '<w:hyperlink r:id="' + rId + '">' + this.renderInlines(inline.content, { ...outer, hyperlink: true }) + '</w:hyperlink>';
          break;
        }
        case 'footnote_ref': {
          const id = this.plan.footnoteIds.get(inline.label);
          xml += id === undefined
            ? generateRun('[^' + inline.label + ']', generateRPr(outer))
            : '<w:r><w:rPr><w:rStyle w:val="FootnoteReference"/></w:rPr><w:footnoteReference w:id="' + id + '"/></w:r>';
          break;
        }
        case 'math': {
          const result = transcodeMath(inline.source);
          if (result.ok) {
            xml += '<m:oMath>' + serializeMath(result.nodes) + '</m:oMath>';
          } else {
            this.warnings.add('unsupported-math', `Unsupported math "${inline.source}" (${result.reason}) rendered as literal text`);
            const delimiter = inline.display ? '$$' : '$';
            xml += generateRun(delimiter + inline.source + delimiter, generateRPr({ ...outer, code: true }));
          }
          break;
        }
        case 'line_break':
          xml += '<w:r><w:br/></w:r>';
          break;
      }
    }
    return xml;
  }
}

export function renderDocumentParts(doc: MdDocument, plan: NumberingPlan, warnings: WarningLog): RenderedParts {
  return new PartRenderer(doc, plan, warnings).render();
}
