// src/numbering.ts — numbering and footnote id allocation
//
// One pass over the block tree, body first and then referenced footnote
// bodies, so ids depend only on reference order and never on unrelated blocks.

import type { Block, FootnoteDefinition, Inline, ListBlock, MdDocument, WarningLog } from './document-model';

/** Word supports list levels 0-8. */
export const MAX_LIST_DEPTH = 9;

export interface ListNumbering {
  numId: number;
  abstractNumId: number;
  ordered: boolean;
  /** Rendered level, `min(nestingLevel, MAX_LIST_DEPTH - 1)`. */
  level: number;
}

export interface AllocatedFootnote {
  id: number;
  definition: FootnoteDefinition;
}

export interface NumberingPlan {
  /** Keyed by list block identity; every list run in the document has an entry. */
  lists: Map<ListBlock, ListNumbering>;
  /** All list runs in numId order. */
  listRuns: ListNumbering[];
  /** Footnote id by label, for labels that resolved to a definition. */
  footnoteIds: Map<string, number>;
  /** Footnotes to emit, in id order. Unreferenced definitions are absent. */
  footnotes: AllocatedFootnote[];
}

class NumberingAllocator {
  private readonly plan: NumberingPlan = {
    lists: new Map(),
    listRuns: [],
    footnoteIds: new Map(),
    footnotes: [],
  };
  private readonly unresolved = new Set<string>();

  constructor(private readonly doc: MdDocument, private readonly warnings: WarningLog) {}

  allocate(): NumberingPlan {
    this.visitBlocks(this.doc.blocks);
    // Footnote bodies may reference further footnotes, which join the queue.
    for (let i = 0; i < this.plan.footnotes.length; i++) {
      this.visitBlocks(this.plan.footnotes[i].definition.blocks);
    }
    for (const label of this.doc.footnotes.keys()) {
      if (!this.plan.footnoteIds.has(label)) {
        this.warnings.add('unreferenced-footnote', `Footnote [^${label}] is never referenced; dropped`);
      }
    }
    return this.plan;
  }

  private visitBlocks(blocks: Block[]): void {
    for (const block of blocks) {
      switch (block.type) {
        case 'heading':
        case 'paragraph':
          this.visitInlines(block.content);
          break;
        case 'list':
          this.allocateList(block);
          for (const item of block.items) this.visitBlocks(item.blocks);
          break;
        case 'table':
          for (const row of block.rows) {
            for (const cell of row) this.visitInlines(cell);
          }
          break;
        case 'blockquote':
          this.visitBlocks(block.blocks);
          break;
        case 'code_block':
        case 'math_block':
        case 'hr':
          break;
      }
    }
  }

  private visitInlines(content: Inline[]): void {
    for (const inline of content) {
      if (inline.type === 'footnote_ref') this.allocateFootnote(inline.label);
      else if (inline.type === 'link') this.visitInlines(inline.content);
    }
  }

  private allocateList(block: ListBlock): void {
    if (block.nestingLevel >= MAX_LIST_DEPTH) {
      this.warnings.add(
        'list-depth-clamped',
        `List nested ${block.nestingLevel + 1} levels deep rendered at level ${MAX_LIST_DEPTH}`
      );
    }
    const numId = this.plan.listRuns.length + 1;
    const numbering: ListNumbering = {
      numId,
      abstractNumId: numId - 1,
      ordered: block.ordered,
      level: Math.min(block.nestingLevel, MAX_LIST_DEPTH - 1),
    };
    this.plan.lists.set(block, numbering);
    this.plan.listRuns.push(numbering);
  }

  private allocateFootnote(label: string): void {
    if (this.plan.footnoteIds.has(label)) return;
    const definition = this.doc.footnotes.get(label);
    if (!definition) {
      if (!this.unresolved.has(label)) {
        this.unresolved.add(label);
        this.warnings.add('unresolved-footnote', `Footnote [^${label}] has no definition; kept as literal text`);
      }
      return;
    }
    const id = this.plan.footnotes.length + 1;
    this.plan.footnoteIds.set(label, id);
    this.plan.footnotes.push({ id, definition });
  }
}

export function allocateNumbering(doc: MdDocument, warnings: WarningLog): NumberingPlan {
  return new NumberingAllocator(doc, warnings).allocate();
}

// ---------------------------------------------------------------------------
// word/numbering.xml
// ---------------------------------------------------------------------------

function levelXml(ilvl: number, ordered: boolean): string {
  const format = ordered
    ? '<w:numFmt w:val="decimal"/><w:lvlText w:val="%' + (ilvl + 1) + '."/>'
    : '<w:numFmt w:val="bullet"/><w:lvlText w:val="•"/>';
  return '<w:lvl w:ilvl="' + ilvl + '"><w:start w:val="1"/>' + format
    + '<w:lvlJc w:val="left"/><w:pPr><w:ind w:left="' + (720 * (ilvl + 1)) + '" w:hanging="360"/></w:pPr></w:lvl>\n';
}

export function numberingXml(plan: NumberingPlan): string {
  let xml = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';
  const open = '<w:numbering xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"';
  if (plan.listRuns.length === 0) return xml + open + '/>';

  xml += open + '>\n';
  for (const run of plan.listRuns) {
    xml += '<w:abstractNum w:abstractNumId="' + run.abstractNumId + '">\n';
    xml += '<w:multiLevelType w:val="hybridMultilevel"/>\n';
    for (let ilvl = 0; ilvl < MAX_LIST_DEPTH; ilvl++) xml += levelXml(ilvl, run.ordered);
    xml += '</w:abstractNum>\n';
  }
  for (const run of plan.listRuns) {
    xml += '<w:num w:numId="' + run.numId + '"><w:abstractNumId w:val="' + run.abstractNumId + '"/></w:num>\n';
  }
  xml += '</w:numbering>';
  return xml;
}
