// core/html-engine.ts
// XHTML template manipulation using @xmldom/xmldom + xpath
// IMPORTANT: templates are parsed as XML, so they must be well-formed XHTML

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import xpath from 'xpath';
import type { GridCell, GridRow } from '../types/index.js';
import { PaperGridError } from '../types/index.js';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

export function parseDocument(content: string | Buffer, context = 'template'): Document {
  const parser = new DOMParser({
    errorHandler: {
      warning: () => {},
      error: (msg: string) => {
        throw new PaperGridError('Document parse error', context, msg);
      },
      fatalError: (msg: string) => {
        throw new PaperGridError('Document fatal parse error', context, msg);
      },
    },
  });

  const doc = parser.parseFromString(content.toString(), 'application/xhtml+xml');

  if (!doc || !doc.documentElement) {
    throw new PaperGridError('Failed to parse document', context, 'Document is empty or invalid');
  }

  return doc;
}

export function serializeDocument(doc: Document): string {
  const serializer = new XMLSerializer();
  return serializer.serializeToString(doc);
}

export function isElement(node: unknown): node is Element {
  return typeof node === 'object' && node !== null && 'nodeType' in node && node.nodeType === ELEMENT_NODE;
}

export function isText(node: Node): node is Text {
  return node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE;
}

export function findById(doc: Document, id: string): Element | null {
  const result = xpath.select1(`//*[@id="${id}"]`, doc);
  return isElement(result) ? result : null;
}

export function requireElementById(doc: Document, id: string, context: string): Element {
  const element = findById(doc, id);
  if (!element) {
    throw new PaperGridError(
      `Required element not found: #${id}`,
      context,
      `Element with id="${id}" does not exist in the template document`
    );
  }
  return element;
}

/**
 * Direct children of `parent` carrying the given class
 */
export function findChildrenByClass(parent: Element, className: string): Element[] {
  const matches = xpath.select(
    `./*[contains(concat(' ', normalize-space(@class), ' '), ' ${className} ')]`,
    parent
  );
  return Array.isArray(matches) ? matches.filter(isElement) : [];
}

export function childElements(parent: Element): Element[] {
  const result: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i++) {
    const child = parent.childNodes[i];
    if (isElement(child)) {
      result.push(child);
    }
  }
  return result;
}

/**
 * All text nodes below `root`, in document order
 */
export function collectTextNodes(root: Node): Text[] {
  const result: Text[] = [];
  const visit = (node: Node) => {
    if (isText(node)) {
      result.push(node);
      return;
    }
    for (let i = 0; i < node.childNodes.length; i++) {
      visit(node.childNodes[i]);
    }
  };
  visit(root);
  return result;
}

export function setTextData(node: Text, text: string): void {
  node.replaceData(0, node.data.length, text);
}

export function setTextContent(element: Element, text: string): void {
  while (element.firstChild) {
    element.removeChild(element.firstChild);
  }
  const textNode = element.ownerDocument?.createTextNode(text);
  if (textNode) {
    element.appendChild(textNode);
  }
}

export function createCell(doc: Document, parent: Element, cell: GridCell, tagName: 'td' | 'th'): Element {
  const element = doc.createElementNS(parent.namespaceURI, tagName);
  if (cell.rowSpan !== undefined) {
    element.setAttribute('rowspan', String(cell.rowSpan));
  }
  if (cell.text) {
    element.appendChild(doc.createTextNode(cell.text));
  }
  return element;
}

export function createRow(doc: Document, region: Element, row: GridRow): Element {
  const tr = doc.createElementNS(region.namespaceURI, 'tr');
  tr.setAttribute('data-row-index', String(row.index));
  for (const cell of row.cells) {
    tr.appendChild(createCell(doc, tr, cell, 'td'));
  }
  return tr;
}

/**
 * Insert generated rows into `region` before `anchor` (or at the end when null)
 */
export function insertRows(doc: Document, region: Element, rows: GridRow[], anchor: Element | null): void {
  for (const row of rows) {
    const tr = createRow(doc, region, row);
    if (anchor) {
      region.insertBefore(tr, anchor);
    } else {
      region.appendChild(tr);
    }
  }
}

export function appendHeaderCells(doc: Document, headerRow: Element, cells: GridCell[]): void {
  for (const cell of cells) {
    headerRow.appendChild(createCell(doc, headerRow, cell, 'th'));
  }
}
