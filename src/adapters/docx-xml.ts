/**
 * WordprocessingML helpers shared by the DOCX template adapter
 */

export const W_NS = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";
export const R_NS =
  "http://schemas.openxmlformats.org/officeDocument/2006/relationships";
export const PACKAGE_RELS_NS =
  "http://schemas.openxmlformats.org/package/2006/relationships";
const XML_NS = "http://www.w3.org/XML/1998/namespace";

const ELEMENT_NODE = 1;
const NON_BREAKING_HYPHEN = "\u2011";

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function childElements(parent: Node): Element[] {
  const elements: Element[] = [];
  const children = parent.childNodes;
  for (let i = 0; i < children.length; i++) {
    const child = children.item(i);
    if (child && isElement(child)) {
      elements.push(child);
    }
  }
  return elements;
}

export function isW(element: Element, localName: string): boolean {
  return element.namespaceURI === W_NS && element.localName === localName;
}

export function firstChildW(parent: Element, localName: string): Element | null {
  return childElements(parent).find((child) => isW(child, localName)) ?? null;
}

function isLineBreak(element: Element): boolean {
  if (isW(element, "cr")) return true;
  if (!isW(element, "br")) return false;
  const type = element.getAttributeNS(W_NS, "type");
  return !type || type === "textWrapping";
}

function isTextContent(element: Element): boolean {
  return (
    isW(element, "t") ||
    isW(element, "tab") ||
    isW(element, "noBreakHyphen") ||
    isLineBreak(element)
  );
}

/**
 * Visible text of a w:r run; tabs and line breaks become "\t" and "\n", a
 * w:noBreakHyphen becomes U+2011
 */
export function readRunText(run: Element): string {
  let text = "";
  for (const child of childElements(run)) {
    if (isW(child, "t")) {
      text += child.textContent ?? "";
    } else if (isW(child, "tab")) {
      text += "\t";
    } else if (isW(child, "noBreakHyphen")) {
      text += NON_BREAKING_HYPHEN;
    } else if (isLineBreak(child)) {
      text += "\n";
    }
  }
  return text;
}

function createTextNodes(document: Document, text: string): Element[] {
  const nodes: Element[] = [];
  for (const piece of text.split(/(\t|\n|\u2011)/)) {
    if (piece === "\t") {
      nodes.push(document.createElementNS(W_NS, "w:tab"));
    } else if (piece === NON_BREAKING_HYPHEN) {
      nodes.push(document.createElementNS(W_NS, "w:noBreakHyphen"));
    } else if (piece === "\n") {
      nodes.push(document.createElementNS(W_NS, "w:br"));
    } else if (piece.length > 0) {
      const t = document.createElementNS(W_NS, "w:t");
      t.setAttributeNS(XML_NS, "xml:space", "preserve");
      t.appendChild(document.createTextNode(piece));
      nodes.push(t);
    }
  }
  return nodes;
}

/**
 * Replaces the text-bearing children of a run. Run properties and any other
 * children (drawings, page breaks, field characters) stay where they are; the
 * new text takes the place of the first old text node.
 */
export function writeRunText(run: Element, text: string): void {
  const document = run.ownerDocument;
  const oldNodes = childElements(run).filter(isTextContent);
  const anchor = oldNodes[0] ?? null;

  for (const node of createTextNodes(document, text)) {
    if (anchor) {
      run.insertBefore(node, anchor);
    } else {
      run.appendChild(node);
    }
  }

  for (const node of oldNodes) {
    run.removeChild(node);
  }
}
