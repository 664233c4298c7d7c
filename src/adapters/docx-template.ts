/**
 * DOCX template adapter
 * Loads the body, table cells and section headers/footers of a .docx file into
 * the document model (one fragment per w:r run) and writes changed run text
 * back into the package.
 */

import fs from "fs";
import path from "path";
import JSZip from "jszip";
import { DOMParser, XMLSerializer } from "@xmldom/xmldom";
import type {
  Block,
  Container,
  ContainerRole,
  DocumentTree,
  Fragment,
  HeaderFooterPair,
  Paragraph,
  Table,
} from "../core/document-model";
import {
  createCell,
  createContainer,
  createDocument,
  createFragment,
  createParagraph,
  createSection,
  createTable,
} from "../core/document-model";
import type { TokenMap } from "../core/token-map";
import { replaceAll } from "../core/tree-walker";
import {
  PACKAGE_RELS_NS,
  R_NS,
  W_NS,
  childElements,
  firstChildW,
  isW,
  readRunText,
  writeRunText,
} from "./docx-xml";

const DOCUMENT_PART = "word/document.xml";
const DOCUMENT_RELS_PART = "word/_rels/document.xml.rels";

/**
 * Inline wrappers whose runs belong to the enclosing paragraph
 */
const INLINE_WRAPPERS = ["hyperlink", "ins", "smartTag", "fldSimple", "customXml"];

export interface DocxRunFormatting {
  /** The w:r element. Its w:rPr is never modified. */
  readonly run: Element;
}

export type DocxDocument = DocumentTree<DocxRunFormatting>;
type DocxContainer = Container<DocxRunFormatting>;

interface RunBinding {
  fragment: Fragment<DocxRunFormatting>;
  savedText: string;
}

interface XmlPart {
  path: string;
  dom: Document;
  bindings: RunBinding[];
}

type HeaderFooterKind = "header" | "footer";
type HeaderFooterType = "default" | "first" | "even";
type PartsByType = Partial<Record<HeaderFooterType, DocxContainer>>;

function parseXml(xml: string, partPath: string): Document {
  const fail = (message: string) => {
    throw new Error(`Malformed DOCX part ${partPath}: ${message}`);
  };
  return new DOMParser({
    errorHandler: { error: fail, fatalError: fail },
  }).parseFromString(xml, "application/xml");
}

function resolveTarget(target: string): string {
  if (target.startsWith("/")) {
    return target.slice(1);
  }
  return path.posix.normalize(path.posix.join("word", target));
}

class PartReader {
  readonly parts: XmlPart[] = [];
  private readonly containers = new Map<string, DocxContainer>();

  constructor(private readonly zip: JSZip) {}

  async readXml(partPath: string): Promise<Document | null> {
    const file = this.zip.file(partPath);
    if (!file) return null;
    return parseXml(await file.async("string"), partPath);
  }

  /**
   * Each part is parsed once; sections sharing a header get the same container
   */
  async loadContainer(partPath: string, role: ContainerRole): Promise<DocxContainer> {
    const cached = this.containers.get(partPath);
    if (cached) return cached;

    const dom = await this.readXml(partPath);
    const bindings: RunBinding[] = [];
    const container = dom
      ? createContainer(role, collectBlocks(dom.documentElement, bindings))
      : createContainer<DocxRunFormatting>(role);

    if (dom) {
      this.parts.push({ path: partPath, dom, bindings });
    }
    this.containers.set(partPath, container);
    return container;
  }

  addPart(part: XmlPart): void {
    this.parts.push(part);
  }
}

function collectRuns(parent: Element, runs: Element[]): Element[] {
  for (const child of childElements(parent)) {
    if (isW(child, "r")) {
      runs.push(child);
    } else if (INLINE_WRAPPERS.some((name) => isW(child, name))) {
      collectRuns(child, runs);
    } else if (isW(child, "sdt")) {
      const content = firstChildW(child, "sdtContent");
      if (content) collectRuns(content, runs);
    }
  }
  return runs;
}

function buildParagraph(
  element: Element,
  bindings: RunBinding[]
): Paragraph<DocxRunFormatting> {
  const fragments = collectRuns(element, []).map((run) => {
    const fragment = createFragment(readRunText(run), { run });
    bindings.push({ fragment, savedText: fragment.text });
    return fragment;
  });
  return createParagraph(fragments);
}

/**
 * Children named `localName`, looking through content controls and custom XML
 * wrappers (repeating sections wrap whole rows, for instance)
 */
function wrappedChildren(parent: Element, localName: string): Element[] {
  const found: Element[] = [];
  for (const child of childElements(parent)) {
    if (isW(child, localName)) {
      found.push(child);
    } else if (isW(child, "sdt")) {
      const content = firstChildW(child, "sdtContent");
      if (content) found.push(...wrappedChildren(content, localName));
    } else if (isW(child, "customXml")) {
      found.push(...wrappedChildren(child, localName));
    }
  }
  return found;
}

function buildTable(element: Element, bindings: RunBinding[]): Table<DocxRunFormatting> {
  const rows = wrappedChildren(element, "tr").map((row) =>
    wrappedChildren(row, "tc").map((cell) => createCell(collectBlocks(cell, bindings)))
  );
  return createTable(rows);
}

function collectBlocks(
  parent: Element,
  bindings: RunBinding[]
): Block<DocxRunFormatting>[] {
  const blocks: Block<DocxRunFormatting>[] = [];
  for (const child of childElements(parent)) {
    if (isW(child, "p")) {
      blocks.push(buildParagraph(child, bindings));
    } else if (isW(child, "tbl")) {
      blocks.push(buildTable(child, bindings));
    } else if (isW(child, "sdt")) {
      const content = firstChildW(child, "sdtContent");
      if (content) blocks.push(...collectBlocks(content, bindings));
    } else if (isW(child, "customXml")) {
      blocks.push(...collectBlocks(child, bindings));
    }
  }
  return blocks;
}

async function readRelationships(reader: PartReader): Promise<Map<string, string>> {
  const targets = new Map<string, string>();
  const dom = await reader.readXml(DOCUMENT_RELS_PART);
  if (!dom) return targets;

  for (const rel of childElements(dom.documentElement)) {
    if (rel.namespaceURI !== PACKAGE_RELS_NS || rel.localName !== "Relationship") {
      continue;
    }
    const id = rel.getAttribute("Id");
    const target = rel.getAttribute("Target");
    if (id && target && rel.getAttribute("TargetMode") !== "External") {
      targets.set(id, resolveTarget(target));
    }
  }
  return targets;
}

/**
 * Section properties in document order: those closing a paragraph, then the
 * body's final one
 */
function findSectionProperties(body: Element): Element[] {
  const found: Element[] = [];
  for (const child of childElements(body)) {
    if (isW(child, "p")) {
      const properties = firstChildW(child, "pPr");
      const sectPr = properties && firstChildW(properties, "sectPr");
      if (sectPr) found.push(sectPr);
    } else if (isW(child, "sectPr")) {
      found.push(child);
    }
  }
  return found;
}

function toReferenceType(value: string | null): HeaderFooterType {
  return value === "first" || value === "even" ? value : "default";
}

async function readSections(
  body: Element,
  reader: PartReader
): Promise<DocxDocument["sections"]> {
  const relationships = await readRelationships(reader);
  const sections: DocxDocument["sections"][number][] = [];
  let previous: Record<HeaderFooterKind, PartsByType> = { header: {}, footer: {} };

  for (const sectPr of findSectionProperties(body)) {
    // a section without its own reference keeps the previous section's part
    const current: Record<HeaderFooterKind, PartsByType> = {
      header: { ...previous.header },
      footer: { ...previous.footer },
    };

    for (const kind of ["header", "footer"] as const) {
      for (const reference of childElements(sectPr)) {
        if (!isW(reference, `${kind}Reference`)) continue;
        const target = relationships.get(reference.getAttributeNS(R_NS, "id") ?? "");
        if (!target) continue;
        const type = toReferenceType(reference.getAttributeNS(W_NS, "type"));
        current[kind][type] = await reader.loadContainer(target, kind);
      }
    }

    const pairFor = (type: HeaderFooterType): HeaderFooterPair<DocxRunFormatting> | undefined => {
      const header = current.header[type];
      const footer = current.footer[type];
      if (!header && !footer) return undefined;
      return {
        header: header ?? createContainer<DocxRunFormatting>("header"),
        footer: footer ?? createContainer<DocxRunFormatting>("footer"),
      };
    };

    sections.push(
      createSection(
        current.header.default ?? createContainer<DocxRunFormatting>("header"),
        current.footer.default ?? createContainer<DocxRunFormatting>("footer"),
        { firstPage: pairFor("first"), evenPage: pairFor("even") }
      )
    );
    previous = current;
  }

  return sections;
}

export class DocxTemplate {
  private constructor(
    private readonly zip: JSZip,
    readonly document: DocxDocument,
    private readonly parts: XmlPart[]
  ) {}

  static async load(data: Buffer | Uint8Array): Promise<DocxTemplate> {
    const zip = await JSZip.loadAsync(data);
    const reader = new PartReader(zip);

    const dom = await reader.readXml(DOCUMENT_PART);
    if (!dom) {
      throw new Error(`Missing DOCX part ${DOCUMENT_PART}`);
    }
    const body = firstChildW(dom.documentElement, "body");
    if (!body) {
      throw new Error(`Malformed DOCX part ${DOCUMENT_PART}: no w:body element`);
    }

    const bindings: RunBinding[] = [];
    const bodyContainer = createContainer("body", collectBlocks(body, bindings));
    reader.addPart({ path: DOCUMENT_PART, dom, bindings });

    const sections = await readSections(body, reader);
    return new DocxTemplate(
      zip,
      createDocument(bodyContainer, [...sections]),
      reader.parts
    );
  }

  /**
   * Writes changed runs back and returns the packaged file
   */
  async save(): Promise<Buffer> {
    const serializer = new XMLSerializer();

    for (const part of this.parts) {
      const changed = part.bindings.filter(
        (binding) => binding.fragment.text !== binding.savedText
      );
      if (changed.length === 0) continue;

      for (const binding of changed) {
        writeRunText(binding.fragment.formatting.run, binding.fragment.text);
        binding.savedText = binding.fragment.text;
      }
      this.zip.file(part.path, serializer.serializeToString(part.dom));
    }

    return this.zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
  }
}

export function loadDocxTemplate(data: Buffer | Uint8Array): Promise<DocxTemplate> {
  return DocxTemplate.load(data);
}

export async function readDocxTemplate(filePath: string): Promise<DocxTemplate> {
  return DocxTemplate.load(await fs.promises.readFile(filePath));
}

/**
 * Fills a template file and writes the result. Returns the replacement count.
 */
export async function fillDocxTemplate(
  templatePath: string,
  outputPath: string,
  tokenMap: TokenMap
): Promise<number> {
  const template = await readDocxTemplate(templatePath);
  const count = replaceAll(template.document, tokenMap);
  await fs.promises.writeFile(outputPath, await template.save());
  return count;
}
