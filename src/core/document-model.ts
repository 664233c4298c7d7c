/**
 * Rich-text document model
 * A closed set of tagged nodes that the substitution engine walks. Fragments carry
 * an opaque formatting payload `F` that the engine never reads or writes.
 */

export interface Fragment<F = unknown> {
  readonly kind: "fragment";
  /** The only field the engine mutates */
  text: string;
  readonly formatting: F;
}

export interface Paragraph<F = unknown> {
  readonly kind: "paragraph";
  readonly fragments: readonly Fragment<F>[];
}

export interface TableCell<F = unknown> extends Container<F> {
  readonly role: "cell";
}

export interface TableRow<F = unknown> {
  readonly kind: "row";
  readonly cells: readonly TableCell<F>[];
}

export interface Table<F = unknown> {
  readonly kind: "table";
  readonly rows: readonly TableRow<F>[];
}

export type Block<F = unknown> = Paragraph<F> | Table<F>;

export type ContainerRole = "body" | "cell" | "header" | "footer";

export interface Container<F = unknown> {
  readonly kind: "container";
  readonly role: ContainerRole;
  /** Paragraphs and tables in source order */
  readonly blocks: readonly Block<F>[];
}

export interface HeaderFooterPair<F = unknown> {
  readonly header: Container<F>;
  readonly footer: Container<F>;
}

export interface Section<F = unknown> extends HeaderFooterPair<F> {
  readonly kind: "section";
  readonly firstPage?: HeaderFooterPair<F>;
  readonly evenPage?: HeaderFooterPair<F>;
}

export interface DocumentTree<F = unknown> {
  readonly kind: "document";
  readonly body: Container<F>;
  readonly sections: readonly Section<F>[];
}

export type ReplacementTarget<F = unknown> = DocumentTree<F> | Container<F>;

export function createFragment<F>(text: string, formatting: F): Fragment<F>;
export function createFragment(text: string): Fragment<undefined>;
export function createFragment<F>(text: string, formatting?: F): Fragment<F | undefined> {
  return { kind: "fragment", text, formatting };
}

export function createParagraph<F>(fragments: Fragment<F>[]): Paragraph<F> {
  return { kind: "paragraph", fragments };
}

export function createContainer<F>(
  role: ContainerRole,
  blocks: Block<F>[] = []
): Container<F> {
  return { kind: "container", role, blocks };
}

export function createCell<F>(blocks: Block<F>[] = []): TableCell<F> {
  return { kind: "container", role: "cell", blocks };
}

export function createTable<F>(rows: TableCell<F>[][]): Table<F> {
  return {
    kind: "table",
    rows: rows.map((cells) => ({ kind: "row", cells })),
  };
}

export function createSection<F>(
  header: Container<F>,
  footer: Container<F>,
  variants: Pick<Section<F>, "firstPage" | "evenPage"> = {}
): Section<F> {
  return { kind: "section", header, footer, ...variants };
}

export function createDocument<F>(
  body: Container<F>,
  sections: Section<F>[] = []
): DocumentTree<F> {
  return { kind: "document", body, sections };
}

export function paragraphsOf<F>(container: Container<F>): Paragraph<F>[] {
  return container.blocks.filter(
    (block): block is Paragraph<F> => block.kind === "paragraph"
  );
}

export function tablesOf<F>(container: Container<F>): Table<F>[] {
  return container.blocks.filter(
    (block): block is Table<F> => block.kind === "table"
  );
}

/**
 * Header and footer containers of a section, default pair first
 */
export function sectionContainers<F>(section: Section<F>): Container<F>[] {
  const containers = [section.header, section.footer];
  for (const pair of [section.firstPage, section.evenPage]) {
    if (pair) {
      containers.push(pair.header, pair.footer);
    }
  }
  return containers;
}

export interface TreeVisitor<F> {
  container?(container: Container<F>): void;
  table?(table: Table<F>): void;
  paragraph?(paragraph: Paragraph<F>, owner: Container<F>): void;
}

function visitTable<F>(table: Table<F>, visitor: TreeVisitor<F>): void {
  visitor.table?.(table);
  for (const row of table.rows) {
    for (const cell of row.cells) {
      visitContainer(cell, visitor);
    }
  }
}

function visitContainer<F>(container: Container<F>, visitor: TreeVisitor<F>): void {
  visitor.container?.(container);
  for (const paragraph of paragraphsOf(container)) {
    visitor.paragraph?.(paragraph, container);
  }
  for (const table of tablesOf(container)) {
    visitTable(table, visitor);
  }
}

/**
 * Depth-first traversal. Per container, paragraphs come before tables; for a
 * document root the body comes before the section headers and footers.
 */
export function traverseTree<F>(
  target: ReplacementTarget<F>,
  visitor: TreeVisitor<F>
): void {
  if (target.kind === "container") {
    visitContainer(target, visitor);
    return;
  }

  visitContainer(target.body, visitor);
  for (const section of target.sections) {
    for (const container of sectionContainers(section)) {
      visitContainer(container, visitor);
    }
  }
}

export function paragraphText<F>(paragraph: Paragraph<F>): string {
  return paragraph.fragments.map((fragment) => fragment.text).join("");
}

export function collectParagraphs<F>(target: ReplacementTarget<F>): Paragraph<F>[] {
  const paragraphs: Paragraph<F>[] = [];
  traverseTree(target, {
    paragraph: (paragraph) => {
      paragraphs.push(paragraph);
    },
  });
  return paragraphs;
}

/**
 * Visible text of every reachable paragraph, one per line, in traversal order
 */
export function documentText<F>(target: ReplacementTarget<F>): string {
  return collectParagraphs(target).map(paragraphText).join("\n");
}
