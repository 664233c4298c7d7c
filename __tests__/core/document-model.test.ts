import { expect, test, describe } from "vitest";
import {
  createCell,
  createContainer,
  createDocument,
  createFragment,
  createParagraph,
  createSection,
  createTable,
  documentText,
  paragraphText,
  sectionContainers,
  traverseTree,
  type Container,
} from "../../src/core/document-model";
import { styledParagraph } from "../test-helpers";

describe("Document model", () => {
  test("paragraph text is the concatenation of its fragments", () => {
    expect(paragraphText(styledParagraph("a", "", "bc"))).toBe("abc");
    expect(paragraphText(createParagraph([createFragment("plain")]))).toBe("plain");
  });

  test("section containers list the default pair before the variants", () => {
    const section = createSection(
      createContainer("header", [styledParagraph("H")]),
      createContainer("footer", [styledParagraph("F")]),
      {
        firstPage: {
          header: createContainer("header", [styledParagraph("H1")]),
          footer: createContainer("footer", [styledParagraph("F1")]),
        },
        evenPage: {
          header: createContainer("header", [styledParagraph("H2")]),
          footer: createContainer("footer", [styledParagraph("F2")]),
        },
      }
    );

    expect(sectionContainers(section).map((c) => documentText(c))).toEqual([
      "H",
      "F",
      "H1",
      "F1",
      "H2",
      "F2",
    ]);
  });

  test("traversal visits paragraphs before tables in each container", () => {
    const body = createContainer("body", [
      createTable([[createCell([styledParagraph("in table")])]]),
      styledParagraph("after table"),
    ]);
    const doc = createDocument(body, [
      createSection(
        createContainer("header", [styledParagraph("head")]),
        createContainer("footer")
      ),
    ]);

    const visited: string[] = [];
    const owners: Container<unknown>[] = [];
    traverseTree(doc, {
      paragraph: (paragraph, owner) => {
        visited.push(paragraphText(paragraph));
        owners.push(owner);
      },
    });

    expect(visited).toEqual(["after table", "in table", "head"]);
    expect(owners.map((owner) => owner.role)).toEqual(["body", "cell", "header"]);
  });

  test("traversal reports every container and table", () => {
    const doc = createDocument(
      createContainer("body", [createTable([[createCell(), createCell()]])])
    );
    const roles: string[] = [];
    let tables = 0;
    traverseTree(doc, {
      container: (container) => roles.push(container.role),
      table: () => {
        tables++;
      },
    });

    expect(roles).toEqual(["body", "cell", "cell"]);
    expect(tables).toBe(1);
  });
});
