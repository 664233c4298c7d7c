import { expect, test, describe } from "vitest";
import {
  createCell,
  createContainer,
  createDocument,
  createSection,
  createTable,
  documentText,
} from "../../src/core/document-model";
import { createTokenMap } from "../../src/core/token-map";
import { findUnresolvedTokens, replaceAll } from "../../src/core/tree-walker";
import { styledParagraph } from "../test-helpers";

const map = createTokenMap({ "{{CASE}}": "42", "{{NAME}}": "Alice" });

function buildLetter() {
  const innerTable = createTable([
    [createCell([styledParagraph("inner {{", "CASE}}")])],
  ]);
  const outerTable = createTable([
    [
      createCell([styledParagraph("cell {{NAME}}"), innerTable]),
      createCell(),
    ],
  ]);
  const body = createContainer("body", [
    styledParagraph("Case {{CA", "SE}} for {{NAME}}"),
    outerTable,
  ]);
  const section = createSection(
    createContainer("header", [styledParagraph("Header {{CASE}}")]),
    createContainer("footer", [styledParagraph("{{NAME", "}} footer")]),
    {
      firstPage: {
        header: createContainer("header", [styledParagraph("First {{CASE}}")]),
        footer: createContainer("footer"),
      },
    }
  );
  return createDocument(body, [section]);
}

describe("Tree replacement walker", () => {
  test("reaches nested tables, headers, footers and first-page variants", () => {
    const letter = buildLetter();
    const count = replaceAll(letter, map);

    expect(count).toBe(7);
    expect(documentText(letter)).toBe(
      [
        "Case 42 for Alice",
        "cell Alice",
        "inner 42",
        "Header 42",
        "Alice footer",
        "First 42",
      ].join("\n")
    );
  });

  test("a second pass makes no replacements", () => {
    const letter = buildLetter();
    replaceAll(letter, map);
    const before = documentText(letter);

    expect(replaceAll(letter, map)).toBe(0);
    expect(documentText(letter)).toBe(before);
  });

  test("accepts a bare container and skips empty cells and tables", () => {
    const cell = createCell([createTable([]), styledParagraph("{{NAME}}")]);
    const body = createContainer("body", [createTable([[cell, createCell()]])]);

    expect(replaceAll(body, map)).toBe(1);
    expect(documentText(body)).toBe("Alice");
  });

  test("returns 0 for an empty document", () => {
    expect(replaceAll(createDocument(createContainer("body")), map)).toBe(0);
  });

  test("findUnresolvedTokens lists leftover placeholders once, in order", () => {
    const body = createContainer("body", [
      styledParagraph("{{UNKNOWN}} and {{CASE}}"),
      createTable([[createCell([styledParagraph("{{OTHER}} {{UNKN", "OWN}}")])]]),
    ]);
    replaceAll(body, map);

    expect(findUnresolvedTokens(body)).toEqual(["{{UNKNOWN}}", "{{OTHER}}"]);
  });

  test("findUnresolvedTokens accepts a custom pattern", () => {
    const body = createContainer("body", [styledParagraph("[[LEFT]] {{X}}")]);
    expect(findUnresolvedTokens(body, "\\[\\[[A-Z]+\\]\\]")).toEqual(["[[LEFT]]"]);
  });
});
