import { expect, test, describe } from "vitest";
import {
  locateToken,
  renderTokens,
  replaceInParagraph,
  replaceOnce,
} from "../../src/core/run-span-replacer";
import { paragraphText } from "../../src/core/document-model";
import { createTokenMap } from "../../src/core/token-map";
import { styledParagraph } from "../test-helpers";

function texts(paragraph: ReturnType<typeof styledParagraph>): string[] {
  return paragraph.fragments.map((fragment) => fragment.text);
}

function styles(paragraph: ReturnType<typeof styledParagraph>): string[] {
  return paragraph.fragments.map((fragment) => fragment.formatting.style);
}

describe("Run-span replacer", () => {
  describe("replaceOnce", () => {
    test("replaces a token inside a single fragment", () => {
      const paragraph = styledParagraph("Dear ", "Mr {{NAME}}, hi", "!");
      const changed = replaceOnce(paragraph, createTokenMap({ "{{NAME}}": "Smith" }));

      expect(changed).toBe(true);
      expect(texts(paragraph)).toEqual(["Dear ", "Mr Smith, hi", "!"]);
      expect(styles(paragraph)).toEqual(["s0", "s1", "s2"]);
    });

    test("replaces a token split across three fragments", () => {
      const paragraph = styledParagraph("Hello {{", "NAME", "}} world");
      replaceOnce(paragraph, createTokenMap({ "{{NAME}}": "Alice" }));

      expect(texts(paragraph)).toEqual(["Hello Alice", "", " world"]);
      expect(styles(paragraph)).toEqual(["s0", "s1", "s2"]);
      expect(paragraphText(paragraph)).toBe("Hello Alice world");
    });

    test("keeps the suffix when the token ends inside the second fragment", () => {
      const paragraph = styledParagraph("a{{X", "}}b", "c");
      replaceOnce(paragraph, createTokenMap({ "{{X}}": "1" }));

      expect(texts(paragraph)).toEqual(["a1", "b", "c"]);
    });

    test("leaves fragments outside the span untouched", () => {
      const paragraph = styledParagraph("before ", "{{A", "}}", " after");
      replaceOnce(paragraph, createTokenMap({ "{{A}}": "x" }));

      expect(texts(paragraph)).toEqual(["before ", "x", "", " after"]);
    });

    test("returns false and changes nothing when no key occurs", () => {
      const paragraph = styledParagraph("nothing ", "here");
      const changed = replaceOnce(paragraph, createTokenMap({ "{{A}}": "x" }));

      expect(changed).toBe(false);
      expect(texts(paragraph)).toEqual(["nothing ", "here"]);
    });

    test("picks the earliest occurrence regardless of map order", () => {
      const paragraph = styledParagraph("{{B}} then {{A}}");
      replaceOnce(paragraph, createTokenMap([["{{A}}", "a"], ["{{B}}", "b"]]));

      expect(paragraphText(paragraph)).toBe("b then {{A}}");
    });

    test("prefers the earlier map entry when two keys start at the same offset", () => {
      const paragraph = styledParagraph("{{DATE+2}}");
      replaceOnce(
        paragraph,
        createTokenMap([["{{DATE", "short"], ["{{DATE+2}}", "long"]])
      );

      expect(paragraphText(paragraph)).toBe("short+2}}");
    });

    test("handles an empty replacement value", () => {
      const paragraph = styledParagraph("x{{", "GONE}}", "y");
      replaceOnce(paragraph, createTokenMap({ "{{GONE}}": "" }));

      expect(texts(paragraph)).toEqual(["x", "", "y"]);
    });
  });

  test("two tokens take exactly two successful calls", () => {
    const paragraph = styledParagraph("{{A}} ", "and {{B}}");
    const map = createTokenMap({ "{{A}}": "1", "{{B}}": "2" });

    expect([replaceOnce(paragraph, map), replaceOnce(paragraph, map), replaceOnce(paragraph, map)]).toEqual([
      true,
      true,
      false,
    ]);
    expect(texts(paragraph)).toEqual(["1 ", "and 2"]);
  });

  describe("replaceInParagraph", () => {
    test("repeats until no key remains and counts replacements", () => {
      const paragraph = styledParagraph("{{A}} and {", "{A}} and {{B}}");
      const count = replaceInParagraph(
        paragraph,
        createTokenMap({ "{{A}}": "1", "{{B}}": "2" })
      );

      expect(count).toBe(3);
      expect(paragraphText(paragraph)).toBe("1 and 1 and 2");
      expect(replaceOnce(paragraph, createTokenMap({ "{{A}}": "1" }))).toBe(false);
    });

    test("returns 0 for a paragraph without fragments", () => {
      const paragraph = styledParagraph();
      expect(replaceInParagraph(paragraph, createTokenMap({ "{{A}}": "1" }))).toBe(0);
    });
  });

  test("locateToken reports offsets in the concatenated text", () => {
    const paragraph = styledParagraph("ab{", "{K}}");
    expect(locateToken(paragraph, createTokenMap({ "{{K}}": "v" }))).toEqual({
      token: "{{K}}",
      value: "v",
      start: 2,
      end: 7,
    });
  });

  test("renderTokens fills a plain string", () => {
    const map = createTokenMap({ "{{YY_MM}}": "24-03", "{{CASE_NUM}}": "123456" });
    expect(renderTokens("{{YY_MM}} №{{CASE_NUM}}", map)).toBe("24-03 №123456");
  });
});
