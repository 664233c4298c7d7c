import { expect, test, describe } from "vitest";
import {
  createTokenMap,
  extendTokenMap,
  findSelfReferencingTokens,
} from "../../src/core/token-map";

describe("Token map", () => {
  test("keeps insertion order from records and entry lists", () => {
    expect([...createTokenMap({ "{{B}}": "b", "{{A}}": "a" }).keys()]).toEqual([
      "{{B}}",
      "{{A}}",
    ]);
    expect([...createTokenMap([["x", "1"], ["y", "2"]]).entries()]).toEqual([
      ["x", "1"],
      ["y", "2"],
    ]);
  });

  test("rejects empty keys", () => {
    expect(() => createTokenMap({ "": "value" })).toThrow(
      "Token map keys must not be empty"
    );
  });

  test("extendTokenMap appends new keys and keeps existing ones", () => {
    const base = createTokenMap({ "{{A}}": "a" });
    const merged = extendTokenMap(base, { "{{A}}": "override", "{{Z}}": "z" });

    expect([...merged.entries()]).toEqual([
      ["{{A}}", "a"],
      ["{{Z}}", "z"],
    ]);
    expect(base.size).toBe(1);
  });

  test("findSelfReferencingTokens reports values that contain keys", () => {
    const map = createTokenMap([
      ["{{A}}", "plain"],
      ["{{B}}", "see {{A}}"],
      ["{{C}}", "{{C}}!"],
    ]);

    expect(findSelfReferencingTokens(map)).toEqual([
      ["{{B}}", "{{A}}"],
      ["{{C}}", "{{C}}"],
    ]);
  });

  test("findSelfReferencingTokens is empty for independent values", () => {
    expect(findSelfReferencingTokens(createTokenMap({ "{{A}}": "1", "{{B}}": "2" }))).toEqual([]);
  });
});
